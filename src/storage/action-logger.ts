/**
 * Action Logger - Append-only JSONL trail of pipeline events.
 *
 * Every phase transition, unit failure and operator action is written as a
 * single JSON line. The file outlives the process, so it is the record an
 * operator reviews after a run; the in-memory error log in the snapshot
 * covers the live view.
 *
 * @module storage/action-logger
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ActionType =
  | 'discovery_complete'
  | 'discovery_failed'
  | 'phase_start'
  | 'phase_complete'
  | 'unit_complete'
  | 'unit_failed'
  | 'decisions_submitted'
  | 'unit_retry'
  | 'query'
  | 'pipeline_reset';

export interface ActionEntry {
  /** ISO 8601 timestamp. */
  timestamp: string;
  /** Category of action. */
  action_type: ActionType;
  /** Pipeline phase the action belongs to (if applicable). */
  phase?: string;
  /** Unit the action concerns (if applicable). */
  unit?: string;
  /** Free-form details about the action. */
  details?: string;
  /** How long the action took (if timed). */
  duration_ms?: number;
}

// ---------------------------------------------------------------------------
// ActionLogger
// ---------------------------------------------------------------------------

export class ActionLogger {
  private readonly logPath: string;

  constructor(logPath: string) {
    this.logPath = logPath;
    fs.mkdirSync(path.dirname(logPath), { recursive: true });
  }

  /**
   * Append a single action entry to the log.
   *
   * Uses `fs.appendFileSync` which is atomic at the OS level for
   * small writes (< PIPE_BUF, typically 4096 bytes).
   */
  log(entry: Omit<ActionEntry, 'timestamp'>): void {
    const full: ActionEntry = {
      timestamp: new Date().toISOString(),
      ...entry,
    };

    const line = JSON.stringify(full) + '\n';
    fs.appendFileSync(this.logPath, line, 'utf-8');
  }

  /**
   * Read all log entries from disk.
   *
   * Skips blank lines and lines that fail to parse.
   */
  readAll(): ActionEntry[] {
    if (!fs.existsSync(this.logPath)) {
      return [];
    }

    const raw = fs.readFileSync(this.logPath, 'utf-8');
    const entries: ActionEntry[] = [];

    for (const line of raw.split('\n')) {
      if (!line.trim()) continue;
      const entry = parseEntry(line);
      if (entry) entries.push(entry);
    }

    return entries;
  }

  /**
   * Read the last N entries (most recent first).
   */
  readLast(n: number): ActionEntry[] {
    const all = this.readAll();
    return all.slice(-n).reverse();
  }
}

function parseEntry(line: string): ActionEntry | null {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return null; // torn or hand-edited line
  }

  if (
    typeof value !== 'object' ||
    value === null ||
    !('timestamp' in value) ||
    typeof value.timestamp !== 'string' ||
    !('action_type' in value) ||
    typeof value.action_type !== 'string'
  ) {
    return null;
  }

  const actionType = toActionType(value.action_type);
  if (actionType === null) return null;

  const entry: ActionEntry = {
    timestamp: value.timestamp,
    action_type: actionType,
  };
  if ('phase' in value && typeof value.phase === 'string') entry.phase = value.phase;
  if ('unit' in value && typeof value.unit === 'string') entry.unit = value.unit;
  if ('details' in value && typeof value.details === 'string') entry.details = value.details;
  if ('duration_ms' in value && typeof value.duration_ms === 'number') entry.duration_ms = value.duration_ms;
  return entry;
}

const ACTION_TYPES: readonly ActionType[] = [
  'discovery_complete',
  'discovery_failed',
  'phase_start',
  'phase_complete',
  'unit_complete',
  'unit_failed',
  'decisions_submitted',
  'unit_retry',
  'query',
  'pipeline_reset',
];

function toActionType(value: string): ActionType | null {
  return ACTION_TYPES.find((t) => t === value) ?? null;
}
