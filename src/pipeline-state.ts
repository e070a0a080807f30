/**
 * Pipeline State - The shared state tree and its single update path.
 *
 * Phase workers run concurrently and all write into the same unit registry
 * and error log. Every read and write goes through one
 * {@link PipelineStateStore}: `update()` runs a synchronous mutator as one
 * critical section, reads hand out deep copies, and observers are notified
 * with a fresh snapshot after each committed update. Nothing outside the
 * store holds a reference into the live tree.
 *
 * @module pipeline-state
 */

import type { StructuredResult } from './llm/response-normalizer.js';
import type { Decision } from './llm/response-schemas.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type PipelinePhase =
  | 'idle'
  | 'discovering'
  | 'analyzing'
  | 'awaiting_decisions'
  | 'hardening'
  | 'verifying'
  | 'complete'
  | 'errored';

export type UnitStatus =
  | 'pending'
  | 'analyzing'
  | 'analyzed'
  | 'hardening'
  | 'skipped'
  | 'hardened'
  | 'verifying'
  | 'verified'
  | 'error';

/** One discovered source artifact ("screen"). */
export interface Unit {
  /** File stem; unique within the registry. */
  name: string;
  /** Path relative to the discovery root. */
  path: string;
  fullPath: string;
  status: UnitStatus;
  analysis: StructuredResult | null;
  decision: Decision | null;
  hardened: StructuredResult | null;
  verification: StructuredResult | null;
  error: string | null;
  /** Shape mismatches in otherwise-parsed tool output. */
  warnings: string[];
  /** Sidecar artifacts found on disk at discovery time. */
  existingArtifacts: string[];
  /** Summary of an `analysis.json` left by an earlier run. */
  priorAnalysis: PriorAnalysis | null;
  updatedAt: string | null;
}

export interface FindingCounts {
  high: number;
  medium: number;
  low: number;
}

export interface PriorAnalysis {
  /** Modification time of the stored analysis. */
  analyzedAt: string;
  /** The source file changed after the analysis was written. */
  stale: boolean;
  overallRisk: string | null;
  /** `null` when the stored analysis could not be read. */
  findingCounts: FindingCounts | null;
}

export interface ErrorEntry {
  message: string;
  timestamp: string;
}

export interface PipelineState {
  phase: PipelinePhase;
  /** Source root of the last discovery, `null` before discovery. */
  root: string | null;
  /** Keyed by unit name, in discovery order. */
  units: Record<string, Unit>;
  errors: ErrorEntry[];
  discoveredAt: string | null;
  startedAt: string | null;
  completedAt: string | null;
}

/** A detached, fully materialized copy of the state. */
export type PipelineSnapshot = PipelineState;

export type SnapshotListener = (snapshot: PipelineSnapshot) => void;

export function createInitialState(): PipelineState {
  return {
    phase: 'idle',
    root: null,
    units: {},
    errors: [],
    discoveredAt: null,
    startedAt: null,
    completedAt: null,
  };
}

/** Phases during which a fan-out is in flight. */
export const ACTIVE_PHASES: readonly PipelinePhase[] = ['analyzing', 'hardening', 'verifying'];

// ---------------------------------------------------------------------------
// PipelineStateStore
// ---------------------------------------------------------------------------

export class PipelineStateStore {
  private state: PipelineState;
  private readonly listeners = new Set<SnapshotListener>();
  private updating = false;

  constructor(initial: PipelineState = createInitialState()) {
    this.state = structuredClone(initial);
  }

  /**
   * Apply a mutation as one critical section.
   *
   * The mutator must be synchronous: a mutator that returns a promise is
   * rejected, since an update spanning an `await` could interleave with
   * other workers. Nested updates are rejected for the same reason.
   */
  update(mutator: (draft: PipelineState) => void): void {
    if (this.updating) {
      throw new Error('Nested pipeline state update');
    }

    this.updating = true;
    try {
      const result: unknown = mutator(this.state);
      if (isPromiseLike(result)) {
        throw new Error('Pipeline state mutators must be synchronous');
      }
    } finally {
      this.updating = false;
    }

    this.notify();
  }

  /**
   * Read a value out of the state. The result is a deep copy.
   */
  read<T>(selector: (state: Readonly<PipelineState>) => T): T {
    return structuredClone(selector(this.state));
  }

  snapshot(): PipelineSnapshot {
    return structuredClone(this.state);
  }

  /**
   * Register an observer; it receives a snapshot after every update.
   *
   * @returns A function that removes the observer.
   */
  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(): void {
    if (this.listeners.size === 0) return;

    const snapshot = this.snapshot();
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        console.error(`[PipelineState] Listener failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Mutation helpers (call only inside `update`)
// ---------------------------------------------------------------------------

export function appendError(draft: PipelineState, message: string): void {
  draft.errors.push({ message, timestamp: new Date().toISOString() });
}

/**
 * Patch a unit in place. Unknown names are ignored.
 */
export function patchUnit(
  draft: PipelineState,
  name: string,
  patch: Partial<Omit<Unit, 'name' | 'path' | 'fullPath'>>,
): void {
  const unit = draft.units[name];
  if (!unit) return;
  Object.assign(unit, patch, { updatedAt: new Date().toISOString() });
}

function isPromiseLike(value: unknown): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}
