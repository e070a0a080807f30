/**
 * Phase Executor - Fan-out/gather over the eligible units of a phase.
 *
 * Every eligible unit gets its own concurrent worker; there is no pool cap
 * and no per-worker timeout at this layer. `runParallel` resolves only once
 * all workers have settled. A worker failure is handed to `onError` and
 * stays local to that unit: siblings keep running and the returned promise
 * never rejects because of it.
 *
 * @module phase-executor
 */

import { PhaseExecutionError, errorMessage } from './errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface WorkItem {
  name: string;
}

export interface WorkerHooks<U extends WorkItem, R> {
  /** Called before the action starts. */
  onStart?: (unit: U) => void;
  /** Called with the action's result; a throw here counts as a failure. */
  onResult: (unit: U, result: R) => void;
  /** Called once per failed worker. */
  onError: (unit: U, error: unknown) => void;
}

export interface WorkerFailure {
  name: string;
  message: string;
}

export interface PhaseRunSummary {
  phase: string;
  total: number;
  succeeded: number;
  failed: number;
  failures: WorkerFailure[];
  durationMs: number;
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

/**
 * Run `action` for every unit concurrently and wait for all of them.
 *
 * @throws {PhaseExecutionError} If the eligible set is not an array or
 *   names a unit twice. Worker failures never reject.
 */
export async function runParallel<U extends WorkItem, R>(
  phase: string,
  units: readonly U[],
  action: (unit: U) => Promise<R>,
  hooks: WorkerHooks<U, R>,
): Promise<PhaseRunSummary> {
  assertEligible(phase, units);

  const startTime = Date.now();
  const failures: WorkerFailure[] = [];

  console.log(`[PhaseExecutor] ${phase}: dispatching ${units.length} worker(s)`);

  const outcomes = await Promise.all(
    units.map((unit) => runWorker(unit, action, hooks, failures)),
  );

  const succeeded = outcomes.filter(Boolean).length;
  const summary: PhaseRunSummary = {
    phase,
    total: units.length,
    succeeded,
    failed: units.length - succeeded,
    failures,
    durationMs: Date.now() - startTime,
  };

  console.log(
    `[PhaseExecutor] ${phase}: ${summary.succeeded}/${summary.total} succeeded in ${summary.durationMs}ms`,
  );
  return summary;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function runWorker<U extends WorkItem, R>(
  unit: U,
  action: (unit: U) => Promise<R>,
  hooks: WorkerHooks<U, R>,
  failures: WorkerFailure[],
): Promise<boolean> {
  try {
    hooks.onStart?.(unit);
    const result = await action(unit);
    hooks.onResult(unit, result);
    return true;
  } catch (error) {
    failures.push({ name: unit.name, message: errorMessage(error) });
    try {
      hooks.onError(unit, error);
    } catch (hookError) {
      console.error(`[PhaseExecutor] Error handler failed for ${unit.name}: ${errorMessage(hookError)}`);
    }
    return false;
  }
}

function assertEligible(phase: string, units: unknown): void {
  if (!Array.isArray(units)) {
    throw new PhaseExecutionError(`${phase}: eligible units must be an array`);
  }

  const items: readonly unknown[] = units;
  const names = new Set<string>();
  for (const unit of items) {
    if (typeof unit !== 'object' || unit === null || !('name' in unit) || typeof unit.name !== 'string') {
      throw new PhaseExecutionError(`${phase}: eligible unit without a name`);
    }
    if (names.has(unit.name)) {
      throw new PhaseExecutionError(`${phase}: unit ${unit.name} is listed twice`);
    }
    names.add(unit.name);
  }
}
