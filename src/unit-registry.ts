/**
 * Unit Registry - Discovers work units under a source root.
 *
 * A unit is one source file whose name matches the configured pattern
 * (by default every `*_controller.rb`). Files rejected by the exclusion
 * predicate (by default the shared `application_controller`) are skipped,
 * as are hidden directories, which is where sidecar artifacts live.
 *
 * @module unit-registry
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { DiscoveryError } from './errors.js';
import type { FindingCounts, PriorAnalysis, Unit } from './pipeline-state.js';
import type { SidecarStore } from './sidecar-store.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Decides whether a unit name (file stem) is left out of discovery. */
export type ExclusionPredicate = (name: string, relativePath: string) => boolean;

export interface DiscoveryOptions {
  /** File names to consider (default: names ending in `_controller.rb`). */
  filePattern?: RegExp;
  /** Names to leave out (default: `application_controller`). */
  exclude?: ExclusionPredicate;
  /**
   * When given, each unit lists the sidecar artifacts already on disk and
   * summarizes any analysis an earlier run left behind.
   */
  sidecars?: SidecarStore;
}

/** Existing work found beside a unit at discovery time. */
export interface ExistingWork {
  artifacts?: string[];
  priorAnalysis?: PriorAnalysis | null;
}

export const DEFAULT_FILE_PATTERN = /_controller\.rb$/;
export const DEFAULT_EXCLUSIONS: readonly string[] = ['application_controller'];

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

/**
 * Enumerate the units under `root`, sorted by relative path.
 *
 * Stems must be unique; when two files share a stem the first one (by
 * relative path) is kept and the other is reported on the console.
 *
 * @throws {DiscoveryError} If `root` does not exist or is not a directory.
 */
export function discoverUnits(root: string, options: DiscoveryOptions = {}): Unit[] {
  const absoluteRoot = path.resolve(root);
  if (!fs.existsSync(absoluteRoot) || !fs.statSync(absoluteRoot).isDirectory()) {
    throw new DiscoveryError(absoluteRoot, `Source directory not found: ${absoluteRoot}`);
  }

  const filePattern = options.filePattern ?? DEFAULT_FILE_PATTERN;
  const exclude = options.exclude ?? createExclusionPredicate(DEFAULT_EXCLUSIONS);

  const files = walk(absoluteRoot)
    .filter((fullPath) => filePattern.test(path.basename(fullPath)))
    .map((fullPath) => ({ fullPath, relativePath: toPosix(path.relative(absoluteRoot, fullPath)) }))
    .sort((a, b) => a.relativePath.localeCompare(b.relativePath));

  const seen = new Set<string>();
  const units: Unit[] = [];

  for (const { fullPath, relativePath } of files) {
    const name = path.basename(fullPath, path.extname(fullPath));
    if (exclude(name, relativePath)) continue;

    if (seen.has(name)) {
      console.warn(`[UnitRegistry] Duplicate unit name ${name} at ${relativePath}; keeping the first match`);
      continue;
    }
    seen.add(name);

    const sidecars = options.sidecars;
    units.push(
      createUnit(
        name,
        relativePath,
        fullPath,
        sidecars ? { artifacts: sidecars.list(fullPath), priorAnalysis: readPriorAnalysis(fullPath, sidecars) } : {},
      ),
    );
  }

  return units;
}

/**
 * Build an exclusion predicate from names and `*` wildcard patterns.
 *
 * @example
 * ```ts
 * const exclude = createExclusionPredicate(['application_controller', 'admin_*']);
 * exclude('admin_users_controller', 'admin_users_controller.rb'); // true
 * ```
 */
export function createExclusionPredicate(patterns: readonly string[]): ExclusionPredicate {
  const exact = new Set(patterns.filter((p) => !p.includes('*')));
  const wildcards = patterns
    .filter((p) => p.includes('*'))
    .map((p) => new RegExp(`^${p.split('*').map(escapeRegExp).join('.*')}$`));

  return (name) => exact.has(name) || wildcards.some((re) => re.test(name));
}

export function createUnit(
  name: string,
  relativePath: string,
  fullPath: string,
  existing: ExistingWork = {},
): Unit {
  return {
    name,
    path: relativePath,
    fullPath,
    status: 'pending',
    analysis: null,
    decision: null,
    hardened: null,
    verification: null,
    error: null,
    warnings: [],
    existingArtifacts: existing.artifacts ?? [],
    priorAnalysis: existing.priorAnalysis ?? null,
    updatedAt: null,
  };
}

const StoredAnalysisSchema = z
  .object({
    overall_risk: z.string().optional(),
    findings: z.array(z.object({ severity: z.string().optional() }).passthrough()).optional(),
  })
  .passthrough();

/**
 * Summarize the `analysis.json` an earlier run left for a unit.
 *
 * The analysis is stale when the source was modified after it was written.
 * An unreadable file still yields a summary, with no risk or counts.
 *
 * @returns `null` when the unit has no stored analysis.
 */
export function readPriorAnalysis(unitFullPath: string, sidecars: SidecarStore): PriorAnalysis | null {
  const analysisPath = sidecars.pathFor(unitFullPath, 'analysis.json');
  if (!fs.existsSync(analysisPath)) return null;

  const analysisStat = fs.statSync(analysisPath);
  const prior: PriorAnalysis = {
    analyzedAt: analysisStat.mtime.toISOString(),
    stale: fs.statSync(unitFullPath).mtimeMs > analysisStat.mtimeMs,
    overallRisk: null,
    findingCounts: null,
  };

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(analysisPath, 'utf-8'));
  } catch {
    return prior; // corrupt sidecar: no risk data
  }

  const parsed = StoredAnalysisSchema.safeParse(data);
  if (!parsed.success) return prior;

  const counts: FindingCounts = { high: 0, medium: 0, low: 0 };
  for (const finding of parsed.data.findings ?? []) {
    const severity = finding.severity?.toLowerCase();
    if (severity === 'high' || severity === 'medium' || severity === 'low') {
      counts[severity] += 1;
    }
  }

  return {
    ...prior,
    overallRisk: parsed.data.overall_risk ?? null,
    findingCounts: counts,
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function walk(dir: string): string[] {
  const results: string[] = [];

  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    if (entry.name.startsWith('.')) continue;

    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      results.push(...walk(full));
    } else if (entry.isFile()) {
      results.push(full);
    }
  }

  return results;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}
