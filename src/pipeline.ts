/**
 * Pipeline - Phase state machine for the hardening workflow.
 *
 *   idle → discovering → analyzing → awaiting_decisions
 *        → hardening → verifying → complete
 *
 * A failed discovery moves to `errored`, which is terminal until `reset()`.
 * Each of analyzing/hardening/verifying is one fan-out over the eligible
 * units followed by a barrier; the next phase never starts before every
 * worker of the previous one has settled. The decision gate between
 * analysis and hardening is crossed only by `submitDecisions()`.
 *
 * Ad-hoc queries (`askAboutScreen`, `explainFinding`) and `retryScreen` act
 * on a single unit and leave the global phase alone.
 *
 * All shared state lives in a {@link PipelineStateStore}; workers receive
 * copies of their unit and report back through the store's update path.
 *
 * @module pipeline
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  FindingNotFoundError,
  InputValidationError,
  PhaseTransitionError,
  UnitNotFoundError,
  errorMessage,
} from './errors.js';
import { runParallel, type PhaseRunSummary, type WorkerHooks } from './phase-executor.js';
import {
  ACTIVE_PHASES,
  PipelineStateStore,
  appendError,
  createInitialState,
  patchUnit,
  type PipelinePhase,
  type PipelineSnapshot,
  type SnapshotListener,
  type Unit,
  type UnitStatus,
} from './pipeline-state.js';
import { PromptLibrary } from './llm/prompt-loader.js';
import { isDegraded, parseToolResponse, type StructuredResult } from './llm/response-normalizer.js';
import {
  DecisionMapSchema,
  checkResultShape,
  findFinding,
  isSkip,
  type ArtifactKind,
  type DecisionMap,
} from './llm/response-schemas.js';
import { SidecarStore, previewArtifactName } from './sidecar-store.js';
import { discoverUnits, type DiscoveryOptions } from './unit-registry.js';
import type { ToolClient } from './tool-client.js';
import type { ActionEntry, ActionLogger } from './storage/action-logger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PipelineOptions {
  /** Source root to discover units under. */
  root: string;
  tool: ToolClient;
  /** Defaults to a store confined to `root`. */
  sidecars?: SidecarStore;
  prompts?: PromptLibrary;
  discovery?: Omit<DiscoveryOptions, 'sidecars'>;
  logger?: ActionLogger;
}

export type DiscoveryOutcome =
  | { ok: true; units: string[] }
  | { ok: false; error: string };

export interface HardeningRunResult {
  hardening: PhaseRunSummary;
  verification: PhaseRunSummary;
}

export interface QueryResponse {
  name: string;
  response: string;
}

export interface RetryAcknowledgement {
  name: string;
  status: 'retrying';
}

export interface AnalysisOptions {
  /**
   * Take a unit's stored `analysis.json` instead of invoking the tool when
   * the source has not changed since it was written.
   */
  reuseExisting?: boolean;
}

interface PhaseOutcome {
  result: StructuredResult;
  warnings: string[];
  /** Loaded from the sidecar rather than produced by the tool. */
  reused?: boolean;
}

/** Unit statuses with a worker in flight. */
const IN_FLIGHT: readonly UnitStatus[] = ['analyzing', 'hardening', 'verifying'];

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export class Pipeline {
  private readonly root: string;
  private readonly tool: ToolClient;
  private readonly sidecars: SidecarStore;
  private readonly prompts: PromptLibrary;
  private readonly discoveryOptions: Omit<DiscoveryOptions, 'sidecars'>;
  private readonly logger?: ActionLogger;
  private readonly store = new PipelineStateStore();
  private readonly detached = new Set<Promise<void>>();

  constructor(options: PipelineOptions) {
    this.root = path.resolve(options.root);
    this.tool = options.tool;
    this.sidecars = options.sidecars ?? new SidecarStore({ allowedRoots: [this.root] });
    this.prompts = options.prompts ?? new PromptLibrary();
    this.discoveryOptions = options.discovery ?? {};
    this.logger = options.logger;
  }

  // ── Discovery ────────────────────────────────────────────

  /**
   * Populate the registry from the source root.
   *
   * A missing root records one error and moves the pipeline to `errored`
   * without touching the registry.
   */
  discover(): DiscoveryOutcome {
    this.store.update((draft) => {
      if (draft.phase !== 'idle' && draft.phase !== 'discovering') {
        throw new PhaseTransitionError(`Cannot discover while pipeline is ${draft.phase}`);
      }
      draft.phase = 'discovering';
    });

    let units: Unit[];
    try {
      units = discoverUnits(this.root, { ...this.discoveryOptions, sidecars: this.sidecars });
    } catch (error) {
      const message = `Discovery failed: ${errorMessage(error)}`;
      this.store.update((draft) => {
        appendError(draft, message);
        draft.phase = 'errored';
      });
      console.error(`[Pipeline] ${message}`);
      this.record({ action_type: 'discovery_failed', phase: 'discovering', details: message });
      return { ok: false, error: message };
    }

    this.store.update((draft) => {
      for (const unit of units) {
        draft.units[unit.name] = unit;
      }
      draft.root = this.root;
      draft.discoveredAt = new Date().toISOString();
    });

    console.log(`[Pipeline] Discovered ${units.length} unit(s) under ${this.root}`);
    this.record({
      action_type: 'discovery_complete',
      phase: 'discovering',
      details: `${units.length} unit(s)`,
    });
    return { ok: true, units: units.map((u) => u.name) };
  }

  // ── Phase 1: Analysis ────────────────────────────────────

  /**
   * Analyze every discovered unit.
   *
   * Refused while a retry is still running, since both would analyze the
   * same unit and write the same `analysis.json`.
   */
  async runAnalysis(options: AnalysisOptions = {}): Promise<PhaseRunSummary> {
    this.store.update((draft) => {
      if (draft.phase !== 'discovering' || draft.discoveredAt === null) {
        throw new PhaseTransitionError(`Analysis requires a completed discovery (phase: ${draft.phase})`);
      }
      if (this.detached.size > 0) {
        throw new PhaseTransitionError('Cannot start analysis while a retry is in flight');
      }
      draft.phase = 'analyzing';
      draft.startedAt ??= new Date().toISOString();
    });
    this.record({ action_type: 'phase_start', phase: 'analyzing' });

    const units = this.store.read((s) => Object.values(s.units));
    const summary = await runParallel(
      'analysis',
      units,
      (unit) => this.analyze(unit, options.reuseExisting === true),
      this.hooksFor('analysis', 'analyzing', 'analyzed'),
    );

    this.transition('awaiting_decisions');
    this.record({ action_type: 'phase_complete', phase: 'analyzing', duration_ms: summary.durationMs });
    return summary;
  }

  // ── Phase 2: Decisions ───────────────────────────────────

  /**
   * Record reviewer decisions without starting hardening.
   *
   * Nothing is recorded unless every entry is valid and names a known
   * unit. Each decision is also written to the unit's `decision.json`.
   *
   * @returns Names of the units that received a decision.
   */
  recordDecisions(decisions: unknown): string[] {
    const parsed = DecisionMapSchema.safeParse(decisions);
    if (!parsed.success) {
      throw new InputValidationError(
        'Invalid decisions',
        parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
      );
    }
    const decisionMap: DecisionMap = parsed.data;

    const targets = this.store.read((s) => {
      if (s.phase !== 'awaiting_decisions') {
        throw new PhaseTransitionError(`Decisions are accepted only while awaiting_decisions (phase: ${s.phase})`);
      }
      return Object.keys(decisionMap).map((name) => {
        if (!Object.hasOwn(s.units, name)) throw new UnitNotFoundError(name);
        return { name, fullPath: s.units[name].fullPath };
      });
    });

    for (const { name, fullPath } of targets) {
      this.sidecars.writeJson(fullPath, 'decision.json', decisionMap[name]);
    }

    this.store.update((draft) => {
      for (const { name } of targets) {
        patchUnit(draft, name, { decision: decisionMap[name] });
      }
    });

    const names = targets.map((t) => t.name);
    this.record({
      action_type: 'decisions_submitted',
      phase: 'awaiting_decisions',
      details: names.join(', '),
    });
    return names;
  }

  /**
   * Record decisions, then run hardening and verification to completion.
   */
  async submitDecisions(decisions: unknown): Promise<HardeningRunResult> {
    this.recordDecisions(decisions);
    return this.runHardening();
  }

  // ── Phase 3: Hardening ───────────────────────────────────

  async runHardening(): Promise<HardeningRunResult> {
    const skipped: string[] = [];
    this.store.update((draft) => {
      if (draft.phase !== 'awaiting_decisions') {
        throw new PhaseTransitionError(`Hardening requires awaiting_decisions (phase: ${draft.phase})`);
      }
      draft.phase = 'hardening';
      for (const unit of Object.values(draft.units)) {
        if (isSkip(unit.decision)) {
          patchUnit(draft, unit.name, { status: 'skipped' });
          skipped.push(unit.name);
        }
      }
    });
    this.record({
      action_type: 'phase_start',
      phase: 'hardening',
      details: skipped.length > 0 ? `skipped: ${skipped.join(', ')}` : undefined,
    });

    const eligible = this.store.read((s) =>
      Object.values(s.units).filter(
        (u) => u.status === 'analyzed' && u.decision !== null && !isSkip(u.decision),
      ),
    );
    const hardening = await runParallel(
      'hardening',
      eligible,
      (unit) => this.harden(unit),
      this.hooksFor('hardened', 'hardening', 'hardened'),
    );
    this.record({ action_type: 'phase_complete', phase: 'hardening', duration_ms: hardening.durationMs });

    const verification = await this.runVerification();
    return { hardening, verification };
  }

  // ── Phase 4: Verification ────────────────────────────────

  async runVerification(): Promise<PhaseRunSummary> {
    this.store.update((draft) => {
      if (draft.phase !== 'hardening') {
        throw new PhaseTransitionError(`Verification follows hardening (phase: ${draft.phase})`);
      }
      draft.phase = 'verifying';
    });
    this.record({ action_type: 'phase_start', phase: 'verifying' });

    const eligible = this.store.read((s) => Object.values(s.units).filter((u) => u.status === 'hardened'));
    const summary = await runParallel(
      'verification',
      eligible,
      (unit) => this.verify(unit),
      this.hooksFor('verification', 'verifying', 'verified'),
    );

    this.store.update((draft) => {
      draft.phase = 'complete';
      draft.completedAt = new Date().toISOString();
    });
    this.record({ action_type: 'phase_complete', phase: 'verifying', duration_ms: summary.durationMs });
    console.log('[Pipeline] Pipeline complete');
    return summary;
  }

  // ── Ad-hoc queries ───────────────────────────────────────

  async askAboutScreen(name: string, question: string): Promise<QueryResponse> {
    const unit = this.requireUnit(name);
    if (question.trim().length === 0) {
      throw new InputValidationError('Question must not be empty');
    }

    const source = await fs.promises.readFile(unit.fullPath, 'utf-8');
    const prompt = this.prompts.render('ask', {
      name: unit.name,
      source,
      analysis: unit.analysis ?? {},
      question,
    });

    const response = await this.tool.invoke(prompt);
    this.record({ action_type: 'query', unit: name, details: 'ask' });
    return { name, response };
  }

  async explainFinding(name: string, findingId: string): Promise<QueryResponse> {
    const unit = this.requireUnit(name);
    const finding = findFinding(unit.analysis, findingId);
    if (finding === null) {
      throw new FindingNotFoundError(name, findingId);
    }

    const source = await fs.promises.readFile(unit.fullPath, 'utf-8');
    const prompt = this.prompts.render('explain', { name: unit.name, source, finding });

    const response = await this.tool.invoke(prompt);
    this.record({ action_type: 'query', unit: name, details: `explain ${findingId}` });
    return { name, response };
  }

  // ── Retry ────────────────────────────────────────────────

  /**
   * Re-run analysis for one unit in the background.
   *
   * Returns as soon as the unit is marked `analyzing`; the outcome shows up
   * in later snapshots.
   */
  retryScreen(name: string): RetryAcknowledgement {
    this.store.update((draft) => {
      if (!Object.hasOwn(draft.units, name)) throw new UnitNotFoundError(name);
      const status = draft.units[name].status;
      if (IN_FLIGHT.includes(status)) {
        throw new PhaseTransitionError(`${name} is already ${status}`);
      }
      patchUnit(draft, name, { status: 'analyzing', error: null, warnings: [] });
    });

    const unit = this.requireUnit(name);
    const { onResult, onError } = this.hooksFor('analysis', 'analyzing', 'analyzed');
    const task = runParallel('retry', [unit], (u) => this.analyze(u), { onResult, onError })
      .then(() => undefined)
      .catch((error: unknown) => {
        console.error(`[Pipeline] Retry of ${name} failed to dispatch: ${errorMessage(error)}`);
      })
      .finally(() => {
        this.detached.delete(task);
      });
    this.detached.add(task);

    this.record({ action_type: 'unit_retry', unit: name });
    return { name, status: 'retrying' };
  }

  /**
   * Resolve once no detached retry is running.
   */
  async whenIdle(): Promise<void> {
    while (this.detached.size > 0) {
      await Promise.allSettled([...this.detached]);
    }
  }

  // ── Lifecycle ────────────────────────────────────────────

  /**
   * Drop all state and return to `idle`. Refused while work is in flight.
   */
  reset(): void {
    this.store.update((draft) => {
      if (ACTIVE_PHASES.includes(draft.phase) || this.detached.size > 0) {
        throw new PhaseTransitionError(`Cannot reset while work is in flight (phase: ${draft.phase})`);
      }
      Object.assign(draft, createInitialState());
    });
    this.record({ action_type: 'pipeline_reset' });
  }

  snapshot(): PipelineSnapshot {
    return this.store.snapshot();
  }

  getPhase(): PipelinePhase {
    return this.store.read((s) => s.phase);
  }

  subscribe(listener: SnapshotListener): () => void {
    return this.store.subscribe(listener);
  }

  toJSON(): PipelineSnapshot {
    return this.snapshot();
  }

  // ── Unit actions ─────────────────────────────────────────

  private async analyze(unit: Unit, reuseExisting = false): Promise<PhaseOutcome> {
    if (reuseExisting && unit.priorAnalysis !== null && !unit.priorAnalysis.stale) {
      const stored = this.loadStoredAnalysis(unit);
      if (stored !== null) return stored;
    }

    const source = await fs.promises.readFile(unit.fullPath, 'utf-8');
    const prompt = this.prompts.render('analyze', { name: unit.name, source });

    const result = parseToolResponse(await this.tool.invoke(prompt));
    this.sidecars.writeJson(unit.fullPath, 'analysis.json', result);
    return { result, warnings: checkResultShape('analysis', result) };
  }

  private loadStoredAnalysis(unit: Unit): PhaseOutcome | null {
    const raw = this.sidecars.read(unit.fullPath, 'analysis.json');
    if (raw === null) return null;

    const result = parseToolResponse(raw);
    if (isDegraded(result)) {
      console.warn(`[Pipeline] Stored analysis for ${unit.name} is unreadable, analyzing again`);
      return null;
    }
    return { result, warnings: checkResultShape('analysis', result), reused: true };
  }

  private async harden(unit: Unit): Promise<PhaseOutcome> {
    const source = await fs.promises.readFile(unit.fullPath, 'utf-8');
    const prompt = this.prompts.render('harden', {
      name: unit.name,
      source,
      analysis: unit.analysis,
      decision: unit.decision,
    });

    const result = parseToolResponse(await this.tool.invoke(prompt));
    this.sidecars.writeJson(unit.fullPath, 'hardened.json', result);

    const hardenedSource = hardenedSourceOf(result);
    if (hardenedSource !== null) {
      this.sidecars.write(unit.fullPath, previewArtifactName(unit.fullPath), hardenedSource);
    }
    return { result, warnings: checkResultShape('hardened', result) };
  }

  private async verify(unit: Unit): Promise<PhaseOutcome> {
    const originalSource = await fs.promises.readFile(unit.fullPath, 'utf-8');
    const prompt = this.prompts.render('verify', {
      name: unit.name,
      originalSource,
      hardenedSource: hardenedSourceOf(unit.hardened) ?? '',
      analysis: unit.analysis,
    });

    const result = parseToolResponse(await this.tool.invoke(prompt));
    this.sidecars.writeJson(unit.fullPath, 'verification.json', result);
    return { result, warnings: checkResultShape('verification', result) };
  }

  // ── Helpers ──────────────────────────────────────────────

  private hooksFor(
    kind: ArtifactKind,
    activeStatus: UnitStatus,
    doneStatus: UnitStatus,
  ): WorkerHooks<Unit, PhaseOutcome> {
    const label = PHASE_LABELS[kind];

    return {
      onStart: (unit) => {
        this.store.update((draft) => {
          patchUnit(draft, unit.name, {
            status: activeStatus,
            error: null,
            ...(kind === 'analysis' ? { warnings: [] } : {}),
          });
        });
      },
      onResult: (unit, outcome) => {
        this.store.update((draft) => {
          const warnings = [...draft.units[unit.name].warnings, ...outcome.warnings];
          patchUnit(draft, unit.name, { ...resultPatch(kind, outcome.result), status: doneStatus, warnings });
        });
        if (isDegraded(outcome.result)) {
          console.warn(`[Pipeline] ${label} of ${unit.name} returned unparseable output`);
        }
        this.record({
          action_type: 'unit_complete',
          phase: label.toLowerCase(),
          unit: unit.name,
          details: outcome.reused ? 'reused stored analysis' : undefined,
        });
      },
      onError: (unit, error) => {
        const message = this.sanitize(errorMessage(error));
        this.store.update((draft) => {
          patchUnit(draft, unit.name, { status: 'error', error: message });
          appendError(draft, `${label} failed for ${unit.name}: ${message}`);
        });
        console.error(`[Pipeline] ${label} failed for ${unit.name}: ${message}`);
        this.record({ action_type: 'unit_failed', phase: label.toLowerCase(), unit: unit.name, details: message });
      },
    };
  }

  private transition(phase: PipelinePhase): void {
    this.store.update((draft) => {
      draft.phase = phase;
    });
  }

  private requireUnit(name: string): Unit {
    const unit = this.store.read((s) => (Object.hasOwn(s.units, name) ? s.units[name] : null));
    if (unit === null) throw new UnitNotFoundError(name);
    return unit;
  }

  /**
   * Replace the source root (raw and resolved) with `<project>` so host
   * paths do not leak into the error log.
   */
  private sanitize(message: string): string {
    let result = message.split(this.root).join('<project>');
    try {
      const real = fs.realpathSync(this.root);
      result = result.split(real).join('<project>');
    } catch {
      // root vanished; the raw replacement above is all we can do
    }
    return result;
  }

  private record(entry: Omit<ActionEntry, 'timestamp'>): void {
    if (!this.logger) return;
    try {
      this.logger.log(entry);
    } catch (error) {
      console.warn(`[Pipeline] Could not write action log: ${errorMessage(error)}`);
    }
  }
}

// ---------------------------------------------------------------------------
// Module helpers
// ---------------------------------------------------------------------------

const PHASE_LABELS: Record<ArtifactKind, string> = {
  analysis: 'Analysis',
  hardened: 'Hardening',
  verification: 'Verification',
};

function resultPatch(kind: ArtifactKind, result: StructuredResult): Partial<Unit> {
  switch (kind) {
    case 'analysis':
      return { analysis: result };
    case 'hardened':
      return { hardened: result };
    case 'verification':
      return { verification: result };
  }
}

function hardenedSourceOf(result: StructuredResult | null): string | null {
  if (result === null || isDegraded(result)) return null;
  return typeof result.hardened_source === 'string' ? result.hardened_source : null;
}
