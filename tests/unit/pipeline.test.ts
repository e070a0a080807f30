import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import {
  FindingNotFoundError,
  InputValidationError,
  PhaseTransitionError,
  UnitNotFoundError,
} from '../../src/errors.js';
import { isDegraded } from '../../src/llm/response-normalizer.js';
import { SidecarStore } from '../../src/sidecar-store.js';
import { ActionLogger } from '../../src/storage/action-logger.js';
import type { PipelineSnapshot } from '../../src/pipeline-state.js';
import {
  createPipeline,
  createTempWorkspace,
  deferred,
  fakeToolClient,
  promptKind,
  writeControllers,
  type TempWorkspace,
} from '../helpers/test-harness.js';

const ANALYSIS = '{"findings":[{"id":"F-1","title":"Missing auth"}]}';

function respondByPhase(prompt: string): string {
  switch (promptKind(prompt)) {
    case 'analyze':
      return ANALYSIS;
    case 'harden':
      return JSON.stringify({ hardened_source: 'class a_controller\n  before_action :auth\nend', changes: [] });
    case 'verify':
      return '{"passed":true}';
    default:
      return 'plain answer';
  }
}

describe('Pipeline', () => {
  let ws: TempWorkspace;

  beforeEach(() => {
    ws = createTempWorkspace();
    writeControllers(ws, ['a_controller', 'b_controller', 'application_controller']);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    ws.cleanup();
  });

  // ── discover ─────────────────────────────────────────────

  describe('discover', () => {
    it('registers every matching unit except the excluded base controller', () => {
      const pipeline = createPipeline(ws.dir, fakeToolClient(respondByPhase));

      const outcome = pipeline.discover();

      expect(outcome).toEqual({ ok: true, units: ['a_controller', 'b_controller'] });
      const snapshot = pipeline.snapshot();
      expect(snapshot.phase).toBe('discovering');
      expect(snapshot.root).toBe(path.resolve(ws.dir));
      expect(snapshot.discoveredAt).not.toBeNull();
      expect(snapshot.units.a_controller.status).toBe('pending');
      expect(snapshot.units.a_controller.path).toBe('a_controller.rb');
    });

    it('moves to errored with one error entry when the root is missing', () => {
      const missing = path.join(ws.dir, 'missing');
      const pipeline = createPipeline(missing, fakeToolClient(respondByPhase));

      const outcome = pipeline.discover();

      expect(outcome).toEqual({
        ok: false,
        error: `Discovery failed: Source directory not found: ${missing}`,
      });
      const snapshot = pipeline.snapshot();
      expect(snapshot.phase).toBe('errored');
      expect(snapshot.units).toEqual({});
      expect(snapshot.errors).toHaveLength(1);
      expect(snapshot.errors[0].message).toBe(`Discovery failed: Source directory not found: ${missing}`);
    });

    it('is refused once analysis has run', async () => {
      const pipeline = createPipeline(ws.dir, fakeToolClient(respondByPhase));
      pipeline.discover();
      await pipeline.runAnalysis();

      expect(() => pipeline.discover()).toThrow(PhaseTransitionError);
    });
  });

  // ── analysis ─────────────────────────────────────────────

  describe('runAnalysis', () => {
    it('requires a completed discovery', async () => {
      const pipeline = createPipeline(ws.dir, fakeToolClient(respondByPhase));

      await expect(pipeline.runAnalysis()).rejects.toBeInstanceOf(PhaseTransitionError);
      expect(pipeline.getPhase()).toBe('idle');
    });

    it('analyzes every unit, writes analysis.json and waits for decisions', async () => {
      const tool = fakeToolClient(() => '```json\n' + ANALYSIS + '\n```');
      const pipeline = createPipeline(ws.dir, tool);
      pipeline.discover();

      const summary = await pipeline.runAnalysis();

      expect(summary).toMatchObject({ phase: 'analysis', total: 2, succeeded: 2, failed: 0 });
      const snapshot = pipeline.snapshot();
      expect(snapshot.phase).toBe('awaiting_decisions');
      expect(snapshot.startedAt).not.toBeNull();
      expect(snapshot.units.a_controller.status).toBe('analyzed');
      expect(snapshot.units.a_controller.analysis).toEqual({
        findings: [{ id: 'F-1', title: 'Missing auth' }],
      });

      const sidecar = path.join(ws.dir, '.harden', 'a_controller', 'analysis.json');
      expect(JSON.parse(fs.readFileSync(sidecar, 'utf-8'))).toEqual({
        findings: [{ id: 'F-1', title: 'Missing auth' }],
      });
      expect(tool.prompts.every((p) => promptKind(p) === 'analyze')).toBe(true);
    });

    it('keeps a failing unit local and records it in the error log', async () => {
      const tool = fakeToolClient((prompt) => {
        if (prompt.startsWith('# Security Analysis: a_controller')) throw new Error('boom');
        return ANALYSIS;
      });
      const pipeline = createPipeline(ws.dir, tool);
      pipeline.discover();

      const summary = await pipeline.runAnalysis();

      expect(summary.failures).toEqual([{ name: 'a_controller', message: 'boom' }]);
      const snapshot = pipeline.snapshot();
      expect(snapshot.phase).toBe('awaiting_decisions');
      expect(snapshot.units.a_controller.status).toBe('error');
      expect(snapshot.units.a_controller.error).toBe('boom');
      expect(snapshot.units.b_controller.status).toBe('analyzed');
      expect(snapshot.errors.map((e) => e.message)).toEqual(['Analysis failed for a_controller: boom']);
    });

    it('replaces the source root in recorded error messages', async () => {
      const root = path.resolve(ws.dir);
      const tool = fakeToolClient(() => {
        throw new Error(`cannot open ${root}/config/secrets.yml`);
      });
      const pipeline = createPipeline(ws.dir, tool);
      pipeline.discover();

      await pipeline.runAnalysis();

      expect(pipeline.snapshot().units.b_controller.error).toBe('cannot open <project>/config/secrets.yml');
    });

    it('stores a degraded result for unparseable output', async () => {
      const pipeline = createPipeline(ws.dir, fakeToolClient(() => 'not json'));
      pipeline.discover();

      await pipeline.runAnalysis();

      const unit = pipeline.snapshot().units.a_controller;
      expect(unit.status).toBe('analyzed');
      expect(isDegraded(unit.analysis)).toBe(true);
      expect(unit.analysis).toMatchObject({ raw_response: 'not json' });
    });

    it('records shape mismatches as warnings', async () => {
      const pipeline = createPipeline(ws.dir, fakeToolClient(() => '{"findings":"none"}'));
      pipeline.discover();

      await pipeline.runAnalysis();

      expect(pipeline.snapshot().units.a_controller.warnings).toEqual([
        'analysis: findings: Expected array, received string',
      ]);
    });

    it('runs every unit concurrently and keeps all results', async () => {
      const names = Array.from({ length: 20 }, (_, i) => `u${i}_controller`);
      writeControllers(ws, names);
      const gate = deferred<void>();
      const tool = fakeToolClient(async () => {
        await gate.promise;
        return ANALYSIS;
      });
      const pipeline = createPipeline(ws.dir, tool);
      pipeline.discover();

      const run = pipeline.runAnalysis();
      await vi.waitFor(() => expect(tool.prompts).toHaveLength(22));
      expect(pipeline.getPhase()).toBe('analyzing');
      gate.resolve();
      await run;

      const snapshot = pipeline.snapshot();
      expect(Object.keys(snapshot.units)).toHaveLength(22);
      expect(Object.values(snapshot.units).every((u) => u.status === 'analyzed')).toBe(true);
      expect(snapshot.errors).toEqual([]);
    });

    it('returns after every worker fails and marks each unit errored', async () => {
      const tool = fakeToolClient(() => {
        throw new Error('tool exited 1');
      });
      const pipeline = createPipeline(ws.dir, tool);
      pipeline.discover();

      const summary = await pipeline.runAnalysis();

      expect(summary).toMatchObject({ total: 2, succeeded: 0, failed: 2 });
      const snapshot = pipeline.snapshot();
      expect(snapshot.phase).toBe('awaiting_decisions');
      for (const unit of Object.values(snapshot.units)) {
        expect(unit.status).toBe('error');
        expect(unit.error).toBe('tool exited 1');
      }
      expect(snapshot.errors.map((e) => e.message).sort()).toEqual([
        'Analysis failed for a_controller: tool exited 1',
        'Analysis failed for b_controller: tool exited 1',
      ]);
    });

    it('moves straight to decisions when discovery found no units', async () => {
      const empty = createTempWorkspace();
      try {
        const tool = fakeToolClient(respondByPhase);
        const pipeline = createPipeline(empty.dir, tool);
        expect(pipeline.discover()).toEqual({ ok: true, units: [] });

        const summary = await pipeline.runAnalysis();

        expect(summary).toMatchObject({ total: 0, succeeded: 0, failed: 0 });
        expect(pipeline.getPhase()).toBe('awaiting_decisions');
        expect(tool.prompts).toEqual([]);
      } finally {
        empty.cleanup();
      }
    });

    it('is refused while a retry is running, so a unit is never analyzed twice at once', async () => {
      const gate = deferred<void>();
      let calls = 0;
      let active = 0;
      let maxActive = 0;
      const tool = fakeToolClient(async (prompt) => {
        if (prompt.startsWith('# Security Analysis: a_controller')) {
          calls += 1;
          active += 1;
          maxActive = Math.max(maxActive, active);
          await gate.promise;
          active -= 1;
        }
        return ANALYSIS;
      });
      const pipeline = createPipeline(ws.dir, tool);
      pipeline.discover();
      pipeline.retryScreen('a_controller');

      await expect(pipeline.runAnalysis()).rejects.toThrow('Cannot start analysis while a retry is in flight');
      expect(pipeline.getPhase()).toBe('discovering');

      gate.resolve();
      await pipeline.whenIdle();
      await pipeline.runAnalysis();

      expect(calls).toBe(2);
      expect(maxActive).toBe(1);
      expect(pipeline.snapshot().units.a_controller.status).toBe('analyzed');
    });

    it('reuses the stored analysis of an unchanged unit when asked', async () => {
      const first = createPipeline(ws.dir, fakeToolClient(respondByPhase));
      first.discover();
      await first.runAnalysis();
      const later = new Date(Date.now() + 60_000);
      fs.utimesSync(path.join(ws.dir, 'b_controller.rb'), later, later);

      const tool = fakeToolClient(() => '{"findings":[]}');
      const pipeline = createPipeline(ws.dir, tool);
      pipeline.discover();

      const discovered = pipeline.snapshot();
      expect(discovered.units.a_controller.priorAnalysis).toMatchObject({
        stale: false,
        overallRisk: null,
        findingCounts: { high: 0, medium: 0, low: 0 },
      });
      expect(discovered.units.b_controller.priorAnalysis?.stale).toBe(true);

      await pipeline.runAnalysis({ reuseExisting: true });

      expect(tool.prompts).toHaveLength(1);
      expect(tool.prompts[0].startsWith('# Security Analysis: b_controller')).toBe(true);
      const snapshot = pipeline.snapshot();
      expect(snapshot.units.a_controller.status).toBe('analyzed');
      expect(snapshot.units.a_controller.analysis).toEqual({ findings: [{ id: 'F-1', title: 'Missing auth' }] });
      expect(snapshot.units.b_controller.analysis).toEqual({ findings: [] });
    });

    it('analyzes again when the stored analysis is unreadable', async () => {
      const sidecars = new SidecarStore({ allowedRoots: [ws.dir] });
      for (const name of ['a_controller', 'b_controller']) {
        sidecars.write(path.join(ws.dir, `${name}.rb`), 'analysis.json', 'not json at all');
      }
      const tool = fakeToolClient(() => ANALYSIS);
      const pipeline = createPipeline(ws.dir, tool);
      pipeline.discover();

      await pipeline.runAnalysis({ reuseExisting: true });

      expect(tool.prompts).toHaveLength(2);
      expect(pipeline.snapshot().units.b_controller.analysis).toEqual({
        findings: [{ id: 'F-1', title: 'Missing auth' }],
      });
    });
  });

  // ── decisions and hardening ──────────────────────────────

  describe('submitDecisions', () => {
    it('is refused before analysis has finished', async () => {
      const pipeline = createPipeline(ws.dir, fakeToolClient(respondByPhase));
      pipeline.discover();

      await expect(pipeline.submitDecisions({ a_controller: { action: 'approve' } })).rejects.toBeInstanceOf(
        PhaseTransitionError,
      );
    });

    it('rejects unknown units without recording anything', async () => {
      const pipeline = createPipeline(ws.dir, fakeToolClient(respondByPhase));
      pipeline.discover();
      await pipeline.runAnalysis();

      await expect(
        pipeline.submitDecisions({ a_controller: { action: 'approve' }, zzz_controller: { action: 'approve' } }),
      ).rejects.toThrow('Unit not found: zzz_controller');

      const snapshot = pipeline.snapshot();
      expect(snapshot.phase).toBe('awaiting_decisions');
      expect(snapshot.units.a_controller.decision).toBeNull();
    });

    it('rejects a decision without an action', () => {
      const pipeline = createPipeline(ws.dir, fakeToolClient(respondByPhase));

      expect(() => pipeline.recordDecisions({ a_controller: {} })).toThrow(InputValidationError);
    });

    it('hardens approved units, skips the rest and verifies', async () => {
      const tool = fakeToolClient(respondByPhase);
      const pipeline = createPipeline(ws.dir, tool);
      pipeline.discover();
      await pipeline.runAnalysis();

      const result = await pipeline.submitDecisions({
        a_controller: { action: 'approve', notes: 'keep the redirect' },
        b_controller: { action: 'skip' },
      });

      expect(result.hardening).toMatchObject({ total: 1, succeeded: 1 });
      expect(result.verification).toMatchObject({ total: 1, succeeded: 1 });

      const snapshot = pipeline.snapshot();
      expect(snapshot.phase).toBe('complete');
      expect(snapshot.completedAt).not.toBeNull();
      expect(snapshot.units.a_controller.status).toBe('verified');
      expect(snapshot.units.a_controller.verification).toEqual({ passed: true });
      expect(snapshot.units.b_controller.status).toBe('skipped');
      expect(snapshot.units.b_controller.hardened).toBeNull();

      const hardenPrompts = tool.prompts.filter((p) => promptKind(p) === 'harden');
      expect(hardenPrompts).toHaveLength(1);
      expect(hardenPrompts[0]).toContain('"notes": "keep the redirect"');
      expect(tool.prompts.filter((p) => promptKind(p) === 'verify')).toHaveLength(1);

      const sidecarDir = path.join(ws.dir, '.harden');
      expect(fs.readFileSync(path.join(sidecarDir, 'a_controller', 'hardened_preview.rb'), 'utf-8')).toBe(
        'class a_controller\n  before_action :auth\nend\n',
      );
      expect(JSON.parse(fs.readFileSync(path.join(sidecarDir, 'b_controller', 'decision.json'), 'utf-8'))).toEqual({
        action: 'skip',
      });
      expect(fs.readFileSync(path.join(ws.dir, 'a_controller.rb'), 'utf-8')).toBe('class a_controller\nend\n');
    });

    it('leaves units without a decision analyzed', async () => {
      const pipeline = createPipeline(ws.dir, fakeToolClient(respondByPhase));
      pipeline.discover();
      await pipeline.runAnalysis();

      await pipeline.submitDecisions({ a_controller: { action: 'approve' } });

      const snapshot = pipeline.snapshot();
      expect(snapshot.units.a_controller.status).toBe('verified');
      expect(snapshot.units.b_controller.status).toBe('analyzed');
    });

    it('does not harden a unit whose analysis failed', async () => {
      const tool = fakeToolClient((prompt) => {
        if (prompt.startsWith('# Security Analysis: a_controller')) throw new Error('boom');
        return respondByPhase(prompt);
      });
      const pipeline = createPipeline(ws.dir, tool);
      pipeline.discover();
      await pipeline.runAnalysis();

      const result = await pipeline.submitDecisions({
        a_controller: { action: 'approve' },
        b_controller: { action: 'approve' },
      });

      expect(result.hardening.total).toBe(1);
      expect(pipeline.snapshot().units.a_controller.status).toBe('error');
      expect(pipeline.snapshot().units.b_controller.status).toBe('verified');
    });
  });

  // ── ad-hoc queries ───────────────────────────────────────

  describe('askAboutScreen', () => {
    it('answers without touching state', async () => {
      const tool = fakeToolClient(respondByPhase);
      const pipeline = createPipeline(ws.dir, tool);
      pipeline.discover();
      const before = pipeline.snapshot();

      const answer = await pipeline.askAboutScreen('a_controller', 'Is the login rate limited?');

      expect(answer).toEqual({ name: 'a_controller', response: 'plain answer' });
      expect(tool.prompts[0]).toContain('Is the login rate limited?');
      expect(pipeline.snapshot()).toEqual(before);
    });

    it('rejects unknown units and empty questions', async () => {
      const pipeline = createPipeline(ws.dir, fakeToolClient(respondByPhase));
      pipeline.discover();

      await expect(pipeline.askAboutScreen('nope', 'why?')).rejects.toBeInstanceOf(UnitNotFoundError);
      await expect(pipeline.askAboutScreen('a_controller', '  ')).rejects.toBeInstanceOf(InputValidationError);
    });
  });

  describe('explainFinding', () => {
    it('explains a finding from the analysis', async () => {
      const tool = fakeToolClient(respondByPhase);
      const pipeline = createPipeline(ws.dir, tool);
      pipeline.discover();
      await pipeline.runAnalysis();

      const answer = await pipeline.explainFinding('a_controller', 'F-1');

      expect(answer).toEqual({ name: 'a_controller', response: 'plain answer' });
      const explainPrompt = tool.prompts.find((p) => promptKind(p) === 'explain');
      expect(explainPrompt).toContain('"title": "Missing auth"');
    });

    it('reports a finding that is not in the analysis', async () => {
      const pipeline = createPipeline(ws.dir, fakeToolClient(respondByPhase));
      pipeline.discover();
      await pipeline.runAnalysis();

      await expect(pipeline.explainFinding('a_controller', 'F-9')).rejects.toThrow(
        'Finding F-9 not found in analysis of a_controller',
      );
    });

    it('reports missing findings before analysis has run', async () => {
      const pipeline = createPipeline(ws.dir, fakeToolClient(respondByPhase));
      pipeline.discover();

      await expect(pipeline.explainFinding('a_controller', 'F-1')).rejects.toBeInstanceOf(FindingNotFoundError);
    });
  });

  // ── retry ────────────────────────────────────────────────

  describe('retryScreen', () => {
    it('acknowledges immediately and re-analyzes in the background', async () => {
      let attempts = 0;
      const tool = fakeToolClient((prompt) => {
        if (prompt.startsWith('# Security Analysis: a_controller')) {
          attempts += 1;
          if (attempts === 1) throw new Error('transient');
        }
        return ANALYSIS;
      });
      const pipeline = createPipeline(ws.dir, tool);
      pipeline.discover();
      await pipeline.runAnalysis();
      expect(pipeline.snapshot().units.a_controller.status).toBe('error');

      const ack = pipeline.retryScreen('a_controller');

      expect(ack).toEqual({ name: 'a_controller', status: 'retrying' });
      expect(pipeline.snapshot().units.a_controller).toMatchObject({ status: 'analyzing', error: null });

      await pipeline.whenIdle();

      const snapshot = pipeline.snapshot();
      expect(snapshot.units.a_controller.status).toBe('analyzed');
      expect(snapshot.phase).toBe('awaiting_decisions');
    });

    it('rejects unknown units without mutating state', () => {
      const pipeline = createPipeline(ws.dir, fakeToolClient(respondByPhase));
      pipeline.discover();
      const before = pipeline.snapshot();

      expect(() => pipeline.retryScreen('nope')).toThrow(UnitNotFoundError);
      expect(pipeline.snapshot()).toEqual(before);
    });

    it('refuses a unit that is already being analyzed', async () => {
      const gate = deferred<void>();
      const tool = fakeToolClient(async () => {
        await gate.promise;
        return ANALYSIS;
      });
      const pipeline = createPipeline(ws.dir, tool);
      pipeline.discover();

      pipeline.retryScreen('a_controller');
      expect(() => pipeline.retryScreen('a_controller')).toThrow(PhaseTransitionError);

      gate.resolve();
      await pipeline.whenIdle();
      expect(pipeline.snapshot().units.a_controller.status).toBe('analyzed');
    });
  });

  // ── lifecycle ────────────────────────────────────────────

  describe('reset', () => {
    it('returns to idle with an empty registry', async () => {
      const pipeline = createPipeline(ws.dir, fakeToolClient(respondByPhase));
      pipeline.discover();
      await pipeline.runAnalysis();

      pipeline.reset();

      const snapshot = pipeline.snapshot();
      expect(snapshot.phase).toBe('idle');
      expect(snapshot.units).toEqual({});
      expect(snapshot.errors).toEqual([]);
      expect(snapshot.startedAt).toBeNull();
    });

    it('is refused while a phase is running', async () => {
      const gate = deferred<void>();
      const pipeline = createPipeline(
        ws.dir,
        fakeToolClient(async () => {
          await gate.promise;
          return ANALYSIS;
        }),
      );
      pipeline.discover();

      const run = pipeline.runAnalysis();
      expect(() => pipeline.reset()).toThrow(PhaseTransitionError);

      gate.resolve();
      await run;
    });
  });

  describe('snapshots', () => {
    it('notifies subscribers until they unsubscribe', () => {
      const pipeline = createPipeline(ws.dir, fakeToolClient(respondByPhase));
      const seen: PipelineSnapshot[] = [];
      const unsubscribe = pipeline.subscribe((s) => seen.push(s));

      pipeline.discover();
      const count = seen.length;
      unsubscribe();
      pipeline.reset();

      expect(count).toBe(2);
      expect(seen[1].phase).toBe('discovering');
      expect(Object.keys(seen[1].units)).toEqual(['a_controller', 'b_controller']);
      expect(seen).toHaveLength(2);
    });

    it('serializes to the snapshot', () => {
      const pipeline = createPipeline(ws.dir, fakeToolClient(respondByPhase));
      pipeline.discover();

      expect(JSON.parse(JSON.stringify(pipeline))).toEqual(pipeline.snapshot());
    });

    it('hands out copies that cannot change the pipeline', () => {
      const pipeline = createPipeline(ws.dir, fakeToolClient(respondByPhase));
      pipeline.discover();

      const copy = pipeline.snapshot();
      copy.units.a_controller.status = 'verified';

      expect(pipeline.snapshot().units.a_controller.status).toBe('pending');
    });
  });

  describe('action log', () => {
    it('records discovery and the analysis phase', async () => {
      const logger = new ActionLogger(path.join(ws.dir, 'logs', 'actions.jsonl'));
      const pipeline = createPipeline(ws.dir, fakeToolClient(respondByPhase), logger);
      pipeline.discover();
      await pipeline.runAnalysis();

      expect(logger.readAll().map((e) => e.action_type)).toEqual([
        'discovery_complete',
        'phase_start',
        'unit_complete',
        'unit_complete',
        'phase_complete',
      ]);
    });
  });
});
