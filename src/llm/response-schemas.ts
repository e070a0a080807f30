/**
 * Response Schemas - Zod shapes for tool output and human decisions.
 *
 * Tool results are checked against these shapes after parsing. A mismatch is
 * reported as a warning on the unit and never fails the phase; the parsed
 * object is kept as the tool returned it. Decisions are validated strictly
 * because they come from the control surface.
 *
 * @module llm/response-schemas
 */

import { z } from 'zod';
import { isDegraded, type StructuredResult } from './response-normalizer.js';

// ---------------------------------------------------------------------------
// Tool results
// ---------------------------------------------------------------------------

export const FindingSchema = z
  .object({
    id: z.string().min(1),
    severity: z.string().optional(),
    category: z.string().optional(),
    title: z.string().optional(),
    description: z.string().optional(),
  })
  .passthrough();
export type Finding = z.infer<typeof FindingSchema>;

export const AnalysisSchema = z
  .object({
    overall_risk: z.string().optional(),
    findings: z.array(FindingSchema),
  })
  .passthrough();

export const HardenedSchema = z
  .object({
    hardened_source: z.string().optional(),
    changes: z.array(z.unknown()).optional(),
  })
  .passthrough();

export const VerificationSchema = z
  .object({
    passed: z.boolean().optional(),
    findings_addressed: z.array(z.unknown()).optional(),
  })
  .passthrough();

export type ArtifactKind = 'analysis' | 'hardened' | 'verification';

const RESULT_SCHEMAS: Record<ArtifactKind, z.ZodTypeAny> = {
  analysis: AnalysisSchema,
  hardened: HardenedSchema,
  verification: VerificationSchema,
};

/**
 * Check a parsed tool result against the expected shape.
 *
 * @returns Human-readable warnings; empty when the shape matches or the
 *   result is already degraded.
 */
export function checkResultShape(kind: ArtifactKind, result: StructuredResult): string[] {
  if (isDegraded(result)) return [];

  const outcome = RESULT_SCHEMAS[kind].safeParse(result);
  if (outcome.success) return [];

  return outcome.error.issues.map(
    (issue) => `${kind}: ${issue.path.join('.') || '(root)'}: ${issue.message}`,
  );
}

/**
 * Find a finding by id in a (possibly degraded or malformed) analysis.
 */
export function findFinding(analysis: StructuredResult | null, findingId: string): Finding | null {
  if (analysis === null || isDegraded(analysis)) return null;

  const findings = analysis.findings;
  if (!Array.isArray(findings)) return null;

  for (const candidate of findings) {
    const parsed = FindingSchema.safeParse(candidate);
    if (parsed.success && parsed.data.id === findingId) return parsed.data;
  }
  return null;
}

// ---------------------------------------------------------------------------
// Decisions
// ---------------------------------------------------------------------------

/** Action value that exempts a unit from hardening and verification. */
export const SKIP_ACTION = 'skip';

/**
 * A reviewer's decision. Only `action` is interpreted; every other field is
 * passed through to the hardening prompt untouched.
 */
export const DecisionSchema = z
  .object({
    action: z.string().min(1),
  })
  .passthrough();
export type Decision = z.infer<typeof DecisionSchema>;

export const DecisionMapSchema = z.record(z.string().min(1), DecisionSchema);
export type DecisionMap = z.infer<typeof DecisionMapSchema>;

export function isSkip(decision: Decision | null): boolean {
  return decision !== null && decision.action === SKIP_ACTION;
}
