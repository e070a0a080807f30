/**
 * Errors - Typed failures raised by the hardening pipeline.
 *
 * Each class carries a stable `code` so the control server can map it to an
 * HTTP status and observers can match on it without parsing messages.
 *
 * Containment rules:
 * - `DiscoveryError` is pipeline-fatal (phase becomes `errored`).
 * - `ToolInvocationError` is unit-local; the phase executor records it.
 * - `ResponseParseError` never reaches a caller; it is folded into a
 *   degraded result by the response normalizer.
 * - `UnitNotFoundError` / `FindingNotFoundError` surface to the caller of an
 *   ad-hoc operation and leave pipeline state untouched.
 *
 * @module errors
 */

export type HardenErrorCode =
  | 'DISCOVERY_FAILED'
  | 'TOOL_INVOCATION_FAILED'
  | 'RESPONSE_PARSE_FAILED'
  | 'UNIT_NOT_FOUND'
  | 'FINDING_NOT_FOUND'
  | 'INVALID_PHASE'
  | 'MALFORMED_ELIGIBILITY'
  | 'SIDECAR_PATH_ESCAPE'
  | 'INVALID_CONFIG'
  | 'INVALID_INPUT';

export class HardenError extends Error {
  readonly code: HardenErrorCode;

  constructor(code: HardenErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class DiscoveryError extends HardenError {
  readonly root: string;

  constructor(root: string, message: string) {
    super('DISCOVERY_FAILED', message);
    this.root = root;
  }
}

/** Maximum characters of tool output kept on a ToolInvocationError. */
export const TOOL_OUTPUT_CAPTURE_LIMIT = 500;

export interface ToolInvocationDetails {
  /** Process exit code, or `null` when the tool is not a process (API backend) or was killed. */
  exitCode: number | null;
  /** Combined stdout + stderr, already truncated. */
  output: string;
  timedOut?: boolean;
  /** HTTP status for the API backend, when known. */
  status?: number;
}

export class ToolInvocationError extends HardenError {
  readonly exitCode: number | null;
  readonly output: string;
  readonly timedOut: boolean;
  readonly status?: number;

  constructor(message: string, details: ToolInvocationDetails) {
    super('TOOL_INVOCATION_FAILED', message);
    this.exitCode = details.exitCode;
    this.output = details.output.slice(0, TOOL_OUTPUT_CAPTURE_LIMIT);
    this.timedOut = details.timedOut ?? false;
    this.status = details.status;
  }
}

export type ResponseParseFailure = 'empty' | 'invalid_json' | 'not_an_object';

export class ResponseParseError extends HardenError {
  readonly reason: ResponseParseFailure;

  constructor(reason: ResponseParseFailure, message: string) {
    super('RESPONSE_PARSE_FAILED', message);
    this.reason = reason;
  }
}

export class UnitNotFoundError extends HardenError {
  readonly unitName: string;

  constructor(unitName: string) {
    super('UNIT_NOT_FOUND', `Unit not found: ${unitName}`);
    this.unitName = unitName;
  }
}

export class FindingNotFoundError extends HardenError {
  readonly unitName: string;
  readonly findingId: string;

  constructor(unitName: string, findingId: string) {
    super('FINDING_NOT_FOUND', `Finding ${findingId} not found in analysis of ${unitName}`);
    this.unitName = unitName;
    this.findingId = findingId;
  }
}

export class PhaseTransitionError extends HardenError {
  constructor(message: string) {
    super('INVALID_PHASE', message);
  }
}

export class PhaseExecutionError extends HardenError {
  constructor(message: string) {
    super('MALFORMED_ELIGIBILITY', message);
  }
}

export class SidecarPathError extends HardenError {
  readonly path: string;

  constructor(path: string) {
    super('SIDECAR_PATH_ESCAPE', `Sidecar path ${path} escapes allowed directories`);
    this.path = path;
  }
}

export class ConfigError extends HardenError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
  }
}

export class InputValidationError extends HardenError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('INVALID_INPUT', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.issues = issues;
  }
}

/**
 * Normalize an unknown thrown value to a message string.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
