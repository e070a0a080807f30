/**
 * Response Normalizer - Turns raw tool text into structured data.
 *
 * The tool is asked for a JSON object but frequently wraps it in a
 * markdown fence or surrounds it with prose. Parsing never throws: a
 * response that cannot be read as a JSON object becomes a degraded result
 * that keeps a truncated copy of the raw text for inspection.
 *
 * @module llm/response-normalizer
 */

import { ResponseParseError, errorMessage } from '../errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type JsonObject = { [key: string]: unknown };

/** Substitute for a response that could not be parsed. */
export interface DegradedResult {
  parse_error: string;
  raw_response: string;
}

export type StructuredResult = JsonObject | DegradedResult;

/** Raw text kept on a degraded result. */
export const RAW_RESPONSE_LIMIT = 1000;

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

/**
 * Parse raw tool output into a JSON object.
 *
 * 1. Strip a leading ```` ```json ```` and trailing ```` ``` ```` fence.
 * 2. Parse the remainder.
 * 3. If that text is not JSON at all, fall back to the span between the
 *    first `{` and the last `}` (prose around an object).
 * 4. Otherwise return a {@link DegradedResult}.
 */
export function parseToolResponse(raw: string): StructuredResult {
  try {
    return parseObject(stripFences(raw));
  } catch (error) {
    const embedded = isInvalidJson(error) ? extractEmbeddedObject(raw) : null;
    if (embedded !== null) {
      try {
        return parseObject(embedded);
      } catch {
        // fall through to the degraded result for the original failure
      }
    }
    return {
      parse_error: errorMessage(error),
      raw_response: raw.slice(0, RAW_RESPONSE_LIMIT),
    };
  }
}

/**
 * Remove a markdown JSON fence that wraps the whole response.
 *
 * Only a fence at the very start and one at the very end are removed;
 * fences inside the body are left alone.
 */
export function stripFences(raw: string): string {
  return raw
    .trim()
    .replace(/^```\s*json\s*/i, '')
    .replace(/\s*```$/, '')
    .trim();
}

export function isDegraded(result: StructuredResult | null | undefined): result is DegradedResult {
  return (
    typeof result === 'object' &&
    result !== null &&
    typeof result.parse_error === 'string' &&
    typeof result.raw_response === 'string'
  );
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function parseObject(text: string): JsonObject {
  if (text.length === 0) {
    throw new ResponseParseError('empty', 'Empty response from tool');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ResponseParseError('invalid_json', `Invalid JSON: ${errorMessage(error)}`);
  }

  if (!isJsonObject(parsed)) {
    const kind = Array.isArray(parsed) ? 'array' : parsed === null ? 'null' : typeof parsed;
    throw new ResponseParseError('not_an_object', `Expected JSON object but got ${kind}`);
  }
  return parsed;
}

function isInvalidJson(error: unknown): boolean {
  return error instanceof ResponseParseError && error.reason === 'invalid_json';
}

function extractEmbeddedObject(raw: string): string | null {
  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start === -1 || end <= start) return null;
  return raw.slice(start, end + 1);
}
