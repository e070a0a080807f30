/**
 * Prompt Loader - Loads markdown prompt files and interpolates variables.
 *
 * Reads `.md` prompt templates from the `prompts/` directory and replaces
 * `{{variable}}` placeholders with provided values. Every prompt the
 * pipeline sends is fully self-contained: the unit's source and prior
 * artifacts are embedded, nothing relies on tool-side session state.
 *
 * @module llm/prompt-loader
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type PromptName = 'analyze' | 'harden' | 'verify' | 'ask' | 'explain';

export interface PromptLoadOptions {
  /** Directory to resolve relative prompt paths against. */
  promptDir?: string;
  /** Variables to interpolate into the template. */
  variables?: Record<string, unknown>;
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

/**
 * Load a prompt template from a `.md` file and interpolate variables.
 *
 * @param promptPath - Absolute or relative path to the prompt file.
 * @throws If the file does not exist or cannot be read.
 */
export function loadPrompt(
  promptPath: string,
  options: PromptLoadOptions = {},
): string {
  const resolved = resolvePromptPath(promptPath, options.promptDir);

  if (!fs.existsSync(resolved)) {
    throw new Error(`Prompt file not found: ${resolved} (original: ${promptPath})`);
  }

  const template = fs.readFileSync(resolved, 'utf-8');
  return options.variables
    ? interpolateVariables(template, options.variables)
    : template;
}

/**
 * Interpolate `{{variable}}` placeholders in a template string.
 *
 * - String values are inserted directly.
 * - Objects/arrays are JSON-stringified.
 * - `null`/`undefined` values produce an empty string.
 */
export function interpolateVariables(
  template: string,
  variables: Record<string, unknown>,
): string {
  return template.replace(/\{\{(\w+)\}\}/g, (_match, key: string) => {
    const value = variables[key];
    if (value === undefined || value === null) return '';
    if (typeof value === 'string') return value;
    return JSON.stringify(value, null, 2);
  });
}

/**
 * Caches templates by name so each phase reads its prompt file once.
 */
export class PromptLibrary {
  private readonly promptDir: string;
  private readonly cache = new Map<PromptName, string>();

  constructor(promptDir: string = defaultPromptDir()) {
    this.promptDir = promptDir;
  }

  render(name: PromptName, variables: Record<string, unknown>): string {
    let template = this.cache.get(name);
    if (template === undefined) {
      template = loadPrompt(`${name}.md`, { promptDir: this.promptDir });
      this.cache.set(name, template);
    }
    return interpolateVariables(template, variables);
  }
}

/**
 * The `prompts/` directory shipped beside `src/` (or `dist/`).
 */
export function defaultPromptDir(): string {
  return path.join(findProjectRoot(), 'prompts');
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function resolvePromptPath(promptPath: string, promptDir?: string): string {
  if (path.isAbsolute(promptPath)) return promptPath;
  return path.resolve(promptDir ?? defaultPromptDir(), promptPath);
}

/**
 * Walk up from this module's directory to the directory containing
 * package.json.
 */
function findProjectRoot(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (let i = 0; i < 10; i++) {
    if (fs.existsSync(path.join(dir, 'package.json'))) {
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return process.cwd();
}
