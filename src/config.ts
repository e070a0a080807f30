/**
 * Runtime configuration - Single source of truth for all settings.
 *
 * Configuration is resolved from four layers with the following precedence
 * (highest wins):
 *
 *   1. CLI arguments (`cliArgs`)
 *   2. Environment variables (`HARDEN_*`, plus `ANTHROPIC_API_KEY`)
 *   3. Values loaded from `harden.config.yml`
 *   4. Built-in defaults
 *
 * @module config
 */

import * as fs from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import { DEFAULT_SIDECAR_DIR } from './sidecar-store.js';
import { DEFAULT_EXCLUSIONS } from './unit-registry.js';
import type { ToolBackend } from './tool-client.js';

/**
 * Complete configuration for one process.
 *
 * Every field has a default so partial configs are safe.
 */
export interface HardenConfig {
  // -- Source --

  /** Directory to discover units under. */
  root: string;
  /** Regular expression source matched against file names. */
  filePattern: string;
  /** Unit names (or `*` patterns) left out of discovery. */
  exclude: string[];

  // -- Tool --

  backend: ToolBackend;
  model?: string;
  /** Per-invocation timeout; unset means none. */
  timeoutMs?: number;
  /** Binary used by the `cli` backend. */
  cliBin: string;
  /** Key for the `api` backend. */
  apiKey?: string;

  // -- Output --

  /** Name of the per-directory sidecar folder. */
  sidecarDir: string;
  /** JSONL action log; empty disables it. */
  logPath: string;

  // -- Server --

  port: number;
  host: string;
}

export const CONFIG_FILE_NAME = 'harden.config.yml';

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

const DEFAULTS: HardenConfig = {
  root: 'app/controllers',
  filePattern: '_controller\\.rb$',
  exclude: [...DEFAULT_EXCLUSIONS],
  backend: 'cli',
  cliBin: 'claude',
  sidecarDir: DEFAULT_SIDECAR_DIR,
  logPath: '.harden/actions.jsonl',
  port: 4567,
  host: '127.0.0.1',
};

// ---------------------------------------------------------------------------
// File layer
// ---------------------------------------------------------------------------

const ConfigFileSchema = z
  .object({
    root: z.string().min(1),
    file_pattern: z.string().min(1),
    exclude: z.array(z.string()),
    backend: z.enum(['cli', 'api']),
    model: z.string().min(1),
    timeout_ms: z.number().int().positive(),
    cli_bin: z.string().min(1),
    sidecar_dir: z.string().min(1),
    log_path: z.string(),
    port: z.number().int().min(0).max(65535),
    host: z.string().min(1),
  })
  .partial()
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Read and validate a YAML config file. A missing file yields `{}`.
 *
 * @throws {ConfigError} On unreadable YAML or unknown/invalid keys.
 */
export function loadConfigFile(filePath: string): ConfigFile {
  if (!fs.existsSync(filePath)) return {};

  let raw: unknown;
  try {
    raw = parseYaml(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Could not parse ${filePath}: ${errorMessage(error)}`);
  }
  if (raw === null || raw === undefined) return {};

  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid ${filePath}: ${issues.join('; ')}`);
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Parse a numeric value from a string, returning `undefined` on failure.
 */
function parseNum(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

function parseBackend(value: string | undefined): ToolBackend | undefined {
  if (value === 'cli' || value === 'api') return value;
  if (value !== undefined && value !== '') {
    throw new ConfigError(`Invalid HARDEN_BACKEND: ${value}. Must be cli or api.`);
  }
  return undefined;
}

function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined || value === '') return undefined;
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

/**
 * Merge configuration from all sources and return a fully-resolved config.
 *
 * @param cliArgs    - Values supplied directly from the command line.
 * @param configFile - Validated contents of `harden.config.yml`.
 * @param env        - Environment variable map (defaults to `process.env`).
 */
export function buildConfig(
  cliArgs: Partial<HardenConfig> = {},
  configFile: ConfigFile = {},
  env: NodeJS.ProcessEnv = process.env,
): HardenConfig {
  // ---- Layer 3: config file (lowest override) ---------------------------

  const fromFile: Partial<HardenConfig> = {};

  if (configFile.root !== undefined) fromFile.root = configFile.root;
  if (configFile.file_pattern !== undefined) fromFile.filePattern = configFile.file_pattern;
  if (configFile.exclude !== undefined) fromFile.exclude = configFile.exclude;
  if (configFile.backend !== undefined) fromFile.backend = configFile.backend;
  if (configFile.model !== undefined) fromFile.model = configFile.model;
  if (configFile.timeout_ms !== undefined) fromFile.timeoutMs = configFile.timeout_ms;
  if (configFile.cli_bin !== undefined) fromFile.cliBin = configFile.cli_bin;
  if (configFile.sidecar_dir !== undefined) fromFile.sidecarDir = configFile.sidecar_dir;
  if (configFile.log_path !== undefined) fromFile.logPath = configFile.log_path;
  if (configFile.port !== undefined) fromFile.port = configFile.port;
  if (configFile.host !== undefined) fromFile.host = configFile.host;

  // ---- Layer 2: environment variables -----------------------------------

  const fromEnv: Partial<HardenConfig> = {};

  if (env.HARDEN_ROOT) fromEnv.root = env.HARDEN_ROOT;
  if (env.HARDEN_FILE_PATTERN) fromEnv.filePattern = env.HARDEN_FILE_PATTERN;
  if (env.HARDEN_MODEL) fromEnv.model = env.HARDEN_MODEL;
  if (env.HARDEN_CLI_BIN) fromEnv.cliBin = env.HARDEN_CLI_BIN;
  if (env.HARDEN_SIDECAR_DIR) fromEnv.sidecarDir = env.HARDEN_SIDECAR_DIR;
  if (env.HARDEN_LOG_PATH !== undefined) fromEnv.logPath = env.HARDEN_LOG_PATH;
  if (env.HARDEN_HOST) fromEnv.host = env.HARDEN_HOST;
  if (env.ANTHROPIC_API_KEY) fromEnv.apiKey = env.ANTHROPIC_API_KEY;

  const envExclude = parseList(env.HARDEN_EXCLUDE);
  if (envExclude !== undefined) fromEnv.exclude = envExclude;

  const envBackend = parseBackend(env.HARDEN_BACKEND);
  if (envBackend !== undefined) fromEnv.backend = envBackend;

  const envTimeout = parseNum(env.HARDEN_TIMEOUT_MS);
  if (envTimeout !== undefined) fromEnv.timeoutMs = envTimeout;

  const envPort = parseNum(env.HARDEN_PORT);
  if (envPort !== undefined) fromEnv.port = envPort;

  // ---- Merge (cli > env > file > defaults) ------------------------------

  const merged: HardenConfig = {
    ...DEFAULTS,
    ...fromFile,
    ...fromEnv,
    ...definedOnly(cliArgs),
  };

  validatePattern(merged.filePattern);
  return merged;
}

/** Compile the configured file pattern. */
export function filePatternOf(config: HardenConfig): RegExp {
  return new RegExp(config.filePattern);
}

function validatePattern(source: string): void {
  try {
    new RegExp(source);
  } catch (error) {
    throw new ConfigError(`Invalid file pattern ${source}: ${errorMessage(error)}`);
  }
}

function definedOnly(values: Partial<HardenConfig>): Partial<HardenConfig> {
  const out: Partial<HardenConfig> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) Object.assign(out, { [key]: value });
  }
  return out;
}
