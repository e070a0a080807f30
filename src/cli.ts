#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Parses command-line arguments, resolves configuration and runs one of:
 *
 *   serve     start the control server and wait for operator input
 *   analyze   discover and analyze, then exit
 *   run       discover, analyze, apply a decisions file, harden and verify
 *
 * @module cli
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { parseArgs } from 'node:util';
import { pathToFileURL } from 'node:url';
import {
  CONFIG_FILE_NAME,
  buildConfig,
  filePatternOf,
  loadConfigFile,
  type HardenConfig,
} from './config.js';
import { ConfigError, errorMessage } from './errors.js';
import { Pipeline } from './pipeline.js';
import type { PhaseRunSummary } from './phase-executor.js';
import { startControlServer } from './reporting/control-server.js';
import { SidecarStore } from './sidecar-store.js';
import { ActionLogger } from './storage/action-logger.js';
import { createToolClient } from './tool-client.js';
import { createExclusionPredicate } from './unit-registry.js';

const VERSION = '0.4.0';

export type Command = 'serve' | 'analyze' | 'run';

export interface ParsedCli {
  command: Command;
  args: Partial<HardenConfig>;
  configPath: string;
  decisionsPath?: string;
  /** Take stored analyses of unchanged units instead of re-running them. */
  reuse: boolean;
  help: boolean;
  version: boolean;
}

const HELP = `
harden v${VERSION}

Usage:
  harden serve [options]                    Start the control server
  harden analyze [options]                  Discover and analyze units, then exit
  harden run --decisions <file> [options]   Analyze, apply decisions, harden and verify

Options:
  --root <dir>            Directory to discover units under (default: app/controllers)
  --pattern <regex>       File name pattern (default: _controller\\.rb$)
  --exclude <name>        Unit name or * pattern to skip (repeatable)
  --backend <cli|api>     Tool backend (default: cli)
  --model <name>          Model passed to the tool
  --timeout <ms>          Per-invocation timeout (default: none)
  --cli-bin <path>        Binary for the cli backend (default: claude)
  --sidecar-dir <name>    Sidecar directory name (default: .harden)
  --log-path <file>       JSONL action log ('' disables)
  --port <n>              Control server port (default: 4567)
  --host <addr>           Control server bind address (default: 127.0.0.1)
  --config <file>         Config file (default: ${CONFIG_FILE_NAME})
  --decisions <file>      JSON map of unit name to { action, ... } (run only)
  --reuse                 Reuse stored analyses of unchanged units
  --help, -h              Show this help message
  --version, -v           Show version number

Environment Variables:
  HARDEN_ROOT, HARDEN_FILE_PATTERN, HARDEN_EXCLUDE (comma-separated),
  HARDEN_BACKEND, HARDEN_MODEL, HARDEN_TIMEOUT_MS, HARDEN_CLI_BIN,
  HARDEN_SIDECAR_DIR, HARDEN_LOG_PATH, HARDEN_PORT, HARDEN_HOST,
  ANTHROPIC_API_KEY (api backend)
`;

/**
 * Parse argv (without the node executable and script name).
 *
 * @throws {ConfigError} On an unknown command or an invalid flag value.
 */
export function parseCliArgs(argv: string[]): ParsedCli {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      root: { type: 'string' },
      pattern: { type: 'string' },
      exclude: { type: 'string', multiple: true },
      backend: { type: 'string' },
      model: { type: 'string' },
      timeout: { type: 'string' },
      'cli-bin': { type: 'string' },
      'sidecar-dir': { type: 'string' },
      'log-path': { type: 'string' },
      port: { type: 'string' },
      host: { type: 'string' },
      config: { type: 'string' },
      decisions: { type: 'string' },
      reuse: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
    },
    allowPositionals: true,
  });

  const command = positionals[0] ?? 'serve';
  if (command !== 'serve' && command !== 'analyze' && command !== 'run') {
    throw new ConfigError(`Unknown command '${command}'`);
  }

  const args: Partial<HardenConfig> = {};

  if (values.root) args.root = values.root;
  if (values.pattern) args.filePattern = values.pattern;
  if (values.exclude) args.exclude = values.exclude;
  if (values.model) args.model = values.model;
  if (values['cli-bin']) args.cliBin = values['cli-bin'];
  if (values['sidecar-dir']) args.sidecarDir = values['sidecar-dir'];
  if (values['log-path'] !== undefined) args.logPath = values['log-path'];
  if (values.host) args.host = values.host;

  if (values.backend) {
    if (values.backend !== 'cli' && values.backend !== 'api') {
      throw new ConfigError(`Invalid --backend value: ${values.backend}. Must be cli or api.`);
    }
    args.backend = values.backend;
  }

  if (values.timeout) {
    const timeout = Number(values.timeout);
    if (!Number.isInteger(timeout) || timeout < 1) {
      throw new ConfigError(`Invalid --timeout value: ${values.timeout}`);
    }
    args.timeoutMs = timeout;
  }

  if (values.port) {
    const port = Number(values.port);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      throw new ConfigError(`Invalid --port value: ${values.port}`);
    }
    args.port = port;
  }

  return {
    command,
    args,
    configPath: values.config ?? CONFIG_FILE_NAME,
    decisionsPath: values.decisions,
    reuse: values.reuse,
    help: values.help,
    version: values.version,
  };
}

/**
 * Wire a pipeline (and its action log) from a resolved config.
 */
export function createPipelineFromConfig(config: HardenConfig): { pipeline: Pipeline; actionLog?: ActionLogger } {
  const root = path.resolve(config.root);
  const actionLog = config.logPath ? new ActionLogger(path.resolve(config.logPath)) : undefined;

  const pipeline = new Pipeline({
    root,
    tool: createToolClient({
      backend: config.backend,
      model: config.model,
      timeoutMs: config.timeoutMs,
      cliBin: config.cliBin,
      apiKey: config.apiKey,
    }),
    sidecars: new SidecarStore({ dirName: config.sidecarDir, allowedRoots: [root] }),
    discovery: {
      filePattern: filePatternOf(config),
      exclude: createExclusionPredicate(config.exclude),
    },
    logger: actionLog,
  });

  return { pipeline, actionLog };
}

function printSummary(summary: PhaseRunSummary): void {
  console.log(`${summary.phase}: ${summary.succeeded}/${summary.total} succeeded (${(summary.durationMs / 1000).toFixed(1)}s)`);
  for (const failure of summary.failures) {
    console.log(`  ${failure.name}: ${failure.message}`);
  }
}

function readDecisionsFile(filePath: string): unknown {
  try {
    return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Could not read decisions from ${filePath}: ${errorMessage(error)}`);
  }
}

/**
 * Main entry point. Resolves with the process exit code.
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const cli = parseCliArgs(argv);
  if (cli.help) {
    console.log(HELP);
    return 0;
  }
  if (cli.version) {
    console.log(`v${VERSION}`);
    return 0;
  }

  const config = buildConfig(cli.args, loadConfigFile(cli.configPath));
  const { pipeline, actionLog } = createPipelineFromConfig(config);

  if (cli.command === 'serve') {
    const server = await startControlServer({
      pipeline,
      actionLog,
      startPort: config.port,
      host: config.host,
    });
    console.log(`Control server: ${server.url}`);

    await new Promise<void>((resolve) => {
      process.once('SIGINT', () => resolve());
      process.once('SIGTERM', () => resolve());
    });
    await server.close();
    return 0;
  }

  if (cli.command === 'run' && !cli.decisionsPath) {
    console.error('Error: --decisions <file> is required for the run command');
    return 1;
  }

  const discovery = pipeline.discover();
  if (!discovery.ok) {
    console.error(`Error: ${discovery.error}`);
    return 1;
  }
  console.log(`Discovered ${discovery.units.length} unit(s)`);

  const analysis = await pipeline.runAnalysis({ reuseExisting: cli.reuse });
  printSummary(analysis);

  if (cli.command === 'run' && cli.decisionsPath) {
    const result = await pipeline.submitDecisions(readDecisionsFile(cli.decisionsPath));
    printSummary(result.hardening);
    printSummary(result.verification);
  }

  await pipeline.whenIdle();
  const snapshot = pipeline.snapshot();
  console.log(`Phase: ${snapshot.phase}`);
  return Object.values(snapshot.units).some((u) => u.status === 'error') ? 1 : 0;
}

// Run main if this is the entry point
const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  main().then(
    (code) => process.exit(code),
    (err: unknown) => {
      console.error('Fatal error:', errorMessage(err));
      process.exit(1);
    },
  );
}
