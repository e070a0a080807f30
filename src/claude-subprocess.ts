/**
 * Claude Subprocess - Implements ToolClient via the `claude --print` CLI.
 *
 * Each invocation is a fresh one-shot process: the prompt is passed as a
 * single shell-escaped argument, there is no session, and nothing carries
 * over between calls. The client never retries; a failed call is reported
 * to the caller as a `ToolInvocationError`.
 *
 * @module claude-subprocess
 */

import { exec } from 'node:child_process';
import { promisify } from 'node:util';
import { ToolInvocationError, TOOL_OUTPUT_CAPTURE_LIMIT } from './errors.js';
import type { ToolClient } from './tool-client.js';

const execAsync = promisify(exec);

export interface ClaudeSubprocessConfig {
  /** Model passed with `--model`; omitted means the CLI's own default. */
  model?: string;
  /**
   * Kill the process after this many milliseconds. Unset means no timeout:
   * a hung process holds its phase's barrier open.
   */
  timeoutMs?: number;
  /** Path to the claude CLI binary (default: 'claude') */
  cliBin?: string;
}

/** Exit code the shell reports when the binary cannot be found. */
const COMMAND_NOT_FOUND = 127;

/**
 * Escape a string for safe inclusion in a shell command.
 * Uses single-quote wrapping with escaping of single quotes inside.
 */
export function shellEscape(s: string): string {
  return "'" + s.replace(/'/g, "'\\''") + "'";
}

/**
 * Build the shell command for one invocation.
 */
export function buildCommand(prompt: string, config: ClaudeSubprocessConfig = {}): string {
  const parts = [shellEscape(config.cliBin ?? 'claude'), '--print'];
  if (config.model) {
    parts.push('--model', shellEscape(config.model));
  }
  parts.push(shellEscape(prompt));
  return parts.join(' ');
}

/**
 * Create a ToolClient that calls `claude --print` as a subprocess.
 */
export function createClaudeSubprocess(
  config: ClaudeSubprocessConfig = {},
): ToolClient {
  const cliBin = config.cliBin ?? 'claude';

  return {
    async invoke(prompt: string): Promise<string> {
      const cmd = buildCommand(prompt, config);

      try {
        const { stdout, stderr } = await execAsync(cmd, {
          timeout: config.timeoutMs ?? 0,
          maxBuffer: 10 * 1024 * 1024, // 10 MB
          env: { ...process.env },
        });

        if (stderr && stderr.trim().length > 0) {
          console.warn(`[ClaudeSubprocess] stderr: ${stderr.trim().slice(0, TOOL_OUTPUT_CAPTURE_LIMIT)}`);
        }

        return stdout.trim();
      } catch (error: unknown) {
        throw toInvocationError(error, cliBin, config.timeoutMs);
      }
    },
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function toInvocationError(
  error: unknown,
  cliBin: string,
  timeoutMs: number | undefined,
): ToolInvocationError {
  if (!(error instanceof Error)) {
    return new ToolInvocationError(`${cliBin} --print failed: ${String(error)}`, {
      exitCode: null,
      output: '',
    });
  }

  const code = 'code' in error && typeof error.code === 'number' ? error.code : null;
  const killed = 'killed' in error && error.killed === true;
  const signal = 'signal' in error && typeof error.signal === 'string' ? error.signal : null;
  const stdout = 'stdout' in error && typeof error.stdout === 'string' ? error.stdout : '';
  const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr : '';
  const output = `${stdout}${stderr}`.slice(0, TOOL_OUTPUT_CAPTURE_LIMIT);

  if (timeoutMs && (killed || signal === 'SIGTERM')) {
    return new ToolInvocationError(`${cliBin} --print timed out after ${timeoutMs}ms`, {
      exitCode: code,
      output,
      timedOut: true,
    });
  }

  if (code === COMMAND_NOT_FOUND) {
    return new ToolInvocationError(
      `Claude CLI not found at '${cliBin}'. Is it installed and on your PATH?`,
      { exitCode: code, output },
    );
  }

  const exitLabel = code !== null ? `exit ${code}` : signal ? `signal ${signal}` : 'no exit code';
  return new ToolInvocationError(`${cliBin} --print failed (${exitLabel}): ${output}`, {
    exitCode: code,
    output,
  });
}
