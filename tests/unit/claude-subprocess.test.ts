/**
 * Tests for the claude CLI subprocess client
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { buildCommand, createClaudeSubprocess, shellEscape } from '../../src/claude-subprocess.js';
import { ToolInvocationError } from '../../src/errors.js';

type ExecCallback = (err: Error | null, result?: { stdout: string; stderr: string }) => void;

const { execMock } = vi.hoisted(() => ({ execMock: vi.fn() }));

vi.mock('node:child_process', () => ({
  exec: execMock,
}));

// Route promisify through the callback form of our mock
vi.mock('node:util', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:util')>();
  return {
    ...actual,
    promisify:
      (fn: (...args: unknown[]) => void) =>
      (...args: unknown[]) =>
        new Promise((resolve, reject) => {
          fn(...args, (err: Error | null, result: unknown) => {
            if (err) reject(err);
            else resolve(result);
          });
        }),
  };
});

function execSucceeds(stdout: string, stderr = ''): void {
  execMock.mockImplementation((_cmd: string, _opts: unknown, cb: ExecCallback) => {
    cb(null, { stdout, stderr });
  });
}

function execFails(fields: Record<string, unknown>): void {
  execMock.mockImplementation((_cmd: string, _opts: unknown, cb: ExecCallback) => {
    cb(Object.assign(new Error('Command failed'), fields));
  });
}

async function invocationError(promise: Promise<string>): Promise<ToolInvocationError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ToolInvocationError) return error;
    throw error;
  }
  throw new Error('expected the invocation to fail');
}

describe('shellEscape', () => {
  it('wraps in single quotes and escapes embedded quotes', () => {
    expect(shellEscape("it's")).toBe("'it'\\''s'");
  });
});

describe('buildCommand', () => {
  it('passes the prompt as one argument', () => {
    expect(buildCommand('Review $HOME')).toBe("'claude' --print 'Review $HOME'");
  });

  it('adds the model and a custom binary', () => {
    expect(buildCommand('hi', { model: 'opus', cliBin: '/opt/claude' })).toBe(
      "'/opt/claude' --print --model 'opus' 'hi'",
    );
  });
});

describe('createClaudeSubprocess', () => {
  beforeEach(() => {
    execMock.mockReset();
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns trimmed stdout', async () => {
    execSucceeds('  {"findings":[]}\n');

    const client = createClaudeSubprocess();

    await expect(client.invoke('Analyze')).resolves.toBe('{"findings":[]}');
    expect(execMock.mock.calls[0][0]).toBe("'claude' --print 'Analyze'");
    expect(execMock.mock.calls[0][1]).toMatchObject({ timeout: 0 });
  });

  it('passes the configured timeout to the process', async () => {
    execSucceeds('ok');

    await createClaudeSubprocess({ timeoutMs: 30000 }).invoke('x');

    expect(execMock.mock.calls[0][1]).toMatchObject({ timeout: 30000 });
  });

  it('logs stderr from a successful run', async () => {
    execSucceeds('ok', 'deprecated flag\n');

    await createClaudeSubprocess().invoke('x');

    expect(console.warn).toHaveBeenCalledWith('[ClaudeSubprocess] stderr: deprecated flag');
  });

  it('reports a non-zero exit with the captured output', async () => {
    execFails({ code: 2, stdout: 'partial ', stderr: 'rate limited' });

    const error = await invocationError(createClaudeSubprocess().invoke('x'));

    expect(error.message).toBe('claude --print failed (exit 2): partial rate limited');
    expect(error.exitCode).toBe(2);
    expect(error.output).toBe('partial rate limited');
    expect(error.timedOut).toBe(false);
  });

  it('caps the captured output at 500 characters', async () => {
    execFails({ code: 1, stdout: 'x'.repeat(800), stderr: '' });

    const error = await invocationError(createClaudeSubprocess().invoke('x'));

    expect(error.output).toHaveLength(500);
  });

  it('explains a missing binary', async () => {
    execFails({ code: 127, stdout: '', stderr: 'claude: not found' });

    const error = await invocationError(createClaudeSubprocess({ cliBin: 'claude-x' }).invoke('x'));

    expect(error.message).toBe("Claude CLI not found at 'claude-x'. Is it installed and on your PATH?");
    expect(error.exitCode).toBe(127);
  });

  it('marks a killed process as timed out when a timeout is set', async () => {
    execFails({ killed: true, signal: 'SIGTERM', stdout: '', stderr: '' });

    const error = await invocationError(createClaudeSubprocess({ timeoutMs: 50 }).invoke('x'));

    expect(error.message).toBe('claude --print timed out after 50ms');
    expect(error.timedOut).toBe(true);
    expect(error.exitCode).toBeNull();
  });

  it('reports a signal without a timeout as a plain failure', async () => {
    execFails({ killed: true, signal: 'SIGKILL', stdout: '', stderr: '' });

    const error = await invocationError(createClaudeSubprocess().invoke('x'));

    expect(error.message).toBe('claude --print failed (signal SIGKILL): ');
    expect(error.timedOut).toBe(false);
  });
});
