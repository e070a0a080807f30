/**
 * Tool Client - The one-shot reasoning tool as seen by the pipeline.
 *
 * `invoke` takes a self-contained prompt and resolves with the trimmed raw
 * text of the answer, or rejects with a `ToolInvocationError`. Two backends
 * exist: the `claude` CLI as a subprocess (default) and the Messages API.
 *
 * @module tool-client
 */

import { createClaudeSubprocess } from './claude-subprocess.js';
import { createAnthropicClient } from './llm/anthropic-client.js';

export interface ToolClient {
  invoke(prompt: string): Promise<string>;
}

export type ToolBackend = 'cli' | 'api';

export interface ToolClientConfig {
  backend: ToolBackend;
  model?: string;
  /** Per-invocation timeout; unset means none. */
  timeoutMs?: number;
  /** CLI binary for the `cli` backend. */
  cliBin?: string;
  /** API key for the `api` backend (defaults to ANTHROPIC_API_KEY). */
  apiKey?: string;
}

/**
 * Create the client for the configured backend.
 */
export function createToolClient(config: ToolClientConfig): ToolClient {
  switch (config.backend) {
    case 'api':
      return createAnthropicClient({
        apiKey: config.apiKey,
        model: config.model,
        timeoutMs: config.timeoutMs,
      });
    case 'cli':
      return createClaudeSubprocess({
        cliBin: config.cliBin,
        model: config.model,
        timeoutMs: config.timeoutMs,
      });
  }
}
