/**
 * Anthropic Client - ToolClient backed by the Messages API.
 *
 * Alternative to the `claude --print` subprocess for hosts without the CLI.
 * Each prompt is sent as one user message with no conversation history.
 * The SDK's own retry loop is disabled so that a failure surfaces once, as
 * a `ToolInvocationError`, exactly like a non-zero CLI exit.
 *
 * @module llm/anthropic-client
 */

import Anthropic from '@anthropic-ai/sdk';
import { ToolInvocationError, errorMessage } from '../errors.js';
import type { ToolClient } from '../tool-client.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AnthropicClientConfig {
  /** API key. Defaults to ANTHROPIC_API_KEY env var. */
  apiKey?: string;
  /** Default model. Defaults to claude-sonnet-4-5-20250929. */
  model?: string;
  /** Maximum output tokens (default: 8192). */
  maxTokens?: number;
  /** Request timeout in milliseconds; unset keeps the SDK default. */
  timeoutMs?: number;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';
const DEFAULT_MAX_TOKENS = 8192;

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create a ToolClient backed by the Anthropic TypeScript SDK.
 *
 * @throws If no API key is configured.
 */
export function createAnthropicClient(config: AnthropicClientConfig = {}): ToolClient {
  const apiKey = config.apiKey ?? process.env.ANTHROPIC_API_KEY;
  if (!apiKey) {
    throw new Error(
      'ANTHROPIC_API_KEY is required. Set it as an environment variable or pass it in config.apiKey.',
    );
  }

  const model = config.model ?? DEFAULT_MODEL;
  const maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;

  const client = new Anthropic({
    apiKey,
    maxRetries: 0,
    ...(config.timeoutMs !== undefined ? { timeout: config.timeoutMs } : {}),
  });

  return {
    async invoke(prompt: string): Promise<string> {
      const params: Anthropic.MessageCreateParamsNonStreaming = {
        model,
        max_tokens: maxTokens,
        messages: [{ role: 'user', content: prompt }],
      };

      let message: Anthropic.Message;
      try {
        message = await client.messages.create(params);
      } catch (error: unknown) {
        const status =
          error instanceof Error && 'status' in error && typeof error.status === 'number'
            ? error.status
            : undefined;
        const detail = errorMessage(error);
        throw new ToolInvocationError(
          `Messages API call failed${status !== undefined ? ` (HTTP ${status})` : ''}: ${detail}`,
          { exitCode: null, output: detail, status },
        );
      }

      return extractTextContent(message).trim();
    },
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Extract text content from a Message response.
 */
export function extractTextContent(message: Anthropic.Message): string {
  const textBlocks = message.content.filter(
    (block): block is Anthropic.TextBlock => block.type === 'text',
  );
  return textBlocks.map((b) => b.text).join('');
}
