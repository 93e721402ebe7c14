/**
 * Model provider boundary.
 *
 * Concrete clients live outside this package; anything that can turn a
 * conversation into text plus tool calls fits. Errors may be thrown as
 * TransientProviderError / FatalProviderError, or as plain errors that
 * classifyProviderError sorts by status and message.
 */

import { errorMessage, FatalProviderError, isAbortError, TransientProviderError } from '../errors.js';
import type { Message, ModelCapabilities, ToolSchema } from '../types.js';

export type ModelRequest = {
  system_prompt: string;
  messages: readonly Message[];
  tools: ToolSchema[];
  capabilities: ModelCapabilities;
};

export type ModelChunk = { part: 'text' | 'thinking'; text: string };

export type ModelToolCall = {
  id: string;
  name: string;
  args: Record<string, unknown>;
};

export type ModelResponse = {
  text: string;
  thinking?: string;
  tool_calls: ModelToolCall[];
  /** Stream pieces in arrival order, when the client streamed. */
  chunks?: ModelChunk[];
};

export type CompleteOptions = {
  signal: AbortSignal;
  /** Streaming clients report pieces here as they arrive. */
  onChunk?: (chunk: ModelChunk) => void;
};

export interface ModelProvider {
  complete(request: ModelRequest, opts: CompleteOptions): Promise<ModelResponse>;
}

// ── Error classification ─────────────────────────────────────────────────

export function isContextWindowExceeded(msg: string): boolean {
  const lower = msg.toLowerCase();
  const hints = [
    'exceeds the context window',
    'context window of this model',
    'maximum context length',
    'context length exceeded',
    'too many tokens',
    'token limit exceeded',
    'prompt is too long',
    'input is too long',
  ];
  return hints.some((h) => lower.includes(h));
}

export function isRateLimited(msg: string): boolean {
  return msg.includes('429') && (msg.includes('Too Many') || /rate|limit/i.test(msg));
}

/** A 429 caused by plan or billing limits. Waiting does not fix it. */
export function isQuotaExhausted(msg: string): boolean {
  if (!isRateLimited(msg)) return false;
  const lower = msg.toLowerCase();
  const hints = [
    'insufficient balance',
    'insufficient_balance',
    'insufficient quota',
    'insufficient_quota',
    'quota exhausted',
    'out of credits',
    'model not available for your plan',
  ];
  return hints.some((h) => lower.includes(h));
}

/** Client errors a retry cannot fix: auth, bad request, unknown model, oversize context. */
export function isNonRetryable(msg: string, status?: number): boolean {
  if (isContextWindowExceeded(msg) || isQuotaExhausted(msg)) return true;

  const code = status ?? Number(msg.match(/\b(4\d{2})\b/)?.[1] ?? NaN);
  if (code >= 400 && code < 500 && code !== 429 && code !== 408) return true;

  const lower = msg.toLowerCase();
  const authHints = [
    'invalid api key',
    'incorrect api key',
    'missing api key',
    'authentication failed',
    'unauthorized',
    'forbidden',
    'permission denied',
    'invalid token',
  ];
  if (authHints.some((h) => lower.includes(h))) return true;

  if (
    lower.includes('model') &&
    (lower.includes('not found') || lower.includes('does not exist') || lower.includes('unsupported'))
  ) {
    return true;
  }
  if (lower.includes('unsupported content') || lower.includes('malformed request')) return true;

  return false;
}

/** Retry-After hint from an error message, in ms. */
export function parseRetryAfterMs(msg: string): number | null {
  const lower = msg.toLowerCase();
  for (const prefix of ['retry-after:', 'retry_after:', 'retry-after ', 'retry_after ']) {
    const pos = lower.indexOf(prefix);
    if (pos === -1) continue;
    const numStr = msg.slice(pos + prefix.length).trim().match(/^[\d.]+/)?.[0];
    if (numStr) {
      const secs = parseFloat(numStr);
      if (Number.isFinite(secs) && secs >= 0) return Math.round(secs * 1000);
    }
  }
  return null;
}

function statusOf(e: unknown): number | undefined {
  if (typeof e !== 'object' || e === null) return undefined;
  if ('status' in e && typeof e.status === 'number') return e.status;
  if ('statusCode' in e && typeof e.statusCode === 'number') return e.statusCode;
  return undefined;
}

/**
 * Normalize anything a provider threw into the two provider error classes.
 * An AbortError the caller did not ask for is the provider's own request
 * timing out, so it is transient.
 */
export function classifyProviderError(e: unknown): TransientProviderError | FatalProviderError {
  if (e instanceof TransientProviderError || e instanceof FatalProviderError) return e;
  if (isAbortError(e)) {
    return new TransientProviderError(`request aborted by the provider: ${errorMessage(e)}`, { cause: e });
  }

  const msg = e instanceof Error ? e.message : String(e);
  const status = statusOf(e);
  if (isNonRetryable(msg, status)) return new FatalProviderError(msg, { status, cause: e });
  return new TransientProviderError(msg, {
    status,
    retryAfterMs: parseRetryAfterMs(msg) ?? undefined,
    cause: e,
  });
}
