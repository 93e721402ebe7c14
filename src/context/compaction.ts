import { errorMessage } from '../errors.js';
import { createLogger } from '../log.js';
import type { ModelProvider } from '../provider/provider.js';
import type { Message } from '../types.js';
import { nowIso } from '../utils.js';

const log = createLogger('compaction');

export interface Summarizer {
  summarize(messages: readonly Message[], signal?: AbortSignal): Promise<string>;
}

export const SUMMARY_INSTRUCTION =
  'Summarize the conversation so far for your own future reference. Keep decisions, open tasks, ' +
  'file paths, identifiers and tool outcomes that later steps depend on. Reply with the summary only.';

/**
 * Length of the prefix to fold into a summary, or 0 when there is nothing
 * to do. The last `protectedTail` messages stay, and the boundary moves back
 * so a tool-call message and its results are never separated.
 */
export function compactionBoundary(messages: readonly Message[], protectedTail: number): number {
  let end = messages.length - Math.max(0, protectedTail);
  if (end <= 0) return 0;

  // Results at the boundary belong to an assistant message further back.
  while (end > 0 && messages[end]?.role === 'tool') end--;
  if (end <= 0) return 0;

  // Already compacted: the prefix is just the previous summary.
  if (end === 1 && messages[0]?.summary) return 0;
  return end;
}

export function summaryMessage(summary: string, createdAt: string): Message {
  return { role: 'system', content: [{ type: 'text', text: summary }], created_at: createdAt, summary: true };
}

function renderLine(m: Message): string {
  const parts: string[] = [];
  for (const p of m.content) {
    if (p.type === 'text') parts.push(p.text);
    else if (p.type === 'tool_call') parts.push(`[call ${p.name} ${JSON.stringify(p.args)}]`);
    else if (p.type === 'tool_result') parts.push(`[${p.is_error ? 'error' : 'result'} ${p.output}]`);
  }
  return `${m.summary ? 'summary' : m.role}: ${parts.join(' ')}`;
}

export function renderTranscript(messages: readonly Message[]): string {
  return messages.map(renderLine).join('\n');
}

/** Deterministic fallback: the first line of each message, clipped. */
export function digestSummary(messages: readonly Message[], perMessage = 160): string {
  const lines = messages.map((m) => {
    const line = renderLine(m).split('\n')[0] ?? '';
    return line.length > perMessage ? line.slice(0, perMessage) + '…' : line;
  });
  return `Earlier conversation (${messages.length} messages):\n${lines.join('\n')}`;
}

/**
 * Asks the model itself for a summary. Falls back to digestSummary when the
 * call fails or returns nothing; an abort is not swallowed.
 */
export class ProviderSummarizer implements Summarizer {
  constructor(private readonly provider: ModelProvider) {}

  async summarize(messages: readonly Message[], signal?: AbortSignal): Promise<string> {
    try {
      const res = await this.provider.complete(
        {
          system_prompt: SUMMARY_INSTRUCTION,
          messages: [
            {
              role: 'user',
              content: [{ type: 'text', text: renderTranscript(messages) }],
              created_at: nowIso(),
            },
          ],
          tools: [],
          capabilities: new Set(),
        },
        { signal: signal ?? new AbortController().signal }
      );
      const text = res.text.trim();
      if (text) return text;
      log.warn('summary call returned no text, using digest');
    } catch (e) {
      if (signal?.aborted) throw e;
      log.warn(`summary call failed, using digest: ${errorMessage(e)}`);
    }
    return digestSummary(messages);
  }
}

/** Summarizer that never calls a model. */
export const digestSummarizer: Summarizer = {
  summarize: async (messages) => digestSummary(messages),
};
