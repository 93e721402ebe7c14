import { createLogger } from '../log.js';
import { readWireLog } from '../session/log.js';
import type { ContentPart, Message, ToolCallPart, ToolResultPart, UserInput } from '../types.js';
import type { CompactionStatus, WireMessage } from '../wire/message.js';
import { ROOT_AGENT_ID } from '../wire/message.js';

import { compactionBoundary, summaryMessage, type Summarizer } from './compaction.js';
import { charEstimator, type TokenEstimator } from './estimator.js';

const log = createLogger('context');

/** The step currently being recorded: one assistant message plus its results. */
type StepDraft = {
  key: string;
  createdAt: string;
  parts: ContentPart[];
  results: Array<{ part: ToolResultPart; createdAt: string }>;
};

export type ContextOptions = {
  estimator?: TokenEstimator;
};

function userMessage(input: UserInput, createdAt: string): Message {
  const content: ContentPart[] = typeof input === 'string' ? [{ type: 'text', text: input }] : input.map((p) => ({ ...p }));
  return { role: 'user', content, created_at: createdAt };
}

function stepKey(msg: WireMessage, step: number): string {
  return `${msg.turn_id ?? ''}#${step}`;
}

/** What a context's owner hands out: reads only. */
export type ContextView = Pick<Context, 'iterate' | 'length' | 'estimateTokens' | 'compactionCount'>;

/**
 * Ordered conversation of one soul.
 *
 * Mutations normally arrive as wire messages through `apply`, which is also
 * what replay runs, so a live context and one rebuilt from the log are the
 * same. Deltas and tool activity of the running step collect in a draft that
 * is sealed into messages when the next step, turn or compaction starts.
 */
export class Context {
  private sealed: Message[] = [];
  private draft: StepDraft | null = null;
  private readonly estimator: TokenEstimator;
  private compactions = 0;

  constructor(opts: ContextOptions = {}) {
    this.estimator = opts.estimator ?? charEstimator;
  }

  // ── Public API ──

  /**
   * Append a complete message. Closes the open step first. A soul never
   * calls this directly; its changes arrive through `apply`.
   */
  append(message: Message): void {
    this.seal();
    this.sealed.push(message);
  }

  /** Messages in causal order, the open step rendered at the end. */
  iterate(): Message[] {
    return [...this.sealed, ...this.renderDraft()];
  }

  get length(): number {
    return this.sealed.length + this.renderDraft().length;
  }

  estimateTokens(): number {
    return this.estimator.estimate(this.iterate());
  }

  get compactionCount(): number {
    return this.compactions;
  }

  /**
   * Fold the oldest messages (all but `protectedTail`) into one summary.
   * Returns null when there is nothing to fold. The result is handed to
   * `commit` for recording and takes effect only once the committer routes
   * it back through `apply`.
   */
  async compact(
    protectedTail: number,
    summarizer: Summarizer,
    opts: { signal?: AbortSignal; commit: (status: CompactionStatus) => void }
  ): Promise<CompactionStatus | null> {
    const messages = this.iterate();
    const end = compactionBoundary(messages, protectedTail);
    if (end === 0) return null;

    const tokensBefore = this.estimator.estimate(messages);
    const summary = await summarizer.summarize(messages.slice(0, end), opts.signal);
    const tokensAfter = this.estimator.estimate([summaryMessage(summary, ''), ...messages.slice(end)]);
    const status: CompactionStatus = {
      kind: 'compaction',
      replaced: end,
      summary,
      tokens_before: tokensBefore,
      tokens_after: tokensAfter,
    };

    opts.commit(status);
    return status;
  }

  /** Project one wire message onto this context. Kinds that carry no content are ignored. */
  apply(msg: WireMessage): void {
    switch (msg.kind) {
      case 'TurnBegin':
        this.append(userMessage(msg.payload.input, msg.ts));
        return;
      case 'AssistantDelta': {
        const draft = this.openDraft(stepKey(msg, msg.payload.step), msg.ts);
        const last = draft.parts[draft.parts.length - 1];
        if (last && (last.type === 'text' || last.type === 'thinking') && last.type === msg.payload.part) {
          last.text += msg.payload.text;
        } else {
          draft.parts.push({ type: msg.payload.part, text: msg.payload.text });
        }
        return;
      }
      case 'ToolCallStarted': {
        if (!msg.tool_call_id) {
          log.warn(`ToolCallStarted #${msg.seq} has no tool_call_id`);
          return;
        }
        const draft = this.openDraft(stepKey(msg, msg.payload.step), msg.ts);
        const part: ToolCallPart = { type: 'tool_call', id: msg.tool_call_id, name: msg.payload.name, args: msg.payload.args };
        draft.parts.push(part);
        return;
      }
      case 'ToolCallResult': {
        if (!msg.tool_call_id) {
          log.warn(`ToolCallResult #${msg.seq} has no tool_call_id`);
          return;
        }
        const draft = this.openDraft(stepKey(msg, msg.payload.step), msg.ts);
        draft.results.push({
          part: {
            type: 'tool_result',
            tool_call_id: msg.tool_call_id,
            output: msg.payload.output,
            is_error: msg.payload.status !== 'ok',
          },
          createdAt: msg.ts,
        });
        return;
      }
      case 'StatusUpdate':
        if (msg.payload.kind === 'compaction') this.applyCompaction(msg.payload, msg.ts);
        else if (msg.payload.kind === 'clear') this.reset();
        return;
      case 'TurnEnd':
        this.seal();
        return;
      default:
        return;
    }
  }

  // ── Replay ──

  /** Rebuild the context of one agent from already decoded messages. */
  static fromWireMessages(
    messages: readonly WireMessage[],
    opts: ContextOptions & { agentId?: string } = {}
  ): Context {
    const agentId = opts.agentId ?? ROOT_AGENT_ID;
    const ctx = new Context(opts);
    for (const m of messages) {
      if (m.agent_id === agentId) ctx.apply(m);
    }
    return ctx;
  }

  static async replayFromLog(logPath: string, opts: ContextOptions = {}): Promise<Context> {
    const { messages } = await readWireLog(logPath);
    return Context.fromWireMessages(messages, opts);
  }

  // ── Internals ──

  private applyCompaction(status: CompactionStatus, ts: string): void {
    this.seal();
    const replaced = Math.min(status.replaced, this.sealed.length);
    this.sealed.splice(0, replaced, summaryMessage(status.summary, ts));
    this.compactions++;
  }

  private reset(): void {
    this.sealed = [];
    this.draft = null;
  }

  private openDraft(key: string, ts: string): StepDraft {
    if (this.draft && this.draft.key === key) return this.draft;
    this.seal();
    this.draft = { key, createdAt: ts, parts: [], results: [] };
    return this.draft;
  }

  private renderDraft(): Message[] {
    const d = this.draft;
    if (!d) return [];
    const out: Message[] = [];
    if (d.parts.length) {
      out.push({ role: 'assistant', content: d.parts.map((p) => ({ ...p })), created_at: d.createdAt });
    }
    for (const r of d.results) {
      out.push({ role: 'tool', content: [{ ...r.part }], created_at: r.createdAt });
    }
    return out;
  }

  private seal(): void {
    if (!this.draft) return;
    this.sealed.push(...this.renderDraft());
    this.draft = null;
  }
}

export function applyWireMessage(ctx: Context, msg: WireMessage): void {
  ctx.apply(msg);
}
