import type { CompactionConfig, LoopControl } from '../config.js';
import { ProviderSummarizer, type Summarizer } from '../context/compaction.js';
import type { Context, ContextView } from '../context/context.js';
import type { DanglingToolCall, OpenTurn } from '../context/replay.js';
import {
  errorMessage,
  FatalProviderError,
  LogWriteError,
  SoulBusyError,
  StepBudgetExceededError,
  ToolNotFoundError,
  TransientProviderError,
  TurnInterruptedError,
} from '../errors.js';
import type { ApprovalBroker } from '../hub/approval.js';
import { INTERRUPTED_OUTPUT, type ToolHub } from '../hub/hub.js';
import { createLogger, type Logger } from '../log.js';
import type { ModelChunk, ModelProvider, ModelResponse, ModelToolCall } from '../provider/provider.js';
import { retryPolicyFrom, withRetry, type RetryPolicy } from '../provider/retry.js';
import {
  TERMINAL_TOOL_CALL_STATUSES,
  type Message,
  type ModelCapabilities,
  type ToolCall,
  type ToolCallStatus,
  type TurnCause,
  type TurnFailureKind,
  type TurnOutcome,
  type UserInput,
} from '../types.js';
import { linkedAbortController, randomId, raceAbort, throwIfAborted } from '../utils.js';
import type { CompactionStatus, WireDraft, WireMessage } from '../wire/message.js';
import type { Wire } from '../wire/wire.js';

import { isTerminalState, SoulStateMachine, type SoulState } from './state.js';

export type SoulOptions = {
  /** Emitter stamped with this soul's agent id. */
  wire: Wire;
  context: Context;
  provider: ModelProvider;
  hub: ToolHub;
  broker: ApprovalBroker;
  loopControl: LoopControl;
  compaction: CompactionConfig;
  depth?: number;
  parentId?: string;
  systemPrompt?: string;
  capabilities?: ModelCapabilities;
  summarizer?: Summarizer;
  /** Overrides the policy derived from loopControl. */
  retryPolicy?: RetryPolicy;
  yolo?: boolean;
};

export type RecoveryReport = {
  interruptedCalls: number;
  closedTurn: boolean;
};

const NOT_RUN_OUTPUT = 'Tool call was not run because the step failed.';

export type Unfinished = { dangling: readonly DanglingToolCall[]; openTurn: OpenTurn | null };

/**
 * Messages that close what a previous process left open for one agent:
 * each dangling call gets an `interrupted` result (it is never re-run), and
 * an unclosed turn gets its TurnEnd.
 */
export function recoveryDrafts(unfinished: Unfinished): WireDraft[] {
  const drafts = unfinished.dangling.map((call): WireDraft => ({
    kind: 'ToolCallResult',
    turn_id: call.turn_id,
    tool_call_id: call.id,
    payload: { step: call.step, status: 'interrupted', output: INTERRUPTED_OUTPUT },
  }));
  const turn = unfinished.openTurn;
  if (turn) drafts.push({ kind: 'TurnEnd', turn_id: turn.turn_id, payload: { status: 'interrupted', steps: turn.steps } });
  return drafts;
}

function failureKind(e: unknown): TurnFailureKind {
  if (e instanceof FatalProviderError) return 'provider_fatal';
  if (e instanceof TransientProviderError) return 'provider_retries_exhausted';
  if (e instanceof StepBudgetExceededError) return 'step_budget_exceeded';
  if (e instanceof ToolNotFoundError) return 'tool_not_found';
  return 'internal';
}

function withoutThinking(messages: Message[]): Message[] {
  return messages
    .map((m) => (m.role === 'assistant' ? { ...m, content: m.content.filter((p) => p.type !== 'thinking') } : m))
    .filter((m) => m.content.length > 0);
}

/**
 * Turn/step engine bound to one Context.
 *
 * Every change is committed by emitting a wire message first (which appends
 * it to the session log) and then projecting that same message onto the
 * context, so the live context never holds anything the log does not.
 */
export class Soul {
  readonly id: string;
  readonly depth: number;
  readonly parentId?: string;
  readonly hub: ToolHub;
  /** Tool calls of the current (or last) turn, by id. */
  readonly toolCalls = new Map<string, ToolCall>();

  private readonly wire: Wire;
  private readonly ctx: Context;
  private readonly provider: ModelProvider;
  private readonly broker: ApprovalBroker;
  private readonly loop: LoopControl;
  private readonly compaction: CompactionConfig;
  private readonly summarizer: Summarizer;
  private readonly retry: RetryPolicy;
  private readonly systemPrompt: string;
  private readonly capabilities: ModelCapabilities;
  private yoloMode: boolean;
  private readonly fsm: SoulStateMachine;
  private readonly log: Logger;
  private readonly startedSteps = new Map<string, number>();
  private controller: AbortController | null = null;
  private approvalsOpen = 0;

  constructor(opts: SoulOptions) {
    this.wire = opts.wire;
    this.id = opts.wire.agentId;
    this.depth = opts.depth ?? 0;
    this.parentId = opts.parentId;
    this.ctx = opts.context;
    this.provider = opts.provider;
    this.hub = opts.hub;
    this.broker = opts.broker;
    this.loop = opts.loopControl;
    this.compaction = opts.compaction;
    this.summarizer = opts.summarizer ?? new ProviderSummarizer(opts.provider);
    this.retry = opts.retryPolicy ?? retryPolicyFrom(opts.loopControl);
    this.systemPrompt = opts.systemPrompt ?? '';
    this.capabilities = opts.capabilities ?? new Set();
    this.yoloMode = opts.yolo ?? false;
    this.log = createLogger('soul').child(this.id);
    this.fsm = new SoulStateMachine((from, to) => this.log.debug(`${from} -> ${to}`));
  }

  /** Read-only; every change goes through the wire. */
  get context(): ContextView {
    return this.ctx;
  }

  get yolo(): boolean {
    return this.yoloMode;
  }

  get state(): SoulState {
    return this.fsm.state;
  }

  get running(): boolean {
    return this.controller !== null;
  }

  /** Abort the running turn, if any. Takes effect at the next suspension point. */
  interrupt(reason = 'interrupted by user'): void {
    this.controller?.abort(new TurnInterruptedError(reason));
  }

  // ── Turn loop ──

  async runTurn(input: UserInput, opts: { signal?: AbortSignal } = {}): Promise<TurnOutcome> {
    if (this.controller) throw new SoulBusyError(this.id);

    const { controller, dispose } = linkedAbortController(opts.signal);
    this.controller = controller;
    const signal = controller.signal;
    const turnId = `turn_${randomId()}`;
    this.toolCalls.clear();
    this.startedSteps.clear();
    this.approvalsOpen = 0;

    let steps = 0;
    let text = '';
    try {
      this.fsm.transition('awaiting_model');
      this.commit({ kind: 'TurnBegin', turn_id: turnId, payload: { input } });

      for (let step = 1; step <= this.loop.max_steps_per_run; step++) {
        steps = step;
        if (step > 1) this.fsm.transition('awaiting_model');
        throwIfAborted(signal);

        await this.maybeCompact(turnId, signal);

        const response = await this.callModel(turnId, step, signal);
        text = response.text;
        if (!response.tool_calls.length) {
          this.fsm.transition('completed');
          this.commit({ kind: 'TurnEnd', turn_id: turnId, payload: { status: 'completed', steps } });
          return { turn_id: turnId, status: 'completed', steps, text };
        }

        this.fsm.transition('executing_tools');
        const calls = this.startToolCalls(turnId, step, response.tool_calls);
        await this.hub.dispatchAll(calls, {
          emit: (d) => this.commit(d),
          broker: this.broker,
          signal,
          turnId,
          step,
          agentId: this.id,
          depth: this.depth,
          yolo: this.yolo,
          onStatus: (id, status) => this.onToolStatus(id, status),
        });
        throwIfAborted(signal);
        text = '';
      }
      throw new StepBudgetExceededError(this.loop.max_steps_per_run);
    } catch (e) {
      return this.endAbnormally(turnId, steps, text, e, signal);
    } finally {
      dispose();
      this.controller = null;
      if (this.fsm.state !== 'idle') this.fsm.transition('idle');
    }
  }

  /** Record one change: log it, then project it onto the context. */
  private commit(draft: WireDraft): WireMessage {
    const msg = this.wire.emit(draft);
    this.ctx.apply(msg);
    return msg;
  }

  private async maybeCompact(turnId: string, signal: AbortSignal): Promise<void> {
    const limit = this.compaction.max_context_tokens * this.compaction.compact_at;
    const before = this.ctx.estimateTokens();
    if (before <= limit) return;

    const status = await this.ctx.compact(this.compaction.protected_tail, this.summarizer, {
      signal,
      commit: (s) => this.commit({ kind: 'StatusUpdate', turn_id: turnId, payload: s }),
    });
    if (status) this.log.info(`compacted ${status.replaced} messages (${status.tokens_before} -> ${status.tokens_after} tokens)`);
    else this.log.debug(`over the compaction threshold (${before} tokens) but nothing to fold`);
  }

  private async callModel(turnId: string, step: number, signal: AbortSignal): Promise<ModelResponse> {
    const messages = this.ctx.iterate();
    const request = {
      system_prompt: this.systemPrompt,
      messages: this.capabilities.has('thinking') ? messages : withoutThinking(messages),
      tools: this.hub.schemas(),
      capabilities: this.capabilities,
    };

    // Chunks of the running attempt only; a failed attempt leaves nothing behind.
    let streamed: ModelChunk[] = [];
    let response: ModelResponse;
    try {
      response = await withRetry(
        async () => {
          streamed = [];
          const res = await raceAbort(
            this.provider.complete(request, { signal, onChunk: (c) => streamed.push(c) }),
            signal
          );
          if (!res.text && !res.thinking && !res.tool_calls.length && !res.chunks?.length) {
            throw new TransientProviderError('provider returned an empty response');
          }
          return res;
        },
        this.retry,
        {
          signal,
          onRetry: (info) => {
            this.log.warn(`step ${step} attempt ${info.attempt}/${info.maxAttempts} failed: ${info.error.message}`);
            this.commit({
              kind: 'StatusUpdate',
              turn_id: turnId,
              payload: {
                kind: 'retry',
                step,
                attempt: info.attempt,
                max_attempts: info.maxAttempts,
                delay_ms: info.delayMs,
                error: info.error.message,
              },
            });
          },
        }
      );
    } catch (e) {
      // Keep what was already streamed to the user before the interrupt.
      if (signal.aborted) this.emitChunks(turnId, step, streamed);
      throw e;
    }

    const chunks: ModelChunk[] = response.chunks?.length
      ? response.chunks
      : streamed.length
        ? streamed
        : [
            ...(response.thinking ? [{ part: 'thinking' as const, text: response.thinking }] : []),
            ...(response.text ? [{ part: 'text' as const, text: response.text }] : []),
          ];
    this.emitChunks(turnId, step, chunks);
    return response;
  }

  private emitChunks(turnId: string, step: number, chunks: readonly ModelChunk[]): void {
    for (const c of chunks) {
      if (!c.text) continue;
      this.commit({ kind: 'AssistantDelta', turn_id: turnId, payload: { step, part: c.part, text: c.text } });
    }
  }

  private startToolCalls(turnId: string, step: number, requested: readonly ModelToolCall[]): ModelToolCall[] {
    const seen = new Set<string>();
    return requested.map((tc) => {
      const id = tc.id && !seen.has(tc.id) && !this.toolCalls.has(tc.id) ? tc.id : `call_${randomId()}`;
      seen.add(id);
      const call: ModelToolCall = { id, name: tc.name, args: tc.args };
      this.toolCalls.set(id, { ...call, status: 'pending' });
      this.startedSteps.set(id, step);
      this.commit({
        kind: 'ToolCallStarted',
        turn_id: turnId,
        tool_call_id: id,
        payload: { step, name: call.name, args: call.args },
      });
      return call;
    });
  }

  private onToolStatus(id: string, status: ToolCallStatus): void {
    const call = this.toolCalls.get(id);
    const prev = call?.status;
    if (call) call.status = status;

    if (status === 'awaiting_approval') {
      if (this.approvalsOpen++ === 0 && this.fsm.state === 'executing_tools') this.fsm.transition('awaiting_approval');
    } else if (prev === 'awaiting_approval') {
      if (--this.approvalsOpen === 0 && this.fsm.state === 'awaiting_approval') this.fsm.transition('executing_tools');
    }
  }

  // ── Session commands ──

  /**
   * Fold the context now, whatever its size. Resolves to null when there is
   * nothing to fold. Counts as running: `interrupt` aborts the summary.
   */
  async compact(opts: { signal?: AbortSignal } = {}): Promise<CompactionStatus | null> {
    if (this.controller) throw new SoulBusyError(this.id);
    const { controller, dispose } = linkedAbortController(opts.signal);
    this.controller = controller;
    try {
      const status = await this.ctx.compact(this.compaction.protected_tail, this.summarizer, {
        signal: controller.signal,
        commit: (s) => this.commit({ kind: 'StatusUpdate', payload: s }),
      });
      if (status) this.log.info(`compacted ${status.replaced} messages on request`);
      return status;
    } finally {
      dispose();
      this.controller = null;
    }
  }

  /** Forget the conversation. The log keeps it; replay ends up empty as well. */
  clear(): void {
    if (this.controller) throw new SoulBusyError(this.id);
    this.commit({ kind: 'StatusUpdate', payload: { kind: 'clear' } });
    this.toolCalls.clear();
    this.startedSteps.clear();
  }

  /** Skip approval prompts from the next dispatch on. */
  setYolo(enabled: boolean): void {
    if (enabled === this.yoloMode) return;
    this.commit({ kind: 'StatusUpdate', payload: { kind: 'yolo', enabled } });
    this.yoloMode = enabled;
    this.log.info(`yolo ${enabled ? 'on' : 'off'}`);
  }

  // ── Abnormal endings ──

  private endAbnormally(turnId: string, steps: number, text: string, e: unknown, signal: AbortSignal): TurnOutcome {
    // The log is gone; nothing more can be recorded.
    if (e instanceof LogWriteError) {
      const st = this.fsm.state;
      if (st !== 'idle' && !isTerminalState(st)) this.fsm.transition('failed');
      throw e;
    }

    if (signal.aborted || e instanceof TurnInterruptedError) {
      this.closeOpenCalls(turnId, 'interrupted', INTERRUPTED_OUTPUT);
      this.fsm.transition('interrupted');
      this.commit({ kind: 'TurnEnd', turn_id: turnId, payload: { status: 'interrupted', steps } });
      return { turn_id: turnId, status: 'interrupted', steps, text };
    }

    const cause: TurnCause = { kind: failureKind(e), message: errorMessage(e) };
    if (cause.kind === 'internal') this.log.error(`turn ${turnId} failed: ${cause.message}`);
    else this.log.warn(`turn ${turnId} failed (${cause.kind}): ${cause.message}`);

    this.closeOpenCalls(turnId, 'failed', e instanceof ToolNotFoundError ? undefined : NOT_RUN_OUTPUT, e);
    this.fsm.transition('failed');
    this.commit({ kind: 'Error', turn_id: turnId, payload: cause });
    this.commit({ kind: 'TurnEnd', turn_id: turnId, payload: { status: 'failed', steps, cause } });
    return { turn_id: turnId, status: 'failed', steps, text, cause };
  }

  /** Give every call of the turn that has no result yet a terminal one. */
  private closeOpenCalls(turnId: string, status: 'interrupted' | 'failed', output?: string, e?: unknown): void {
    for (const call of this.toolCalls.values()) {
      if (TERMINAL_TOOL_CALL_STATUSES.has(call.status)) continue;
      const out =
        output ??
        (e instanceof ToolNotFoundError && e.toolName === call.name ? `Error: ${e.message}` : NOT_RUN_OUTPUT);
      call.status = status;
      this.commit({
        kind: 'ToolCallResult',
        turn_id: turnId,
        tool_call_id: call.id,
        payload: { step: this.stepOf(call.id), status: status === 'interrupted' ? 'interrupted' : 'error', output: out },
      });
    }
  }

  private stepOf(toolCallId: string): number {
    return this.startedSteps.get(toolCallId) ?? 0;
  }

  // ── Recovery ──

  /** Close what a previous process left open in this soul's log. See `recoveryDrafts`. */
  recover(unfinished: Unfinished): RecoveryReport {
    if (this.controller) throw new SoulBusyError(this.id);
    for (const call of unfinished.dangling) this.log.info(`recovering ${call.name} (${call.id}), last seen ${call.status}`);
    for (const draft of recoveryDrafts(unfinished)) this.commit(draft);
    return { interruptedCalls: unfinished.dangling.length, closedTurn: unfinished.openTurn !== null };
  }
}
