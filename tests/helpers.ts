import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { DEFAULTS, type CompactionConfig, type LoopControl } from '../src/config.js';
import type { Summarizer } from '../src/context/compaction.js';
import { Context } from '../src/context/context.js';
import { FatalProviderError } from '../src/errors.js';
import { ApprovalBroker, type ApprovalResponder } from '../src/hub/approval.js';
import type { ToolCapability, ToolContext } from '../src/hub/capability.js';
import { ToolHub } from '../src/hub/hub.js';
import type { CompleteOptions, ModelProvider, ModelRequest, ModelResponse } from '../src/provider/provider.js';
import type { RetryPolicy } from '../src/provider/retry.js';
import { Soul } from '../src/soul/soul.js';
import type { Message, ModelCapabilities } from '../src/types.js';
import type { WireDraft, WireKind, WireMessage, WireMessageOf } from '../src/wire/message.js';
import { Wire, type WireSink } from '../src/wire/wire.js';

export async function mkTempDir(prefix = 'agentwire-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/** 2026-01-01T00:00:00.000Z, 00:00:01, ... one second per call. */
export function fixedClock(): () => string {
  let n = 0;
  return () => new Date(Date.UTC(2026, 0, 1, 0, 0, n++)).toISOString();
}

export class MemorySink implements WireSink {
  readonly messages: WireMessage[] = [];
  append(msg: WireMessage): void {
    this.messages.push(msg);
  }
}

export function kinds(messages: readonly WireMessage[]): string[] {
  return messages.map((m) => m.kind);
}

export function ofKind<K extends WireKind>(messages: readonly WireMessage[], kind: K): Array<WireMessageOf<K>> {
  return messages.filter((m): m is WireMessageOf<K> => m.kind === kind);
}

export const NO_DELAY: RetryPolicy = { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, jitter: 0 };

export function loopControl(over: Partial<LoopControl> = {}): LoopControl {
  return { ...DEFAULTS.loop_control, retry_base_delay_ms: 0, retry_max_delay_ms: 0, retry_jitter: 0, ...over };
}

export function compactionConfig(over: Partial<CompactionConfig> = {}): CompactionConfig {
  return { ...DEFAULTS.compaction, ...over };
}

// ── Provider ──

export type ScriptStep =
  | ModelResponse
  | Error
  | ((req: ModelRequest, opts: CompleteOptions) => Promise<ModelResponse>);

export function reply(text: string): ModelResponse {
  return { text, tool_calls: [] };
}

export function callTools(...calls: Array<[id: string, name: string, args?: Record<string, unknown>]>): ModelResponse {
  return { text: '', tool_calls: calls.map(([id, name, args]) => ({ id, name, args: args ?? {} })) };
}

/** Plays back a fixed script, one step per complete() call, and records every request. */
export class ScriptedProvider implements ModelProvider {
  readonly requests: ModelRequest[] = [];
  private readonly script: ScriptStep[];

  constructor(script: ScriptStep[]) {
    this.script = [...script];
  }

  get remaining(): number {
    return this.script.length;
  }

  async complete(req: ModelRequest, opts: CompleteOptions): Promise<ModelResponse> {
    this.requests.push({ ...req, messages: structuredClone([...req.messages]) });
    const next = this.script.shift();
    if (next === undefined) throw new FatalProviderError('script exhausted');
    if (next instanceof Error) throw next;
    if (typeof next === 'function') return next(req, opts);
    return next;
  }
}

/** Provider that routes by system prompt, so parents and subagents can share one. */
export class RoutedProvider implements ModelProvider {
  constructor(private readonly routes: Array<{ match: (req: ModelRequest) => boolean; provider: ModelProvider }>) {}

  complete(req: ModelRequest, opts: CompleteOptions): Promise<ModelResponse> {
    const route = this.routes.find((r) => r.match(req));
    if (!route) return Promise.reject(new FatalProviderError(`no route for system prompt "${req.system_prompt}"`));
    return route.provider.complete(req, opts);
  }
}

// ── Tools ──

export type RecordingTool = ToolCapability & { calls: Array<{ args: Record<string, unknown>; ctx: ToolContext }> };

export function recordingTool(
  name: string,
  opts: Partial<Pick<ToolCapability, 'approval' | 'parallelSafe' | 'schema' | 'settlesOnAbort'>> & {
    run?: (args: Record<string, unknown>, ctx: ToolContext) => Promise<string | { output: string; is_error?: boolean }>;
  } = {}
): RecordingTool {
  const calls: RecordingTool['calls'] = [];
  return {
    name,
    description: `${name} tool`,
    schema: opts.schema ?? { type: 'object', properties: {} },
    approval: opts.approval ?? 'never',
    parallelSafe: opts.parallelSafe,
    settlesOnAbort: opts.settlesOnAbort,
    calls,
    async execute(args, ctx) {
      calls.push({ args, ctx });
      return opts.run ? opts.run(args, ctx) : `${name} ok`;
    },
  };
}

/** Resolves once `signal` fires; never on its own. */
export function untilAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Polls until `check` holds; fails after `ms`. */
export async function waitFor(check: () => boolean, ms = 2000): Promise<void> {
  const deadline = Date.now() + ms;
  while (!check()) {
    if (Date.now() > deadline) throw new Error('condition not met in time');
    await delay(5);
  }
}

// ── Souls ──

export type SoulRig = {
  soul: Soul;
  wire: Wire;
  sink: MemorySink;
  context: Context;
  hub: ToolHub;
  broker: ApprovalBroker;
};

export function makeSoul(opts: {
  provider: ModelProvider;
  tools?: ToolCapability[];
  responder?: ApprovalResponder;
  loop?: Partial<LoopControl>;
  compaction?: Partial<CompactionConfig>;
  yolo?: boolean;
  retryPolicy?: RetryPolicy;
  capabilities?: ModelCapabilities;
  summarizer?: Summarizer;
}): SoulRig {
  const sink = new MemorySink();
  const wire = Wire.create({ sessionId: 'test-session', sink, clock: fixedClock() });
  const context = new Context();
  const hub = new ToolHub(opts.tools ?? []);
  const broker = new ApprovalBroker({ responder: opts.responder });
  const soul = new Soul({
    wire,
    context,
    provider: opts.provider,
    hub,
    broker,
    loopControl: loopControl(opts.loop),
    compaction: compactionConfig(opts.compaction),
    retryPolicy: opts.retryPolicy,
    yolo: opts.yolo,
    capabilities: opts.capabilities,
    summarizer: opts.summarizer,
  });
  return { soul, wire, sink, context, hub, broker };
}

/** Emits on `wire` and projects onto `ctx`, the way a soul commits. */
export function committer(wire: Wire, ctx: Context): (draft: WireDraft) => WireMessage {
  return (draft) => {
    const msg = wire.emit(draft);
    ctx.apply(msg);
    return msg;
  };
}

export function textMessage(role: Message['role'], text: string, createdAt = '2026-01-01T00:00:00.000Z'): Message {
  return { role, content: [{ type: 'text', text }], created_at: createdAt };
}
