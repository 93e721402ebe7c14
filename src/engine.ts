/**
 * Wiring for one session: lock, log replay, recovery, the root soul, its
 * tools and the channels watching it.
 */

import { resolveConfig, type AgentwireConfig } from './config.js';
import type { Summarizer } from './context/compaction.js';
import type { ContextView } from './context/context.js';
import type { TokenEstimator } from './context/estimator.js';
import { replaySession } from './context/replay.js';
import { AgentwireError, errorMessage } from './errors.js';
import { ApprovalBroker, type ApprovalResponder } from './hub/approval.js';
import type { ToolCapability } from './hub/capability.js';
import { ToolHub } from './hub/hub.js';
import { createLogger, setLogLevel } from './log.js';
import { connectMcpServers, type McpConnection } from './mcp.js';
import type { ModelProvider } from './provider/provider.js';
import type { RetryPolicy } from './provider/retry.js';
import { SessionLock } from './session/lock.js';
import { SessionLog } from './session/log.js';
import { SessionStore, type Session } from './session/store.js';
import { SoulArena } from './soul/arena.js';
import { Soul, type RecoveryReport } from './soul/soul.js';
import { SubagentOrchestrator } from './subagent/orchestrator.js';
import { createTaskTool } from './subagent/task-tool.js';
import type { ModelCapabilities, TurnOutcome, UserInput } from './types.js';
import { WireChannel, type ChannelCloseReason, type ChannelStreams } from './wire/channel.js';
import type { CompactionStatus } from './wire/message.js';
import { Wire } from './wire/wire.js';

const log = createLogger('engine');

export type EngineOptions = {
  workDir: string;
  provider: ModelProvider;
  tools?: ToolCapability[];
  /** Fully resolved configuration; defaults when omitted. */
  config?: AgentwireConfig;
  systemPrompt?: string;
  capabilities?: ModelCapabilities;
  /** `new` (default), `last`, or a session id. */
  resume?: string;
  /** Answers approval prompts when no channel client does. */
  approvalResponder?: ApprovalResponder;
  summarizer?: Summarizer;
  estimator?: TokenEstimator;
  retryPolicy?: RetryPolicy;
  /** How long to wait for another writer to let go of the session. */
  lockWaitMs?: number;
  clock?: () => string;
};

/** Root recovery plus the subagents whose turns were closed; `interruptedCalls` counts every agent. */
export type SessionRecovery = RecoveryReport & { subagents: number };

export class Engine {
  private readonly channels = new Set<WireChannel>();
  private closed = false;
  private inFlight: Promise<unknown> | null = null;

  constructor(
    readonly session: Session,
    readonly wire: Wire,
    readonly soul: Soul,
    readonly hub: ToolHub,
    readonly broker: ApprovalBroker,
    readonly arena: SoulArena,
    readonly orchestrator: SubagentOrchestrator,
    /** What recovery closed when the session was reopened. */
    readonly recovery: SessionRecovery,
    private readonly sink: SessionLog,
    private readonly lock: SessionLock,
    private readonly mcp: McpConnection | null
  ) {}

  get context(): ContextView {
    return this.soul.context;
  }

  runTurn(input: UserInput, opts: { signal?: AbortSignal } = {}): Promise<TurnOutcome> {
    if (this.closed) return Promise.reject(new AgentwireError('engine is closed'));
    return this.track(this.soul.runTurn(input, opts));
  }

  /** Summarize the conversation now rather than waiting for the threshold. */
  compact(opts: { signal?: AbortSignal } = {}): Promise<CompactionStatus | null> {
    if (this.closed) return Promise.reject(new AgentwireError('engine is closed'));
    return this.track(this.soul.compact(opts));
  }

  clear(): void {
    if (this.closed) throw new AgentwireError('engine is closed');
    this.soul.clear();
  }

  setYolo(enabled: boolean): void {
    if (this.closed) throw new AgentwireError('engine is closed');
    this.soul.setYolo(enabled);
  }

  private track<T>(work: Promise<T>): Promise<T> {
    this.inFlight = work;
    const settle = () => {
      if (this.inFlight === work) this.inFlight = null;
    };
    work.then(settle, settle);
    return work;
  }

  interrupt(reason?: string): void {
    this.soul.interrupt(reason);
  }

  /** Attach a client. Lines for every later message go to `output`. */
  attachChannel(streams: ChannelStreams, opts: { onClose?: (reason: ChannelCloseReason) => void } = {}): WireChannel {
    if (this.closed) throw new AgentwireError('engine is closed');
    const channel = new WireChannel(this.wire, this.broker, streams, {
      onClose: (reason) => {
        this.channels.delete(channel);
        opts.onClose?.(reason);
      },
    });
    this.channels.add(channel);
    return channel;
  }

  /** Interrupt anything running, detach clients, and give up the session. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.soul.interrupt('engine closing');
    // The interrupted work still records its ending before the log closes.
    if (this.inFlight) await Promise.allSettled([this.inFlight]);
    await this.orchestrator.settle();
    for (const ch of [...this.channels]) ch.close();
    await this.mcp?.close();
    this.sink.close();
    await this.lock.release();
    log.debug(`closed session ${this.session.id}`);
  }
}

async function openSession(store: SessionStore, workDir: string, resume: string): Promise<Session> {
  if (resume === 'new') return store.create(workDir);
  if (resume === 'last') {
    const last = await store.continueLast(workDir);
    if (last) return last;
    log.info('no previous session here; starting a new one');
    return store.create(workDir);
  }
  const session = await store.open(workDir, resume);
  if (!session) throw new AgentwireError(`no session ${resume} for ${workDir}`);
  return session;
}

export async function createEngine(opts: EngineOptions): Promise<Engine> {
  const config = opts.config ?? resolveConfig();
  setLogLevel(config.log_level);

  const store = new SessionStore(config.state_dir);
  const session = await openSession(store, opts.workDir, opts.resume ?? 'new');
  const lock = new SessionLock(session.dir, session.id);
  await lock.acquire({ waitMs: opts.lockWaitMs });

  let sink: SessionLog | null = null;
  let mcp: McpConnection | null = null;
  try {
    const replay = await replaySession(session.log_path, { estimator: opts.estimator });
    if (replay.tornTail) log.warn(`session ${session.id}: dropped a torn final log line`);
    sink = SessionLog.open(session.log_path, replay.validBytes);

    const wire = Wire.create({ sessionId: session.id, sink, lastSeq: replay.lastSeq, clock: opts.clock });
    const broker = new ApprovalBroker({ responder: opts.approvalResponder });

    const tools = [...(opts.tools ?? [])];
    if (config.mcp.servers.length) {
      mcp = await connectMcpServers(config.mcp.servers, {
        timeoutMs: config.mcp.call_timeout_sec * 1000,
        exclude: tools.map((t) => t.name),
      });
      tools.push(...mcp.tools);
    }
    const hub = new ToolHub(tools);

    const arena = new SoulArena();
    const orchestrator = new SubagentOrchestrator({
      wire,
      arena,
      provider: opts.provider,
      broker,
      config,
      capabilities: opts.capabilities,
      summarizer: opts.summarizer,
      estimator: opts.estimator,
      retryPolicy: opts.retryPolicy,
    });
    const taskTool = createTaskTool(orchestrator);
    if (config.sub_agents.max_depth >= 1) hub.register(taskTool);

    const soul = new Soul({
      wire,
      context: replay.context,
      provider: opts.provider,
      hub,
      broker,
      loopControl: config.loop_control,
      compaction: config.compaction,
      systemPrompt: opts.systemPrompt,
      capabilities: opts.capabilities,
      summarizer: opts.summarizer,
      retryPolicy: opts.retryPolicy,
      yolo: replay.yolo ?? config.yolo,
    });
    arena.add(soul);

    // Children first: a Task result may only follow its child's TurnEnd.
    const subagentCalls = orchestrator.recover(replay.subagents);
    const root = soul.recover(replay);
    const recovery: SessionRecovery = {
      interruptedCalls: root.interruptedCalls + subagentCalls,
      closedTurn: root.closedTurn,
      subagents: replay.subagents.length,
    };
    if (recovery.interruptedCalls || recovery.closedTurn || recovery.subagents) {
      log.warn(
        `session ${session.id}: recovered ${recovery.interruptedCalls} unfinished tool call(s)` +
          (recovery.subagents ? ` across ${recovery.subagents} subagent(s)` : '') +
          (recovery.closedTurn ? ' and closed the last turn' : '')
      );
    }

    return new Engine(session, wire, soul, hub, broker, arena, orchestrator, recovery, sink, lock, mcp);
  } catch (e) {
    log.debug(`opening session ${session.id} failed: ${errorMessage(e)}`);
    await mcp?.close();
    sink?.close();
    await lock.release();
    throw e;
  }
}
