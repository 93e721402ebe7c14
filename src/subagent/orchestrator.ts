import type { AgentwireConfig, SubagentDefinition } from '../config.js';
import type { Summarizer } from '../context/compaction.js';
import { Context } from '../context/context.js';
import type { TokenEstimator } from '../context/estimator.js';
import type { UnfinishedSubagent } from '../context/replay.js';
import { AgentwireError, DepthExceededError } from '../errors.js';
import type { ApprovalBroker } from '../hub/approval.js';
import type { ToolCapability } from '../hub/capability.js';
import { ToolHub } from '../hub/hub.js';
import { createLogger } from '../log.js';
import type { ModelProvider } from '../provider/provider.js';
import type { RetryPolicy } from '../provider/retry.js';
import type { SoulArena } from '../soul/arena.js';
import { recoveryDrafts, Soul } from '../soul/soul.js';
import type { ModelCapabilities, TurnOutcome } from '../types.js';
import { randomId } from '../utils.js';
import type { Wire } from '../wire/wire.js';

const log = createLogger('subagent');

export const TASK_TOOL_NAME = 'Task';

export const GENERAL_SUBAGENT: SubagentDefinition = {
  name: 'general',
  description: 'General-purpose agent for self-contained subtasks.',
  system_prompt:
    'You are a subagent working on one delegated task. Complete it with the tools available, ' +
    'then reply with a concise report of what you found or changed. Your final message is returned to the caller.',
  tools: [],
};

export type OrchestratorOptions = {
  /** Root emitter; children get views of it. */
  wire: Wire;
  arena: SoulArena;
  provider: ModelProvider;
  broker: ApprovalBroker;
  config: Pick<AgentwireConfig, 'loop_control' | 'compaction' | 'sub_agents'>;
  capabilities?: ModelCapabilities;
  summarizer?: Summarizer;
  estimator?: TokenEstimator;
  retryPolicy?: RetryPolicy;
};

export type SubagentRequest = {
  /** Agent id of the soul whose Task call this is. */
  parentId: string;
  parentDepth: number;
  toolCallId: string;
  prompt: string;
  subagent?: string;
  signal: AbortSignal;
};

/**
 * Spawns child souls for Task calls. Each child runs one turn against its
 * own empty context and a subset of the parent's tools, emitting through
 * the session's single wire.
 */
export class SubagentOrchestrator {
  private readonly definitions = new Map<string, SubagentDefinition>();
  private taskTool: ToolCapability | undefined;
  private readonly running = new Set<Promise<TurnOutcome>>();

  constructor(private readonly opts: OrchestratorOptions) {
    for (const d of opts.config.sub_agents.definitions) this.definitions.set(d.name, d);
    if (!this.definitions.has(GENERAL_SUBAGENT.name)) this.definitions.set(GENERAL_SUBAGENT.name, GENERAL_SUBAGENT);
  }

  get maxDepth(): number {
    return this.opts.config.sub_agents.max_depth;
  }

  /** Tool handed to children that may spawn further. */
  setTaskTool(tool: ToolCapability): void {
    this.taskTool = tool;
  }

  listDefinitions(): SubagentDefinition[] {
    return [...this.definitions.values()];
  }

  resolveDefinition(name?: string): SubagentDefinition {
    const def = this.definitions.get(name ?? GENERAL_SUBAGENT.name);
    if (!def) {
      throw new AgentwireError(`unknown subagent "${name}"; available: ${[...this.definitions.keys()].join(', ')}`);
    }
    return def;
  }

  /** Tools for a child at `depth`, drawn from its parent's hub. */
  childHub(parentHub: ToolHub, def: SubagentDefinition, depth: number): ToolHub {
    const names = (def.tools.length ? def.tools : parentHub.names()).filter((n) => n !== TASK_TOOL_NAME);
    const hub = parentHub.subset(names);
    if (this.taskTool && depth < this.maxDepth) hub.register(this.taskTool);
    return hub;
  }

  async runSubagent(req: SubagentRequest): Promise<TurnOutcome> {
    const depth = req.parentDepth + 1;
    if (depth > this.maxDepth) throw new DepthExceededError(depth, this.maxDepth);

    const parent = this.opts.arena.get(req.parentId);
    if (!parent) throw new AgentwireError(`parent soul ${req.parentId} is not live`);
    const def = this.resolveDefinition(req.subagent);

    const o = this.opts;
    const child = new Soul({
      wire: o.wire.child(`sub_${randomId()}`, req.toolCallId),
      context: new Context({ estimator: o.estimator }),
      provider: o.provider,
      hub: this.childHub(parent.hub, def, depth),
      broker: o.broker,
      loopControl: o.config.loop_control,
      compaction: o.config.compaction,
      depth,
      parentId: parent.id,
      systemPrompt: def.system_prompt,
      capabilities: o.capabilities,
      summarizer: o.summarizer,
      retryPolicy: o.retryPolicy,
      yolo: parent.yolo,
    });

    o.arena.add(child);
    log.info(`${child.id} (${def.name}, depth ${depth}) started for ${req.parentId}/${req.toolCallId}`);
    const turn = child.runTurn(req.prompt, { signal: req.signal });
    this.running.add(turn);
    try {
      const outcome = await turn;
      log.info(`${child.id} ended ${outcome.status} after ${outcome.steps} step(s)`);
      return outcome;
    } finally {
      this.running.delete(turn);
      o.arena.release(child.id);
    }
  }

  /**
   * Close the turns of subagents a previous process left running, in the
   * order given (deepest first). Their souls are gone, so nothing is
   * re-run; the messages only go to the log under each agent's id.
   */
  recover(agents: readonly UnfinishedSubagent[]): number {
    let calls = 0;
    for (const a of agents) {
      const wire = this.opts.wire.child(a.agentId, a.parentId);
      for (const draft of recoveryDrafts(a)) wire.emit(draft);
      calls += a.dangling.length;
      log.info(`${a.agentId} (depth ${a.depth}): closed ${a.dangling.length} call(s)${a.openTurn ? ' and its turn' : ''}`);
    }
    return calls;
  }

  /** Number of child turns still running. */
  get active(): number {
    return this.running.size;
  }

  /** Resolves once every running child turn has recorded its end. */
  async settle(): Promise<void> {
    while (this.running.size) await Promise.allSettled([...this.running]);
  }
}
