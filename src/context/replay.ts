import { readWireLog } from '../session/log.js';
import type { ToolCallStatus } from '../types.js';
import { ROOT_AGENT_ID, type WireMessage } from '../wire/message.js';

import { Context, type ContextOptions } from './context.js';

export type DanglingToolCall = {
  id: string;
  name: string;
  turn_id?: string;
  step: number;
  /** Last state the log shows for the call. */
  status: Extract<ToolCallStatus, 'awaiting_approval' | 'executing'>;
};

export type OpenTurn = {
  turn_id: string;
  /** Highest step the log reached in this turn. */
  steps: number;
};

/** A subagent whose last turn the log leaves open. */
export type UnfinishedSubagent = {
  agentId: string;
  /** Task call that spawned it. */
  parentId: string;
  depth: number;
  dangling: DanglingToolCall[];
  openTurn: OpenTurn | null;
};

export type ReplayResult = {
  context: Context;
  /** Every decoded message, all agents. */
  messages: WireMessage[];
  lastSeq: number;
  validBytes: number;
  tornTail: boolean;
  /** Calls of the agent that were started but never got a result. */
  dangling: DanglingToolCall[];
  /** Turn that began but never ended, if any. */
  openTurn: OpenTurn | null;
  /** Subagents left mid-turn, deepest first. */
  subagents: UnfinishedSubagent[];
  /** Last yolo toggle the root recorded; undefined when it never toggled. */
  yolo?: boolean;
};

/** Tool calls left without a result, and the turn left open, for one agent. */
export function findUnfinished(
  messages: readonly WireMessage[],
  agentId = ROOT_AGENT_ID
): { dangling: DanglingToolCall[]; openTurn: OpenTurn | null } {
  const calls = new Map<string, DanglingToolCall>();
  let openTurn: OpenTurn | null = null;

  for (const m of messages) {
    if (m.agent_id !== agentId) continue;
    switch (m.kind) {
      case 'TurnBegin':
        openTurn = { turn_id: m.turn_id ?? '', steps: 0 };
        break;
      case 'AssistantDelta':
        if (openTurn) openTurn.steps = Math.max(openTurn.steps, m.payload.step);
        break;
      case 'ToolCallStarted':
        if (openTurn) openTurn.steps = Math.max(openTurn.steps, m.payload.step);
        if (m.tool_call_id) {
          calls.set(m.tool_call_id, {
            id: m.tool_call_id,
            name: m.payload.name,
            turn_id: m.turn_id,
            step: m.payload.step,
            status: 'executing',
          });
        }
        break;
      case 'ApprovalRequest': {
        const call = m.tool_call_id ? calls.get(m.tool_call_id) : undefined;
        if (call) call.status = 'awaiting_approval';
        break;
      }
      case 'ApprovalResponse': {
        const call = m.tool_call_id ? calls.get(m.tool_call_id) : undefined;
        if (call) call.status = 'executing';
        break;
      }
      case 'ToolCallResult':
        if (m.tool_call_id) calls.delete(m.tool_call_id);
        break;
      case 'TurnEnd':
        openTurn = null;
        break;
      default:
        break;
    }
  }
  return { dangling: [...calls.values()], openTurn };
}

/**
 * Subagents the log shows with an open turn or a call without a result,
 * deepest first, so each child is closed before the Task call that
 * spawned it.
 */
export function findUnfinishedSubagents(messages: readonly WireMessage[]): UnfinishedSubagent[] {
  const parents = new Map<string, string>();
  const callOwners = new Map<string, string>();
  for (const m of messages) {
    if (m.agent_id !== ROOT_AGENT_ID && m.parent_id && !parents.has(m.agent_id)) parents.set(m.agent_id, m.parent_id);
    if (m.kind === 'ToolCallStarted' && m.tool_call_id) callOwners.set(m.tool_call_id, m.agent_id);
  }

  const depthOf = (agentId: string): number => {
    let depth = 0;
    let current: string | undefined = agentId;
    while (current && current !== ROOT_AGENT_ID && depth <= parents.size) {
      depth++;
      const parentCall = parents.get(current);
      current = parentCall === undefined ? undefined : callOwners.get(parentCall);
    }
    return depth;
  };

  const out: UnfinishedSubagent[] = [];
  for (const [agentId, parentId] of parents) {
    const { dangling, openTurn } = findUnfinished(messages, agentId);
    if (!dangling.length && !openTurn) continue;
    out.push({ agentId, parentId, depth: depthOf(agentId), dangling, openTurn });
  }
  return out.sort((a, b) => b.depth - a.depth);
}

/** The agent's last recorded yolo toggle, if any. */
export function lastYoloSetting(messages: readonly WireMessage[], agentId = ROOT_AGENT_ID): boolean | undefined {
  let enabled: boolean | undefined;
  for (const m of messages) {
    if (m.agent_id === agentId && m.kind === 'StatusUpdate' && m.payload.kind === 'yolo') enabled = m.payload.enabled;
  }
  return enabled;
}

/** Read a session log and rebuild the root context plus what recovery needs. */
export async function replaySession(logPath: string, opts: ContextOptions = {}): Promise<ReplayResult> {
  const contents = await readWireLog(logPath);
  const context = Context.fromWireMessages(contents.messages, opts);
  return {
    context,
    ...contents,
    ...findUnfinished(contents.messages),
    subagents: findUnfinishedSubagents(contents.messages),
    yolo: lastYoloSetting(contents.messages),
  };
}
