import { AgentwireError, errorMessage, isAbortError, ToolNotFoundError } from '../errors.js';
import { createLogger } from '../log.js';
import type { ModelToolCall } from '../provider/provider.js';
import type { ApprovalDecision, ToolCallStatus, ToolResult, ToolSchema } from '../types.js';
import { raceAbort } from '../utils.js';

import type { ApprovalBroker, Emit } from './approval.js';
import {
  defaultSummary,
  formatIssues,
  getArgValidationIssues,
  toolSchemaOf,
  type ToolCapability,
  type ToolContext,
} from './capability.js';

const log = createLogger('hub');

export const DENIED_OUTPUT = 'Tool call was denied by the user.';
export const INTERRUPTED_OUTPUT = 'Tool call was interrupted before it finished.';

export type DispatchContext = {
  /** Records a message on the wire and in the caller's context. */
  emit: Emit;
  broker: ApprovalBroker;
  signal: AbortSignal;
  turnId: string;
  step: number;
  agentId: string;
  depth: number;
  /** Skip every approval prompt. */
  yolo: boolean;
  onStatus?: (toolCallId: string, status: ToolCallStatus) => void;
};

/**
 * Registry of tool capabilities and the dispatcher that runs model-requested
 * calls through validation, approval and execution.
 */
export class ToolHub {
  private readonly tools = new Map<string, ToolCapability>();

  constructor(caps: Iterable<ToolCapability> = []) {
    for (const c of caps) this.register(c);
  }

  register(cap: ToolCapability): void {
    if (this.tools.has(cap.name)) throw new AgentwireError(`tool "${cap.name}" is already registered`);
    this.tools.set(cap.name, cap);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get(name: string): ToolCapability | undefined {
    return this.tools.get(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  /** New hub holding only the named tools. Unknown names are skipped. */
  subset(names: Iterable<string>): ToolHub {
    const out = new ToolHub();
    for (const n of names) {
      const cap = this.tools.get(n);
      if (cap) out.register(cap);
      else log.warn(`subset: no tool named "${n}"`);
    }
    return out;
  }

  schemas(): ToolSchema[] {
    return [...this.tools.values()].map(toolSchemaOf);
  }

  // ── Dispatch ──

  /** Run one call and record its ToolCallResult. */
  async dispatch(call: ModelToolCall, ctx: DispatchContext): Promise<ToolResult> {
    const cap = this.tools.get(call.name);
    if (!cap) throw new ToolNotFoundError(call.name);
    const result = await this.run(cap, call, ctx);
    this.record(result, ctx);
    return result;
  }

  /**
   * Run the calls of one assistant message. Consecutive parallel-safe calls
   * run together; the rest run one at a time. Results are recorded in the
   * order the model asked for them. An unknown name fails before anything
   * runs.
   */
  async dispatchAll(calls: readonly ModelToolCall[], ctx: DispatchContext): Promise<ToolResult[]> {
    const resolved = calls.map((call) => {
      const cap = this.tools.get(call.name);
      if (!cap) throw new ToolNotFoundError(call.name);
      return { call, cap };
    });

    const groups: Array<typeof resolved> = [];
    for (const item of resolved) {
      const last = groups[groups.length - 1];
      if (item.cap.parallelSafe && last && last[0]?.cap.parallelSafe) last.push(item);
      else groups.push([item]);
    }

    const results: ToolResult[] = [];
    for (const group of groups) {
      const batch = await Promise.all(group.map(({ call, cap }) => this.run(cap, call, ctx)));
      for (const r of batch) {
        this.record(r, ctx);
        results.push(r);
      }
    }
    return results;
  }

  private record(result: ToolResult, ctx: DispatchContext): void {
    ctx.emit({
      kind: 'ToolCallResult',
      turn_id: ctx.turnId,
      tool_call_id: result.tool_call_id,
      payload: { step: ctx.step, status: result.status, output: result.output },
    });
  }

  private async run(cap: ToolCapability, call: ModelToolCall, ctx: DispatchContext): Promise<ToolResult> {
    const setStatus = (s: ToolCallStatus) => ctx.onStatus?.(call.id, s);
    const interrupted = (): ToolResult => {
      setStatus('interrupted');
      return { tool_call_id: call.id, status: 'interrupted', output: INTERRUPTED_OUTPUT };
    };

    if (ctx.signal.aborted) return interrupted();

    const issues = getArgValidationIssues(cap.schema, call.args);
    if (issues.length) {
      setStatus('failed');
      return { tool_call_id: call.id, status: 'error', output: formatIssues(cap.name, issues) };
    }

    if (this.needsApproval(cap, ctx)) {
      setStatus('awaiting_approval');
      let decision: ApprovalDecision;
      try {
        decision = await ctx.broker.request(
          ctx.emit,
          {
            toolName: cap.name,
            args: call.args,
            summary: cap.summarize?.(call.args) ?? defaultSummary(cap.name, call.args),
            agentId: ctx.agentId,
            turnId: ctx.turnId,
            toolCallId: call.id,
          },
          ctx.signal
        );
      } catch (e) {
        if (isAbortError(e) || ctx.signal.aborted) return interrupted();
        throw e;
      }
      if (decision === 'deny') {
        setStatus('denied');
        return { tool_call_id: call.id, status: 'denied', output: DENIED_OUTPUT };
      }
      setStatus('approved');
    }

    if (ctx.signal.aborted) return interrupted();
    setStatus('executing');
    const toolCtx: ToolContext = {
      signal: ctx.signal,
      toolCallId: call.id,
      turnId: ctx.turnId,
      step: ctx.step,
      agentId: ctx.agentId,
      depth: ctx.depth,
    };
    try {
      const pending = cap.execute(call.args, toolCtx);
      const out = cap.settlesOnAbort ? await pending : await raceAbort(pending, ctx.signal);
      const output = typeof out === 'string' ? out : out.output;
      const isError = typeof out !== 'string' && out.is_error === true;
      setStatus(isError ? 'failed' : 'completed');
      return { tool_call_id: call.id, status: isError ? 'error' : 'ok', output };
    } catch (e) {
      if (ctx.signal.aborted || isAbortError(e)) return interrupted();
      log.debug(`${cap.name} failed: ${errorMessage(e)}`);
      setStatus('failed');
      return { tool_call_id: call.id, status: 'error', output: `Error: ${errorMessage(e)}` };
    }
  }

  private needsApproval(cap: ToolCapability, ctx: DispatchContext): boolean {
    if (cap.approval === 'never' || ctx.yolo) return false;
    if (cap.approval === 'always') return true;
    return !ctx.broker.hasGrant(cap.name);
  }
}
