import { TurnInterruptedError } from '../errors.js';
import type { ToolCapability } from '../hub/capability.js';

import { TASK_TOOL_NAME, type SubagentOrchestrator } from './orchestrator.js';

const EMPTY_REPORT = '(subagent finished without a final message)';

/**
 * Delegation tool. Several Task calls in one assistant message run side by
 * side; each returns the child's final message.
 */
export function createTaskTool(orchestrator: SubagentOrchestrator): ToolCapability {
  const names = orchestrator.listDefinitions().map((d) => `${d.name}: ${d.description}`);
  const tool: ToolCapability = {
    name: TASK_TOOL_NAME,
    description:
      'Delegate a self-contained subtask to a subagent with a fresh context. ' +
      'Returns the subagent\'s final report. Available subagents:\n' +
      names.map((n) => `- ${n}`).join('\n'),
    schema: {
      type: 'object',
      properties: {
        description: { type: 'string', description: 'Short (3-8 word) label for the subtask' },
        prompt: { type: 'string', description: 'Full instructions for the subagent' },
        subagent: { type: 'string', description: 'Subagent to use (default: general)' },
      },
      required: ['description', 'prompt'],
      additionalProperties: false,
    },
    approval: 'never',
    parallelSafe: true,
    // The child's TurnEnd lands in the log before this call's result.
    settlesOnAbort: true,
    summarize: (args) => `Task(${typeof args.description === 'string' ? args.description : '?'})`,
    async execute(args, ctx) {
      const outcome = await orchestrator.runSubagent({
        parentId: ctx.agentId,
        parentDepth: ctx.depth,
        toolCallId: ctx.toolCallId,
        prompt: String(args.prompt),
        subagent: typeof args.subagent === 'string' ? args.subagent : undefined,
        signal: ctx.signal,
      });
      switch (outcome.status) {
        case 'completed':
          return outcome.text || EMPTY_REPORT;
        case 'interrupted':
          throw new TurnInterruptedError('subagent interrupted');
        case 'failed':
          return {
            output: `Subagent failed (${outcome.cause?.kind ?? 'internal'}): ${outcome.cause?.message ?? 'unknown error'}`,
            is_error: true,
          };
      }
    },
  };
  orchestrator.setTaskTool(tool);
  return tool;
}
