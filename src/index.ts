export * from './types.js';
export * from './errors.js';
export {
  DEFAULTS,
  loadConfig,
  resolveConfig,
  type AgentwireConfig,
  type CompactionConfig,
  type ConfigLayer,
  type LoopControl,
  type McpServerConfig,
  type SubagentDefinition,
} from './config.js';
export { createLogger, getLogLevel, setLogLevel, setLogSink, type Logger, type LogLevel } from './log.js';

export { Wire, type WireSink, type WireListener } from './wire/wire.js';
export { WireChannel, type ChannelStreams, type ChannelCloseReason } from './wire/channel.js';
export { encodeWireMessage, decodeWireMessage, decodeInboundLine } from './wire/codec.js';
export * from './wire/message.js';

export { Context, applyWireMessage, type ContextOptions, type ContextView } from './context/context.js';
export {
  replaySession,
  findUnfinished,
  findUnfinishedSubagents,
  lastYoloSetting,
  type ReplayResult,
  type DanglingToolCall,
  type UnfinishedSubagent,
} from './context/replay.js';
export { charEstimator, type TokenEstimator } from './context/estimator.js';
export { ProviderSummarizer, digestSummarizer, type Summarizer } from './context/compaction.js';

export { ToolHub, DENIED_OUTPUT, INTERRUPTED_OUTPUT, type DispatchContext } from './hub/hub.js';
export { ApprovalBroker, approveAll, denyAll, type ApprovalResponder, type ApprovalRequestInfo } from './hub/approval.js';
export type { ToolCapability, ToolContext, ToolOutput } from './hub/capability.js';

export {
  classifyProviderError,
  type ModelProvider,
  type ModelRequest,
  type ModelResponse,
  type ModelChunk,
  type ModelToolCall,
  type CompleteOptions,
} from './provider/provider.js';
export { withRetry, backoffDelay, retryPolicyFrom, type RetryPolicy } from './provider/retry.js';

export { Soul, type SoulOptions, type RecoveryReport } from './soul/soul.js';
export { SoulArena } from './soul/arena.js';
export { SoulStateMachine, type SoulState } from './soul/state.js';
export { SubagentOrchestrator, GENERAL_SUBAGENT, TASK_TOOL_NAME } from './subagent/orchestrator.js';
export { createTaskTool } from './subagent/task-tool.js';

export { SessionStore, type Session, type SessionInfo } from './session/store.js';
export { SessionLock } from './session/lock.js';
export { SessionLog, readWireLog } from './session/log.js';

export { McpClient, LineRpcTransport, StdioRpcTransport, loadMcpTools, connectMcpServers, type RpcTransport } from './mcp.js';
export { createEngine, Engine, type EngineOptions, type SessionRecovery } from './engine.js';
