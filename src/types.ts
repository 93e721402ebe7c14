export type Role = 'system' | 'user' | 'assistant' | 'tool';

export type TextPart = { type: 'text'; text: string };
export type ThinkingPart = { type: 'thinking'; text: string };
export type ToolCallPart = {
  type: 'tool_call';
  id: string;
  name: string;
  args: Record<string, unknown>;
};
export type ToolResultPart = {
  type: 'tool_result';
  tool_call_id: string;
  output: string;
  is_error: boolean;
};

export type ContentPart = TextPart | ThinkingPart | ToolCallPart | ToolResultPart;

export type Message = {
  role: Role;
  content: ContentPart[];
  created_at: string;
  /** Set on the synthetic message that replaced a compacted prefix. */
  summary?: true;
};

export type UserInput = string | Array<TextPart>;

// --- Tool calls ---

export type ToolCallStatus =
  | 'pending'
  | 'awaiting_approval'
  | 'approved'
  | 'denied'
  | 'executing'
  | 'completed'
  | 'failed'
  | 'interrupted';

export const TERMINAL_TOOL_CALL_STATUSES: ReadonlySet<ToolCallStatus> = new Set([
  'denied',
  'completed',
  'failed',
  'interrupted',
]);

export type ToolCall = {
  id: string;
  name: string;
  args: Record<string, unknown>;
  status: ToolCallStatus;
};

/** Outcome of one dispatched tool call, as fed back to the model. */
export type ToolResultStatus = 'ok' | 'error' | 'denied' | 'interrupted';

export type ToolResult = {
  tool_call_id: string;
  status: ToolResultStatus;
  output: string;
};

export type ToolSchema = {
  name: string;
  description: string;
  // JSON schema for the arguments object
  parameters: Record<string, unknown>;
};

// --- Approval ---

export type ApprovalDecision = 'approve' | 'deny' | 'always_allow';

export type ApprovalPolicy = 'never' | 'always' | 'session';

// --- Turns ---

export type TurnStatus = 'completed' | 'failed' | 'interrupted';

export type TurnFailureKind =
  | 'provider_fatal'
  | 'provider_retries_exhausted'
  | 'step_budget_exceeded'
  | 'tool_not_found'
  | 'internal';

export type TurnCause = {
  kind: TurnFailureKind;
  message: string;
};

export type TurnOutcome = {
  turn_id: string;
  status: TurnStatus;
  steps: number;
  /** Final assistant text (partial when interrupted, empty when failed before any answer). */
  text: string;
  cause?: TurnCause;
};

export type ModelCapability = 'thinking' | 'image_in';

export type ModelCapabilities = ReadonlySet<ModelCapability>;
