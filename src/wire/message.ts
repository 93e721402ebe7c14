import type {
  ApprovalDecision,
  ToolResultStatus,
  TurnCause,
  TurnFailureKind,
  TurnStatus,
  UserInput,
} from '../types.js';

export type WireType = 'event' | 'request' | 'response';

export type RetryStatus = {
  kind: 'retry';
  step: number;
  /** Attempt that just failed, 1-based. */
  attempt: number;
  max_attempts: number;
  delay_ms: number;
  error: string;
};

export type CompactionStatus = {
  kind: 'compaction';
  /** Number of leading messages folded into the summary. */
  replaced: number;
  summary: string;
  tokens_before: number;
  tokens_after: number;
};

/** The conversation was emptied; later messages start from nothing. */
export type ClearStatus = { kind: 'clear' };

/** Approval prompts switched off (or back on) for the rest of the session. */
export type YoloStatus = { kind: 'yolo'; enabled: boolean };

export type StatusPayload = RetryStatus | CompactionStatus | ClearStatus | YoloStatus;

/** Payload shape per message kind. */
export type WirePayloads = {
  TurnBegin: { input: UserInput };
  AssistantDelta: { step: number; part: 'text' | 'thinking'; text: string };
  ToolCallStarted: { step: number; name: string; args: Record<string, unknown> };
  ToolCallResult: { step: number; status: ToolResultStatus; output: string };
  StatusUpdate: StatusPayload;
  TurnEnd: { status: TurnStatus; steps: number; cause?: TurnCause };
  Error: { kind: TurnFailureKind; message: string };
  ApprovalRequest: { request_id: string; tool_name: string; args: Record<string, unknown>; summary: string };
  ApprovalResponse: { request_id: string; decision: ApprovalDecision };
};

export type WireKind = keyof WirePayloads;

export const WIRE_KINDS: readonly WireKind[] = [
  'TurnBegin',
  'AssistantDelta',
  'ToolCallStarted',
  'ToolCallResult',
  'StatusUpdate',
  'TurnEnd',
  'Error',
  'ApprovalRequest',
  'ApprovalResponse',
];

export function isWireKind(v: unknown): v is WireKind {
  return typeof v === 'string' && (WIRE_KINDS as readonly string[]).includes(v);
}

export function wireTypeOf(kind: WireKind): WireType {
  if (kind === 'ApprovalRequest') return 'request';
  if (kind === 'ApprovalResponse') return 'response';
  return 'event';
}

export type WireEnvelope = {
  /** Per-session, +1 for every emitted message. */
  seq: number;
  session_id: string;
  /** Emitting soul. The root soul is `root`. */
  agent_id: string;
  /** Task tool-call id that spawned the emitting subagent. */
  parent_id?: string;
  turn_id?: string;
  tool_call_id?: string;
  ts: string;
  type: WireType;
};

export type WireMessage = {
  [K in WireKind]: WireEnvelope & { kind: K; payload: WirePayloads[K] };
}[WireKind];

export type WireMessageOf<K extends WireKind> = Extract<WireMessage, { kind: K }>;

/** What an emitter supplies; the Wire fills in the rest of the envelope. */
export type WireDraft = {
  [K in WireKind]: { kind: K; payload: WirePayloads[K]; turn_id?: string; tool_call_id?: string };
}[WireKind];

export const ROOT_AGENT_ID = 'root';
