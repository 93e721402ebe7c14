import { ProtocolError } from '../errors.js';
import type { ApprovalDecision, TextPart, ToolResultStatus, TurnCause, TurnFailureKind, TurnStatus, UserInput } from '../types.js';
import { isRecord } from '../utils.js';

import {
  isWireKind,
  type StatusPayload,
  type WireEnvelope,
  type WireKind,
  type WireMessage,
  type WirePayloads,
} from './message.js';

type WireBody = { [K in WireKind]: { kind: K; payload: WirePayloads[K] } }[WireKind];

const WIRE_TYPES = ['event', 'request', 'response'] as const;
const RESULT_STATUSES: readonly ToolResultStatus[] = ['ok', 'error', 'denied', 'interrupted'];
const TURN_STATUSES: readonly TurnStatus[] = ['completed', 'failed', 'interrupted'];
const FAILURE_KINDS: readonly TurnFailureKind[] = [
  'provider_fatal',
  'provider_retries_exhausted',
  'step_budget_exceeded',
  'tool_not_found',
  'internal',
];
const DECISIONS: readonly ApprovalDecision[] = ['approve', 'deny', 'always_allow'];

// ── Field readers ────────────────────────────────────────────────────────

function str(o: Record<string, unknown>, key: string, where: string): string {
  const v = o[key];
  if (typeof v !== 'string') throw new ProtocolError(`${where}.${key} must be a string`);
  return v;
}

function optStr(o: Record<string, unknown>, key: string, where: string): string | undefined {
  const v = o[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== 'string') throw new ProtocolError(`${where}.${key} must be a string`);
  return v;
}

function int(o: Record<string, unknown>, key: string, where: string): number {
  const v = o[key];
  if (typeof v !== 'number' || !Number.isInteger(v)) throw new ProtocolError(`${where}.${key} must be an integer`);
  return v;
}

function record(o: Record<string, unknown>, key: string, where: string): Record<string, unknown> {
  const v = o[key];
  if (!isRecord(v)) throw new ProtocolError(`${where}.${key} must be an object`);
  return v;
}

function oneOf<T extends string>(o: Record<string, unknown>, key: string, allowed: readonly T[], where: string): T {
  const v = o[key];
  const hit = allowed.find((a) => a === v);
  if (hit === undefined) throw new ProtocolError(`${where}.${key} must be one of ${allowed.join(', ')}`);
  return hit;
}

function userInput(p: Record<string, unknown>): UserInput {
  const v = p.input;
  if (typeof v === 'string') return v;
  if (Array.isArray(v)) {
    return v.map((part, i): TextPart => {
      if (!isRecord(part) || part.type !== 'text') throw new ProtocolError(`payload.input[${i}] must be a text part`);
      return { type: 'text', text: str(part, 'text', `payload.input[${i}]`) };
    });
  }
  throw new ProtocolError('payload.input must be a string or an array of text parts');
}

function turnCause(p: Record<string, unknown>): TurnCause | undefined {
  if (p.cause === undefined || p.cause === null) return undefined;
  const c = record(p, 'cause', 'payload');
  return { kind: oneOf(c, 'kind', FAILURE_KINDS, 'payload.cause'), message: str(c, 'message', 'payload.cause') };
}

function statusPayload(p: Record<string, unknown>): StatusPayload | null {
  const w = 'payload';
  switch (p.kind) {
    case 'retry':
      return {
        kind: 'retry',
        step: int(p, 'step', w),
        attempt: int(p, 'attempt', w),
        max_attempts: int(p, 'max_attempts', w),
        delay_ms: int(p, 'delay_ms', w),
        error: str(p, 'error', w),
      };
    case 'compaction':
      return {
        kind: 'compaction',
        replaced: int(p, 'replaced', w),
        summary: str(p, 'summary', w),
        tokens_before: int(p, 'tokens_before', w),
        tokens_after: int(p, 'tokens_after', w),
      };
    case 'clear':
      return { kind: 'clear' };
    case 'yolo': {
      if (typeof p.enabled !== 'boolean') throw new ProtocolError(`${w}.enabled must be a boolean`);
      return { kind: 'yolo', enabled: p.enabled };
    }
    default:
      // Status kinds from newer writers are skipped, like unknown message kinds.
      return null;
  }
}

function decodeBody(kind: WireKind, p: Record<string, unknown>): WireBody | null {
  const w = 'payload';
  switch (kind) {
    case 'TurnBegin':
      return { kind, payload: { input: userInput(p) } };
    case 'AssistantDelta':
      return {
        kind,
        payload: { step: int(p, 'step', w), part: oneOf(p, 'part', ['text', 'thinking'], w), text: str(p, 'text', w) },
      };
    case 'ToolCallStarted':
      return { kind, payload: { step: int(p, 'step', w), name: str(p, 'name', w), args: record(p, 'args', w) } };
    case 'ToolCallResult':
      return {
        kind,
        payload: { step: int(p, 'step', w), status: oneOf(p, 'status', RESULT_STATUSES, w), output: str(p, 'output', w) },
      };
    case 'StatusUpdate': {
      const payload = statusPayload(p);
      return payload ? { kind, payload } : null;
    }
    case 'TurnEnd': {
      const cause = turnCause(p);
      return {
        kind,
        payload: { status: oneOf(p, 'status', TURN_STATUSES, w), steps: int(p, 'steps', w), ...(cause ? { cause } : {}) },
      };
    }
    case 'Error':
      return { kind, payload: { kind: oneOf(p, 'kind', FAILURE_KINDS, w), message: str(p, 'message', w) } };
    case 'ApprovalRequest':
      return {
        kind,
        payload: {
          request_id: str(p, 'request_id', w),
          tool_name: str(p, 'tool_name', w),
          args: record(p, 'args', w),
          summary: str(p, 'summary', w),
        },
      };
    case 'ApprovalResponse':
      return { kind, payload: approvalResponsePayload(p) };
  }
}

function approvalResponsePayload(p: Record<string, unknown>): WirePayloads['ApprovalResponse'] {
  return { request_id: str(p, 'request_id', 'payload'), decision: oneOf(p, 'decision', DECISIONS, 'payload') };
}

function parseLine(line: string): Record<string, unknown> {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    throw new ProtocolError('line is not valid JSON', line);
  }
  if (!isRecord(raw)) throw new ProtocolError('line is not a JSON object', line);
  return raw;
}

// ── Public API ───────────────────────────────────────────────────────────

export function encodeWireMessage(msg: WireMessage): string {
  return JSON.stringify(msg);
}

/**
 * Parse one log or channel line. Returns null for kinds this reader does not
 * know; throws ProtocolError when a known message is malformed.
 */
export function decodeWireMessage(line: string): WireMessage | null {
  const raw = parseLine(line);
  const kind = raw.kind;
  if (typeof kind !== 'string') throw new ProtocolError('message has no kind', line);
  if (!isWireKind(kind)) return null;

  try {
    const envelope: WireEnvelope = {
      seq: int(raw, 'seq', 'message'),
      session_id: str(raw, 'session_id', 'message'),
      agent_id: str(raw, 'agent_id', 'message'),
      ts: str(raw, 'ts', 'message'),
      type: oneOf(raw, 'type', WIRE_TYPES, 'message'),
    };
    const parentId = optStr(raw, 'parent_id', 'message');
    const turnId = optStr(raw, 'turn_id', 'message');
    const toolCallId = optStr(raw, 'tool_call_id', 'message');
    if (parentId !== undefined) envelope.parent_id = parentId;
    if (turnId !== undefined) envelope.turn_id = turnId;
    if (toolCallId !== undefined) envelope.tool_call_id = toolCallId;

    const body = decodeBody(kind, record(raw, 'payload', 'message'));
    if (!body) return null;
    return { ...envelope, ...body };
  } catch (e) {
    if (e instanceof ProtocolError && e.line === undefined) throw new ProtocolError(`${kind}: ${e.message}`, line);
    throw e;
  }
}

/**
 * Parse a line a client sent over a channel. Clients may omit the envelope;
 * only ApprovalResponse is accepted. Unknown kinds yield null.
 */
export function decodeInboundLine(line: string): WirePayloads['ApprovalResponse'] | null {
  const raw = parseLine(line);
  const kind = raw.kind;
  if (typeof kind !== 'string') throw new ProtocolError('message has no kind', line);
  if (!isWireKind(kind)) return null;
  if (kind !== 'ApprovalResponse') throw new ProtocolError(`clients may not send ${kind}`, line);
  try {
    return approvalResponsePayload(record(raw, 'payload', 'message'));
  } catch (e) {
    if (e instanceof ProtocolError) throw new ProtocolError(`${kind}: ${e.message}`, line);
    throw e;
  }
}
