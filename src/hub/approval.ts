/**
 * Approval gating between the hub and whoever answers prompts: a wire
 * channel client, or an auto-responder for headless runs.
 *
 * Every request goes out as an ApprovalRequest message and is settled by
 * exactly one ApprovalResponse, which is logged like any other message.
 * Subagents share their root's broker, so grants apply session-wide.
 */

import { errorMessage, TurnInterruptedError } from '../errors.js';
import { createLogger } from '../log.js';
import type { ApprovalDecision } from '../types.js';
import { randomId } from '../utils.js';
import type { WireDraft, WireMessage } from '../wire/message.js';

const log = createLogger('approval');

export type Emit = (draft: WireDraft) => WireMessage;

export type ApprovalRequestInfo = {
  requestId: string;
  toolName: string;
  args: Record<string, unknown>;
  summary: string;
  agentId: string;
  turnId: string;
  toolCallId: string;
};

/** Answers requests without a human. */
export type ApprovalResponder = (req: ApprovalRequestInfo) => ApprovalDecision | Promise<ApprovalDecision>;

export const approveAll: ApprovalResponder = () => 'approve';

export const denyAll: ApprovalResponder = (req) => {
  log.info(`auto-denied ${req.toolName}: ${req.summary}`);
  return 'deny';
};

type Pending = {
  info: ApprovalRequestInfo;
  emit: Emit;
  resolve: (d: ApprovalDecision) => void;
  reject: (e: unknown) => void;
};

export class ApprovalBroker {
  private readonly pending = new Map<string, Pending>();
  private readonly grants = new Set<string>();
  private responder: ApprovalResponder | undefined;

  constructor(opts: { responder?: ApprovalResponder } = {}) {
    this.responder = opts.responder;
  }

  setResponder(responder: ApprovalResponder | undefined): void {
    this.responder = responder;
  }

  /** Whether an always-allow grant exists for the tool in this session. */
  hasGrant(toolName: string): boolean {
    return this.grants.has(toolName);
  }

  grant(toolName: string): void {
    this.grants.add(toolName);
  }

  pendingRequests(): ApprovalRequestInfo[] {
    return [...this.pending.values()].map((p) => p.info);
  }

  /**
   * Emit an ApprovalRequest and wait for its response. Rejects with
   * TurnInterruptedError when `signal` fires first.
   */
  request(
    emit: Emit,
    req: Omit<ApprovalRequestInfo, 'requestId'>,
    signal: AbortSignal
  ): Promise<ApprovalDecision> {
    if (signal.aborted) return Promise.reject(new TurnInterruptedError());

    const info: ApprovalRequestInfo = { requestId: `apr_${randomId()}`, ...req };
    const decision = new Promise<ApprovalDecision>((resolve, reject) => {
      const onAbort = () => {
        this.pending.delete(info.requestId);
        reject(new TurnInterruptedError());
      };
      signal.addEventListener('abort', onAbort, { once: true });
      this.pending.set(info.requestId, {
        info,
        emit,
        resolve: (d) => {
          signal.removeEventListener('abort', onAbort);
          resolve(d);
        },
        reject: (e) => {
          signal.removeEventListener('abort', onAbort);
          reject(e);
        },
      });
    });

    // Registered first: a subscriber may answer from inside the emit.
    try {
      emit({
        kind: 'ApprovalRequest',
        turn_id: info.turnId,
        tool_call_id: info.toolCallId,
        payload: { request_id: info.requestId, tool_name: info.toolName, args: info.args, summary: info.summary },
      });
    } catch (e) {
      this.pending.get(info.requestId)?.reject(e);
      this.pending.delete(info.requestId);
      return decision;
    }

    const responder = this.responder;
    if (responder) {
      Promise.resolve()
        .then(() => responder(info))
        .then(
          (d) => this.respond(info.requestId, d),
          (e: unknown) => {
            log.error(`approval responder failed for ${info.toolName}, denying: ${errorMessage(e)}`);
            this.respond(info.requestId, 'deny');
          }
        )
        // respond() already failed the waiting request; this only reports it.
        .catch((e: unknown) => log.error(`could not record approval response: ${errorMessage(e)}`));
    }
    return decision;
  }

  /**
   * Settle a pending request. Returns false when the id is unknown (already
   * answered, or the turn was interrupted).
   */
  respond(requestId: string, decision: ApprovalDecision): boolean {
    const p = this.pending.get(requestId);
    if (!p) {
      log.warn(`no pending approval request ${requestId}`);
      return false;
    }
    this.pending.delete(requestId);
    try {
      p.emit({
        kind: 'ApprovalResponse',
        turn_id: p.info.turnId,
        tool_call_id: p.info.toolCallId,
        payload: { request_id: requestId, decision },
      });
    } catch (e) {
      p.reject(e);
      throw e;
    }
    if (decision === 'always_allow') this.grant(p.info.toolName);
    p.resolve(decision);
    return true;
  }
}
