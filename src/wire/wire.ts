import { createLogger } from '../log.js';
import { errorMessage } from '../errors.js';
import { nowIso } from '../utils.js';

import { ROOT_AGENT_ID, wireTypeOf, type WireDraft, type WireMessage } from './message.js';

const log = createLogger('wire');

/** Durable destination for emitted messages. Must append synchronously. */
export interface WireSink {
  append(msg: WireMessage): void;
}

export type WireListener = (msg: WireMessage) => void;

type Bus = {
  sessionId: string;
  seq: number;
  sink?: WireSink;
  listeners: Set<WireListener>;
  clock: () => string;
};

/**
 * Single writer for one session. Every emit assigns the next sequence
 * number, appends to the sink, then fans out to subscribers, all
 * synchronously, so log order is emission order.
 *
 * `child()` views share the sequencer and sink but stamp their own
 * agent_id / parent_id.
 */
export class Wire {
  private constructor(
    private readonly bus: Bus,
    readonly agentId: string,
    readonly parentId?: string
  ) {}

  static create(opts: { sessionId: string; sink?: WireSink; lastSeq?: number; clock?: () => string }): Wire {
    return new Wire(
      {
        sessionId: opts.sessionId,
        seq: opts.lastSeq ?? 0,
        sink: opts.sink,
        listeners: new Set(),
        clock: opts.clock ?? nowIso,
      },
      ROOT_AGENT_ID
    );
  }

  get sessionId(): string {
    return this.bus.sessionId;
  }

  /** Sequence number of the most recent message (0 before the first). */
  get lastSeq(): number {
    return this.bus.seq;
  }

  child(agentId: string, parentToolCallId: string): Wire {
    return new Wire(this.bus, agentId, parentToolCallId);
  }

  emit(draft: WireDraft): WireMessage {
    const bus = this.bus;
    const msg: WireMessage = {
      seq: bus.seq + 1,
      session_id: bus.sessionId,
      agent_id: this.agentId,
      ts: bus.clock(),
      type: wireTypeOf(draft.kind),
      ...draft,
    };
    if (this.parentId !== undefined) msg.parent_id = this.parentId;
    // Keep the in-memory message identical to what a decoder reads back.
    if (msg.turn_id === undefined) delete msg.turn_id;
    if (msg.tool_call_id === undefined) delete msg.tool_call_id;
    // A failed append throws before the counter moves or anyone is notified.
    bus.sink?.append(msg);
    bus.seq = msg.seq;

    for (const listener of [...bus.listeners]) {
      try {
        listener(msg);
      } catch (e) {
        log.warn(`subscriber threw on ${msg.kind} #${msg.seq}: ${errorMessage(e)}`);
      }
    }
    return msg;
  }

  /** Receive every message of the session, children included. */
  subscribe(listener: WireListener): () => void {
    this.bus.listeners.add(listener);
    return () => {
      this.bus.listeners.delete(listener);
    };
  }
}
