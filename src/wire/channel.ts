import readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';

import { errorMessage, ProtocolError } from '../errors.js';
import type { ApprovalBroker } from '../hub/approval.js';
import { createLogger } from '../log.js';

import { decodeInboundLine, encodeWireMessage } from './codec.js';
import type { Wire } from './wire.js';

const log = createLogger('channel');

export type ChannelStreams = {
  /** Client-to-engine lines (approval responses). Omit for a read-only observer. */
  input?: Readable;
  output: Writable;
};

export type ChannelCloseReason =
  | { kind: 'closed' }
  | { kind: 'protocol_error'; error: ProtocolError }
  | { kind: 'output_error'; error: Error };

/**
 * One client attached to a session: every emitted message goes out as a
 * JSON line, and ApprovalResponse lines coming in are handed to the broker.
 * A malformed inbound line, or an output that fails (the client went away),
 * closes this channel and nothing else.
 */
export class WireChannel {
  private readonly unsubscribe: () => void;
  private readonly rl: readline.Interface | null;
  private isClosed = false;

  constructor(
    wire: Wire,
    private readonly broker: ApprovalBroker,
    private readonly streams: ChannelStreams,
    private readonly opts: { onClose?: (reason: ChannelCloseReason) => void } = {}
  ) {
    // Stays attached after close: a stream may still report a late failure.
    streams.output.on('error', (error) => {
      if (this.isClosed) return;
      log.warn(`closing channel: output failed: ${error.message}`);
      this.close({ kind: 'output_error', error });
    });
    this.unsubscribe = wire.subscribe((msg) => {
      if (this.isClosed || streams.output.destroyed) return;
      streams.output.write(encodeWireMessage(msg) + '\n');
    });

    if (streams.input) {
      const rl = readline.createInterface({ input: streams.input, crlfDelay: Infinity });
      rl.on('line', (line) => this.onLine(line));
      rl.on('close', () => this.close());
      this.rl = rl;
    } else {
      this.rl = null;
    }
  }

  get closed(): boolean {
    return this.isClosed;
  }

  private onLine(line: string): void {
    if (this.isClosed || !line.trim()) return;
    try {
      const response = decodeInboundLine(line);
      if (!response) {
        log.debug(`ignoring inbound line of unknown kind`);
        return;
      }
      if (!this.broker.respond(response.request_id, response.decision)) {
        log.warn(`response to unknown or settled request ${response.request_id}`);
      }
    } catch (e) {
      if (e instanceof ProtocolError) {
        log.warn(`closing channel: ${e.message}`);
        this.close({ kind: 'protocol_error', error: e });
        return;
      }
      // Recording the response failed; the waiting tool call already saw the error.
      log.error(`inbound response failed: ${errorMessage(e)}`);
    }
  }

  close(reason: ChannelCloseReason = { kind: 'closed' }): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.unsubscribe();
    this.rl?.close();
    this.opts.onClose?.(reason);
  }
}
