import fsSync from 'node:fs';
import fs from 'node:fs/promises';

import { errnoCode, LogWriteError, ProtocolError } from '../errors.js';
import { createLogger } from '../log.js';
import { decodeWireMessage, encodeWireMessage } from '../wire/codec.js';
import type { WireMessage } from '../wire/message.js';
import type { WireSink } from '../wire/wire.js';

const log = createLogger('session-log');

export type WireLogContents = {
  /** Decoded messages of every agent, in seq order. Unknown kinds are skipped. */
  messages: WireMessage[];
  lastSeq: number;
  /** Bytes up to the end of the last intact line. */
  validBytes: number;
  /** A partially written final line was dropped. */
  tornTail: boolean;
};

/**
 * Read a JSONL wire log. A final line that does not parse is treated as an
 * interrupted write and dropped; a bad line anywhere else is corruption.
 * Sequence numbers must strictly increase.
 */
export async function readWireLog(filePath: string): Promise<WireLogContents> {
  let buf: Buffer;
  try {
    buf = await fs.readFile(filePath);
  } catch (e) {
    if (errnoCode(e) === 'ENOENT') return { messages: [], lastSeq: 0, validBytes: 0, tornTail: false };
    throw e;
  }

  const messages: WireMessage[] = [];
  let lastSeq = 0;
  let offset = 0;
  let lineNo = 0;
  let validBytes = 0;
  let tornTail = false;

  while (offset < buf.length) {
    const nl = buf.indexOf(0x0a, offset);
    const end = nl < 0 ? buf.length : nl;
    const line = buf.subarray(offset, end).toString('utf8').trim();
    lineNo++;
    offset = end + 1;

    if (!line) {
      validBytes = Math.min(offset, buf.length);
      continue;
    }

    let msg: WireMessage | null;
    try {
      msg = decodeWireMessage(line);
    } catch (e) {
      if (e instanceof ProtocolError && nl < 0) {
        log.warn(`${filePath}: dropping torn final line ${lineNo}`);
        tornTail = true;
        break;
      }
      if (e instanceof ProtocolError) {
        throw new ProtocolError(`${filePath}:${lineNo}: ${e.message}`, line);
      }
      throw e;
    }
    validBytes = Math.min(offset, buf.length);
    if (!msg) {
      log.debug(`${filePath}:${lineNo}: skipping unknown message kind`);
      continue;
    }
    if (msg.seq <= lastSeq) {
      throw new ProtocolError(`${filePath}:${lineNo}: seq ${msg.seq} does not follow ${lastSeq}`, line);
    }
    lastSeq = msg.seq;
    messages.push(msg);
  }

  return { messages, lastSeq, validBytes, tornTail };
}

/**
 * Append-only JSONL writer. Appends are synchronous so that a message is on
 * disk before any subscriber or projection sees it.
 */
export class SessionLog implements WireSink {
  private fd: number | null;

  private constructor(
    readonly filePath: string,
    fd: number
  ) {
    this.fd = fd;
  }

  /**
   * Open for appending. `validBytes` (from readWireLog) cuts off a torn tail
   * so the next line does not get glued onto it.
   */
  static open(filePath: string, validBytes?: number): SessionLog {
    try {
      const fd = fsSync.openSync(filePath, 'a+');
      const size = fsSync.fstatSync(fd).size;
      if (validBytes !== undefined && validBytes < size) {
        fsSync.ftruncateSync(fd, validBytes);
      }
      const len = Math.min(size, validBytes ?? size);
      if (len > 0) {
        const last = Buffer.alloc(1);
        fsSync.readSync(fd, last, 0, 1, len - 1);
        if (last[0] !== 0x0a) fsSync.writeSync(fd, '\n');
      }
      return new SessionLog(filePath, fd);
    } catch (e) {
      throw new LogWriteError(filePath, { cause: e });
    }
  }

  append(msg: WireMessage): void {
    if (this.fd === null) throw new LogWriteError(this.filePath, { cause: new Error('log is closed') });
    try {
      fsSync.writeSync(this.fd, encodeWireMessage(msg) + '\n');
    } catch (e) {
      throw new LogWriteError(this.filePath, { cause: e });
    }
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    fsSync.closeSync(fd);
  }
}
