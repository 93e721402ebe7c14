import fs from 'node:fs/promises';
import path from 'node:path';

import { errnoCode, SessionLockedError } from '../errors.js';
import { createLogger } from '../log.js';
import { randomId, sleep } from '../utils.js';

const log = createLogger('session-lock');

const LOCK_FILE = 'session.lock';
const POLL_MS = 100;

type LockRecord = {
  pid: number;
  startedAt: string;
  token: string;
};

function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (e) {
    // EPERM: the process exists but belongs to someone else.
    return errnoCode(e) === 'EPERM';
  }
}

async function readLock(lockPath: string): Promise<LockRecord | null> {
  try {
    const raw: unknown = JSON.parse(await fs.readFile(lockPath, 'utf8'));
    if (!raw || typeof raw !== 'object' || !('pid' in raw) || typeof raw.pid !== 'number') return null;
    return {
      pid: raw.pid,
      startedAt: 'startedAt' in raw && typeof raw.startedAt === 'string' ? raw.startedAt : '',
      token: 'token' in raw && typeof raw.token === 'string' ? raw.token : '',
    };
  } catch {
    return null;
  }
}

/**
 * Single-writer lock over a session directory: a lock file created with
 * O_EXCL holding the owner's pid. A lock whose pid is gone is reclaimed.
 */
export class SessionLock {
  private readonly lockPath: string;
  private token: string | null = null;

  constructor(
    readonly sessionDir: string,
    readonly sessionId: string
  ) {
    this.lockPath = path.join(sessionDir, LOCK_FILE);
  }

  get held(): boolean {
    return this.token !== null;
  }

  private async tryWrite(): Promise<boolean> {
    const record: LockRecord = { pid: process.pid, startedAt: new Date().toISOString(), token: randomId(8) };
    try {
      await fs.writeFile(this.lockPath, JSON.stringify(record), { encoding: 'utf8', flag: 'wx' });
      this.token = record.token;
      return true;
    } catch (e) {
      if (errnoCode(e) !== 'EEXIST') throw e;
      return false;
    }
  }

  /**
   * Take the lock. With `waitMs` > 0, polls until the holder lets go or the
   * wait runs out; otherwise fails at once with SessionLockedError.
   */
  async acquire(opts: { waitMs?: number; signal?: AbortSignal } = {}): Promise<void> {
    if (this.token) return;
    const deadline = Date.now() + (opts.waitMs ?? 0);

    for (;;) {
      if (await this.tryWrite()) return;

      const existing = await readLock(this.lockPath);
      if (existing && !isPidAlive(existing.pid)) {
        log.warn(`reclaiming lock of session ${this.sessionId} left by dead pid ${existing.pid}`);
        await fs.rm(this.lockPath, { force: true });
        if (await this.tryWrite()) return;
      }

      if (Date.now() >= deadline) {
        throw new SessionLockedError(this.sessionId, existing?.pid ?? null);
      }
      await sleep(POLL_MS, opts.signal);
    }
  }

  async release(): Promise<void> {
    const token = this.token;
    if (!token) return;
    this.token = null;
    const existing = await readLock(this.lockPath);
    if (existing && existing.token !== token) {
      log.warn(`lock of session ${this.sessionId} changed owner; leaving it in place`);
      return;
    }
    await fs.rm(this.lockPath, { force: true });
  }
}
