import fs from 'node:fs/promises';
import path from 'node:path';

import { AgentwireError, errnoCode } from '../errors.js';
import { createLogger } from '../log.js';
import { isRecord, nowIso, timestampedId } from '../utils.js';

import { SessionLock } from './lock.js';
import { isValidSessionId, LOG_FILE, META_FILE, SESSION_FILE, sessionDir, workDirBucket } from './paths.js';

const log = createLogger('sessions');

export type Session = {
  id: string;
  work_dir: string;
  dir: string;
  log_path: string;
  created_at: string;
};

export type SessionInfo = Session & {
  /** Last modification of the log, or created_at when nothing was logged yet. */
  updated_at: string;
  log_bytes: number;
};

type WorkDirMeta = { work_dir: string; last_session_id: string | null };

async function readJson(filePath: string): Promise<Record<string, unknown> | null> {
  try {
    const raw: unknown = JSON.parse(await fs.readFile(filePath, 'utf8'));
    return isRecord(raw) ? raw : null;
  } catch (e) {
    if (errnoCode(e) === 'ENOENT') return null;
    if (e instanceof SyntaxError) {
      log.warn(`ignoring unreadable ${filePath}: ${e.message}`);
      return null;
    }
    throw e;
  }
}

async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  const tmp = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tmp, JSON.stringify(value, null, 2) + '\n', 'utf8');
  await fs.rename(tmp, filePath);
}

export class SessionStore {
  constructor(readonly stateDir: string) {}

  private metaPath(workDir: string): string {
    return path.join(workDirBucket(this.stateDir, workDir), META_FILE);
  }

  private async readMeta(workDir: string): Promise<WorkDirMeta> {
    const raw = await readJson(this.metaPath(workDir));
    return {
      work_dir: path.resolve(workDir),
      last_session_id: raw && typeof raw.last_session_id === 'string' ? raw.last_session_id : null,
    };
  }

  private async writeMeta(workDir: string, meta: WorkDirMeta): Promise<void> {
    await writeJsonAtomic(this.metaPath(workDir), meta);
  }

  private build(workDir: string, id: string, createdAt: string): Session {
    const dir = sessionDir(this.stateDir, workDir, id);
    return {
      id,
      work_dir: path.resolve(workDir),
      dir,
      log_path: path.join(dir, LOG_FILE),
      created_at: createdAt,
    };
  }

  /** Start a fresh session and make it the work dir's last session. */
  async create(workDir: string): Promise<Session> {
    const session = this.build(workDir, timestampedId(), nowIso());
    await fs.mkdir(session.dir, { recursive: true });
    await writeJsonAtomic(path.join(session.dir, SESSION_FILE), {
      id: session.id,
      work_dir: session.work_dir,
      created_at: session.created_at,
    });
    await fs.appendFile(session.log_path, '');
    await this.writeMeta(workDir, { work_dir: session.work_dir, last_session_id: session.id });
    log.debug(`created session ${session.id} for ${session.work_dir}`);
    return session;
  }

  async open(workDir: string, id: string): Promise<Session | null> {
    if (!isValidSessionId(id)) return null;
    const dir = sessionDir(this.stateDir, workDir, id);
    const raw = await readJson(path.join(dir, SESSION_FILE));
    if (!raw) return null;
    const createdAt = typeof raw.created_at === 'string' ? raw.created_at : '';
    return this.build(workDir, id, createdAt);
  }

  /** The session last created in `workDir`, if it still exists. */
  async continueLast(workDir: string): Promise<Session | null> {
    const meta = await this.readMeta(workDir);
    if (!meta.last_session_id) return null;
    const session = await this.open(workDir, meta.last_session_id);
    if (!session) log.warn(`last session ${meta.last_session_id} of ${meta.work_dir} is gone`);
    return session;
  }

  /** Newest first. */
  async list(workDir: string): Promise<SessionInfo[]> {
    const bucket = workDirBucket(this.stateDir, workDir);
    let entries: string[];
    try {
      entries = await fs.readdir(bucket);
    } catch (e) {
      if (errnoCode(e) === 'ENOENT') return [];
      throw e;
    }

    const out: SessionInfo[] = [];
    for (const name of entries) {
      if (name === META_FILE) continue;
      const session = await this.open(workDir, name);
      if (!session) continue;
      let updatedAt = session.created_at;
      let logBytes = 0;
      try {
        const st = await fs.stat(session.log_path);
        updatedAt = st.mtime.toISOString();
        logBytes = st.size;
      } catch (e) {
        if (errnoCode(e) !== 'ENOENT') throw e;
      }
      out.push({ ...session, updated_at: updatedAt, log_bytes: logBytes });
    }
    return out.sort((a, b) => b.created_at.localeCompare(a.created_at) || b.id.localeCompare(a.id));
  }

  /**
   * Remove a session directory. Fails with SessionLockedError while another
   * writer holds it.
   */
  async delete(workDir: string, id: string): Promise<boolean> {
    const session = await this.open(workDir, id);
    if (!session) return false;

    const lock = new SessionLock(session.dir, session.id);
    await lock.acquire();
    try {
      await fs.rm(session.dir, { recursive: true, force: true });
    } catch (e) {
      await lock.release();
      throw new AgentwireError(`failed to delete session ${id}`, { cause: e });
    }

    const meta = await this.readMeta(workDir);
    if (meta.last_session_id === id) {
      await this.writeMeta(workDir, { ...meta, last_session_id: null });
    }
    return true;
  }
}
