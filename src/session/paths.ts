import path from 'node:path';

import { md5 } from '../utils.js';

export const LOG_FILE = 'wire.jsonl';
export const SESSION_FILE = 'session.json';
export const META_FILE = 'meta.json';

/** Sessions of one working directory share a bucket keyed by the md5 of its absolute path. */
export function workDirKey(workDir: string): string {
  return md5(path.resolve(workDir));
}

export function workDirBucket(stateDir: string, workDir: string): string {
  return path.join(stateDir, 'sessions', workDirKey(workDir));
}

export function sessionDir(stateDir: string, workDir: string, sessionId: string): string {
  return path.join(workDirBucket(stateDir, workDir), sessionId);
}

/** Session ids become directory names. */
export function isValidSessionId(id: string): boolean {
  return /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/.test(id) && id !== '.' && id !== '..';
}
