/**
 * Shared utility functions.
 */

import { createHash, randomBytes } from 'node:crypto';
import { readFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { TurnInterruptedError } from './errors.js';

/** Package version read once at startup. Falls back to '0.0.0'. */
export const PKG_VERSION: string = (() => {
  try {
    const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
    if (raw && typeof raw === 'object' && 'version' in raw && typeof raw.version === 'string') {
      return raw.version;
    }
  } catch {
    /* not packaged */
  }
  return '0.0.0';
})();

/**
 * XDG-compatible state directory for sessions and logs.
 * `~/.local/state/agentwire`
 */
export function stateDir(): string {
  if (process.env.AGENTWIRE_STATE_DIR) return process.env.AGENTWIRE_STATE_DIR;
  if (process.env.XDG_STATE_HOME) return path.join(process.env.XDG_STATE_HOME, 'agentwire');
  const base =
    process.platform === 'win32'
      ? process.env.LOCALAPPDATA || path.join(os.homedir(), 'AppData', 'Local')
      : path.join(os.homedir(), '.local', 'state');
  return path.join(base, 'agentwire');
}

/**
 * XDG-compatible config directory.
 * `~/.config/agentwire`
 * Can be overridden with AGENTWIRE_CONFIG_DIR.
 */
export function configDir(): string {
  if (process.env.AGENTWIRE_CONFIG_DIR) return process.env.AGENTWIRE_CONFIG_DIR;
  if (process.env.XDG_CONFIG_HOME) return path.join(process.env.XDG_CONFIG_HOME, 'agentwire');
  const base =
    process.platform === 'win32'
      ? process.env.APPDATA || path.join(os.homedir(), 'AppData', 'Roaming')
      : path.join(os.homedir(), '.config');
  return path.join(base, 'agentwire');
}

/**
 * Generate a short random hex ID.
 * @param bytes - Number of random bytes (default 6 = 12 hex chars)
 */
export function randomId(bytes = 6): string {
  return randomBytes(bytes).toString('hex');
}

/** Timestamped random ID: `<ts36>-<hex>`. Sorts by creation time. */
export function timestampedId(): string {
  const ts = Date.now().toString(36);
  const rand = randomBytes(4).toString('hex');
  return `${ts}-${rand}`;
}

export function md5(s: string): string {
  return createHash('md5').update(s).digest('hex');
}

export function nowIso(): string {
  return new Date().toISOString();
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new TurnInterruptedError();
}

/** Resolves after `ms`, or rejects with TurnInterruptedError as soon as `signal` fires. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(new TurnInterruptedError());
  if (ms <= 0) return Promise.resolve();
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new TurnInterruptedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Child controller that aborts when `parent` does. The returned `dispose`
 * detaches the listener so long-lived parents do not accumulate them.
 */
export function linkedAbortController(parent?: AbortSignal): {
  controller: AbortController;
  dispose: () => void;
} {
  const controller = new AbortController();
  if (!parent) return { controller, dispose: () => {} };
  if (parent.aborted) {
    controller.abort(parent.reason);
    return { controller, dispose: () => {} };
  }
  const onAbort = () => controller.abort(parent.reason);
  parent.addEventListener('abort', onAbort, { once: true });
  return { controller, dispose: () => parent.removeEventListener('abort', onAbort) };
}

/**
 * Race a promise against an abort signal. The underlying work is not
 * cancelled; callers pass the same signal down so it can stop on its own.
 */
export function raceAbort<T>(p: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return p;
  if (signal.aborted) return Promise.reject(new TurnInterruptedError());
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new TurnInterruptedError());
    signal.addEventListener('abort', onAbort, { once: true });
    p.then(
      (v) => {
        signal.removeEventListener('abort', onAbort);
        resolve(v);
      },
      (e: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(e);
      }
    );
  });
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}
