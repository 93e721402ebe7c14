/** Base class for every error this package raises on purpose. */
export class AgentwireError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AgentwireError';
  }
}

// ── Provider ─────────────────────────────────────────────────────────────

/** Timeouts, connection resets, rate limits, empty responses. Retried with backoff. */
export class TransientProviderError extends AgentwireError {
  readonly status?: number;
  /** Server-suggested wait, when the provider reported one. */
  readonly retryAfterMs?: number;

  constructor(message: string, opts: { status?: number; retryAfterMs?: number; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = 'TransientProviderError';
    this.status = opts.status;
    this.retryAfterMs = opts.retryAfterMs;
  }
}

/** Auth failures, malformed requests, unsupported content. Never retried. */
export class FatalProviderError extends AgentwireError {
  readonly status?: number;

  constructor(message: string, opts: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = 'FatalProviderError';
    this.status = opts.status;
  }
}

// ── Tools ────────────────────────────────────────────────────────────────

/** Tool logic failed. Recorded as tool output; the turn goes on. */
export class ToolExecutionError extends AgentwireError {
  constructor(readonly toolName: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ToolExecutionError';
  }
}

export class ApprovalDeniedError extends AgentwireError {
  constructor(readonly toolName: string) {
    super(`tool call to ${toolName} was denied`);
    this.name = 'ApprovalDeniedError';
  }
}

/** No capability registered under the requested name. Fatal to the step. */
export class ToolNotFoundError extends AgentwireError {
  constructor(readonly toolName: string) {
    super(`no tool registered under "${toolName}"`);
    this.name = 'ToolNotFoundError';
  }
}

export class DepthExceededError extends AgentwireError {
  constructor(readonly depth: number, readonly maxDepth: number) {
    super(`subagent depth ${depth} exceeds the configured maximum of ${maxDepth}`);
    this.name = 'DepthExceededError';
  }
}

// ── Loop control ─────────────────────────────────────────────────────────

export class StepBudgetExceededError extends AgentwireError {
  constructor(readonly maxSteps: number) {
    super(`turn did not finish within ${maxSteps} steps`);
    this.name = 'StepBudgetExceededError';
  }
}

/** Raised at a suspension point once the interrupt token fired. */
export class TurnInterruptedError extends AgentwireError {
  constructor(reason = 'interrupted by user') {
    super(reason);
    this.name = 'TurnInterruptedError';
  }
}

export class SoulBusyError extends AgentwireError {
  constructor(readonly soulId: string) {
    super(`soul ${soulId} is already running a turn`);
    this.name = 'SoulBusyError';
  }
}

// ── Infrastructure ───────────────────────────────────────────────────────

/** Malformed inbound wire data. Closes the offending channel only. */
export class ProtocolError extends AgentwireError {
  constructor(message: string, readonly line?: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

/** The durable log could not be appended to. Fatal to the engine. */
export class LogWriteError extends AgentwireError {
  constructor(readonly logPath: string, options?: { cause?: unknown }) {
    super(`failed to append to session log ${logPath}`, options);
    this.name = 'LogWriteError';
  }
}

export class SessionLockedError extends AgentwireError {
  constructor(readonly sessionId: string, readonly pid: number | null) {
    super(
      pid == null
        ? `session ${sessionId} is locked and the lock file could not be parsed`
        : `session ${sessionId} is in use by pid ${pid}`
    );
    this.name = 'SessionLockedError';
  }
}

export class ConfigError extends AgentwireError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export function asError(e: unknown, fallback = 'unknown error'): Error {
  if (e instanceof Error) return e;
  if (e === undefined) return new Error(fallback);
  return new Error(String(e));
}

export function errorMessage(e: unknown): string {
  return asError(e).message;
}

export function isAbortError(e: unknown): boolean {
  return e instanceof Error && (e.name === 'AbortError' || e instanceof TurnInterruptedError);
}

/** `code` of a Node system error (`ENOENT`, `EEXIST`, ...), if any. */
export function errnoCode(e: unknown): string | undefined {
  if (e instanceof Error && 'code' in e && typeof e.code === 'string') return e.code;
  return undefined;
}
