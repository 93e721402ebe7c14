import { makeStyler, resolveColorMode, type Styler } from './term.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 99 };

export function isLogLevel(v: unknown): v is LogLevel {
  return typeof v === 'string' && (LOG_LEVELS as readonly string[]).includes(v);
}

export type Logger = {
  readonly tag: string;
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
  /** Same sink and level, nested tag (`engine:soul`). */
  child: (tag: string) => Logger;
};

type Sink = (line: string) => void;

type LoggerState = { level: LogLevel; sink: Sink; styler: Styler };

const envLevel = process.env.AGENTWIRE_LOG_LEVEL;

const state: LoggerState = {
  level: isLogLevel(envLevel) ? envLevel : 'warn',
  sink: (line) => process.stderr.write(line + '\n'),
  styler: makeStyler(resolveColorMode('auto').enabled),
};

export function setLogLevel(level: LogLevel): void {
  state.level = level;
}

export function getLogLevel(): LogLevel {
  return state.level;
}

/** Redirect output (tests capture lines this way). Returns the previous sink. */
export function setLogSink(sink: Sink, colors = false): Sink {
  const prev = state.sink;
  state.sink = sink;
  state.styler = makeStyler(colors);
  return prev;
}

function paint(level: LogLevel, s: Styler): string {
  switch (level) {
    case 'debug':
      return s.dim('debug');
    case 'info':
      return s.cyan('info');
    case 'warn':
      return s.yellow('warn');
    default:
      return s.red('error');
  }
}

export function createLogger(tag: string): Logger {
  const write = (level: LogLevel, msg: string) => {
    if (RANK[level] < RANK[state.level]) return;
    const s = state.styler;
    state.sink(`${s.dim(`[${tag}]`)} ${paint(level, s)} ${msg}`);
  };
  return {
    tag,
    debug: (msg) => write('debug', msg),
    info: (msg) => write('info', msg),
    warn: (msg) => write('warn', msg),
    error: (msg) => write('error', msg),
    child: (sub) => createLogger(`${tag}:${sub}`),
  };
}
