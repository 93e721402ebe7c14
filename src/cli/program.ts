import path from 'node:path';

import { Command, Option } from 'commander';

import { loadConfig, type AgentwireConfig } from '../config.js';
import { Context } from '../context/context.js';
import { SessionLockedError } from '../errors.js';
import { LOG_LEVELS, setLogLevel, type LogLevel } from '../log.js';
import { readWireLog } from '../session/log.js';
import { SessionStore, type Session } from '../session/store.js';
import { makeStyler, resolveColorMode, type Styler } from '../term.js';
import type { Message } from '../types.js';
import { PKG_VERSION } from '../utils.js';
import { encodeWireMessage } from '../wire/codec.js';
import type { WireMessage } from '../wire/message.js';

export type CliIO = {
  out: (line: string) => void;
  err: (line: string) => void;
  /** Colors for `out`; off when omitted. */
  styler?: Styler;
};

type GlobalOpts = {
  workDir?: string;
  stateDir?: string;
  config?: string;
  logLevel?: LogLevel;
};

export const defaultIO: CliIO = {
  out: (line) => process.stdout.write(line + '\n'),
  err: (line) => process.stderr.write(line + '\n'),
  styler: makeStyler(resolveColorMode('auto', process.stdout).enabled),
};

// ── Formatting ──

function oneLine(s: string, max = 200): string {
  const flat = s.replace(/\s+/g, ' ').trim();
  return flat.length > max ? flat.slice(0, max - 1) + '…' : flat;
}

export function formatMessage(m: Message, s: Styler): string[] {
  const head = m.summary ? s.magenta('summary') : m.role === 'user' ? s.green('user') : s.cyan(m.role);
  const lines: string[] = [];
  for (const p of m.content) {
    switch (p.type) {
      case 'text':
        lines.push(`${head}: ${p.text}`);
        break;
      case 'thinking':
        lines.push(`${head}: ${s.dim(`(thinking) ${oneLine(p.text)}`)}`);
        break;
      case 'tool_call':
        lines.push(`${head}: → ${p.name}(${oneLine(JSON.stringify(p.args))}) ${s.dim(p.id)}`);
        break;
      case 'tool_result':
        lines.push(`${head}: ← ${p.is_error ? s.red('[error] ') : ''}${oneLine(p.output)} ${s.dim(p.tool_call_id)}`);
        break;
    }
  }
  return lines;
}

export function formatWireMessage(m: WireMessage, s: Styler): string {
  const who = m.agent_id === 'root' ? '' : ` ${s.magenta(m.agent_id)}`;
  const prefix = `${s.dim(`#${m.seq}`)}${who} ${s.bold(m.kind)}`;
  switch (m.kind) {
    case 'TurnBegin':
      return `${prefix} ${typeof m.payload.input === 'string' ? oneLine(m.payload.input) : '[parts]'}`;
    case 'AssistantDelta':
      return `${prefix} [${m.payload.part}] ${oneLine(m.payload.text)}`;
    case 'ToolCallStarted':
      return `${prefix} ${m.payload.name} ${oneLine(JSON.stringify(m.payload.args))}`;
    case 'ToolCallResult':
      return `${prefix} ${m.payload.status} ${oneLine(m.payload.output)}`;
    case 'StatusUpdate': {
      const p = m.payload;
      switch (p.kind) {
        case 'retry':
          return `${prefix} retry ${p.attempt}/${p.max_attempts} in ${p.delay_ms}ms: ${p.error}`;
        case 'compaction':
          return `${prefix} compaction replaced ${p.replaced} (${p.tokens_before} -> ${p.tokens_after} tokens)`;
        case 'clear':
          return `${prefix} context cleared`;
        case 'yolo':
          return `${prefix} yolo ${p.enabled ? 'on' : 'off'}`;
      }
    }
    case 'TurnEnd':
      return `${prefix} ${m.payload.status} after ${m.payload.steps} step(s)${m.payload.cause ? `: ${m.payload.cause.kind}` : ''}`;
    case 'Error':
      return `${prefix} ${s.red(m.payload.kind)} ${m.payload.message}`;
    case 'ApprovalRequest':
      return `${prefix} ${m.payload.request_id} ${m.payload.summary}`;
    case 'ApprovalResponse':
      return `${prefix} ${m.payload.request_id} ${m.payload.decision}`;
  }
}

// ── Program ──

export function buildProgram(io: CliIO = defaultIO): Command {
  const s = io.styler ?? makeStyler(false);
  const program = new Command();

  program
    .name('agentwire')
    .description('Inspect and manage agentwire sessions')
    .version(PKG_VERSION)
    .option('-C, --work-dir <dir>', 'Work directory the sessions belong to (default: cwd)')
    .option('--state-dir <dir>', 'State directory (overrides config)')
    .option('--config <path>', 'Config file path')
    .addOption(new Option('--log-level <level>', 'Log level').choices([...LOG_LEVELS]))
    .configureOutput({ writeOut: (str) => io.out(str.trimEnd()), writeErr: (str) => io.err(str.trimEnd()) });

  const setup = async (): Promise<{ config: AgentwireConfig; store: SessionStore; workDir: string }> => {
    const g = program.opts<GlobalOpts>();
    const { config } = await loadConfig({
      configPath: g.config,
      cli: { state_dir: g.stateDir, log_level: g.logLevel },
    });
    setLogLevel(config.log_level);
    return { config, store: new SessionStore(config.state_dir), workDir: path.resolve(g.workDir ?? process.cwd()) };
  };

  const requireSession = async (store: SessionStore, workDir: string, id: string): Promise<Session | null> => {
    const session = await store.open(workDir, id);
    if (!session) {
      io.err(`no session ${id} for ${workDir}`);
      process.exitCode = 1;
    }
    return session;
  };

  program
    .command('sessions')
    .description('List sessions of the work directory, newest first')
    .option('--json', 'Output JSON', false)
    .action(async (opts: { json: boolean }) => {
      const { store, workDir } = await setup();
      const list = await store.list(workDir);
      if (opts.json) {
        io.out(JSON.stringify(list, null, 2));
        return;
      }
      if (!list.length) {
        io.out(s.dim(`no sessions for ${workDir}`));
        return;
      }
      for (const info of list) {
        io.out(`${s.bold(info.id)}  created ${info.created_at}  updated ${info.updated_at}  ${info.log_bytes} bytes`);
      }
    });

  program
    .command('show <id>')
    .description('Replay a session log and print the rebuilt conversation')
    .option('--agent <id>', 'Agent whose context to rebuild', 'root')
    .action(async (id: string, opts: { agent: string }) => {
      const { store, workDir } = await setup();
      const session = await requireSession(store, workDir, id);
      if (!session) return;
      const { messages, tornTail } = await readWireLog(session.log_path);
      const ctx = Context.fromWireMessages(messages, { agentId: opts.agent });
      for (const m of ctx.iterate()) for (const line of formatMessage(m, s)) io.out(line);
      if (tornTail) io.err(s.yellow('log ends in a torn line (ignored)'));
    });

  program
    .command('log <id>')
    .description('Print the wire messages of a session')
    .option('--json', 'Print raw JSON lines', false)
    .option('--agent <id>', 'Only messages of this agent')
    .action(async (id: string, opts: { json: boolean; agent?: string }) => {
      const { store, workDir } = await setup();
      const session = await requireSession(store, workDir, id);
      if (!session) return;
      const { messages } = await readWireLog(session.log_path);
      for (const m of messages) {
        if (opts.agent && m.agent_id !== opts.agent) continue;
        io.out(opts.json ? encodeWireMessage(m) : formatWireMessage(m, s));
      }
    });

  program
    .command('delete <id>')
    .description('Delete a session')
    .action(async (id: string) => {
      const { store, workDir } = await setup();
      try {
        if (await store.delete(workDir, id)) {
          io.out(`deleted ${id}`);
          return;
        }
      } catch (e) {
        if (!(e instanceof SessionLockedError)) throw e;
        io.err(e.message);
        process.exitCode = 1;
        return;
      }
      io.err(`no session ${id} for ${workDir}`);
      process.exitCode = 1;
    });

  return program;
}

