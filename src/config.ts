import fs from 'node:fs/promises';
import path from 'node:path';

import { ConfigError, errnoCode } from './errors.js';
import { isLogLevel, type LogLevel } from './log.js';
import { configDir, isRecord, stateDir } from './utils.js';

export type LoopControl = {
  max_steps_per_run: number;
  /** Total provider attempts per step, the first one included. */
  max_retries_per_step: number;
  retry_base_delay_ms: number;
  retry_max_delay_ms: number;
  /** Fraction of the delay randomized either way (0..1). */
  retry_jitter: number;
};

export type CompactionConfig = {
  max_context_tokens: number;
  /** Compact once the estimate exceeds this fraction of max_context_tokens. */
  compact_at: number;
  /** Most recent messages never folded into a summary. */
  protected_tail: number;
};

export type SubagentDefinition = {
  name: string;
  description: string;
  system_prompt: string;
  /** Tool names the child may use. Empty means every parent tool. */
  tools: string[];
};

export type McpServerConfig = {
  name: string;
  command: string;
  args: string[];
  env?: Record<string, string>;
};

export type AgentwireConfig = {
  loop_control: LoopControl;
  compaction: CompactionConfig;
  sub_agents: { max_depth: number; definitions: SubagentDefinition[] };
  /** Skip every approval prompt. */
  yolo: boolean;
  log_level: LogLevel;
  state_dir: string;
  mcp: { call_timeout_sec: number; servers: McpServerConfig[] };
};

/** One configuration source. Missing keys fall through to the layer below. */
export type ConfigLayer = {
  loop_control?: Partial<LoopControl>;
  compaction?: Partial<CompactionConfig>;
  sub_agents?: { max_depth?: number; definitions?: SubagentDefinition[] };
  yolo?: boolean;
  log_level?: LogLevel;
  state_dir?: string;
  mcp?: { call_timeout_sec?: number; servers?: McpServerConfig[] };
};

export const DEFAULTS: AgentwireConfig = {
  loop_control: {
    max_steps_per_run: 100,
    max_retries_per_step: 3,
    retry_base_delay_ms: 500,
    retry_max_delay_ms: 10000,
    retry_jitter: 0.2,
  },
  compaction: {
    max_context_tokens: 131072,
    compact_at: 0.8,
    protected_tail: 10,
  },
  sub_agents: { max_depth: 2, definitions: [] },
  yolo: false,
  log_level: 'warn',
  state_dir: '',
  mcp: { call_timeout_sec: 30, servers: [] },
};

const LOOP_KEYS: readonly (keyof LoopControl)[] = [
  'max_steps_per_run',
  'max_retries_per_step',
  'retry_base_delay_ms',
  'retry_max_delay_ms',
  'retry_jitter',
];

const COMPACTION_KEYS: readonly (keyof CompactionConfig)[] = [
  'max_context_tokens',
  'compact_at',
  'protected_tail',
];

export function defaultConfigPath() {
  return path.join(configDir(), 'config.json');
}

// ── Env parsing ──────────────────────────────────────────────────────────

function parseBool(v: string | undefined): boolean | undefined {
  if (v == null) return undefined;
  if (['1', 'true', 'yes', 'on'].includes(v.toLowerCase())) return true;
  if (['0', 'false', 'no', 'off'].includes(v.toLowerCase())) return false;
  return undefined;
}

function parseNum(v: string | undefined): number | undefined {
  if (v == null || v.trim() === '') return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : undefined;
}

export function envLayer(env: NodeJS.ProcessEnv): ConfigLayer {
  const level = env.AGENTWIRE_LOG_LEVEL?.toLowerCase();
  return {
    loop_control: {
      max_steps_per_run: parseNum(env.AGENTWIRE_MAX_STEPS_PER_RUN),
      max_retries_per_step: parseNum(env.AGENTWIRE_MAX_RETRIES_PER_STEP),
      retry_base_delay_ms: parseNum(env.AGENTWIRE_RETRY_BASE_DELAY_MS),
      retry_max_delay_ms: parseNum(env.AGENTWIRE_RETRY_MAX_DELAY_MS),
      retry_jitter: parseNum(env.AGENTWIRE_RETRY_JITTER),
    },
    compaction: {
      max_context_tokens: parseNum(env.AGENTWIRE_MAX_CONTEXT_TOKENS),
      compact_at: parseNum(env.AGENTWIRE_COMPACT_AT),
      protected_tail: parseNum(env.AGENTWIRE_PROTECTED_TAIL),
    },
    sub_agents: { max_depth: parseNum(env.AGENTWIRE_SUB_AGENTS_MAX_DEPTH) },
    yolo: parseBool(env.AGENTWIRE_YOLO),
    log_level: isLogLevel(level) ? level : undefined,
    state_dir: env.AGENTWIRE_STATE_DIR || undefined,
    mcp: { call_timeout_sec: parseNum(env.AGENTWIRE_MCP_CALL_TIMEOUT_SEC) },
  };
}

// ── File parsing ─────────────────────────────────────────────────────────

function pickNumbers<K extends string>(
  raw: unknown,
  keys: readonly K[],
  where: string
): Partial<Record<K, number>> {
  if (raw === undefined) return {};
  if (!isRecord(raw)) throw new ConfigError(`${where} must be an object`);
  const out: Partial<Record<K, number>> = {};
  for (const k of keys) {
    const v = raw[k];
    if (v === undefined) continue;
    if (typeof v !== 'number' || !Number.isFinite(v)) {
      throw new ConfigError(`${where}.${k} must be a number`);
    }
    out[k] = v;
  }
  return out;
}

function stringList(raw: unknown, where: string): string[] {
  if (raw === undefined) return [];
  if (!Array.isArray(raw) || raw.some((x) => typeof x !== 'string')) {
    throw new ConfigError(`${where} must be an array of strings`);
  }
  return raw.map((x) => String(x));
}

function parseDefinitions(raw: unknown): SubagentDefinition[] | undefined {
  if (raw === undefined) return undefined;
  if (!Array.isArray(raw)) throw new ConfigError('sub_agents.definitions must be an array');
  const seen = new Set<string>();
  return raw.map((d, i) => {
    const where = `sub_agents.definitions[${i}]`;
    if (!isRecord(d) || typeof d.name !== 'string' || !d.name.trim()) {
      throw new ConfigError(`${where} needs a non-empty "name"`);
    }
    if (seen.has(d.name)) throw new ConfigError(`duplicate subagent definition "${d.name}"`);
    seen.add(d.name);
    return {
      name: d.name,
      description: typeof d.description === 'string' ? d.description : '',
      system_prompt: typeof d.system_prompt === 'string' ? d.system_prompt : '',
      tools: stringList(d.tools, `${where}.tools`),
    };
  });
}

function parseServers(raw: unknown): McpServerConfig[] | undefined {
  if (raw === undefined) return undefined;
  if (!Array.isArray(raw)) throw new ConfigError('mcp.servers must be an array');
  return raw.map((s, i) => {
    const where = `mcp.servers[${i}]`;
    if (!isRecord(s) || typeof s.name !== 'string' || typeof s.command !== 'string') {
      throw new ConfigError(`${where} needs "name" and "command" strings`);
    }
    let env: Record<string, string> | undefined;
    if (isRecord(s.env)) {
      env = {};
      for (const [k, v] of Object.entries(s.env)) env[k] = String(v);
    }
    return { name: s.name, command: s.command, args: stringList(s.args, `${where}.args`), env };
  });
}

/** Validate a parsed config.json. Unknown keys are ignored. */
export function fileLayer(raw: unknown): ConfigLayer {
  if (!isRecord(raw)) throw new ConfigError('config file must contain a JSON object');

  const subAgents = raw.sub_agents;
  if (subAgents !== undefined && !isRecord(subAgents)) throw new ConfigError('sub_agents must be an object');
  const mcp = raw.mcp;
  if (mcp !== undefined && !isRecord(mcp)) throw new ConfigError('mcp must be an object');

  if (raw.yolo !== undefined && typeof raw.yolo !== 'boolean') throw new ConfigError('yolo must be a boolean');
  if (raw.log_level !== undefined && !isLogLevel(raw.log_level)) {
    throw new ConfigError(`log_level must be one of debug, info, warn, error, silent`);
  }
  if (raw.state_dir !== undefined && typeof raw.state_dir !== 'string') {
    throw new ConfigError('state_dir must be a string');
  }

  return {
    loop_control: pickNumbers(raw.loop_control, LOOP_KEYS, 'loop_control'),
    compaction: pickNumbers(raw.compaction, COMPACTION_KEYS, 'compaction'),
    sub_agents: {
      ...pickNumbers(subAgents, ['max_depth'], 'sub_agents'),
      definitions: parseDefinitions(subAgents?.definitions),
    },
    yolo: typeof raw.yolo === 'boolean' ? raw.yolo : undefined,
    log_level: isLogLevel(raw.log_level) ? raw.log_level : undefined,
    state_dir: typeof raw.state_dir === 'string' ? raw.state_dir : undefined,
    mcp: {
      ...pickNumbers(mcp, ['call_timeout_sec'], 'mcp'),
      servers: parseServers(mcp?.servers),
    },
  };
}

// ── Merge ────────────────────────────────────────────────────────────────

function mergeSection<T extends object>(
  base: T,
  keys: readonly (keyof T)[],
  layers: Array<Partial<T> | undefined>
): T {
  const out: T = { ...base };
  for (const layer of layers) {
    if (!layer) continue;
    for (const k of keys) {
      const v = layer[k];
      if (v !== undefined) out[k] = v;
    }
  }
  return out;
}

function lastDefined<T>(values: Array<T | undefined>, fallback: T): T {
  let out = fallback;
  for (const v of values) if (v !== undefined) out = v;
  return out;
}

/** Layers are applied in order; later layers win. */
export function mergeLayers(layers: ConfigLayer[]): AgentwireConfig {
  return {
    loop_control: mergeSection(DEFAULTS.loop_control, LOOP_KEYS, layers.map((l) => l.loop_control)),
    compaction: mergeSection(DEFAULTS.compaction, COMPACTION_KEYS, layers.map((l) => l.compaction)),
    sub_agents: {
      max_depth: lastDefined(layers.map((l) => l.sub_agents?.max_depth), DEFAULTS.sub_agents.max_depth),
      definitions: lastDefined(layers.map((l) => l.sub_agents?.definitions), DEFAULTS.sub_agents.definitions),
    },
    yolo: lastDefined(layers.map((l) => l.yolo), DEFAULTS.yolo),
    log_level: lastDefined(layers.map((l) => l.log_level), DEFAULTS.log_level),
    state_dir: lastDefined(layers.map((l) => l.state_dir), DEFAULTS.state_dir),
    mcp: {
      call_timeout_sec: lastDefined(layers.map((l) => l.mcp?.call_timeout_sec), DEFAULTS.mcp.call_timeout_sec),
      servers: lastDefined(layers.map((l) => l.mcp?.servers), DEFAULTS.mcp.servers),
    },
  };
}

function requireInt(v: number, min: number, name: string): void {
  if (!Number.isInteger(v) || v < min) throw new ConfigError(`${name} must be an integer >= ${min} (got ${v})`);
}

function requireRange(v: number, lo: number, hi: number, name: string): void {
  if (!(v >= lo && v <= hi)) throw new ConfigError(`${name} must be between ${lo} and ${hi} (got ${v})`);
}

export function validateConfig(c: AgentwireConfig): AgentwireConfig {
  const lc = c.loop_control;
  requireInt(lc.max_steps_per_run, 1, 'loop_control.max_steps_per_run');
  requireInt(lc.max_retries_per_step, 1, 'loop_control.max_retries_per_step');
  requireInt(lc.retry_base_delay_ms, 0, 'loop_control.retry_base_delay_ms');
  requireInt(lc.retry_max_delay_ms, 0, 'loop_control.retry_max_delay_ms');
  requireRange(lc.retry_jitter, 0, 1, 'loop_control.retry_jitter');
  requireInt(c.compaction.max_context_tokens, 1, 'compaction.max_context_tokens');
  if (!(c.compaction.compact_at > 0 && c.compaction.compact_at <= 1)) {
    throw new ConfigError(`compaction.compact_at must be in (0, 1] (got ${c.compaction.compact_at})`);
  }
  requireInt(c.compaction.protected_tail, 0, 'compaction.protected_tail');
  requireInt(c.sub_agents.max_depth, 0, 'sub_agents.max_depth');
  if (!(c.mcp.call_timeout_sec > 0)) throw new ConfigError('mcp.call_timeout_sec must be positive');
  return c;
}

// ── Public API ───────────────────────────────────────────────────────────

export async function loadConfig(
  opts: {
    configPath?: string;
    cli?: ConfigLayer;
    env?: NodeJS.ProcessEnv;
  } = {}
): Promise<{ config: AgentwireConfig; configPath: string }> {
  const configPath = opts.configPath ?? defaultConfigPath();

  let fileCfg: ConfigLayer = {};
  try {
    const raw = await fs.readFile(configPath, 'utf8');
    if (raw.trim().length) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (e) {
        throw new ConfigError(`invalid JSON in ${configPath}`, { cause: e });
      }
      fileCfg = fileLayer(parsed);
    }
  } catch (e) {
    if (errnoCode(e) !== 'ENOENT') throw e;
  }

  // merge order: defaults < file < env < cli
  const merged = mergeLayers([fileCfg, envLayer(opts.env ?? process.env), opts.cli ?? {}]);
  merged.state_dir = path.resolve(merged.state_dir || stateDir());
  return { config: validateConfig(merged), configPath };
}

/** Defaults plus overrides, no file or env. Used by tests and embedders. */
export function resolveConfig(overrides: ConfigLayer = {}): AgentwireConfig {
  const merged = mergeLayers([overrides]);
  merged.state_dir = path.resolve(merged.state_dir || stateDir());
  return validateConfig(merged);
}
