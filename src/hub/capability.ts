import type { ApprovalPolicy, ToolSchema } from '../types.js';
import { isRecord } from '../utils.js';

/** What a tool sees of the call it is serving. */
export type ToolContext = {
  signal: AbortSignal;
  toolCallId: string;
  turnId: string;
  step: number;
  agentId: string;
  depth: number;
};

/** Plain strings are successful output. */
export type ToolOutput = string | { output: string; is_error?: boolean };

export interface ToolCapability {
  readonly name: string;
  readonly description: string;
  /** JSON schema of the arguments object. */
  readonly schema: Record<string, unknown>;
  readonly approval: ApprovalPolicy;
  /** May run concurrently with neighbouring parallel-safe calls. */
  readonly parallelSafe?: boolean;
  /**
   * Honors `ctx.signal` itself and records its own ending. After an
   * interrupt the hub waits for `execute` to settle instead of moving on.
   */
  readonly settlesOnAbort?: boolean;
  /** One line for approval prompts. */
  summarize?(args: Record<string, unknown>): string;
  execute(args: Record<string, unknown>, ctx: ToolContext): Promise<ToolOutput>;
}

export function toolSchemaOf(cap: ToolCapability): ToolSchema {
  return { name: cap.name, description: cap.description, parameters: cap.schema };
}

export function defaultSummary(name: string, args: Record<string, unknown>): string {
  const keys = Object.keys(args);
  if (!keys.length) return `${name}()`;
  const shown = keys.slice(0, 4).map((k) => {
    const v = args[k];
    const s = typeof v === 'string' ? JSON.stringify(v.length > 60 ? v.slice(0, 60) + '…' : v) : JSON.stringify(v);
    return `${k}=${s}`;
  });
  return `${name}(${shown.join(', ')}${keys.length > 4 ? ', …' : ''})`;
}

// ── Argument validation ──────────────────────────────────────────────────

export type ArgValidationIssue = {
  field: string;
  message: string;
};

type Primitive = 'string' | 'number' | 'integer' | 'boolean' | 'object' | 'array' | 'null';

function matchesType(v: unknown, t: Primitive): boolean {
  switch (t) {
    case 'string':
      return typeof v === 'string';
    case 'number':
      return typeof v === 'number' && Number.isFinite(v);
    case 'integer':
      return typeof v === 'number' && Number.isInteger(v);
    case 'boolean':
      return typeof v === 'boolean';
    case 'object':
      return isRecord(v);
    case 'array':
      return Array.isArray(v);
    case 'null':
      return v === null;
  }
}

function declaredTypes(prop: unknown): Primitive[] {
  if (!isRecord(prop)) return [];
  const t = prop.type;
  const all: Primitive[] = ['string', 'number', 'integer', 'boolean', 'object', 'array', 'null'];
  const list: unknown[] = Array.isArray(t) ? t : [t];
  return all.filter((p) => list.includes(p));
}

/**
 * Lightweight check against the schema's `required` list, the primitive
 * `type` of each declared property, and `enum` where given. Not a full JSON
 * schema validator; nested schemas are not descended into.
 */
export function getArgValidationIssues(
  schema: Record<string, unknown>,
  args: Record<string, unknown>
): ArgValidationIssue[] {
  const issues: ArgValidationIssue[] = [];
  const props = isRecord(schema.properties) ? schema.properties : {};
  const required = Array.isArray(schema.required) ? schema.required.filter((r): r is string => typeof r === 'string') : [];

  for (const key of required) {
    if (args[key] === undefined || args[key] === null) issues.push({ field: key, message: 'is required' });
  }

  for (const [key, value] of Object.entries(args)) {
    const prop = props[key];
    if (prop === undefined) {
      if (schema.additionalProperties === false) issues.push({ field: key, message: 'unknown property' });
      continue;
    }
    if (value === undefined) continue;
    const types = declaredTypes(prop);
    if (types.length && !types.some((t) => matchesType(value, t))) {
      issues.push({ field: key, message: `must be ${types.join(' or ')}` });
      continue;
    }
    const allowed: unknown[] | null = isRecord(prop) && Array.isArray(prop.enum) ? prop.enum : null;
    if (allowed && !allowed.includes(value)) {
      issues.push({ field: key, message: `must be one of ${allowed.map((e) => JSON.stringify(e)).join(', ')}` });
    }
  }
  return issues;
}

export function formatIssues(toolName: string, issues: ArgValidationIssue[]): string {
  return `Invalid arguments for ${toolName}: ${issues.map((i) => `${i.field} ${i.message}`).join('; ')}`;
}
