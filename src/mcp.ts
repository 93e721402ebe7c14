import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';

import type { McpServerConfig } from './config.js';
import { errorMessage, ToolExecutionError } from './errors.js';
import type { ToolCapability } from './hub/capability.js';
import { createLogger } from './log.js';
import { isRecord, PKG_VERSION } from './utils.js';

const log = createLogger('mcp');

const PROTOCOL_VERSION = '2024-11-05';
const MAX_RESULT_BYTES = 4096;

type JsonRpcRequest = {
  jsonrpc: '2.0';
  id?: number;
  method: string;
  params?: Record<string, unknown>;
};

/** Request/response channel to one MCP server. */
export interface RpcTransport {
  request(method: string, params: Record<string, unknown>, timeoutMs: number): Promise<unknown>;
  notify(method: string, params: Record<string, unknown>): Promise<void>;
  close(): Promise<void>;
}

type Pending = {
  resolve: (v: unknown) => void;
  reject: (e: Error) => void;
  timer: NodeJS.Timeout;
};

/**
 * JSON-RPC over a pair of streams, one JSON object per line. A write or
 * stream failure rejects every pending request; nothing is thrown at the
 * emitter.
 */
export class LineRpcTransport implements RpcTransport {
  private nextId = 1;
  private readonly pending = new Map<number, Pending>();
  protected closed = false;

  constructor(
    input: Readable,
    private readonly output: Writable
  ) {
    readline.createInterface({ input, crlfDelay: Infinity }).on('line', (line) => this.onLine(line));
    output.on('error', (err) => {
      this.closed = true;
      this.failAll(new Error(`MCP transport write failed: ${err.message}`));
    });
  }

  protected failAll(err: Error): void {
    for (const [id, p] of this.pending) {
      clearTimeout(p.timer);
      p.reject(err);
      this.pending.delete(id);
    }
  }

  private onLine(raw: string): void {
    const line = raw.trim();
    if (!line) return;
    let msg: unknown;
    try {
      msg = JSON.parse(line);
    } catch {
      log.debug(`skipping non-JSON line from server: ${line.slice(0, 120)}`);
      return;
    }
    // Notifications and server-initiated requests carry no numeric id we issued.
    if (!isRecord(msg) || typeof msg.id !== 'number') return;

    const p = this.pending.get(msg.id);
    if (!p) return;
    this.pending.delete(msg.id);
    clearTimeout(p.timer);

    if (isRecord(msg.error)) {
      const code = typeof msg.error.code === 'number' ? msg.error.code : 'unknown';
      const text = typeof msg.error.message === 'string' && msg.error.message ? msg.error.message : `MCP error code ${code}`;
      p.reject(new Error(text));
      return;
    }
    p.resolve(msg.result ?? null);
  }

  private write(message: JsonRpcRequest): void {
    if (this.closed) throw new Error('MCP transport is closed');
    this.output.write(JSON.stringify(message) + '\n');
  }

  request(method: string, params: Record<string, unknown>, timeoutMs: number): Promise<unknown> {
    const id = this.nextId++;
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new Error(`MCP request timed out: ${method} after ${timeoutMs}ms`));
      }, Math.max(1, timeoutMs));
      this.pending.set(id, { resolve, reject, timer });

      try {
        this.write({ jsonrpc: '2.0', id, method, params });
      } catch (e) {
        clearTimeout(timer);
        this.pending.delete(id);
        reject(e instanceof Error ? e : new Error(String(e)));
      }
    });
  }

  async notify(method: string, params: Record<string, unknown>): Promise<void> {
    this.write({ jsonrpc: '2.0', method, params });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.output.end();
    this.failAll(new Error('MCP transport closed'));
  }
}

/** Line transport over a spawned server's stdio. */
export class StdioRpcTransport extends LineRpcTransport {
  private readonly child: ChildProcessWithoutNullStreams;
  private stderrTail = '';

  constructor(command: string, args: string[], env?: Record<string, string>) {
    const child = spawn(command, args, {
      stdio: ['pipe', 'pipe', 'pipe'],
      env: { ...process.env, ...(env ?? {}) },
    });
    super(child.stdout, child.stdin);
    this.child = child;

    child.stderr.on('data', (chunk: Buffer | string) => {
      const text = Buffer.isBuffer(chunk) ? chunk.toString('utf8') : String(chunk);
      this.stderrTail = (this.stderrTail + text).slice(-2000);
    });

    child.on('error', (err) => {
      this.failAll(new Error(`MCP stdio transport error: ${err.message}`));
    });

    child.on('close', (code, signal) => {
      this.closed = true;
      const reason = `MCP stdio transport closed (code=${code ?? 'null'}, signal=${signal ?? 'null'})`;
      const tail = this.stderrTail.trim();
      this.failAll(new Error(tail ? `${reason}; stderr: ${tail}` : reason));
    });
  }

  async close(): Promise<void> {
    await super.close();
    this.child.kill('SIGTERM');
  }
}

// ── Result shaping ──

export function clampToolResult(raw: string, maxBytes = MAX_RESULT_BYTES): string {
  const buf = Buffer.from(raw, 'utf8');
  if (buf.length <= maxBytes) return raw;
  const cut = buf.subarray(0, maxBytes).toString('utf8');
  return `${cut}\n[truncated, ${buf.length} bytes total]`;
}

/** Flatten an MCP tools/call result (`{ content: [{ type, text }], isError? }`) to text. */
export function parseToolCallResult(result: unknown): string {
  if (result == null) return '';
  if (!isRecord(result)) return JSON.stringify(result);

  const content = result.content;
  if (Array.isArray(content)) {
    const parts: string[] = [];
    for (const item of content) {
      if (!item) continue;
      if (isRecord(item) && typeof item.text === 'string') parts.push(item.text);
      else if (isRecord(item) && typeof item.data === 'string') parts.push(item.data);
      else parts.push(JSON.stringify(item));
    }
    return parts.join('\n').trim() || JSON.stringify(result);
  }
  if (typeof content === 'string') return content;
  if (typeof result.text === 'string') return result.text;
  return JSON.stringify(result);
}

function normalizeSchema(schema: unknown): Record<string, unknown> {
  if (isRecord(schema)) return schema;
  return { type: 'object', additionalProperties: false, properties: {}, required: [] };
}

// ── Client ──

export type McpToolInfo = {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
};

export type McpCallResult = { text: string; isError: boolean };

export class McpClient {
  constructor(
    readonly serverName: string,
    private readonly transport: RpcTransport,
    private readonly timeoutMs: number
  ) {}

  /** Handshake. Servers that do not implement it are still usable. */
  async initialize(): Promise<void> {
    try {
      await this.transport.request(
        'initialize',
        { protocolVersion: PROTOCOL_VERSION, capabilities: {}, clientInfo: { name: 'agentwire', version: PKG_VERSION } },
        this.timeoutMs
      );
      await this.transport.notify('notifications/initialized', {});
    } catch (e) {
      log.debug(`${this.serverName}: initialize failed, continuing: ${errorMessage(e)}`);
    }
  }

  async listTools(): Promise<McpToolInfo[]> {
    const res = await this.transport.request('tools/list', {}, this.timeoutMs);
    const list: unknown[] = isRecord(res) && Array.isArray(res.tools) ? res.tools : [];
    const out: McpToolInfo[] = [];
    for (const raw of list) {
      if (!isRecord(raw)) continue;
      const name = typeof raw.name === 'string' ? raw.name.trim() : '';
      if (!name) continue;
      out.push({
        name,
        description: typeof raw.description === 'string' ? raw.description.trim() : 'MCP tool',
        inputSchema: normalizeSchema(raw.inputSchema),
      });
    }
    return out;
  }

  async callTool(name: string, args: Record<string, unknown>, timeoutMs = this.timeoutMs): Promise<McpCallResult> {
    const res = await this.transport.request('tools/call', { name, arguments: args }, timeoutMs);
    return { text: parseToolCallResult(res), isError: isRecord(res) && res.isError === true };
  }

  close(): Promise<void> {
    return this.transport.close();
  }
}

/**
 * Wrap every tool the server lists as a capability. Remote tools ask for
 * approval once per session; results are clamped.
 */
export async function loadMcpTools(client: McpClient, opts: { exclude?: Iterable<string> } = {}): Promise<ToolCapability[]> {
  const taken = new Set(opts.exclude ?? []);
  const out: ToolCapability[] = [];
  for (const info of await client.listTools()) {
    if (taken.has(info.name)) {
      log.warn(`${client.serverName}: skipped '${info.name}' (name already in use)`);
      continue;
    }
    taken.add(info.name);
    out.push({
      name: info.name,
      description: `[mcp:${client.serverName}] ${info.description}`,
      schema: info.inputSchema,
      approval: 'session',
      async execute(args) {
        let res: McpCallResult;
        try {
          res = await client.callTool(info.name, args);
        } catch (e) {
          throw new ToolExecutionError(info.name, errorMessage(e), { cause: e });
        }
        const text = clampToolResult(res.text);
        if (res.isError) return { output: text || `MCP tool error: ${info.name}`, is_error: true };
        return text;
      },
    });
  }
  return out;
}

export type McpConnection = {
  clients: McpClient[];
  tools: ToolCapability[];
  close: () => Promise<void>;
};

/** Spawn the configured servers and collect their tools. A server that fails to start is skipped. */
export async function connectMcpServers(
  servers: readonly McpServerConfig[],
  opts: { timeoutMs: number; exclude?: Iterable<string> }
): Promise<McpConnection> {
  const clients: McpClient[] = [];
  const tools: ToolCapability[] = [];
  const taken = new Set(opts.exclude ?? []);

  for (const cfg of servers) {
    const client = new McpClient(cfg.name, new StdioRpcTransport(cfg.command, cfg.args, cfg.env), opts.timeoutMs);
    try {
      await client.initialize();
      const loaded = await loadMcpTools(client, { exclude: taken });
      for (const t of loaded) taken.add(t.name);
      tools.push(...loaded);
      clients.push(client);
      log.info(`${cfg.name}: ${loaded.length} tool(s)`);
    } catch (e) {
      log.warn(`${cfg.name}: ${errorMessage(e)}`);
      await client.close();
    }
  }

  return {
    clients,
    tools,
    close: async () => {
      const results = await Promise.allSettled(clients.map((c) => c.close()));
      const failed = results.filter((r) => r.status === 'rejected').length;
      if (failed) log.warn(`${failed} MCP server(s) did not close cleanly`);
    },
  };
}
