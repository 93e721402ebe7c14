import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { AgentwireError, ToolNotFoundError } from '../src/errors.js';
import { ApprovalBroker, approveAll, denyAll, type ApprovalResponder } from '../src/hub/approval.js';
import { defaultSummary, getArgValidationIssues } from '../src/hub/capability.js';
import { DENIED_OUTPUT, INTERRUPTED_OUTPUT, ToolHub, type DispatchContext } from '../src/hub/hub.js';
import type { ToolCallStatus } from '../src/types.js';
import { Wire } from '../src/wire/wire.js';

import { delay, kinds, MemorySink, recordingTool, untilAborted, waitFor } from './helpers.js';

function dispatchRig(opts: { responder?: ApprovalResponder; yolo?: boolean; signal?: AbortSignal } = {}) {
  const sink = new MemorySink();
  const wire = Wire.create({ sessionId: 's', sink });
  const broker = new ApprovalBroker({ responder: opts.responder });
  const statuses: Array<[string, ToolCallStatus]> = [];
  const ctx: DispatchContext = {
    emit: (d) => wire.emit(d),
    broker,
    signal: opts.signal ?? new AbortController().signal,
    turnId: 't1',
    step: 1,
    agentId: 'root',
    depth: 0,
    yolo: opts.yolo ?? false,
    onStatus: (id, s) => statuses.push([id, s]),
  };
  return { sink, wire, broker, ctx, statuses };
}

describe('ToolHub registry', () => {
  it('rejects duplicate names', () => {
    const hub = new ToolHub([recordingTool('a')]);
    assert.throws(() => hub.register(recordingTool('a')), AgentwireError);
  });

  it('subset keeps only the named tools that exist', () => {
    const hub = new ToolHub([recordingTool('a'), recordingTool('b'), recordingTool('c')]);
    assert.deepEqual(hub.subset(['c', 'a', 'zzz']).names(), ['c', 'a']);
  });

  it('exposes schemas for the model', () => {
    const hub = new ToolHub([recordingTool('a', { schema: { type: 'object', properties: { x: { type: 'string' } } } })]);
    assert.deepEqual(hub.schemas(), [
      { name: 'a', description: 'a tool', parameters: { type: 'object', properties: { x: { type: 'string' } } } },
    ]);
  });
});

describe('ToolHub.dispatch', () => {
  it('runs a tool that needs no approval and records its result', async () => {
    const tool = recordingTool('echo');
    const { sink, ctx, statuses } = dispatchRig();

    const r = await new ToolHub([tool]).dispatch({ id: 'c1', name: 'echo', args: { x: 1 } }, ctx);

    assert.deepEqual(r, { tool_call_id: 'c1', status: 'ok', output: 'echo ok' });
    assert.deepEqual(tool.calls[0]?.args, { x: 1 });
    assert.equal(tool.calls[0]?.ctx.toolCallId, 'c1');
    assert.deepEqual(kinds(sink.messages), ['ToolCallResult']);
    assert.deepEqual(statuses, [
      ['c1', 'executing'],
      ['c1', 'completed'],
    ]);
  });

  it('validates arguments before asking for approval', async () => {
    const tool = recordingTool('edit', {
      approval: 'always',
      schema: { type: 'object', properties: { path: { type: 'string' } }, required: ['path'] },
    });
    const asked: string[] = [];
    const { sink, ctx } = dispatchRig({
      responder: (req) => {
        asked.push(req.toolName);
        return 'approve';
      },
    });

    const r = await new ToolHub([tool]).dispatch({ id: 'c1', name: 'edit', args: {} }, ctx);

    assert.deepEqual(r, { tool_call_id: 'c1', status: 'error', output: 'Invalid arguments for edit: path is required' });
    assert.deepEqual(asked, []);
    assert.equal(tool.calls.length, 0);
    assert.deepEqual(kinds(sink.messages), ['ToolCallResult']);
  });

  it('asks before running and logs request and response', async () => {
    const tool = recordingTool('shell', { approval: 'always' });
    const { sink, ctx, statuses } = dispatchRig({ responder: approveAll });

    const r = await new ToolHub([tool]).dispatch({ id: 'c1', name: 'shell', args: { cmd: 'ls' } }, ctx);

    assert.equal(r.status, 'ok');
    assert.deepEqual(kinds(sink.messages), ['ApprovalRequest', 'ApprovalResponse', 'ToolCallResult']);
    const req = sink.messages[0];
    assert.equal(req?.kind === 'ApprovalRequest' ? req.payload.summary : '', 'shell(cmd="ls")');
    assert.deepEqual(
      statuses.map(([, s]) => s),
      ['awaiting_approval', 'approved', 'executing', 'completed']
    );
  });

  it('never runs a denied call', async () => {
    const tool = recordingTool('rm', { approval: 'always' });
    const { ctx } = dispatchRig({ responder: denyAll });

    const r = await new ToolHub([tool]).dispatch({ id: 'c1', name: 'rm', args: {} }, ctx);

    assert.deepEqual(r, { tool_call_id: 'c1', status: 'denied', output: DENIED_OUTPUT });
    assert.equal(tool.calls.length, 0);
  });

  it('remembers always_allow for session tools only', async () => {
    const session = recordingTool('write', { approval: 'session' });
    const always = recordingTool('shell', { approval: 'always' });
    const asked: string[] = [];
    const { ctx, broker } = dispatchRig({
      responder: (req) => {
        asked.push(req.toolName);
        return 'always_allow';
      },
    });
    const hub = new ToolHub([session, always]);

    await hub.dispatch({ id: 'c1', name: 'write', args: {} }, ctx);
    await hub.dispatch({ id: 'c2', name: 'write', args: {} }, ctx);
    await hub.dispatch({ id: 'c3', name: 'shell', args: {} }, ctx);
    await hub.dispatch({ id: 'c4', name: 'shell', args: {} }, ctx);

    assert.deepEqual(asked, ['write', 'shell', 'shell']);
    assert.equal(broker.hasGrant('write'), true);
    assert.equal(session.calls.length, 2);
  });

  it('yolo skips every prompt', async () => {
    const tool = recordingTool('shell', { approval: 'always' });
    const { sink, ctx } = dispatchRig({ yolo: true });
    await new ToolHub([tool]).dispatch({ id: 'c1', name: 'shell', args: {} }, ctx);
    assert.deepEqual(kinds(sink.messages), ['ToolCallResult']);
  });

  it('turns a thrown error into error output', async () => {
    const tool = recordingTool('boom', {
      run: async () => {
        throw new Error('disk full');
      },
    });
    const { ctx, statuses } = dispatchRig();
    const r = await new ToolHub([tool]).dispatch({ id: 'c1', name: 'boom', args: {} }, ctx);
    assert.deepEqual(r, { tool_call_id: 'c1', status: 'error', output: 'Error: disk full' });
    assert.deepEqual(statuses.at(-1), ['c1', 'failed']);
  });

  it('keeps is_error output as an error result', async () => {
    const tool = recordingTool('grep', { run: async () => ({ output: 'no matches', is_error: true }) });
    const { ctx } = dispatchRig();
    const r = await new ToolHub([tool]).dispatch({ id: 'c1', name: 'grep', args: {} }, ctx);
    assert.deepEqual(r, { tool_call_id: 'c1', status: 'error', output: 'no matches' });
  });

  it('fails on an unknown tool without recording anything', async () => {
    const { sink, ctx } = dispatchRig();
    await assert.rejects(new ToolHub().dispatch({ id: 'c1', name: 'nope', args: {} }, ctx), ToolNotFoundError);
    assert.deepEqual(sink.messages, []);
  });

  it('reports interrupted when the signal fires during approval', async () => {
    const ac = new AbortController();
    const tool = recordingTool('shell', { approval: 'always' });
    const { sink, ctx, broker } = dispatchRig({ signal: ac.signal });

    const pending = new ToolHub([tool]).dispatch({ id: 'c1', name: 'shell', args: {} }, ctx);
    await waitFor(() => broker.pendingRequests().length === 1);
    ac.abort();

    assert.deepEqual(await pending, { tool_call_id: 'c1', status: 'interrupted', output: INTERRUPTED_OUTPUT });
    assert.deepEqual(broker.pendingRequests(), []);
    assert.equal(tool.calls.length, 0);
    assert.deepEqual(kinds(sink.messages), ['ApprovalRequest', 'ToolCallResult']);
  });

  it('reports interrupted when the signal fires while running', async () => {
    const ac = new AbortController();
    const tool = recordingTool('sleep', { run: (_args, c) => untilAborted(c.signal) });
    const { ctx } = dispatchRig({ signal: ac.signal });

    const pending = new ToolHub([tool]).dispatch({ id: 'c1', name: 'sleep', args: {} }, ctx);
    await waitFor(() => tool.calls.length === 1);
    ac.abort();
    assert.equal((await pending).status, 'interrupted');
  });
});

describe('ToolHub.dispatchAll', () => {
  it('runs neighbouring parallel-safe calls together and records in request order', async () => {
    const events: string[] = [];
    const timed = (name: string, ms: number, parallelSafe: boolean) =>
      recordingTool(name, {
        parallelSafe,
        run: async () => {
          events.push(`start:${name}`);
          await delay(ms);
          events.push(`end:${name}`);
          return name;
        },
      });
    const hub = new ToolHub([timed('a', 30, true), timed('b', 5, true), timed('s', 1, false), timed('c', 1, true)]);
    const { sink, ctx } = dispatchRig();

    const results = await hub.dispatchAll(
      [
        { id: '1', name: 'a', args: {} },
        { id: '2', name: 'b', args: {} },
        { id: '3', name: 's', args: {} },
        { id: '4', name: 'c', args: {} },
      ],
      ctx
    );

    assert.deepEqual(events, ['start:a', 'start:b', 'end:b', 'end:a', 'start:s', 'end:s', 'start:c', 'end:c']);
    assert.deepEqual(
      results.map((r) => r.output),
      ['a', 'b', 's', 'c']
    );
    assert.deepEqual(
      sink.messages.map((m) => m.tool_call_id),
      ['1', '2', '3', '4']
    );
  });

  it('runs nothing when one name is unknown', async () => {
    const tool = recordingTool('a');
    const { sink, ctx } = dispatchRig();
    await assert.rejects(
      new ToolHub([tool]).dispatchAll(
        [
          { id: '1', name: 'a', args: {} },
          { id: '2', name: 'ghost', args: {} },
        ],
        ctx
      ),
      (e: unknown) => e instanceof ToolNotFoundError && e.toolName === 'ghost'
    );
    assert.equal(tool.calls.length, 0);
    assert.deepEqual(sink.messages, []);
  });
});

describe('ApprovalBroker', () => {
  it('ignores answers to unknown requests', () => {
    assert.equal(new ApprovalBroker().respond('apr_missing', 'approve'), false);
  });

  it('denies when the responder throws', async () => {
    const wire = Wire.create({ sessionId: 's' });
    const broker = new ApprovalBroker({
      responder: () => {
        throw new Error('no terminal');
      },
    });
    const decision = await broker.request(
      (d) => wire.emit(d),
      { toolName: 'x', args: {}, summary: 'x()', agentId: 'root', turnId: 't', toolCallId: 'c' },
      new AbortController().signal
    );
    assert.equal(decision, 'deny');
  });
});

describe('capability helpers', () => {
  it('summarizes arguments on one line', () => {
    assert.equal(defaultSummary('ls', {}), 'ls()');
    assert.equal(defaultSummary('grep', { pattern: 'foo', limit: 3 }), 'grep(pattern="foo", limit=3)');
    assert.equal(defaultSummary('t', { a: 1, b: 2, c: 3, d: 4, e: 5 }), 't(a=1, b=2, c=3, d=4, …)');
  });

  it('checks types, enums and unknown properties', () => {
    const schema = {
      type: 'object',
      properties: { mode: { type: 'string', enum: ['r', 'w'] }, n: { type: 'integer' } },
      additionalProperties: false,
    };
    assert.deepEqual(getArgValidationIssues(schema, { mode: 'x', n: 1.5, extra: true }), [
      { field: 'mode', message: 'must be one of "r", "w"' },
      { field: 'n', message: 'must be integer' },
      { field: 'extra', message: 'unknown property' },
    ]);
    assert.deepEqual(getArgValidationIssues(schema, { mode: 'r', n: 2 }), []);
  });
});
