import assert from 'node:assert/strict';
import { PassThrough, Writable } from 'node:stream';
import { describe, it } from 'node:test';

import { ApprovalBroker } from '../src/hub/approval.js';
import { WireChannel, type ChannelCloseReason } from '../src/wire/channel.js';
import { encodeWireMessage } from '../src/wire/codec.js';
import { Wire } from '../src/wire/wire.js';

import { delay, waitFor } from './helpers.js';

function collect(stream: PassThrough): () => string[] {
  let text = '';
  stream.setEncoding('utf8');
  stream.on('data', (chunk: string) => {
    text += chunk;
  });
  return () => text.split('\n').filter(Boolean);
}

function requestApproval(wire: Wire, broker: ApprovalBroker, signal = new AbortController().signal) {
  return broker.request(
    (d) => wire.emit(d),
    { toolName: 'shell', args: { cmd: 'ls' }, summary: 'shell(cmd="ls")', agentId: 'root', turnId: 't1', toolCallId: 'c1' },
    signal
  );
}

describe('WireChannel', () => {
  it('writes one JSON line per emitted message', async () => {
    const wire = Wire.create({ sessionId: 's' });
    const output = new PassThrough();
    const lines = collect(output);
    new WireChannel(wire, new ApprovalBroker(), { output });

    const msg = wire.emit({ kind: 'TurnBegin', turn_id: 't1', payload: { input: 'hi' } });
    await waitFor(() => lines().length === 1);
    assert.deepEqual(lines(), [encodeWireMessage(msg)]);
  });

  it('routes inbound approval responses to the broker', async () => {
    const wire = Wire.create({ sessionId: 's' });
    const broker = new ApprovalBroker();
    const input = new PassThrough();
    const output = new PassThrough();
    const lines = collect(output);
    new WireChannel(wire, broker, { input, output });

    const decision = requestApproval(wire, broker);
    const [pending] = broker.pendingRequests();
    assert.ok(pending);
    input.write(JSON.stringify({ kind: 'ApprovalResponse', payload: { request_id: pending.requestId, decision: 'approve' } }) + '\n');

    assert.equal(await decision, 'approve');
    await waitFor(() => lines().length === 2);
    const sent = lines().map((l) => JSON.parse(l) as { kind: string; seq: number });
    assert.deepEqual(
      sent.map((m) => [m.kind, m.seq]),
      [
        ['ApprovalRequest', 1],
        ['ApprovalResponse', 2],
      ]
    );
  });

  it('ignores inbound lines of unknown kind', async () => {
    const wire = Wire.create({ sessionId: 's' });
    const broker = new ApprovalBroker();
    const input = new PassThrough();
    const channel = new WireChannel(wire, broker, { input, output: new PassThrough() });

    const decision = requestApproval(wire, broker);
    const [pending] = broker.pendingRequests();
    assert.ok(pending);
    input.write('{"kind":"Ping"}\n');
    input.write(JSON.stringify({ kind: 'ApprovalResponse', payload: { request_id: pending.requestId, decision: 'deny' } }) + '\n');

    assert.equal(await decision, 'deny');
    assert.equal(channel.closed, false);
  });

  it('closes only the offending channel on a malformed line', async () => {
    const wire = Wire.create({ sessionId: 's' });
    const broker = new ApprovalBroker();
    const badInput = new PassThrough();
    const badOutput = new PassThrough();
    const goodOutput = new PassThrough();
    const badLines = collect(badOutput);
    const goodLines = collect(goodOutput);

    let reason: ChannelCloseReason | undefined;
    const bad = new WireChannel(wire, broker, { input: badInput, output: badOutput }, { onClose: (r) => (reason = r) });
    const good = new WireChannel(wire, broker, { output: goodOutput });

    badInput.write('this is not json\n');
    await waitFor(() => bad.closed);
    assert.equal(reason?.kind, 'protocol_error');

    wire.emit({ kind: 'TurnBegin', payload: { input: 'still here' } });
    await waitFor(() => goodLines().length === 1);
    assert.equal(good.closed, false);
    assert.deepEqual(badLines(), []);
  });

  it('reports an answer to an unknown request without closing', async () => {
    const wire = Wire.create({ sessionId: 's' });
    const input = new PassThrough();
    const output = new PassThrough();
    const lines = collect(output);
    const channel = new WireChannel(wire, new ApprovalBroker(), { input, output });

    input.write(JSON.stringify({ kind: 'ApprovalResponse', payload: { request_id: 'apr_missing', decision: 'approve' } }) + '\n');
    input.write('{"kind":"Ping"}\n');
    await delay(20);
    wire.emit({ kind: 'TurnBegin', payload: { input: 'x' } });

    await waitFor(() => lines().length === 1);
    assert.equal(channel.closed, false);
    assert.equal(wire.lastSeq, 1);
  });

  it('closes a channel whose client went away and keeps emitting', async () => {
    const wire = Wire.create({ sessionId: 's' });
    const gone = new Writable({
      write(_chunk, _enc, cb) {
        cb(Object.assign(new Error('write EPIPE'), { code: 'EPIPE' }));
      },
    });
    const goodOutput = new PassThrough();
    const goodLines = collect(goodOutput);

    let reason: ChannelCloseReason | undefined;
    const broken = new WireChannel(wire, new ApprovalBroker(), { output: gone }, { onClose: (r) => (reason = r) });
    new WireChannel(wire, new ApprovalBroker(), { output: goodOutput });

    wire.emit({ kind: 'TurnBegin', turn_id: 't1', payload: { input: 'one' } });
    await waitFor(() => broken.closed);
    assert.ok(reason?.kind === 'output_error');
    assert.equal(reason.error.message, 'write EPIPE');

    wire.emit({ kind: 'TurnEnd', turn_id: 't1', payload: { status: 'completed', steps: 1 } });
    await waitFor(() => goodLines().length === 2);
    assert.equal(wire.lastSeq, 2);
  });
});
