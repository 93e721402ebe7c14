import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  compactionBoundary,
  digestSummary,
  ProviderSummarizer,
  type Summarizer,
} from '../src/context/compaction.js';
import { Context } from '../src/context/context.js';
import { charEstimator } from '../src/context/estimator.js';
import { TurnInterruptedError } from '../src/errors.js';
import type { Message } from '../src/types.js';
import type { CompactionStatus } from '../src/wire/message.js';
import { Wire } from '../src/wire/wire.js';

import { committer, fixedClock, MemorySink, reply, ScriptedProvider, textMessage } from './helpers.js';

const fixedSummary = (text: string): Summarizer & { seen: Message[][] } => {
  const seen: Message[][] = [];
  return {
    seen,
    summarize: async (messages) => {
      seen.push([...messages]);
      return text;
    },
  };
};

function rig() {
  const sink = new MemorySink();
  const wire = Wire.create({ sessionId: 's', sink, clock: fixedClock() });
  const ctx = new Context();
  const commit = committer(wire, ctx);
  /** Compaction options that record the status the way a soul does. */
  const logged = { commit: (status: CompactionStatus) => commit({ kind: 'StatusUpdate', payload: status }) };
  return { sink, wire, ctx, commit, logged };
}

describe('Context projection', () => {
  it('turns one step into an assistant message followed by its results', () => {
    const { ctx, commit } = rig();
    commit({ kind: 'TurnBegin', turn_id: 't1', payload: { input: 'hi' } });
    commit({ kind: 'AssistantDelta', turn_id: 't1', payload: { step: 1, part: 'thinking', text: 'hm' } });
    commit({ kind: 'AssistantDelta', turn_id: 't1', payload: { step: 1, part: 'text', text: 'Let' } });
    commit({ kind: 'AssistantDelta', turn_id: 't1', payload: { step: 1, part: 'text', text: ' me' } });
    commit({ kind: 'ToolCallStarted', turn_id: 't1', tool_call_id: 'c1', payload: { step: 1, name: 'echo', args: { x: 1 } } });
    commit({ kind: 'ToolCallResult', turn_id: 't1', tool_call_id: 'c1', payload: { step: 1, status: 'ok', output: 'done' } });
    commit({ kind: 'AssistantDelta', turn_id: 't1', payload: { step: 2, part: 'text', text: 'Done.' } });
    commit({ kind: 'TurnEnd', turn_id: 't1', payload: { status: 'completed', steps: 2 } });

    assert.deepEqual(ctx.iterate(), [
      { role: 'user', content: [{ type: 'text', text: 'hi' }], created_at: '2026-01-01T00:00:00.000Z' },
      {
        role: 'assistant',
        content: [
          { type: 'thinking', text: 'hm' },
          { type: 'text', text: 'Let me' },
          { type: 'tool_call', id: 'c1', name: 'echo', args: { x: 1 } },
        ],
        created_at: '2026-01-01T00:00:01.000Z',
      },
      {
        role: 'tool',
        content: [{ type: 'tool_result', tool_call_id: 'c1', output: 'done', is_error: false }],
        created_at: '2026-01-01T00:00:05.000Z',
      },
      { role: 'assistant', content: [{ type: 'text', text: 'Done.' }], created_at: '2026-01-01T00:00:06.000Z' },
    ]);
  });

  it('marks every non-ok result as an error', () => {
    const { ctx, commit } = rig();
    commit({ kind: 'TurnBegin', turn_id: 't', payload: { input: 'go' } });
    const statuses = ['ok', 'error', 'denied', 'interrupted'] as const;
    statuses.forEach((status, i) => {
      commit({ kind: 'ToolCallStarted', turn_id: 't', tool_call_id: `c${i}`, payload: { step: 1, name: 'x', args: {} } });
    });
    statuses.forEach((status, i) => {
      commit({ kind: 'ToolCallResult', turn_id: 't', tool_call_id: `c${i}`, payload: { step: 1, status, output: status } });
    });

    const results = ctx
      .iterate()
      .filter((m) => m.role === 'tool')
      .map((m) => m.content[0]);
    assert.deepEqual(
      results.map((p) => (p?.type === 'tool_result' ? [p.tool_call_id, p.is_error] : null)),
      [
        ['c0', false],
        ['c1', true],
        ['c2', true],
        ['c3', true],
      ]
    );
  });

  it('ignores messages that carry no content', () => {
    const { ctx, commit } = rig();
    commit({ kind: 'TurnBegin', turn_id: 't', payload: { input: 'x' } });
    commit({ kind: 'Error', turn_id: 't', payload: { kind: 'internal', message: 'boom' } });
    commit({
      kind: 'StatusUpdate',
      turn_id: 't',
      payload: { kind: 'retry', step: 1, attempt: 1, max_attempts: 3, delay_ms: 0, error: 'timeout' },
    });
    commit({ kind: 'ApprovalRequest', turn_id: 't', payload: { request_id: 'r', tool_name: 'x', args: {}, summary: 'x()' } });
    assert.equal(ctx.length, 1);
  });

  it('append closes the open step first', () => {
    const { ctx, commit } = rig();
    commit({ kind: 'AssistantDelta', turn_id: 't', payload: { step: 1, part: 'text', text: 'a' } });
    ctx.append(textMessage('user', 'b'));
    commit({ kind: 'AssistantDelta', turn_id: 't', payload: { step: 1, part: 'text', text: 'c' } });
    assert.deepEqual(
      ctx.iterate().map((m) => [m.role, m.content[0]?.type === 'text' ? m.content[0].text : '']),
      [
        ['assistant', 'a'],
        ['user', 'b'],
        ['assistant', 'c'],
      ]
    );
  });

  it('empties on a clear and keeps what follows', () => {
    const { ctx, commit, sink } = rig();
    commit({ kind: 'TurnBegin', turn_id: 't1', payload: { input: 'old' } });
    commit({ kind: 'AssistantDelta', turn_id: 't1', payload: { step: 1, part: 'text', text: 'answer' } });
    commit({ kind: 'TurnEnd', turn_id: 't1', payload: { status: 'completed', steps: 1 } });
    commit({ kind: 'StatusUpdate', payload: { kind: 'clear' } });
    assert.equal(ctx.length, 0);

    commit({ kind: 'TurnBegin', turn_id: 't2', payload: { input: 'new' } });
    assert.deepEqual(ctx.iterate().map((m) => m.content[0]), [{ type: 'text', text: 'new' }]);
    assert.deepEqual(Context.fromWireMessages(sink.messages).iterate(), ctx.iterate());
  });

  it('ignores yolo toggles', () => {
    const { ctx, commit } = rig();
    commit({ kind: 'TurnBegin', turn_id: 't1', payload: { input: 'x' } });
    commit({ kind: 'StatusUpdate', payload: { kind: 'yolo', enabled: true } });
    assert.equal(ctx.length, 1);
  });

  it('rebuilds only the requested agent', () => {
    const { sink, wire, commit } = rig();
    commit({ kind: 'TurnBegin', turn_id: 't', payload: { input: 'root input' } });
    wire.child('sub_1', 'c1').emit({ kind: 'TurnBegin', turn_id: 'u', payload: { input: 'child input' } });

    const root = Context.fromWireMessages(sink.messages);
    const child = Context.fromWireMessages(sink.messages, { agentId: 'sub_1' });
    assert.deepEqual(root.iterate().map((m) => m.content[0]), [{ type: 'text', text: 'root input' }]);
    assert.deepEqual(child.iterate().map((m) => m.content[0]), [{ type: 'text', text: 'child input' }]);
  });
});

describe('estimateTokens', () => {
  it('counts chars/4 plus a per-message overhead', () => {
    const ctx = new Context();
    ctx.append(textMessage('user', 'abcd'));
    assert.equal(ctx.estimateTokens(), 6);
  });

  it('counts tool call names and arguments', () => {
    const m: Message = {
      role: 'assistant',
      content: [{ type: 'tool_call', id: 'c', name: 'ls', args: {} }],
      created_at: '',
    };
    // 20 + 2 + 2 + 30 = 54 chars
    assert.equal(charEstimator.estimate([m]), 14);
  });
});

describe('compaction', () => {
  const five = () => ['m1', 'm2', 'm3', 'm4', 'm5'].map((t, i) => textMessage(i % 2 ? 'assistant' : 'user', t));

  it('folds all but the protected tail into one summary', async () => {
    const { ctx, logged } = rig();
    for (const m of five()) ctx.append(m);
    const summarizer = fixedSummary('S');

    const status = await ctx.compact(2, summarizer, logged);

    assert.deepEqual(status, { kind: 'compaction', replaced: 3, summary: 'S', tokens_before: 28, tokens_after: 17 });
    assert.deepEqual(summarizer.seen[0]?.map((m) => m.content[0]), [
      { type: 'text', text: 'm1' },
      { type: 'text', text: 'm2' },
      { type: 'text', text: 'm3' },
    ]);
    const after = ctx.iterate();
    assert.equal(after.length, 3);
    assert.equal(after[0]?.role, 'system');
    assert.equal(after[0]?.summary, true);
    assert.deepEqual(after[0]?.content, [{ type: 'text', text: 'S' }]);
    assert.equal(ctx.compactionCount, 1);
  });

  it('is a no-op when the prefix is only the previous summary', async () => {
    const { ctx, logged } = rig();
    for (const m of five()) ctx.append(m);
    await ctx.compact(2, fixedSummary('S'), logged);
    const again = fixedSummary('T');
    assert.equal(await ctx.compact(2, again, logged), null);
    assert.equal(again.seen.length, 0);
    assert.equal(ctx.compactionCount, 1);
  });

  it('changes nothing until the committer applies the status', async () => {
    const ctx = new Context();
    for (const m of five()) ctx.append(m);
    const recorded: CompactionStatus[] = [];

    const status = await ctx.compact(2, fixedSummary('S'), { commit: (s) => recorded.push(s) });

    assert.deepEqual(recorded, [status]);
    assert.equal(ctx.length, 5);
    assert.equal(ctx.compactionCount, 0);
  });

  it('does nothing when everything is protected', async () => {
    const { ctx, logged } = rig();
    for (const m of five()) ctx.append(m);
    assert.equal(await ctx.compact(5, fixedSummary('S'), logged), null);
    assert.equal(ctx.length, 5);
  });

  it('never separates tool results from their call', () => {
    const call: Message = {
      role: 'assistant',
      content: [
        { type: 'tool_call', id: 'a', name: 'x', args: {} },
        { type: 'tool_call', id: 'b', name: 'x', args: {} },
      ],
      created_at: '',
    };
    const result = (id: string): Message => ({
      role: 'tool',
      content: [{ type: 'tool_result', tool_call_id: id, output: '', is_error: false }],
      created_at: '',
    });
    const msgs = [textMessage('user', 'q'), call, result('a'), result('b'), textMessage('user', 'next')];
    // A tail of 2 would start at result('b'); the cut moves back before the call.
    assert.equal(compactionBoundary(msgs, 2), 1);
    assert.equal(compactionBoundary(msgs, 1), 4);
  });

  it('hands the status to a committer instead of applying it', async () => {
    const { ctx, commit, sink } = rig();
    commit({ kind: 'TurnBegin', turn_id: 't1', payload: { input: 'one' } });
    commit({ kind: 'AssistantDelta', turn_id: 't1', payload: { step: 1, part: 'text', text: 'two' } });
    commit({ kind: 'TurnEnd', turn_id: 't1', payload: { status: 'completed', steps: 1 } });
    commit({ kind: 'TurnBegin', turn_id: 't2', payload: { input: 'three' } });

    let lengthDuringCommit = -1;
    await ctx.compact(1, fixedSummary('S'), {
      commit: (status) => {
        lengthDuringCommit = ctx.length;
        commit({ kind: 'StatusUpdate', turn_id: 't2', payload: status });
      },
    });

    assert.equal(lengthDuringCommit, 3);
    assert.equal(ctx.length, 2);
    assert.deepEqual(Context.fromWireMessages(sink.messages).iterate(), ctx.iterate());
  });
});

describe('ProviderSummarizer', () => {
  const msgs = [textMessage('user', 'hello')];

  it('uses the model reply', async () => {
    const provider = new ScriptedProvider([reply('  short summary \n')]);
    assert.equal(await new ProviderSummarizer(provider).summarize(msgs), 'short summary');
    assert.equal(provider.requests[0]?.tools.length, 0);
  });

  it('falls back to a digest when the model fails', async () => {
    const provider = new ScriptedProvider([new Error('503 upstream')]);
    assert.equal(await new ProviderSummarizer(provider).summarize(msgs), 'Earlier conversation (1 messages):\nuser: hello');
  });

  it('does not swallow an abort', async () => {
    const ac = new AbortController();
    ac.abort();
    const provider = new ScriptedProvider([new TurnInterruptedError()]);
    await assert.rejects(new ProviderSummarizer(provider).summarize(msgs, ac.signal), TurnInterruptedError);
  });

  it('digest clips long lines', () => {
    const out = digestSummary([textMessage('user', 'x'.repeat(10))], 8);
    assert.equal(out, 'Earlier conversation (1 messages):\nuser: xx…');
  });
});
