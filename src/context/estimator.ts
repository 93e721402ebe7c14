import type { ContentPart, Message } from '../types.js';

export interface TokenEstimator {
  estimate(messages: readonly Message[]): number;
}

const MESSAGE_OVERHEAD_CHARS = 20;
const TOOL_CALL_OVERHEAD_CHARS = 30;

function partChars(p: ContentPart): number {
  switch (p.type) {
    case 'text':
    case 'thinking':
      return p.text.length;
    case 'tool_call':
      return p.name.length + JSON.stringify(p.args).length + TOOL_CALL_OVERHEAD_CHARS;
    case 'tool_result':
      return p.output.length;
  }
}

/** Crude chars/4 estimate with a fixed per-message overhead. Not a tokenizer. */
export const charEstimator: TokenEstimator = {
  estimate(messages) {
    let chars = 0;
    for (const m of messages) {
      chars += MESSAGE_OVERHEAD_CHARS;
      for (const p of m.content) chars += partChars(p);
    }
    return Math.ceil(chars / 4);
  },
};
