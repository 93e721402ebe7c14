import type { Soul } from './soul.js';

export type ArenaEntry = {
  soul: Soul;
  parentId?: string;
  depth: number;
};

/** Live souls of one engine, keyed by agent id. Parents own their children's lifetimes. */
export class SoulArena {
  private readonly entries = new Map<string, ArenaEntry>();

  add(soul: Soul): void {
    this.entries.set(soul.id, { soul, parentId: soul.parentId, depth: soul.depth });
  }

  get(id: string): Soul | undefined {
    return this.entries.get(id)?.soul;
  }

  /** Drop a soul and everything it spawned. */
  release(id: string): void {
    for (const child of this.children(id)) this.release(child.id);
    this.entries.delete(id);
  }

  /** Direct children, by the agent id of their spawning soul. */
  children(id: string): Soul[] {
    const out: Soul[] = [];
    for (const e of this.entries.values()) if (e.parentId === id) out.push(e.soul);
    return out;
  }

  all(): Soul[] {
    return [...this.entries.values()].map((e) => e.soul);
  }

  get size(): number {
    return this.entries.size;
  }
}
