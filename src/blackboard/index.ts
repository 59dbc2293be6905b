import { setEntry, type Value } from "../types/values.js";

/**
 * Variable store holding the latest value per key. A board created with
 * `overlay` reads through to its parent but keeps its own writes until
 * `merge` folds them back in.
 */
export interface Blackboard {
  readonly entries: Map<string, Value>;
  readonly parent?: Blackboard;
}

export function createBlackboard(seed: Readonly<Record<string, Value>> = {}): Blackboard {
  return { entries: new Map(Object.entries(seed)) };
}

export function overlay(parent: Blackboard): Blackboard {
  return { entries: new Map(), parent };
}

export function read(bb: Blackboard, key: string): Value | undefined {
  for (let cur: Blackboard | undefined = bb; cur; cur = cur.parent) {
    if (cur.entries.has(key)) return cur.entries.get(key);
  }
  return undefined;
}

export function write(bb: Blackboard, key: string, value: Value): void {
  bb.entries.set(key, value);
}

/** Latest value of every visible key, in first-write order from the root board down. */
export function snapshot(bb: Blackboard): Record<string, Value> {
  const chain: Blackboard[] = [];
  for (let cur: Blackboard | undefined = bb; cur; cur = cur.parent) chain.unshift(cur);
  const out: Record<string, Value> = {};
  for (const b of chain) {
    for (const [k, v] of b.entries) setEntry(out, k, v);
  }
  return out;
}

/** Folds an overlay's writes into its parent and empties the overlay. */
export function merge(child: Blackboard): void {
  const target = child.parent;
  if (!target) throw new Error("merge: blackboard has no parent");
  for (const [k, v] of child.entries) target.entries.set(k, v);
  child.entries.clear();
}
