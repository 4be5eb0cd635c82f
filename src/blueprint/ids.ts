// src/blueprint/ids.ts

export type IdKind = "page" | "action" | "assertion" | "component" | "method" | "selector" | "sequence";

export const ID_KINDS: readonly IdKind[] = ["page", "action", "assertion", "component", "method", "selector", "sequence"];

/**
 * Hands out `{kind}_{n}` ids, 1-based and contiguous per kind, in the order they
 * are requested. One allocator per analysis run.
 */
export class IdAllocator {
  private readonly counters = new Map<IdKind, number>();

  next(kind: IdKind): string {
    const n = (this.counters.get(kind) ?? 0) + 1;
    this.counters.set(kind, n);
    return `${kind}_${n}`;
  }

  count(kind: IdKind): number {
    return this.counters.get(kind) ?? 0;
  }
}

/** Splits "action_12" into its kind and number; null when the id is malformed. */
export function parseId(id: string): { kind: IdKind; n: number } | null {
  const m = /^([a-z]+)_(\d+)$/.exec(id);
  if (!m) return null;
  const kind = ID_KINDS.find((k) => k === m[1]);
  if (!kind) return null;
  return { kind, n: Number(m[2]) };
}
