// Cache entries — pure freshness rules.
//
// An entry is fresh while `now - insertedAt < ttlMs`. Nothing here sweeps;
// callers decide what to do with an expired entry when they look it up.

export interface CacheEntry<A> {
  readonly value: A;
  readonly insertedAt: number; // epoch ms
  readonly ttlMs: number;
}

export const CacheEntry = <A>(
  value: A,
  insertedAt: number,
  ttlMs: number,
): CacheEntry<A> => ({ value, insertedAt, ttlMs });

export function isFresh<A>(entry: CacheEntry<A>, now: number): boolean {
  return now - entry.insertedAt < entry.ttlMs;
}

// --- Lookup ---

export type Lookup<A> =
  | { readonly _tag: "Hit"; readonly entry: CacheEntry<A> }
  | { readonly _tag: "Expired"; readonly entry: CacheEntry<A> }
  | { readonly _tag: "Miss" };

export function classify<A>(
  entry: CacheEntry<A> | undefined,
  now: number,
): Lookup<A> {
  if (entry === undefined) return { _tag: "Miss" };
  return isFresh(entry, now)
    ? { _tag: "Hit", entry }
    : { _tag: "Expired", entry };
}
