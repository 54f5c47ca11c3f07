import { LRUCache } from "lru-cache";

// cached views are JSON objects or arrays
export const lru = new LRUCache<string, object>({
  max: 200,
  ttl: 10 * 60 * 1000,
});

export const lruGet = <T extends object>(k: string): T | null =>
  (lru.get(k) as T | undefined) ?? null;

export const lruSet = <T extends object>(k: string, v: T, ttlMs?: number): void => {
  if (ttlMs !== undefined) lru.set(k, v, { ttl: ttlMs });
  else lru.set(k, v);
};
