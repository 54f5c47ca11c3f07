import { lruGet, lruSet } from "./lru";
import { redisGet, redisSet } from "./redis";

const reason = (e: unknown) => (e instanceof Error ? e.message : String(e));

// Redis is a shared second tier; when it is unreachable the LRU still serves.
export async function cacheGet<T extends object>(key: string): Promise<T | null> {
  const m = lruGet<T>(key);
  if (m) return m;
  let r: T | null;
  try {
    r = await redisGet<T>(key);
  } catch (e) {
    console.warn("[cache] redis get failed:", reason(e));
    return null;
  }
  if (r) {
    lruSet(key, r);
    return r;
  }
  return null;
}

export async function cacheSet<T extends object>(
  key: string,
  value: T,
  opts?: { ttlSec?: number; lruTtlMs?: number }
) {
  lruSet(key, value, opts?.lruTtlMs);
  try {
    await redisSet(key, value, opts?.ttlSec ?? 3600);
  } catch (e) {
    console.warn("[cache] redis set failed:", reason(e));
  }
}

/** Returns the cached value for `key`, computing and storing it on a miss. */
export async function cached<T extends object>(
  key: string,
  compute: () => T,
  opts?: { ttlSec?: number }
): Promise<T> {
  const hit = await cacheGet<T>(key);
  if (hit) return hit;
  const value = compute();
  await cacheSet(key, value, opts);
  return value;
}
