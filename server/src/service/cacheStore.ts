// src/service/cacheStore.ts
//
// 目的:
// - 対話モードの結果キャッシュ（calc:sync:{fingerprint}）と
//   ワーカーの進捗チャネル（calc:progress:{id}）が使うキー・バリューストア。
// - 実装はメモリ版のみ。TTL は注入した時計で判定する。
export interface CacheStore<V> {
  get(key: string): Promise<V | null>;
  set(key: string, value: V, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
}

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export interface InMemoryCacheOptions {
  now?: () => number;
}

export const createInMemoryCacheStore = <V>({
  now = Date.now,
}: InMemoryCacheOptions = {}): CacheStore<V> & {
  entries: Map<string, CacheEntry<V>>;
} => {
  const entries = new Map<string, CacheEntry<V>>();

  return {
    entries,

    async get(key) {
      const entry = entries.get(key);
      if (!entry) return null;
      if (entry.expiresAt <= now()) {
        entries.delete(key);
        return null;
      }
      return structuredClone(entry.value);
    },

    async set(key, value, ttlSeconds) {
      entries.set(key, {
        value: structuredClone(value),
        expiresAt: now() + ttlSeconds * 1000,
      });
    },

    async delete(key) {
      entries.delete(key);
    },
  };
};
