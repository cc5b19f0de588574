/**
 * 注册中心结果缓存 — 带 TTL 和容量上限的内存缓存
 * Map 的插入顺序即淘汰顺序，容量满时先清过期项再淘汰最旧项
 */

export interface TtlCacheOptions {
  maxSize: number;
  ttlMs: number;
  now?: () => number;
}

interface Entry<V> {
  value: V;
  expiresAt: number;
}

export class TtlCache<K, V> {
  private readonly store = new Map<K, Entry<V>>();
  private readonly clock: () => number;

  constructor(private readonly options: TtlCacheOptions) {
    this.clock = options.now ?? Date.now;
  }

  /** ttlMs 为 0 时缓存关闭 */
  get enabled(): boolean {
    return this.options.ttlMs > 0;
  }

  get(key: K): V | undefined {
    const entry = this.store.get(key);
    if (!entry) return undefined;
    if (this.clock() >= entry.expiresAt) {
      this.store.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: K, value: V): void {
    if (!this.enabled) return;
    // 先删除，重新插入时移到迭代顺序末尾
    this.store.delete(key);
    if (this.store.size >= this.options.maxSize) {
      this.evictExpired();
    }
    for (const oldest of this.store.keys()) {
      if (this.store.size < this.options.maxSize) break;
      this.store.delete(oldest);
    }
    this.store.set(key, { value, expiresAt: this.clock() + this.options.ttlMs });
  }

  /** 未过期条目数 */
  get size(): number {
    this.evictExpired();
    return this.store.size;
  }

  private evictExpired(): void {
    const now = this.clock();
    for (const [key, entry] of this.store) {
      if (now >= entry.expiresAt) this.store.delete(key);
    }
  }
}
