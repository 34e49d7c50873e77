export interface PermissionCache {
  get(key: string): Promise<Set<string> | null>;
  set(key: string, permissions: Set<string>, ttlSeconds: number): Promise<void>;
  /** `pattern` is an exact key or a prefix ending in `*`. */
  delete(pattern: string): Promise<void>;
}

const PERMISSION_CACHE_MAX_SIZE = 5_000;

export class InMemoryPermissionCache implements PermissionCache {
  private store = new Map<string, { permissions: Set<string>; expiresAt: number }>();

  async get(key: string): Promise<Set<string> | null> {
    const entry = this.store.get(key);
    if (!entry) return null;
    if (Date.now() > entry.expiresAt) {
      this.store.delete(key);
      return null;
    }
    // LRU touch: move to end of insertion order
    this.store.delete(key);
    this.store.set(key, entry);
    return new Set(entry.permissions);
  }

  async set(key: string, permissions: Set<string>, ttlSeconds: number): Promise<void> {
    // LRU: delete-before-set ensures key moves to end
    this.store.delete(key);
    this.store.set(key, {
      permissions: new Set(permissions),
      expiresAt: Date.now() + ttlSeconds * 1000,
    });
    if (this.store.size > PERMISSION_CACHE_MAX_SIZE) {
      const keysIter = this.store.keys();
      const toEvict = this.store.size - PERMISSION_CACHE_MAX_SIZE;
      for (let i = 0; i < toEvict; i++) {
        const { value, done } = keysIter.next();
        if (done) break;
        this.store.delete(value);
      }
    }
  }

  async delete(pattern: string): Promise<void> {
    if (!pattern.endsWith('*')) {
      this.store.delete(pattern);
      return;
    }
    const prefix = pattern.slice(0, -1);
    for (const key of this.store.keys()) {
      if (key.startsWith(prefix)) {
        this.store.delete(key);
      }
    }
  }
}

let cacheInstance: PermissionCache | null = null;

export function getPermissionCache(): PermissionCache {
  if (!cacheInstance) {
    cacheInstance = new InMemoryPermissionCache();
  }
  return cacheInstance;
}

export function setPermissionCache(cache: PermissionCache): void {
  cacheInstance = cache;
}
