import type { IPersistenceProvider } from '../interfaces';

/**
 * In-memory persistence provider.
 * Stores serialized graphs in memory (lost on process restart)
 * @category Providers
 */
export class MemoryStateProvider implements IPersistenceProvider {
  private readonly storage = new Map<string, { value: string; expires?: number }>();

  async saveState(key: string, value: string, options?: { ttl?: number }): Promise<void> {
    this.storage.set(key, {
      value,
      expires: options?.ttl ? Date.now() + options.ttl * 1000 : undefined,
    });
  }

  async loadState(key: string): Promise<string | null> {
    const item = this.storage.get(key);
    if (!item) {
      return null;
    }

    if (item.expires && item.expires < Date.now()) {
      this.storage.delete(key);
      return null;
    }

    return item.value;
  }

  async deleteState(key: string): Promise<void> {
    this.storage.delete(key);
  }

  clear(): void {
    this.storage.clear();
  }

  getKeys(): string[] {
    return Array.from(this.storage.keys());
  }
}
