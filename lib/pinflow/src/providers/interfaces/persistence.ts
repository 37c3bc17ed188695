/**
 * Persistence provider interface.
 * Stores serialized graph files under string keys.
 * @category Providers
 */
export interface IPersistenceProvider {
  /**
   * Save a serialized graph, optionally expiring after ttl seconds
   */
  saveState(key: string, value: string, options?: { ttl?: number }): Promise<void>;

  /**
   * Load a serialized graph, or null if absent or expired
   */
  loadState(key: string): Promise<string | null>;

  deleteState(key: string): Promise<void>;
}
