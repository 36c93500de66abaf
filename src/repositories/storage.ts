/**
 * A JSON object as stored by a key-value backend.
 */
export type StoredValue = Record<string, unknown>;

/**
 * Async key-value storage capability used for tokens, installations,
 * OAuth state and install sessions.
 *
 * Implementations must treat expired entries as absent and make `delete`
 * a no-op for missing keys.
 */
export interface Storage {
  get(key: string): Promise<StoredValue | null>;
  put(key: string, value: StoredValue, options?: { ttl?: number }): Promise<void>;
  delete(key: string): Promise<void>;
  /** Optional one-time provisioning (tables, indexes). */
  ensureReady?(): Promise<void>;
}

export function isStoredValue(value: unknown): value is StoredValue {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
