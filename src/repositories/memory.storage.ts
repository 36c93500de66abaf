import { Storage, StoredValue } from './storage';

interface Entry {
  value: StoredValue;
  expiresAt: number | null;
}

/**
 * In-memory storage for development and tests. Not shared across processes
 * and lost on restart. Expired entries are dropped lazily on read.
 */
export class MemoryStorage implements Storage {
  private data = new Map<string, Entry>();

  constructor(private readonly now: () => number = () => performance.now()) {}

  async get(key: string): Promise<StoredValue | null> {
    const entry = this.data.get(key);
    if (!entry) return null;

    if (entry.expiresAt !== null && this.now() >= entry.expiresAt) {
      this.data.delete(key);
      return null;
    }
    return structuredClone(entry.value);
  }

  async put(key: string, value: StoredValue, options: { ttl?: number } = {}): Promise<void> {
    const expiresAt = options.ttl !== undefined ? this.now() + options.ttl * 1000 : null;
    this.data.set(key, { value: structuredClone(value), expiresAt });
  }

  async delete(key: string): Promise<void> {
    this.data.delete(key);
  }

  get size(): number {
    return this.data.size;
  }
}
