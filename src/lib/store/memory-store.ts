import type { KeyedStore } from "./types";

export class MemoryStore<T> implements KeyedStore<T> {
  private entries = new Map<string, T>();

  async get(key: string): Promise<T | null> {
    return this.entries.get(key) ?? null;
  }

  async set(key: string, value: T): Promise<void> {
    this.entries.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async has(key: string): Promise<boolean> {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }
}
