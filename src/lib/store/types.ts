/**
 * Keyed, durable state for one kind of batch record. Everything that must
 * survive between host ticks goes through one of these.
 */
export interface KeyedStore<T> {
  get(key: string): Promise<T | null>;
  set(key: string, value: T): Promise<void>;
  delete(key: string): Promise<void>;
  has(key: string): Promise<boolean>;
}
