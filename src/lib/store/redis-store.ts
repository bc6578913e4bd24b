import type { ZodType } from "zod";
import { BATCH_TTL } from "@/lib/constants";
import type { KeyedStore } from "./types";

/** The subset of the Upstash Redis client this store uses. */
export interface RedisClient {
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown, opts: { ex: number }): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  exists(...keys: string[]): Promise<number>;
}

let redis: import("@upstash/redis").Redis | null = null;

async function getRedis(): Promise<RedisClient> {
  if (redis) return redis;
  const url = process.env.KV_REST_API_URL;
  const token = process.env.KV_REST_API_TOKEN;
  if (!url || !token) {
    throw new Error("KV_REST_API_URL and KV_REST_API_TOKEN must be set");
  }
  const { Redis } = await import("@upstash/redis");
  redis = new Redis({ url, token });
  return redis;
}

export interface RedisStoreOptions<T> {
  namespace: string;
  schema: ZodType<T>;
  ttlSeconds?: number;
  client?: RedisClient;
}

export class RedisStore<T> implements KeyedStore<T> {
  private readonly namespace: string;
  private readonly schema: ZodType<T>;
  private readonly ttlSeconds: number;
  private readonly client?: RedisClient;

  constructor(options: RedisStoreOptions<T>) {
    this.namespace = options.namespace;
    this.schema = options.schema;
    this.ttlSeconds = options.ttlSeconds ?? BATCH_TTL;
    this.client = options.client;
  }

  private key(batchId: string): string {
    return `xyz:${this.namespace}:${batchId}`;
  }

  private async kv(): Promise<RedisClient> {
    return this.client ?? getRedis();
  }

  async get(batchId: string): Promise<T | null> {
    const kv = await this.kv();
    const raw = await kv.get(this.key(batchId));
    if (raw === null || raw === undefined) return null;
    const parsed = this.schema.safeParse(raw);
    if (!parsed.success) {
      console.error(`[redis-store] Discarding malformed ${this.namespace} entry for ${batchId}:`, parsed.error.message);
      return null;
    }
    return parsed.data;
  }

  async set(batchId: string, value: T): Promise<void> {
    const kv = await this.kv();
    await kv.set(this.key(batchId), value, { ex: this.ttlSeconds });
  }

  async delete(batchId: string): Promise<void> {
    const kv = await this.kv();
    await kv.del(this.key(batchId));
  }

  async has(batchId: string): Promise<boolean> {
    const kv = await this.kv();
    return (await kv.exists(this.key(batchId))) > 0;
  }
}
