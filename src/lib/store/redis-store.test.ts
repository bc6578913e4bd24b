import { afterEach, describe, expect, it, vi } from "vitest";
import { ExecutionManager } from "@/lib/execution/execution-manager";
import { gridExecutionSnapshotSchema } from "@/lib/schemas";
import { RedisStore, type RedisClient } from "./redis-store";

/** In-process stand-in for the Upstash client; values pass through JSON like the REST API. */
class FakeRedis implements RedisClient {
  readonly values = new Map<string, unknown>();
  readonly ttls = new Map<string, number>();

  async get(key: string): Promise<unknown> {
    return this.values.get(key) ?? null;
  }

  async set(key: string, value: unknown, opts: { ex: number }): Promise<unknown> {
    const json: unknown = JSON.parse(JSON.stringify(value));
    this.values.set(key, json);
    this.ttls.set(key, opts.ex);
    return "OK";
  }

  async del(...keys: string[]): Promise<number> {
    return keys.filter((key) => this.values.delete(key)).length;
  }

  async exists(...keys: string[]): Promise<number> {
    return keys.filter((key) => this.values.has(key)).length;
  }
}

const snapshot = {
  batchId: "r1",
  totalIterations: 4,
  currentIteration: 1,
  xIndex: 1,
  yIndex: 0,
  zIndex: 0,
  xCount: 2,
  yCount: 2,
  zCount: 1,
};

describe("RedisStore", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("stores entries under a namespaced key with the batch TTL", async () => {
    const client = new FakeRedis();
    const store = new RedisStore({ namespace: "executions", schema: gridExecutionSnapshotSchema, client });

    await store.set("r1", snapshot);

    expect(client.ttls.get("xyz:executions:r1")).toBe(86400);
    expect(await store.get("r1")).toEqual(snapshot);
    expect(await store.has("r1")).toBe(true);
  });

  it("honours a custom TTL", async () => {
    const client = new FakeRedis();
    const store = new RedisStore({ namespace: "executions", schema: gridExecutionSnapshotSchema, client, ttlSeconds: 60 });
    await store.set("r1", snapshot);
    expect(client.ttls.get("xyz:executions:r1")).toBe(60);
  });

  it("returns null for missing and deleted entries", async () => {
    const store = new RedisStore({ namespace: "executions", schema: gridExecutionSnapshotSchema, client: new FakeRedis() });
    expect(await store.get("missing")).toBeNull();

    await store.set("r1", snapshot);
    await store.delete("r1");
    expect(await store.get("r1")).toBeNull();
    expect(await store.has("r1")).toBe(false);
  });

  it("discards entries that fail validation", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const client = new FakeRedis();
    client.values.set("xyz:executions:r1", { batchId: "r1", totalIterations: "four" });
    const store = new RedisStore({ namespace: "executions", schema: gridExecutionSnapshotSchema, client });

    expect(await store.get("r1")).toBeNull();
    expect(error).toHaveBeenCalledOnce();
  });

  it("lets a sweep resume in a fresh manager", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const client = new FakeRedis();
    const store = () => new RedisStore({ namespace: "executions", schema: gridExecutionSnapshotSchema, client });

    const first = new ExecutionManager(store());
    await first.initializeBatch("r2", ["a", "b"], [1, 2], [""]);
    await first.advanceBatch("r2");

    const second = new ExecutionManager(store());
    const values = await second.getCurrentValues("r2", ["a", "b"], [1, 2], [""]);
    expect(values).toEqual({ xValue: "b", yValue: 1, zValue: "", xIndex: 1, yIndex: 0, zIndex: 0 });
  });
});
