import { randomUUID } from "node:crypto";
import { BatchLock } from "@/lib/store/batch-lock";
import { MemoryStore } from "@/lib/store/memory-store";
import type { KeyedStore } from "@/lib/store/types";
import type {
  AxisValue,
  ExecutionPayload,
  GridConfiguration,
  QueuedBatch,
  QueuedExecution,
  QueuedExecutionRecord,
  QueueProgress,
  QueueStatus,
} from "@/types";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function orPlaceholder(values: AxisValue[]): AxisValue[] {
  return values.length > 0 ? values : [""];
}

/**
 * Stamps the iteration onto the controller entry of a copied payload, so the
 * controller can tell which combination a queued run belongs to.
 */
function injectIterationData(
  payload: ExecutionPayload,
  contextId: string,
  execution: Omit<QueuedExecution, "payload" | "executionId">
): void {
  const entry = payload[contextId];
  if (!isRecord(entry)) return;
  const inputs = isRecord(entry.inputs) ? entry.inputs : {};
  inputs._xyz_batch_id = execution.batchId;
  inputs._xyz_iteration = execution.iteration;
  inputs._xyz_total = execution.totalIterations;
  inputs._xyz_indices = { x: execution.xIndex, y: execution.yIndex, z: execution.zIndex };
  entry.inputs = inputs;
}

function hasIteration(batch: QueuedBatch, iteration: number): boolean {
  return batch.executions.some((execution) => execution.iteration === iteration);
}

function isSettled(completed: number[], failed: number[], total: number): boolean {
  return completed.length + failed.length >= total;
}

/** Progress of a batch at `now`; a settled batch stops its clock at `finishedAt`. */
export function computeProgress(batch: QueuedBatch, now = Date.now()): QueueProgress {
  const total = batch.totalIterations;
  const completedCount = batch.completed.length;
  const failedCount = batch.failed.length;
  const started = Date.parse(batch.startedAt);
  const end = batch.finishedAt ? Date.parse(batch.finishedAt) : now;
  const elapsedMs = Math.max(0, end - started);

  let status: QueueStatus = "running";
  if (isSettled(batch.completed, batch.failed, total)) {
    status = failedCount > 0 ? "failed" : "completed";
  }

  return {
    batchId: batch.batchId,
    status,
    totalIterations: total,
    completedCount,
    failedCount,
    percent: total > 0 ? Math.round((completedCount / total) * 1000) / 10 : 0,
    startedAt: batch.startedAt,
    elapsedMs,
    estimatedRemainingMs:
      completedCount > 0 ? Math.round((elapsedMs / completedCount) * (total - completedCount)) : null,
    error: batch.lastError,
  };
}

export function toRecord(execution: QueuedExecution): QueuedExecutionRecord {
  return {
    execution_id: execution.executionId,
    batch_id: execution.batchId,
    iteration: execution.iteration,
    total_iterations: execution.totalIterations,
    indices: { x: execution.xIndex, y: execution.yIndex, z: execution.zIndex },
    values: { x: execution.xValue, y: execution.yValue, z: execution.zValue },
  };
}

/** Eager sweep: every combination is expanded up front and completed one by one. */
export class GridQueueManager {
  private readonly lock = new BatchLock();

  constructor(private readonly store: KeyedStore<QueuedBatch> = new MemoryStore()) {}

  async prepareBatchExecutions(
    batchId: string,
    gridConfig: GridConfiguration,
    contextId: string,
    payload: ExecutionPayload
  ): Promise<QueuedExecution[]> {
    const xValues = orPlaceholder(gridConfig.axes.x.values);
    const yValues = orPlaceholder(gridConfig.axes.y.values);
    const zValues = orPlaceholder(gridConfig.axes.z.values);
    const totalIterations = xValues.length * yValues.length * zValues.length;

    const executions: QueuedExecution[] = [];
    let iteration = 0;

    // Z outer, X inner: same numbering as GridExecutionState
    zValues.forEach((zValue, zIndex) => {
      yValues.forEach((yValue, yIndex) => {
        xValues.forEach((xValue, xIndex) => {
          const meta = {
            batchId, iteration, totalIterations,
            xValue, yValue, zValue, xIndex, yIndex, zIndex,
          };
          const copy = structuredClone(payload);
          injectIterationData(copy, contextId, meta);
          executions.push({ executionId: randomUUID(), ...meta, payload: copy });
          iteration++;
        });
      });
    });

    await this.store.set(batchId, {
      batchId,
      contextId,
      totalIterations,
      executions,
      completed: [],
      failed: [],
      lastError: null,
      startedAt: new Date().toISOString(),
      finishedAt: null,
      gridConfig,
    });

    console.log(`[queue] Prepared ${totalIterations} executions for batch ${batchId}`);
    return executions;
  }

  async getBatch(batchId: string): Promise<QueuedBatch | null> {
    return this.store.get(batchId);
  }

  async getNextExecution(batchId: string): Promise<QueuedExecution | null> {
    const batch = await this.store.get(batchId);
    if (!batch) return null;
    const completed = new Set(batch.completed);
    return batch.executions.find((execution) => !completed.has(execution.iteration)) ?? null;
  }

  /** Idempotent. Clears an earlier failure of the same iteration. */
  async markIterationComplete(batchId: string, iteration: number): Promise<void> {
    await this.lock.run(batchId, async () => {
      const batch = await this.store.get(batchId);
      if (!batch) {
        console.warn(`[queue] Iteration ${iteration} completed for unknown batch ${batchId}`);
        return;
      }
      if (!hasIteration(batch, iteration)) {
        console.warn(`[queue] Ignoring completion of iteration ${iteration}, not in batch ${batchId}`);
        return;
      }
      if (batch.completed.includes(iteration)) return;

      const completed = [...batch.completed, iteration];
      const failed = batch.failed.filter((entry) => entry !== iteration);
      await this.store.set(batchId, {
        ...batch,
        completed,
        failed,
        finishedAt: isSettled(completed, failed, batch.totalIterations) ? new Date().toISOString() : null,
      });
    });
  }

  /** Records a failed attempt; a completed iteration stays completed. */
  async markIterationFailed(batchId: string, iteration: number, error: string): Promise<void> {
    await this.lock.run(batchId, async () => {
      const batch = await this.store.get(batchId);
      if (!batch) {
        console.warn(`[queue] Iteration ${iteration} failed for unknown batch ${batchId}`);
        return;
      }
      if (!hasIteration(batch, iteration) || batch.completed.includes(iteration)) return;

      const failed = batch.failed.includes(iteration) ? batch.failed : [...batch.failed, iteration];
      await this.store.set(batchId, {
        ...batch,
        failed,
        lastError: error,
        finishedAt: isSettled(batch.completed, failed, batch.totalIterations) ? new Date().toISOString() : null,
      });
    });
  }

  async isIterationComplete(batchId: string, iteration: number): Promise<boolean> {
    const batch = await this.store.get(batchId);
    return batch !== null && batch.completed.includes(iteration);
  }

  /** Unknown batches count as complete. */
  async isBatchComplete(batchId: string): Promise<boolean> {
    const batch = await this.store.get(batchId);
    if (!batch) return true;
    return batch.completed.length >= batch.totalIterations;
  }

  async getBatchProgress(batchId: string): Promise<QueueProgress | null> {
    const batch = await this.store.get(batchId);
    return batch ? computeProgress(batch) : null;
  }

  async cleanupBatch(batchId: string): Promise<void> {
    await this.store.delete(batchId);
  }
}
