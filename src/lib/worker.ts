import { GridImageCompositor } from "@/lib/compositor/grid-compositor";
import { GridQueueManager } from "@/lib/execution/queue-manager";
import type { CellRenderer } from "@/lib/providers/types";
import { getReceiver } from "@/lib/qstash";
import { executionMessageSchema } from "@/lib/schemas";
import type { ComposedGrid, CompositeOptions, QueueProgress, QueuedExecutionRecord, Raster } from "@/types";

export interface WorkerDependencies {
  renderer: CellRenderer;
  queue: GridQueueManager;
  compositor: GridImageCompositor;
  composite?: Partial<CompositeOptions>;
  /** Receives the finished pages of a batch. A rejection keeps the batch for the next delivery. */
  onGridComplete?: (batchId: string, pages: Raster[], info: string) => Promise<void>;
  onProgress?: (progress: QueueProgress) => void;
}

export type WorkerOutcome =
  | { status: "rejected"; reason: string }
  | { status: "skipped"; reason: string }
  | { status: "failed"; error: string }
  | { status: "undelivered"; error: string }
  | { status: "pending"; info: string }
  | { status: "complete"; info: string };

export interface IncomingMessage {
  body: string;
  signature: string | null;
  url: string;
}

async function reportProgress(batchId: string, deps: WorkerDependencies): Promise<void> {
  if (!deps.onProgress) return;
  const progress = await deps.queue.getBatchProgress(batchId);
  if (progress) deps.onProgress(progress);
}

async function deliverGrid(batchId: string, grid: ComposedGrid, deps: WorkerDependencies): Promise<WorkerOutcome> {
  try {
    await deps.onGridComplete?.(batchId, grid.pages, grid.info);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    console.error(`[worker] ${batchId} grid delivery failed:`, message);
    await deps.compositor.holdComposite(batchId, grid);
    return { status: "undelivered", error: message };
  }

  await deps.queue.cleanupBatch(batchId);
  return { status: "complete", info: grid.info };
}

/** Runs the cell named by one published execution record. */
export async function processExecution(
  record: QueuedExecutionRecord,
  deps: WorkerDependencies
): Promise<WorkerOutcome> {
  const { batch_id: batchId, iteration } = record;
  const batch = await deps.queue.getBatch(batchId);
  if (!batch) {
    return { status: "skipped", reason: `Unknown batch ${batchId}` };
  }

  // Redeliveries must not add a second image for the same cell
  if (batch.completed.includes(iteration)) {
    const held = await deps.compositor.takeComposite(batchId);
    if (held) {
      console.log(`[worker] ${batchId}:${iteration} redelivered, retrying grid delivery`);
      return deliverGrid(batchId, held, deps);
    }
    console.log(`[worker] ${batchId}:${iteration} already completed, skipping`);
    return { status: "skipped", reason: "already completed" };
  }

  const execution = batch.executions.find((candidate) => candidate.iteration === iteration);
  if (!execution) {
    return { status: "skipped", reason: `Iteration ${iteration} not in batch ${batchId}` };
  }

  let image: Raster;
  try {
    image = await deps.renderer.renderCell({ execution, gridConfig: batch.gridConfig });
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    console.error(`[worker] ${batchId}:${iteration} failed:`, message);
    await deps.queue.markIterationFailed(batchId, iteration, message);
    await reportProgress(batchId, deps);
    return { status: "failed", error: message };
  }

  const result = await deps.compositor.placeImage(iteration, image, batch.gridConfig, deps.composite);
  await deps.queue.markIterationComplete(batchId, iteration);
  await reportProgress(batchId, deps);

  if (result.status === "pending") {
    return { status: "pending", info: result.info };
  }

  return deliverGrid(batchId, { pages: result.pages, info: result.info }, deps);
}

/** Verifies and handles one QStash delivery. */
export async function handleExecutionMessage(
  message: IncomingMessage,
  deps: WorkerDependencies
): Promise<WorkerOutcome> {
  if (!message.signature) {
    return { status: "rejected", reason: "Missing signature" };
  }

  try {
    await getReceiver().verify({ signature: message.signature, body: message.body, url: message.url });
  } catch (error) {
    console.error("[worker] QStash signature verification failed:", error);
    return { status: "rejected", reason: "Invalid signature" };
  }

  let json: unknown;
  try {
    json = JSON.parse(message.body);
  } catch {
    return { status: "rejected", reason: "Body is not JSON" };
  }

  const parsed = executionMessageSchema.safeParse(json);
  if (!parsed.success) {
    return { status: "rejected", reason: `Invalid execution message: ${parsed.error.message}` };
  }

  return processExecution(parsed.data.execution, deps);
}
