import { GridImageCompositor } from "@/lib/compositor/grid-compositor";
import { GridQueueManager } from "@/lib/execution/queue-manager";
import { formatDuration, padIndex } from "@/lib/format-utils";
import type { CellRenderer } from "@/lib/providers/types";
import type {
  ComposedGrid,
  CompositeOptions,
  ExecutionPayload,
  GridConfiguration,
  QueuedExecution,
  QueueProgress,
  Raster,
} from "@/types";

export interface SweepDependencies {
  renderer: CellRenderer;
  queue?: GridQueueManager;
  compositor?: GridImageCompositor;
}

export interface SweepOptions {
  contextId?: string;
  payload?: ExecutionPayload;
  composite?: Partial<CompositeOptions>;
  onProgress?: (progress: QueueProgress) => void;
}

export interface SweepResult {
  batchId: string;
  pages: Raster[];
  info: string;
  durationMs: number;
}

/**
 * Runs a whole sweep in-process, one cell after another in iteration order.
 * A batch already prepared in the queue resumes from its first unfinished
 * iteration, so a failed cell can be retried by calling this again. Completed
 * cells the compositor no longer holds are rendered again first.
 */
export async function runSweep(
  gridConfig: GridConfiguration,
  { renderer, queue = new GridQueueManager(), compositor = new GridImageCompositor() }: SweepDependencies,
  options: SweepOptions = {}
): Promise<SweepResult> {
  const { batchId } = gridConfig;
  const startTime = Date.now();
  const total = gridConfig.dimensions.totalImages;

  const existing = await queue.getBatch(batchId);
  if (!existing) {
    await queue.prepareBatchExecutions(batchId, gridConfig, options.contextId ?? "xyz", options.payload ?? {});
  }

  let grid: ComposedGrid | null = null;

  const render = async (execution: QueuedExecution): Promise<ComposedGrid | null> => {
    const cellStart = Date.now();
    let image: Raster;
    try {
      image = await renderer.renderCell({ execution, gridConfig });
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      await queue.markIterationFailed(batchId, execution.iteration, message);
      throw error;
    }

    const result = await compositor.placeImage(execution.iteration, image, gridConfig, options.composite);
    await queue.markIterationComplete(batchId, execution.iteration);

    console.log(
      `[sweep] ${batchId} cell ${padIndex(execution.iteration, total)}/${total} done in ${formatDuration(Date.now() - cellStart)}`
    );

    const progress = await queue.getBatchProgress(batchId);
    if (progress) options.onProgress?.(progress);

    return result.status === "complete" ? { pages: result.pages, info: result.info } : null;
  };

  if (existing) {
    const held = new Set(await compositor.heldIterations(batchId));
    const missing = existing.executions.filter(
      (execution) => existing.completed.includes(execution.iteration) && !held.has(execution.iteration)
    );
    if (missing.length > 0) {
      console.log(`[sweep] ${batchId} rendering ${missing.length} completed cell(s) the compositor no longer holds`);
    }
    for (const execution of missing) {
      grid = (await render(execution)) ?? grid;
    }
  }

  for (;;) {
    const execution = await queue.getNextExecution(batchId);
    if (!execution) break;
    grid = (await render(execution)) ?? grid;
  }

  if (!grid) {
    throw new Error(`Sweep ${batchId} ended without a complete grid`);
  }

  await queue.cleanupBatch(batchId);

  const durationMs = Date.now() - startTime;
  console.log(`[sweep] ${batchId} finished ${total} cells in ${formatDuration(durationMs)}`);
  return { batchId, ...grid, durationMs };
}
