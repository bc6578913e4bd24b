import { convertValue } from "@/lib/converters";
import { GridConfigurationError } from "@/lib/errors";
import { ExecutionManager } from "@/lib/execution/execution-manager";
import { buildGridConfiguration, type GridInput } from "@/lib/grid-config";
import type { AxisValue, GridConfiguration } from "@/types";

export interface ControllerOutput {
  gridData: GridConfiguration;
  xValue: AxisValue;
  yValue: AxisValue;
  zValue: AxisValue;
  xIndex: number;
  yIndex: number;
  zIndex: number;
  batchId: string;
}

/**
 * Per-tick entry point of a single-step sweep. Each host tick calls
 * `configureGrid` with the same batch id to get the active combination, and
 * `completeIteration` once the downstream image for it has been produced.
 */
export class GridController {
  constructor(private readonly executions: ExecutionManager = new ExecutionManager()) {}

  /** `batchId` must be stable across ticks; a fresh id starts the sweep over. */
  async configureGrid(input: GridInput, batchId: string): Promise<ControllerOutput> {
    if (batchId.trim().length === 0) {
      throw new GridConfigurationError("A batch id is required to track a sweep across ticks");
    }
    const gridData = buildGridConfiguration(input, batchId);
    const { x, y, z } = gridData.axes;

    const current = await this.executions.getCurrentValues(gridData.batchId, x.values, y.values, z.values);

    return {
      gridData,
      xValue: convertValue(current.xValue, x.type),
      yValue: convertValue(current.yValue, y.type),
      zValue: convertValue(current.zValue, z.type),
      xIndex: current.xIndex,
      yIndex: current.yIndex,
      zIndex: current.zIndex,
      batchId: gridData.batchId,
    };
  }

  /** Returns true while another tick is needed; frees the batch once done. */
  async completeIteration(batchId: string): Promise<boolean> {
    const more = await this.executions.advanceBatch(batchId);
    if (!more) {
      await this.executions.cleanupBatch(batchId);
      console.log(`[controller] Batch ${batchId} finished`);
    }
    return more;
  }
}
