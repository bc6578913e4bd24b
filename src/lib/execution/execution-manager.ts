import { MemoryStore } from "@/lib/store/memory-store";
import type { KeyedStore } from "@/lib/store/types";
import type { AxisValue, CurrentValues, GridExecutionSnapshot } from "@/types";
import { GridExecutionState } from "./grid-execution-state";

function valueAt(values: AxisValue[], index: number): AxisValue {
  // An index past the list means the caller and the state drifted apart
  return index >= 0 && index < values.length ? values[index] ?? "" : "";
}

/**
 * Single-step sweep driver. The host calls it once per tick; progress lives
 * in the injected store, keyed by batch id, never in a local loop.
 */
export class ExecutionManager {
  constructor(private readonly store: KeyedStore<GridExecutionSnapshot> = new MemoryStore()) {}

  async initializeBatch(
    batchId: string,
    xValues: AxisValue[],
    yValues: AxisValue[],
    zValues: AxisValue[]
  ): Promise<GridExecutionState> {
    const state = GridExecutionState.create(
      batchId,
      Math.max(1, xValues.length),
      Math.max(1, yValues.length),
      Math.max(1, zValues.length)
    );
    await this.store.set(batchId, state.toSnapshot());
    console.log(`[execution] Initialized batch ${batchId} with ${state.totalIterations} iterations`);
    return state;
  }

  async getState(batchId: string): Promise<GridExecutionState | null> {
    const snapshot = await this.store.get(batchId);
    return snapshot ? new GridExecutionState(snapshot) : null;
  }

  async getCurrentValues(
    batchId: string,
    xValues: AxisValue[],
    yValues: AxisValue[],
    zValues: AxisValue[]
  ): Promise<CurrentValues> {
    const state =
      (await this.getState(batchId)) ??
      (await this.initializeBatch(batchId, xValues, yValues, zValues));

    const [xIndex, yIndex, zIndex] = state.getIndices();
    return {
      xValue: valueAt(xValues, xIndex),
      yValue: valueAt(yValues, yIndex),
      zValue: valueAt(zValues, zIndex),
      xIndex,
      yIndex,
      zIndex,
    };
  }

  async shouldContinue(batchId: string): Promise<boolean> {
    const state = await this.getState(batchId);
    return state !== null && !state.isComplete();
  }

  /** Returns true while more iterations remain. */
  async advanceBatch(batchId: string): Promise<boolean> {
    const state = await this.getState(batchId);
    if (!state) return false;
    const advanced = state.advance();
    await this.store.set(batchId, state.toSnapshot());
    return advanced;
  }

  /** Callers must invoke this once a sweep is finished or abandoned. */
  async cleanupBatch(batchId: string): Promise<void> {
    await this.store.delete(batchId);
  }
}
