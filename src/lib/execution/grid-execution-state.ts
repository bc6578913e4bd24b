import type { GridExecutionSnapshot, GridIndices } from "@/types";

export function createSnapshot(
  batchId: string,
  xCount: number,
  yCount: number,
  zCount: number
): GridExecutionSnapshot {
  return {
    batchId,
    totalIterations: xCount * yCount * zCount,
    currentIteration: 0,
    xIndex: 0,
    yIndex: 0,
    zIndex: 0,
    xCount,
    yCount,
    zCount,
  };
}

/**
 * Pure transition: moves to the next combination, X fastest, then Y, then Z.
 * Once the last iteration is passed the indices stay on the last combination
 * and `advanced` is false.
 */
export function advanceSnapshot(
  snapshot: GridExecutionSnapshot
): { state: GridExecutionSnapshot; advanced: boolean } {
  const next = { ...snapshot, currentIteration: snapshot.currentIteration + 1 };

  if (next.currentIteration >= next.totalIterations) {
    return { state: next, advanced: false };
  }

  next.xIndex += 1;
  if (next.xIndex >= next.xCount) {
    next.xIndex = 0;
    next.yIndex += 1;
    if (next.yIndex >= next.yCount) {
      next.yIndex = 0;
      next.zIndex += 1;
    }
  }

  return { state: next, advanced: true };
}

export function indicesForIteration(
  iteration: number,
  xCount: number,
  yCount: number
): GridIndices {
  return [
    iteration % xCount,
    Math.floor(iteration / xCount) % yCount,
    Math.floor(iteration / (xCount * yCount)),
  ];
}

export class GridExecutionState {
  private snapshot: GridExecutionSnapshot;

  constructor(snapshot: GridExecutionSnapshot) {
    this.snapshot = { ...snapshot };
  }

  static create(batchId: string, xCount: number, yCount: number, zCount: number): GridExecutionState {
    return new GridExecutionState(createSnapshot(batchId, xCount, yCount, zCount));
  }

  get batchId(): string {
    return this.snapshot.batchId;
  }

  get totalIterations(): number {
    return this.snapshot.totalIterations;
  }

  get currentIteration(): number {
    return this.snapshot.currentIteration;
  }

  /** Returns false once there is no further combination. */
  advance(): boolean {
    const { state, advanced } = advanceSnapshot(this.snapshot);
    this.snapshot = state;
    return advanced;
  }

  getIndices(): GridIndices {
    return [this.snapshot.xIndex, this.snapshot.yIndex, this.snapshot.zIndex];
  }

  isComplete(): boolean {
    return this.snapshot.currentIteration >= this.snapshot.totalIterations;
  }

  toSnapshot(): GridExecutionSnapshot {
    return { ...this.snapshot };
  }
}
