import { describe, expect, it } from "vitest";
import {
  GridExecutionState,
  advanceSnapshot,
  createSnapshot,
  indicesForIteration,
} from "./grid-execution-state";

function visitAll(state: GridExecutionState): string[] {
  const visited = [state.getIndices().join(",")];
  while (state.advance()) visited.push(state.getIndices().join(","));
  return visited;
}

describe("GridExecutionState", () => {
  it.each([
    [2, 3, 1],
    [3, 2, 2],
    [1, 1, 1],
    [4, 1, 3],
  ])("visits every combination of %i x %i x %i exactly once", (nx, ny, nz) => {
    const state = GridExecutionState.create("b", nx, ny, nz);
    const visited = visitAll(state);

    expect(visited).toHaveLength(nx * ny * nz);
    expect(new Set(visited).size).toBe(nx * ny * nz);
    expect(state.isComplete()).toBe(true);
    expect(state.currentIteration).toBe(nx * ny * nz);
  });

  it("moves X fastest, then Y, then Z", () => {
    expect(visitAll(GridExecutionState.create("b", 2, 2, 2))).toEqual([
      "0,0,0", "1,0,0", "0,1,0", "1,1,0",
      "0,0,1", "1,0,1", "0,1,1", "1,1,1",
    ]);
  });

  it("needs one advance per remaining combination before completing", () => {
    const state = GridExecutionState.create("b", 3, 1, 1);
    expect(state.advance()).toBe(true);
    expect(state.advance()).toBe(true);
    expect(state.isComplete()).toBe(false);
    expect(state.advance()).toBe(false);
    expect(state.isComplete()).toBe(true);
  });

  it("keeps the indices on the last combination once complete", () => {
    const state = GridExecutionState.create("b", 2, 2, 1);
    visitAll(state);
    expect(state.getIndices()).toEqual([1, 1, 0]);
    expect(state.advance()).toBe(false);
    expect(state.getIndices()).toEqual([1, 1, 0]);
  });

  it("is complete from the start when there is nothing to run", () => {
    expect(GridExecutionState.create("b", 0, 2, 1).isComplete()).toBe(true);
  });

  it("matches iteration numbering while in progress", () => {
    const state = GridExecutionState.create("b", 3, 2, 2);
    do {
      if (state.isComplete()) break;
      const [x, y, z] = state.getIndices();
      expect(state.currentIteration).toBe(z * 6 + y * 3 + x);
      expect(indicesForIteration(state.currentIteration, 3, 2)).toEqual([x, y, z]);
    } while (state.advance());
  });

  it("round-trips through a snapshot", () => {
    const state = GridExecutionState.create("b", 2, 2, 1);
    state.advance();
    const restored = new GridExecutionState(state.toSnapshot());
    expect(restored.getIndices()).toEqual([1, 0, 0]);
    expect(restored.batchId).toBe("b");
    expect(restored.totalIterations).toBe(4);
  });
});

describe("advanceSnapshot", () => {
  it("does not modify its input", () => {
    const snapshot = createSnapshot("b", 2, 1, 1);
    const { state, advanced } = advanceSnapshot(snapshot);
    expect(advanced).toBe(true);
    expect(snapshot.currentIteration).toBe(0);
    expect(snapshot.xIndex).toBe(0);
    expect(state.xIndex).toBe(1);
  });
});
