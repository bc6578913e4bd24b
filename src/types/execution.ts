import type { AxisValue, GridConfiguration } from "./axis";

export interface GridExecutionSnapshot {
  batchId: string;
  totalIterations: number;
  /** 0-based; equals totalIterations once the sweep is complete */
  currentIteration: number;
  xIndex: number;
  yIndex: number;
  zIndex: number;
  xCount: number;
  yCount: number;
  zCount: number;
}

export type GridIndices = [x: number, y: number, z: number];

export interface CurrentValues {
  xValue: AxisValue;
  yValue: AxisValue;
  zValue: AxisValue;
  xIndex: number;
  yIndex: number;
  zIndex: number;
}

export type ExecutionPayload = Record<string, unknown>;

export interface QueuedExecution {
  executionId: string;
  batchId: string;
  iteration: number;
  totalIterations: number;
  xValue: AxisValue;
  yValue: AxisValue;
  zValue: AxisValue;
  xIndex: number;
  yIndex: number;
  zIndex: number;
  /** Deep copy owned by this record */
  payload: ExecutionPayload;
}

export interface QueuedBatch {
  batchId: string;
  contextId: string;
  totalIterations: number;
  executions: QueuedExecution[];
  completed: number[];
  /** Iterations whose last attempt failed; cleared when a retry completes. */
  failed: number[];
  lastError: string | null;
  /** ISO timestamps */
  startedAt: string;
  finishedAt: string | null;
  gridConfig: GridConfiguration;
}

export type QueueStatus = "running" | "completed" | "failed";

export interface QueueProgress {
  batchId: string;
  status: QueueStatus;
  totalIterations: number;
  completedCount: number;
  failedCount: number;
  /** 0-100, one decimal */
  percent: number;
  startedAt: string;
  elapsedMs: number;
  /** null until the first cell completes */
  estimatedRemainingMs: number | null;
  error: string | null;
}

/** Wire form of a queued execution, as published to workers. */
export interface QueuedExecutionRecord {
  execution_id: string;
  batch_id: string;
  iteration: number;
  total_iterations: number;
  indices: { x: number; y: number; z: number };
  values: { x: AxisValue; y: AxisValue; z: AxisValue };
}
