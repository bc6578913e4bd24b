export * from "@/lib/constants";
export {
  convertValue,
  formatForDisplay,
  getOutputType,
  isAxisType,
  isSeedInRange,
  seedValue,
  toSeed,
  validateValue,
} from "@/lib/converters";
export {
  calculateGridDimensions,
  generateAxisLabels,
  getSamplerNames,
  getSchedulerNames,
  parseValueString,
} from "@/lib/axis-utils";
export { createUniqueId } from "@/lib/format-utils";
export { GridConfigurationError } from "@/lib/errors";
export {
  buildGridConfiguration,
  parseGridConfiguration,
  serializeGridConfiguration,
  type AxisInput,
  type GridInput,
} from "@/lib/grid-config";
export { GridController, type ControllerOutput } from "@/lib/controller";
export {
  GridExecutionState,
  advanceSnapshot,
  createSnapshot,
  indicesForIteration,
} from "@/lib/execution/grid-execution-state";
export { ExecutionManager } from "@/lib/execution/execution-manager";
export { GridQueueManager, computeProgress, toRecord } from "@/lib/execution/queue-manager";
export {
  GridImageCompositor,
  computeGridLayout,
  generateGridInfo,
  type GridLayout,
} from "@/lib/compositor/grid-compositor";
export { createRaster, decodeImage, encodePng, getPixel } from "@/lib/compositor/raster";
export type { KeyedStore } from "@/lib/store/types";
export { MemoryStore } from "@/lib/store/memory-store";
export { RedisStore, type RedisClient, type RedisStoreOptions } from "@/lib/store/redis-store";
export {
  gridConfigurationSchema,
  gridExecutionSnapshotSchema,
  queuedBatchSchema,
} from "@/lib/schemas";
export type { CellRenderer, CellRequest, OnStatusUpdate } from "@/lib/providers/types";
export { FalCellRenderer, buildFalRequest } from "@/lib/providers/fal-provider";
export { runSweep, type SweepDependencies, type SweepOptions, type SweepResult } from "@/lib/sweep-runner";
export { getExecutionDestination, isQStashEnabled, publishExecutions } from "@/lib/qstash";
export {
  handleExecutionMessage,
  processExecution,
  type WorkerDependencies,
  type WorkerOutcome,
} from "@/lib/worker";
export type * from "@/types";
