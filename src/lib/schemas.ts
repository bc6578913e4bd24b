import { z } from "zod";
import { AXIS_TYPES } from "@/lib/constants";
import type { GridConfiguration, GridExecutionSnapshot, QueuedBatch, QueuedExecution } from "@/types";

export const axisTypeSchema = z.enum(AXIS_TYPES);

export const axisValueSchema = z.union([z.string(), z.number()]);

const count = z.number().int().min(0);

// --- Wire format of the grid configuration record ---

export const axisRecordSchema = z.object({
  type: axisTypeSchema.nullable(),
  values: z.array(axisValueSchema),
  labels: z.array(z.string()),
  label_prefix: z.string().optional(),
});

export const gridConfigurationRecordSchema = z.object({
  batch_id: z.string().min(1),
  axes: z.object({
    x: axisRecordSchema,
    y: axisRecordSchema,
    z: axisRecordSchema,
  }),
  dimensions: z.object({
    total_images: count,
    cols: count,
    rows: count,
    grids_count: count,
  }),
});

export type GridConfigurationRecord = z.infer<typeof gridConfigurationRecordSchema>;

export const queuedExecutionRecordSchema = z.object({
  execution_id: z.string(),
  batch_id: z.string(),
  iteration: count,
  total_iterations: count,
  indices: z.object({ x: count, y: count, z: count }),
  values: z.object({ x: axisValueSchema, y: axisValueSchema, z: axisValueSchema }),
});

// --- Stored state ---

const axisSpecSchema = z.object({
  type: axisTypeSchema,
  values: z.array(axisValueSchema),
  labels: z.array(z.string()),
  labelPrefix: z.string(),
});

export const gridConfigurationSchema: z.ZodType<GridConfiguration> = z.object({
  batchId: z.string(),
  axes: z.object({ x: axisSpecSchema, y: axisSpecSchema, z: axisSpecSchema }),
  dimensions: z.object({
    totalImages: count,
    cols: count,
    rows: count,
    gridsCount: count,
  }),
});

export const gridExecutionSnapshotSchema: z.ZodType<GridExecutionSnapshot> = z.object({
  batchId: z.string(),
  totalIterations: count,
  currentIteration: count,
  xIndex: count,
  yIndex: count,
  zIndex: count,
  xCount: count,
  yCount: count,
  zCount: count,
});

export const queuedExecutionSchema: z.ZodType<QueuedExecution> = z.object({
  executionId: z.string(),
  batchId: z.string(),
  iteration: count,
  totalIterations: count,
  xValue: axisValueSchema,
  yValue: axisValueSchema,
  zValue: axisValueSchema,
  xIndex: count,
  yIndex: count,
  zIndex: count,
  payload: z.record(z.unknown()),
});

export const queuedBatchSchema: z.ZodType<QueuedBatch> = z.object({
  batchId: z.string(),
  contextId: z.string(),
  totalIterations: count,
  executions: z.array(queuedExecutionSchema),
  completed: z.array(count),
  failed: z.array(count),
  lastError: z.string().nullable(),
  startedAt: z.string(),
  finishedAt: z.string().nullable(),
  gridConfig: gridConfigurationSchema,
});

/** Job body published for one combination. */
export const executionMessageSchema = z.object({
  execution: queuedExecutionRecordSchema,
});

export type ExecutionMessage = z.infer<typeof executionMessageSchema>;
