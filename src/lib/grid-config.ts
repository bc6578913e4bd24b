import { calculateGridDimensions, generateAxisLabels, parseValueString } from "@/lib/axis-utils";
import { AXIS_DISPLAY_NAMES } from "@/lib/constants";
import { GridConfigurationError } from "@/lib/errors";
import { createUniqueId } from "@/lib/format-utils";
import { gridConfigurationRecordSchema, type GridConfigurationRecord } from "@/lib/schemas";
import type { AxisName, AxisSpec, AxisType, GridConfiguration } from "@/types";

export interface AxisInput {
  type: AxisType;
  /** Raw comma list or `start:stop[:step]` range */
  values: string;
  labelPrefix?: string;
}

export interface GridInput {
  x: AxisInput;
  y: AxisInput;
  z?: AxisInput;
  /** Prefix labels with the parameter name when no explicit prefix is given. */
  includeParamName?: boolean;
  valueOnlyLabels?: boolean;
}

const NONE_AXIS: AxisInput = { type: "none", values: "" };

function labelPrefixFor(input: AxisInput, includeParamName: boolean, valueOnlyLabels: boolean): string {
  if (valueOnlyLabels) return "";
  const prefix = input.labelPrefix ?? "";
  if (includeParamName && !prefix) return `${AXIS_DISPLAY_NAMES[input.type]}: `;
  return prefix;
}

function buildAxis(
  name: AxisName,
  input: AxisInput,
  includeParamName: boolean,
  valueOnlyLabels: boolean
): AxisSpec {
  if (input.type === "none") {
    // A single blank cell so an unused axis never zeroes the grid
    return { type: "none", values: [""], labels: [""], labelPrefix: "" };
  }

  const values = parseValueString(input.values, input.type);
  if (values.length === 0) {
    throw new GridConfigurationError(
      `${name.toUpperCase()} axis (${input.type}) has no usable values in "${input.values}"`
    );
  }

  const labelPrefix = labelPrefixFor(input, includeParamName, valueOnlyLabels);
  return {
    type: input.type,
    values,
    labels: generateAxisLabels(values, input.type, labelPrefix),
    labelPrefix,
  };
}

/** Builds the immutable configuration for one sweep. Throws on unusable input. */
export function buildGridConfiguration(input: GridInput, batchId = createUniqueId()): GridConfiguration {
  const includeParamName = input.includeParamName ?? true;
  const valueOnlyLabels = input.valueOnlyLabels ?? false;
  const zInput = input.z ?? NONE_AXIS;

  if (input.x.type === "none" && input.y.type === "none") {
    throw new GridConfigurationError("At least one axis (X or Y) must be configured");
  }

  const axes = {
    x: buildAxis("x", input.x, includeParamName, valueOnlyLabels),
    y: buildAxis("y", input.y, includeParamName, valueOnlyLabels),
    z: buildAxis("z", zInput, includeParamName, valueOnlyLabels),
  };

  return {
    batchId,
    axes,
    dimensions: calculateGridDimensions(axes.x.values.length, axes.y.values.length, axes.z.values.length),
  };
}

function axisFromRecord(record: GridConfigurationRecord["axes"][AxisName]): AxisSpec {
  return {
    type: record.type ?? "none",
    values: record.values,
    labels: record.labels,
    labelPrefix: record.label_prefix ?? "",
  };
}

/** Reads an external grid configuration record and checks its invariants. */
export function parseGridConfiguration(json: unknown): GridConfiguration {
  const parsed = gridConfigurationRecordSchema.safeParse(json);
  if (!parsed.success) {
    throw new GridConfigurationError(`Invalid grid configuration: ${parsed.error.message}`);
  }

  const record = parsed.data;
  const config: GridConfiguration = {
    batchId: record.batch_id,
    axes: {
      x: axisFromRecord(record.axes.x),
      y: axisFromRecord(record.axes.y),
      z: axisFromRecord(record.axes.z),
    },
    dimensions: {
      totalImages: record.dimensions.total_images,
      cols: record.dimensions.cols,
      rows: record.dimensions.rows,
      gridsCount: record.dimensions.grids_count,
    },
  };

  const { cols, rows, gridsCount, totalImages } = config.dimensions;
  if (cols * rows * gridsCount !== totalImages) {
    throw new GridConfigurationError(
      `Grid dimensions disagree: ${cols}x${rows}x${gridsCount} != ${totalImages} images`
    );
  }
  for (const name of ["x", "y", "z"] as const) {
    const axis = config.axes[name];
    if (axis.labels.length > 0 && axis.labels.length !== axis.values.length) {
      throw new GridConfigurationError(
        `${name.toUpperCase()} axis has ${axis.labels.length} labels for ${axis.values.length} values`
      );
    }
  }

  return config;
}

export function serializeGridConfiguration(config: GridConfiguration): GridConfigurationRecord {
  const axis = (spec: AxisSpec) => ({
    type: spec.type,
    values: spec.values,
    labels: spec.labels,
    label_prefix: spec.labelPrefix,
  });
  return {
    batch_id: config.batchId,
    axes: { x: axis(config.axes.x), y: axis(config.axes.y), z: axis(config.axes.z) },
    dimensions: {
      total_images: config.dimensions.totalImages,
      cols: config.dimensions.cols,
      rows: config.dimensions.rows,
      grids_count: config.dimensions.gridsCount,
    },
  };
}
