export type AxisType =
  | "none"
  | "model"
  | "vae"
  | "lora"
  | "sampler"
  | "scheduler"
  | "cfg_scale"
  | "steps"
  | "seed"
  | "denoise"
  | "clip_skip"
  | "prompt"
  | "flux_guidance";

export type ValueKind = "string" | "int" | "float";

export type OutputType = "STRING" | "INT" | "FLOAT";

/** A converted axis value: strings for names and prompts, numbers for numeric parameters. */
export type AxisValue = string | number;

export type AxisName = "x" | "y" | "z";

export interface AxisSpec {
  type: AxisType;
  values: AxisValue[];
  /** Same length as `values`; a `none` axis carries one blank label. */
  labels: string[];
  labelPrefix: string;
}

export interface GridDimensions {
  totalImages: number;
  cols: number;
  rows: number;
  gridsCount: number;
}

export interface GridConfiguration {
  batchId: string;
  axes: Record<AxisName, AxisSpec>;
  dimensions: GridDimensions;
}

export interface ValidationResult {
  valid: boolean;
  error: string | null;
}
