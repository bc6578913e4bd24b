import {
  AXIS_VALUE_KINDS,
  DEFAULT_SAMPLER,
  DEFAULT_SCHEDULER,
  SAMPLER_NAMES,
  SCHEDULER_NAMES,
  SEED_MAX,
} from "@/lib/constants";
import { formatForDisplay, isSeedInRange, seedValue, toNumber, toSeed } from "@/lib/converters";
import type { AxisType, AxisValue, GridDimensions } from "@/types";

export const MAX_RANGE_VALUES = 10000;

// Tolerance so that e.g. "0:1:0.1" still reaches 1 despite float accumulation
const RANGE_EPSILON = 1e-9;

function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

function expandRange(text: string, kind: "int" | "float"): number[] {
  const parts = text.split(":").map((part) => toNumber(part));
  if (parts.length !== 2 && parts.length !== 3) return [];

  const start = parts[0] ?? null;
  const stop = parts[1] ?? null;
  const step = parts.length === 3 ? parts[2] ?? null : 1;
  if (start === null || stop === null) return [];
  if (step === null || step <= 0) return [];

  const count = Math.floor((stop - start) / step + RANGE_EPSILON) + 1;
  if (count <= 0) return [];
  if (count > MAX_RANGE_VALUES) {
    console.warn(`[axis] Range "${text}" expands to ${count} values, keeping the first ${MAX_RANGE_VALUES}`);
  }

  const values: number[] = [];
  for (let i = 0; i < Math.min(count, MAX_RANGE_VALUES); i++) {
    const current = start + i * step;
    values.push(kind === "int" ? Math.trunc(current) : roundTo2(current));
  }
  return values;
}

function expandSeedRange(text: string): AxisValue[] {
  const parts = text.split(":").map((part) => toSeed(part));
  if (parts.length !== 2 && parts.length !== 3) return [];

  const start = parts[0] ?? null;
  const stop = parts[1] ?? null;
  const step = parts.length === 3 ? parts[2] ?? null : 1n;
  if (start === null || stop === null) return [];
  if (step === null || step <= 0n) return [];
  if (stop < start) return [];

  const count = (stop - start) / step + 1n;
  const limit = BigInt(MAX_RANGE_VALUES);
  if (count > limit) {
    console.warn(`[axis] Range "${text}" expands to ${count} values, keeping the first ${MAX_RANGE_VALUES}`);
  }

  const values: AxisValue[] = [];
  for (let i = 0n; i < (count < limit ? count : limit); i++) {
    const seed = start + i * step;
    if (!isSeedInRange(seed)) {
      console.warn(`[axis] Skipping seed ${seed} outside 0..${SEED_MAX}`);
      continue;
    }
    values.push(seedValue(seed));
  }
  return values;
}

function parseSeeds(text: string): AxisValue[] {
  if (text.includes(":")) return expandSeedRange(text.trim());
  const values: AxisValue[] = [];
  for (const token of splitList(text)) {
    const seed = toSeed(token);
    if (seed === null) continue;
    if (!isSeedInRange(seed)) {
      console.warn(`[axis] Skipping seed ${seed} outside 0..${SEED_MAX}`);
      continue;
    }
    values.push(seedValue(seed));
  }
  return values;
}

function splitList(text: string): string[] {
  return text
    .split(",")
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
}

/**
 * Parses a raw axis string: a comma-separated list, or for numeric axes a
 * `start:stop[:step]` range inclusive of stop. Malformed numbers are skipped.
 */
export function parseValueString(text: string, axisType: AxisType): AxisValue[] {
  if (!text || text.trim().length === 0) return [];

  if (axisType === "seed") return parseSeeds(text);

  const kind = AXIS_VALUE_KINDS[axisType];

  if (kind !== "string") {
    if (text.includes(":")) return expandRange(text.trim(), kind);
    const values: number[] = [];
    for (const token of splitList(text)) {
      const parsed = toNumber(token);
      if (parsed === null) continue;
      values.push(kind === "int" ? Math.trunc(parsed) : parsed);
    }
    return values;
  }

  const values = splitList(text);
  if (values.length === 0) {
    if (axisType === "sampler") return [DEFAULT_SAMPLER];
    if (axisType === "scheduler") return [DEFAULT_SCHEDULER];
  }
  return values;
}

export function generateAxisLabels(
  values: AxisValue[],
  axisType: AxisType,
  prefix = ""
): string[] {
  return values.map((value) => `${prefix}${formatForDisplay(value, axisType)}`);
}

export function calculateGridDimensions(
  xCount: number,
  yCount: number,
  zCount = 1
): GridDimensions {
  return {
    totalImages: xCount * yCount * zCount,
    cols: xCount,
    rows: yCount,
    gridsCount: zCount > 0 ? zCount : 1,
  };
}

export function getSamplerNames(): string[] {
  return [...SAMPLER_NAMES];
}

export function getSchedulerNames(): string[] {
  return [...SCHEDULER_NAMES];
}
