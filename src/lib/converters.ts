import { AXIS_TYPES, AXIS_VALUE_KINDS, PROMPT_DISPLAY_LENGTH, SEED_MAX } from "@/lib/constants";
import type { AxisType, AxisValue, OutputType, ValidationResult } from "@/types";

// Conversion never throws: a malformed value degrades to 0 or the raw string.

export function isAxisType(value: string): value is AxisType {
  return AXIS_TYPES.some((type) => type === value);
}

/** Parses a finite number from a raw axis value, or returns null. */
export function toNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  if (trimmed.length === 0) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

const INTEGER_TEXT = /^[+-]?\d+(?:\.\d*)?$/;

/**
 * Parses a seed exactly, truncating any fraction. Numbers beyond 2^53 have
 * already lost precision, so large seeds must arrive as decimal strings.
 */
export function toSeed(value: unknown): bigint | null {
  if (typeof value === "bigint") return value;
  if (typeof value === "number") return Number.isFinite(value) ? BigInt(Math.trunc(value)) : null;
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  if (!INTEGER_TEXT.test(trimmed)) return null;
  const [whole = ""] = trimmed.split(".");
  return BigInt(whole);
}

/** A seed as a number while that is exact, else as its decimal string. */
export function seedValue(seed: bigint): AxisValue {
  return seed >= BigInt(Number.MIN_SAFE_INTEGER) && seed <= BigInt(Number.MAX_SAFE_INTEGER)
    ? Number(seed)
    : seed.toString();
}

export function isSeedInRange(seed: bigint): boolean {
  return seed >= 0n && seed <= SEED_MAX;
}

export function convertValue(value: unknown, axisType: AxisType): AxisValue {
  if (axisType === "seed") {
    const seed = toSeed(value);
    return seed === null ? 0 : seedValue(seed);
  }
  const kind = AXIS_VALUE_KINDS[axisType];
  if (kind === "int") {
    const parsed = toNumber(value);
    return parsed === null ? 0 : Math.trunc(parsed);
  }
  if (kind === "float") {
    return toNumber(value) ?? 0;
  }
  return value === undefined || value === null ? "" : String(value);
}

function baseNameWithoutExtension(path: string): string {
  const segments = path.split(/[\\/]/);
  const base = segments[segments.length - 1] ?? path;
  const dot = base.lastIndexOf(".");
  return dot > 0 ? base.slice(0, dot) : base;
}

export function formatForDisplay(value: AxisValue, axisType: AxisType): string {
  const text = String(value);
  switch (axisType) {
    case "model":
    case "vae":
    case "lora":
      return baseNameWithoutExtension(text);
    case "prompt":
      return text.length > PROMPT_DISPLAY_LENGTH
        ? `${text.slice(0, PROMPT_DISPLAY_LENGTH)}...`
        : text;
    case "cfg_scale":
    case "flux_guidance":
    case "denoise": {
      const parsed = toNumber(value);
      return parsed === null ? text : parsed.toFixed(1);
    }
    case "seed": {
      const seed = toSeed(value);
      return seed === null ? text : seed.toLocaleString("en-US");
    }
    default:
      return text;
  }
}

export function validateValue(value: AxisValue, axisType: AxisType): ValidationResult {
  switch (axisType) {
    case "steps":
    case "clip_skip": {
      const parsed = toNumber(value);
      if (parsed === null) return { valid: false, error: `Invalid integer value: ${value}` };
      const val = Math.trunc(parsed);
      if (val < 1) return { valid: false, error: `Value must be positive (got ${val})` };
      return { valid: true, error: null };
    }
    case "seed": {
      const seed = toSeed(value);
      if (seed === null) return { valid: false, error: `Invalid integer value: ${value}` };
      if (!isSeedInRange(seed)) {
        return { valid: false, error: `Seed must be between 0 and ${SEED_MAX} (got ${seed})` };
      }
      return { valid: true, error: null };
    }
    case "cfg_scale": {
      const parsed = toNumber(value);
      if (parsed === null) return { valid: false, error: `Invalid float value: ${value}` };
      if (parsed < 0) return { valid: false, error: `CFG scale must be non-negative (got ${parsed})` };
      return { valid: true, error: null };
    }
    case "denoise": {
      const parsed = toNumber(value);
      if (parsed === null) return { valid: false, error: `Invalid float value: ${value}` };
      if (parsed < 0 || parsed > 1) {
        return { valid: false, error: `Denoise must be between 0 and 1 (got ${parsed})` };
      }
      return { valid: true, error: null };
    }
    default:
      return { valid: true, error: null };
  }
}

export function getOutputType(axisType: AxisType): OutputType {
  const kind = AXIS_VALUE_KINDS[axisType];
  if (kind === "int") return "INT";
  if (kind === "float") return "FLOAT";
  return "STRING";
}
