import type { AxisType, ValueKind } from "@/types";

export const AXIS_TYPES = [
  "none", "model", "vae", "lora", "sampler", "scheduler", "cfg_scale",
  "steps", "seed", "denoise", "clip_skip", "prompt", "flux_guidance",
] as const satisfies readonly AxisType[];

export const AXIS_VALUE_KINDS: Record<AxisType, ValueKind> = {
  none: "string",
  model: "string",
  vae: "string",
  lora: "string",
  sampler: "string",
  scheduler: "string",
  prompt: "string",
  steps: "int",
  clip_skip: "int",
  seed: "int",
  cfg_scale: "float",
  denoise: "float",
  flux_guidance: "float",
};

export const AXIS_DISPLAY_NAMES: Record<AxisType, string> = {
  none: "None",
  model: "Model/Checkpoint",
  sampler: "Sampler",
  scheduler: "Scheduler",
  cfg_scale: "CFG Scale",
  steps: "Steps",
  clip_skip: "Clip Skip",
  vae: "VAE",
  lora: "LoRA",
  prompt: "Prompt",
  seed: "Seed",
  flux_guidance: "Flux Guidance",
  denoise: "Denoise",
};

// Seeds span the full unsigned 64-bit range
export const SEED_MAX = 0xffffffffffffffffn;

export const DEFAULT_SAMPLER = "euler";
export const DEFAULT_SCHEDULER = "simple";

// Used when the host does not report its own lists
export const SAMPLER_NAMES = [
  "euler", "euler_ancestral", "heun", "dpm_2", "dpm_2_ancestral",
  "lms", "dpm_fast", "dpm_adaptive", "dpmpp_2s_ancestral",
  "dpmpp_sde", "dpmpp_2m", "dpmpp_2m_sde", "ddim", "uni_pc", "uni_pc_bh2",
] as const;

export const SCHEDULER_NAMES = [
  "normal", "karras", "exponential", "sgm_uniform", "simple", "ddim_uniform",
] as const;

export const PROMPT_DISPLAY_LENGTH = 25;

// --- Grid styling ---

export const GRID_DEFAULTS = {
  fontSize: 20,
  gridGap: 10,
  labelHeight: 30,
  maxLabelLength: 30,
  includeLabels: true,
} as const;

export const GRID_BACKGROUND: [number, number, number] = [32, 32, 32];
export const LABEL_TEXT_COLOR = "#ffffff";
export const LABEL_BOX_COLOR = "#000000";
export const LABEL_BOX_OPACITY = 0.7;
export const LABEL_PADDING = 3;
export const LABEL_MARGIN = 5;
/** Average glyph advance as a fraction of the font size, for sizing label boxes. */
export const GLYPH_WIDTH_RATIO = 0.6;

export const PLACEHOLDER_SIZE = 64;

// --- Persistence ---

export const BATCH_TTL = 86400; // 24 hours

// --- Dispatch ---

export const QSTASH_RETRIES = 3;
export const DEFAULT_FAL_MODEL = "fal-ai/flux/dev";
