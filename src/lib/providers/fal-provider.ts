import { fal } from "@fal-ai/client";
import { z } from "zod";
import { decodeImage } from "@/lib/compositor/raster";
import { DEFAULT_FAL_MODEL } from "@/lib/constants";
import { convertValue } from "@/lib/converters";
import type { AxisName, AxisType, Raster } from "@/types";
import type { CellRenderer, CellRequest, OnStatusUpdate } from "./types";

const falOutputSchema = z.object({
  images: z
    .array(
      z.object({
        url: z.string(),
        content_type: z.string().optional(),
        width: z.number().optional(),
        height: z.number().optional(),
      })
    )
    .min(1),
  seed: z.number().optional(),
});

// Input field each axis type sets on a fal text-to-image endpoint
const FAL_INPUT_FIELDS: Partial<Record<AxisType, string>> = {
  prompt: "prompt",
  seed: "seed",
  steps: "num_inference_steps",
  cfg_scale: "guidance_scale",
  flux_guidance: "guidance_scale",
  denoise: "strength",
  sampler: "sampler",
  scheduler: "scheduler",
  clip_skip: "clip_skip",
  vae: "vae",
};

let configured = false;

function ensureFalConfigured(): void {
  if (configured) return;
  const key = process.env.FAL_KEY;
  if (!key) throw new Error("FAL_KEY environment variable not configured");
  fal.config({ credentials: key });
  configured = true;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Endpoint and input for one cell: payload defaults overlaid with the cell's axis values. */
export function buildFalRequest({ execution, gridConfig }: CellRequest): {
  endpoint: string;
  input: Record<string, unknown>;
} {
  const base = isRecord(execution.payload.input) ? execution.payload.input : {};
  const input: Record<string, unknown> = { ...base };
  let endpoint =
    typeof execution.payload.endpoint === "string"
      ? execution.payload.endpoint
      : process.env.FAL_GRID_MODEL || DEFAULT_FAL_MODEL;

  const cellValues: Record<AxisName, string | number> = {
    x: execution.xValue,
    y: execution.yValue,
    z: execution.zValue,
  };

  for (const name of ["x", "y", "z"] as const) {
    const axisType = gridConfig.axes[name].type;
    if (axisType === "none") continue;
    const value = convertValue(cellValues[name], axisType);

    if (axisType === "model") {
      endpoint = String(value);
    } else if (axisType === "lora") {
      input.loras = [{ path: String(value), scale: 1 }];
    } else {
      const field = FAL_INPUT_FIELDS[axisType];
      if (field) input[field] = value;
    }
  }

  return { endpoint, input };
}

export class FalCellRenderer implements CellRenderer {
  async renderCell(request: CellRequest, onStatusUpdate?: OnStatusUpdate): Promise<Raster> {
    ensureFalConfigured();
    const { endpoint, input } = buildFalRequest(request);
    const { batchId, iteration } = request.execution;

    onStatusUpdate?.("queued");
    const result = await fal.subscribe(endpoint, {
      input,
      onQueueUpdate: (update) => {
        if (update.status === "IN_PROGRESS") onStatusUpdate?.("processing");
      },
    });

    const parsed = falOutputSchema.safeParse(result.data);
    if (!parsed.success) {
      throw new Error(`fal returned an unexpected payload for ${batchId}:${iteration}: ${parsed.error.message}`);
    }

    const image = parsed.data.images[0];
    if (!image) throw new Error(`fal returned no images for ${batchId}:${iteration}`);

    const response = await fetch(image.url);
    if (!response.ok) {
      throw new Error(`Failed to download image: ${response.status}`);
    }
    const raster = await decodeImage(Buffer.from(await response.arrayBuffer()));

    console.log(`[fal] ${batchId}:${iteration} rendered by ${endpoint} (request ${result.requestId})`);
    return raster;
  }
}
