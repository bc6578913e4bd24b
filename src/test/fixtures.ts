import { createRaster } from "@/lib/compositor/raster";
import { buildGridConfiguration } from "@/lib/grid-config";
import type { CellRenderer, CellRequest } from "@/lib/providers/types";
import type { ChannelCount, GridConfiguration, Raster } from "@/types";

export type Rgb = [number, number, number];

export const PALETTE: Rgb[] = [
  [255, 0, 0],
  [0, 255, 0],
  [0, 0, 255],
  [255, 255, 0],
  [255, 0, 255],
  [0, 255, 255],
  [128, 64, 0],
  [0, 64, 128],
];

export function colorForIteration(iteration: number): Rgb {
  return PALETTE[iteration % PALETTE.length] ?? [0, 0, 0];
}

export function solidCell(color: Rgb, size = 10, channels: ChannelCount = 3): Raster {
  return createRaster(size, size, channels, color);
}

/** Renders every cell as a flat colour picked by its iteration. */
export class SolidColorRenderer implements CellRenderer {
  readonly calls: number[] = [];

  constructor(
    private readonly size = 10,
    private readonly failOnce: Set<number> = new Set()
  ) {}

  async renderCell({ execution }: CellRequest): Promise<Raster> {
    this.calls.push(execution.iteration);
    if (this.failOnce.delete(execution.iteration)) {
      throw new Error(`render failed for cell ${execution.iteration}`);
    }
    return solidCell(colorForIteration(execution.iteration), this.size);
  }
}

/** Sampler {euler, ddim} on X against CFG {5.0, 7.5} on Y. */
export function samplerByCfg(batchId = "test-batch"): GridConfiguration {
  return buildGridConfiguration(
    {
      x: { type: "sampler", values: "euler, ddim" },
      y: { type: "cfg_scale", values: "5.0, 7.5" },
    },
    batchId
  );
}
