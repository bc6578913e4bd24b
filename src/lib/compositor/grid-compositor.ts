import { GRID_BACKGROUND, GRID_DEFAULTS, PLACEHOLDER_SIZE } from "@/lib/constants";
import { GridConfigurationError } from "@/lib/errors";
import { formatProgress, truncateLabel } from "@/lib/format-utils";
import { BatchLock } from "@/lib/store/batch-lock";
import { MemoryStore } from "@/lib/store/memory-store";
import type { KeyedStore } from "@/lib/store/types";
import type {
  AxisSpec,
  ComposedGrid,
  CompositeOptions,
  CompositeResult,
  GridConfiguration,
  ImageBuffer,
  Raster,
} from "@/types";
import { renderLabel, rowLabelColumnWidth, type LabelAlign } from "./labels";
import { blendOver, blit, createRaster, sameShape } from "./raster";

export interface GridLayout {
  canvasWidth: number;
  canvasHeight: number;
  cellWidth: number;
  cellHeight: number;
  rowLabelWidth: number;
  headerHeight: number;
  zLabelHeight: number;
}

function hasLabels(axis: AxisSpec): boolean {
  return axis.type !== "none" && axis.labels.some((label) => label.length > 0);
}

function truncatedLabels(axis: AxisSpec, maxLength: number): string[] {
  if (!hasLabels(axis)) return [];
  return axis.labels.map((label) => truncateLabel(label, maxLength));
}

export function computeGridLayout(
  config: GridConfiguration,
  cellWidth: number,
  cellHeight: number,
  options: CompositeOptions
): GridLayout {
  const { cols, rows, gridsCount } = config.dimensions;
  const { includeLabels, gridGap, labelHeight, fontSize, maxLabelLength } = options;

  const rowLabelWidth = includeLabels
    ? rowLabelColumnWidth(truncatedLabels(config.axes.y, maxLabelLength), fontSize)
    : 0;
  const headerHeight = includeLabels ? labelHeight : 0;
  const zLabelHeight = includeLabels && gridsCount > 1 ? labelHeight : 0;

  return {
    canvasWidth: cols * cellWidth + (cols - 1) * gridGap + rowLabelWidth,
    canvasHeight: rows * cellHeight + (rows - 1) * gridGap + headerHeight + zLabelHeight,
    cellWidth,
    cellHeight,
    rowLabelWidth,
    headerHeight,
    zLabelHeight,
  };
}

export function generateGridInfo(config: GridConfiguration): string {
  const { cols, rows, totalImages } = config.dimensions;
  const parts = [`Grid: ${cols}x${rows}`];
  for (const name of ["x", "y", "z"] as const) {
    const axis = config.axes[name];
    if (axis.type !== "none" && axis.values.length > 0) {
      parts.push(`${name.toUpperCase()}: ${axis.type} (${axis.values.length} values)`);
    }
  }
  parts.push(`Total images: ${totalImages}`);
  return parts.join(" | ");
}

/**
 * Collects images for a batch across calls and, once the last one arrives,
 * lays them out as one labeled grid per Z value.
 */
export class GridImageCompositor {
  private readonly lock = new BatchLock();

  constructor(
    private readonly buffers: KeyedStore<ImageBuffer> = new MemoryStore(),
    private readonly composites: KeyedStore<ComposedGrid> = new MemoryStore()
  ) {}

  /** Appends images in arrival order; arrival order must match iteration order. */
  async combineImages(
    images: Raster | Raster[],
    gridData: GridConfiguration,
    options: Partial<CompositeOptions> = {}
  ): Promise<CompositeResult> {
    const incoming = Array.isArray(images) ? images : [images];
    return this.accept(gridData, options, (cells) => {
      const filled = cells.filter((cell) => cell !== null);
      return [...filled, ...incoming];
    });
  }

  /** Stores an image in the slot of its iteration, for cells that finish out of order. */
  async placeImage(
    iteration: number,
    image: Raster,
    gridData: GridConfiguration,
    options: Partial<CompositeOptions> = {}
  ): Promise<CompositeResult> {
    if (!Number.isInteger(iteration) || iteration < 0 || iteration >= gridData.dimensions.totalImages) {
      throw new GridConfigurationError(
        `Iteration ${iteration} is outside batch ${gridData.batchId} (${gridData.dimensions.totalImages} cells)`
      );
    }
    return this.accept(gridData, options, (cells) => {
      const next = [...cells];
      while (next.length <= iteration) next.push(null);
      next[iteration] = image;
      return next;
    });
  }

  async pendingCount(batchId: string): Promise<number> {
    const buffer = await this.buffers.get(batchId);
    return buffer ? buffer.images.filter((cell) => cell !== null).length : 0;
  }

  /** Iterations whose images are buffered, ascending. */
  async heldIterations(batchId: string): Promise<number[]> {
    const buffer = await this.buffers.get(batchId);
    if (!buffer) return [];
    return buffer.images.flatMap((cell, iteration) => (cell === null ? [] : [iteration]));
  }

  /** Keeps a composed grid that could not be handed on, until `takeComposite` claims it. */
  async holdComposite(batchId: string, grid: ComposedGrid): Promise<void> {
    await this.lock.run(batchId, () => this.composites.set(batchId, grid));
  }

  /** Returns and forgets a held grid; concurrent callers never both receive it. */
  async takeComposite(batchId: string): Promise<ComposedGrid | null> {
    return this.lock.run(batchId, async () => {
      const grid = await this.composites.get(batchId);
      if (grid) await this.composites.delete(batchId);
      return grid;
    });
  }

  async discard(batchId: string): Promise<void> {
    await this.buffers.delete(batchId);
    await this.composites.delete(batchId);
  }

  private async accept(
    gridData: GridConfiguration,
    options: Partial<CompositeOptions>,
    update: (cells: Array<Raster | null>) => Array<Raster | null>
  ): Promise<CompositeResult> {
    const opts: CompositeOptions = { ...GRID_DEFAULTS, ...options };
    const batchId = gridData.batchId;

    return this.lock.run(batchId, async () => {
      const existing = await this.buffers.get(batchId);
      const buffer: ImageBuffer = {
        config: existing?.config ?? gridData,
        images: update(existing?.images ?? []),
      };
      const arrived = buffer.images.filter((cell): cell is Raster => cell !== null);

      const reference = arrived[0];
      const mismatch = reference ? arrived.find((image) => !sameShape(image, reference)) : undefined;
      if (reference && mismatch) {
        await this.buffers.delete(batchId);
        throw new GridConfigurationError(
          `Image ${mismatch.width}x${mismatch.height}x${mismatch.channels} does not match ` +
            `${reference.width}x${reference.height}x${reference.channels} in batch ${batchId}`
        );
      }

      const expected = buffer.config.dimensions.totalImages;
      if (expected <= 0) {
        await this.buffers.delete(batchId);
        throw new GridConfigurationError(`Batch ${batchId} has no grid cells`);
      }

      const cells = buffer.images.slice(0, expected);
      const ready = cells.length === expected && cells.every((cell) => cell !== null);
      if (!ready) {
        await this.buffers.set(batchId, buffer);
        return {
          status: "pending",
          placeholder: createRaster(PLACEHOLDER_SIZE, PLACEHOLDER_SIZE, 3),
          received: arrived.length,
          expected,
          info: formatProgress(arrived.length, expected),
        };
      }

      if (arrived.length > expected) {
        console.warn(`[compositor] Batch ${batchId} received ${arrived.length} images, using the first ${expected}`);
      }

      await this.buffers.delete(batchId);
      const pages = await this.createGrids(buffer.config, arrived.slice(0, expected), opts);
      console.log(`[compositor] Batch ${batchId} composed into ${pages.length} grid(s)`);

      return { status: "complete", pages, info: generateGridInfo(buffer.config) };
    });
  }

  private async createGrids(
    config: GridConfiguration,
    images: Raster[],
    options: CompositeOptions
  ): Promise<Raster[]> {
    const first = images[0];
    if (!first) return [];

    const { cols, rows, gridsCount } = config.dimensions;
    const layout = computeGridLayout(config, first.width, first.height, options);
    const { gridGap, fontSize, maxLabelLength, includeLabels } = options;

    const rendered = new Map<string, Raster | null>();
    const label = async (text: string, width: number, height: number, align: LabelAlign) => {
      const key = `${align}:${width}x${height}:${text}`;
      if (!rendered.has(key)) {
        rendered.set(key, await renderLabel({ text, width, height, fontSize, align }));
      }
      return rendered.get(key) ?? null;
    };

    const xLabels = truncatedLabels(config.axes.x, maxLabelLength);
    const yLabels = truncatedLabels(config.axes.y, maxLabelLength);
    const zLabels = truncatedLabels(config.axes.z, maxLabelLength);
    const cellsTop = layout.zLabelHeight + layout.headerHeight;
    const perPage = cols * rows;

    const pages: Raster[] = [];
    for (let z = 0; z < gridsCount; z++) {
      const canvas = createRaster(layout.canvasWidth, layout.canvasHeight, first.channels, GRID_BACKGROUND);

      for (let i = 0; i < perPage; i++) {
        const image = images[z * perPage + i];
        if (!image) continue;
        const x = layout.rowLabelWidth + (i % cols) * (layout.cellWidth + gridGap);
        const y = cellsTop + Math.floor(i / cols) * (layout.cellHeight + gridGap);
        blit(canvas, image, x, y);
      }

      if (includeLabels) {
        const zText = zLabels[z];
        if (layout.zLabelHeight > 0 && zText) {
          const raster = await label(zText, layout.canvasWidth, layout.zLabelHeight, "center");
          if (raster) blendOver(canvas, raster, 0, 0);
        }

        for (let col = 0; col < Math.min(cols, xLabels.length); col++) {
          const text = xLabels[col];
          if (!text) continue;
          const raster = await label(text, layout.cellWidth, layout.headerHeight, "center");
          if (raster) {
            blendOver(canvas, raster, layout.rowLabelWidth + col * (layout.cellWidth + gridGap), layout.zLabelHeight);
          }
        }

        for (let row = 0; row < Math.min(rows, yLabels.length); row++) {
          const text = yLabels[row];
          if (!text || layout.rowLabelWidth === 0) continue;
          const raster = await label(text, layout.rowLabelWidth, layout.cellHeight, "right");
          if (raster) blendOver(canvas, raster, 0, cellsTop + row * (layout.cellHeight + gridGap));
        }
      }

      pages.push(canvas);
    }

    return pages;
  }
}
