import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { GridConfigurationError } from "@/lib/errors";
import { buildGridConfiguration } from "@/lib/grid-config";
import { PALETTE, colorForIteration, samplerByCfg, solidCell, type Rgb } from "@/test/fixtures";
import type { CompositeResult, Raster } from "@/types";
import { GridImageCompositor, computeGridLayout, generateGridInfo } from "./grid-compositor";
import { getPixel } from "./raster";

const RED = colorForIteration(0);
const GREEN = colorForIteration(1);
const BLUE = colorForIteration(2);
const YELLOW = colorForIteration(3);
const plain = { includeLabels: false, gridGap: 2 };

function cells(): Raster[] {
  return PALETTE.slice(0, 4).map((color) => solidCell(color));
}

function opaque(color: Rgb): number[] {
  return [...color, 255];
}

function pagesOf(result: CompositeResult): Raster[] {
  if (result.status !== "complete") throw new Error(`expected a complete grid, got ${result.info}`);
  return result.pages;
}

describe("computeGridLayout", () => {
  it("reserves room for headers and row labels", () => {
    const layout = computeGridLayout(samplerByCfg(), 10, 10, {
      includeLabels: true,
      gridGap: 2,
      labelHeight: 16,
      fontSize: 10,
      maxLabelLength: 30,
    });
    expect(layout).toEqual({
      canvasWidth: 122,
      canvasHeight: 38,
      cellWidth: 10,
      cellHeight: 10,
      rowLabelWidth: 100,
      headerHeight: 16,
      zLabelHeight: 0,
    });
  });
});

describe("generateGridInfo", () => {
  it("describes the configured axes", () => {
    expect(generateGridInfo(samplerByCfg())).toBe(
      "Grid: 2x2 | X: sampler (2 values) | Y: cfg_scale (2 values) | Total images: 4"
    );
  });
});

describe("GridImageCompositor", () => {
  let compositor: GridImageCompositor;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    compositor = new GridImageCompositor();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reports progress with a placeholder until the grid is full", async () => {
    const result = await compositor.combineImages(solidCell(RED), samplerByCfg(), plain);

    expect(result.status).toBe("pending");
    if (result.status !== "pending") return;
    expect(result.info).toBe("Grid progress: 1/4 images");
    expect([result.received, result.expected]).toEqual([1, 4]);
    expect([result.placeholder.width, result.placeholder.height, result.placeholder.channels]).toEqual([64, 64, 3]);
    expect(result.placeholder.data.every((byte) => byte === 0)).toBe(true);
  });

  it("composes one grid after the last image and places cells in iteration order", async () => {
    const config = samplerByCfg();
    const results: CompositeResult[] = [];
    for (const cell of cells()) results.push(await compositor.combineImages(cell, config, plain));

    expect(results.map((result) => result.status)).toEqual(["pending", "pending", "pending", "complete"]);
    const last = results[3];
    if (!last) throw new Error("no result");
    const pages = pagesOf(last);
    expect(pages).toHaveLength(1);

    const [page] = pages;
    if (!page) throw new Error("missing page");
    expect([page.width, page.height]).toEqual([22, 22]);
    expect(getPixel(page, 0, 0)).toEqual(opaque(RED));
    expect(getPixel(page, 12, 0)).toEqual(opaque(GREEN));
    expect(getPixel(page, 0, 12)).toEqual(opaque(BLUE));
    expect(getPixel(page, 12, 12)).toEqual(opaque(YELLOW));
    expect(getPixel(page, 10, 0)).toEqual([32, 32, 32, 255]);
  });

  it("frees the buffer once a grid is composed", async () => {
    const config = samplerByCfg("fresh");
    await compositor.combineImages(cells(), config, plain);
    expect(await compositor.pendingCount("fresh")).toBe(0);

    const again = await compositor.combineImages(solidCell(RED), config, plain);
    expect(again.info).toBe("Grid progress: 1/4 images");
  });

  it("accepts a whole batch in one call", async () => {
    const result = await compositor.combineImages(cells(), samplerByCfg(), plain);
    expect(pagesOf(result)).toHaveLength(1);
  });

  it("leaves label space around the cells", async () => {
    const result = await compositor.combineImages(cells(), samplerByCfg(), {
      includeLabels: true,
      gridGap: 2,
      labelHeight: 16,
      fontSize: 10,
    });
    const [page] = pagesOf(result);
    if (!page) throw new Error("missing page");

    expect([page.width, page.height]).toEqual([122, 38]);
    expect(getPixel(page, 100, 16)).toEqual(opaque(RED));
    expect(getPixel(page, 112, 16)).toEqual(opaque(GREEN));
    expect(getPixel(page, 100, 28)).toEqual(opaque(BLUE));
    expect(getPixel(page, 121, 37)).toEqual(opaque(YELLOW));
  });

  it("truncates long row labels before sizing the margin", async () => {
    const result = await compositor.combineImages(cells(), samplerByCfg(), {
      includeLabels: true,
      gridGap: 2,
      labelHeight: 16,
      fontSize: 10,
      maxLabelLength: 10,
    });
    const [page] = pagesOf(result);
    expect(page?.width).toBe(98);
  });

  it("produces one page per Z value", async () => {
    const config = buildGridConfiguration(
      {
        x: { type: "sampler", values: "euler, ddim" },
        y: { type: "none", values: "" },
        z: { type: "steps", values: "10, 20" },
      },
      "paged"
    );
    const result = await compositor.combineImages(cells(), config, {
      includeLabels: true,
      gridGap: 2,
      labelHeight: 16,
      fontSize: 10,
    });
    const pages = pagesOf(result);

    expect(pages).toHaveLength(2);
    const [first, second] = pages;
    if (!first || !second) throw new Error("missing page");
    expect([first.width, first.height]).toEqual([22, 42]);
    expect(getPixel(first, 0, 32)).toEqual(opaque(RED));
    expect(getPixel(first, 12, 32)).toEqual(opaque(GREEN));
    expect(getPixel(second, 0, 32)).toEqual(opaque(BLUE));
    expect(getPixel(second, 12, 32)).toEqual(opaque(YELLOW));
  });

  it("keeps the channel count of the cells", async () => {
    const rgba = PALETTE.slice(0, 4).map((color) => solidCell(color, 10, 4));
    const [page] = pagesOf(await compositor.combineImages(rgba, samplerByCfg(), plain));
    expect(page?.channels).toBe(4);
    expect(page && getPixel(page, 10, 10)).toEqual([32, 32, 32, 255]);
  });

  it("rejects images of a different size and drops the batch", async () => {
    const config = samplerByCfg("mixed");
    await compositor.combineImages(solidCell([1, 2, 3], 10), config, plain);

    await expect(compositor.combineImages(solidCell([1, 2, 3], 12), config, plain)).rejects.toThrow(
      GridConfigurationError
    );
    expect(await compositor.pendingCount("mixed")).toBe(0);
  });

  it("places out-of-order cells by iteration", async () => {
    const config = samplerByCfg("shuffled");
    const statuses: string[] = [];
    let last: CompositeResult | null = null;
    for (const iteration of [3, 1, 0, 2]) {
      last = await compositor.placeImage(iteration, solidCell(colorForIteration(iteration)), config, plain);
      statuses.push(last.status);
    }

    expect(statuses).toEqual(["pending", "pending", "pending", "complete"]);
    if (!last) throw new Error("no result");
    const [page] = pagesOf(last);
    if (!page) throw new Error("missing page");
    expect(getPixel(page, 0, 0)).toEqual(opaque(RED));
    expect(getPixel(page, 12, 12)).toEqual(opaque(YELLOW));
  });

  it("rejects iterations outside the grid", async () => {
    await expect(compositor.placeImage(4, solidCell([0, 0, 0]), samplerByCfg(), plain)).rejects.toThrow(
      "Iteration 4 is outside batch test-batch (4 cells)"
    );
  });

  it("forgets a discarded batch", async () => {
    const config = samplerByCfg("dropped");
    await compositor.combineImages(solidCell([0, 0, 0]), config, plain);
    expect(await compositor.pendingCount("dropped")).toBe(1);
    await compositor.discard("dropped");
    expect(await compositor.pendingCount("dropped")).toBe(0);
  });

  it("lists the iterations it holds", async () => {
    const config = samplerByCfg("held");
    await compositor.placeImage(3, solidCell(YELLOW), config, plain);
    await compositor.placeImage(1, solidCell(GREEN), config, plain);

    expect(await compositor.heldIterations("held")).toEqual([1, 3]);
    expect(await compositor.heldIterations("other")).toEqual([]);
  });

  it("hands a held grid to one caller only", async () => {
    const grid = { pages: [solidCell(BLUE)], info: "Grid: 1x1" };
    await compositor.holdComposite("kept", grid);

    const [first, second] = await Promise.all([compositor.takeComposite("kept"), compositor.takeComposite("kept")]);
    expect(first).toEqual(grid);
    expect(second).toBeNull();
  });
});
