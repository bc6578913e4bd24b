import sharp from "sharp";
import type { ChannelCount, Raster, Rgba } from "@/types";

export function toChannelCount(channels: number): ChannelCount {
  if (channels === 3 || channels === 4) return channels;
  throw new Error(`Unsupported channel count: ${channels}`);
}

export function createRaster(
  width: number,
  height: number,
  channels: ChannelCount = 3,
  fill: [number, number, number] = [0, 0, 0]
): Raster {
  const data = new Uint8Array(width * height * channels);
  const raster: Raster = { width, height, channels, data };
  if (fill.some((c) => c !== 0) || channels === 4) {
    fillRect(raster, 0, 0, width, height, [fill[0], fill[1], fill[2], 255]);
  }
  return raster;
}

export function getPixel(raster: Raster, x: number, y: number): Rgba {
  const offset = (y * raster.width + x) * raster.channels;
  const d = raster.data;
  return [d[offset] ?? 0, d[offset + 1] ?? 0, d[offset + 2] ?? 0, raster.channels === 4 ? d[offset + 3] ?? 0 : 255];
}

export function fillRect(
  raster: Raster,
  x: number,
  y: number,
  width: number,
  height: number,
  color: Rgba
): void {
  const x0 = Math.max(0, x);
  const y0 = Math.max(0, y);
  const x1 = Math.min(raster.width, x + width);
  const y1 = Math.min(raster.height, y + height);
  for (let row = y0; row < y1; row++) {
    for (let col = x0; col < x1; col++) {
      const offset = (row * raster.width + col) * raster.channels;
      raster.data[offset] = color[0];
      raster.data[offset + 1] = color[1];
      raster.data[offset + 2] = color[2];
      if (raster.channels === 4) raster.data[offset + 3] = color[3];
    }
  }
}

/** Copies `src` onto `dst` at (x, y), clipped to `dst`. */
export function blit(dst: Raster, src: Raster, x: number, y: number): void {
  const shared = Math.min(dst.channels, src.channels, 3);
  for (let row = 0; row < src.height; row++) {
    const dy = y + row;
    if (dy < 0 || dy >= dst.height) continue;
    for (let col = 0; col < src.width; col++) {
      const dx = x + col;
      if (dx < 0 || dx >= dst.width) continue;
      const s = (row * src.width + col) * src.channels;
      const d = (dy * dst.width + dx) * dst.channels;
      for (let c = 0; c < shared; c++) dst.data[d + c] = src.data[s + c] ?? 0;
      if (dst.channels === 4) dst.data[d + 3] = src.channels === 4 ? src.data[s + 3] ?? 255 : 255;
    }
  }
}

/** Alpha-composites an RGBA `src` over `dst` at (x, y). */
export function blendOver(dst: Raster, src: Raster, x: number, y: number): void {
  if (src.channels !== 4) {
    blit(dst, src, x, y);
    return;
  }
  for (let row = 0; row < src.height; row++) {
    const dy = y + row;
    if (dy < 0 || dy >= dst.height) continue;
    for (let col = 0; col < src.width; col++) {
      const dx = x + col;
      if (dx < 0 || dx >= dst.width) continue;
      const s = (row * src.width + col) * 4;
      const alpha = (src.data[s + 3] ?? 0) / 255;
      if (alpha === 0) continue;
      const d = (dy * dst.width + dx) * dst.channels;
      for (let c = 0; c < 3; c++) {
        const over = src.data[s + c] ?? 0;
        const under = dst.data[d + c] ?? 0;
        dst.data[d + c] = Math.round(over * alpha + under * (1 - alpha));
      }
      if (dst.channels === 4) {
        const under = (dst.data[d + 3] ?? 0) / 255;
        dst.data[d + 3] = Math.round((alpha + under * (1 - alpha)) * 255);
      }
    }
  }
}

export function sameShape(a: Raster, b: Raster): boolean {
  return a.width === b.width && a.height === b.height && a.channels === b.channels;
}

/** Decodes an encoded image (PNG, JPEG, WebP...) into an RGBA raster. */
export async function decodeImage(input: Buffer): Promise<Raster> {
  const { data, info } = await sharp(input).ensureAlpha().raw().toBuffer({ resolveWithObject: true });
  return {
    width: info.width,
    height: info.height,
    channels: toChannelCount(info.channels),
    data,
  };
}

export async function encodePng(raster: Raster): Promise<Buffer> {
  return sharp(raster.data, {
    raw: { width: raster.width, height: raster.height, channels: raster.channels },
  })
    .png()
    .toBuffer();
}
