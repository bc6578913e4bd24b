import sharp from "sharp";
import {
  GLYPH_WIDTH_RATIO,
  LABEL_BOX_COLOR,
  LABEL_BOX_OPACITY,
  LABEL_MARGIN,
  LABEL_PADDING,
  LABEL_TEXT_COLOR,
} from "@/lib/constants";
import type { Raster } from "@/types";
import { toChannelCount } from "./raster";

export type LabelAlign = "center" | "right";

export interface LabelRequest {
  text: string;
  width: number;
  height: number;
  fontSize: number;
  align: LabelAlign;
}

/** Estimated advance width of `text`; there is no font metrics source here. */
export function measureLabelWidth(text: string, fontSize: number): number {
  return Math.ceil(Number((text.length * fontSize * GLYPH_WIDTH_RATIO).toFixed(3)));
}

/** Width of the left margin needed to hold the widest row label. */
export function rowLabelColumnWidth(labels: string[], fontSize: number): number {
  const widest = Math.max(0, ...labels.map((label) => measureLabelWidth(label, fontSize)));
  if (widest === 0) return 0;
  return widest + 2 * LABEL_PADDING + 2 * LABEL_MARGIN;
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

export function buildLabelSvg({ text, width, height, fontSize, align }: LabelRequest): string {
  const textWidth = Math.min(measureLabelWidth(text, fontSize), width - 2 * LABEL_PADDING);
  const textX = align === "center" ? (width - textWidth) / 2 : width - textWidth - LABEL_MARGIN;
  const textY = (height - fontSize) / 2;
  const anchorX = align === "center" ? width / 2 : width - LABEL_MARGIN;
  const anchor = align === "center" ? "middle" : "end";
  // Baseline sits at roughly 80% of the em box
  const baseline = textY + fontSize * 0.8;

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">`,
    `<rect x="${textX - LABEL_PADDING}" y="${textY - LABEL_PADDING}" width="${textWidth + 2 * LABEL_PADDING}" height="${fontSize + 2 * LABEL_PADDING}" fill="${LABEL_BOX_COLOR}" fill-opacity="${LABEL_BOX_OPACITY}"/>`,
    `<text x="${anchorX}" y="${baseline}" font-family="DejaVu Sans, Arial, sans-serif" font-size="${fontSize}" fill="${LABEL_TEXT_COLOR}" text-anchor="${anchor}">${escapeXml(text)}</text>`,
    `</svg>`,
  ].join("");
}

/** Renders a label area as an RGBA raster, or null when there is nothing to draw. */
export async function renderLabel(request: LabelRequest): Promise<Raster | null> {
  if (!request.text || request.width <= 0 || request.height <= 0) return null;

  const svg = buildLabelSvg(request);
  const { data, info } = await sharp(Buffer.from(svg))
    .resize(request.width, request.height, { fit: "fill" })
    .ensureAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });

  return {
    width: info.width,
    height: info.height,
    channels: toChannelCount(info.channels),
    data,
  };
}
