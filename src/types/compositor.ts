import type { GridConfiguration } from "./axis";
import type { Raster } from "./raster";

export interface CompositeOptions {
  fontSize: number;
  gridGap: number;
  labelHeight: number;
  maxLabelLength: number;
  includeLabels: boolean;
}

export interface ImageBuffer {
  config: GridConfiguration;
  /** Indexed by iteration; null marks a cell that has not arrived yet. */
  images: Array<Raster | null>;
}

export interface ComposedGrid {
  pages: Raster[];
  info: string;
}

export type CompositeResult =
  | { status: "pending"; placeholder: Raster; received: number; expected: number; info: string }
  | { status: "complete"; pages: Raster[]; info: string };
