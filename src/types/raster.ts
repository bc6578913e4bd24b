export type ChannelCount = 3 | 4;

/** 8-bit interleaved, row-major pixel buffer. */
export interface Raster {
  width: number;
  height: number;
  channels: ChannelCount;
  data: Uint8Array;
}

export type Rgba = [r: number, g: number, b: number, a: number];
