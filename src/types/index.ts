export type * from "./axis";
export type * from "./execution";
export type * from "./raster";
export type * from "./compositor";
