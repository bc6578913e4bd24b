import type { GridConfiguration, QueuedExecution, Raster } from "@/types";

export interface CellRequest {
  execution: QueuedExecution;
  gridConfig: GridConfiguration;
}

export type OnStatusUpdate = (status: "queued" | "processing") => void;

/** Produces the image for one grid cell; the generation itself lives outside this library. */
export interface CellRenderer {
  renderCell(request: CellRequest, onStatusUpdate?: OnStatusUpdate): Promise<Raster>;
}
