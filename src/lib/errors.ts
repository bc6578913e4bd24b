/**
 * A sweep that cannot start or cannot be composed: no axis configured, an
 * axis with no usable values, or images that do not fit one grid.
 */
export class GridConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GridConfigurationError";
  }
}
