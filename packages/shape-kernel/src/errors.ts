/**
 * Error taxonomy.
 *
 * Everything the kernel throws on bad input is a ShapeError, so callers
 * (the MCP server, batch runs) can tell input problems from bugs.
 */

export class ShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Unknown shape, malformed option, wrong-length vector, ambiguous input. */
export class ConfigError extends ShapeError {}

/** A radial shape was asked for a modulation deeper than its radius. */
export class AmplitudeError extends ShapeError {}

/**
 * Minimum-distance bump placement ran out of candidates.
 * Recoverable: retry with fewer bumps or a smaller minimum distance.
 */
export class PlacementError extends ShapeError {
  constructor(
    message: string,
    readonly requested: number,
    readonly placed: number,
  ) {
    super(message);
  }
}
