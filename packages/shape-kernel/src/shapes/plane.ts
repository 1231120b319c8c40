/**
 * Plane — a height field over a width × height rectangle centered on
 * the origin. Columns run along x, rows along y; the field is z.
 */

import type { BumpDomain } from '../bumps.js';
import { linspace, meshgrid, type GridCoords, type GridTopology } from '../grid.js';
import type { PlaneOptions } from '../options.js';
import { writeVec3 } from '../vec3.js';
import { ShapeGrid, constantField, type UvScheme } from './base.js';

export class PlaneGrid extends ShapeGrid {
  readonly kind = 'plane' as const;
  readonly coords: GridCoords;
  readonly base: Float64Array;
  readonly topology: GridTopology = { periodicCols: false, periodicRows: false };
  readonly axisSpan: { cols: number; rows: number };
  readonly uvScheme: UvScheme = 'planar';
  readonly bumpDomain: BumpDomain;
  readonly width: number;
  readonly height: number;

  constructor(readonly options: PlaneOptions) {
    super();
    const [m, n] = options.npoints;
    this.width = options.width;
    this.height = options.height ?? (options.width * m) / n;
    const { u, v } = meshgrid(
      linspace(-this.width / 2, this.width / 2, n),
      linspace(-this.height / 2, this.height / 2, m),
    );
    // Signal coordinates are the plane coordinates themselves.
    this.coords = { m, n, u, v, su: u, sv: v };
    this.base = constantField(m * n, 0);
    this.axisSpan = { cols: this.width, rows: this.height };
    const { width, height } = this;
    this.bumpDomain = planarDomain(u, v, (rng) => [(rng.next() - 0.5) * width, (rng.next() - 0.5) * height]);
  }

  vertices(field: Float64Array): Float64Array {
    const { u, v } = this.coords;
    const out = new Float64Array(field.length * 3);
    for (let k = 0; k < field.length; k++) writeVec3(out, k, u[k], v[k], field[k]);
    return out;
  }

  planarUvs(): Float64Array {
    const { u, v } = this.coords;
    const out = new Float64Array(u.length * 2);
    for (let k = 0; k < u.length; k++) {
      out[2 * k] = u[k] / this.width + 0.5;
      out[2 * k + 1] = v[k] / this.height + 0.5;
    }
    return out;
  }

  describe(): Record<string, unknown> {
    return { width: this.width, height: this.height };
  }
}

/** Points are planar [x, y]; Euclidean distance. */
export function planarDomain(
  x: Float64Array,
  y: Float64Array,
  sample: BumpDomain['sample'],
): BumpDomain {
  return {
    dimension: 2,
    sample,
    distance([x1, y1], [x2, y2]) {
      return Math.hypot(x1 - x2, y1 - y2);
    },
    distances([x0, y0]) {
      const out = new Float64Array(x.length);
      for (let k = 0; k < x.length; k++) out[k] = Math.hypot(x[k] - x0, y[k] - y0);
      return out;
    },
  };
}
