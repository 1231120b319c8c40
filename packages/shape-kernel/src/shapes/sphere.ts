/**
 * Sphere — azimuth × elevation.
 *
 *   columns: azimuth θ ∈ [−π, π − 2π/n]   (periodic)
 *   rows:    elevation φ ∈ [−π/2, π/2]
 *   field:   radius R
 *
 *   x = R cos φ cos θ,  y = R sin φ,  z = −R cos φ sin θ
 *
 * Pole rows keep n distinct vertices at the same position.
 */

import type { BumpDomain } from '../bumps.js';
import { linspace, meshgrid, periodicAngles, mapBuffer, type GridCoords, type GridTopology } from '../grid.js';
import type { SphereOptions } from '../options.js';
import { writeVec3 } from '../vec3.js';
import { ShapeGrid, constantField, type UvScheme } from './base.js';

const TAU = 2 * Math.PI;

export class SphereGrid extends ShapeGrid {
  readonly kind = 'sphere' as const;
  readonly coords: GridCoords;
  readonly base: Float64Array;
  readonly topology: GridTopology = { periodicCols: true, periodicRows: false };
  /** One full turn of azimuth, half a turn of elevation. */
  readonly axisSpan = { cols: 1, rows: 0.5 };
  readonly uvScheme: UvScheme = 'seam';
  readonly bumpDomain: BumpDomain;

  constructor(readonly options: SphereOptions) {
    super();
    const [m, n] = options.npoints;
    const { u, v } = meshgrid(periodicAngles(n), linspace(-Math.PI / 2, Math.PI / 2, m));
    this.coords = {
      m, n, u, v,
      su: mapBuffer(u, (t) => t / TAU),
      sv: mapBuffer(v, (p) => p / TAU),
    };
    this.base = constantField(m * n, options.radius);
    this.bumpDomain = sphereDomain(u, v);
  }

  vertices(field: Float64Array): Float64Array {
    const { u, v } = this.coords;
    const out = new Float64Array(field.length * 3);
    for (let k = 0; k < field.length; k++) {
      const r = field[k];
      const cp = Math.cos(v[k]);
      writeVec3(out, k, r * cp * Math.cos(u[k]), r * Math.sin(v[k]), -r * cp * Math.sin(u[k]));
    }
    return out;
  }

  amplitudeLimit(): number {
    return this.options.radius;
  }

  describe(): Record<string, unknown> {
    return { radius: this.options.radius };
  }
}

/**
 * Points are [azimuth, elevation] in radians; distance is the
 * great-circle angle.
 */
function sphereDomain(azimuth: Float64Array, elevation: Float64Array): BumpDomain {
  const sinE = mapBuffer(elevation, Math.sin);
  const cosE = mapBuffer(elevation, Math.cos);

  const angle = (cosD: number) => Math.acos(Math.min(1, Math.max(-1, cosD)));

  return {
    dimension: 2,
    sample(rng) {
      // Uniform on the surface: sin(elevation) is uniform in [-1, 1].
      return [-Math.PI + TAU * rng.next(), Math.asin(2 * rng.next() - 1)];
    },
    distance([t1, p1], [t2, p2]) {
      return angle(Math.sin(p1) * Math.sin(p2) + Math.cos(p1) * Math.cos(p2) * Math.cos(t1 - t2));
    },
    distances([t0, p0]) {
      const s0 = Math.sin(p0);
      const c0 = Math.cos(p0);
      return mapBuffer(azimuth, (t, k) => angle(s0 * sinE[k] + c0 * cosE[k] * Math.cos(t - t0)));
    },
  };
}
