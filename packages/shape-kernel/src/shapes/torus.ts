/**
 * Torus — minor angle φ (rows) × major angle θ (columns), both periodic.
 *
 *   x = (R(θ) + r cos φ) cos θ
 *   y = r sin φ
 *   z = −(R(θ) + r cos φ) sin θ
 *
 * The scalar field is the minor radius r. The major radius R(θ) is a
 * separate field fixed at creation: `majorRadius` plus any sine
 * components evaluated over θ/2π.
 */

import type { BumpDomain } from '../bumps.js';
import { sineComponents } from '../components.js';
import { ConfigError } from '../errors.js';
import { meshgrid, periodicAngles, mapBuffer, type GridCoords, type GridTopology } from '../grid.js';
import type { TorusOptions } from '../options.js';
import { composeSine } from '../sine.js';
import { writeVec3 } from '../vec3.js';
import { ShapeGrid, constantField, minOf, wrapAngle, type UvScheme } from './base.js';

const TAU = 2 * Math.PI;

export class TorusGrid extends ShapeGrid {
  readonly kind = 'torus' as const;
  readonly coords: GridCoords;
  readonly base: Float64Array;
  readonly topology: GridTopology = { periodicCols: true, periodicRows: true };
  readonly axisSpan = { cols: 1, rows: 1 };
  readonly uvScheme: UvScheme = 'seam';
  readonly bumpDomain: BumpDomain;
  /** Major radius per column. */
  readonly major: Float64Array;

  constructor(readonly options: TorusOptions) {
    super();
    const [m, n] = options.npoints;
    const theta = periodicAngles(n);
    const { u, v } = meshgrid(theta, periodicAngles(m));
    this.coords = {
      m, n, u, v,
      su: mapBuffer(u, (t) => t / TAU),
      sv: mapBuffer(v, (p) => p / TAU),
    };

    const turns = mapBuffer(theta, (t) => t / TAU);
    const ripple = composeSine(
      sineComponents(options.majorComponents, 'carrier'),
      [],
      turns,
      new Float64Array(n),
    );
    this.major = mapBuffer(ripple, (d) => options.majorRadius + d);
    if (minOf(this.major) <= 0) {
      throw new ConfigError(
        `torus: majorComponents drive the major radius to ${minOf(this.major)}; keep it positive`,
      );
    }

    this.base = constantField(m * n, options.minorRadius);
    this.bumpDomain = torusDomain(u, v);
  }

  vertices(field: Float64Array): Float64Array {
    const { u, v, n } = this.coords;
    const out = new Float64Array(field.length * 3);
    for (let k = 0; k < field.length; k++) {
      const r = field[k];
      const ring = this.major[k % n] + r * Math.cos(v[k]);
      writeVec3(out, k, ring * Math.cos(u[k]), r * Math.sin(v[k]), -ring * Math.sin(u[k]));
    }
    return out;
  }

  amplitudeLimit(): number {
    return this.options.minorRadius;
  }

  describe(): Record<string, unknown> {
    return {
      major_radius: this.options.majorRadius,
      minor_radius: this.options.minorRadius,
      major_components: this.options.majorComponents.length,
    };
  }
}

/** Points are [θ, φ]; distance wraps on both angles. */
function torusDomain(theta: Float64Array, phi: Float64Array): BumpDomain {
  const metric = (dt: number, dp: number) => Math.hypot(wrapAngle(dt), wrapAngle(dp));
  return {
    dimension: 2,
    sample(rng) {
      return [-Math.PI + TAU * rng.next(), -Math.PI + TAU * rng.next()];
    },
    distance([t1, p1], [t2, p2]) {
      return metric(t1 - t2, p1 - p2);
    },
    distances([t0, p0]) {
      return mapBuffer(theta, (t, k) => metric(t - t0, phi[k] - p0));
    },
  };
}
