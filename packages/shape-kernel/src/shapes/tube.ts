/**
 * Tube family — cylinder, revolution, extrusion, worm.
 *
 *   rows:    height y ∈ [−h/2, h/2]
 *   columns: angle θ ∈ [−π, π − 2π/n]   (periodic)
 *   field:   radius R
 *
 *   x = R cos θ + sx(y),  y = y + sy(y),  z = −R sin θ + sz(y)
 *
 * The base radius is `radius` unless profile curves are given:
 * `rcurve` is the radius along the height, `ecurve` the radius around
 * the circumference, and with both they combine by `curveMode`. Only
 * the worm carries a spine (sx, sy, sz); its cross-sections stay
 * horizontal.
 *
 * With `caps`, a bottom and a top center vertex follow the grid
 * vertices, in that order.
 */

import type { BumpDomain } from '../bumps.js';
import { ConfigError } from '../errors.js';
import {
  linspace, meshgrid, periodicAngles, mapBuffer, resampleCurve,
  type GridCoords, type GridTopology,
} from '../grid.js';
import type { TubeKind, TubeOptions } from '../options.js';
import { writeVec3 } from '../vec3.js';
import { ShapeGrid, constantField, minOf, wrapAngle, type UvScheme } from './base.js';

const TAU = 2 * Math.PI;

interface Spine {
  x: Float64Array;
  y: Float64Array;
  z: Float64Array;
}

export class TubeGrid extends ShapeGrid {
  readonly coords: GridCoords;
  readonly base: Float64Array;
  readonly topology: GridTopology = { periodicCols: true, periodicRows: false };
  readonly axisSpan: { cols: number; rows: number };
  readonly uvScheme: UvScheme = 'seam';
  readonly bumpDomain: BumpDomain;
  private readonly spine: Spine;

  constructor(readonly kind: TubeKind, readonly options: TubeOptions) {
    super();
    const [m, n] = options.npoints;
    const h = options.height;
    const { u, v } = meshgrid(periodicAngles(n), linspace(-h / 2, h / 2, m));
    this.coords = {
      m, n, u, v,
      su: mapBuffer(u, (t) => t / TAU),
      sv: mapBuffer(v, (y) => y / TAU),
    };
    this.axisSpan = { cols: 1, rows: h / TAU };
    this.base = profileField(kind, options, m, n);

    const low = minOf(this.base);
    if (low <= 0) {
      throw new ConfigError(`${kind}: profile curves must keep the radius positive, got ${low}`);
    }

    const along = (curve: readonly number[] | undefined) =>
      curve ? resampleCurve(curve, m) : new Float64Array(m);
    this.spine = {
      x: along(options.spine?.x),
      y: along(options.spine?.y),
      z: along(options.spine?.z),
    };

    let total = 0;
    for (const r of this.base) total += r;
    this.bumpDomain = tubeDomain(u, v, total / this.base.length, h);
  }

  get caps(): boolean {
    return this.options.caps;
  }

  vertices(field: Float64Array): Float64Array {
    const { u, v, m, n } = this.coords;
    const { x: sx, y: sy, z: sz } = this.spine;
    const count = field.length + (this.caps ? 2 : 0);
    const out = new Float64Array(count * 3);
    for (let k = 0; k < field.length; k++) {
      const i = Math.floor(k / n);
      const r = field[k];
      writeVec3(out, k, r * Math.cos(u[k]) + sx[i], v[k] + sy[i], -r * Math.sin(u[k]) + sz[i]);
    }
    if (this.caps) {
      const bottom = v[0];
      const top = v[(m - 1) * n];
      writeVec3(out, field.length, sx[0], bottom + sy[0], sz[0]);
      writeVec3(out, field.length + 1, sx[m - 1], top + sy[m - 1], sz[m - 1]);
    }
    return out;
  }

  amplitudeLimit(): number {
    return minOf(this.base);
  }

  describe(): Record<string, unknown> {
    const { radius, height, caps, rcurve, ecurve, curveMode, spine } = this.options;
    return {
      radius,
      height,
      caps,
      ...(rcurve ? { rcurve_samples: rcurve.length } : {}),
      ...(ecurve ? { ecurve_samples: ecurve.length } : {}),
      ...(rcurve && ecurve ? { curve_mode: curveMode ?? 'multiply' } : {}),
      ...(spine && Object.keys(spine).length > 0 ? { spine_axes: Object.keys(spine).sort() } : {}),
    };
  }
}

/** Base radius per sample from the radius option and the profile curves. */
function profileField(kind: TubeKind, options: TubeOptions, m: number, n: number): Float64Array {
  const { rcurve, ecurve } = options;
  if (kind === 'cylinder' || (!rcurve && !ecurve)) return constantField(m * n, options.radius);

  const rows = rcurve ? resampleCurve(rcurve, m) : null;
  const cols = ecurve ? resampleCurve(ecurve, n, true) : null;
  const out = new Float64Array(m * n);
  for (let i = 0; i < m; i++) {
    for (let j = 0; j < n; j++) {
      const rc = rows ? rows[i] : null;
      const ec = cols ? cols[j] : null;
      let r: number;
      if (rc !== null && ec !== null) r = options.curveMode === 'add' ? rc + ec : rc * ec;
      else r = rc ?? ec ?? options.radius;
      out[i * n + j] = r;
    }
  }
  return out;
}

/**
 * Points are [θ, y]. Distance is measured on the unrolled surface:
 * arc length at the mean radius around, height along.
 */
function tubeDomain(theta: Float64Array, y: Float64Array, radius: number, height: number): BumpDomain {
  const metric = (dt: number, dy: number) => Math.hypot(wrapAngle(dt) * radius, dy);
  return {
    dimension: 2,
    sample(rng) {
      return [-Math.PI + TAU * rng.next(), (rng.next() - 0.5) * height];
    },
    distance([t1, y1], [t2, y2]) {
      return metric(t1 - t2, y1 - y2);
    },
    distances([t0, y0]) {
      return mapBuffer(theta, (t, k) => metric(t - t0, y[k] - y0));
    },
  };
}
