/**
 * Disk — a height field over a circle of radius r in the XZ plane.
 *
 *   rows:    radial distance ρ ∈ [0, r]
 *   columns: angle θ ∈ [−π, π − 2π/n]   (periodic)
 *   field:   height y
 *
 * The center row collapses to a point, so its quads are degenerate on
 * one side; the assembler skips those triangles for normals.
 *
 * `coords: 'polar'` evaluates perturbations in (θ/2π, ρ), so a sine
 * with orientation 0 makes radial spokes; `'cartesian'` evaluates
 * them in (x, y) across the face of the disk; noise is then synthesized
 * on a square lattice over the disk and read back at each sample.
 */

import type { BumpDomain } from '../bumps.js';
import { linspace, meshgrid, periodicAngles, mapBuffer, type GridCoords, type GridTopology } from '../grid.js';
import type { NoiseLattice } from '../noise.js';
import type { DiskOptions } from '../options.js';
import { writeVec3 } from '../vec3.js';
import { ShapeGrid, constantField, type UvScheme } from './base.js';
import { planarDomain } from './plane.js';

const TAU = 2 * Math.PI;

export class DiskGrid extends ShapeGrid {
  readonly kind = 'disk' as const;
  readonly coords: GridCoords;
  readonly base: Float64Array;
  readonly topology: GridTopology = { periodicCols: true, periodicRows: false };
  readonly axisSpan: { cols: number; rows: number };
  readonly uvScheme: UvScheme = 'planar';
  readonly bumpDomain: BumpDomain;
  readonly noiseLattice?: NoiseLattice;
  /** Planar x and y of every sample (y here is −z in world space). */
  private readonly px: Float64Array;
  private readonly py: Float64Array;

  constructor(readonly options: DiskOptions) {
    super();
    const [m, n] = options.npoints;
    const r = options.radius;
    const { u, v } = meshgrid(periodicAngles(n), linspace(0, r, m));
    this.px = mapBuffer(u, (t, k) => v[k] * Math.cos(t));
    this.py = mapBuffer(u, (t, k) => v[k] * Math.sin(t));

    if (options.coords === 'cartesian') {
      this.coords = { m, n, u, v, su: this.px, sv: this.py };
      this.axisSpan = { cols: 2 * r, rows: 2 * r };
      this.noiseLattice = squareLattice(this.px, this.py, r);
    } else {
      this.coords = { m, n, u, v, su: mapBuffer(u, (t) => t / TAU), sv: v };
      this.axisSpan = { cols: 1, rows: r };
    }
    this.base = constantField(m * n, 0);
    this.bumpDomain = planarDomain(this.px, this.py, sampleDisc(r));
  }

  get flipWinding(): boolean {
    return true;
  }

  vertices(field: Float64Array): Float64Array {
    const out = new Float64Array(field.length * 3);
    for (let k = 0; k < field.length; k++) writeVec3(out, k, this.px[k], field[k], -this.py[k]);
    return out;
  }

  planarUvs(): Float64Array {
    const r = this.options.radius;
    const out = new Float64Array(this.px.length * 2);
    for (let k = 0; k < this.px.length; k++) {
      out[2 * k] = this.px[k] / (2 * r) + 0.5;
      out[2 * k + 1] = this.py[k] / (2 * r) + 0.5;
    }
    return out;
  }

  describe(): Record<string, unknown> {
    return { radius: this.options.radius, coords: this.options.coords };
  }
}

/** Noise over [−r, r]², read back at each sample's (x, y). */
function squareLattice(px: Float64Array, py: Float64Array, r: number): NoiseLattice {
  return {
    span: 2 * r,
    positions(size) {
      const scale = (size - 1) / (2 * r);
      return {
        row: mapBuffer(py, (y) => (y + r) * scale),
        col: mapBuffer(px, (x) => (x + r) * scale),
      };
    },
  };
}

/** Uniform over the disc's area. */
function sampleDisc(radius: number): BumpDomain['sample'] {
  return (rng) => {
    const rho = radius * Math.sqrt(rng.next());
    const theta = TAU * rng.next();
    return [rho * Math.cos(theta), rho * Math.sin(theta)];
  };
}
