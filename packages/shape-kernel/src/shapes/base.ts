/**
 * Shape Grid Builder — the capability every base shape provides.
 *
 * A builder owns the native grid (axes, ranges, signal coordinates), the
 * unperturbed base field, the mapping from a scalar field to Cartesian
 * vertices, and the topology the mesh assembler needs (which axes wrap,
 * whether tube caps are appended). All shapes are Y-up.
 */

import type { BumpDomain } from '../bumps.js';
import type { GridCoords, GridTopology } from '../grid.js';
import type { NoiseGrid } from '../noise.js';
import type { ShapeName } from '../options.js';

/** How texture coordinates are laid out. */
export type UvScheme =
  /** Periodic axes duplicate the seam in texture space. */
  | 'seam'
  /** One planar (u, v) per vertex. */
  | 'planar';

export abstract class ShapeGrid implements NoiseGrid {
  abstract readonly kind: ShapeName;
  abstract readonly coords: GridCoords;
  abstract readonly base: Float64Array;
  abstract readonly topology: GridTopology;
  abstract readonly axisSpan: { cols: number; rows: number };
  abstract readonly bumpDomain: BumpDomain;
  abstract readonly uvScheme: UvScheme;

  /** Map a full scalar field (base + perturbations) to xyz triples. */
  abstract vertices(field: Float64Array): Float64Array;

  /** Shape parameters for readbacks and OBJ comments. */
  abstract describe(): Record<string, unknown>;

  get m(): number {
    return this.coords.m;
  }

  get n(): number {
    return this.coords.n;
  }

  /** Tube shapes append a bottom and a top center vertex after the grid. */
  get caps(): boolean {
    return false;
  }

  /** Reverse face winding so normals point outward (up, for the disk). */
  get flipWinding(): boolean {
    return false;
  }

  /**
   * Largest |amplitude| a sine or noise component may have, or null
   * when the base field does not bound it.
   */
  amplitudeLimit(): number | null {
    return null;
  }

  /** Per-vertex (u, v) for the planar scheme. */
  planarUvs(): Float64Array {
    throw new Error(`${this.kind} uses seam texture coordinates, not planar`);
  }
}

// ─── Shared helpers ─────────────────────────────────────────────

/** Wrap an angle difference into [-π, π). */
export function wrapAngle(a: number): number {
  const t = (a + Math.PI) % (2 * Math.PI);
  return (t < 0 ? t + 2 * Math.PI : t) - Math.PI;
}

export function constantField(size: number, value: number): Float64Array {
  return new Float64Array(size).fill(value);
}

export function minOf(buf: Float64Array): number {
  let min = Infinity;
  for (const v of buf) if (v < min) min = v;
  return min;
}
