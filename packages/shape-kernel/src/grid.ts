/**
 * Native parameter grids.
 *
 * Every shape samples its surface on an m × n grid: m rows along the
 * slow axis (elevation, height, radius, minor angle), n columns along
 * the fast axis (azimuth, x, angle, major angle). Buffers are row-major,
 * so sample (i, j) lives at i * n + j — the same order vertices are
 * written out in.
 */

export interface GridCoords {
  /** Rows. */
  m: number;
  /** Columns. */
  n: number;
  /** Native fast-axis coordinate per sample (azimuth, x, angle). */
  u: Float64Array;
  /** Native slow-axis coordinate per sample (elevation, y, height). */
  v: Float64Array;
  /** Signal coordinates in cycle units, fed to the sine and noise composers. */
  su: Float64Array;
  sv: Float64Array;
}

/** Which grid axes wrap around. */
export interface GridTopology {
  periodicCols: boolean;
  periodicRows: boolean;
}

// ─── Axis sampling ──────────────────────────────────────────────

/** count evenly spaced values from a to b inclusive. */
export function linspace(a: number, b: number, count: number): Float64Array {
  const out = new Float64Array(count);
  if (count === 1) {
    out[0] = a;
    return out;
  }
  const step = (b - a) / (count - 1);
  for (let i = 0; i < count; i++) out[i] = a + i * step;
  return out;
}

/** count angles over a full turn starting at -π, last sample one step short of π. */
export function periodicAngles(count: number): Float64Array {
  const out = new Float64Array(count);
  const step = (2 * Math.PI) / count;
  for (let i = 0; i < count; i++) out[i] = -Math.PI + i * step;
  return out;
}

/** Expand a row axis (length m) and a column axis (length n) to per-sample buffers. */
export function meshgrid(cols: Float64Array, rows: Float64Array): { u: Float64Array; v: Float64Array } {
  const m = rows.length;
  const n = cols.length;
  const u = new Float64Array(m * n);
  const v = new Float64Array(m * n);
  for (let i = 0; i < m; i++) {
    for (let j = 0; j < n; j++) {
      u[i * n + j] = cols[j];
      v[i * n + j] = rows[i];
    }
  }
  return { u, v };
}

export function mapBuffer(src: Float64Array, fn: (x: number, i: number) => number): Float64Array {
  const out = new Float64Array(src.length);
  for (let i = 0; i < src.length; i++) out[i] = fn(src[i], i);
  return out;
}

// ─── Resampling ─────────────────────────────────────────────────

export interface ResampleOptions {
  periodicRows?: boolean;
  periodicCols?: boolean;
}

function axisSample(index: number, dst: number, src: number, periodic: boolean): [number, number, number] {
  if (src === 1) return [0, 0, 0];
  if (periodic) {
    const p = (index * src) / dst;
    const i0 = Math.floor(p);
    return [i0 % src, (i0 + 1) % src, p - i0];
  }
  const p = dst > 1 ? (index * (src - 1)) / (dst - 1) : 0;
  const i0 = Math.min(Math.floor(p), src - 1);
  const i1 = Math.min(i0 + 1, src - 1);
  return [i0, i1, p - i0];
}

/**
 * Bilinear resample of a row-major srcRows × srcCols buffer onto rows × cols.
 * Non-periodic axes map end samples onto end samples; periodic axes map
 * one full period onto one full period and wrap.
 */
export function resampleBilinear(
  src: ArrayLike<number>,
  srcRows: number,
  srcCols: number,
  rows: number,
  cols: number,
  opts: ResampleOptions = {},
): Float64Array {
  if (src.length !== srcRows * srcCols) {
    throw new Error(`resampleBilinear: buffer length ${src.length} !== ${srcRows} x ${srcCols}`);
  }
  const out = new Float64Array(rows * cols);
  const colSamples = Array.from({ length: cols }, (_, j) =>
    axisSample(j, cols, srcCols, opts.periodicCols ?? false));
  for (let i = 0; i < rows; i++) {
    const [r0, r1, tr] = axisSample(i, rows, srcRows, opts.periodicRows ?? false);
    for (let j = 0; j < cols; j++) {
      const [c0, c1, tc] = colSamples[j];
      const a = src[r0 * srcCols + c0];
      const b = src[r0 * srcCols + c1];
      const c = src[r1 * srcCols + c0];
      const d = src[r1 * srcCols + c1];
      const top = a + (b - a) * tc;
      const bottom = c + (d - c) * tc;
      out[i * cols + j] = top + (bottom - top) * tr;
    }
  }
  return out;
}

/**
 * Bilinear read of a row-major rows × cols buffer at fractional indices
 * (row[k], col[k]), clamped to the buffer's edges.
 */
export function sampleBilinearAt(
  src: ArrayLike<number>,
  rows: number,
  cols: number,
  row: ArrayLike<number>,
  col: ArrayLike<number>,
): Float64Array {
  const out = new Float64Array(row.length);
  for (let k = 0; k < row.length; k++) {
    const p = Math.min(Math.max(row[k], 0), rows - 1);
    const q = Math.min(Math.max(col[k], 0), cols - 1);
    const r0 = Math.floor(p);
    const c0 = Math.floor(q);
    const r1 = Math.min(r0 + 1, rows - 1);
    const c1 = Math.min(c0 + 1, cols - 1);
    const tr = p - r0;
    const tc = q - c0;
    const top = src[r0 * cols + c0] + (src[r0 * cols + c1] - src[r0 * cols + c0]) * tc;
    const bottom = src[r1 * cols + c0] + (src[r1 * cols + c1] - src[r1 * cols + c0]) * tc;
    out[k] = top + (bottom - top) * tr;
  }
  return out;
}

/** Linear resample of a 1D curve to count samples. */
export function resampleCurve(values: readonly number[], count: number, periodic = false): Float64Array {
  return resampleBilinear(values, 1, values.length, 1, count, { periodicCols: periodic });
}

export function maxAbs(buf: ArrayLike<number>): number {
  let peak = 0;
  for (let i = 0; i < buf.length; i++) {
    const a = Math.abs(buf[i]);
    if (a > peak) peak = a;
  }
  return peak;
}
