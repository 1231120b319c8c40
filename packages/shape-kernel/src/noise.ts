/**
 * Noise Synthesizer — band-pass filtered white noise on the shape grid.
 *
 * Per component:
 *   1. Gaussian white noise on a power-of-two working grid
 *   2. forward FFT
 *   3. multiply by a polar band-pass filter
 *        radial:  log-Gaussian around `frequency`, FWHM = bandwidth in octaves
 *        angular: Gaussian around `orientation`, FWHM = orientation bandwidth
 *                 (taken modulo 180° so the filter stays conjugate-symmetric;
 *                 Infinity = isotropic)
 *   4. inverse FFT, real part
 *   5. peak-normalize (max |value| = 1), scale by amplitude
 *   6. bilinear resample onto the m × n grid if the sizes differ, or,
 *      for grids with a noise lattice, read back at each sample's position
 *
 * Peak normalization keeps the sphere precondition meaningful: a noise
 * amplitude below the radius can never push the surface through the
 * center.
 */

import type { NoiseComponent, SineComponent } from './components.js';
import { fft2d, nextPowerOfTwo } from './fft.js';
import { maxAbs, resampleBilinear, sampleBilinearAt } from './grid.js';
import type { GridCoords, GridTopology } from './grid.js';
import { createRandom, type RandomSource } from './random.js';
import { combineGroups } from './sine.js';

/**
 * A square, non-periodic lattice for grids whose samples are not laid
 * out along their signal axes (the cartesian disk). Noise is synthesized
 * on the lattice and read back at every sample.
 */
export interface NoiseLattice {
  /** Side of the square in signal units. */
  span: number;
  /** Fractional lattice (row, col) of every sample, for a lattice of `size` × `size`. */
  positions(size: number): { row: Float64Array; col: Float64Array };
}

export interface NoiseGrid {
  coords: GridCoords;
  topology: GridTopology;
  /** Extent of each native axis in signal units (a full period on periodic axes). */
  axisSpan: { cols: number; rows: number };
  noiseLattice?: NoiseLattice;
}

export interface NoiseOptions {
  modulators?: readonly SineComponent[];
  seed?: number;
}

const DEG = Math.PI / 180;
const FWHM_TO_SIGMA = 1 / (2 * Math.sqrt(2 * Math.LN2));

/** Wrap an angle difference into (-π/2, π/2]. */
function wrapHalfTurn(a: number): number {
  let d = a % Math.PI;
  if (d > Math.PI / 2) d -= Math.PI;
  if (d <= -Math.PI / 2) d += Math.PI;
  return d;
}

/** Period (in signal units) the FFT sees along one axis of `size` working samples. */
function axisPeriod(span: number, size: number, periodic: boolean): number {
  if (periodic) return span;
  if (size < 2 || span === 0) return 1;
  return (span * size) / (size - 1);
}

/** Signed frequency of FFT bin k on an axis of `size` bins. */
function binFrequency(k: number, size: number, period: number): number {
  return (k <= size / 2 ? k : k - size) / period;
}

/**
 * Filter gain per FFT bin. Nyquist bins are their own mirror, so their
 * gain is averaged over both signs of the Nyquist frequency; that keeps
 * the filter conjugate-symmetric and the inverse transform real.
 */
export function bandPass(
  comp: NoiseComponent,
  rows: number,
  cols: number,
  periods: { rows: number; cols: number },
): Float64Array {
  const radialSigma = comp.frequencyBandwidth * FWHM_TO_SIGMA;
  const isotropic = !Number.isFinite(comp.orientationBandwidth);
  const angularSigma = comp.orientationBandwidth * DEG * FWHM_TO_SIGMA;
  const theta0 = comp.orientation * DEG;

  const at = (fx: number, fy: number): number => {
    const radius = Math.hypot(fx, fy);
    if (radius === 0 || comp.frequency <= 0) return 0;
    const octaves = Math.log2(radius / comp.frequency);
    let g = Math.exp(-(octaves * octaves) / (2 * radialSigma * radialSigma));
    if (!isotropic) {
      const d = wrapHalfTurn(Math.atan2(fy, fx) - theta0);
      g *= Math.exp(-(d * d) / (2 * angularSigma * angularSigma));
    }
    return g;
  };

  const gain = new Float64Array(rows * cols);
  for (let r = 0; r < rows; r++) {
    const fy = binFrequency(r, rows, periods.rows);
    const fys = rows > 1 && 2 * r === rows ? [fy, -fy] : [fy];
    for (let c = 0; c < cols; c++) {
      const fx = binFrequency(c, cols, periods.cols);
      const fxs = cols > 1 && 2 * c === cols ? [fx, -fx] : [fx];
      let sum = 0;
      for (const y of fys) for (const x of fxs) sum += at(x, y);
      gain[r * cols + c] = sum / (fys.length * fxs.length);
    }
  }
  return gain;
}

/**
 * One filtered-noise field on a rows × cols working grid, unscaled and
 * peak-normalized. All zeros if the filter passes nothing.
 */
export function filteredNoise(
  comp: NoiseComponent,
  rows: number,
  cols: number,
  periods: { rows: number; cols: number },
  rng: RandomSource,
): Float64Array {
  const size = rows * cols;
  const re = new Float64Array(size);
  const im = new Float64Array(size);
  for (let i = 0; i < size; i++) re[i] = rng.gaussian();

  fft2d(re, im, rows, cols);

  const gain = bandPass(comp, rows, cols, periods);
  for (let k = 0; k < size; k++) {
    re[k] *= gain[k];
    im[k] *= gain[k];
  }

  fft2d(re, im, rows, cols, true);

  const peak = maxAbs(re);
  if (peak === 0) return new Float64Array(size);
  for (let i = 0; i < size; i++) re[i] /= peak;
  return re;
}

/** Sum of filtered-noise components on the shape grid, with group modulation. */
export function composeNoise(
  grid: NoiseGrid,
  components: readonly NoiseComponent[],
  opts: NoiseOptions = {},
): Float64Array {
  const { m, n, su, sv } = grid.coords;
  const { periodicRows, periodicCols } = grid.topology;
  const lattice = grid.noiseLattice;
  const rows = lattice ? nextPowerOfTwo(Math.max(m, n)) : nextPowerOfTwo(m);
  const cols = lattice ? rows : nextPowerOfTwo(n);
  const periods = lattice
    ? { rows: axisPeriod(lattice.span, rows, false), cols: axisPeriod(lattice.span, cols, false) }
    : {
      rows: axisPeriod(grid.axisSpan.rows, rows, periodicRows),
      cols: axisPeriod(grid.axisSpan.cols, cols, periodicCols),
    };
  const positions = lattice?.positions(rows);
  const rng = createRandom(opts.seed);

  const toGrid = (working: Float64Array): Float64Array => {
    if (positions) return sampleBilinearAt(working, rows, cols, positions.row, positions.col);
    if (rows === m && cols === n) return working;
    return resampleBilinear(working, rows, cols, m, n, { periodicRows, periodicCols });
  };

  const groupSums = new Map<number, Float64Array>();
  for (const comp of components) {
    const sum = groupSums.get(comp.group) ?? new Float64Array(m * n);
    groupSums.set(comp.group, sum);
    if (comp.amplitude === 0) continue;

    const field = toGrid(filteredNoise(comp, rows, cols, periods, rng));
    for (let i = 0; i < sum.length; i++) sum[i] += comp.amplitude * field[i];
  }

  return combineGroups(groupSums, opts.modulators ?? [], su, sv);
}
