/**
 * Custom Profile Adapter — user-supplied perturbations.
 *
 * Three sources:
 *   function  a bump profile f(distance, params), placed like bumps
 *   matrix    a numeric height map, rows top to bottom
 *   image     a path or encoded buffer, decoded with sharp; colour
 *             channels averaged, alpha ignored
 *
 * Matrices and images are flipped vertically (their first row is the
 * top of the grid), resampled bilinearly onto the shape grid and scaled
 * so the largest |value| equals the amplitude.
 */

import sharp from 'sharp';
import { z } from 'zod';
import type { BumpProfile, OverlapPolicy } from './bumps.js';
import { customBumpComponents, parseWith, type BumpComponent, type CustomBumpInput } from './components.js';
import { ConfigError } from './errors.js';
import { maxAbs, resampleBilinear, type GridTopology } from './grid.js';

// ─── Types ──────────────────────────────────────────────────────

export type CustomSource =
  | { kind: 'function'; profile: BumpProfile; components: BumpComponent[] }
  | { kind: 'matrix'; data: number[][]; amplitude: number }
  | { kind: 'image'; image: string | Uint8Array; amplitude: number };

/** What callers hand over before disambiguation. */
export type CustomInput = BumpProfile | readonly (readonly number[])[] | string | Uint8Array;

export interface CustomParams {
  /** Bump rows `[count, cutoff, ...params]` for a profile function. */
  bumps?: readonly CustomBumpInput[];
  /** Peak |value| for a matrix or image. Default 0.1. */
  amplitude?: number;
  minDistance?: number;
  overlap?: OverlapPolicy;
  seed?: number;
}

/** A decoded height map, rows bottom to top. */
export interface HeightMap {
  rows: number;
  cols: number;
  data: Float64Array;
}

/** Grid shape a map is resampled onto. */
export interface MapTarget {
  m: number;
  n: number;
  topology: GridTopology;
}

const DEFAULT_AMPLITUDE = 0.1;

const matrixSchema = z.array(z.array(z.number().finite()).min(1)).min(1);

// ─── Disambiguation ─────────────────────────────────────────────

export function customSourceFrom(input: CustomInput, params: CustomParams = {}): CustomSource {
  const amplitude = params.amplitude ?? DEFAULT_AMPLITUDE;
  if (!Number.isFinite(amplitude)) {
    throw new ConfigError(`custom: amplitude must be finite, got ${amplitude}`);
  }

  if (typeof input === 'function') {
    if (!params.bumps || params.bumps.length === 0) {
      throw new ConfigError('custom: a profile function needs bump rows [count, cutoff, ...params]');
    }
    return { kind: 'function', profile: input, components: customBumpComponents(params.bumps) };
  }
  if (typeof input === 'string' || input instanceof Uint8Array) {
    return { kind: 'image', image: input, amplitude };
  }
  if (Array.isArray(input)) {
    const data = parseWith(matrixSchema, input, 'custom.matrix');
    const cols = data[0].length;
    const ragged = data.findIndex((row) => row.length !== cols);
    if (ragged >= 0) {
      throw new ConfigError(
        `custom.matrix: row ${ragged} has ${data[ragged].length} values, row 0 has ${cols}`,
      );
    }
    return { kind: 'matrix', data, amplitude };
  }
  throw new ConfigError(
    `custom: expected a profile function, a numeric matrix, or an image path/buffer, got ${typeof input}`,
  );
}

// ─── Height maps ────────────────────────────────────────────────

/** Matrix rows run top to bottom; the returned map runs bottom to top. */
export function matrixHeightMap(data: readonly (readonly number[])[]): HeightMap {
  const rows = data.length;
  const cols = rows > 0 ? data[0].length : 0;
  const out = new Float64Array(rows * cols);
  for (let i = 0; i < rows; i++) out.set(data[rows - 1 - i], i * cols);
  return { rows, cols, data: out };
}

/** Decode an image to a grey height map (0–255, rows bottom to top). */
export async function imageHeightMap(image: string | Uint8Array): Promise<HeightMap> {
  let decoded: { data: Buffer; info: sharp.OutputInfo };
  try {
    decoded = await sharp(image).raw().toBuffer({ resolveWithObject: true });
  } catch (err) {
    const what = typeof image === 'string' ? `"${image}"` : `${image.length}-byte buffer`;
    throw new ConfigError(`custom.image: could not decode ${what}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const { data, info } = decoded;
  const { width: cols, height: rows, channels } = info;
  // Grey+alpha and RGBA carry alpha in the last channel.
  const colour = channels === 2 || channels === 4 ? channels - 1 : channels;
  const out = new Float64Array(rows * cols);
  for (let r = 0; r < rows; r++) {
    const target = (rows - 1 - r) * cols;
    for (let c = 0; c < cols; c++) {
      const px = (r * cols + c) * channels;
      let sum = 0;
      for (let k = 0; k < colour; k++) sum += data[px + k];
      out[target + c] = sum / colour;
    }
  }
  return { rows, cols, data: out };
}

/** Resample onto the grid and scale to peak |value| = amplitude. All zeros stays all zeros. */
export function mapField(map: HeightMap, target: MapTarget, amplitude: number): Float64Array {
  const { m, n, topology } = target;
  const field = map.rows === m && map.cols === n
    ? Float64Array.from(map.data)
    : resampleBilinear(map.data, map.rows, map.cols, m, n, topology);
  const peak = maxAbs(field);
  if (peak === 0 || amplitude === 0) return new Float64Array(m * n);
  const scale = amplitude / peak;
  for (let i = 0; i < field.length; i++) field[i] *= scale;
  return field;
}
