/**
 * Perturbation components — explicit structs with independently
 * defaulted fields.
 *
 * Callers may pass either a named object or a short numeric row. Rows
 * follow the column order documented on each type; missing trailing
 * columns take the defaults below.
 *
 *   sine carrier   [frequency, amplitude=0.1, phase=0, orientation=0, group=0]
 *   sine modulator [frequency, amplitude=1,   phase=0, orientation=0, group=0]
 *   noise          [frequency, frequencyBandwidth=1, orientation=0,
 *                   orientationBandwidth=30, amplitude=0.1, group=0]
 *   gaussian bump  [count, sigma=0.1, amplitude=0.1]
 *   custom bump    [count, cutoff, ...profile params]
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

// ─── Types ──────────────────────────────────────────────────────

export interface SineComponent {
  /** Cycles per signal-coordinate unit (per full turn on angular axes). */
  frequency: number;
  amplitude: number;
  /** Degrees. 0 is sine phase. */
  phase: number;
  /** Degrees. 0 modulates along the fast (column) axis, 90 along the slow axis. */
  orientation: number;
  /** 0 = unmodulated; any other value pairs carriers with same-group modulators. */
  group: number;
}

export interface NoiseComponent {
  /** Peak frequency of the band, cycles per signal-coordinate unit. */
  frequency: number;
  /** Full width at half maximum, in octaves. */
  frequencyBandwidth: number;
  /** Degrees. */
  orientation: number;
  /** Full width at half maximum, in degrees. Infinity = isotropic. */
  orientationBandwidth: number;
  amplitude: number;
  group: number;
}

export interface BumpComponent {
  count: number;
  /** Profile is evaluated only where distance < cutoff. */
  cutoff: number;
  /** Extra parameters handed to the profile function. */
  params: number[];
  /** Explicit centers in the shape's bump-domain coordinates; skips random placement. */
  centers?: number[][];
}

export type SineInput = readonly number[] | {
  frequency: number;
  amplitude?: number;
  phase?: number;
  orientation?: number;
  group?: number;
};

export type NoiseInput = readonly number[] | {
  frequency: number;
  frequencyBandwidth?: number;
  orientation?: number;
  orientationBandwidth?: number;
  amplitude?: number;
  group?: number;
};

export type GaussianBumpInput = readonly number[] | {
  count: number;
  sigma?: number;
  amplitude?: number;
  centers?: number[][];
};

export type CustomBumpInput = readonly number[] | {
  count: number;
  cutoff: number;
  params?: number[];
  centers?: number[][];
};

export type SineRole = 'carrier' | 'modulator';

// ─── Defaults ───────────────────────────────────────────────────

const SINE_DEFAULTS: Record<SineRole, readonly number[]> = {
  carrier: [0.1, 0, 0, 0],
  modulator: [1, 0, 0, 0],
};

const NOISE_DEFAULTS: readonly number[] = [1, 0, 30, 0.1, 0];

const GAUSSIAN_DEFAULTS: readonly number[] = [0.1, 0.1];

/** Bumps are cut off at this many sigmas. */
export const GAUSSIAN_CUTOFF_SIGMAS = 3.5;

// ─── Schemas ────────────────────────────────────────────────────

const finite = z.number().finite();
const group = z.number().int().nonnegative();
const centers = z.array(z.array(finite).min(1)).optional();

function rowSchema(min: number, max: number) {
  return z.array(finite).min(min).max(max);
}

export const sineSchema = z.union([
  rowSchema(1, 5),
  z.object({
    frequency: finite,
    amplitude: finite.optional(),
    phase: finite.optional(),
    orientation: finite.optional(),
    group: group.optional(),
  }).strict(),
]);

// Orientation bandwidth may be Infinity (isotropic), so noise rows allow it.
const noiseSchema = z.union([
  z.array(z.number()).min(1).max(6),
  z.object({
    frequency: finite.nonnegative(),
    frequencyBandwidth: finite.positive().optional(),
    orientation: finite.optional(),
    orientationBandwidth: z.number().positive().optional(),
    amplitude: finite.optional(),
    group: group.optional(),
  }).strict(),
]);

const gaussianSchema = z.union([
  rowSchema(1, 3),
  z.object({
    count: z.number().int().nonnegative(),
    sigma: finite.positive().optional(),
    amplitude: finite.optional(),
    centers,
  }).strict(),
]);

const customSchema = z.union([
  z.array(finite).min(2),
  z.object({
    count: z.number().int().nonnegative(),
    cutoff: finite.positive(),
    params: z.array(finite).optional(),
    centers,
  }).strict(),
]);

/** Parse with a zod schema, turning failures into ConfigError with a located message. */
export function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown, where: string): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue.path.length > 0 ? `.${issue.path.join('.')}` : '';
    throw new ConfigError(`${where}${path}: ${issue.message}`);
  }
  return result.data;
}

/** Append defaults for the columns a short row leaves out. */
function fillRow(row: readonly number[], defaults: readonly number[]): number[] {
  const filled = [...row];
  for (let c = row.length; c <= defaults.length; c++) filled.push(defaults[c - 1]);
  return filled;
}

function checkGroup(value: number, where: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${where}: group must be a non-negative integer, got ${value}`);
  }
  return value;
}

function checkCount(value: number, where: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${where}: bump count must be a non-negative integer, got ${value}`);
  }
  return value;
}

// ─── Converters ─────────────────────────────────────────────────

export function sineComponents(inputs: readonly SineInput[], role: SineRole): SineComponent[] {
  const defaults = SINE_DEFAULTS[role];
  return inputs.map((input, i) => {
    const where = `${role}[${i}]`;
    const parsed = parseWith(sineSchema, input, where);
    if (Array.isArray(parsed)) {
      const [frequency, amplitude, phase, orientation, g] = fillRow(parsed, defaults);
      return { frequency, amplitude, phase, orientation, group: checkGroup(g, where) };
    }
    return {
      frequency: parsed.frequency,
      amplitude: parsed.amplitude ?? defaults[0],
      phase: parsed.phase ?? defaults[1],
      orientation: parsed.orientation ?? defaults[2],
      group: parsed.group ?? defaults[3],
    };
  });
}

export function noiseComponents(inputs: readonly NoiseInput[]): NoiseComponent[] {
  return inputs.map((input, i) => {
    const where = `noise[${i}]`;
    const parsed = parseWith(noiseSchema, input, where);
    if (Array.isArray(parsed)) {
      const [frequency, frequencyBandwidth, orientation, orientationBandwidth, amplitude, g] =
        fillRow(parsed, NOISE_DEFAULTS);
      const finiteCols = [frequency, frequencyBandwidth, orientation, amplitude, g];
      if (!finiteCols.every(Number.isFinite) || frequency < 0 || frequencyBandwidth <= 0 || orientationBandwidth <= 0) {
        throw new ConfigError(
          `${where}: frequency must be >= 0 and bandwidths positive, got [${parsed.join(', ')}]`,
        );
      }
      return {
        frequency, frequencyBandwidth, orientation, orientationBandwidth, amplitude,
        group: checkGroup(g, where),
      };
    }
    return {
      frequency: parsed.frequency,
      frequencyBandwidth: parsed.frequencyBandwidth ?? NOISE_DEFAULTS[0],
      orientation: parsed.orientation ?? NOISE_DEFAULTS[1],
      orientationBandwidth: parsed.orientationBandwidth ?? NOISE_DEFAULTS[2],
      amplitude: parsed.amplitude ?? NOISE_DEFAULTS[3],
      group: parsed.group ?? NOISE_DEFAULTS[4],
    };
  });
}

/** Gaussian bumps: params become [amplitude, sigma], cutoff 3.5 sigma. */
export function gaussianBumpComponents(inputs: readonly GaussianBumpInput[]): BumpComponent[] {
  return inputs.map((input, i) => {
    const where = `bump[${i}]`;
    const parsed = parseWith(gaussianSchema, input, where);
    let count: number, sigma: number, amplitude: number;
    let explicit: number[][] | undefined;
    if (Array.isArray(parsed)) {
      [count, sigma, amplitude] = fillRow(parsed, GAUSSIAN_DEFAULTS);
      checkCount(count, where);
    } else {
      count = parsed.count;
      sigma = parsed.sigma ?? GAUSSIAN_DEFAULTS[0];
      amplitude = parsed.amplitude ?? GAUSSIAN_DEFAULTS[1];
      explicit = parsed.centers;
    }
    if (!(sigma > 0)) throw new ConfigError(`${where}: sigma must be positive, got ${sigma}`);
    return { count, cutoff: GAUSSIAN_CUTOFF_SIGMAS * sigma, params: [amplitude, sigma], centers: explicit };
  });
}

export function customBumpComponents(inputs: readonly CustomBumpInput[]): BumpComponent[] {
  return inputs.map((input, i) => {
    const where = `bump[${i}]`;
    const parsed = parseWith(customSchema, input, where);
    if (Array.isArray(parsed)) {
      const [count, cutoff, ...params] = parsed;
      checkCount(count, where);
      if (!(cutoff > 0)) throw new ConfigError(`${where}: cutoff must be positive, got ${cutoff}`);
      return { count, cutoff, params };
    }
    return {
      count: parsed.count,
      cutoff: parsed.cutoff,
      params: parsed.params ?? [],
      centers: parsed.centers,
    };
  });
}
