/**
 * Option schemas — the configuration surface every caller goes through.
 *
 * Parsed with zod; failures surface as ConfigError naming the shape and
 * the offending key. Defaults live here and nowhere else.
 */

import { z } from 'zod';
import { sineSchema } from './components.js';
import { ConfigError } from './errors.js';

export const SHAPE_NAMES = [
  'sphere', 'plane', 'disk', 'torus',
  'cylinder', 'revolution', 'extrusion', 'worm',
] as const;

export type ShapeName = typeof SHAPE_NAMES[number];

export type TubeKind = Extract<ShapeName, 'cylinder' | 'revolution' | 'extrusion' | 'worm'>;

export function isShapeName(value: unknown): value is ShapeName {
  return typeof value === 'string' && SHAPE_NAMES.some((name) => name === value);
}

export function assertShapeName(value: unknown): ShapeName {
  if (!isShapeName(value)) {
    throw new ConfigError(`Unknown shape "${String(value)}". Expected one of: ${SHAPE_NAMES.join(', ')}`);
  }
  return value;
}

// ─── Shapes ─────────────────────────────────────────────────────

const finite = z.number().finite();
const positive = finite.positive();
const curve = z.array(finite).min(2);

function npoints(rows: number, cols: number) {
  return z.tuple([z.number().int().min(2), z.number().int().min(3)]).default([rows, cols]);
}

export const sphereOptionsSchema = z.object({
  npoints: npoints(128, 256),
  radius: positive.default(1),
}).strict();

export const planeOptionsSchema = z.object({
  npoints: z.tuple([z.number().int().min(2), z.number().int().min(2)]).default([256, 256]),
  width: positive.default(1),
  /** Defaults to width · m / n (square cells). */
  height: positive.optional(),
}).strict();

export const diskOptionsSchema = z.object({
  npoints: npoints(128, 256),
  radius: positive.default(1),
  /** Coordinates the perturbations are evaluated in. */
  coords: z.enum(['polar', 'cartesian']).default('polar'),
}).strict();

export const torusOptionsSchema = z.object({
  npoints: npoints(256, 256),
  majorRadius: positive.default(1),
  minorRadius: positive.default(0.4),
  /** Sine components modulating the major radius along the major angle. */
  majorComponents: z.array(sineSchema).default([]),
}).strict();

const tubeBase = {
  npoints: npoints(256, 256),
  radius: positive.default(1),
  height: positive.default(2 * Math.PI),
  caps: z.boolean().default(false),
};

const profileCurves = {
  /** Radius as a function of height, resampled to m rows. */
  rcurve: curve.optional(),
  /** Radius as a function of angle, resampled (periodically) to n columns. */
  ecurve: curve.optional(),
  curveMode: z.enum(['multiply', 'add']).default('multiply'),
};

export const cylinderOptionsSchema = z.object(tubeBase).strict();

export const revolutionOptionsSchema = z.object({ ...tubeBase, ...profileCurves }).strict();

export const extrusionOptionsSchema = z.object({ ...tubeBase, ...profileCurves }).strict();

export const wormOptionsSchema = z.object({
  ...tubeBase,
  ...profileCurves,
  /** Midline offsets per height sample; each axis resampled to m rows. */
  spine: z.object({
    x: curve.optional(),
    y: curve.optional(),
    z: curve.optional(),
  }).strict().default({}),
}).strict();

export const SHAPE_OPTION_SCHEMAS = {
  sphere: sphereOptionsSchema,
  plane: planeOptionsSchema,
  disk: diskOptionsSchema,
  torus: torusOptionsSchema,
  cylinder: cylinderOptionsSchema,
  revolution: revolutionOptionsSchema,
  extrusion: extrusionOptionsSchema,
  worm: wormOptionsSchema,
} as const;

type Schemas = typeof SHAPE_OPTION_SCHEMAS;

/** What callers pass per shape (everything optional). */
export type ShapeOptions = { [K in ShapeName]: z.input<Schemas[K]> };

/** Fully defaulted options per shape. */
export type ResolvedShapeOptions = { [K in ShapeName]: z.output<Schemas[K]> };

export type SphereOptions = ResolvedShapeOptions['sphere'];
export type PlaneOptions = ResolvedShapeOptions['plane'];
export type DiskOptions = ResolvedShapeOptions['disk'];
export type TorusOptions = ResolvedShapeOptions['torus'];

/** Every tube kind resolves to a subset of the worm's options. */
export interface TubeOptions {
  npoints: [number, number];
  radius: number;
  height: number;
  caps: boolean;
  rcurve?: number[];
  ecurve?: number[];
  curveMode?: 'multiply' | 'add';
  spine?: { x?: number[]; y?: number[]; z?: number[] };
}

// ─── Perturbations ──────────────────────────────────────────────

export const noiseOptionsSchema = z.object({
  seed: z.number().int().optional(),
}).strict();

export const bumpOptionsSchema = z.object({
  minDistance: finite.nonnegative().default(0),
  overlap: z.enum(['sum', 'max']).default('sum'),
  seed: z.number().int().optional(),
}).strict();

export const customMapOptionsSchema = z.object({
  amplitude: finite.default(0.1),
}).strict();

// ─── Mesh / export ──────────────────────────────────────────────

export const materialSchema = z.object({
  file: z.string().min(1),
  name: z.string().min(1),
}).strict();

export const meshOptionsSchema = z.object({
  normals: z.boolean().default(false),
  uvs: z.boolean().default(false),
}).strict();

export type MaterialRef = z.output<typeof materialSchema>;
export type MeshOptions = z.input<typeof meshOptionsSchema>;
