/**
 * Tool handlers — one function per MCP tool, plus its parameter shape.
 *
 * tools.ts only wires these into the server; keeping them here lets the
 * tests call them directly with parsed parameters.
 */

import { z } from 'zod';
import {
  Model, modelToOBJ, runBatch, SHAPE_NAMES,
  type BatchFailure, type NoiseInput,
} from '@stimshape/shape-kernel';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as registry from './registry.js';
import type { ModelResult } from './registry.js';

type Params<S extends z.ZodRawShape> = z.infer<z.ZodObject<S>>;

/** Where exported files land unless a caller passes its own directory. */
export function defaultExportDir(): string {
  return path.join(process.env.TMPDIR ?? '/tmp', 'stimshape');
}

/** Drop undefined entries so strict option schemas only see keys that were given. */
function defined(entries: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(entries).filter(([, v]) => v !== undefined));
}

const modelId = z.string().describe('ID of the model');
const rows = z.array(z.array(z.number()));
const name = z.string().optional().describe('Optional name for the model (letters, digits, hyphens, underscores only)');

// ─── Models ─────────────────────────────────────────────────────

export const createModelParams = {
  shape: z.enum(SHAPE_NAMES).describe('Base shape'),
  npoints: z.tuple([z.number().int(), z.number().int()]).optional()
    .describe('Grid size [rows, cols]. Defaults depend on the shape.'),
  radius: z.number().optional().describe('Radius (sphere, disk, tubes)'),
  width: z.number().optional().describe('Plane width'),
  height: z.number().optional().describe('Plane height, or tube height'),
  major_radius: z.number().optional().describe('Torus major radius'),
  minor_radius: z.number().optional().describe('Torus minor radius'),
  major_components: rows.optional()
    .describe('Torus: sine rows [freq, amp, phase, orientation, group] modulating the major radius'),
  coords: z.enum(['polar', 'cartesian']).optional().describe('Disk: coordinates perturbations are evaluated in'),
  caps: z.boolean().optional().describe('Tubes: close both ends with fans'),
  rcurve: z.array(z.number()).optional().describe('Revolution/worm: radius along the height'),
  ecurve: z.array(z.number()).optional().describe('Extrusion/worm: radius around the circumference'),
  curve_mode: z.enum(['multiply', 'add']).optional().describe('How rcurve and ecurve combine when both are given'),
  spine: z.object({
    x: z.array(z.number()).optional(),
    y: z.array(z.number()).optional(),
    z: z.array(z.number()).optional(),
  }).optional().describe('Worm: midline offsets along the height'),
  name,
};

export function createModel(p: Params<typeof createModelParams>): ModelResult {
  const options = defined({
    npoints: p.npoints,
    radius: p.radius,
    width: p.width,
    height: p.height,
    majorRadius: p.major_radius,
    minorRadius: p.minor_radius,
    majorComponents: p.major_components,
    coords: p.coords,
    caps: p.caps,
    rcurve: p.rcurve,
    ecurve: p.ecurve,
    curveMode: p.curve_mode,
    spine: p.spine,
  });
  return registry.create(Model.create(p.shape, options), p.name);
}

export const modelParams = { model: modelId };

export function getModel(p: Params<typeof modelParams>): ModelResult {
  return registry.describe(p.model);
}

export function listModels(): { models: ModelResult[] } {
  return { models: registry.list() };
}

export function deleteModel(p: Params<typeof modelParams>): { deleted: string; remaining: string[] } {
  registry.remove(p.model);
  return { deleted: p.model, remaining: registry.list().map((m) => m.model_id) };
}

// ─── Perturbations ──────────────────────────────────────────────

export const addSineParams = {
  model: modelId,
  carriers: rows.optional()
    .describe('Rows [freq, amp, phase, orientation_deg, group]; trailing columns default'),
  modulators: rows.optional()
    .describe('Rows [freq, amp, phase, orientation_deg, group]; multiply the carrier group with the same group number'),
};

export function addSine(p: Params<typeof addSineParams>): ModelResult {
  const { model } = registry.get(p.model);
  model.addSine({ carriers: p.carriers, modulators: p.modulators });
  return registry.describe(p.model);
}

export const addNoiseParams = {
  model: modelId,
  components: z.array(z.array(z.number().nullable())).optional()
    .describe('Rows [freq, freq_bw_oct, orientation_deg, orientation_bw_deg, amp, group]; orientation_bw null = isotropic'),
  modulators: rows.optional().describe('Sine modulator rows'),
  seed: z.number().int().optional().describe('Seed for reproducible noise'),
};

/** JSON has no Infinity: a null orientation bandwidth means isotropic. */
function noiseRows(input: (number | null)[][]): NoiseInput[] {
  return input.map((row) => row.map((v) => v ?? Infinity));
}

export function addNoise(p: Params<typeof addNoiseParams>): ModelResult {
  const { model } = registry.get(p.model);
  model.addNoise({
    components: p.components ? noiseRows(p.components) : undefined,
    modulators: p.modulators,
    seed: p.seed,
  });
  return registry.describe(p.model);
}

export const addBumpsParams = {
  model: modelId,
  bumps: rows.optional().describe('Rows [count, sigma, amplitude]'),
  min_distance: z.number().optional().describe('Minimum distance between bump centers (0 = unconstrained)'),
  overlap: z.enum(['sum', 'max']).optional().describe('How overlapping bumps combine'),
  seed: z.number().int().optional().describe('Seed for reproducible placement'),
};

export function addBumps(p: Params<typeof addBumpsParams>): ModelResult {
  const { model } = registry.get(p.model);
  model.addBumps({ components: p.bumps, minDistance: p.min_distance, overlap: p.overlap, seed: p.seed });
  return registry.describe(p.model);
}

export const addCustomMatrixParams = {
  model: modelId,
  matrix: rows.describe('Height map rows, first row at the top; resampled onto the grid'),
  amplitude: z.number().optional().describe('Peak |value| after scaling (default 0.1)'),
};

export function addCustomMatrix(p: Params<typeof addCustomMatrixParams>): ModelResult {
  const { model } = registry.get(p.model);
  model.addCustom(p.matrix, { amplitude: p.amplitude });
  return registry.describe(p.model);
}

export const addCustomImageParams = {
  model: modelId,
  image_path: z.string().describe('Path of an image file; pixel brightness becomes height'),
  amplitude: z.number().optional().describe('Peak |value| after scaling (default 0.1)'),
};

export async function addCustomImage(p: Params<typeof addCustomImageParams>): Promise<ModelResult> {
  const { model } = registry.get(p.model);
  await model.addCustomAsync(p.image_path, { amplitude: p.amplitude });
  return registry.describe(p.model);
}

export const setPerturbationEnabledParams = {
  model: modelId,
  index: z.number().int().describe('Perturbation index from the readback'),
  enabled: z.boolean(),
};

export function setPerturbationEnabled(p: Params<typeof setPerturbationEnabledParams>): ModelResult {
  const { model } = registry.get(p.model);
  model.setEnabled(p.index, p.enabled);
  return registry.describe(p.model);
}

// ─── Export ─────────────────────────────────────────────────────

export interface ExportResult {
  model_id: string;
  type: 'obj_export';
  file_path: string;
  file_size_bytes: number;
  vertex_count: number;
  face_count: number;
}

export const exportObjParams = {
  model: modelId,
  normals: z.boolean().optional().describe('Write per-vertex normals'),
  material: z.object({ file: z.string(), name: z.string() }).optional()
    .describe('Material library and name; also writes texture coordinates'),
  filename: z.string().regex(/^[a-zA-Z0-9_-]+$/).optional()
    .describe('File name without extension (default: the model ID)'),
};

function writeOBJ(
  id: string,
  opts: { normals?: boolean; material?: { file: string; name: string }; filename?: string },
  exportDir: string,
): ExportResult {
  const { model } = registry.get(id);
  const text = modelToOBJ(model, { normals: opts.normals, material: opts.material });
  const mesh = model.mesh({ normals: opts.normals ?? false, uvs: opts.material !== undefined });

  fs.mkdirSync(exportDir, { recursive: true });
  const safeId = id.replace(/[^a-zA-Z0-9_-]/g, '_');
  const filePath = path.join(exportDir, `${opts.filename ?? safeId}.obj`);
  fs.writeFileSync(filePath, text);

  return {
    model_id: id,
    type: 'obj_export',
    file_path: filePath,
    file_size_bytes: Buffer.byteLength(text),
    vertex_count: mesh.vertexCount,
    face_count: mesh.faceCount,
  };
}

export function exportObj(p: Params<typeof exportObjParams>, exportDir = defaultExportDir()): ExportResult {
  return writeOBJ(p.model, p, exportDir);
}

export const batchExportParams = {
  models: z.array(z.string()).min(1).describe('IDs of the models to export, one OBJ each'),
  normals: z.boolean().optional(),
  continue_on_error: z.boolean().optional()
    .describe('Skip models that fail instead of stopping the batch'),
};

export interface BatchExportResult {
  exported: ExportResult[];
  failed: { model_id: string; error: string }[];
}

export async function batchExport(
  p: Params<typeof batchExportParams>,
  exportDir = defaultExportDir(),
): Promise<BatchExportResult> {
  const { results, failures } = await runBatch(
    p.models,
    (id) => writeOBJ(id, { normals: p.normals }, exportDir),
    { continueOnError: p.continue_on_error ?? false },
  );
  for (const failure of failures) logFailure(failure);
  return {
    exported: results.filter((r): r is ExportResult => r !== undefined),
    failed: failures.map((f) => ({ model_id: f.item, error: f.error.message })),
  };
}

function logFailure(failure: BatchFailure<string>): void {
  console.error(`[stimshape] batch_export: skipped ${failure.item}: ${failure.error.message}`);
}
