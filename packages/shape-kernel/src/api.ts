/**
 * Makers — one call from a shape name to a perturbed model.
 *
 *   makeSine('sphere', { carriers: [[8, 0.1]] }, { npoints: [64, 128] })
 *   makeNoise(model, { components: [[4, 1, 0, Infinity, 0.05]], seed: 1 })
 *
 * Passing a shape name creates a fresh model; passing a Model appends
 * the new perturbation to it. Either way the model is returned.
 */

import { parseWith } from './components.js';
import type { CustomInput, CustomParams } from './custom.js';
import { Model, type BumpSpec, type NoiseSpec, type SineSpec } from './model.js';
import { exportOBJ } from './obj.js';
import { materialSchema, type MaterialRef, type ShapeName, type ShapeOptions } from './options.js';

function target(shapeOrModel: ShapeName | Model, options: unknown): Model {
  return shapeOrModel instanceof Model ? shapeOrModel : Model.create(shapeOrModel, options);
}

// ─── Makers ─────────────────────────────────────────────────────

export function makeSine<K extends ShapeName>(shape: K, spec?: SineSpec, options?: ShapeOptions[K]): Model;
export function makeSine(model: Model, spec?: SineSpec): Model;
export function makeSine(shape: ShapeName | Model, spec: SineSpec = {}, options?: unknown): Model {
  const model = target(shape, options);
  model.addSine(spec);
  return model;
}

export function makeNoise<K extends ShapeName>(shape: K, spec?: NoiseSpec, options?: ShapeOptions[K]): Model;
export function makeNoise(model: Model, spec?: NoiseSpec): Model;
export function makeNoise(shape: ShapeName | Model, spec: NoiseSpec = {}, options?: unknown): Model {
  const model = target(shape, options);
  model.addNoise(spec);
  return model;
}

export function makeBumpy<K extends ShapeName>(shape: K, spec?: BumpSpec, options?: ShapeOptions[K]): Model;
export function makeBumpy(model: Model, spec?: BumpSpec): Model;
export function makeBumpy(shape: ShapeName | Model, spec: BumpSpec = {}, options?: unknown): Model {
  const model = target(shape, options);
  model.addBumps(spec);
  return model;
}

/** Profile function or matrix. For images, use makeCustomAsync. */
export function makeCustom<K extends ShapeName>(
  shape: K, input: CustomInput, params?: CustomParams, options?: ShapeOptions[K],
): Model;
export function makeCustom(model: Model, input: CustomInput, params?: CustomParams): Model;
export function makeCustom(
  shape: ShapeName | Model, input: CustomInput, params: CustomParams = {}, options?: unknown,
): Model {
  const model = target(shape, options);
  model.addCustom(input, params);
  return model;
}

export async function makeCustomAsync<K extends ShapeName>(
  shape: K | Model, input: CustomInput, params: CustomParams = {}, options?: ShapeOptions[K],
): Promise<Model> {
  const model = target(shape, options);
  await model.addCustomAsync(input, params);
  return model;
}

// ─── Export ─────────────────────────────────────────────────────

export interface ModelOBJOptions {
  normals?: boolean;
  /** Written as mtllib/usemtl; also turns on texture coordinates. */
  material?: MaterialRef;
  comments?: readonly string[];
}

/** Finalize the model's mesh and serialize it, with a header describing the model. */
export function modelToOBJ(model: Model, opts: ModelOBJOptions = {}): string {
  const material = opts.material ? parseWith(materialSchema, opts.material, 'material') : undefined;
  const mesh = model.mesh({ normals: opts.normals ?? false, uvs: material !== undefined });
  const header = [
    `${model.kind} ${model.m}x${model.n}, ${mesh.vertexCount} vertices, ${mesh.faceCount} faces`,
    ...model.perturbations.map((p, i) => `[${i}] ${p.enabled ? 'on ' : 'off'} ${p.label}`),
    ...(opts.comments ?? []),
  ];
  return exportOBJ(mesh, { material, comments: header });
}
