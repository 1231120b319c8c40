/**
 * Model — a shape grid plus an ordered list of perturbation fields.
 *
 * Every perturbation is a full field on the grid with its own enabled
 * flag. The derived field is always recomputed from the base and the
 * enabled fields, so toggling is exactly additive:
 *
 *   derived = base + Σ field_i   (enabled i)
 *
 * Perturbations are append-only; the mesh is cached per enabled mask
 * and mesh options.
 */

import { composeBumps, type BumpProfile } from './bumps.js';
import {
  gaussianBumpComponents, noiseComponents, parseWith, sineComponents,
  type GaussianBumpInput, type NoiseInput, type SineComponent, type SineInput,
} from './components.js';
import {
  customSourceFrom, imageHeightMap, mapField, matrixHeightMap,
  type CustomInput, type CustomParams, type CustomSource,
} from './custom.js';
import { AmplitudeError, ConfigError } from './errors.js';
import type { GridCoords } from './grid.js';
import { assembleMesh, faceCount, type MeshBuffer } from './mesh.js';
import { composeNoise } from './noise.js';
import {
  bumpOptionsSchema, customMapOptionsSchema, meshOptionsSchema, noiseOptionsSchema,
  type MeshOptions, type ShapeName,
} from './options.js';
import { createShape, type ShapeGrid } from './shapes/index.js';
import { composeSine } from './sine.js';
import type { BoundingBox, Vec3 } from './vec3.js';

// ─── Types ──────────────────────────────────────────────────────

export type PerturbationKind = 'sine' | 'noise' | 'bumps' | 'custom';

export interface Perturbation {
  kind: PerturbationKind;
  label: string;
  field: Float64Array;
  enabled: boolean;
  /** Bump centers per component, in bump-domain coordinates. */
  centers?: number[][][];
}

export interface SineSpec {
  carriers?: readonly SineInput[];
  modulators?: readonly SineInput[];
}

export interface NoiseSpec {
  components?: readonly NoiseInput[];
  modulators?: readonly SineInput[];
  seed?: number;
}

export interface BumpSpec {
  components?: readonly GaussianBumpInput[];
  minDistance?: number;
  overlap?: 'sum' | 'max';
  seed?: number;
}

export interface ModelReadback {
  shape: ShapeName;
  npoints: [number, number];
  params: Record<string, unknown>;
  vertex_count: number;
  face_count: number;
  perturbations: { index: number; kind: PerturbationKind; label: string; enabled: boolean }[];
  bounds: BoundingBox;
  size: Vec3;
  center: Vec3;
}

// ─── Defaults ───────────────────────────────────────────────────

const DEFAULT_CARRIERS: readonly SineInput[] = [[8, 0.1, 0, 0, 0]];
const DEFAULT_NOISE: readonly NoiseInput[] = [[8, 1, 0, 30, 0.1, 0]];
const DEFAULT_BUMPS: readonly GaussianBumpInput[] = [[20, 0.1, 0.1]];

// ─── Model ──────────────────────────────────────────────────────

export class Model {
  readonly perturbations: Perturbation[] = [];
  private cached: { key: string; mesh: MeshBuffer } | null = null;

  constructor(readonly shape: ShapeGrid) {}

  /** Build the grid for `kind` from (validated) shape options. */
  static create(kind: string, options?: unknown): Model {
    return new Model(createShape(kind, options));
  }

  get kind(): ShapeName {
    return this.shape.kind;
  }

  get m(): number {
    return this.shape.m;
  }

  get n(): number {
    return this.shape.n;
  }

  get base(): Float64Array {
    return this.shape.base;
  }

  get coords(): GridCoords {
    return this.shape.coords;
  }

  // ─── Perturbation list ─────────────────────────────────────

  /** Append a field; returns its index. */
  add(kind: PerturbationKind, label: string, field: Float64Array, centers?: number[][][]): number {
    if (field.length !== this.m * this.n) {
      throw new ConfigError(
        `${this.kind}: ${kind} field has ${field.length} samples, grid has ${this.m} x ${this.n}`,
      );
    }
    this.perturbations.push({ kind, label, field, enabled: true, ...(centers ? { centers } : {}) });
    return this.perturbations.length - 1;
  }

  setEnabled(index: number, enabled: boolean): void {
    const p = this.perturbations[index];
    if (!Number.isInteger(index) || p === undefined) {
      throw new ConfigError(
        `${this.kind}: no perturbation ${index}; the model has ${this.perturbations.length}`,
      );
    }
    p.enabled = enabled;
  }

  setEnabledMask(mask: readonly boolean[]): void {
    if (mask.length !== this.perturbations.length) {
      throw new ConfigError(
        `${this.kind}: enable mask has ${mask.length} entries, model has ${this.perturbations.length} perturbations`,
      );
    }
    mask.forEach((enabled, i) => { this.perturbations[i].enabled = enabled; });
  }

  get enabledMask(): boolean[] {
    return this.perturbations.map((p) => p.enabled);
  }

  /** base + Σ enabled fields, fresh on every call. */
  derived(): Float64Array {
    const out = Float64Array.from(this.base);
    for (const p of this.perturbations) {
      if (!p.enabled) continue;
      for (let i = 0; i < out.length; i++) out[i] += p.field[i];
    }
    return out;
  }

  mesh(options: MeshOptions = {}): MeshBuffer {
    const opts = parseWith(meshOptionsSchema, options, `${this.kind} mesh`);
    const key = JSON.stringify([this.perturbations.length, this.enabledMask, opts.normals, opts.uvs]);
    if (this.cached?.key === key) return this.cached.mesh;
    const mesh = assembleMesh(this.shape, this.derived(), opts);
    this.cached = { key, mesh };
    return mesh;
  }

  // ─── Engines ───────────────────────────────────────────────

  addSine(spec: SineSpec = {}): number {
    const carriers = sineComponents(spec.carriers ?? DEFAULT_CARRIERS, 'carrier');
    const modulators = sineComponents(spec.modulators ?? [], 'modulator');
    this.checkAmplitudes(carriers, modulators, 'carrier');
    const { su, sv } = this.coords;
    const field = composeSine(carriers, modulators, su, sv);
    return this.add('sine', `sine(${carriers.length} carriers, ${modulators.length} modulators)`, field);
  }

  addNoise(spec: NoiseSpec = {}): number {
    const components = noiseComponents(spec.components ?? DEFAULT_NOISE);
    const modulators = sineComponents(spec.modulators ?? [], 'modulator');
    const { seed } = parseWith(noiseOptionsSchema, { seed: spec.seed }, `${this.kind} noise`);
    this.checkAmplitudes(components, modulators, 'noise');
    const field = composeNoise(this.shape, components, { modulators, seed });
    return this.add('noise', `noise(${components.length} components, ${modulators.length} modulators)`, field);
  }

  addBumps(spec: BumpSpec = {}): number {
    const components = gaussianBumpComponents(spec.components ?? DEFAULT_BUMPS);
    const opts = parseWith(
      bumpOptionsSchema,
      { minDistance: spec.minDistance, overlap: spec.overlap, seed: spec.seed },
      `${this.kind} bumps`,
    );
    const { field, centers } = composeBumps(this.shape.bumpDomain, this.m * this.n, components, opts);
    const count = centers.reduce((sum, c) => sum + c.length, 0);
    return this.add('bumps', `bumps(${count} gaussian, ${opts.overlap})`, field, centers);
  }

  /** Function and matrix sources. Images decode asynchronously: use addCustomAsync. */
  addCustom(input: CustomInput, params: CustomParams = {}): number {
    const source = customSourceFrom(input, params);
    if (source.kind === 'image') {
      throw new ConfigError(`${this.kind}: images decode asynchronously; use addCustomAsync`);
    }
    return this.addCustomSource(source, params);
  }

  async addCustomAsync(input: CustomInput, params: CustomParams = {}): Promise<number> {
    const source = customSourceFrom(input, params);
    if (source.kind !== 'image') return this.addCustomSource(source, params);
    const map = await imageHeightMap(source.image);
    const label = typeof source.image === 'string' ? `custom(image ${source.image})` : 'custom(image buffer)';
    return this.add('custom', label, mapField(map, this.shape, source.amplitude));
  }

  private addCustomSource(source: Exclude<CustomSource, { kind: 'image' }>, params: CustomParams): number {
    if (source.kind === 'matrix') {
      const { amplitude } = parseWith(customMapOptionsSchema, { amplitude: source.amplitude }, `${this.kind} custom`);
      const map = matrixHeightMap(source.data);
      return this.add('custom', `custom(matrix ${map.rows}x${map.cols})`, mapField(map, this.shape, amplitude));
    }
    return this.addProfileBumps(source.profile, source.components, params);
  }

  private addProfileBumps(
    profile: BumpProfile,
    components: Extract<CustomSource, { kind: 'function' }>['components'],
    params: CustomParams,
  ): number {
    const opts = parseWith(
      bumpOptionsSchema,
      { minDistance: params.minDistance, overlap: params.overlap, seed: params.seed },
      `${this.kind} custom`,
    );
    const { field, centers } = composeBumps(this.shape.bumpDomain, this.m * this.n, components, { ...opts, profile });
    const count = centers.reduce((sum, c) => sum + c.length, 0);
    return this.add('custom', `custom(${count} profile bumps, ${opts.overlap})`, field, centers);
  }

  /**
   * Radial shapes cannot take a modulation as deep as their radius. Each
   * component is checked alone, then the worst case of the composition:
   *
   *   bound = (Σ_group0 |a| + Σ_g Σ_g |a| · Σ_mod(g) |a|) · Σ_mod(0) |a|
   *
   * where a modulator sum only applies if that group has modulators.
   */
  private checkAmplitudes(
    components: readonly { amplitude: number; group: number }[],
    modulators: readonly SineComponent[],
    role: 'carrier' | 'noise',
  ): void {
    const limit = this.shape.amplitudeLimit();
    if (limit === null) return;
    components.forEach(({ amplitude: a }, i) => {
      if (Math.abs(a) >= limit) {
        throw new AmplitudeError(
          `${this.kind}: ${role}[${i}] amplitude ${a} must be smaller than the radius ${limit}`,
        );
      }
    });

    const modulation = (g: number): number | null => {
      const mods = modulators.filter((c) => c.group === g);
      return mods.length > 0 ? mods.reduce((sum, c) => sum + Math.abs(c.amplitude), 0) : null;
    };
    const groups = new Map<number, number>();
    for (const c of components) groups.set(c.group, (groups.get(c.group) ?? 0) + Math.abs(c.amplitude));
    let bound = 0;
    for (const [g, sum] of groups) bound += sum * ((g !== 0 ? modulation(g) : null) ?? 1);
    bound *= modulation(0) ?? 1;
    if (bound >= limit) {
      throw new AmplitudeError(
        `${this.kind}: ${role} amplitudes can reach ${bound} after grouping and modulation, ` +
        `which must be smaller than the radius ${limit}`,
      );
    }
  }

  // ─── Readback ──────────────────────────────────────────────

  readback(): ModelReadback {
    const { bounds } = this.mesh();
    const { min, max } = bounds;
    return {
      shape: this.kind,
      npoints: [this.m, this.n],
      params: this.shape.describe(),
      vertex_count: this.m * this.n + (this.shape.caps ? 2 : 0),
      face_count: faceCount(this.shape),
      perturbations: this.perturbations.map((p, index) => ({
        index, kind: p.kind, label: p.label, enabled: p.enabled,
      })),
      bounds,
      size: [max[0] - min[0], max[1] - min[1], max[2] - min[2]],
      center: [(min[0] + max[0]) / 2, (min[1] + max[1]) / 2, (min[2] + max[2]) / 2],
    };
  }
}
