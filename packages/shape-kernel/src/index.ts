// Public API
export { Model } from './model.js';
export type {
  Perturbation, PerturbationKind, SineSpec, NoiseSpec, BumpSpec, ModelReadback,
} from './model.js';

// Makers
export { makeSine, makeNoise, makeBumpy, makeCustom, makeCustomAsync, modelToOBJ } from './api.js';
export type { ModelOBJOptions } from './api.js';

// Shapes
export { createShape, ShapeGrid, SphereGrid, PlaneGrid, DiskGrid, TorusGrid, TubeGrid } from './shapes/index.js';
export type { UvScheme } from './shapes/index.js';
export { SHAPE_NAMES, isShapeName, assertShapeName } from './options.js';
export type {
  ShapeName, TubeKind, ShapeOptions, ResolvedShapeOptions,
  SphereOptions, PlaneOptions, DiskOptions, TorusOptions, TubeOptions,
  MaterialRef, MeshOptions,
} from './options.js';

// Components
export {
  sineComponents, noiseComponents, gaussianBumpComponents, customBumpComponents,
  GAUSSIAN_CUTOFF_SIGMAS,
} from './components.js';
export type {
  SineComponent, NoiseComponent, BumpComponent,
  SineInput, NoiseInput, GaussianBumpInput, CustomBumpInput, SineRole,
} from './components.js';

// Engines
export { composeSine, sumSines } from './sine.js';
export { composeNoise, bandPass, filteredNoise } from './noise.js';
export type { NoiseGrid, NoiseOptions, NoiseLattice } from './noise.js';
export { composeBumps, placeCenters, gaussianProfile, CANDIDATE_OVERSAMPLING } from './bumps.js';
export type { BumpProfile, BumpDomain, BumpOptions, OverlapPolicy } from './bumps.js';
export { customSourceFrom, matrixHeightMap, imageHeightMap, mapField } from './custom.js';
export type { CustomSource, CustomInput, CustomParams, HeightMap } from './custom.js';

// Mesh export
export { assembleMesh, gridFaces, faceCount, vertexNormals } from './mesh.js';
export type { MeshBuffer, AssembleOptions } from './mesh.js';
export { exportOBJ, parseOBJ } from './obj.js';
export type { OBJExportOptions, ParsedOBJ } from './obj.js';
export { toBufferGeometry } from './three.js';

// Batch runs
export { runBatch } from './batch.js';
export type { BatchOptions, BatchFailure, BatchResult } from './batch.js';

// Errors
export { ShapeError, ConfigError, AmplitudeError, PlacementError } from './errors.js';

// Utilities
export { createRandom } from './random.js';
export type { RandomSource } from './random.js';
export type { GridCoords, GridTopology } from './grid.js';
export type { Vec3, BoundingBox } from './vec3.js';
