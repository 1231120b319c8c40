/**
 * Mesh Assembler — grid topology to triangles, normals and UVs.
 *
 * Vertices are written in grid order (sample (i, j) at i·n + j), then
 * the two tube cap centers. Each grid quad
 *
 *   d ── c        a = (i, j)      b = (i, j+1)
 *   │  ╱ │        c = (i+1, j+1)  d = (i+1, j)
 *   a ── b
 *
 * becomes triangles (a, b, c) and (a, c, d). Periodic axes wrap by index
 * arithmetic, so the seam shares vertices. Face indices are 0-based
 * here; the OBJ writer adds one.
 */

import type { ShapeGrid } from './shapes/base.js';
import { boundsOf, type BoundingBox } from './vec3.js';

export interface MeshBuffer {
  /** xyz triples. */
  vertices: Float64Array;
  vertexCount: number;
  /** Vertex index triples, 0-based. */
  faces: Uint32Array;
  faceCount: number;
  /** uv pairs. Present when UVs were requested. */
  uvs?: Float64Array;
  /** UV index triples, parallel to `faces`. */
  uvFaces?: Uint32Array;
  /** Unit xyz per vertex. Present when normals were requested. */
  normals?: Float64Array;
  /** Zero-area triangles skipped during normal accumulation (0 unless normals were computed). */
  degenerateFaces: number;
  bounds: BoundingBox;
}

export interface AssembleOptions {
  normals?: boolean;
  uvs?: boolean;
}

/** Triangles whose doubled area falls below this fraction of the squared bounds diagonal are degenerate. */
const DEGENERATE_AREA = 1e-12;

// ─── Topology ───────────────────────────────────────────────────

/** Number of triangles the shape's grid produces, caps included. */
export function faceCount(shape: ShapeGrid): number {
  const { m, n } = shape;
  const rows = shape.topology.periodicRows ? m : m - 1;
  const cols = shape.topology.periodicCols ? n : n - 1;
  return 2 * rows * cols + (shape.caps ? 2 * n : 0);
}

/**
 * Quad triangulation over a rows × cols index lattice with `stride`
 * entries per row. `wrapRows`/`wrapCols` give the lattice size on each
 * axis for modulo wrap, or 0 to index straight through.
 */
function quads(
  out: Uint32Array,
  offset: number,
  rows: number,
  cols: number,
  stride: number,
  wrap: { rows: number; cols: number },
  flip: boolean,
): number {
  let f = offset;
  for (let i = 0; i < rows; i++) {
    const i1 = wrap.rows > 0 ? (i + 1) % wrap.rows : i + 1;
    for (let j = 0; j < cols; j++) {
      const j1 = wrap.cols > 0 ? (j + 1) % wrap.cols : j + 1;
      const a = i * stride + j;
      const b = i * stride + j1;
      const c = i1 * stride + j1;
      const d = i1 * stride + j;
      if (flip) {
        out.set([a, c, b, a, d, c], f * 3);
      } else {
        out.set([a, b, c, a, c, d], f * 3);
      }
      f += 2;
    }
  }
  return f;
}

/** Bottom and top triangle fans around the two center vertices. */
function capFans(
  out: Uint32Array,
  offset: number,
  n: number,
  bottomRow: number,
  topRow: number,
  bottomCenter: number,
  topCenter: number,
  ringSize: number,
): void {
  let f = offset;
  for (let j = 0; j < n; j++) {
    const j1 = (j + 1) % ringSize;
    out.set([bottomCenter, bottomRow + j1, bottomRow + j], f * 3);
    out.set([topCenter, topRow + j, topRow + j1], (f + 1) * 3);
    f += 2;
  }
}

export function gridFaces(shape: ShapeGrid): Uint32Array {
  const { m, n } = shape;
  const { periodicRows, periodicCols } = shape.topology;
  const out = new Uint32Array(faceCount(shape) * 3);
  const f = quads(
    out, 0,
    periodicRows ? m : m - 1,
    periodicCols ? n : n - 1,
    n,
    { rows: periodicRows ? m : 0, cols: periodicCols ? n : 0 },
    shape.flipWinding,
  );
  if (shape.caps) capFans(out, f, n, 0, (m - 1) * n, m * n, m * n + 1, n);
  return out;
}

// ─── Texture coordinates ────────────────────────────────────────

/**
 * Seam scheme: periodic axes get one extra UV column (and row, on the
 * torus) so the texture wraps exactly once. Cap centers map to the
 * middle of the bottom and top edges.
 */
function seamUvs(shape: ShapeGrid): { uvs: Float64Array; uvFaces: Uint32Array } {
  const { m, n } = shape;
  const { periodicRows, periodicCols } = shape.topology;
  const rows = periodicRows ? m + 1 : m;
  const cols = periodicCols ? n + 1 : n;
  const grid = rows * cols;
  const uvs = new Float64Array((grid + (shape.caps ? 2 : 0)) * 2);
  for (let i = 0; i < rows; i++) {
    for (let j = 0; j < cols; j++) {
      const k = i * cols + j;
      uvs[2 * k] = j / (cols - 1);
      uvs[2 * k + 1] = i / (rows - 1);
    }
  }
  if (shape.caps) uvs.set([0.5, 0, 0.5, 1], grid * 2);

  const uvFaces = new Uint32Array(faceCount(shape) * 3);
  const f = quads(uvFaces, 0, rows - 1, cols - 1, cols, { rows: 0, cols: 0 }, shape.flipWinding);
  if (shape.caps) capFans(uvFaces, f, n, 0, (m - 1) * cols, grid, grid + 1, cols);
  return { uvs, uvFaces };
}

// ─── Normals ────────────────────────────────────────────────────

/**
 * Area-weighted vertex normals: every face adds its (unnormalized) cross
 * product to its three corners, then each sum is normalized. Vertices
 * with no non-degenerate face get [0, 0, 0].
 */
export function vertexNormals(
  vertices: Float64Array,
  faces: Uint32Array,
): { normals: Float64Array; degenerate: number } {
  const normals = new Float64Array(vertices.length);
  const { min, max } = boundsOf(vertices);
  const diag2 = (max[0] - min[0]) ** 2 + (max[1] - min[1]) ** 2 + (max[2] - min[2]) ** 2;
  const threshold = DEGENERATE_AREA * diag2;
  let degenerate = 0;

  for (let f = 0; f < faces.length; f += 3) {
    const a = faces[f] * 3, b = faces[f + 1] * 3, c = faces[f + 2] * 3;
    const e1x = vertices[b] - vertices[a], e1y = vertices[b + 1] - vertices[a + 1], e1z = vertices[b + 2] - vertices[a + 2];
    const e2x = vertices[c] - vertices[a], e2y = vertices[c + 1] - vertices[a + 1], e2z = vertices[c + 2] - vertices[a + 2];
    const nx = e1y * e2z - e1z * e2y;
    const ny = e1z * e2x - e1x * e2z;
    const nz = e1x * e2y - e1y * e2x;
    if (Math.hypot(nx, ny, nz) <= threshold) {
      degenerate++;
      continue;
    }
    for (const v of [a, b, c]) {
      normals[v] += nx;
      normals[v + 1] += ny;
      normals[v + 2] += nz;
    }
  }

  for (let v = 0; v < normals.length; v += 3) {
    const len = Math.hypot(normals[v], normals[v + 1], normals[v + 2]);
    if (len > 0) {
      normals[v] /= len;
      normals[v + 1] /= len;
      normals[v + 2] /= len;
    }
  }
  return { normals, degenerate };
}

// ─── Assembly ───────────────────────────────────────────────────

/** Build the mesh for `field` (base + enabled perturbations) on `shape`'s grid. */
export function assembleMesh(shape: ShapeGrid, field: Float64Array, opts: AssembleOptions = {}): MeshBuffer {
  if (field.length !== shape.m * shape.n) {
    throw new Error(`assembleMesh: field has ${field.length} samples, grid has ${shape.m} x ${shape.n}`);
  }
  const vertices = shape.vertices(field);
  const faces = gridFaces(shape);
  const mesh: MeshBuffer = {
    vertices,
    vertexCount: vertices.length / 3,
    faces,
    faceCount: faces.length / 3,
    degenerateFaces: 0,
    bounds: boundsOf(vertices),
  };

  if (opts.normals) {
    const { normals, degenerate } = vertexNormals(vertices, faces);
    mesh.normals = normals;
    mesh.degenerateFaces = degenerate;
  }

  if (opts.uvs) {
    if (shape.uvScheme === 'planar') {
      mesh.uvs = shape.planarUvs();
      mesh.uvFaces = faces;
    } else {
      Object.assign(mesh, seamUvs(shape));
    }
  }
  return mesh;
}
