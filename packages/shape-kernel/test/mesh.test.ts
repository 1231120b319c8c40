import { describe, it, expect } from 'vitest';
import { assembleMesh, faceCount, gridFaces, vertexNormals } from '../src/mesh.js';
import { createShape } from '../src/shapes/index.js';
import { Model } from '../src/model.js';

function maxIndex(faces: Uint32Array): number {
  return faces.reduce((a, b) => Math.max(a, b), 0);
}

describe('face counts', () => {
  const cases: [string, [number, number], number][] = [
    ['sphere', [8, 16], 2 * 7 * 16],
    ['disk', [5, 12], 2 * 4 * 12],
    ['cylinder', [6, 10], 2 * 5 * 10],
    ['worm', [6, 10], 2 * 5 * 10],
    ['torus', [8, 16], 2 * 8 * 16],
    ['plane', [4, 5], 2 * 3 * 4],
  ];

  for (const [shape, npoints, expected] of cases) {
    it(`${shape} ${npoints.join('x')} has ${expected} faces, all indices in range`, () => {
      const model = Model.create(shape, { npoints });
      const mesh = model.mesh();
      expect(mesh.faceCount).toBe(expected);
      expect(faceCount(model.shape)).toBe(expected);
      expect(mesh.faces.length).toBe(expected * 3);
      // 0-based here, so the 1-based OBJ range [1, m*n] becomes [0, m*n).
      expect(maxIndex(mesh.faces)).toBe(npoints[0] * npoints[1] - 1);
    });
  }

  it('caps add two vertices and 2n faces', () => {
    const open = Model.create('cylinder', { npoints: [4, 6] }).mesh();
    const capped = Model.create('cylinder', { npoints: [4, 6], caps: true }).mesh();
    expect(capped.vertexCount).toBe(open.vertexCount + 2);
    expect(capped.faceCount).toBe(open.faceCount + 12);
  });
});

describe('topology', () => {
  it('wraps the periodic column axis onto column 0', () => {
    const sphere = createShape('sphere', { npoints: [3, 4] });
    const faces = gridFaces(sphere);
    // Last quad of row 0: a = 3, b = 0 (wrapped), c = 4, d = 7.
    expect(Array.from(faces.subarray(18, 24))).toEqual([3, 0, 4, 3, 4, 7]);
  });

  it('wraps the torus row axis onto row 0', () => {
    const torus = createShape('torus', { npoints: [3, 4] });
    const faces = gridFaces(torus);
    // First quad of the last row: a = 8, b = 9, c = 1, d = 0.
    expect(Array.from(faces.subarray(48, 54))).toEqual([8, 9, 1, 8, 1, 0]);
  });

  it('flips the disk winding', () => {
    const disk = createShape('disk', { npoints: [2, 3] });
    expect(Array.from(gridFaces(disk).subarray(0, 6))).toEqual([0, 4, 1, 0, 3, 4]);
  });

  it('fans the caps around the center vertices', () => {
    const tube = createShape('cylinder', { npoints: [2, 3], caps: true });
    const faces = gridFaces(tube);
    // After the 2 * 1 * 3 quads: bottom (6, j+1, j), top (7, 3+j, 3+j+1).
    expect(Array.from(faces.subarray(18, 24))).toEqual([6, 1, 0, 7, 3, 4]);
    expect(Array.from(faces.subarray(30, 36))).toEqual([6, 0, 2, 7, 5, 3]);
  });

  it('rejects a field of the wrong size', () => {
    const sphere = createShape('sphere', { npoints: [3, 4] });
    expect(() => assembleMesh(sphere, new Float64Array(5))).toThrow(/5 samples, grid has 3 x 4/);
  });
});

describe('normals', () => {
  it('point outward on the sphere, with the pole slivers counted as degenerate', () => {
    const mesh = Model.create('sphere', { npoints: [8, 16] }).mesh({ normals: true });
    const { vertices, normals } = mesh;
    expect(normals).toBeDefined();
    if (!normals) return;
    for (let k = 0; k < mesh.vertexCount; k++) {
      const d = vertices[3 * k] * normals[3 * k] + vertices[3 * k + 1] * normals[3 * k + 1]
        + vertices[3 * k + 2] * normals[3 * k + 2];
      expect(d).toBeGreaterThan(0.9);
    }
    // One collapsed triangle per quad in the first and last quad rows.
    expect(mesh.degenerateFaces).toBe(32);
  });

  it('point up on the disk, center included', () => {
    const mesh = Model.create('disk', { npoints: [4, 8] }).mesh({ normals: true });
    const { normals } = mesh;
    if (!normals) throw new Error('normals missing');
    for (let k = 0; k < mesh.vertexCount; k++) {
      expect(normals[3 * k]).toBeCloseTo(0, 12);
      expect(normals[3 * k + 1]).toBeCloseTo(1, 12);
      expect(normals[3 * k + 2]).toBeCloseTo(0, 12);
    }
    expect(mesh.degenerateFaces).toBe(8);
  });

  it('point along +z on the plane', () => {
    const mesh = Model.create('plane', { npoints: [3, 3] }).mesh({ normals: true });
    expect(Array.from(mesh.normals ?? []).slice(0, 3)).toEqual([0, 0, 1]);
  });

  it('cap centers face down and up', () => {
    const mesh = Model.create('cylinder', { npoints: [4, 8], caps: true }).mesh({ normals: true });
    const { normals } = mesh;
    if (!normals) throw new Error('normals missing');
    const bottom = 4 * 8;
    expect(normals[3 * bottom + 1]).toBeCloseTo(-1, 12);
    expect(normals[3 * (bottom + 1) + 1]).toBeCloseTo(1, 12);
  });

  it('vertices without faces keep a zero normal', () => {
    const vertices = Float64Array.from([0, 0, 0, 1, 0, 0, 0, 1, 0, 5, 5, 5]);
    const { normals, degenerate } = vertexNormals(vertices, Uint32Array.from([0, 1, 2]));
    expect(Array.from(normals)).toEqual([0, 0, 1, 0, 0, 1, 0, 0, 1, 0, 0, 0]);
    expect(degenerate).toBe(0);
  });
});

describe('texture coordinates', () => {
  it('sphere duplicates the seam column: m(n+1) uvs', () => {
    const mesh = Model.create('sphere', { npoints: [3, 4] }).mesh({ uvs: true });
    expect(mesh.uvs?.length).toBe(3 * 5 * 2);
    expect(mesh.uvFaces?.length).toBe(mesh.faces.length);
    // Last quad of row 0 uses uv column 4 (u = 1) instead of wrapping.
    expect(Array.from(mesh.uvFaces?.subarray(18, 24) ?? [])).toEqual([3, 4, 9, 3, 9, 8]);
  });

  it('torus duplicates both seams: (m+1)(n+1) uvs', () => {
    const mesh = Model.create('torus', { npoints: [3, 4] }).mesh({ uvs: true });
    expect(mesh.uvs?.length).toBe(4 * 5 * 2);
    expect(Array.from(mesh.uvs?.subarray(-2) ?? [])).toEqual([1, 1]);
  });

  it('plane uses one planar uv per vertex', () => {
    const mesh = Model.create('plane', { npoints: [2, 3] }).mesh({ uvs: true });
    expect(Array.from(mesh.uvs ?? [])).toEqual([0, 0, 0.5, 0, 1, 0, 0, 1, 0.5, 1, 1, 1]);
    expect(mesh.uvFaces).toBe(mesh.faces);
  });

  it('cap centers get their own uvs', () => {
    const mesh = Model.create('cylinder', { npoints: [2, 3], caps: true }).mesh({ uvs: true });
    expect(Array.from(mesh.uvs?.subarray(-4) ?? [])).toEqual([0.5, 0, 0.5, 1]);
  });
});
