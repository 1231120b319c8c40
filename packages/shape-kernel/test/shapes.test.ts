import { describe, it, expect } from 'vitest';
import { createShape, TubeGrid } from '../src/shapes/index.js';
import { makeSine } from '../src/api.js';
import { Model } from '../src/model.js';
import { ConfigError } from '../src/errors.js';
import { SHAPE_NAMES } from '../src/options.js';

function radiusXZ(v: Float64Array, k: number): number {
  return Math.hypot(v[3 * k], v[3 * k + 2]);
}

describe('zero-amplitude perturbations leave the base shape', () => {
  for (const shape of SHAPE_NAMES) {
    it(`${shape}: derived field equals the base field`, () => {
      const model = makeSine(shape, { carriers: [[2, 0]] }, { npoints: [6, 8] });
      expect(model.derived()).toEqual(model.base);
    });
  }

  it('sphere vertices all have norm 1', () => {
    const model = makeSine('sphere', { carriers: [[3, 0]] }, { npoints: [9, 12] });
    const { vertices, vertexCount } = model.mesh();
    for (let k = 0; k < vertexCount; k++) {
      expect(Math.hypot(vertices[3 * k], vertices[3 * k + 1], vertices[3 * k + 2])).toBeCloseTo(1, 12);
    }
  });

  it('cylinder vertices sit at radius 1 between y = -pi and pi', () => {
    const model = makeSine('cylinder', { carriers: [[3, 0]] }, { npoints: [5, 8] });
    const { vertices, vertexCount, bounds } = model.mesh();
    for (let k = 0; k < vertexCount; k++) expect(radiusXZ(vertices, k)).toBeCloseTo(1, 12);
    expect(bounds.min[1]).toBeCloseTo(-Math.PI, 12);
    expect(bounds.max[1]).toBeCloseTo(Math.PI, 12);
  });

  it('torus vertices sit on the tube of radius 0.4 around the unit ring', () => {
    const model = makeSine('torus', { carriers: [[3, 0]] }, { npoints: [6, 10] });
    const { vertices, vertexCount } = model.mesh();
    for (let k = 0; k < vertexCount; k++) {
      const ring = radiusXZ(vertices, k) - 1;
      expect(Math.hypot(ring, vertices[3 * k + 1])).toBeCloseTo(0.4, 12);
    }
  });

  it('disk vertices lie in y = 0 within the radius', () => {
    const model = makeSine('disk', { carriers: [[3, 0]] }, { npoints: [4, 8] });
    const { vertices, vertexCount } = model.mesh();
    for (let k = 0; k < vertexCount; k++) {
      expect(vertices[3 * k + 1]).toBe(0);
      expect(radiusXZ(vertices, k)).toBeLessThanOrEqual(1 + 1e-12);
    }
  });
});

describe('sphere 8x16 with carrier [2, 0.1, 0, 0, 0]', () => {
  const model = makeSine('sphere', { carriers: [[2, 0.1, 0, 0, 0]] }, { npoints: [8, 16] });
  const r = model.derived();

  it('radius is 1.0 at azimuth 0', () => {
    // Column 8 is azimuth -pi + 8 * 2pi/16 = 0.
    expect(model.coords.u[8]).toBe(0);
    expect(r[3 * 16 + 8]).toBeCloseTo(1, 12);
  });

  it('radius is 1.1 at azimuth pi/4', () => {
    expect(model.coords.u[10]).toBeCloseTo(Math.PI / 4, 12);
    expect(r[3 * 16 + 10]).toBeCloseTo(1.1, 12);
  });

  it('orientation 0 is constant along elevation', () => {
    for (let i = 0; i < 8; i++) expect(r[i * 16 + 10]).toBeCloseTo(1.1, 12);
  });
});

describe('plane', () => {
  it('height defaults to width * m / n', () => {
    const plane = createShape('plane', { npoints: [3, 5], width: 2 });
    expect(plane.describe()).toEqual({ width: 2, height: 1.2 });
    expect(plane.coords.v[0]).toBeCloseTo(-0.6, 12);
    expect(plane.coords.u[4]).toBe(1);
  });
});

describe('disk', () => {
  it('cartesian coords evaluate signals at (x, y) on the disk', () => {
    const disk = createShape('disk', { npoints: [3, 4], radius: 2, coords: 'cartesian' });
    const vertices = disk.vertices(disk.base);
    for (let k = 0; k < 12; k++) {
      expect(disk.coords.su[k]).toBe(vertices[3 * k]);
      expect(disk.coords.sv[k]).toBe(-vertices[3 * k + 2]);
    }
  });

  it('polar coords evaluate signals at (turns, radius)', () => {
    const disk = createShape('disk', { npoints: [3, 4], radius: 2 });
    expect(disk.coords.su[1]).toBeCloseTo(-0.25, 12);
    expect(disk.coords.sv[8]).toBe(2);
  });
});

describe('torus major radius', () => {
  it('majorComponents modulate R over the major angle', () => {
    // n = 8: column 6 is theta = pi/2, a quarter turn, where sin(2pi * 0.25) = 1.
    const torus = createShape('torus', { npoints: [4, 8], majorComponents: [[1, 0.2]] });
    const v = torus.vertices(torus.base);
    // Row 2 is phi = 0, so the vertex sits at R + r = 1.6 along -z.
    const k = 2 * 8 + 6;
    expect(v[3 * k]).toBeCloseTo(0, 12);
    expect(v[3 * k + 1]).toBeCloseTo(0, 12);
    expect(v[3 * k + 2]).toBeCloseTo(-1.6, 12);
  });

  it('rejects components that make R non-positive', () => {
    expect(() => createShape('torus', { npoints: [4, 8], majorComponents: [[1, 1.5]] })).toThrow(ConfigError);
  });
});

describe('tube profiles', () => {
  it('revolution resamples rcurve along the height', () => {
    const rev = createShape('revolution', { npoints: [3, 4], rcurve: [1, 2] });
    expect(Array.from(rev.base)).toEqual([1, 1, 1, 1, 1.5, 1.5, 1.5, 1.5, 2, 2, 2, 2]);
  });

  it('extrusion resamples ecurve periodically around the circumference', () => {
    const ext = createShape('extrusion', { npoints: [2, 4], ecurve: [1, 2] });
    expect(Array.from(ext.base)).toEqual([1, 1.5, 2, 1.5, 1, 1.5, 2, 1.5]);
  });

  it('curveMode combines both curves', () => {
    const mul = createShape('revolution', { npoints: [2, 3], rcurve: [2, 2], ecurve: [0.5, 0.5] });
    const add = createShape('revolution', { npoints: [2, 3], rcurve: [2, 2], ecurve: [0.5, 0.5], curveMode: 'add' });
    expect(Array.from(mul.base)).toEqual([1, 1, 1, 1, 1, 1]);
    expect(Array.from(add.base)).toEqual([2.5, 2.5, 2.5, 2.5, 2.5, 2.5]);
  });

  it('revolution without curves is a cylinder of the given radius', () => {
    const rev = createShape('revolution', { npoints: [2, 3], radius: 0.5 });
    expect(Array.from(rev.base)).toEqual([0.5, 0.5, 0.5, 0.5, 0.5, 0.5]);
  });

  it('worm spine shifts whole cross-sections', () => {
    const worm = createShape('worm', { npoints: [3, 4], spine: { x: [0, 1], z: [0, -2] } });
    const v = worm.vertices(worm.base);
    // Row 2, column 2: theta = 0, spine offset (1, 0, -2).
    const k = 2 * 4 + 2;
    expect(v[3 * k]).toBeCloseTo(2, 12);
    expect(v[3 * k + 1]).toBeCloseTo(Math.PI, 12);
    expect(v[3 * k + 2]).toBeCloseTo(-2, 12);
  });

  it('rejects profiles that reach zero radius', () => {
    expect(() => createShape('revolution', { npoints: [3, 4], rcurve: [1, 0] })).toThrow(/radius positive/);
  });

  it('tube amplitude limit is the smallest base radius', () => {
    const rev = createShape('revolution', { npoints: [3, 4], rcurve: [0.5, 2] });
    expect(rev).toBeInstanceOf(TubeGrid);
    expect(rev.amplitudeLimit()).toBe(0.5);
  });
});

describe('shape options', () => {
  it('rejects unknown shapes with the list of valid names', () => {
    expect(() => Model.create('cube')).toThrow(
      'Unknown shape "cube". Expected one of: sphere, plane, disk, torus, cylinder, revolution, extrusion, worm',
    );
  });

  it('names the shape and key of a bad option', () => {
    expect(() => Model.create('sphere', { radius: -1 })).toThrow(/^sphere\.radius: /);
  });

  it('rejects unknown keys', () => {
    expect(() => Model.create('plane', { radius: 1 })).toThrow(ConfigError);
  });

  it('uses the documented default grids', () => {
    expect([
      createShape('sphere'), createShape('plane'), createShape('disk'),
      createShape('torus'), createShape('cylinder'),
    ].map((s) => [s.m, s.n])).toEqual([[128, 256], [256, 256], [128, 256], [256, 256], [256, 256]]);
  });
});
