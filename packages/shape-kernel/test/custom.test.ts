import { describe, it, expect } from 'vitest';
import sharp from 'sharp';
import { customSourceFrom, matrixHeightMap, mapField } from '../src/custom.js';
import { makeCustom, makeCustomAsync } from '../src/api.js';
import { Model } from '../src/model.js';
import { ConfigError } from '../src/errors.js';
import type { BumpProfile } from '../src/bumps.js';

function expectClose(actual: ArrayLike<number>, expected: number[]) {
  expect(actual.length).toBe(expected.length);
  expected.forEach((v, i) => expect(actual[i]).toBeCloseTo(v, 12));
}

/** 2 x 2 greyscale PNG: top row [0, 128], bottom row [255, 64]. */
async function greyPng(): Promise<Buffer> {
  return sharp(Buffer.from([0, 128, 255, 64]), { raw: { width: 2, height: 2, channels: 1 } })
    .png()
    .toBuffer();
}

describe('customSourceFrom', () => {
  const cone: BumpProfile = (d, [a = 0.1]) => a * (1 - d);

  it('recognizes a profile function', () => {
    const source = customSourceFrom(cone, { bumps: [[3, 0.5, 0.2]] });
    expect(source.kind).toBe('function');
    if (source.kind === 'function') {
      expect(source.components).toEqual([{ count: 3, cutoff: 0.5, params: [0.2] }]);
    }
  });

  it('recognizes a matrix and an image', () => {
    expect(customSourceFrom([[1, 2], [3, 4]]).kind).toBe('matrix');
    expect(customSourceFrom('map.png').kind).toBe('image');
    expect(customSourceFrom(Buffer.from([1, 2, 3])).kind).toBe('image');
  });

  it('requires bump rows for a profile function', () => {
    expect(() => customSourceFrom(cone)).toThrow(/needs bump rows/);
  });

  it('rejects ragged matrices', () => {
    expect(() => customSourceFrom([[1, 2, 3], [4, 5]])).toThrow('custom.matrix: row 1 has 2 values, row 0 has 3');
  });

  it('rejects an empty matrix', () => {
    expect(() => customSourceFrom([])).toThrow(ConfigError);
  });
});

describe('matrix maps', () => {
  it('flip so the first row is the top of the grid', () => {
    const map = matrixHeightMap([[1, 2, 3], [4, 5, 6]]);
    expect(Array.from(map.data)).toEqual([4, 5, 6, 1, 2, 3]);
  });

  it('scale to peak |value| = amplitude on a matching grid', () => {
    const model = makeCustom('plane', [[1, 2, 3], [4, 5, 6]], { amplitude: 0.6 }, { npoints: [2, 3] });
    expectClose(model.perturbations[0].field, [0.4, 0.5, 0.6, 0.1, 0.2, 0.3]);
    expect(model.perturbations[0].label).toBe('custom(matrix 2x3)');
  });

  it('resample bilinearly onto a larger grid', () => {
    const map = matrixHeightMap([[2, 4], [0, 2]]);
    const field = mapField(map, { m: 3, n: 3, topology: { periodicRows: false, periodicCols: false } }, 1);
    expectClose(field, [0, 0.25, 0.5, 0.25, 0.5, 0.75, 0.5, 0.75, 1]);
  });

  it('an all-zero matrix gives a zero field', () => {
    const model = makeCustom('plane', [[0, 0], [0, 0]], { amplitude: 0.5 }, { npoints: [2, 2] });
    expect(Array.from(model.perturbations[0].field)).toEqual([0, 0, 0, 0]);
  });
});

describe('profile functions', () => {
  it('place the profile like bumps, zero outside the cutoff', () => {
    const cone: BumpProfile = (d, [a = 0]) => a * (1 - d);
    const model = makeCustom('plane', cone, {
      bumps: [{ count: 1, cutoff: 0.5, params: [0.2], centers: [[0, 0]] }],
    }, { npoints: [3, 3] });
    const field = model.perturbations[0].field;
    expect(field[4]).toBe(0.2);
    expect(field[1]).toBe(0);
    expect(field[0]).toBe(0);
  });
});

describe('images', () => {
  it('decode with sharp, flip vertically and scale to the amplitude', async () => {
    const model = await makeCustomAsync('plane', await greyPng(), { amplitude: 1 }, { npoints: [2, 2] });
    expectClose(model.perturbations[0].field, [1, 64 / 255, 0, 128 / 255]);
    expect(model.perturbations[0].label).toBe('custom(image buffer)');
  });

  it('must go through the async path', async () => {
    const png = await greyPng();
    expect(() => Model.create('plane', { npoints: [2, 2] }).addCustom(png)).toThrow(/addCustomAsync/);
  });

  it('report undecodable input as ConfigError', async () => {
    const model = Model.create('plane', { npoints: [2, 2] });
    await expect(model.addCustomAsync(Buffer.from('not an image'))).rejects.toThrow(ConfigError);
    expect(model.perturbations).toHaveLength(0);
  });
});
