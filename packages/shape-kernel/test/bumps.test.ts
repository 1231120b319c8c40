import { describe, it, expect } from 'vitest';
import { composeBumps, gaussianProfile, placeCenters, CANDIDATE_OVERSAMPLING } from '../src/bumps.js';
import { gaussianBumpComponents, customBumpComponents } from '../src/components.js';
import { createShape } from '../src/shapes/index.js';
import { createRandom } from '../src/random.js';
import { makeBumpy } from '../src/api.js';
import { ConfigError, PlacementError } from '../src/errors.js';

// 21 x 21 unit plane: x and y run -0.5..0.5 in steps of 0.05, sample (10, 10) is the origin.
const plane = createShape('plane', { npoints: [21, 21] });
const CENTER = 10 * 21 + 10;

describe('gaussianBumpComponents', () => {
  it('fills [count, sigma=0.1, amplitude=0.1] and cuts off at 3.5 sigma', () => {
    const [c] = gaussianBumpComponents([[5]]);
    expect(c.count).toBe(5);
    expect(c.params).toEqual([0.1, 0.1]);
    expect(c.cutoff).toBeCloseTo(0.35, 12);
  });

  it('reads named fields', () => {
    const [c] = gaussianBumpComponents([{ count: 2, sigma: 0.2, amplitude: -0.05 }]);
    expect(c.params).toEqual([-0.05, 0.2]);
    expect(c.cutoff).toBeCloseTo(0.7, 12);
  });

  it('rejects a fractional count', () => {
    expect(() => gaussianBumpComponents([[2.5]])).toThrow('bump[0]: bump count must be a non-negative integer, got 2.5');
  });
});

describe('composeBumps', () => {
  const single = gaussianBumpComponents([{ count: 1, sigma: 0.1, amplitude: 0.1, centers: [[0, 0]] }]);
  const twice = [...single, ...single];

  it('peaks at the amplitude on the center sample', () => {
    const { field } = composeBumps(plane.bumpDomain, 21 * 21, single);
    expect(field[CENTER]).toBe(0.1);
  });

  it('overlap=max of two identical bumps equals one bump', () => {
    const one = composeBumps(plane.bumpDomain, 21 * 21, single, { overlap: 'max' }).field;
    const two = composeBumps(plane.bumpDomain, 21 * 21, twice, { overlap: 'max' }).field;
    expect(two).toEqual(one);
  });

  it('overlap=sum of two identical bumps doubles', () => {
    const { field } = composeBumps(plane.bumpDomain, 21 * 21, twice, { overlap: 'sum' });
    expect(field[CENTER]).toBeCloseTo(0.2, 12);
  });

  it('is zero at and beyond the cutoff', () => {
    // Flat profile with cutoff 0.25: x = 0.2 is inside, x = 0.3 is not.
    const comps = customBumpComponents([{ count: 1, cutoff: 0.25, params: [1], centers: [[0, 0]] }]);
    const { field } = composeBumps(plane.bumpDomain, 21 * 21, comps, { profile: () => 1 });
    expect(field[CENTER + 4]).toBe(1);
    expect(field[CENTER + 6]).toBe(0);
    expect(field[0]).toBe(0);
  });

  it('rejects explicit centers of the wrong dimension', () => {
    const comps = gaussianBumpComponents([{ count: 1, centers: [[0, 0, 0]] }]);
    expect(() => composeBumps(plane.bumpDomain, 21 * 21, comps)).toThrow(ConfigError);
  });

  it('gaussianProfile follows amplitude * exp(-d^2 / 2 sigma^2)', () => {
    expect(gaussianProfile(0.2, [0.5, 0.1])).toBeCloseTo(0.5 * Math.exp(-2), 12);
  });
});

describe('minimum-distance placement', () => {
  it('keeps every accepted pair at least minDistance apart on the sphere', () => {
    const model = makeBumpy('sphere', { components: [[12, 0.1, 0.1]], minDistance: 0.5, seed: 1 }, { npoints: [16, 32] });
    const [centers] = model.perturbations[0].centers ?? [];
    expect(centers).toHaveLength(12);
    const domain = model.shape.bumpDomain;
    for (let a = 0; a < centers.length; a++) {
      for (let b = a + 1; b < centers.length; b++) {
        expect(domain.distance(centers[a], centers[b])).toBeGreaterThanOrEqual(0.5);
      }
    }
  });

  it('fails with PlacementError instead of looping when the request is impossible', () => {
    const rng = createRandom(3);
    let caught: unknown;
    try {
      placeCenters(plane.bumpDomain, 50, 0.5, rng);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(PlacementError);
    if (caught instanceof PlacementError) {
      expect(caught.requested).toBe(50);
      expect(caught.placed).toBeLessThan(50);
      expect(caught.message).toContain(`from ${50 * CANDIDATE_OVERSAMPLING} candidates`);
      expect(caught.message).toContain('Reduce the bump count or minDistance');
    }
  });

  it('is reproducible for a seed', () => {
    const a = makeBumpy('plane', { components: [[6]], minDistance: 0.1, seed: 9 }, { npoints: [8, 8] });
    const b = makeBumpy('plane', { components: [[6]], minDistance: 0.1, seed: 9 }, { npoints: [8, 8] });
    expect(b.perturbations[0].centers).toEqual(a.perturbations[0].centers);
    expect(b.perturbations[0].field).toEqual(a.perturbations[0].field);
  });

  it('zero count places nothing', () => {
    expect(placeCenters(plane.bumpDomain, 0, 0.5, createRandom(1))).toEqual([]);
  });
});
