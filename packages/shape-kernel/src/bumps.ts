/**
 * Bump Placer — radially symmetric profiles around random centers.
 *
 * Centers live in the shape's bump domain (unit vectors on the sphere,
 * (x, y) on the plane, (angle, height) on tubes...). The domain supplies
 * the metric, so a sigma on the sphere is an angle and on the plane a
 * length.
 *
 * Minimum-distance placement oversamples 30× candidates and accepts them
 * greedily in draw order. Running out of candidates is a PlacementError,
 * never a retry loop.
 */

import type { BumpComponent } from './components.js';
import { ConfigError, PlacementError } from './errors.js';
import { createRandom, type RandomSource } from './random.js';

/** f(distance, params) → height contribution. */
export type BumpProfile = (distance: number, params: readonly number[]) => number;

export type OverlapPolicy = 'sum' | 'max';

export interface BumpDomain {
  /** Uniform random point on the domain. */
  sample(rng: RandomSource): number[];
  /** Distance between two domain points. */
  distance(a: readonly number[], b: readonly number[]): number;
  /** Distance from a point to every grid sample, row-major. */
  distances(center: readonly number[]): Float64Array;
  /** Coordinates per point, for validating explicit centers. */
  readonly dimension: number;
}

export interface BumpOptions {
  profile?: BumpProfile;
  /** 0 disables the constraint. */
  minDistance?: number;
  overlap?: OverlapPolicy;
  seed?: number;
}

/** Candidates drawn per requested bump under a minimum-distance constraint. */
export const CANDIDATE_OVERSAMPLING = 30;

/** Default profile: params = [amplitude, sigma]. */
export const gaussianProfile: BumpProfile = (d, params) => {
  const [amplitude = 0.1, sigma = 0.1] = params;
  return amplitude * Math.exp(-(d * d) / (2 * sigma * sigma));
};

/** Draw `count` centers, honoring a minimum pairwise distance when > 0. */
export function placeCenters(
  domain: BumpDomain,
  count: number,
  minDistance: number,
  rng: RandomSource,
  where = 'bump',
): number[][] {
  if (count === 0) return [];
  if (minDistance <= 0) {
    return Array.from({ length: count }, () => domain.sample(rng));
  }

  const candidates = Array.from({ length: CANDIDATE_OVERSAMPLING * count }, () => domain.sample(rng));
  const accepted: number[][] = [];
  for (const candidate of candidates) {
    if (accepted.every((c) => domain.distance(c, candidate) >= minDistance)) {
      accepted.push(candidate);
      if (accepted.length === count) return accepted;
    }
  }
  throw new PlacementError(
    `${where}: could only place ${accepted.length} of ${count} bumps at minimum distance ` +
    `${minDistance} from ${candidates.length} candidates. Reduce the bump count or minDistance.`,
    count,
    accepted.length,
  );
}

/** Evaluate every component's bumps on the grid and combine them by the overlap policy. */
export function composeBumps(
  domain: BumpDomain,
  size: number,
  components: readonly BumpComponent[],
  opts: BumpOptions = {},
): { field: Float64Array; centers: number[][][] } {
  const profile = opts.profile ?? gaussianProfile;
  const overlap = opts.overlap ?? 'sum';
  const rng = createRandom(opts.seed);
  const field = new Float64Array(size);
  const placed: number[][][] = [];

  components.forEach((comp, k) => {
    const where = `bump[${k}]`;
    const centers = comp.centers ?? placeCenters(domain, comp.count, opts.minDistance ?? 0, rng, where);
    for (const center of centers) {
      if (center.length !== domain.dimension) {
        throw new ConfigError(
          `${where}: center [${center.join(', ')}] needs ${domain.dimension} coordinates`,
        );
      }
    }
    placed.push(centers);

    for (const center of centers) {
      const d = domain.distances(center);
      for (let i = 0; i < size; i++) {
        if (d[i] >= comp.cutoff) continue;
        const value = profile(d[i], comp.params);
        if (overlap === 'sum') {
          field[i] += value;
        } else if (Math.abs(value) > Math.abs(field[i])) {
          field[i] = value;
        }
      }
    }
  });

  return { field, centers: placed };
}
