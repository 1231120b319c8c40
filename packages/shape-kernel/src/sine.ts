/**
 * Signal Composer — sums sinusoidal carriers with group modulation.
 *
 *   value = amplitude * sin(2π f (x cos o + y sin o) + phase)
 *
 * x and y are the shape's signal coordinates (cycle units). Grouping:
 *   - group 0 carriers are added as-is
 *   - carriers in group g ≠ 0 are summed, then multiplied by the sum of
 *     group-g modulators (left alone if there are none)
 *   - group 0 modulators multiply everything accumulated so far
 */

import type { SineComponent } from './components.js';

const DEG = Math.PI / 180;

/** Sum of sine waves over every sample. Empty list → zeros. */
export function sumSines(
  components: readonly SineComponent[],
  x: ArrayLike<number>,
  y: ArrayLike<number>,
): Float64Array {
  const out = new Float64Array(x.length);
  for (const c of components) {
    const w = 2 * Math.PI * c.frequency;
    const co = Math.cos(c.orientation * DEG);
    const so = Math.sin(c.orientation * DEG);
    const ph = c.phase * DEG;
    for (let i = 0; i < out.length; i++) {
      out[i] += c.amplitude * Math.sin(w * (x[i] * co + y[i] * so) + ph);
    }
  }
  return out;
}

/**
 * Combine per-group carrier sums under the group rules above.
 * Shared by the sine and noise composers — noise carriers group the
 * same way.
 */
export function combineGroups(
  groupSums: ReadonlyMap<number, Float64Array>,
  modulators: readonly SineComponent[],
  x: ArrayLike<number>,
  y: ArrayLike<number>,
): Float64Array {
  const out = new Float64Array(x.length);
  const groups = [...groupSums.keys()].sort((a, b) => a - b);
  if (groups.length === 0) return out;

  for (const g of groups) {
    const sum = groupSums.get(g);
    if (!sum) continue;
    let contribution = sum;
    if (g !== 0) {
      const mods = modulators.filter((c) => c.group === g);
      if (mods.length > 0) {
        const mod = sumSines(mods, x, y);
        contribution = sum.map((v, i) => v * mod[i]);
      }
    }
    for (let i = 0; i < out.length; i++) out[i] += contribution[i];
  }

  const global = modulators.filter((c) => c.group === 0);
  if (global.length > 0) {
    const mod = sumSines(global, x, y);
    for (let i = 0; i < out.length; i++) out[i] *= mod[i];
  }
  return out;
}

/** Full carrier/modulator composition. */
export function composeSine(
  carriers: readonly SineComponent[],
  modulators: readonly SineComponent[],
  x: ArrayLike<number>,
  y: ArrayLike<number>,
): Float64Array {
  if (x.length !== y.length) {
    throw new Error(`composeSine: coordinate lengths differ (${x.length} vs ${y.length})`);
  }
  const groupSums = new Map<number, Float64Array>();
  for (const g of new Set(carriers.map((c) => c.group))) {
    groupSums.set(g, sumSines(carriers.filter((c) => c.group === g), x, y));
  }
  return combineGroups(groupSums, modulators, x, y);
}
