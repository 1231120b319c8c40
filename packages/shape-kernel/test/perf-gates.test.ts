/**
 * Performance gates — timed assertions that catch algorithmic regressions.
 *
 * Each test asserts correctness AND that wall-clock time stays under a limit.
 * Limits are generous (roughly 10x a dev machine) so only a change in
 * complexity trips them, not a slow CI runner.
 *
 * If a gate fails: profile the function, don't just raise the limit.
 */

import { describe, it, expect } from 'vitest';
import { makeSine, makeNoise, makeBumpy } from '../src/api.js';
import { exportOBJ } from '../src/obj.js';

/** Run fn, return [result, elapsed_ms]. */
function timed<T>(fn: () => T): [T, number] {
  const t0 = performance.now();
  const result = fn();
  return [result, performance.now() - t0];
}

describe('performance gates', () => {

  // ─── Default-resolution sphere ───────────────────────────

  it('sphere 128x256 sine + normals meshes within 400ms', () => {
    const [mesh, ms] = timed(() =>
      makeSine('sphere', { carriers: [[8, 0.1], [4, 0.05, 0, 90]] }).mesh({ normals: true }));
    expect(mesh.vertexCount).toBe(128 * 256);
    expect(mesh.faceCount).toBe(2 * 127 * 256);
    expect(ms, `sine sphere took ${ms.toFixed(0)}ms`).toBeLessThan(400);
  });

  it('noise on a 256x256 torus within 1000ms', () => {
    const [model, ms] = timed(() => makeNoise('torus', { components: [[8, 1, 0, 30, 0.1]], seed: 1 }));
    expect(model.perturbations).toHaveLength(1);
    expect(ms, `noise torus took ${ms.toFixed(0)}ms`).toBeLessThan(1000);
  });

  it('20 bumps with a minimum distance on the sphere within 500ms', () => {
    const [model, ms] = timed(() => makeBumpy('sphere', { minDistance: 0.3, seed: 2 }));
    expect(model.perturbations[0].centers?.[0]).toHaveLength(20);
    expect(ms, `bumpy sphere took ${ms.toFixed(0)}ms`).toBeLessThan(500);
  });

  it('OBJ export of a 128x256 sphere within 1000ms', () => {
    const mesh = makeSine('sphere').mesh({ normals: true, uvs: true });
    const [text, ms] = timed(() => exportOBJ(mesh, { material: { file: 'a.mtl', name: 'a' } }));
    expect(text.startsWith('mtllib a.mtl\n')).toBe(true);
    expect(ms, `exportOBJ took ${ms.toFixed(0)}ms`).toBeLessThan(1000);
  });
});
