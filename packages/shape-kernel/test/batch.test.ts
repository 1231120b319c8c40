import { describe, it, expect } from 'vitest';
import { runBatch } from '../src/batch.js';
import { Model } from '../src/model.js';
import { modelToOBJ } from '../src/api.js';
import { ConfigError } from '../src/errors.js';

const shapes = ['sphere', 'cube', 'plane'];

function exportShape(shape: string): string {
  return modelToOBJ(Model.create(shape, { npoints: [4, 6] }));
}

describe('runBatch', () => {
  it('records failures and keeps going with continueOnError', async () => {
    const { results, failures } = await runBatch(shapes, exportShape, { continueOnError: true });
    expect(results).toHaveLength(3);
    expect(results[0]).toMatch(/^# sphere 4x6, 24 vertices, 36 faces\n/);
    expect(results[1]).toBeUndefined();
    expect(results[2]).toMatch(/^# plane 4x6, 24 vertices, 30 faces\n/);
    expect(failures).toHaveLength(1);
    expect(failures[0].index).toBe(1);
    expect(failures[0].item).toBe('cube');
    expect(failures[0].error).toBeInstanceOf(ConfigError);
  });

  it('rethrows the first failure by default', async () => {
    const seen: string[] = [];
    await expect(runBatch(shapes, (s) => { seen.push(s); return exportShape(s); })).rejects.toThrow(ConfigError);
    expect(seen).toEqual(['sphere', 'cube']);
  });

  it('awaits async jobs in order', async () => {
    const order: number[] = [];
    const { results } = await runBatch([30, 10, 20], async (ms, i) => {
      await new Promise((resolve) => setTimeout(resolve, ms));
      order.push(i);
      return ms * 2;
    });
    expect(order).toEqual([0, 1, 2]);
    expect(results).toEqual([60, 20, 40]);
  });

  it('wraps non-Error throws', async () => {
    const { failures } = await runBatch([1], () => { throw 'boom'; }, { continueOnError: true });
    expect(failures[0].error.message).toBe('boom');
  });
});
