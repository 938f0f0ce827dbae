import { mapWithConcurrency, pLimit } from '../concurrency.js';

const tick = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('pLimit', () => {
  it('rejects a concurrency below one', () => {
    expect(() => pLimit(0)).toThrow(TypeError);
  });

  it('never runs more than the limit at once', async () => {
    const limit = pLimit(2);
    let active = 0;
    let peak = 0;

    await Promise.all(
      [5, 1, 3, 2].map((ms) =>
        limit(async () => {
          active++;
          peak = Math.max(peak, active);
          await tick(ms);
          active--;
        })
      )
    );

    expect(peak).toBe(2);
  });
});

describe('mapWithConcurrency', () => {
  it('keeps results in input order', async () => {
    const results = await mapWithConcurrency([30, 10, 20], 3, async (ms, index) => {
      await tick(ms);
      return `${index}:${ms}`;
    });

    expect(results).toEqual(['0:30', '1:10', '2:20']);
  });

  it('propagates the first rejection', async () => {
    await expect(
      mapWithConcurrency([1, 2], 1, async (value) => {
        if (value === 2) throw new Error('second failed');
        return value;
      })
    ).rejects.toThrow('second failed');
  });
});
