import { createSeededRandom } from '../src/random.js';

describe('createSeededRandom', () => {
  test('first draws for seed 0', () => {
    const random = createSeededRandom(0);
    expect(random()).toBe(12345 / 0x80000000);
    expect(random()).toBe(1406932606 / 0x80000000);
  });

  test('same seed replays the same stream', () => {
    const a = createSeededRandom(42);
    const b = createSeededRandom(42);
    for (let i = 0; i < 100; i++) {
      expect(a()).toBe(b());
    }
  });

  test('different seeds diverge', () => {
    expect(createSeededRandom(1)()).not.toBe(createSeededRandom(2)());
  });

  test('draws are uniform on [0, 1)', () => {
    const random = createSeededRandom(7);
    let total = 0;
    const N = 20000;
    for (let i = 0; i < N; i++) {
      const r = random();
      expect(r).toBeGreaterThanOrEqual(0);
      expect(r).toBeLessThan(1);
      total += r;
    }
    expect(Math.abs(total / N - 0.5)).toBeLessThan(0.02);
  });

  test('rejects non-integer seeds', () => {
    expect(() => createSeededRandom(1.5)).toThrow(RangeError);
  });
});
