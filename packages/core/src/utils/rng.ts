// Seeded mulberry32 generator. Same seed, same sequence, on every platform.
export type Rng = {
  nextU32(): number;
  nextFloat(): number;
  nextByte(): number;
};

export function createRng(seed: number): Rng {
  let state = seed >>> 0;
  const nextU32 = (): number => {
    state = (state + 0x6D2B79F5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  };
  return {
    nextU32,
    nextFloat: () => nextU32() / 0x100000000,
    nextByte: () => nextU32() & 0xff,
  };
}
