import { RandomSource } from "../types";

function mix32(x: number): number {
  x = Math.imul(x ^ (x >>> 16), 0x85ebca6b);
  x = Math.imul(x ^ (x >>> 13), 0xc2b2ae35);
  return (x ^ (x >>> 16)) >>> 0;
}

/**
 * Deterministic xorshift128+ generator returning uniforms in [0, 1).
 *
 * Pass the result to `new NeuralNetwork(sizes, activations, { rng })` to get
 * reproducible weight initialization and shuffling.
 */
export function createRng(seed: number): RandomSource {
  let s0 = mix32(seed >>> 0);
  let s1 = mix32(s0 ^ 0x9e3779b9);
  if (s0 === 0 && s1 === 0) s1 = 1;
  return () => {
    let x = s0;
    const y = s1;
    s0 = y;
    x ^= x << 23;
    x ^= x >>> 17;
    x ^= y;
    x ^= y >>> 26;
    s1 = x;
    return ((s0 + s1) >>> 0) / 4294967296;
  };
}

/** Uniform sample in [min, max). */
export function uniform(rng: RandomSource, min: number, max: number): number {
  return rng() * (max - min) + min;
}

/** Fisher-Yates shuffle of an index range [0, n). */
export function shuffledIndices(n: number, rng: RandomSource): number[] {
  const indices = Array.from({ length: n }, (_, i) => i);
  for (let i = n - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    const tmp = indices[i]!;
    indices[i] = indices[j]!;
    indices[j] = tmp;
  }
  return indices;
}
