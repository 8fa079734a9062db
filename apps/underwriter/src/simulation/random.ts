import { randomInt } from "node:crypto";

export type Rng = () => number;

/** Uniform [0, 1) from a 32-bit state. */
export function mulberry32(seed: number): Rng {
  let state = seed >>> 0;
  return function () {
    let t = (state = (state + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Seed of the sub-stream for scenario `index`. Every scenario owns its own
 * stream, so how scenarios are grouped into partitions never changes a draw.
 */
export function deriveSeed(seed: number, index: number): number {
  let z = (seed ^ Math.imul(index + 1, 0x9e3779b9)) >>> 0;
  z = Math.imul(z ^ (z >>> 16), 0x85ebca6b) >>> 0;
  z = Math.imul(z ^ (z >>> 13), 0xc2b2ae35) >>> 0;
  return (z ^ (z >>> 16)) >>> 0;
}

export function randomSeed(): number {
  return randomInt(0, 0x1_0000_0000);
}

export function isSeed(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xffff_ffff;
}
