import { MIN_COLOUR_SPREAD } from '../config/constants';

/**
 * Returns a float in [0, 1), like Math.random.
 */
export type RandomSource = () => number;

export type Rgb = {
  r: number;
  g: number;
  b: number;
};

/**
 * Deterministic generator (mulberry32) for reproducible pad colours.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * False for near-gray colours (channel spread below the threshold).
 */
export function isVividColour({ r, g, b }: Rgb): boolean {
  return Math.max(r, g, b) - Math.min(r, g, b) >= MIN_COLOUR_SPREAD;
}

/**
 * Packs a colour as opaque 0xAARRGGBB, read as a signed 32-bit integer
 * (the way TAL-Drum stores pad colours).
 */
export function toSignedArgb({ r, g, b }: Rgb): number {
  return ((0xff << 24) | (r << 16) | (g << 8) | b) | 0;
}

function randomChannel(random: RandomSource): number {
  return Math.floor(random() * 256);
}

/**
 * Draws RGB triples until one is vivid and returns it as signed ARGB.
 */
export function randomPadColour(random: RandomSource = Math.random): number {
  for (;;) {
    const rgb = {
      r: randomChannel(random),
      g: randomChannel(random),
      b: randomChannel(random),
    };
    if (isVividColour(rgb)) {
      return toSignedArgb(rgb);
    }
  }
}
