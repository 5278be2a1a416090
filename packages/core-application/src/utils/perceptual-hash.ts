import type { PerceptualAlgorithm, PerceptualHash } from "@photo-dedupe/core-domain";
import type { GreyscaleImage } from "../ports/image-decoder";

export const HASH_SIDE = 8;
export const HASH_BITS = HASH_SIDE * HASH_SIDE;
export const PHASH_SAMPLE_SIDE = 32;

/** Bitmap size each algorithm expects from the decoder. */
export function sampleSize(algorithm: PerceptualAlgorithm): { width: number; height: number } {
  switch (algorithm) {
    case "ahash":
      return { width: HASH_SIDE, height: HASH_SIDE };
    case "dhash":
      return { width: HASH_SIDE + 1, height: HASH_SIDE };
    case "phash":
      return { width: PHASH_SAMPLE_SIDE, height: PHASH_SAMPLE_SIDE };
  }
}

export function bitsToHex(bits: readonly boolean[]): string {
  let hex = "";
  for (let i = 0; i < bits.length; i += 4) {
    let nibble = 0;
    for (let j = 0; j < 4; j++) {
      nibble = (nibble << 1) | (bits[i + j] ? 1 : 0);
    }
    hex += nibble.toString(16);
  }
  return hex;
}

const NIBBLE_POPCOUNT = [0, 1, 1, 2, 1, 2, 2, 3, 1, 2, 2, 3, 2, 3, 3, 4];

export function hammingDistance(hexA: string, hexB: string): number {
  if (hexA.length !== hexB.length) {
    throw new Error(`Cannot compare hashes of different widths (${hexA.length * 4} vs ${hexB.length * 4} bits)`);
  }
  let distance = 0;
  for (let i = 0; i < hexA.length; i++) {
    const x = parseInt(hexA[i], 16) ^ parseInt(hexB[i], 16);
    distance += NIBBLE_POPCOUNT[x];
  }
  return distance;
}

function assertSize(image: GreyscaleImage, width: number, height: number) {
  if (image.width !== width || image.height !== height || image.pixels.length !== width * height) {
    throw new Error(`Expected a ${width}x${height} greyscale bitmap, got ${image.width}x${image.height}`);
  }
}

/** Average hash: a bit per pixel, set when brighter than the mean. */
export function averageHash(image: GreyscaleImage): PerceptualHash {
  assertSize(image, HASH_SIDE, HASH_SIDE);
  let sum = 0;
  for (const p of image.pixels) sum += p;
  const mean = sum / image.pixels.length;

  const bits = Array.from(image.pixels, (p) => p > mean);
  return { algorithm: "ahash", bits: HASH_BITS, hex: bitsToHex(bits) };
}

/** Difference hash: a bit per horizontal neighbour pair, set when the right one is brighter. */
export function differenceHash(image: GreyscaleImage): PerceptualHash {
  assertSize(image, HASH_SIDE + 1, HASH_SIDE);
  const bits: boolean[] = [];
  for (let y = 0; y < HASH_SIDE; y++) {
    const row = y * image.width;
    for (let x = 0; x < HASH_SIDE; x++) {
      bits.push(image.pixels[row + x + 1] > image.pixels[row + x]);
    }
  }
  return { algorithm: "dhash", bits: HASH_BITS, hex: bitsToHex(bits) };
}

function dct1d(input: Float64Array, output: Float64Array, cosTable: Float64Array) {
  const n = input.length;
  for (let k = 0; k < n; k++) {
    let sum = 0;
    for (let i = 0; i < n; i++) sum += input[i] * cosTable[k * n + i];
    output[k] = sum;
  }
}

function buildCosTable(n: number): Float64Array {
  const table = new Float64Array(n * n);
  for (let k = 0; k < n; k++) {
    for (let i = 0; i < n; i++) {
      table[k * n + i] = Math.cos((Math.PI * k * (2 * i + 1)) / (2 * n));
    }
  }
  return table;
}

const COS_TABLE = buildCosTable(PHASH_SAMPLE_SIDE);

/** Unnormalized 2-D DCT-II (rows, then columns). */
export function dct2d(pixels: ArrayLike<number>, side: number): Float64Array {
  const table = side === PHASH_SAMPLE_SIDE ? COS_TABLE : buildCosTable(side);
  const rows = new Float64Array(side * side);
  const rowIn = new Float64Array(side);
  const rowOut = new Float64Array(side);

  for (let y = 0; y < side; y++) {
    for (let x = 0; x < side; x++) rowIn[x] = pixels[y * side + x];
    dct1d(rowIn, rowOut, table);
    rows.set(rowOut, y * side);
  }

  const out = new Float64Array(side * side);
  for (let x = 0; x < side; x++) {
    for (let y = 0; y < side; y++) rowIn[y] = rows[y * side + x];
    dct1d(rowIn, rowOut, table);
    for (let y = 0; y < side; y++) out[y * side + x] = rowOut[y];
  }
  return out;
}

function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = sorted.length >> 1;
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/** DCT hash: low-frequency 8x8 block of a 32x32 DCT, set when above the block median. */
export function dctHash(image: GreyscaleImage): PerceptualHash {
  assertSize(image, PHASH_SAMPLE_SIDE, PHASH_SAMPLE_SIDE);
  const coefficients = dct2d(image.pixels, PHASH_SAMPLE_SIDE);

  const lowFreq: number[] = [];
  for (let y = 0; y < HASH_SIDE; y++) {
    for (let x = 0; x < HASH_SIDE; x++) lowFreq.push(coefficients[y * PHASH_SAMPLE_SIDE + x]);
  }
  const med = median(lowFreq);

  return { algorithm: "phash", bits: HASH_BITS, hex: bitsToHex(lowFreq.map((c) => c > med)) };
}

export function computePerceptualHash(algorithm: PerceptualAlgorithm, image: GreyscaleImage): PerceptualHash {
  switch (algorithm) {
    case "ahash":
      return averageHash(image);
    case "dhash":
      return differenceHash(image);
    case "phash":
      return dctHash(image);
  }
}

/**
 * Similarity over the algorithms both sides carry: one minus the mean
 * normalized Hamming distance. Null when they share no algorithm.
 */
export function perceptualSimilarity(a: readonly PerceptualHash[], b: readonly PerceptualHash[]): number | null {
  let total = 0;
  let shared = 0;
  for (const ha of a) {
    const hb = b.find((h) => h.algorithm === ha.algorithm && h.bits === ha.bits);
    if (!hb) continue;
    total += hammingDistance(ha.hex, hb.hex) / ha.bits;
    shared++;
  }
  if (shared === 0) return null;
  return 1 - total / shared;
}
