import path from "node:path";

const SEPARATORS = /[\s_\-.,()[\]{}]+/g;

/** Lowercased filename stem with separators stripped: "IMG_001 (2).JPG" -> "img0012". */
export function normalizeName(filePath: string): string {
  const base = path.basename(filePath);
  const stem = base.slice(0, base.length - path.extname(base).length);
  return stem.toLowerCase().replace(SEPARATORS, "");
}

type Match = { a: number; b: number; size: number };

function longestCommonBlock(a: string, aLo: number, aHi: number, b: string, bLo: number, bHi: number): Match {
  let best: Match = { a: aLo, b: bLo, size: 0 };
  // lengths[j] holds the length of the common run ending at a[i-1], b[j-1]
  let prev = new Array<number>(bHi - bLo + 1).fill(0);

  for (let i = aLo; i < aHi; i++) {
    const curr = new Array<number>(bHi - bLo + 1).fill(0);
    for (let j = bLo; j < bHi; j++) {
      if (a[i] !== b[j]) continue;
      const k = prev[j - bLo] + 1;
      curr[j - bLo + 1] = k;
      if (k > best.size) best = { a: i - k + 1, b: j - k + 1, size: k };
    }
    prev = curr;
  }
  return best;
}

function matchingCharacters(a: string, aLo: number, aHi: number, b: string, bLo: number, bHi: number): number {
  if (aLo >= aHi || bLo >= bHi) return 0;
  const m = longestCommonBlock(a, aLo, aHi, b, bLo, bHi);
  if (m.size === 0) return 0;
  return (
    m.size +
    matchingCharacters(a, aLo, m.a, b, bLo, m.b) +
    matchingCharacters(a, m.a + m.size, aHi, b, m.b + m.size, bHi)
  );
}

/**
 * Ratcliff/Obershelp ratio: 2*M / (|a| + |b|) where M counts characters in
 * the recursively found longest common blocks. Two empty names score 1.
 */
export function nameSimilarity(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * matchingCharacters(a, 0, a.length, b, 0, b.length)) / total;
}
