/**
 * String Similarity
 *
 * Ratcliff/Obershelp "gestalt" matching: the ratio 2*M / (|a| + |b|),
 * where M counts the characters in the longest common block and,
 * recursively, in the longest common blocks to its left and right.
 * Case-sensitive and deterministic.
 */

interface Block {
  aStart: number;
  bStart: number;
  size: number;
}

/**
 * Longest common substring of a[aLo, aHi) and b[bLo, bHi).
 * Ties go to the block starting earliest in a, then earliest in b.
 */
function longestMatch(a: string, b: string, aLo: number, aHi: number, bLo: number, bHi: number): Block {
  let best: Block = { aStart: aLo, bStart: bLo, size: 0 };
  // previous[k] = length of the common suffix ending at a[i - 1], b[bLo + k - 1]
  let previous = new Array<number>(bHi - bLo + 1).fill(0);

  for (let i = aLo; i < aHi; i++) {
    const current = new Array<number>(bHi - bLo + 1).fill(0);
    for (let j = bLo; j < bHi; j++) {
      if (a[i] !== b[j]) continue;

      const size = previous[j - bLo] + 1;
      current[j - bLo + 1] = size;
      if (size > best.size) {
        best = { aStart: i - size + 1, bStart: j - size + 1, size };
      }
    }
    previous = current;
  }

  return best;
}

/**
 * Total size of all matching blocks between a and b
 */
export function matchingCharacters(a: string, b: string): number {
  let total = 0;
  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (pending.length > 0) {
    const next = pending.pop();
    if (!next) break;
    const [aLo, aHi, bLo, bHi] = next;

    const block = longestMatch(a, b, aLo, aHi, bLo, bHi);
    if (block.size === 0) continue;

    total += block.size;
    if (aLo < block.aStart && bLo < block.bStart) {
      pending.push([aLo, block.aStart, bLo, block.bStart]);
    }
    if (block.aStart + block.size < aHi && block.bStart + block.size < bHi) {
      pending.push([block.aStart + block.size, aHi, block.bStart + block.size, bHi]);
    }
  }

  return total;
}

function ratioOf(matches: number, a: string, b: string): number {
  const length = a.length + b.length;
  return length === 0 ? 1 : (2 * matches) / length;
}

/**
 * Similarity in [0, 1]; 1 means identical
 */
export function similarity(a: string, b: string): number {
  return ratioOf(matchingCharacters(a, b), a, b);
}

/**
 * Upper bound on similarity from the lengths alone
 */
export function lengthBound(a: string, b: string): number {
  return ratioOf(Math.min(a.length, b.length), a, b);
}

/**
 * Upper bound on similarity from the shared character multiset
 */
export function characterBound(a: string, b: string): number {
  const available = new Map<string, number>();
  for (let j = 0; j < b.length; j++) {
    available.set(b[j], (available.get(b[j]) ?? 0) + 1);
  }

  let shared = 0;
  for (let i = 0; i < a.length; i++) {
    const char = a[i];
    const count = available.get(char) ?? 0;
    if (count > 0) {
      available.set(char, count - 1);
      shared++;
    }
  }

  return ratioOf(shared, a, b);
}
