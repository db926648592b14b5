/**
 * Sequence similarity (Ratcliff/Obershelp "gestalt pattern matching")
 */

interface Match {
  aStart: number;
  bStart: number;
  size: number;
}

/**
 * Longest common substring of a[aLo, aHi) and b[bLo, bHi).
 * Ties go to the earliest start in `a`, then the earliest start in `b`.
 */
function longestMatch(
  a: string,
  aLo: number,
  aHi: number,
  b: string,
  bLo: number,
  bHi: number
): Match {
  let best: Match = { aStart: aLo, bStart: bLo, size: 0 };
  // lengths[j] = length of the common run ending at a[i - 1], b[j - 1]
  let previous = new Array<number>(bHi - bLo + 1).fill(0);

  for (let i = aLo; i < aHi; i++) {
    const current = new Array<number>(bHi - bLo + 1).fill(0);
    for (let j = bLo; j < bHi; j++) {
      if (a[i] !== b[j]) continue;
      const size = (previous[j - bLo] ?? 0) + 1;
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
 * Total size of all matching blocks between two strings
 */
export function matchingCharacters(a: string, b: string): number {
  let total = 0;
  const pending: [number, number, number, number][] = [
    [0, a.length, 0, b.length],
  ];

  while (pending.length > 0) {
    const range = pending.pop();
    if (range === undefined) break;
    const [aLo, aHi, bLo, bHi] = range;

    const match = longestMatch(a, aLo, aHi, b, bLo, bHi);
    if (match.size === 0) continue;

    total += match.size;
    if (aLo < match.aStart && bLo < match.bStart) {
      pending.push([aLo, match.aStart, bLo, match.bStart]);
    }
    const aEnd = match.aStart + match.size;
    const bEnd = match.bStart + match.size;
    if (aEnd < aHi && bEnd < bHi) {
      pending.push([aEnd, aHi, bEnd, bHi]);
    }
  }

  return total;
}

/**
 * Similarity ratio in [0, 1]: 2 * matches / (len(a) + len(b)).
 * Two empty strings are identical (1.0).
 */
export function sequenceRatio(a: string, b: string): number {
  const length = a.length + b.length;
  if (length === 0) return 1;
  return (2 * matchingCharacters(a, b)) / length;
}
