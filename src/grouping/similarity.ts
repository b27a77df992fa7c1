const PUNCTUATION = /[\p{P}$+<=>^`|~]/gu;

/** Comparison form of a description: lowercased, punctuation removed, trimmed. */
export function normalizeDescription(text: string): string {
  return text.toLowerCase().replace(PUNCTUATION, "").trim();
}

export interface MatchingBlock {
  /** Start in `a`. */
  a: number;
  /** Start in `b`. */
  b: number;
  size: number;
}

/**
 * Longest common substring of a[alo:ahi] and b[blo:bhi]. Ties go to the
 * earliest start in `a`, then the earliest start in `b`.
 */
function findLongestMatch(
  a: string[],
  alo: number,
  ahi: number,
  blo: number,
  bhi: number,
  positionsInB: Map<string, number[]>,
): MatchingBlock {
  let bestA = alo;
  let bestB = blo;
  let bestSize = 0;

  // lengths of matches ending at a[i - 1], b[j]
  let prev = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (const j of positionsInB.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const size = (prev.get(j - 1) ?? 0) + 1;
      next.set(j, size);
      if (size > bestSize) {
        bestA = i - size + 1;
        bestB = j - size + 1;
        bestSize = size;
      }
    }
    prev = next;
  }

  return { a: bestA, b: bestB, size: bestSize };
}

/**
 * Non-overlapping blocks common to both sequences, found by taking the
 * longest match and recursing on the pieces to its left and right. Returned
 * in ascending order.
 */
export function matchingBlocks(left: string, right: string): MatchingBlock[] {
  const a = Array.from(left);
  const b = Array.from(right);

  const positionsInB = new Map<string, number[]>();
  b.forEach((ch, j) => {
    const positions = positionsInB.get(ch);
    if (positions) positions.push(j);
    else positionsInB.set(ch, [j]);
  });

  const blocks: MatchingBlock[] = [];
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (queue.length > 0) {
    const range = queue.pop();
    if (!range) break;
    const [alo, ahi, blo, bhi] = range;

    const match = findLongestMatch(a, alo, ahi, blo, bhi, positionsInB);
    if (match.size === 0) continue;

    blocks.push(match);
    if (alo < match.a && blo < match.b) {
      queue.push([alo, match.a, blo, match.b]);
    }
    if (match.a + match.size < ahi && match.b + match.size < bhi) {
      queue.push([match.a + match.size, ahi, match.b + match.size, bhi]);
    }
  }

  return blocks.sort((x, y) => x.a - y.a || x.b - y.b);
}

/**
 * `2 * M / T` where M is the total size of the matching blocks and T the
 * combined length of both strings. Two empty strings are identical (1.0).
 */
export function similarityRatio(left: string, right: string): number {
  const total = Array.from(left).length + Array.from(right).length;
  if (total === 0) return 1;

  const matches = matchingBlocks(left, right).reduce((sum, block) => sum + block.size, 0);
  return (2 * matches) / total;
}
