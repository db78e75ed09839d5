/**
 * Exact bipartite matching between two sequences.
 *
 * Used to pair inline schemas, which have no stable key, before any diff is
 * classified. The matching knows nothing about diffs: it only pairs equal elements.
 */

export interface Matching {
  /** [leftIndex, rightIndex] pairs, in left order */
  pairs: Array<[number, number]>;
  unmatchedLeft: number[];
  unmatchedRight: number[];
}

/**
 * Pair every left element with the first still-unmatched right element it equals.
 * With an equivalence relation for `equals` this greedy pass finds a maximum matching.
 */
export function matchExact<T>(
  left: readonly T[],
  right: readonly T[],
  equals: (a: T, b: T) => boolean
): Matching {
  const matchedRight = new Set<number>();
  const pairs: Array<[number, number]> = [];
  const unmatchedLeft: number[] = [];

  left.forEach((item, i) => {
    const j = right.findIndex((candidate, index) => !matchedRight.has(index) && equals(item, candidate));
    if (j === -1) {
      unmatchedLeft.push(i);
    } else {
      matchedRight.add(j);
      pairs.push([i, j]);
    }
  });

  const unmatchedRight = right.map((_, j) => j).filter((j) => !matchedRight.has(j));

  return { pairs, unmatchedLeft, unmatchedRight };
}
