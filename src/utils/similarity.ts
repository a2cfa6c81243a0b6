/**
 * Similarity on a 0..100 scale, `200 * lcs / (len(a) + len(b))` rounded.
 * Case-sensitive; callers normalize when they need to.
 */
export const ratio = (left: string, right: string): number => {
  if (left === right) return 100;
  if (!left.length || !right.length) return 0;
  return Math.round((200 * longestCommonSubsequence(left, right)) / (left.length + right.length));
};

/** Best `ratio` of the shorter string against every same-length window of the longer one. */
export const partialRatio = (left: string, right: string): number => {
  if (left === right) return 100;
  if (!left.length || !right.length) return 0;

  const [shorter, longer] = left.length <= right.length ? [left, right] : [right, left];
  let best = 0;
  for (let start = 0; start + shorter.length <= longer.length; start += 1) {
    const score = ratio(shorter, longer.slice(start, start + shorter.length));
    if (score > best) {
      best = score;
      if (best === 100) break;
    }
  }
  return best;
};

/** Stable sort, highest score first. */
export function rankBy<T>(items: readonly T[], score: (item: T) => number): T[] {
  return items
    .map((item, index) => ({ item, index, score: score(item) }))
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .map((entry) => entry.item);
}

function longestCommonSubsequence(left: string, right: string): number {
  let previous = new Array<number>(right.length + 1).fill(0);
  let current = new Array<number>(right.length + 1).fill(0);

  for (let i = 1; i <= left.length; i += 1) {
    for (let j = 1; j <= right.length; j += 1) {
      current[j] = left[i - 1] === right[j - 1]
        ? (previous[j - 1] ?? 0) + 1
        : Math.max(previous[j] ?? 0, current[j - 1] ?? 0);
    }
    [previous, current] = [current, previous];
  }

  return previous[right.length] ?? 0;
}
