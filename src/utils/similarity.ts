/**
 * Title similarity used by fuzzy deduplication
 */

/**
 * Indel edit distance (insertions and deletions only), so that
 * ratio() = 1 - distance / (len(a) + len(b))
 */
export function indelDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  // Longest common subsequence, one row at a time
  let previous = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    const current = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      current[j] = a[i - 1] === b[j - 1]
        ? previous[j - 1] + 1
        : Math.max(previous[j], current[j - 1]);
    }
    previous = current;
  }

  return a.length + b.length - 2 * previous[b.length];
}

/**
 * Normalized similarity in [0, 1], case-insensitive
 */
export function similarityRatio(first: string, second: string): number {
  const a = first.toLowerCase().trim();
  const b = second.toLowerCase().trim();
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (total - indelDistance(a, b)) / total;
}

/**
 * Exact match, containment, or share of common words
 */
export function overlapSimilar(first: string, second: string, threshold: number): boolean {
  const a = first.toLowerCase().trim();
  const b = second.toLowerCase().trim();

  if (a === b) return true;
  if (a.length > 0 && b.length > 0 && (a.includes(b) || b.includes(a))) return true;

  const wordsA = new Set(a.split(/\s+/).filter(w => w.length > 0));
  const wordsB = new Set(b.split(/\s+/).filter(w => w.length > 0));
  if (wordsA.size === 0 || wordsB.size === 0) return false;

  let common = 0;
  for (const word of wordsA) {
    if (wordsB.has(word)) common++;
  }
  return common / Math.max(wordsA.size, wordsB.size) >= threshold;
}
