export function levenshteinDistance(a: string, b: string): number {
  let matrix: number[][] = [];
  for (let i = 0; i <= b.length; ++i) {
    matrix[i] = [i];
  }
  for (let j = 0; j <= a.length; ++j) {
    matrix[0][j] = j;
  }
  for (let i = 1; i <= b.length; ++i) {
    for (let j = 1; j <= a.length; ++j) {
      if (b.charAt(i - 1) === a.charAt(j - 1)) {
        matrix[i][j] = matrix[i - 1][j - 1];
      } else {
        matrix[i][j] = Math.min(
          matrix[i - 1][j - 1] + 1,
          matrix[i][j - 1] + 1,
          matrix[i - 1][j] + 1,
        );
      }
    }
  }
  return matrix[b.length][a.length];
}

export function similarity(a: string, b: string): number {
  let length = Math.max(a.length, b.length);
  if (length === 0) return 1;
  return 1 - levenshteinDistance(a, b) / length;
}

/**
 * Returns candidates whose similarity to the word is at least the cutoff,
 * best first. Comparison is case-insensitive.
 */
export default function closeMatches(
  word: string, candidates: string[], limit: number = 1, cutoff: number = 0.6,
): string[] {
  let target = word.toLowerCase();
  return candidates
    .map(candidate => ({
      candidate,
      score: similarity(target, candidate.toLowerCase()),
    }))
    .filter(entry => entry.score >= cutoff)
    .sort((a, b) => b.score - a.score)
    .slice(0, limit)
    .map(entry => entry.candidate);
}
