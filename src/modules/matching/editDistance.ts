/**
 * Levenshtein distance between two strings, counted in Unicode code points.
 *
 * Only applied to short terms (drug and brand names), so the full
 * (a.length + 1) x (b.length + 1) table is kept.
 */
export function editDistance(a: string, b: string): number {
  if (a === b) return 0;

  const s1 = Array.from(a);
  const s2 = Array.from(b);

  if (s1.length === 0) return s2.length;
  if (s2.length === 0) return s1.length;

  const dist: number[][] = Array.from({ length: s1.length + 1 }, () =>
    new Array<number>(s2.length + 1).fill(0)
  );

  for (let i = 0; i <= s1.length; i++) dist[i][0] = i;
  for (let j = 0; j <= s2.length; j++) dist[0][j] = j;

  for (let i = 1; i <= s1.length; i++) {
    for (let j = 1; j <= s2.length; j++) {
      const cost = s1[i - 1] === s2[j - 1] ? 0 : 1;
      dist[i][j] = Math.min(
        dist[i - 1][j] + 1,        // deletion
        dist[i][j - 1] + 1,        // insertion
        dist[i - 1][j - 1] + cost  // substitution
      );
    }
  }

  return dist[s1.length][s2.length];
}
