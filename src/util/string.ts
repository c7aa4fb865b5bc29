/**
 * Splits a string into its code points.
 * @param str - The input string
 * @returns One number per code point; astral characters count once
 */
export function codePoints(str: string): number[] {
  const points: number[] = [];
  for (const ch of str) {
    const code = ch.codePointAt(0);
    if (code !== undefined) {
      points.push(code);
    }
  }
  return points;
}

/**
 * Counts the code points of a string rather than its UTF-16 units.
 * @param str - The input string
 * @returns The number of code points
 */
export function codePointLength(str: string): number {
  let count = 0;
  for (const _ of str) {
    count += 1;
  }
  return count;
}
