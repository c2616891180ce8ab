const A = "A".charCodeAt(0);

/**
 * Convert a number to a letter sequence like a column name in a spreadsheet,
 * but 0-based: 0 is "A", 25 is "Z", 26 is "AA".
 */
export default function alphabetic(n: number): string {
  let digits = 1;
  for (let block = 26; n >= block; block *= 26) {
    n -= block;
    digits++;
  }
  const letters: string[] = [];
  for (; digits > 0; digits--) {
    letters.unshift(String.fromCharCode(A + n % 26));
    n = Math.floor(n / 26);
  }
  return letters.join("");
}
