function codePointLength(value: string): number {
  return Array.from(value).length;
}

function splitLongWord(word: string, maxLength: number): string[] {
  const points = Array.from(word);
  const pieces: string[] = [];
  for (let index = 0; index < points.length; index += maxLength) {
    pieces.push(points.slice(index, index + maxLength).join(""));
  }
  return pieces;
}

/**
 * Greedy word wrap counting code points, so CJK and emoji are measured the
 * way they are displayed. Words longer than a line are split.
 */
export function wrapText(text: string, maxLength: number): string[] {
  if (!Number.isInteger(maxLength) || maxLength < 1) {
    throw new RangeError(`maxLength must be a positive integer, got ${maxLength}`);
  }
  const words = text.split(/\s+/).filter(Boolean);
  const lines: string[] = [];
  let current = "";

  for (const word of words) {
    const pieces = codePointLength(word) > maxLength ? splitLongWord(word, maxLength) : [word];
    for (const piece of pieces) {
      if (!current) {
        current = piece;
      } else if (codePointLength(current) + 1 + codePointLength(piece) <= maxLength) {
        current = `${current} ${piece}`;
      } else {
        lines.push(current);
        current = piece;
      }
    }
  }
  if (current) lines.push(current);
  return lines;
}
