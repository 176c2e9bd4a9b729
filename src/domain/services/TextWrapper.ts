/** Length of `text` in Unicode characters. */
export function textLength(text: string): number {
  return Array.from(text).length;
}

/** Left-justify `text` in a field of `width` characters. Text already wider than `width` is left untouched. */
export function padCell(text: string, width: number): string {
  const padding = width - textLength(text);
  return padding > 0 ? text + ' '.repeat(padding) : text;
}

function isSpace(chunk: readonly string[] | undefined): boolean {
  return chunk?.[0] === ' ';
}

/**
 * Greedy word wrap of `text` to segments of at most `width` characters.
 *
 * Every whitespace character becomes a space, and runs of spaces inside a
 * segment are kept. Spaces where a segment ends or starts are dropped. A word
 * longer than `width` fills the rest of the current segment and is split
 * across as many following segments as it needs. Empty or whitespace-only
 * text yields one empty segment.
 */
export function wrapText(text: string, width: number): string[] {
  if (width < 1) {
    throw new RangeError(`Wrap width must be at least 1, got ${String(width)}`);
  }

  const pending = text
    .replace(/\s/g, ' ')
    .split(/( +)/)
    .filter((chunk) => chunk.length > 0)
    .map((chunk) => Array.from(chunk))
    .reverse();
  const segments: string[] = [];

  while (pending.length > 0) {
    const line: string[][] = [];
    let length = 0;

    if (isSpace(pending[pending.length - 1])) pending.pop();

    for (let chunk = pending[pending.length - 1]; chunk !== undefined; chunk = pending[pending.length - 1]) {
      if (length + chunk.length > width) break;
      line.push(chunk);
      length += chunk.length;
      pending.pop();
    }

    const next = pending[pending.length - 1];
    if (next !== undefined && !isSpace(next) && next.length > width && length < width) {
      const room = width - length;
      line.push(next.slice(0, room));
      pending[pending.length - 1] = next.slice(room);
    }

    if (isSpace(line[line.length - 1])) line.pop();
    if (line.length > 0) {
      segments.push(line.map((chunk) => chunk.join('')).join(''));
    }
  }

  return segments.length > 0 ? segments : [''];
}
