export const ELLIPSIS = '...';

export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

/**
 * Keep the first `limit` words and append an ellipsis token. Text already
 * within the limit is returned untouched.
 */
export function trimWords(text: string, limit: number): string {
  const words = splitWords(text);
  if (words.length <= limit) return text;
  return [...words.slice(0, limit), ELLIPSIS].join(' ');
}

/** Length in code points, so astral characters such as emoji count once. */
export function displayLength(text: string): number {
  return [...text].length;
}

/**
 * Greedy word wrap. Words are never split: one longer than `width` sits
 * alone on its line.
 */
export function wrapWords(text: string, width: number): string[] {
  const lines: string[] = [];
  let current = '';
  let currentLength = 0;

  for (const word of splitWords(text)) {
    const wordLength = displayLength(word);
    if (!current) {
      current = word;
      currentLength = wordLength;
    } else if (currentLength + 1 + wordLength <= width) {
      current += ` ${word}`;
      currentLength += 1 + wordLength;
    } else {
      lines.push(current);
      current = word;
      currentLength = wordLength;
    }
  }
  if (current) lines.push(current);

  return lines;
}
