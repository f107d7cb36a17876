const PARAGRAPH_BREAK = '\n\n';
const SENTENCE_END = /[.!?](?=\s)/g;

function lastSentenceCut(window: string): number {
  let cut = -1;
  for (const match of window.matchAll(SENTENCE_END)) {
    // Keep the whitespace after the punctuation with the earlier chunk
    const end = (match.index ?? 0) + 2;
    if (end <= window.length) {
      cut = end;
    }
  }
  return cut;
}

function findCut(window: string): number {
  const paragraph = window.lastIndexOf(PARAGRAPH_BREAK);
  if (paragraph > 0) {
    return paragraph + PARAGRAPH_BREAK.length;
  }

  const line = window.lastIndexOf('\n');
  if (line > 0) {
    return line + 1;
  }

  const sentence = lastSentenceCut(window);
  if (sentence > 0) {
    return sentence;
  }

  // Hard cut; never separate a surrogate pair
  const code = window.charCodeAt(window.length - 1);
  return code >= 0xd800 && code <= 0xdbff && window.length > 1 ? window.length - 1 : window.length;
}

/**
 * Splits text into ordered chunks of at most `limit` characters, cutting at
 * a paragraph break, then a line break, then a sentence end, and only then
 * mid-text. Separators stay with the preceding chunk, so `chunks.join('')`
 * is the original text.
 */
export function splitMessage(text: string, limit: number): string[] {
  if (!Number.isInteger(limit) || limit < 2) {
    throw new RangeError(`Message limit must be an integer of at least 2, got ${limit}`);
  }
  if (text.length === 0) {
    return [];
  }

  const chunks: string[] = [];
  let remaining = text;

  while (remaining.length > limit) {
    const cut = findCut(remaining.slice(0, limit));
    chunks.push(remaining.slice(0, cut));
    remaining = remaining.slice(cut);
  }
  chunks.push(remaining);

  return chunks;
}
