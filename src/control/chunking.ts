const isHighSurrogate = (code: number) => code >= 0xd800 && code <= 0xdbff;

const cutPoint = (text: string, limit: number) => {
  const window = text.slice(0, limit);

  const paragraph = window.lastIndexOf('\n\n');
  if (paragraph >= limit / 2) return paragraph + 2;

  // A line break too early in the window would leave a tiny chunk.
  const line = window.lastIndexOf('\n');
  if (line >= limit / 2) return line + 1;

  let cut = limit;
  if (isHighSurrogate(text.charCodeAt(cut - 1))) cut -= 1;
  return cut;
};

/**
 * Splits `text` into ordered chunks of at most `limit` characters. Boundary
 * newlines stay at the end of their chunk, so joining the chunks gives back
 * the original text.
 */
export const splitMessage = (text: string, limit: number): string[] => {
  if (limit < 2) {
    throw new RangeError('chunk limit must be at least 2');
  }
  if (text.length <= limit) {
    return text.length ? [text] : [];
  }

  const chunks: string[] = [];
  let rest = text;
  while (rest.length > limit) {
    const cut = cutPoint(rest, limit);
    chunks.push(rest.slice(0, cut));
    rest = rest.slice(cut);
  }
  if (rest.length) chunks.push(rest);
  return chunks;
};
