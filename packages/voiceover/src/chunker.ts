/**
 * Split text into chunks of at most `maxChars` characters, breaking after the
 * last period in each window. A window without a period breaks at its last
 * space, or hard at `maxChars`.
 */
export function chunkText(text: string, maxChars: number): string[] {
  if (maxChars < 1) {
    throw new RangeError(`maxChars must be at least 1, got ${maxChars}`);
  }

  const chunks: string[] = [];
  let pos = 0;

  while (pos < text.length) {
    while (text[pos] === ' ') pos++;
    if (pos >= text.length) break;

    const remaining = text.length - pos;
    let end: number;

    if (remaining <= maxChars) {
      end = text.length;
    } else {
      const window = text.slice(pos, pos + maxChars);
      const period = window.lastIndexOf('.');
      const space = window.lastIndexOf(' ');
      if (period >= 0) {
        end = pos + period + 1;
      } else if (space > 0) {
        end = pos + space;
      } else {
        end = pos + maxChars;
      }
    }

    const chunk = text.slice(pos, end).trim();
    if (chunk) chunks.push(chunk);
    pos = end;
  }

  return chunks;
}
