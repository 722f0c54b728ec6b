// Telegram rejects messages longer than this
export const TELEGRAM_MESSAGE_LIMIT = 4096;

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Splits lines into messages that each fit within the limit, breaking only
 * between lines. A single line longer than the limit is cut into pieces.
 */
export function chunkLines(lines: string[], limit: number = TELEGRAM_MESSAGE_LIMIT): string[] {
  const chunks: string[] = [];
  let current = "";

  const flush = () => {
    if (current) {
      chunks.push(current);
      current = "";
    }
  };

  for (const line of lines) {
    const candidate = current ? `${current}\n${line}` : line;
    if (candidate.length <= limit) {
      current = candidate;
      continue;
    }

    flush();
    let rest = line;
    while (rest.length > limit) {
      let cut = limit;
      if (cut > 1 && isHighSurrogate(rest.charCodeAt(cut - 1))) {
        cut--;
      }
      chunks.push(rest.slice(0, cut));
      rest = rest.slice(cut);
    }
    current = rest;
  }

  flush();
  return chunks;
}
