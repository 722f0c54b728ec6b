import { MARKERS, MARKER_KINDS, type MarkerKind } from "./schema";

const VARIATION_SELECTOR = "\uFE0F";

// Marker values are times and dates, so a captured token may only hold these characters
const MARKER_VALUE_PATTERN = /^[\d:-]+$/;

const GLYPHS = new Map<string, MarkerKind>(
  MARKER_KINDS.map((kind): [string, MarkerKind] => [MARKERS[kind], kind]),
);

/**
 * Result of splitting checklist content on marker glyphs.
 * `segments[0]` is always the text before the first glyph (possibly empty).
 */
export type TokenizedContent = {
  segments: string[];
  captures: Partial<Record<MarkerKind, string>>;
};

function isWhitespace(char: string): boolean {
  return /\s/.test(char);
}

/**
 * Splits content into free-text segments and marker captures.
 *
 * Each glyph closes the current segment. The whitespace-delimited token after it is
 * consumed only when it looks like a marker value; otherwise it stays in the text.
 * A repeated glyph overwrites the earlier capture.
 */
export function tokenizeContent(content: string): TokenizedContent {
  const chars = Array.from(content);
  const segments: string[] = [];
  const captures: Partial<Record<MarkerKind, string>> = {};

  let current = "";
  let i = 0;

  while (i < chars.length) {
    const char = chars[i];
    const kind = GLYPHS.get(char);

    if (kind === undefined) {
      current += char;
      i++;
      continue;
    }

    segments.push(current.trim());
    current = "";
    i++;

    if (chars[i] === VARIATION_SELECTOR) {
      i++;
    }

    let tokenStart = i;
    while (tokenStart < chars.length && isWhitespace(chars[tokenStart])) {
      tokenStart++;
    }

    let tokenEnd = tokenStart;
    while (
      tokenEnd < chars.length &&
      !isWhitespace(chars[tokenEnd]) &&
      !GLYPHS.has(chars[tokenEnd])
    ) {
      tokenEnd++;
    }

    const token = chars.slice(tokenStart, tokenEnd).join("");
    if (token && MARKER_VALUE_PATTERN.test(token)) {
      captures[kind] = token;
      i = tokenEnd;
    } else {
      i = tokenStart;
    }
  }

  segments.push(current.trim());

  return { segments, captures };
}
