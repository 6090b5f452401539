const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;
const TIME_TAG = /\[\d{1,3}:\d{1,2}(?:[.:]\d{1,3})?\]/;
const TIME_TAGS_PREFIX = /^(?:\s*\[\d{1,3}:\d{1,2}(?:[.:]\d{1,3})?\])+/;
const META_LINE = /^\s*\[(?:ti|ar|al|by|au|length|offset|re|ve|kana|total):[^\]]*\]\s*$/i;

/**
 * Lyric fields arrive base64-encoded (`nobase64=0`). Anything that does not
 * decode to clean UTF-8 is returned unchanged.
 */
export function decodeLyricField(value: string): string {
  const compact = value.replace(/\s+/g, '');
  if (!compact || compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    return decodeEntities(value);
  }
  const decoded = Buffer.from(compact, 'base64').toString('utf-8');
  if (decoded.includes('\uFFFD')) {
    return decodeEntities(value);
  }
  return decodeEntities(decoded);
}

function decodeEntities(text: string): string {
  return text
    .replace(/&#(\d+);/g, (entity: string, code: string) => fromCodePoint(Number(code), entity))
    .replace(/&#x([0-9a-f]+);/gi, (entity: string, code: string) =>
      fromCodePoint(Number.parseInt(code, 16), entity),
    )
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&amp;/g, '&');
}

// Out-of-range and surrogate code points keep their entity text
function fromCodePoint(codePoint: number, entity: string): string {
  const valid =
    Number.isInteger(codePoint) &&
    codePoint >= 0 &&
    codePoint <= 0x10ffff &&
    (codePoint < 0xd800 || codePoint > 0xdfff);
  return valid ? String.fromCodePoint(codePoint) : entity;
}

export function isTimestamped(lyric: string): boolean {
  return TIME_TAG.test(lyric);
}

/** Reduce LRC to plain lines: drop metadata tags, time tags and the blank lines they leave. */
export function stripTimestamps(lyric: string): string {
  return lyric
    .split(/\r?\n/)
    .filter((line) => !META_LINE.test(line))
    .map((line) => line.replace(TIME_TAGS_PREFIX, '').trim())
    .filter((line) => line.length > 0)
    .join('\n');
}
