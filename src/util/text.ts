// src/util/text.ts
// What: Fixed-width string cutting that never separates a UTF-16 surrogate pair.

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff;

/** End index for a cut of at most `max` code units starting at `start`, moved back off a dangling high surrogate. */
function safeEnd(text: string, start: number, max: number): number {
  const end = Math.min(start + max, text.length);
  if (end < text.length && end - 1 > start && isHighSurrogate(text.charCodeAt(end - 1))) {
    return end - 1;
  }
  return end;
}

/** Splits text into consecutive pieces of at most `max` code units. */
export function splitFixed(text: string, max: number): string[] {
  const out: string[] = [];
  let start = 0;
  while (start < text.length) {
    const end = safeEnd(text, start, max);
    out.push(text.slice(start, end));
    start = end;
  }
  return out;
}

/** Leading part of text, at most `max` code units long. */
export function truncate(text: string, max: number): string {
  return text.slice(0, safeEnd(text, 0, max));
}
