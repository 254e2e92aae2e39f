export const NON_ASCII_RE = /[^\u0000-\u007F]/u;
export const COMBINING_MARK_RE = /\p{M}/u;

export function normalizeNfc(text: string): string {
  return text.normalize("NFC");
}

export function normalizeNfd(text: string): string {
  return text.normalize("NFD");
}

/** Splits into code points, so astral characters stay whole. */
export function codePoints(text: string): string[] {
  return Array.from(text);
}

export function isAscii(ch: string): boolean {
  return !NON_ASCII_RE.test(ch);
}

export function isCombiningMark(ch: string): boolean {
  return COMBINING_MARK_RE.test(ch);
}
