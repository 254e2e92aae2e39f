import type { ValidationError, ValidationErrorType, ValidationResult } from "./types.js";
import { diacriticMarkers, firstDisorderIndex } from "./normalizer.js";
import { scan } from "./scanner.js";
import { codePoints, isAscii } from "./unicode.js";

/** Reporting order when several categories are violated at once. */
export const VALIDATION_PRECEDENCE: readonly ValidationErrorType[] = [
  "NOT_ASCII",
  "INVALID_DIACRITIC_ORDER",
  "INVALID_CHARS",
];

export function findNonAsciiChars(input: string): string[] {
  return codePoints(input).filter((ch) => !isAscii(ch));
}

export function findInvalidChars(input: string): string[] {
  const invalid: string[] = [];
  for (const token of scan(input)) {
    if (token.kind === "unknown" && isAscii(token.source)) {
      invalid.push(token.source);
    }
  }
  return invalid;
}

export function findUnorderedDiacritics(input: string): string[] {
  const sequences: string[] = [];
  for (const token of scan(input)) {
    if (token.kind !== "cluster") {
      continue;
    }
    const { diacritics } = token.cluster;
    const idx = firstDisorderIndex(diacritics);
    if (idx !== -1) {
      sequences.push(diacriticMarkers(diacritics.slice(idx - 1)));
    }
  }
  return sequences;
}

/** Runs every check and returns each violated category, in precedence order. */
export function validateAll(input: string): ValidationError[] {
  const found: Record<ValidationErrorType, ValidationError | null> = {
    NOT_ASCII: null,
    INVALID_CHARS: null,
    INVALID_DIACRITIC_ORDER: null,
  };

  const nonAscii = findNonAsciiChars(input);
  if (nonAscii.length > 0) {
    found.NOT_ASCII = { type: "NOT_ASCII", chars: nonAscii };
  }

  const invalid = findInvalidChars(input);
  if (invalid.length > 0) {
    found.INVALID_CHARS = { type: "INVALID_CHARS", chars: invalid };
  }

  const unordered = findUnorderedDiacritics(input);
  if (unordered.length > 0) {
    found.INVALID_DIACRITIC_ORDER = { type: "INVALID_DIACRITIC_ORDER", sequences: unordered };
  }

  return VALIDATION_PRECEDENCE.flatMap((type) => {
    const error = found[type];
    return error ? [error] : [];
  });
}

/**
 * Checks that the input is strict Betacode. When more than one category is
 * violated, the first in {@link VALIDATION_PRECEDENCE} is reported;
 * use {@link validateAll} for the full list.
 */
export function validate(input: string): ValidationResult {
  const [error] = validateAll(input);
  return error ? { ok: false, error } : { ok: true };
}

function quoteList(items: string[]): string {
  return `[${items.map((item) => JSON.stringify(item)).join(", ")}]`;
}

export function formatValidationError(error: ValidationError): string {
  switch (error.type) {
    case "NOT_ASCII":
      return `Non ASCII chars ${quoteList(error.chars)}`;
    case "INVALID_CHARS":
      return `Invalid characters ${quoteList(error.chars)}`;
    case "INVALID_DIACRITIC_ORDER":
      return `Invalid diacritic order ${quoteList(error.sequences)}`;
  }
}
