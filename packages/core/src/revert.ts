import type { BaseLetter, Diacritic } from "./types.js";
import { BASE_LETTERS, CAPITAL_MARKER, LETTERS, LETTER_CODES, LITERALS, SYMBOLS, diacriticForCombining } from "./table.js";
import { diacriticMarkers, reorderDiacritics } from "./normalizer.js";
import { codePoints, isCombiningMark, normalizeNfd } from "./unicode.js";

interface ReverseEntry {
  code: string;
  capitalized: boolean;
  base?: BaseLetter;
}

function buildReverseTable(): Map<string, ReverseEntry> {
  const firstCode = new Map<BaseLetter, string>();
  for (const [code, base] of LETTER_CODES) {
    if (!firstCode.has(base)) {
      firstCode.set(base, code);
    }
  }

  const table = new Map<string, ReverseEntry>();
  for (const base of BASE_LETTERS) {
    const code = firstCode.get(base);
    if (!code) {
      continue;
    }
    const letter = LETTERS[base];
    table.set(letter.lower, { code, capitalized: false, base });
    if (!table.has(letter.upper)) {
      table.set(letter.upper, { code, capitalized: true, base });
    }
  }
  for (const [code, symbol] of SYMBOLS) {
    table.set(symbol.lower, { code, capitalized: false });
    table.set(symbol.upper, { code, capitalized: true });
  }
  return table;
}

const REVERSE_LETTERS = buildReverseTable();

const REVERSE_LITERALS = new Map<string, string>(
  [...LITERALS].filter(([ascii, greek]) => ascii !== greek).map(([ascii, greek]) => [greek, ascii]),
);

function sigmaCode(entry: ReverseEntry, atWordEnd: boolean): string {
  if (entry.capitalized) {
    return entry.code;
  }
  if (entry.base === "SIGMA") {
    return atWordEnd ? "s1" : "s";
  }
  if (entry.base === "FINAL_SIGMA") {
    return atWordEnd ? "s" : "s2";
  }
  return entry.code;
}

/**
 * Converts Greek text back to Betacode. Letters come out lowercase, capitals
 * as `*` + letter, and marks in canonical order after the letter. Characters
 * with no Betacode form are copied through.
 */
export function revert(input: string): string {
  const chars = codePoints(normalizeNfd(input));
  let out = "";
  let i = 0;

  while (i < chars.length) {
    const ch = chars[i] ?? "";
    const entry = REVERSE_LETTERS.get(ch);
    if (!entry) {
      out += REVERSE_LITERALS.get(ch) ?? ch;
      i += 1;
      continue;
    }

    const marks: Diacritic[] = [];
    const unmapped: string[] = [];
    let j = i + 1;
    for (let mark = chars[j]; mark !== undefined; mark = chars[j]) {
      const diacritic = diacriticForCombining(mark);
      if (diacritic) {
        marks.push(diacritic.name);
      } else if (isCombiningMark(mark)) {
        unmapped.push(mark);
      } else {
        break;
      }
      j += 1;
    }

    const next = chars[j];
    const atWordEnd = next === undefined || !REVERSE_LETTERS.has(next);
    const prefix = entry.capitalized ? CAPITAL_MARKER : "";
    out += `${prefix}${sigmaCode(entry, atWordEnd)}${diacriticMarkers(reorderDiacritics(marks))}${unmapped.join("")}`;
    i = j;
  }

  return out;
}
