import type { Cluster, Diacritic, ScanToken } from "./types.js";
import {
  CAPITAL_MARKER,
  LITERALS,
  SIGMA_VARIANT_DIGITS,
  SYMBOL_MARKER,
  SYMBOLS,
  diacriticForMarker,
  letterCodeFor,
} from "./table.js";
import { codePoints, isAscii } from "./unicode.js";

interface Collected {
  diacritics: Diacritic[];
  end: number;
}

function collectDiacritics(chars: string[], start: number): Collected {
  const diacritics: Diacritic[] = [];
  let end = start;
  for (let entry = diacriticForMarker(chars[end] ?? ""); entry; entry = diacriticForMarker(chars[end] ?? "")) {
    diacritics.push(entry.name);
    end += 1;
  }
  return { diacritics, end };
}

function readLetter(chars: string[], start: number): { code: string; end: number } | null {
  const ch = chars[start];
  if (ch === undefined || !isAscii(ch) || !letterCodeFor(ch)) {
    return null;
  }

  const code = ch.toLowerCase();
  const next = chars[start + 1];
  if (code === "s" && next !== undefined && SIGMA_VARIANT_DIGITS.has(next)) {
    return { code: `s${next}`, end: start + 2 };
  }
  return { code, end: start + 1 };
}

function readSymbol(chars: string[], start: number): { code: string; end: number } | null {
  if (chars[start] !== SYMBOL_MARKER) {
    return null;
  }
  const code = `${SYMBOL_MARKER}${chars[start + 1] ?? ""}`;
  return SYMBOLS.has(code) ? { code, end: start + 2 } : null;
}

function clusterToken(
  chars: string[],
  start: number,
  letterStart: number,
  capitalized: boolean,
  leading: Diacritic[],
): { token: ScanToken; end: number } | null {
  const letter = readLetter(chars, letterStart);
  if (!letter) {
    return null;
  }
  const base = letterCodeFor(letter.code);
  if (!base) {
    return null;
  }

  const trailing = collectDiacritics(chars, letter.end);
  const cluster: Cluster = {
    base,
    capitalized,
    diacritics: [...leading, ...trailing.diacritics],
    code: letter.code,
  };
  return {
    token: { kind: "cluster", cluster, source: chars.slice(start, trailing.end).join(""), offset: start },
    end: trailing.end,
  };
}

function* scanTokens(input: string): Generator<ScanToken> {
  const chars = codePoints(input);
  let i = 0;

  while (i < chars.length) {
    const ch = chars[i] ?? "";

    if (ch === CAPITAL_MARKER) {
      const leading = collectDiacritics(chars, i + 1);
      const capital = clusterToken(chars, i, leading.end, true, leading.diacritics);
      if (capital) {
        yield capital.token;
        i = capital.end;
        continue;
      }
      const symbol = leading.diacritics.length === 0 ? readSymbol(chars, i + 1) : null;
      if (symbol) {
        yield { kind: "symbol", code: symbol.code, capitalized: true, source: chars.slice(i, symbol.end).join(""), offset: i };
        i = symbol.end;
        continue;
      }
      yield { kind: "unknown", source: ch, offset: i };
      i += 1;
      continue;
    }

    const lower = clusterToken(chars, i, i, false, []);
    if (lower) {
      yield lower.token;
      i = lower.end;
      continue;
    }

    const symbol = readSymbol(chars, i);
    if (symbol) {
      yield { kind: "symbol", code: symbol.code, capitalized: false, source: chars.slice(i, symbol.end).join(""), offset: i };
      i = symbol.end;
      continue;
    }

    if (LITERALS.has(ch)) {
      yield { kind: "literal", source: ch, offset: i };
    } else {
      // Stray diacritic markers land here too: they cannot start a cluster.
      yield { kind: "unknown", source: ch, offset: i };
    }
    i += 1;
  }
}

/**
 * Splits Betacode into letter clusters, symbols, literals and unknown characters.
 * The result can be iterated any number of times; each pass rescans the input.
 */
export function scan(input: string): Iterable<ScanToken> {
  return {
    [Symbol.iterator]: () => scanTokens(input),
  };
}

export function scanToArray(input: string): ScanToken[] {
  return [...scan(input)];
}
