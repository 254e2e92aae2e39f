import type { BaseLetter, Cluster, ScanToken } from "./types.js";
import { LITERALS, SYMBOLS, lookupGrapheme } from "./table.js";
import { reorderDiacritics } from "./normalizer.js";
import { scanToArray } from "./scanner.js";

function isWordChar(token: ScanToken | undefined): boolean {
  return token?.kind === "cluster" || token?.kind === "symbol";
}

function resolveBase(cluster: Cluster, next: ScanToken | undefined): BaseLetter {
  // Only a bare `s` takes its form from context; `s1`..`s3` are explicit.
  if (cluster.code === "s" && !cluster.capitalized && !isWordChar(next)) {
    return "FINAL_SIGMA";
  }
  return cluster.base;
}

function renderToken(token: ScanToken, next: ScanToken | undefined): string {
  switch (token.kind) {
    case "cluster": {
      const { cluster } = token;
      const grapheme = lookupGrapheme(
        resolveBase(cluster, next),
        cluster.capitalized,
        reorderDiacritics(cluster.diacritics),
      );
      return grapheme ?? token.source;
    }
    case "symbol": {
      const symbol = SYMBOLS.get(token.code);
      if (!symbol) {
        return token.source;
      }
      return token.capitalized ? symbol.upper : symbol.lower;
    }
    case "literal":
      return LITERALS.get(token.source) ?? token.source;
    case "unknown":
      return token.source;
  }
}

/**
 * Converts Betacode to precomposed Greek. Never throws: a cluster with no table
 * entry (two marks of the same class) and any unrecognized character are copied
 * through as written. Diacritic order does not matter here.
 */
export function convert(input: string): string {
  const tokens = scanToArray(input);
  return tokens.map((token, idx) => renderToken(token, tokens[idx + 1])).join("");
}
