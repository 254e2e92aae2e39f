import type { Cluster, Diacritic } from "./types.js";
import { CAPITAL_MARKER, diacriticEntry, isDiacriticMarker, orderClassOf } from "./table.js";
import { scan } from "./scanner.js";
import { codePoints } from "./unicode.js";

/**
 * Returns the diacritics sorted into canonical order: length mark, breathing or
 * diaeresis, accent, iota subscript. The sort is stable, so two marks of the
 * same class keep the order they were written in.
 */
export function reorderDiacritics(diacritics: readonly Diacritic[]): Diacritic[] {
  return diacritics
    .map((name, idx) => ({ name, idx, cls: orderClassOf(name) }))
    .sort((a, b) => a.cls - b.cls || a.idx - b.idx)
    .map((item) => item.name);
}

/**
 * Index of the first mark that does not strictly follow its predecessor's class,
 * or -1 when the sequence is canonical. A repeated class counts as disorder.
 */
export function firstDisorderIndex(diacritics: readonly Diacritic[]): number {
  for (let i = 1; i < diacritics.length; i += 1) {
    const prev = diacritics[i - 1];
    const current = diacritics[i];
    if (prev !== undefined && current !== undefined && orderClassOf(current) <= orderClassOf(prev)) {
      return i;
    }
  }
  return -1;
}

export function isCanonicalOrder(diacritics: readonly Diacritic[]): boolean {
  return firstDisorderIndex(diacritics) === -1;
}

export function diacriticMarkers(diacritics: readonly Diacritic[]): string {
  return diacritics.map((name) => diacriticEntry(name).marker).join("");
}

/** Markers written between `*` and the letter stay there; only their order changes. */
function rewriteCluster(cluster: Cluster, source: string): string {
  const chars = codePoints(source);
  const body = cluster.capitalized ? chars.slice(1) : chars;
  const leading = body.findIndex((ch) => !isDiacriticMarker(ch));
  const written = body.filter((ch) => !isDiacriticMarker(ch)).join("");
  const ordered = reorderDiacritics(cluster.diacritics);
  const prefix = cluster.capitalized ? CAPITAL_MARKER : "";
  return `${prefix}${diacriticMarkers(ordered.slice(0, leading))}${written}${diacriticMarkers(ordered.slice(leading))}`;
}

/** Rewrites every cluster's markers into canonical order, leaving all other text as is. */
export function reorderBetacode(input: string): string {
  let out = "";
  for (const token of scan(input)) {
    if (token.kind === "cluster" && firstDisorderIndex(token.cluster.diacritics) !== -1) {
      out += rewriteCluster(token.cluster, token.source);
      continue;
    }
    out += token.source;
  }
  return out;
}
