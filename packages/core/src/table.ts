import type { BaseLetter, Diacritic, DiacriticEntry, LetterEntry, OrderClass } from "./types.js";
import { normalizeNfc } from "./unicode.js";

export const CAPITAL_MARKER = "*";
export const SYMBOL_MARKER = "#";

export const LETTERS: Readonly<Record<BaseLetter, LetterEntry>> = {
  ALPHA: { lower: "α", upper: "Α" },
  BETA: { lower: "β", upper: "Β" },
  GAMMA: { lower: "γ", upper: "Γ" },
  DELTA: { lower: "δ", upper: "Δ" },
  EPSILON: { lower: "ε", upper: "Ε" },
  DIGAMMA: { lower: "ϝ", upper: "Ϝ" },
  ZETA: { lower: "ζ", upper: "Ζ" },
  ETA: { lower: "η", upper: "Η" },
  THETA: { lower: "θ", upper: "Θ" },
  IOTA: { lower: "ι", upper: "Ι" },
  KAPPA: { lower: "κ", upper: "Κ" },
  LAMBDA: { lower: "λ", upper: "Λ" },
  MU: { lower: "μ", upper: "Μ" },
  NU: { lower: "ν", upper: "Ν" },
  XI: { lower: "ξ", upper: "Ξ" },
  OMICRON: { lower: "ο", upper: "Ο" },
  PI: { lower: "π", upper: "Π" },
  RHO: { lower: "ρ", upper: "Ρ" },
  SIGMA: { lower: "σ", upper: "Σ" },
  FINAL_SIGMA: { lower: "ς", upper: "Σ" },
  LUNATE_SIGMA: { lower: "ϲ", upper: "Ϲ" },
  TAU: { lower: "τ", upper: "Τ" },
  UPSILON: { lower: "υ", upper: "Υ" },
  PHI: { lower: "φ", upper: "Φ" },
  CHI: { lower: "χ", upper: "Χ" },
  PSI: { lower: "ψ", upper: "Ψ" },
  OMEGA: { lower: "ω", upper: "Ω" },
};

export const BASE_LETTERS: readonly BaseLetter[] = [
  "ALPHA",
  "BETA",
  "GAMMA",
  "DELTA",
  "EPSILON",
  "DIGAMMA",
  "ZETA",
  "ETA",
  "THETA",
  "IOTA",
  "KAPPA",
  "LAMBDA",
  "MU",
  "NU",
  "XI",
  "OMICRON",
  "PI",
  "RHO",
  "SIGMA",
  "FINAL_SIGMA",
  "LUNATE_SIGMA",
  "TAU",
  "UPSILON",
  "PHI",
  "CHI",
  "PSI",
  "OMEGA",
];

/** Lowercase letter codes; `s1`..`s3` pick a sigma form. */
export const LETTER_CODES: ReadonlyMap<string, BaseLetter> = new Map<string, BaseLetter>([
  ["a", "ALPHA"],
  ["b", "BETA"],
  ["c", "XI"],
  ["d", "DELTA"],
  ["e", "EPSILON"],
  ["f", "PHI"],
  ["g", "GAMMA"],
  ["h", "ETA"],
  ["i", "IOTA"],
  ["k", "KAPPA"],
  ["l", "LAMBDA"],
  ["m", "MU"],
  ["n", "NU"],
  ["o", "OMICRON"],
  ["p", "PI"],
  ["q", "THETA"],
  ["r", "RHO"],
  ["s", "SIGMA"],
  ["s1", "SIGMA"],
  ["s2", "FINAL_SIGMA"],
  ["s3", "LUNATE_SIGMA"],
  ["t", "TAU"],
  ["u", "UPSILON"],
  ["v", "DIGAMMA"],
  ["w", "OMEGA"],
  ["x", "CHI"],
  ["y", "PSI"],
  ["z", "ZETA"],
]);

export const SIGMA_VARIANT_DIGITS = new Set(["1", "2", "3"]);

export const DIACRITICS: readonly DiacriticEntry[] = [
  { name: "LONG_MARK", marker: "_", combining: "\u0304", orderClass: 0 },
  { name: "SHORT_MARK", marker: "^", combining: "\u0306", orderClass: 0 },
  { name: "SMOOTH_BREATHING", marker: ")", combining: "\u0313", orderClass: 1 },
  { name: "ROUGH_BREATHING", marker: "(", combining: "\u0314", orderClass: 1 },
  { name: "DIAERESIS", marker: "+", combining: "\u0308", orderClass: 1 },
  { name: "ACUTE", marker: "/", combining: "\u0301", orderClass: 2 },
  { name: "GRAVE", marker: "\\", combining: "\u0300", orderClass: 2 },
  { name: "CIRCUMFLEX", marker: "=", combining: "\u0342", orderClass: 2 },
  { name: "IOTA_SUBSCRIPT", marker: "|", combining: "\u0345", orderClass: 3 },
];

const DIACRITIC_BY_NAME = new Map<Diacritic, DiacriticEntry>(DIACRITICS.map((entry) => [entry.name, entry]));
const DIACRITIC_BY_MARKER = new Map<string, DiacriticEntry>(DIACRITICS.map((entry) => [entry.marker, entry]));
const DIACRITIC_BY_COMBINING = new Map<string, DiacriticEntry>(DIACRITICS.map((entry) => [entry.combining, entry]));

export const SYMBOLS: ReadonlyMap<string, LetterEntry> = new Map<string, LetterEntry>([
  ["#1", { lower: "ϟ", upper: "Ϟ" }],
  ["#2", { lower: "ϛ", upper: "Ϛ" }],
  ["#3", { lower: "ϙ", upper: "Ϙ" }],
  ["#5", { lower: "ϡ", upper: "Ϡ" }],
]);

/** Punctuation and whitespace that pass through, with their Greek rendering. */
export const LITERALS: ReadonlyMap<string, string> = new Map<string, string>([
  [" ", " "],
  ["\t", "\t"],
  ["\r", "\r"],
  ["\n", "\n"],
  [".", "."],
  [",", ","],
  [";", ";"],
  [":", "·"],
  ["'", "'"],
  ["-", "-"],
]);

export function diacriticForMarker(marker: string): DiacriticEntry | undefined {
  return DIACRITIC_BY_MARKER.get(marker);
}

export function diacriticForCombining(mark: string): DiacriticEntry | undefined {
  return DIACRITIC_BY_COMBINING.get(mark);
}

export function diacriticEntry(name: Diacritic): DiacriticEntry {
  const entry = DIACRITIC_BY_NAME.get(name);
  if (!entry) {
    throw new Error(`Unknown diacritic: ${name}`);
  }
  return entry;
}

export function orderClassOf(name: Diacritic): OrderClass {
  return diacriticEntry(name).orderClass;
}

export function isDiacriticMarker(ch: string | undefined): boolean {
  return ch !== undefined && DIACRITIC_BY_MARKER.has(ch);
}

export function letterCodeFor(ch: string | undefined): BaseLetter | undefined {
  return ch === undefined ? undefined : LETTER_CODES.get(ch.toLowerCase());
}

function mappingKey(base: BaseLetter, capitalized: boolean, diacritics: readonly Diacritic[]): string {
  return `${base}:${capitalized ? "upper" : "lower"}:${diacritics.join("+")}`;
}

/** Every diacritic sequence with at most one mark per class, in class order. */
export function canonicalCombinations(): Diacritic[][] {
  const tiers: Diacritic[][] = [0, 1, 2, 3].map((cls) =>
    DIACRITICS.filter((entry) => entry.orderClass === cls).map((entry) => entry.name),
  );

  let combos: Diacritic[][] = [[]];
  for (const tier of tiers) {
    const next: Diacritic[][] = [];
    for (const combo of combos) {
      next.push(combo);
      for (const name of tier) {
        next.push([...combo, name]);
      }
    }
    combos = next;
  }
  return combos;
}

function buildMappingTable(): ReadonlyMap<string, string> {
  const table = new Map<string, string>();
  const combos = canonicalCombinations();
  for (const base of BASE_LETTERS) {
    const letter = LETTERS[base];
    for (const capitalized of [false, true]) {
      const glyph = capitalized ? letter.upper : letter.lower;
      for (const combo of combos) {
        const marks = combo.map((name) => diacriticEntry(name).combining).join("");
        table.set(mappingKey(base, capitalized, combo), normalizeNfc(`${glyph}${marks}`));
      }
    }
  }
  return table;
}

export const MAPPING_TABLE: ReadonlyMap<string, string> = buildMappingTable();

export function lookupGrapheme(
  base: BaseLetter,
  capitalized: boolean,
  diacritics: readonly Diacritic[],
): string | undefined {
  return MAPPING_TABLE.get(mappingKey(base, capitalized, diacritics));
}
