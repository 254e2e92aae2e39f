export type BaseLetter =
  | "ALPHA"
  | "BETA"
  | "GAMMA"
  | "DELTA"
  | "EPSILON"
  | "DIGAMMA"
  | "ZETA"
  | "ETA"
  | "THETA"
  | "IOTA"
  | "KAPPA"
  | "LAMBDA"
  | "MU"
  | "NU"
  | "XI"
  | "OMICRON"
  | "PI"
  | "RHO"
  | "SIGMA"
  | "FINAL_SIGMA"
  | "LUNATE_SIGMA"
  | "TAU"
  | "UPSILON"
  | "PHI"
  | "CHI"
  | "PSI"
  | "OMEGA";

export type Diacritic =
  | "SMOOTH_BREATHING"
  | "ROUGH_BREATHING"
  | "DIAERESIS"
  | "ACUTE"
  | "GRAVE"
  | "CIRCUMFLEX"
  | "IOTA_SUBSCRIPT"
  | "LONG_MARK"
  | "SHORT_MARK";

/** 0 length mark, 1 breathing/diaeresis, 2 accent, 3 iota subscript. */
export type OrderClass = 0 | 1 | 2 | 3;

export interface DiacriticEntry {
  name: Diacritic;
  marker: string;
  combining: string;
  orderClass: OrderClass;
}

export interface LetterEntry {
  lower: string;
  upper: string;
}

export interface Cluster {
  base: BaseLetter;
  capitalized: boolean;
  /** Diacritics in the order they were written. */
  diacritics: Diacritic[];
  /** Letter code as written, lowercased (`a`, `s`, `s3`). */
  code: string;
}

export type ScanToken =
  | { kind: "cluster"; cluster: Cluster; source: string; offset: number }
  | { kind: "symbol"; code: string; capitalized: boolean; source: string; offset: number }
  | { kind: "literal"; source: string; offset: number }
  | { kind: "unknown"; source: string; offset: number };

export type ValidationErrorType = "NOT_ASCII" | "INVALID_CHARS" | "INVALID_DIACRITIC_ORDER";

export type ValidationError =
  | { type: "NOT_ASCII"; chars: string[] }
  | { type: "INVALID_CHARS"; chars: string[] }
  | { type: "INVALID_DIACRITIC_ORDER"; sequences: string[] };

export type ValidationResult = { ok: true } | { ok: false; error: ValidationError };
