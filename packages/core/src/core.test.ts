import { describe, expect, it } from "vitest";
import {
  MAPPING_TABLE,
  canonicalCombinations,
  convert,
  isCanonicalOrder,
  reorderBetacode,
  reorderDiacritics,
  scan,
} from "./index.js";

const ILIAD_BETACODE = "mh=nin a)/eide qea\\ *phlhi+a/dew *a)xilh=os";
const ILIAD_GREEK = "μῆνιν ἄειδε θεὰ Πηληϊάδεω Ἀχιλῆος".normalize("NFC");

describe("core scanner", () => {
  it("splits capitals, letters and their diacritics into clusters", () => {
    const tokens = [...scan("*a)b")];
    expect(tokens).toEqual([
      {
        kind: "cluster",
        cluster: { base: "ALPHA", capitalized: true, diacritics: ["SMOOTH_BREATHING"], code: "a" },
        source: "*a)",
        offset: 0,
      },
      {
        kind: "cluster",
        cluster: { base: "BETA", capitalized: false, diacritics: [], code: "b" },
        source: "b",
        offset: 3,
      },
    ]);
  });

  it("can be iterated more than once", () => {
    const tokens = scan("h\\( a");
    expect([...tokens]).toEqual([...tokens]);
    expect([...tokens].map((t) => t.kind)).toEqual(["cluster", "literal", "cluster"]);
  });

  it("keeps diacritics written between the capital marker and the letter", () => {
    const [token] = [...scan("*(/a")];
    expect(token?.kind).toBe("cluster");
    if (token?.kind === "cluster") {
      expect(token.cluster.diacritics).toEqual(["ROUGH_BREATHING", "ACUTE"]);
      expect(token.source).toBe("*(/a");
    }
  });

  it("reads sigma variants and symbols", () => {
    const tokens = [...scan("s2 #3 *#1")];
    expect(tokens[0]).toMatchObject({ kind: "cluster", cluster: { base: "FINAL_SIGMA", code: "s2" } });
    expect(tokens[2]).toEqual({ kind: "symbol", code: "#3", capitalized: false, source: "#3", offset: 3 });
    expect(tokens[4]).toEqual({ kind: "symbol", code: "#1", capitalized: true, source: "*#1", offset: 6 });
  });

  it("marks stray markers and unsupported codes as unknown", () => {
    const tokens = [...scan(")#4j")];
    expect(tokens.map((t) => [t.kind, t.source])).toEqual([
      ["unknown", ")"],
      ["unknown", "#"],
      ["unknown", "4"],
      ["unknown", "j"],
    ]);
  });
});

describe("diacritic normalizer", () => {
  it("sorts marks into breathing, accent, subscript order", () => {
    expect(reorderDiacritics(["IOTA_SUBSCRIPT", "ACUTE", "SMOOTH_BREATHING"])).toEqual([
      "SMOOTH_BREATHING",
      "ACUTE",
      "IOTA_SUBSCRIPT",
    ]);
    expect(reorderDiacritics(["ACUTE", "DIAERESIS"])).toEqual(["DIAERESIS", "ACUTE"]);
  });

  it("returns canonical sequences unchanged", () => {
    const canonical = ["LONG_MARK", "ROUGH_BREATHING", "CIRCUMFLEX", "IOTA_SUBSCRIPT"] as const;
    expect(reorderDiacritics(canonical)).toEqual([...canonical]);
    expect(isCanonicalOrder(canonical)).toBe(true);
  });

  it("keeps first-seen order for two marks of one class", () => {
    expect(reorderDiacritics(["ACUTE", "ROUGH_BREATHING", "SMOOTH_BREATHING"])).toEqual([
      "ROUGH_BREATHING",
      "SMOOTH_BREATHING",
      "ACUTE",
    ]);
    expect(isCanonicalOrder(["ROUGH_BREATHING", "SMOOTH_BREATHING"])).toBe(false);
  });

  it("rewrites unordered markers in Betacode text", () => {
    expect(reorderBetacode("A/)")).toBe("A)/");
    expect(reorderBetacode("A|/)")).toBe("A)/|");
    expect(reorderBetacode("A/|)")).toBe("A)/|");
    expect(reorderBetacode("A/+")).toBe("A+/");
    expect(reorderBetacode("h\\( a/)ndra")).toBe("h(\\ a)/ndra");
    expect(reorderBetacode("*/)a 9")).toBe("*)/a 9");
    expect(reorderBetacode("*|a/)")).toBe("*)a/|");
  });
});

describe("mapping table", () => {
  it("covers every canonical combination for every letter and case", () => {
    const combos = canonicalCombinations();
    expect(combos).toHaveLength(96);
    expect(combos.every((combo) => isCanonicalOrder(combo))).toBe(true);
    expect(MAPPING_TABLE.size).toBe(27 * 2 * 96);
  });
});

describe("converter", () => {
  it("converts the opening of the Iliad", () => {
    expect(convert(ILIAD_BETACODE)).toBe(ILIAD_GREEK);
  });

  it("converts regardless of diacritic order", () => {
    expect(convert("mh=nin a/)eide qea\\ *phlhi+a/dew *a)xilh=os")).toBe(ILIAD_GREEK);
  });

  it("composes stacked diacritics into one code point", () => {
    expect(convert("a)")).toBe("ἀ");
    expect(convert("a)/")).toBe("ἄ");
    expect(convert("a)/|")).toBe("ᾄ");
    expect(convert("a)=|")).toBe("ᾆ");
    expect(convert("r(")).toBe("ῥ");
    expect(convert("a_ i^")).toBe("ᾱ ῐ");
    expect(convert("*(/a")).toBe("Ἅ");
  });

  it("maps every letter code and ignores ASCII case", () => {
    expect(convert("abcdefghiklmnopqrstuvwxyz")).toBe("αβξδεφγηικλμνοπθρστυϝωχψζ");
    expect(convert("ABCDEFGHIKLMNOPQRSTUVWXYZ")).toBe("αβξδεφγηικλμνοπθρστυϝωχψζ");
    expect(convert("*a*b*g*s*w")).toBe("ΑΒΓΣΩ");
  });

  it("chooses the final sigma at word ends", () => {
    expect(convert("lo/gos kai\\ lo/gos.")).toBe("λόγος καὶ λόγος.".normalize("NFC"));
    expect(convert("s1")).toBe("σ");
    expect(convert("s2a")).toBe("ςα");
    expect(convert("s3 *s3")).toBe("ϲ Ϲ");
  });

  it("renders symbols and punctuation", () => {
    expect(convert("#1 *#1 #5")).toBe("ϟ Ϟ ϡ");
    expect(convert("a: b'")).toBe("α· β'");
    expect(convert("a)ll' e)gw")).toBe("ἀλλ' ἐγω");
  });

  it("passes through what it cannot convert", () => {
    expect(convert("a)( 9")).toBe("a)( 9");
    expect(convert(") a")).toBe(") α");
    expect(convert("a ἄ")).toBe("α ἄ");
    expect(convert("a\u0301")).toBe("α\u0301");
    expect(convert("")).toBe("");
  });
});
