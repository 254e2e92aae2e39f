import { describe, expect, it } from "vitest";
import { runCli, type CliIo } from "./run.js";
import { cliConfigSchema, type CliConfig } from "./config.js";

function captureIo(files: Record<string, string> = {}): CliIo & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    readFile: (file) => {
      const content = files[file];
      if (content === undefined) {
        throw new Error(`ENOENT: no such file, open '${file}'`);
      }
      return content;
    },
    stdout: (line) => out.push(line),
    stderr: (line) => err.push(line),
  };
}

function withConfig(overrides: Partial<CliConfig> = {}): () => CliConfig {
  return () => ({ ...cliConfigSchema.parse({}), ...overrides });
}

describe("runCli", () => {
  it("converts text passed as an argument", () => {
    const io = captureIo();
    expect(runCli(["a)/ndra"], io, withConfig())).toBe(0);
    expect(io.out).toEqual(["ἄνδρα"]);
    expect(io.err).toEqual([]);
  });

  it("converts unordered diacritics by default", () => {
    const io = captureIo();
    expect(runCli(["a/)ndra"], io, withConfig())).toBe(0);
    expect(io.out).toEqual(["ἄνδρα"]);
  });

  it("rejects invalid characters before converting", () => {
    const io = captureIo();
    expect(runCli(["a9"], io, withConfig())).toBe(1);
    expect(io.err).toEqual([
      "Text passed violates ASCII Betacode standards as applied here.",
      'Invalid characters ["9"]',
    ]);
    expect(io.out).toEqual(['{"event":"validation_failed","categories":["INVALID_CHARS"]}']);
  });

  it("rejects unordered diacritics when configured to", () => {
    const io = captureIo();
    expect(runCli(["a/)"], io, withConfig({ rejectOn: ["INVALID_DIACRITIC_ORDER"] }))).toBe(1);
    expect(io.err).toEqual(["Text passed has diacritics out of order.", 'Invalid diacritic order ["/)"]']);
  });

  it("reads input from a file and drops the final line break", () => {
    const io = captureIo({ "/tmp/iliad.txt": "mh=nin a)/eide\n" });
    expect(runCli(["--file", "/tmp/iliad.txt"], io, withConfig())).toBe(0);
    expect(io.out).toEqual(["μῆνιν ἄειδε".normalize("NFC")]);
  });

  it("reports unreadable files", () => {
    const io = captureIo();
    expect(runCli(["-f", "/tmp/missing.txt"], io, withConfig())).toBe(1);
    expect(io.err).toEqual(["ENOENT: no such file, open '/tmp/missing.txt'"]);
  });

  it("validates and lists every category when reportAll is set", () => {
    const io = captureIo();
    expect(runCli(["--mode=validate", "a/) 9"], io, withConfig({ reportAll: true }))).toBe(1);
    expect(io.err).toEqual(['Invalid diacritic order ["/)"]', 'Invalid characters ["9"]']);
    expect(io.out).toEqual([
      '{"event":"validation_failed","categories":["INVALID_DIACRITIC_ORDER","INVALID_CHARS"]}',
    ]);
  });

  it("prints OK for valid input in validate mode", () => {
    const io = captureIo();
    expect(runCli(["--mode=validate", "*a)xilh=os"], io, withConfig())).toBe(0);
    expect(io.out).toEqual(["OK"]);
  });

  it("reorders and reverts", () => {
    const reorderIo = captureIo();
    expect(runCli(["--mode=reorder", "h\\( a/)ndra"], reorderIo, withConfig())).toBe(0);
    expect(reorderIo.out).toEqual(["h(\\ a)/ndra"]);

    const revertIo = captureIo();
    expect(runCli(["--mode=revert", "ἄνδρα"], revertIo, withConfig())).toBe(0);
    expect(revertIo.out).toEqual(["a)/ndra"]);
  });

  it("rejects empty input and bad arguments", () => {
    const empty = captureIo();
    expect(runCli([], empty, withConfig())).toBe(1);
    expect(empty.err).toEqual(["Empty string"]);

    const badMode = captureIo();
    expect(runCli(["--mode=shout", "a"], badMode, withConfig())).toBe(1);
    expect(badMode.err[0]).toBe("Unknown mode: shout. Expected one of convert, validate, reorder, revert.");
  });

  it("reports config errors", () => {
    const io = captureIo();
    const failing = (): CliConfig => {
      throw new Error("Config file not found: /tmp/none.json");
    };
    expect(runCli(["--config=/tmp/none.json", "a"], io, failing)).toBe(1);
    expect(io.err).toEqual(["Config file not found: /tmp/none.json"]);
  });
});
