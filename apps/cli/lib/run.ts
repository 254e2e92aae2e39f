import fs from "node:fs";
import {
  convert,
  formatValidationError,
  reorderBetacode,
  revert,
  validateAll,
  type ValidationError,
  type ValidationErrorType,
} from "@betacode/core";
import { USAGE, parseCliArgs } from "./args.js";
import { loadCliConfig, type CliConfig } from "./config.js";

export interface CliIo {
  readFile: (file: string) => string;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

export const defaultIo: CliIo = {
  readFile: (file) => fs.readFileSync(file, "utf8"),
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

const REJECTION_MESSAGES: Record<ValidationErrorType, string> = {
  NOT_ASCII: "Text passed is not in ASCII.",
  INVALID_CHARS: "Text passed violates ASCII Betacode standards as applied here.",
  INVALID_DIACRITIC_ORDER: "Text passed has diacritics out of order.",
};

function reportErrors(errors: ValidationError[], config: CliConfig, io: CliIo, withHeadline: boolean): void {
  const shown = config.reportAll ? errors : errors.slice(0, 1);
  for (const error of shown) {
    if (withHeadline) {
      io.stderr(REJECTION_MESSAGES[error.type]);
    }
    io.stderr(formatValidationError(error));
  }
  io.stdout(JSON.stringify({ event: "validation_failed", categories: errors.map((error) => error.type) }));
}

function readInput(text: string, fromFile: boolean, io: CliIo): string {
  if (!fromFile) {
    return text;
  }
  return io.readFile(text).replace(/\r?\n$/, "");
}

export function runCli(argv: string[], io: CliIo = defaultIo, loadConfig = loadCliConfig): number {
  const parsed = parseCliArgs(argv);
  if (!parsed.ok) {
    io.stderr(parsed.error);
    io.stderr(USAGE);
    return 1;
  }
  const { args } = parsed;

  try {
    const config = loadConfig(args.configPath);
    const input = args.text ? readInput(args.text, args.file, io) : "";
    if (!input) {
      io.stderr("Empty string");
      return 1;
    }

    switch (args.mode) {
      case "validate": {
        const errors = validateAll(input);
        if (errors.length === 0) {
          io.stdout("OK");
          return 0;
        }
        reportErrors(errors, config, io, false);
        return 1;
      }
      case "reorder":
        io.stdout(reorderBetacode(input));
        return 0;
      case "revert":
        io.stdout(revert(input));
        return 0;
      case "convert": {
        const blocking = validateAll(input).filter((error) => config.rejectOn.includes(error.type));
        if (blocking.length > 0) {
          reportErrors(blocking, config, io, true);
          return 1;
        }
        io.stdout(convert(input).normalize(config.outputNormalization));
        return 0;
      }
    }
  } catch (error) {
    io.stderr(error instanceof Error ? error.message : String(error));
    return 1;
  }
}
