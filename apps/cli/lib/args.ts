export const CLI_MODES = ["convert", "validate", "reorder", "revert"] as const;

export type CliMode = (typeof CLI_MODES)[number];

export interface CliArgs {
  mode: CliMode;
  file: boolean;
  text?: string;
  configPath?: string;
}

export type CliArgsParseResult = { ok: true; args: CliArgs } | { ok: false; error: string };

export const USAGE =
  "Usage: betacode [--file] [--mode=convert|validate|reorder|revert] [--config=/path/cli.json] <text|path>";

function isCliMode(value: string): value is CliMode {
  return CLI_MODES.some((mode) => mode === value);
}

export function parseCliArgs(argv: string[]): CliArgsParseResult {
  const args: CliArgs = { mode: "convert", file: false };

  for (const arg of argv) {
    if (arg === "--file" || arg === "-f") {
      args.file = true;
      continue;
    }

    if (arg.startsWith("--mode=")) {
      const mode = arg.replace("--mode=", "");
      if (!isCliMode(mode)) {
        return { ok: false, error: `Unknown mode: ${mode}. Expected one of ${CLI_MODES.join(", ")}.` };
      }
      args.mode = mode;
      continue;
    }

    if (arg.startsWith("--config=")) {
      const configPath = arg.replace("--config=", "").trim();
      if (!configPath) {
        return { ok: false, error: "Missing value for --config." };
      }
      args.configPath = configPath;
      continue;
    }

    if (arg.startsWith("-") && arg.length > 1) {
      return { ok: false, error: `Unknown option: ${arg}` };
    }

    if (args.text !== undefined) {
      return { ok: false, error: "Expected a single text or path argument." };
    }
    args.text = arg;
  }

  return { ok: true, args };
}
