import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

const validationTypeSchema = z.enum(["NOT_ASCII", "INVALID_CHARS", "INVALID_DIACRITIC_ORDER"]);

export const cliConfigSchema = z.object({
  rejectOn: z.array(validationTypeSchema).default(["NOT_ASCII", "INVALID_CHARS"]),
  outputNormalization: z.enum(["NFC", "NFKC"]).default("NFC"),
  reportAll: z.boolean().default(false),
});

export type CliConfig = z.infer<typeof cliConfigSchema>;

function resolveProjectRoot(): string {
  const cwd = process.cwd();
  const cliSuffix = `${path.sep}apps${path.sep}cli`;
  if (cwd.endsWith(cliSuffix)) {
    return path.resolve(cwd, "../..");
  }
  return cwd;
}

export function defaultConfigPath(): string {
  return path.join(resolveProjectRoot(), "config", "cli.json");
}

/**
 * Reads the CLI config. The default file may be absent, in which case the
 * schema defaults apply; a file named explicitly must exist.
 */
export function loadCliConfig(file?: string): CliConfig {
  const target = file ?? defaultConfigPath();
  if (!fs.existsSync(target)) {
    if (file) {
      throw new Error(`Config file not found: ${file}`);
    }
    return cliConfigSchema.parse({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(target, "utf8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid config ${target}: ${message}`);
  }

  const parsed = cliConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid config ${target}: ${details}`);
  }
  return parsed.data;
}
