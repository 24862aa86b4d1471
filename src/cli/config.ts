/**
 * CLI configuration.
 *
 * Sources, lowest precedence first: `tg-schema.json` in the working
 * directory, then `TG_SCHEMA_*` environment variables. Command-line flags are
 * applied on top by the commands themselves.
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";

export const CONFIG_FILE = "tg-schema.json";

const configSchema = z
  .object({
    strict: z.boolean().optional().describe("Reject unknown fields and unrecognized enum values"),
    defaultType: z
      .string()
      .min(1)
      .optional()
      .describe("Type used for fixtures whose name matches no method or type (e.g. Update)"),
    fixtures: z.string().min(1).optional().describe("Fixture directory checked when `check` is given none"),
  })
  .strict();

export type Config = z.infer<typeof configSchema>;

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/** Accepts 1/0, true/false, yes/no. */
function parseFlag(name: string, raw: string): boolean {
  switch (raw.trim().toLowerCase()) {
    case "1":
    case "true":
    case "yes":
      return true;
    case "0":
    case "false":
    case "no":
      return false;
    default:
      throw new ConfigError(`${name} must be true or false, got "${raw}"`);
  }
}

/** Read and validate the config file. A missing file is an empty config. */
export function readConfigFile(cwd: string): Config {
  const path = join(cwd, CONFIG_FILE);
  if (!existsSync(path)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigError(`${CONFIG_FILE} is not valid JSON`, { cause: err });
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`);
    throw new ConfigError(`${CONFIG_FILE} is invalid: ${issues.join("; ")}`);
  }
  return parsed.data;
}

/**
 * Effective configuration for a working directory.
 * @throws ConfigError on an unreadable file or a bad environment value
 */
export function loadConfig(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): Config {
  const config: Config = { ...readConfigFile(cwd) };

  const strict = env["TG_SCHEMA_STRICT"];
  if (strict !== undefined && strict !== "") {
    config.strict = parseFlag("TG_SCHEMA_STRICT", strict);
  }

  const defaultType = env["TG_SCHEMA_DEFAULT_TYPE"];
  if (defaultType !== undefined && defaultType !== "") {
    config.defaultType = defaultType;
  }

  return config;
}
