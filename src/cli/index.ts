#!/usr/bin/env node
/**
 * tg-schema CLI
 *
 *   tg-schema decode [file] --type Message     → Decode one payload (stdin when no file)
 *   tg-schema decode [file] --method getMe     → Decode a full API response envelope
 *   tg-schema decode [file] --type Update --list → Decode an array, e.g. getUpdates results
 *   tg-schema check [dir]                      → Decode every fixture in a directory
 *   tg-schema check [dir] --watch              → ...and re-check on change
 *   tg-schema types                            → List registered types
 */

import { Command } from "commander";
import chalk from "chalk";
import { readFile } from "node:fs/promises";
import { createRequire } from "node:module";
import { resolve } from "node:path";
import { isTelegramMethod, TELEGRAM_METHODS } from "../telegram/methods.js";
import { telegramRegistry } from "../telegram/schema.js";
import type { TelegramTypeName } from "../telegram/types.js";
import { FixtureWatcher } from "../watcher/index.js";
import { checkFixtures, decodeTarget, findTypeName, type FixtureTarget } from "./check.js";
import { ConfigError, loadConfig, type Config } from "./config.js";
import {
  formatDecodeError,
  formatDrift,
  formatReport,
  formatSummary,
  formatTypeDefinition,
  formatValue,
} from "./formatter.js";

const _require = createRequire(import.meta.url);
const { version: VERSION } = _require("../../package.json") as { version: string };

const program = new Command();

program
  .name("tg-schema")
  .version(VERSION)
  .description("Decode and check Telegram Bot API payloads against a typed schema");

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function fail(message: string): never {
  console.error(chalk.red(`  ✗ ${message}`));
  process.exit(1);
}

function readConfig(): Config {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) fail(err.message);
    throw err;
  }
}

function typeOption(name: string | undefined, source: string): TelegramTypeName | undefined {
  if (name === undefined) return undefined;
  const type = findTypeName(name);
  if (type === undefined) fail(`Unknown type ${name} (${source}). Run tg-schema types to list them.`);
  return type;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

// ---------------------------------------------------------------------------
// tg-schema decode
// ---------------------------------------------------------------------------

interface DecodeCommandOptions {
  type?: string;
  method?: string;
  list?: boolean;
  strict?: boolean;
  json?: boolean;
}

program
  .command("decode [file]")
  .description("Decode a payload and print the typed value (reads stdin when no file is given)")
  .option("-t, --type <type>", "Type to decode as (default: config defaultType)")
  .option("-m, --method <method>", "Treat the payload as the response envelope of a Bot API method")
  .option("-l, --list", "The payload is an array of --type")
  .option("-s, --strict", "Reject unknown fields and enum values")
  .option("--json", "Print only the decoded value as JSON")
  .action(async (file: string | undefined, options: DecodeCommandOptions) => {
    const config = readConfig();
    const strict = options.strict === true || config.strict === true;

    let target: FixtureTarget;
    if (options.method !== undefined) {
      if (!isTelegramMethod(options.method)) {
        fail(`Unknown method ${options.method}. Known: ${TELEGRAM_METHODS.join(", ")}`);
      }
      if (options.list === true) fail("--list applies to --type only");
      target = { kind: "method", method: options.method };
    } else {
      const type = typeOption(options.type, "--type") ?? typeOption(config.defaultType, "defaultType");
      if (type === undefined) fail("Pass --type or --method, or set defaultType in tg-schema.json");
      target = { kind: options.list === true ? "list" : "type", type };
    }

    const text = file === undefined ? await readStdin() : await readFile(resolve(file), "utf-8");
    const result = decodeTarget(text, target, strict);

    if (!result.ok) {
      console.error(formatDecodeError(result.error));
      process.exit(1);
    }

    console.log(formatValue(result.value));
    if (options.json !== true) {
      for (const line of formatDrift(result.unknownFields, result.unknownEnumValues)) {
        console.error(line);
      }
    }
  });

// ---------------------------------------------------------------------------
// tg-schema check
// ---------------------------------------------------------------------------

interface CheckCommandOptions {
  type?: string;
  strict?: boolean;
  watch?: boolean;
}

program
  .command("check [dir]")
  .description("Decode every .json fixture in a directory (default: config fixtures)")
  .option("-t, --type <type>", "Type for fixtures whose name matches no method or type")
  .option("-s, --strict", "Reject unknown fields and enum values")
  .option("-w, --watch", "Keep running and re-check fixtures when they change")
  .action(async (dir: string | undefined, options: CheckCommandOptions) => {
    const config = readConfig();
    const fixtureDir = dir ?? config.fixtures;
    if (fixtureDir === undefined) fail("Pass a fixture directory or set fixtures in tg-schema.json");

    const checkOptions = {
      strict: options.strict === true || config.strict === true,
      defaultType: typeOption(options.type, "--type") ?? typeOption(config.defaultType, "defaultType"),
    };
    const root = resolve(fixtureDir);

    console.log();
    console.log(chalk.white(`  Checking ${root}`));
    const reports = await checkFixtures(root, checkOptions);
    for (const report of reports) {
      for (const line of formatReport(report)) console.log(line);
    }
    console.log();
    console.log(`  ${formatSummary(reports)}`);
    console.log();

    if (options.watch !== true) {
      if (reports.some((r) => r.status === "failed")) process.exit(1);
      return;
    }

    const watcher = new FixtureWatcher({
      dir: root,
      ...checkOptions,
      onReport: (report) => {
        for (const line of formatReport(report)) console.log(line);
      },
    });
    await watcher.start();

    const shutdown = () => {
      watcher.stop().then(
        () => process.exit(0),
        (err: unknown) => {
          console.error(err);
          process.exit(1);
        },
      );
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
  });

// ---------------------------------------------------------------------------
// tg-schema types
// ---------------------------------------------------------------------------

program
  .command("types")
  .description("List every registered type")
  .action(() => {
    for (const definition of telegramRegistry.describe()) {
      console.log(`  ${formatTypeDefinition(definition)}`);
    }
  });

// ---------------------------------------------------------------------------
// Parse and run
// ---------------------------------------------------------------------------

program.parseAsync().catch((err: unknown) => {
  console.error(chalk.red(`  ✗ ${err instanceof Error ? err.message : String(err)}`));
  process.exit(1);
});
