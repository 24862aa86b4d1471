/**
 * Fixture checking: decode recorded payloads and report what changed.
 *
 * A fixture's type comes from its file name. The part before the first dot
 * is matched against Bot API method names first (the file then holds a full
 * response envelope), then case-insensitively against registered type names,
 * e.g. `getMe.json`, `message.json`, `update.unknown-kind.json`.
 */

import { readdir, readFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import { MalformedInputError, type DecodeError } from "../shared/errors.js";
import type { DecodeResult, UnknownEnumValue, UnknownField } from "../shared/types.js";
import { isRecord } from "../shared/utils.js";
import { parseDocument } from "../shared/wire.js";
import { decodeMethodResponse, isTelegramMethod, type TelegramMethod } from "../telegram/methods.js";
import { ApiError } from "../telegram/response.js";
import { telegramFields as t, telegramRegistry } from "../telegram/schema.js";
import type { TelegramTypeName } from "../telegram/types.js";

export type FixtureTarget =
  | { kind: "method"; method: TelegramMethod }
  | { kind: "type"; type: TelegramTypeName }
  | { kind: "list"; type: TelegramTypeName };

export type FixtureStatus = "ok" | "drift" | "failed" | "skipped";

export interface FixtureReport {
  file: string;
  target?: FixtureTarget;
  status: FixtureStatus;
  error?: DecodeError;
  /** Set when the file could not be read. */
  readError?: Error;
  /** Set when a method fixture records an `ok: false` answer. */
  apiError?: ApiError;
  unknownFields: readonly UnknownField[];
  unknownEnumValues: readonly UnknownEnumValue[];
}

export interface CheckOptions {
  strict?: boolean;
  defaultType?: TelegramTypeName;
}

const typeNamesByLowercase = new Map<string, TelegramTypeName>();
for (const definition of telegramRegistry.describe()) {
  if (telegramRegistry.has(definition.name)) {
    typeNamesByLowercase.set(definition.name.toLowerCase(), definition.name);
  }
}

/** Resolve a registered type name, ignoring case. */
export function findTypeName(name: string): TelegramTypeName | undefined {
  return typeNamesByLowercase.get(name.toLowerCase());
}

export function resolveFixtureTarget(file: string, defaultType?: TelegramTypeName): FixtureTarget | undefined {
  const stem = basename(file).split(".")[0] ?? "";
  if (isTelegramMethod(stem)) return { kind: "method", method: stem };
  const type = findTypeName(stem) ?? defaultType;
  return type === undefined ? undefined : { kind: "type", type };
}

export function describeTarget(target: FixtureTarget): string {
  switch (target.kind) {
    case "method":
      return `${target.method} response`;
    case "type":
      return target.type;
    case "list":
      return `${target.type}[]`;
  }
}

/** Parse and decode raw payload text against a target. */
export function decodeTarget(text: string, target: FixtureTarget, strict: boolean): DecodeResult<unknown> {
  let document: unknown;
  try {
    document = parseDocument(text);
  } catch (err) {
    return { ok: false, error: new MalformedInputError(err) };
  }
  switch (target.kind) {
    case "method":
      return decodeMethodResponse(target.method, document, { strict });
    case "type":
      return telegramRegistry.decode(document, target.type, { strict });
    case "list":
      return telegramRegistry.decodeAs(document, t.array(t.ref(target.type)), { strict });
  }
}

/** Never rejects: an unreadable file is a `failed` report. */
export async function checkFile(path: string, options: CheckOptions = {}): Promise<FixtureReport> {
  const file = basename(path);
  const target = resolveFixtureTarget(file, options.defaultType);
  if (target === undefined) {
    return { file, status: "skipped", unknownFields: [], unknownEnumValues: [] };
  }

  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    const readError = err instanceof Error ? err : new Error(String(err));
    return { file, target, status: "failed", readError, unknownFields: [], unknownEnumValues: [] };
  }

  const result = decodeTarget(text, target, options.strict === true);
  if (!result.ok) {
    return { file, target, status: "failed", error: result.error, unknownFields: [], unknownEnumValues: [] };
  }

  const drift = result.unknownFields.length > 0 || result.unknownEnumValues.length > 0;
  const report: FixtureReport = {
    file,
    target,
    status: drift ? "drift" : "ok",
    unknownFields: result.unknownFields,
    unknownEnumValues: result.unknownEnumValues,
  };

  const apiError = apiErrorOf(result.value);
  if (apiError !== undefined) report.apiError = apiError;
  return report;
}

/** Check every `.json` file directly inside `dir`, in name order. */
export async function checkFixtures(dir: string, options: CheckOptions = {}): Promise<FixtureReport[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files = entries
    .filter((entry) => entry.isFile() && isFixtureFile(entry.name))
    .map((entry) => entry.name)
    .sort();

  return Promise.all(files.map((name) => checkFile(join(dir, name), options)));
}

export function isFixtureFile(path: string): boolean {
  return extname(path) === ".json";
}

function apiErrorOf(value: unknown): ApiError | undefined {
  if (!isRecord(value)) return undefined;
  const error = value["error"];
  return error instanceof ApiError ? error : undefined;
}
