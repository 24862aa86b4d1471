/**
 * Terminal output for the tg-schema CLI.
 */

import chalk from "chalk";
import type { TypeDefinition } from "../schema/fields.js";
import type { DecodeError } from "../shared/errors.js";
import type { UnknownEnumValue, UnknownField } from "../shared/types.js";
import { formatPath, truncate } from "../shared/utils.js";
import { stringifyDocument } from "../shared/wire.js";
import { describeTarget, type FixtureReport } from "./check.js";

const MAX_VALUE_LENGTH = 60;

export function formatDecodeError(error: DecodeError): string {
  return `${chalk.red("✗")} ${chalk.bold(error.code)} ${error.message}`;
}

export function formatUnknownField(field: UnknownField): string {
  const value = truncate(stringifyDocument(field.value), MAX_VALUE_LENGTH);
  return `${chalk.yellow("⚠")} unknown field ${formatPath(field.path)} = ${chalk.dim(value)}`;
}

export function formatUnknownEnumValue(drift: UnknownEnumValue): string {
  return `${chalk.yellow("⚠")} unknown enum value ${JSON.stringify(drift.value)} at ${formatPath(drift.path)}`;
}

/** Drift lines for a successful decode, one per finding. */
export function formatDrift(
  unknownFields: readonly UnknownField[],
  unknownEnumValues: readonly UnknownEnumValue[],
): string[] {
  return [...unknownFields.map(formatUnknownField), ...unknownEnumValues.map(formatUnknownEnumValue)];
}

/** One fixture: a status line, then indented details. */
export function formatReport(report: FixtureReport): string[] {
  const label = report.target === undefined ? "no matching type" : describeTarget(report.target);
  const title = `${report.file} ${chalk.dim(`(${label})`)}`;

  const lines: string[] = [];
  switch (report.status) {
    case "ok":
      lines.push(`  ${chalk.green("✓")} ${title}`);
      break;
    case "drift":
      lines.push(`  ${chalk.yellow("⚠")} ${title}`);
      break;
    case "failed":
      lines.push(`  ${chalk.red("✗")} ${title}`);
      break;
    case "skipped":
      lines.push(chalk.dim(`  - ${report.file} (${label})`));
      break;
  }

  if (report.error !== undefined) {
    lines.push(`      ${report.error.message}`);
  }
  if (report.readError !== undefined) {
    lines.push(`      could not read: ${report.readError.message}`);
  }
  for (const line of formatDrift(report.unknownFields, report.unknownEnumValues)) {
    lines.push(`      ${line}`);
  }
  if (report.apiError !== undefined) {
    lines.push(chalk.dim(`      API error ${report.apiError.errorCode}: ${report.apiError.description}`));
  }
  return lines;
}

export function formatSummary(reports: readonly FixtureReport[]): string {
  const count = (status: FixtureReport["status"]) => reports.filter((r) => r.status === status).length;
  const failed = count("failed");
  const parts = [`${count("ok")} ok`, `${count("drift")} drift`, `${failed} failed`, `${count("skipped")} skipped`];
  const text = parts.join(", ");
  return failed > 0 ? chalk.red(text) : chalk.green(text);
}

export function formatTypeDefinition(definition: TypeDefinition): string {
  if (definition.kind === "variant") {
    return `${chalk.bold(definition.name)} ${chalk.dim("variant")} ${definition.members.join(" | ")}`;
  }
  const required = definition.requiredFields.size;
  const optional = definition.fields.length - required;
  return `${chalk.bold(definition.name)} ${chalk.dim("entity")} ${required} required, ${optional} optional`;
}

/** Pretty JSON of a decoded value; bigints print as plain integers. */
export function formatValue(value: unknown): string {
  return stringifyDocument(value, 2);
}
