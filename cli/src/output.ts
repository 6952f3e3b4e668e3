/**
 * runnerkit CLI -- Output Helpers
 *
 * Centralized formatting for all CLI output: colors, spinners, tables.
 * Uses chalk (v4, CommonJS compatible) for ANSI colors,
 * ora for spinners, and cli-table3 for tabular data.
 */

import chalk from "chalk";
import ora, { Ora } from "ora";
import Table from "cli-table3";
import type {
  AuditOperation,
  ReconcileOutcome,
  RegistrationSummary,
} from "@runnerkit/registrar";

// ─── Debug Mode ─────────────────────────────────────────────

let _debugMode = false;

export function setDebugMode(enabled: boolean): void {
  _debugMode = enabled;
}

// ─── Color Shortcuts ────────────────────────────────────────

export const colors = {
  success: chalk.green,
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.cyan,
  dim: chalk.gray,
  bold: chalk.bold,
  name: chalk.bold.white,
  module: chalk.cyan,
  muted: chalk.gray,
};

// ─── Symbols ────────────────────────────────────────────────

export const symbols = {
  success: chalk.green("\u2714"), // ✔
  error: chalk.red("\u2716"), // ✖
  info: chalk.cyan("\u2139"), // ℹ
  bullet: chalk.gray("\u2022"), // •
};

// ─── Print Helpers ──────────────────────────────────────────

export function printSuccess(msg: string): void {
  console.log(`${symbols.success} ${msg}`);
}

export function printError(msg: string): void {
  console.error(`${symbols.error} ${msg}`);
}

export function printInfo(msg: string): void {
  console.log(`${symbols.info} ${msg}`);
}

/**
 * Print a debug message. Only visible with --debug flag.
 */
export function printDebug(msg: string): void {
  if (_debugMode) {
    console.log(colors.muted(`  [debug] ${msg}`));
  }
}

export function printDetail(label: string, value: string): void {
  console.log(`  ${colors.dim(label + ":")} ${value}`);
}

export function printHeader(msg: string): void {
  console.log();
  console.log(`  ${colors.bold(msg)}`);
  console.log();
}

// ─── Spinner ────────────────────────────────────────────────

export function createSpinner(text: string): Ora {
  return ora({ text, color: "cyan" });
}

// ─── Tables ─────────────────────────────────────────────────

/**
 * On Windows cmd/PowerShell without TERM set, Unicode borders corrupt.
 */
export function shouldUseAsciiBorders(): boolean {
  return process.platform === "win32" && !process.env.TERM;
}

const ASCII_BORDERS = {
  top: "-",
  "top-mid": "+",
  "top-left": "+",
  "top-right": "+",
  bottom: "-",
  "bottom-mid": "+",
  "bottom-left": "+",
  "bottom-right": "+",
  left: "|",
  "left-mid": "+",
  mid: "-",
  "mid-mid": "+",
  right: "|",
  "right-mid": "+",
  middle: "|",
};

export interface TableOptions {
  head: string[];
  rows: string[][];
}

export function printTable(opts: TableOptions): void {
  const ascii = shouldUseAsciiBorders();
  const table = new Table({
    head: opts.head.map((h) => chalk.bold.cyan(h)),
    style: { head: [], border: ascii ? [] : ["gray"] },
    wordWrap: false,
    ...(ascii ? { chars: ASCII_BORDERS } : {}),
  });
  for (const row of opts.rows) {
    table.push(row);
  }
  console.log(table.toString());
}

// ─── Formatting ─────────────────────────────────────────────

/**
 * Truncate a plain-text string to `max` visible characters, appending "..."
 * if it was shortened. Never returns a string longer than `max`.
 */
export function truncateText(s: string, max: number): string {
  if (max < 4) return s.slice(0, max);
  if (s.length <= max) return s;
  return s.slice(0, max - 3) + "...";
}

export function stripAnsi(s: string): string {
  // eslint-disable-next-line no-control-regex
  return s.replace(/\u001b\[[0-9;]*m/g, "");
}

/**
 * One line per reconcile outcome:
 *
 *   ✔ run-local created 3f1c...
 *   ✔ run-remote updated
 *   • run-windows-cmd skipped (experimental)
 *   ✖ broken failed: Runner type "broken" is invalid: ...
 */
export function formatOutcome(outcome: ReconcileOutcome): string {
  switch (outcome.status) {
    case "created":
      return `${symbols.success} ${colors.name(outcome.name)} ${colors.success("created")} ${colors.dim(outcome.record.id)}`;
    case "updated":
      return `${symbols.success} ${colors.name(outcome.name)} ${colors.info("updated")}`;
    case "skipped":
      return `${symbols.bullet} ${colors.name(outcome.name)} ${colors.dim(`skipped (${outcome.reason})`)}`;
    case "failed":
      return `${symbols.error} ${colors.name(outcome.name)} ${colors.error("failed")}: ${outcome.error.message}`;
  }
}

export function formatSummary(summary: RegistrationSummary): string {
  return [
    `${summary.created} created`,
    `${summary.updated} updated`,
    `${summary.skipped} skipped`,
    `${summary.failed} failed`,
  ].join(", ");
}

export function formatOperation(operation: AuditOperation): string {
  return operation === "created"
    ? colors.success(operation)
    : colors.info(operation);
}

export function formatDefault(value: unknown): string {
  if (value === undefined) return colors.dim("-");
  return JSON.stringify(value);
}

export function formatDate(isoDate: string): string {
  const date = new Date(isoDate);
  if (Number.isNaN(date.getTime())) return isoDate;
  return date.toLocaleString();
}
