/*
Purpose: every line the CLI prints. Errors go to stderr; pass progress and summaries to stdout.
Assumptions: colour only on a TTY stream and never when NO_COLOR is set; pass banners, status
counts and the no-op notice are always plain.
Usage: console.error(renderCliError(err, { debug })); renderRunSummary(summary).forEach(log).
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type ErrorFormatLine,
} from "../core/error-format.js";
import type { RunSummary } from "../core/pass-orchestrator.js";
import type { ItemUpdate } from "../core/scheduler.js";
import type { JobStatus } from "../jobs/run-job.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliOutputOptions = {
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

export type CliErrorFormatOptions = CliOutputOptions & {
  debug?: boolean;
};

const MAX_LISTED_IDS = 20;

// =============================================================================
// ERRORS
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const format = resolveFormatter(options, process.stderr);
  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });

  return lines.map((line) => renderErrorLine(line, format)).join("\n");
}

// =============================================================================
// RUN PROGRESS
// =============================================================================

export function renderPassBanner(pass: number, pending: number, total: number): string {
  return `Pass ${pass}: ${pending} of ${total} items pending`;
}

export function renderItemLine(update: ItemUpdate, options: CliOutputOptions = {}): string {
  const format = resolveFormatter(options, process.stdout);
  if (update.failedKeys.length === 0) {
    return `  item ${update.item.id} complete`;
  }
  const failed = format("failed", ["yellow"]);
  return `  item ${update.item.id} ${failed}: ${update.failedKeys.join(", ")}`;
}

export function renderRunSummary(summary: RunSummary, options: CliOutputOptions = {}): string[] {
  const format = resolveFormatter(options, process.stdout);
  const lines: string[] = [];

  if (summary.status === "noop") {
    lines.push(`Nothing to do: all ${summary.items} items are complete.`);
  } else {
    const statusStyle = summary.status === "complete" ? "green" : "yellow";
    lines.push(
      `Finished (${format(summary.status, [statusStyle, "bold"])}) after ${summary.passes} ` +
        `pass(es): ${summary.completed}/${summary.items} items complete.`,
    );
    lines.push(
      `Calls: ${summary.calls}  Failures: ${summary.failures}  ` +
        `Tokens: ${summary.usage.inputTokens} in / ${summary.usage.outputTokens} out`,
    );
  }

  if (summary.skippedSnapshotLines > 0) {
    lines.push(`Skipped ${summary.skippedSnapshotLines} unreadable snapshot line(s).`);
  }

  if (summary.stragglers.length > 0) {
    const label = format(`Stragglers (${summary.stragglers.length}):`, ["yellow"]);
    lines.push(`${label} ${formatIds(summary.stragglers)}`);
    lines.push("Run the same command again to retry them.");
  }

  return lines;
}

// =============================================================================
// STATUS
// =============================================================================

export function renderJobStatus(status: JobStatus, options: CliOutputOptions = {}): string[] {
  const format = resolveFormatter(options, process.stdout);
  const lines = [
    `Job: ${status.job}`,
    `Output: ${status.outputPath}`,
    `Items: ${status.items}  Complete: ${status.completed}  Pending: ${status.pending.length}`,
  ];

  if (status.pending.length > 0) {
    lines.push(`Pending ids: ${formatIds(status.pending)}`);
  }
  if (status.failed.length > 0) {
    lines.push(`${format("Failed ids:", ["red"])} ${formatIds(status.failed)}`);
  }
  if (status.skippedSnapshotLines > 0) {
    lines.push(`Unreadable snapshot lines: ${status.skippedSnapshotLines}`);
  }

  return lines;
}

export function formatIds(ids: readonly number[]): string {
  if (ids.length <= MAX_LISTED_IDS) return ids.join(", ");
  return `${ids.slice(0, MAX_LISTED_IDS).join(", ")} (+${ids.length - MAX_LISTED_IDS} more)`;
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveFormatter(
  options: CliOutputOptions,
  defaultStream: { isTTY?: boolean },
): AnsiFormatter {
  const stream = options.stream ?? defaultStream;
  return createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));
}

function renderErrorLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  switch (line.kind) {
    case "title":
      return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
    case "message":
      return line.text;
    case "hint":
      return `${format("Hint:", ["yellow"])} ${line.text}`;
    case "next":
      return `${format("Next:", ["cyan"])} ${line.text}`;
    case "stack":
      return `${format("Stack:", ["dim"])}\n${format(indent(line.text), ["dim"])}`;
    case "code":
    case "name":
    case "cause":
      return `${format(`${capitalize(line.kind)}:`, ["dim"])} ${format(line.text, ["dim"])}`;
  }
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function indent(value: string): string {
  return value
    .split("\n")
    .map((line) => `  ${line}`)
    .join("\n");
}
