/*
Purpose: tolerant newline-delimited JSON reading shared by item sources and snapshots.
Assumptions: blank lines are layout, malformed lines are skipped and counted, never fatal.
Usage: const { rows, skipped } = parseJsonlObjects(await readTextFile(p)).
*/

import { isPlainObject } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonlRow = {
  /** 1-based physical line number. */
  line: number;
  value: Record<string, unknown>;
};

export type JsonlParseResult = {
  rows: JsonlRow[];
  skipped: number;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function parseJsonlObjects(raw: string): JsonlParseResult {
  const rows: JsonlRow[] = [];
  let skipped = 0;

  splitLines(raw).forEach((text, index) => {
    const trimmed = text.trim();
    if (trimmed.length === 0) return;

    const value = safeParseJson(trimmed);
    if (!isPlainObject(value)) {
      skipped += 1;
      return;
    }

    rows.push({ line: index + 1, value });
  });

  return { rows, skipped };
}

export function splitLines(raw: string): string[] {
  const lines = raw.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

export function toJsonl(values: unknown[]): string {
  return values.map((value) => `${JSON.stringify(value)}\n`).join("");
}

// =============================================================================
// INTERNALS
// =============================================================================

function safeParseJson(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}
