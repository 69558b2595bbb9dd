/*
Purpose: turn any thrown value into labelled lines for the CLI and log warnings.
Assumptions: UserFacingError carries the title/hint; other errors fall back to their message.
Usage: formatErrorLines(err, { mode: "debug" }), formatErrorMessage(err).
*/

import {
  ConfigError,
  SourceError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
  type UserFacingErrorCode,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "red" | "green" | "yellow" | "cyan" | "bold" | "dim";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

// =============================================================================
// MESSAGES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatErrorLines(
  error: unknown,
  options: { mode?: ErrorFormatMode } = {},
): ErrorFormatLine[] {
  const mode = options.mode ?? "short";
  const lines: ErrorFormatLine[] = [];

  if (error instanceof UserFacingError) {
    lines.push({ kind: "title", text: error.title });
    lines.push({ kind: "message", text: error.message });
    if (error.hint) lines.push({ kind: "hint", text: error.hint });
    if (error.next) lines.push({ kind: "next", text: error.next });
  } else {
    lines.push({ kind: "title", text: resolveFallbackTitle(error) });
    lines.push({ kind: "message", text: formatErrorMessage(error) });
  }

  if (mode !== "debug") {
    return lines;
  }

  lines.push({ kind: "code", text: resolveErrorCode(error) });
  if (error instanceof Error) {
    lines.push({ kind: "name", text: error.name });
  }

  const cause = resolveCause(error);
  if (cause !== undefined) {
    lines.push({ kind: "cause", text: formatErrorMessage(cause) });
  }

  if (error instanceof Error && error.stack) {
    lines.push({ kind: "stack", text: error.stack });
  }

  return lines;
}

// =============================================================================
// COLOR
// =============================================================================

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  green: [32, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  bold: [1, 22],
  dim: [2, 22],
};

export function createAnsiFormatter(useColor: boolean): AnsiFormatter {
  if (!useColor) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\x1b[${open}m${acc}\x1b[${close}m`;
    }, text);
}

export function resolveColorEnabled(args: {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
  env?: NodeJS.ProcessEnv;
}): boolean {
  const env = args.env ?? process.env;
  if (!args.stream?.isTTY) return false;
  if (env.NO_COLOR !== undefined && env.NO_COLOR !== "") return false;

  return args.useColor ?? true;
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveFallbackTitle(error: unknown): string {
  if (error instanceof ConfigError) return "Configuration error.";
  if (error instanceof SourceError) return "Input source error.";
  return "Command failed.";
}

function resolveErrorCode(error: unknown): UserFacingErrorCode {
  if (error instanceof UserFacingError) return error.code;
  if (error instanceof ConfigError) return USER_FACING_ERROR_CODES.config;
  if (error instanceof SourceError) return USER_FACING_ERROR_CODES.source;
  return USER_FACING_ERROR_CODES.unknown;
}

function resolveCause(error: unknown): unknown {
  if (!error || typeof error !== "object" || !("cause" in error)) {
    return undefined;
  }

  const cause: unknown = error.cause;
  return cause === null ? undefined : cause;
}
