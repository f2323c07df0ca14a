/*
Purpose: turn any thrown value into structured lines shared by CLI output and log warnings.
Assumptions: UserFacingError carries its own title/hint; other errors fall back to name + message.
Usage: formatErrorLines(err, { mode: "debug" }) or formatErrorMessage(err).
*/

import { UserFacingError } from "./errors.js";

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

export type AnsiStyle = "red" | "yellow" | "cyan" | "green" | "bold" | "dim";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  green: [32, 39],
  bold: [1, 22],
  dim: [2, 22],
};

// =============================================================================
// MESSAGES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
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
    if (mode === "debug") {
      lines.push({ kind: "code", text: error.code });
    }
  } else {
    lines.push({ kind: "title", text: formatErrorMessage(error) });
  }

  if (mode !== "debug") {
    return lines;
  }

  if (error instanceof Error) {
    lines.push({ kind: "name", text: error.name });
    if (error.cause !== undefined) {
      lines.push({ kind: "cause", text: formatErrorMessage(error.cause) });
    }
    if (error.stack) {
      lines.push({ kind: "stack", text: error.stack });
    }
  }

  return lines;
}

// =============================================================================
// COLOR
// =============================================================================

export function resolveColorEnabled(input: {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (!input.stream?.isTTY) {
    return false;
  }
  if (input.useColor !== undefined) {
    return input.useColor;
  }
  return process.env.NO_COLOR === undefined;
}

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
