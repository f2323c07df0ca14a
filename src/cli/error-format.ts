/*
Purpose: the text a failed waypoint command prints on stderr.
Assumptions: color only on a TTY; debug mode adds code, cause, exit status and stack.
*/

import { EXIT_CODES } from "../core/errors.js";
import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiStyle,
  type ErrorFormatLineKind,
} from "../core/error-format.js";

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

type InlineKind = Exclude<ErrorFormatLineKind, "stack">;

// null label: the text stands alone.
const LINE_STYLES: Record<InlineKind, { label: string | null; labelStyles: AnsiStyle[]; textStyles: AnsiStyle[] }> = {
  title: { label: "Error:", labelStyles: ["red", "bold"], textStyles: ["bold"] },
  message: { label: null, labelStyles: [], textStyles: [] },
  hint: { label: "Hint:", labelStyles: ["yellow"], textStyles: [] },
  next: { label: "Next:", labelStyles: ["cyan"], textStyles: [] },
  code: { label: "Code:", labelStyles: ["dim"], textStyles: ["dim"] },
  name: { label: "Name:", labelStyles: ["dim"], textStyles: ["dim"] },
  cause: { label: "Cause:", labelStyles: ["dim"], textStyles: ["dim"] },
};

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const debug = options.debug ?? false;
  const format = createAnsiFormatter(
    resolveColorEnabled({ stream: options.stream ?? process.stderr, useColor: options.useColor }),
  );

  const out: string[] = [];
  let stack: string | undefined;
  for (const line of formatErrorLines(error, { mode: debug ? "debug" : "short" })) {
    if (line.kind === "stack") {
      stack = line.text;
      continue;
    }
    const style = LINE_STYLES[line.kind];
    const text = format(line.text, style.textStyles);
    out.push(style.label ? `${format(style.label, style.labelStyles)} ${text}` : text);
  }

  if (!debug) return out.join("\n");

  out.push(format(`Exit: ${cliExitCode(error)}`, ["dim"]));
  if (stack) {
    const indented = stack
      .split("\n")
      .map((line) => `  ${line}`)
      .join("\n");
    out.push(`${format("Stack:", ["dim"])}\n${format(indented, ["dim"])}`);
  }
  return out.join("\n");
}

// Orchestrator and user-facing errors carry their own exit status; anything else exits 1.
export function cliExitCode(error: unknown): number {
  if (error && typeof error === "object" && "exitCode" in error) {
    const { exitCode } = error;
    if (typeof exitCode === "number" && Number.isInteger(exitCode) && exitCode !== EXIT_CODES.ok) {
      return exitCode;
    }
  }
  return EXIT_CODES.error;
}
