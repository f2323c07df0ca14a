/**
 * Failure report written when a task is abandoned.
 * Purpose: leave one JSON file per abandoned task with enough to start debugging by hand.
 * Assumptions: fix logs hold the tail of the last failing check's output.
 * Usage: await writeFailureReport(reportPath, { ... });
 */

import { writeJsonFile } from "../../../core/utils.js";

export type FailureReport = {
  task: number;
  title: string;
  project: string;
  timestamp: string;
  reason: string;
  failing_check: string | null;
  attempts: number;
  tokens_spent: number;
  last_error: string | null;
  failing_test: string | null;
};

export type FailureReportInput = Omit<FailureReport, "last_error" | "failing_test"> & {
  lastError?: string;
  fixLogs?: string;
};

const MAX_ERROR_CHARS = 500;

// Language error lines first, then a generic FAILED line.
const ERROR_PATTERNS: readonly RegExp[] = [
  /((?:TypeError|ValueError|AttributeError|ImportError|KeyError|NameError|RuntimeError|AssertionError|ModuleNotFoundError|FileNotFoundError|IndexError|ZeroDivisionError|NotImplementedError|SyntaxError|IndentationError):.+?)(?:\n|$)/,
  /((?:Error|TypeError|ReferenceError|SyntaxError|RangeError):.+?)(?:\n|$)/,
  /(FAILED .+?)(?:\n|$)/,
];

const FAILING_TEST_PATTERNS: readonly RegExp[] = [
  // pytest: FAILED tests/test_api.py::test_login
  /FAILED\s+(\S+::\S+)/,
  // pytest -v: tests/test_api.py::test_login FAILED
  /(\S+::\S+)\s+FAILED/,
  // deno: test login ... FAILED
  /test\s+(.+?)\s+\.\.\.\s+FAILED/,
  // go: --- FAIL: TestLogin (0.00s)
  /--- FAIL: (\S+)/,
  // vitest/jest: FAIL src/api.test.ts > login
  /^\s*FAIL\s+(\S.*?)\s*$/m,
];

export function buildFailureReport(input: FailureReportInput): FailureReport {
  const { lastError, fixLogs, ...rest } = input;
  return {
    ...rest,
    last_error: extractLastError(fixLogs) ?? lastError ?? null,
    failing_test: extractFailingTest(fixLogs),
  };
}

export async function writeFailureReport(
  reportPath: string,
  input: FailureReportInput,
): Promise<FailureReport> {
  const report = buildFailureReport(input);
  await writeJsonFile(reportPath, report);
  return report;
}

export function extractLastError(logs: string | undefined): string | null {
  if (!logs) return null;

  for (const pattern of ERROR_PATTERNS) {
    const match = pattern.exec(logs);
    const found = match?.[1];
    if (found) return found.trim().slice(0, MAX_ERROR_CHARS);
  }

  const lines = logs
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  const last = lines[lines.length - 1];
  return last ? last.slice(0, MAX_ERROR_CHARS) : null;
}

export function extractFailingTest(logs: string | undefined): string | null {
  if (!logs) return null;

  for (const pattern of FAILING_TEST_PATTERNS) {
    const found = pattern.exec(logs)?.[1];
    if (found) return found;
  }
  return null;
}
