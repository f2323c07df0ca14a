#!/usr/bin/env node
import { pathToFileURL } from "node:url";

import { CommanderError } from "commander";

import { cliExitCode, renderCliError } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";

const QUIET_EXITS = new Set(["commander.helpDisplayed", "commander.help", "commander.version"]);

// --debug must work even when parsing failed before options were read.
function debugRequested(argv: string[]): boolean {
  const end = argv.indexOf("--");
  const flags = end === -1 ? argv : argv.slice(0, end);
  return flags.lastIndexOf("--debug") > flags.lastIndexOf("--no-debug");
}

export async function main(argv: string[]): Promise<void> {
  const program = buildCli()
    .configureOutput({ outputError: () => undefined })
    .exitOverride();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError && QUIET_EXITS.has(error.code)) {
      process.exitCode = error.exitCode;
      return;
    }
    console.error(renderCliError(error, { debug: debugRequested(argv) }));
    process.exitCode = cliExitCode(error);
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  await main(process.argv);
}
