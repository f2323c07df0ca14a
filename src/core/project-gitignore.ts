import path from "node:path";

import fse from "fs-extra";

import { HOME_DIR_NAME } from "./paths.js";

export type ProjectGitignoreOptions = {
  includeEnvFiles?: boolean;
};

export function buildProjectGitignore(options: ProjectGitignoreOptions = {}): string {
  const entries = buildEntries(options);
  const lines = ["# Managed by waypoint. Edit this file if you need different repo hygiene.", ...entries, ""];
  return lines.join("\n");
}

// Appends the entry when no existing line matches it. Returns true when the file changed.
export async function ensureGitignoreEntry(projectDir: string, entry: string): Promise<boolean> {
  const gitignorePath = path.join(projectDir, ".gitignore");
  if (!(await fse.pathExists(gitignorePath))) {
    await fse.writeFile(gitignorePath, `${entry}\n`, "utf8");
    return true;
  }

  const text = await fse.readFile(gitignorePath, "utf8");
  if (text.split(/\r?\n/).some((line) => line.trim() === entry)) {
    return false;
  }

  const separator = text.length === 0 || text.endsWith("\n") ? "" : "\n";
  await fse.writeFile(gitignorePath, `${text}${separator}${entry}\n`, "utf8");
  return true;
}

function buildEntries(options: ProjectGitignoreOptions): string[] {
  const entries = [
    `${HOME_DIR_NAME}/`,
    "__pycache__/",
    ".pytest_cache/",
    ".coverage",
    "coverage/",
    "node_modules/",
    "*.tsbuildinfo",
    "dist/",
    "build/",
    "target/",
    "logs/",
  ];

  if (options.includeEnvFiles ?? true) {
    entries.push(".env", ".env.*", "!.env.example");
  }

  return Array.from(new Set(entries)).sort();
}
