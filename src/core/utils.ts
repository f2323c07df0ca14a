import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";

import fse from "fs-extra";

// =============================================================================
// TASK NAMING
// =============================================================================

export function padTaskId(id: number): string {
  return String(id).padStart(3, "0");
}

function slugify(input: string): string {
  return input
    .toLowerCase()
    .trim()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 80);
}

// "001-add-login": task log dirs and feature branches.
export function taskIdSlug(id: number, title: string): string {
  return slugify(`${padTaskId(id)}-${title}`);
}

// =============================================================================
// TIME
// =============================================================================

export function isoNow(): string {
  return new Date().toISOString();
}

// UTC YYYYMMDD-HHMMSS
export function defaultRunId(now: Date = new Date()): string {
  const iso = now.toISOString();
  return `${iso.slice(0, 10).replaceAll("-", "")}-${iso.slice(11, 19).replaceAll(":", "")}`;
}

// =============================================================================
// TEXT
// =============================================================================

export function tail(text: string, maxChars: number): string {
  return text.length > maxChars ? text.slice(text.length - maxChars) : text;
}

// =============================================================================
// JSON FILES
// =============================================================================

export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await fse.outputJson(filePath, data, { spaces: 2 });
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  return fse.readJson(filePath);
}

// State and ledger files: readers see the old or the new file, never a partial one.
export async function writeJsonFileAtomic(filePath: string, data: unknown): Promise<void> {
  await fse.ensureDir(path.dirname(filePath));
  const tmpPath = `${filePath}.${randomUUID()}.tmp`;

  try {
    const handle = await fs.open(tmpPath, "w");
    try {
      await handle.writeFile(`${JSON.stringify(data, null, 2)}\n`, "utf8");
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await fse.remove(tmpPath);
    throw err;
  }
}
