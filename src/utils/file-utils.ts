// src/utils/file-utils.ts
// Filesystem access for the CLI: finding scripts, reading configuration JSON
// and writing blueprints.

import * as fs from "fs";
import * as path from "path";
import { SKIP_DIRS } from "../analysis/parser";

export type JsonRead = { ok: true; value: unknown } | { ok: false; reason: "missing" | "invalid" };

/**
 * Files under `root` whose extension is listed and that `accept` keeps,
 * as absolute paths sorted by path. Directories named in SKIP_DIRS are not entered.
 */
export function findFiles(
  root: string,
  extensions: readonly string[],
  accept: (filePath: string) => boolean = () => true
): string[] {
  const found: string[] = [];
  const pending = [path.resolve(root)];

  for (let dir = pending.pop(); dir !== undefined; dir = pending.pop()) {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch {
      // missing or unreadable directory
      continue;
    }
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!SKIP_DIRS.has(entry.name)) pending.push(full);
      } else if (entry.isFile() && extensions.includes(path.extname(entry.name)) && accept(full)) {
        found.push(full);
      }
    }
  }
  return found.sort();
}

/** Reads a JSON file, telling a missing file apart from malformed content. */
export function readJsonFile(filePath: string): JsonRead {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch {
    return { ok: false, reason: "missing" };
  }
  try {
    const value: unknown = JSON.parse(raw);
    return { ok: true, value };
  } catch {
    return { ok: false, reason: "invalid" };
  }
}

export function writeTextFile(filePath: string, content: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, "utf-8");
}
