// src/analysis/parser.ts

import { parse, TSESTree } from "@typescript-eslint/typescript-estree";
import { readFileSync } from "fs";

export interface ParsedScript {
  source: string;
  ast: TSESTree.Program;
  code: string;
}

export interface ScriptSource {
  /** File path or a caller-chosen label; echoed into metadata.source. */
  source: string;
  code: string;
}

/**
 * Parses a whole script. Returns null when the text is not syntactically valid;
 * the extractor then falls back to statement-by-statement scanning.
 */
export function parseScript(code: string, source = "<inline>"): ParsedScript | null {
  try {
    const ast = parse(code, {
      jsx: /\.[jt]sx$/.test(source),
      loc: true,
      range: true,
      tokens: false,
      comment: true,
      errorOnUnknownASTType: false,
    });
    return { source, ast, code };
  } catch {
    return null;
  }
}

export function readScriptFile(filePath: string): ScriptSource {
  return { source: filePath, code: readFileSync(filePath, "utf-8") };
}

// File extensions a browser-automation script may use
export const SCRIPT_EXTENSIONS = [".ts", ".tsx", ".js", ".jsx", ".mjs", ".cjs", ".mts", ".cts"];

// Directories to always skip when scanning for scripts
export const SKIP_DIRS = new Set([
  "node_modules", ".git", "dist", "build", "coverage", ".turbo", ".cache",
  "playwright-report", "test-results", "blob-report",
]);

// File name patterns that identify test files, matched against the basename
export const TEST_FILE_PATTERNS = [
  /\.test\.[cm]?[jt]sx?$/,
  /\.spec\.[cm]?[jt]sx?$/,
  /\.e2e\.[cm]?[jt]sx?$/,
];

/** Returns true if the filename looks like a test file. */
export function isTestFile(filePath: string): boolean {
  const base = filePath.split(/[\/\\]/).pop() ?? "";
  return TEST_FILE_PATTERNS.some((re) => re.test(base));
}
