// ============================================
// Catalogue Sources
// ============================================
// Where workflow and worker markdown files live. Built-in files ship with
// the package; user files sit under the home directory and project files
// under the working directory.

import { existsSync } from "node:fs";
import { readdir } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, extname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import { PROJECT_DIR_NAME } from "../config/defaults.js";

export type CatalogKind = "workflows" | "workers";

/** Later sources override earlier ones */
export const CATALOG_SOURCES = ["builtin", "user", "project"] as const;

export type CatalogSource = (typeof CATALOG_SOURCES)[number];

/**
 * Directory of the built-in markdown files. Resolved from this module, so
 * it works from both `src/` and `dist/`.
 */
export function builtinDir(kind: CatalogKind): string {
  const currentDir = dirname(fileURLToPath(import.meta.url));
  return resolve(currentDir, "..", "..", "builtin", kind);
}

/**
 * @example
 * ```typescript
 * catalogDir("workflows", "project", { cwd: "/repo" }); // "/repo/.phaseflow/workflows"
 * catalogDir("workers", "user", { homeDir: "/home/dev" }); // "/home/dev/.phaseflow/workers"
 * ```
 */
export function catalogDir(
  kind: CatalogKind,
  source: CatalogSource,
  roots: { cwd?: string; homeDir?: string } = {}
): string {
  switch (source) {
    case "builtin":
      return builtinDir(kind);
    case "user":
      return join(roots.homeDir ?? homedir(), PROJECT_DIR_NAME, kind);
    case "project":
      return join(roots.cwd ?? process.cwd(), PROJECT_DIR_NAME, kind);
  }
}

/**
 * Markdown files directly inside `dirPath`, sorted by name. A missing
 * directory yields an empty list.
 */
export async function listMarkdownFiles(dirPath: string): Promise<string[]> {
  if (!existsSync(dirPath)) {
    return [];
  }

  const entries = await readdir(dirPath, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && extname(entry.name) === ".md")
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(dirPath, name));
}
