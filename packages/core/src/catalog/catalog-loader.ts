// ============================================
// Catalogue Loader
// ============================================

import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { Err, type FrontmatterError, type Result } from "@phaseflow/shared";

import { createLogger } from "../logger/index.js";
import type { Logger } from "../logger/logger.js";
import {
  CATALOG_SOURCES,
  type CatalogKind,
  type CatalogSource,
  catalogDir,
  listMarkdownFiles,
} from "./sources.js";

// =============================================================================
// Types
// =============================================================================

export interface CatalogLoadError {
  code: "PARSE_ERROR" | "VALIDATION_ERROR" | "IO_ERROR";
  message: string;
  filePath: string;
  cause?: unknown;
}

export interface CatalogEntry<T> {
  name: string;
  value: T;
  source: CatalogSource;
  /** Absolute path to the source file */
  path: string;
}

export interface CatalogLoaderOptions {
  /** Current working directory (workspace root). */
  cwd: string;
  /** Home directory for user files (default: os.homedir()) */
  homeDir?: string;
  /** Whether to read ~/.phaseflow/<kind>/. @default true */
  loadUser?: boolean;
  /** Whether to include the built-in catalogue. @default true */
  loadBuiltins?: boolean;
  logger?: Logger;
}

/**
 * Maps a rejected frontmatter document to a load error; schema violations
 * are validation errors and everything else a parse error.
 */
export function frontmatterLoadError(
  label: string,
  filePath: string,
  error: FrontmatterError
): CatalogLoadError {
  return {
    code: error.kind === "invalid" ? "VALIDATION_ERROR" : "PARSE_ERROR",
    message: `Invalid ${label} file ${basename(filePath)}: ${error.message}`,
    filePath,
  };
}

// =============================================================================
// CatalogLoader Class
// =============================================================================

/**
 * Loads named definitions from markdown files.
 *
 * Sources in increasing priority: built-in, user (`~/.phaseflow/<kind>`),
 * project (`<cwd>/.phaseflow/<kind>`). A name defined in a higher-priority
 * source replaces the lower one and keeps its position. Invalid files are
 * skipped with a warning.
 */
export abstract class CatalogLoader<T> {
  protected abstract readonly kind: CatalogKind;
  protected readonly logger: Logger;

  private readonly cwd: string;
  private readonly homeDir?: string;
  private readonly loadUser: boolean;
  private readonly loadBuiltins: boolean;
  private loaded: Map<string, CatalogEntry<T>> | undefined;

  constructor(options: CatalogLoaderOptions, loggerName: string) {
    this.cwd = options.cwd;
    this.homeDir = options.homeDir;
    this.loadUser = options.loadUser ?? true;
    this.loadBuiltins = options.loadBuiltins ?? true;
    this.logger = options.logger ?? createLogger({ name: loggerName });
  }

  /**
   * Parses one file's content.
   */
  protected abstract parse(
    content: string,
    filePath: string,
    source: CatalogSource
  ): Result<T, CatalogLoadError>;

  protected abstract nameOf(value: T): string;

  /**
   * Every definition from every enabled source, deduplicated by name.
   */
  async loadAll(): Promise<CatalogEntry<T>[]> {
    const loaded = new Map<string, CatalogEntry<T>>();

    for (const source of this.enabledSources()) {
      const dirPath = catalogDir(this.kind, source, { cwd: this.cwd, homeDir: this.homeDir });
      let files: string[];
      try {
        files = await listMarkdownFiles(dirPath);
      } catch (error) {
        this.logger.warn(`Failed to scan ${this.kind} directory ${dirPath}`, {
          error: error instanceof Error ? error.message : String(error),
        });
        continue;
      }

      for (const filePath of files) {
        const result = await this.loadFile(filePath, source);
        if (!result.ok) {
          this.logger.warn(result.error.message, { path: filePath });
          continue;
        }

        const name = this.nameOf(result.value);
        const previous = loaded.get(name);
        if (previous) {
          this.logger.debug(`${name} from ${source} overrides ${previous.source}`);
        }
        loaded.set(name, { name, value: result.value, source, path: filePath });
      }
    }

    this.loaded = loaded;
    return Array.from(loaded.values());
  }

  /**
   * Looks a definition up by name, scanning sources on first use.
   *
   * @returns The definition, or null if no source defines it
   */
  async load(name: string): Promise<T | null> {
    if (!this.loaded) {
      await this.loadAll();
    }
    return this.loaded?.get(name)?.value ?? null;
  }

  async loadFile(filePath: string, source: CatalogSource): Promise<Result<T, CatalogLoadError>> {
    let content: string;
    try {
      content = await readFile(filePath, "utf-8");
    } catch (error) {
      return Err({
        code: "IO_ERROR",
        message: `Failed to read ${filePath}`,
        filePath,
        cause: error,
      });
    }
    return this.parse(content, filePath, source);
  }

  clearCache(): void {
    this.loaded = undefined;
  }

  private enabledSources(): CatalogSource[] {
    return CATALOG_SOURCES.filter(
      (source) =>
        (source !== "builtin" || this.loadBuiltins) && (source !== "user" || this.loadUser)
    );
  }
}
