/**
 * YAML frontmatter extraction (gray-matter) checked against a zod schema.
 *
 * @module config-parser/frontmatter-parser
 */

import matter from "gray-matter";
import type { ZodError, ZodType, z } from "zod";

import { Err, Ok, type Result } from "../types/result.js";

/**
 * Why a document was rejected:
 * - `missing`: no `---` block at the top
 * - `malformed`: the block is not valid YAML
 * - `invalid`: the YAML does not satisfy the schema
 */
export type FrontmatterErrorKind = "missing" | "malformed" | "invalid";

export interface FrontmatterError {
  kind: FrontmatterErrorKind;
  message: string;
  /** Markdown after the closing delimiter, recovered even when the YAML is broken */
  body: string;
  cause?: unknown;
}

export interface FrontmatterDocument<T> {
  data: T;
  body: string;
}

const TRAILING_BODY = /^\s*---[^\n]*\n[\s\S]*?\n---[^\n]*(?:\n|$)([\s\S]*)$/;

/**
 * `path: message` pairs of every issue, joined with "; ".
 */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * @example
 * ```typescript
 * const result = parseFrontmatter(content, z.object({ name: z.string() }));
 * if (result.ok) {
 *   console.log(result.value.data.name, result.value.body);
 * } else if (result.error.kind === "invalid") {
 *   console.error(result.error.message);
 * }
 * ```
 */
export function parseFrontmatter<S extends ZodType>(
  content: string,
  schema: S
): Result<FrontmatterDocument<z.infer<S>>, FrontmatterError> {
  // Passing options keeps gray-matter from caching parsed files by content.
  const options = { language: "yaml" };

  if (!matter.test(content, options)) {
    return Err({ kind: "missing", message: "missing frontmatter", body: content });
  }

  let file: matter.GrayMatterFile<string>;
  try {
    file = matter(content, options);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return Err({
      kind: "malformed",
      message: `malformed YAML: ${reason}`,
      body: TRAILING_BODY.exec(content)?.[1] ?? "",
      cause: error,
    });
  }

  const validated = schema.safeParse(file.data);
  if (!validated.success) {
    return Err({
      kind: "invalid",
      message: formatZodIssues(validated.error),
      body: file.content,
      cause: validated.error,
    });
  }

  return Ok({ data: validated.data, body: file.content });
}

/**
 * A schema bound once and reused for every file of one kind.
 *
 * @example
 * ```typescript
 * const workflows = new FrontmatterParser(workflowFrontmatterSchema);
 * const result = workflows.parse(await readFile(path, "utf8"));
 * ```
 */
export class FrontmatterParser<S extends ZodType> {
  private readonly schema: S;

  constructor(schema: S) {
    this.schema = schema;
  }

  parse(content: string): Result<FrontmatterDocument<z.infer<S>>, FrontmatterError> {
    return parseFrontmatter(content, this.schema);
  }
}
