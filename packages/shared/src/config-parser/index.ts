/**
 * Config Parser Module
 * Handles parsing and validation of workflow and worker markdown files
 *
 * @module config-parser
 */

export {
  type FrontmatterDocument,
  type FrontmatterError,
  type FrontmatterErrorKind,
  FrontmatterParser,
  formatZodIssues,
  parseFrontmatter,
} from "./frontmatter-parser.js";
export * from "./schemas/index.js";
