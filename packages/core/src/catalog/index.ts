export {
  type CatalogEntry,
  CatalogLoader,
  type CatalogLoaderOptions,
  type CatalogLoadError,
  frontmatterLoadError,
} from "./catalog-loader.js";
export {
  builtinDir,
  CATALOG_SOURCES,
  type CatalogKind,
  type CatalogSource,
  catalogDir,
  listMarkdownFiles,
} from "./sources.js";
