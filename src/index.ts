export * from "./types.js";
export * from "./errors.js";
export {
  DEFAULT_SIZE_SET,
  normalizeSizes,
  resolveSizeSet,
  type AssetSizeSet,
} from "./sizes.js";
export { resolveSourceImage, SOURCE_CANDIDATES } from "./resolver.js";
export {
  decodeSource,
  packIcon,
  renderRendition,
  type Rendition,
  type SourceBitmap,
} from "./processor.js";
export {
  buildWebManifest,
  DEFAULT_WEB_MANIFEST_OPTIONS,
  emitWebManifest,
  WEB_MANIFEST_FILE,
} from "./manifest.js";
export {
  expectedOutputFiles,
  faviconFile,
  generateFavicons,
  ICON_FILE,
  TOUCH_ICON_FILE,
  type GenerateOptions,
} from "./favicons.js";
export { buildHeadSnippets } from "./runner/reporting.js";
export { loadConfig, type FavikitConfig } from "./config.js";
