export type { CellwidthErrorCode } from "./src/core/error.ts";
export { CellwidthError, isCellwidthError } from "./src/core/error.ts";
export type { CodePointInfo } from "./src/core/codepoint.ts";
export {
  assertCodePoint,
  formatCodePoint,
  isCodePoint,
  iterateCodePoints,
} from "./src/core/codepoint.ts";
export { fromCodePoints, toCodePoints } from "./src/core/input.ts";
export { clusterText } from "./src/core/span.ts";
export type {
  AlgorithmInfo,
  ClusterSpan,
  CodePointInput,
  GraphemeRuleSet,
  Provenance,
} from "./src/core/types.ts";
export { IMPLEMENTATION_ID, LIBRARY_VERSION } from "./src/core/version.ts";
export type { UnicodeVersion } from "./src/unicode/version.ts";
export {
  KNOWN_UCD_VERSIONS,
  UNICODE_VERSION,
  compareUnicodeVersions,
  formatUnicodeVersion,
  graphemeRuleSetFor,
  isSupportedUnicodeVersion,
  parseUnicodeVersion,
  toEmojiVersion,
} from "./src/unicode/version.ts";
export type {
  EastAsianWidth,
  GeneralCategory,
  GraphemeClusterBreak,
  IndicConjunctBreak,
  PropertyName,
  PropertyValue,
  PropertyValueMap,
} from "./src/unicode/properties.ts";
export * from "./src/ucd/mod.ts";
export * from "./src/segment/mod.ts";
export * from "./src/width/mod.ts";
export type { AmbiguousWidthSetting, CellwidthConfig, Environment } from "./src/config/config.ts";
export { loadConfig, resolveAmbiguousWidth } from "./src/config/config.ts";
export type { Logger } from "./src/logger.ts";
export { createLogger, getLogger, silentLogger } from "./src/logger.ts";
