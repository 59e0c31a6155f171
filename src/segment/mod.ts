export type { BreakExplanation, GraphemeSegmentOptions } from "./grapheme.ts";
export {
  explainGraphemeBreaks,
  graphemeBoundaries,
  isGraphemeCluster,
  segmentGraphemes,
} from "./grapheme.ts";
export type { ClusterIterable } from "./segment-iterable.ts";
export { GraphemeCursor } from "./cursor.ts";
export type { BreakDecision, GraphemeClass, GraphemeRule, GraphemeRuleId } from "./rules.ts";
export { graphemeRules, requiredGraphemeProperties } from "./rules.ts";
