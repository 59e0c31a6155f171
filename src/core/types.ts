/**
 * Text accepted by the segmenter and the width calculator: a UTF-16 string,
 * UTF-8 bytes, or code points.
 */
export type CodePointInput = string | Uint8Array | readonly number[];

/**
 * ClusterSpan is one grapheme cluster located in its input.
 * Units: Unicode scalar values (start inclusive, end exclusive).
 */
export interface ClusterSpan {
  start: number;
  end: number;
  codePoints: readonly number[];
}

/**
 * AlgorithmInfo names the algorithm behind a result.
 */
export interface AlgorithmInfo {
  name: string;
  spec: string;
  revisionOrDate: string;
  implementationId: string;
}

/**
 * GraphemeRuleSet selects the grapheme cluster rules in force.
 */
export type GraphemeRuleSet = "uax29-pre15.1" | "uax29-15.1";

/**
 * Provenance records what produced a result, so that two results can be
 * compared for the same Unicode data and options.
 */
export interface Provenance {
  unicodeVersion: string;
  ruleSet: GraphemeRuleSet;
  algorithm: AlgorithmInfo;
  configHash: string;
  units: {
    offset: "unicode-code-point";
    cluster: "uax29-grapheme";
  };
}
