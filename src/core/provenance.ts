import { hashCanonicalSync } from "./hash.ts";
import type { AlgorithmInfo, GraphemeRuleSet, Provenance } from "./types.ts";

/**
 * createProvenance executes a deterministic operation in this module.
 */
export function createProvenance(
  algorithm: AlgorithmInfo,
  unicodeVersion: string,
  ruleSet: GraphemeRuleSet,
  options: unknown,
): Provenance {
  return {
    unicodeVersion,
    ruleSet,
    algorithm,
    configHash: hashCanonicalSync(options ?? {}),
    units: {
      offset: "unicode-code-point",
      cluster: "uax29-grapheme",
    },
  };
}
