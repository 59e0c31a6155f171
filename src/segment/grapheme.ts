import { toCodePoints } from "../core/input.ts";
import { createProvenance } from "../core/provenance.ts";
import type { CodePointInput, GraphemeRuleSet } from "../core/types.ts";
import { IMPLEMENTATION_ID } from "../core/version.ts";
import type { PropertyDatabase } from "../ucd/database.ts";
import { requireProperties } from "../ucd/database.ts";
import { formatUnicodeVersion, graphemeRuleSetFor } from "../unicode/version.ts";
import { GraphemeCursor } from "./cursor.ts";
import type { BreakDecision } from "./rules.ts";
import { requiredGraphemeProperties } from "./rules.ts";
import type { ClusterIterable } from "./segment-iterable.ts";
import { createClusterIterable } from "./segment-iterable.ts";

/**
 * GraphemeSegmentOptions defines an exported structural contract.
 */
export interface GraphemeSegmentOptions {
  database: PropertyDatabase;
}

/**
 * BreakExplanation is the decision between the code points at
 * `position - 1` and `position`.
 */
export interface BreakExplanation extends BreakDecision {
  position: number;
}

const UAX29_SPEC = "https://unicode.org/reports/tr29/";

function prepare(input: CodePointInput, database: PropertyDatabase) {
  const ruleSet: GraphemeRuleSet = graphemeRuleSetFor(database.version);
  requireProperties(database, requiredGraphemeProperties(ruleSet), "grapheme segmentation");
  const codePoints = toCodePoints(input);
  return { ruleSet, codePoints };
}

/**
 * Segment grapheme clusters using UAX #29.
 * The whole input is validated before the first cluster is produced.
 * Units: Unicode scalar values.
 */
export function segmentGraphemes(
  input: CodePointInput,
  options: GraphemeSegmentOptions,
): ClusterIterable {
  const { database } = options;
  const { ruleSet, codePoints } = prepare(input, database);
  const unicodeVersion = formatUnicodeVersion(database.version);
  const algorithm = {
    name: "UAX29.Grapheme",
    spec: UAX29_SPEC,
    revisionOrDate: `Unicode ${unicodeVersion}`,
    implementationId: IMPLEMENTATION_ID,
  };
  const provenance = createProvenance(algorithm, unicodeVersion, ruleSet, { ruleSet });
  return createClusterIterable(
    () => new GraphemeCursor(codePoints, database, ruleSet),
    provenance,
  );
}

/**
 * Cluster boundaries, including 0 and the input length.
 * Units: Unicode scalar values.
 */
export function graphemeBoundaries(
  input: CodePointInput,
  options: GraphemeSegmentOptions,
): number[] {
  const boundaries = [0];
  for (const span of segmentGraphemes(input, options)) boundaries.push(span.end);
  return boundaries;
}

/**
 * Whether the input is exactly one grapheme cluster.
 */
export function isGraphemeCluster(input: CodePointInput, options: GraphemeSegmentOptions): boolean {
  const cursor = segmentGraphemes(input, options).cursor();
  return cursor.next() !== undefined && cursor.done;
}

/**
 * The rule that decided each position between two code points.
 * Units: Unicode scalar values.
 */
export function explainGraphemeBreaks(
  input: CodePointInput,
  options: GraphemeSegmentOptions,
): BreakExplanation[] {
  const { ruleSet, codePoints } = prepare(input, options.database);
  const cursor = new GraphemeCursor(codePoints, options.database, ruleSet);
  return cursor.explain().map((decision, index) => ({ position: index + 1, ...decision }));
}
