import type { GraphemeRuleSet } from "../core/types.ts";
import type { PropertyDatabase } from "../ucd/database.ts";
import type {
  GraphemeClusterBreak,
  IndicConjunctBreak,
  PropertyName,
} from "../unicode/properties.ts";

/**
 * Properties of one code point that the grapheme rules inspect.
 */
export interface GraphemeClass {
  gcb: GraphemeClusterBreak;
  extendedPictographic: boolean;
  incb: IndicConjunctBreak;
}

/**
 * Trailing context of the cluster under construction.
 */
export interface ClusterState {
  /** Regional indicators ending the cluster. */
  regionalIndicators: number;
  /** Cluster ends in ExtPict Extend*. */
  pictographic: boolean;
  /** Cluster ends in ExtPict Extend* ZWJ. */
  zwjAfterPictographic: boolean;
  /** Cluster ends in an InCB consonant followed by InCB Extend only. */
  incbConsonant: boolean;
  /** Cluster ends in Consonant [Extend Linker]* Linker [Extend Linker]*. */
  incbAfterLinker: boolean;
}

export type GraphemeRuleId =
  | "GB3"
  | "GB4"
  | "GB5"
  | "GB6"
  | "GB7"
  | "GB8"
  | "GB9"
  | "GB9a"
  | "GB9b"
  | "GB9c"
  | "GB11"
  | "GB12/13"
  | "GB999";

/**
 * GraphemeRule pairs a predicate with the decision it forces.
 */
export interface GraphemeRule {
  id: GraphemeRuleId;
  breaks: boolean;
  applies(prev: GraphemeClass, next: GraphemeClass, state: ClusterState): boolean;
}

/**
 * Decision reached between two code points.
 */
export interface BreakDecision {
  rule: GraphemeRuleId;
  breaks: boolean;
}

const isControlLike = (gcb: GraphemeClusterBreak) =>
  gcb === "Control" || gcb === "CR" || gcb === "LF";

const rule = (
  id: GraphemeRuleId,
  breaks: boolean,
  applies: GraphemeRule["applies"],
): GraphemeRule => ({ id, breaks, applies });

const GB3 = rule("GB3", false, (prev, next) => prev.gcb === "CR" && next.gcb === "LF");
const GB4 = rule("GB4", true, (prev) => isControlLike(prev.gcb));
const GB5 = rule("GB5", true, (_prev, next) => isControlLike(next.gcb));
const GB6 = rule(
  "GB6",
  false,
  (prev, next) =>
    prev.gcb === "L" &&
    (next.gcb === "L" || next.gcb === "V" || next.gcb === "LV" || next.gcb === "LVT"),
);
const GB7 = rule(
  "GB7",
  false,
  (prev, next) => (prev.gcb === "LV" || prev.gcb === "V") && (next.gcb === "V" || next.gcb === "T"),
);
const GB8 = rule(
  "GB8",
  false,
  (prev, next) => (prev.gcb === "LVT" || prev.gcb === "T") && next.gcb === "T",
);
const GB9 = rule("GB9", false, (_prev, next) => next.gcb === "Extend" || next.gcb === "ZWJ");
const GB9a = rule("GB9a", false, (_prev, next) => next.gcb === "SpacingMark");
const GB9b = rule("GB9b", false, (prev) => prev.gcb === "Prepend");
const GB9c = rule(
  "GB9c",
  false,
  (_prev, next, state) => next.incb === "Consonant" && state.incbAfterLinker,
);
const GB11 = rule(
  "GB11",
  false,
  (prev, next, state) =>
    prev.gcb === "ZWJ" && next.extendedPictographic && state.zwjAfterPictographic,
);
const GB12_13 = rule(
  "GB12/13",
  false,
  (prev, next, state) =>
    prev.gcb === "Regional_Indicator" &&
    next.gcb === "Regional_Indicator" &&
    state.regionalIndicators % 2 === 1,
);
const GB999 = rule("GB999", true, () => true);

const RULES_PRE_15_1: readonly GraphemeRule[] = [
  GB3,
  GB4,
  GB5,
  GB6,
  GB7,
  GB8,
  GB9,
  GB9a,
  GB9b,
  GB11,
  GB12_13,
  GB999,
];

const RULES_15_1: readonly GraphemeRule[] = [
  GB3,
  GB4,
  GB5,
  GB6,
  GB7,
  GB8,
  GB9,
  GB9a,
  GB9b,
  GB9c,
  GB11,
  GB12_13,
  GB999,
];

/**
 * Rules of a rule set in priority order. The last rule always applies.
 */
export function graphemeRules(ruleSet: GraphemeRuleSet): readonly GraphemeRule[] {
  return ruleSet === "uax29-15.1" ? RULES_15_1 : RULES_PRE_15_1;
}

/**
 * Properties the rules of a rule set read.
 */
export function requiredGraphemeProperties(ruleSet: GraphemeRuleSet): PropertyName[] {
  const required: PropertyName[] = ["Grapheme_Cluster_Break", "Extended_Pictographic"];
  if (ruleSet === "uax29-15.1") required.push("Indic_Conjunct_Break");
  return required;
}

/**
 * Read the grapheme properties of a code point.
 */
export function classifyCodePoint(
  database: PropertyDatabase,
  codePoint: number,
  ruleSet: GraphemeRuleSet,
): GraphemeClass {
  return {
    gcb: database.lookup(codePoint, "Grapheme_Cluster_Break"),
    extendedPictographic: database.lookup(codePoint, "Extended_Pictographic"),
    incb: ruleSet === "uax29-15.1" ? database.lookup(codePoint, "Indic_Conjunct_Break") : "None",
  };
}

export function initialClusterState(): ClusterState {
  return {
    regionalIndicators: 0,
    pictographic: false,
    zwjAfterPictographic: false,
    incbConsonant: false,
    incbAfterLinker: false,
  };
}

/**
 * Fold a code point that joined the cluster into the trailing context.
 */
export function advanceClusterState(state: ClusterState, added: GraphemeClass): void {
  state.regionalIndicators =
    added.gcb === "Regional_Indicator" ? state.regionalIndicators + 1 : 0;

  if (added.gcb === "ZWJ") {
    state.zwjAfterPictographic = state.pictographic;
    state.pictographic = false;
  } else if (added.gcb === "Extend") {
    state.zwjAfterPictographic = false;
  } else {
    state.pictographic = added.extendedPictographic;
    state.zwjAfterPictographic = false;
  }

  if (added.incb === "Consonant") {
    state.incbConsonant = true;
    state.incbAfterLinker = false;
  } else if (added.incb === "Linker") {
    state.incbAfterLinker = state.incbConsonant || state.incbAfterLinker;
    state.incbConsonant = false;
  } else if (added.incb !== "Extend") {
    state.incbConsonant = false;
    state.incbAfterLinker = false;
  }
}

/**
 * Evaluate the rule table between the cluster so far and the next code point.
 */
export function decideBreak(
  rules: readonly GraphemeRule[],
  prev: GraphemeClass,
  next: GraphemeClass,
  state: ClusterState,
): BreakDecision {
  for (const candidate of rules) {
    if (candidate.applies(prev, next, state)) {
      return { rule: candidate.id, breaks: candidate.breaks };
    }
  }
  return { rule: "GB999", breaks: true };
}
