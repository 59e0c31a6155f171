import type { ClusterSpan, GraphemeRuleSet } from "../core/types.ts";
import type { PropertyDatabase } from "../ucd/database.ts";
import type { BreakDecision, GraphemeClass, GraphemeRule } from "./rules.ts";
import {
  advanceClusterState,
  classifyCodePoint,
  decideBreak,
  graphemeRules,
  initialClusterState,
} from "./rules.ts";

/**
 * GraphemeCursor walks validated code points one cluster at a time.
 * It holds no state beyond its position, so `reset()` replays the same
 * clusters.
 * Units: Unicode scalar values.
 */
export class GraphemeCursor {
  private readonly codePoints: readonly number[];
  private readonly database: PropertyDatabase;
  private readonly ruleSet: GraphemeRuleSet;
  private readonly rules: readonly GraphemeRule[];
  private position = 0;
  private lookahead: { index: number; value: GraphemeClass } | undefined;

  constructor(codePoints: readonly number[], database: PropertyDatabase, ruleSet: GraphemeRuleSet) {
    this.codePoints = codePoints;
    this.database = database;
    this.ruleSet = ruleSet;
    this.rules = graphemeRules(ruleSet);
  }

  /** Offset of the next cluster's first code point. */
  get offset(): number {
    return this.position;
  }

  get done(): boolean {
    return this.position >= this.codePoints.length;
  }

  reset(): void {
    this.position = 0;
    this.lookahead = undefined;
  }

  /**
   * Produce the next cluster, or undefined at the end of the input.
   */
  next(): ClusterSpan | undefined {
    const length = this.codePoints.length;
    if (this.position >= length) return undefined;

    const start = this.position;
    const state = initialClusterState();
    let prev = this.classAt(start);
    advanceClusterState(state, prev);
    let end = start + 1;

    while (end < length) {
      const next = this.classAt(end);
      if (decideBreak(this.rules, prev, next, state).breaks) {
        this.lookahead = { index: end, value: next };
        break;
      }
      advanceClusterState(state, next);
      prev = next;
      end += 1;
    }

    this.position = end;
    return { start, end, codePoints: this.codePoints.slice(start, end) };
  }

  /**
   * Decisions at every position between two code points, in order.
   */
  explain(): BreakDecision[] {
    const decisions: BreakDecision[] = [];
    const length = this.codePoints.length;
    if (length === 0) return decisions;
    let state = initialClusterState();
    let prev = this.classAt(0);
    advanceClusterState(state, prev);
    for (let index = 1; index < length; index += 1) {
      const next = this.classAt(index);
      const decision = decideBreak(this.rules, prev, next, state);
      decisions.push(decision);
      if (decision.breaks) state = initialClusterState();
      advanceClusterState(state, next);
      prev = next;
    }
    return decisions;
  }

  private classAt(index: number): GraphemeClass {
    if (this.lookahead?.index === index) return this.lookahead.value;
    return classifyCodePoint(this.database, this.codePoints[index] ?? 0, this.ruleSet);
  }
}
