import { fromCodePoints } from "./input.ts";
import type { ClusterSpan } from "./types.ts";

/**
 * Cluster text as a string.
 */
export function clusterText(span: ClusterSpan): string {
  return fromCodePoints(span.codePoints);
}

