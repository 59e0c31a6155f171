import type { ClusterSpan, Provenance } from "../core/types.ts";
import type { GraphemeCursor } from "./cursor.ts";

/**
 * ClusterIterable is a restartable sequence of grapheme clusters.
 * Every iteration, and every `cursor()`, starts from the beginning.
 */
export interface ClusterIterable extends Iterable<ClusterSpan> {
  provenance: Provenance;
  cursor(): GraphemeCursor;
}

/**
 * createClusterIterable executes a deterministic operation in this module.
 */
export function createClusterIterable(
  createCursor: () => GraphemeCursor,
  provenance: Provenance,
): ClusterIterable {
  return {
    provenance,
    cursor: createCursor,
    [Symbol.iterator]: (): Iterator<ClusterSpan> => {
      const cursor = createCursor();
      return {
        next: (): IteratorResult<ClusterSpan> => {
          const value = cursor.next();
          return value === undefined ? { done: true, value: undefined } : { done: false, value };
        },
      };
    },
  };
}
