import type { CellwidthConfig } from "../config/config.ts";
import { loadConfig } from "../config/config.ts";
import { CellwidthError } from "../core/error.ts";
import type { ClusterSpan, CodePointInput } from "../core/types.ts";
import type { Logger } from "../logger.ts";
import type { BreakExplanation } from "../segment/grapheme.ts";
import {
  explainGraphemeBreaks,
  graphemeBoundaries,
  isGraphemeCluster,
  segmentGraphemes,
} from "../segment/grapheme.ts";
import type { ClusterIterable } from "../segment/segment-iterable.ts";
import type { PropertyDatabase } from "../ucd/database.ts";
import { requireProperties } from "../ucd/database.ts";
import { loadPropertyDatabase } from "../ucd/load.ts";
import type { CellWidth, WidthOptions } from "./width.ts";
import { REQUIRED_WIDTH_PROPERTIES, clusterWidth, displayWidth } from "./width.ts";

/**
 * CellMeasure binds a property database and an ambiguous-width policy.
 */
export interface CellMeasure {
  readonly database: PropertyDatabase;
  readonly ambiguousWidth: 1 | 2;
  segment(input: CodePointInput): ClusterIterable;
  boundaries(input: CodePointInput): number[];
  isCluster(input: CodePointInput): boolean;
  explain(input: CodePointInput): BreakExplanation[];
  widthOf(cluster: ClusterSpan | readonly number[]): CellWidth;
  displayWidth(input: CodePointInput): number;
}

/**
 * Create a CellMeasure. Fails up front if the database cannot support
 * width calculation.
 */
export function createCellMeasure(options: WidthOptions): CellMeasure {
  const { database } = options;
  requireProperties(database, REQUIRED_WIDTH_PROPERTIES, "width calculation");
  const widthOptions: Required<WidthOptions> = {
    database,
    ambiguousWidth: options.ambiguousWidth ?? 1,
  };
  const segmentOptions = { database };
  return {
    database,
    ambiguousWidth: widthOptions.ambiguousWidth,
    segment: (input) => segmentGraphemes(input, segmentOptions),
    boundaries: (input) => graphemeBoundaries(input, segmentOptions),
    isCluster: (input) => isGraphemeCluster(input, segmentOptions),
    explain: (input) => explainGraphemeBreaks(input, segmentOptions),
    widthOf: (cluster) => clusterWidth(cluster, widthOptions),
    displayWidth: (input) => displayWidth(input, widthOptions),
  };
}

/**
 * Create a CellMeasure from configuration: property data from
 * `<ucdPath>/<unicodeVersion>/` and the resolved ambiguous-width policy.
 */
export async function createCellMeasureFromConfig(
  config: CellwidthConfig = loadConfig(),
  logger?: Logger,
): Promise<CellMeasure> {
  if (config.ucdPath === undefined) {
    throw new CellwidthError(
      "CONFIG_INVALID",
      "CELLWIDTH_UCD_PATH is required to load property data",
      { issues: [{ variable: "CELLWIDTH_UCD_PATH", message: "Required" }] },
    );
  }
  const database = await loadPropertyDatabase({
    root: config.ucdPath,
    version: config.unicodeVersion,
    logger,
  });
  return createCellMeasure({ database, ambiguousWidth: config.ambiguousWidth });
}
