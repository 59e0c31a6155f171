export type { CellWidth, WidthOptions } from "./width.ts";
export { clusterWidth, clusterWidth as widthOf, codePointWidth, displayWidth } from "./width.ts";
export type { CellMeasure } from "./measure.ts";
export { createCellMeasure, createCellMeasureFromConfig } from "./measure.ts";
