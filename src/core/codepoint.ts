import { CellwidthError } from "./error.ts";

/**
 * Code point and its UTF-16 index metadata.
 * Units: Unicode scalar values.
 * Units: UTF-16 code units.
 */
export interface CodePointInfo {
  codePoint: number;
  indexCU: number;
  sizeCU: number;
}

export const MAX_CODE_POINT = 0x10ffff;
export const SURROGATE_START = 0xd800;
export const SURROGATE_END = 0xdfff;

/**
 * Iterate code points with UTF-16 code unit offsets.
 * Lone surrogates come through as their own (invalid) values.
 * Units: Unicode scalar values.
 * Units: UTF-16 code units.
 */
export function* iterateCodePoints(text: string): Iterable<CodePointInfo> {
  for (let codeUnitIndex = 0; codeUnitIndex < text.length; ) {
    const codePoint = text.codePointAt(codeUnitIndex) ?? 0;
    const sizeCU = codePointLength(codePoint);
    yield { codePoint, indexCU: codeUnitIndex, sizeCU };
    codeUnitIndex += sizeCU;
  }
}

/**
 * Length of a Unicode scalar value in UTF-16 code units.
 * Units: Unicode scalar values.
 */
export function codePointLength(codePoint: number): number {
  return codePoint > 0xffff ? 2 : 1;
}

/**
 * Whether a value is a Unicode scalar value.
 */
export function isCodePoint(value: number): boolean {
  return (
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_CODE_POINT &&
    (value < SURROGATE_START || value > SURROGATE_END)
  );
}

/**
 * Format a code point in `U+0041` notation.
 */
export function formatCodePoint(codePoint: number): string {
  return `U+${codePoint.toString(16).toUpperCase().padStart(4, "0")}`;
}

/**
 * Throw INVALID_CODE_POINT unless the value is a Unicode scalar value.
 */
export function assertCodePoint(value: number, index?: number): void {
  if (isCodePoint(value)) return;
  const shown = Number.isInteger(value) && value >= 0 ? formatCodePoint(value) : String(value);
  const where = index === undefined ? "" : ` at index ${index}`;
  throw new CellwidthError(
    "INVALID_CODE_POINT",
    `${shown}${where} is not a Unicode scalar value`,
    index === undefined ? { value } : { value, index },
  );
}
