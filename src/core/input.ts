import { assertCodePoint, iterateCodePoints } from "./codepoint.ts";
import { CellwidthError } from "./error.ts";
import type { CodePointInput } from "./types.ts";

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

function decodeUtf8(input: Uint8Array): string {
  try {
    return utf8Decoder.decode(input);
  } catch (error) {
    throw new CellwidthError("INVALID_UTF8", "Input is not well-formed UTF-8", {
      byteLength: input.byteLength,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Normalize input into a validated array of code points.
 * Fails on the first element that is not a Unicode scalar value, before
 * anything downstream sees the input.
 * Units: Unicode scalar values.
 */
export function toCodePoints(input: CodePointInput): number[] {
  if (typeof input === "string" || input instanceof Uint8Array) {
    const text = typeof input === "string" ? input : decodeUtf8(input);
    const codePoints: number[] = [];
    for (const cp of iterateCodePoints(text)) {
      assertCodePoint(cp.codePoint, codePoints.length);
      codePoints.push(cp.codePoint);
    }
    return codePoints;
  }
  const codePoints = Array.from(input);
  codePoints.forEach((codePoint, index) => assertCodePoint(codePoint, index));
  return codePoints;
}

/**
 * Render code points back to a string.
 */
export function fromCodePoints(codePoints: readonly number[]): string {
  let text = "";
  for (const codePoint of codePoints) text += String.fromCodePoint(codePoint);
  return text;
}
