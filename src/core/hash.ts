import { canonicalStringify } from "./canonical.ts";

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;
const utf8Encoder = new TextEncoder();

/**
 * FNV-1a over the UTF-8 bytes of the input, as `fnv1a32:<8 hex digits>`.
 */
export function fnv1a32(input: string): string {
  let hash = FNV_OFFSET_BASIS;
  for (const byte of utf8Encoder.encode(input)) {
    hash = Math.imul(hash ^ byte, FNV_PRIME);
  }
  return `fnv1a32:${(hash >>> 0).toString(16).padStart(8, "0")}`;
}

/**
 * Hash of a value's canonical JSON, so equal option objects hash alike.
 */
export function hashCanonicalSync(value: unknown): string {
  return fnv1a32(canonicalStringify(value));
}
