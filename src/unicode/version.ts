import { CellwidthError } from "../core/error.ts";
import type { GraphemeRuleSet } from "../core/types.ts";

/**
 * UnicodeVersion is a three-component release number.
 */
export interface UnicodeVersion {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
}

const v = (major: number, minor: number, patch = 0): UnicodeVersion => ({ major, minor, patch });

/**
 * UCD releases, oldest first.
 */
export const KNOWN_UCD_VERSIONS: readonly UnicodeVersion[] = [
  v(4, 1),
  v(5, 0),
  v(5, 1),
  v(5, 2),
  v(6, 0),
  v(6, 1),
  v(6, 2),
  v(6, 3),
  v(7, 0),
  v(8, 0),
  v(9, 0),
  v(10, 0),
  v(11, 0),
  v(12, 0),
  v(12, 1),
  v(13, 0),
  v(14, 0),
  v(15, 0),
  v(15, 1),
  v(16, 0),
  v(17, 0),
];

/**
 * First release whose grapheme rules use Extended_Pictographic.
 */
export const FIRST_SUPPORTED_VERSION: UnicodeVersion = v(11, 0);

/**
 * First release with the Indic conjunct rule (GB9c).
 */
export const INDIC_CONJUNCT_VERSION: UnicodeVersion = v(15, 1);

/**
 * UNICODE_VERSION is the release assumed when callers name none.
 */
export const UNICODE_VERSION = "15.1.0";

/**
 * Parse one to three dot-separated components, padding with zeros.
 */
export function parseUnicodeVersion(text: string | UnicodeVersion): UnicodeVersion {
  if (typeof text !== "string") return text;
  const parts = text.trim().split(".");
  if (parts.length > 3) {
    throw new CellwidthError(
      "UNSUPPORTED_UNICODE_VERSION",
      `Too many components in version "${text}"`,
      { version: text },
    );
  }
  const numbers = parts.map((part) =>
    /^\d+$/.test(part) ? Number.parseInt(part, 10) : Number.NaN,
  );
  if (numbers.some((value) => Number.isNaN(value))) {
    throw new CellwidthError(
      "UNSUPPORTED_UNICODE_VERSION",
      `Malformed components in version "${text}"`,
      { version: text },
    );
  }
  return v(numbers[0] ?? 0, numbers[1] ?? 0, numbers[2] ?? 0);
}

export function formatUnicodeVersion(version: UnicodeVersion): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}

export function compareUnicodeVersions(left: UnicodeVersion, right: UnicodeVersion): number {
  if (left.major !== right.major) return left.major < right.major ? -1 : 1;
  if (left.minor !== right.minor) return left.minor < right.minor ? -1 : 1;
  if (left.patch !== right.patch) return left.patch < right.patch ? -1 : 1;
  return 0;
}

/**
 * Whether the version is a UCD release: listed, or newer than the last one listed.
 */
export function isUcdVersion(version: UnicodeVersion): boolean {
  const last = KNOWN_UCD_VERSIONS[KNOWN_UCD_VERSIONS.length - 1];
  if (last && compareUnicodeVersions(version, last) > 0) return true;
  return KNOWN_UCD_VERSIONS.some((known) => compareUnicodeVersions(known, version) === 0);
}

export function isSupportedUnicodeVersion(version: UnicodeVersion): boolean {
  return isUcdVersion(version) && compareUnicodeVersions(version, FIRST_SUPPORTED_VERSION) >= 0;
}

/**
 * Unicode Emoji version that shipped with a UCD version.
 * Emoji versions 1.0 through 5.0 accompany UCD 8.0 through 10.0.
 */
export function toEmojiVersion(version: UnicodeVersion): UnicodeVersion {
  if (version.major < 6) return v(0, 0);
  if (version.major === 6) return v(0, 6);
  if (version.major === 7) return v(0, 7);
  if (version.major <= 10) return v(1 + 2 * (version.major - 8), 0);
  if (version.major === 13) return v(13, 0);
  return version;
}

/**
 * Grapheme rule set for a Unicode version.
 */
export function graphemeRuleSetFor(version: UnicodeVersion): GraphemeRuleSet {
  if (!isSupportedUnicodeVersion(version)) {
    throw new CellwidthError(
      "UNSUPPORTED_UNICODE_VERSION",
      `Unicode ${formatUnicodeVersion(version)} has no supported grapheme rule set`,
      { version: formatUnicodeVersion(version) },
    );
  }
  return compareUnicodeVersions(version, INDIC_CONJUNCT_VERSION) >= 0
    ? "uax29-15.1"
    : "uax29-pre15.1";
}
