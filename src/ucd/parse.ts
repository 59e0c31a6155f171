import { MAX_CODE_POINT } from "../core/codepoint.ts";
import { CellwidthError } from "../core/error.ts";

/**
 * UcdRecord is one data line of a UCD file. `default` records come from
 * `# @missing:` lines and give the value for code points no record lists.
 * Units: Unicode scalar values.
 */
export interface UcdRecord {
  kind: "record" | "default";
  first: number;
  last: number;
  fields: string[];
  line: number;
}

const EOF_MARKER = "# EOF";
const MISSING_MARKER = "# @missing:";
const CODE_POINT_PATTERN = /^[0-9A-Fa-f]{4,6}$/;

function malformed(message: string, line: number, text: string): CellwidthError {
  return new CellwidthError("UCD_MALFORMED_RECORD", `${message} on line ${line}`, {
    line,
    text,
  });
}

function parseCodePoint(token: string, line: number, text: string): number {
  if (!CODE_POINT_PATTERN.test(token)) {
    throw malformed(`Invalid code point "${token}"`, line, text);
  }
  const value = Number.parseInt(token, 16);
  if (value > MAX_CODE_POINT) {
    throw malformed(`Code point ${token} is out of range`, line, text);
  }
  return value;
}

function parseRecord(
  body: string,
  kind: UcdRecord["kind"],
  line: number,
  text: string,
): UcdRecord {
  const [codePoints = "", ...rest] = body.split(";").map((field) => field.trim());
  if (rest.length === 0) {
    throw malformed("Missing property field", line, text);
  }
  if (/\s/.test(codePoints)) {
    throw malformed(`Code point sequences are not property data: "${codePoints}"`, line, text);
  }
  const [startToken = "", endToken] = codePoints.split("..");
  const first = parseCodePoint(startToken, line, text);
  const last = endToken === undefined ? first : parseCodePoint(endToken, line, text);
  if (last < first) {
    throw malformed(`Reversed range "${codePoints}"`, line, text);
  }
  return { kind, first, last, fields: rest, line };
}

/**
 * Parse the data lines of a UCD property file.
 * Blank lines and comments are skipped and `# EOF` ends the data.
 */
export function* parseUcdRecords(text: string): Iterable<UcdRecord> {
  const lines = text.split(/\r?\n/);
  for (let index = 0; index < lines.length; index += 1) {
    const raw = lines[index] ?? "";
    const lineNumber = index + 1;
    const trimmed = raw.trim();
    if (trimmed === "") continue;
    if (trimmed.startsWith(EOF_MARKER)) return;
    if (trimmed.startsWith(MISSING_MARKER)) {
      const body = trimmed.slice(MISSING_MARKER.length).split("#")[0] ?? "";
      yield parseRecord(body, "default", lineNumber, raw);
      continue;
    }
    if (trimmed.startsWith("#")) continue;
    const body = (trimmed.split("#")[0] ?? "").trim();
    if (body === "") continue;
    yield parseRecord(body, "record", lineNumber, raw);
  }
}
