/**
 * CellwidthErrorCode enumerates every failure the library reports.
 */
export type CellwidthErrorCode =
  | "INVALID_CODE_POINT"
  | "INVALID_UTF8"
  | "EMPTY_CLUSTER"
  | "UNSUPPORTED_UNICODE_VERSION"
  | "UCD_MALFORMED_RECORD"
  | "UCD_MISSING_FILE"
  | "CONFIG_INVALID";

/**
 * CellwidthError carries a stable code alongside the message.
 */
export class CellwidthError extends Error {
  readonly code: CellwidthErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: CellwidthErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "CellwidthError";
    this.code = code;
    if (details) this.details = details;
  }
}

/**
 * Whether a value is a CellwidthError, optionally with the given code.
 */
export function isCellwidthError(
  value: unknown,
  code?: CellwidthErrorCode,
): value is CellwidthError {
  if (!(value instanceof CellwidthError)) return false;
  return code === undefined || value.code === code;
}
