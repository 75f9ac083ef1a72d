export type RangeParseErrorCode = "INVALID_RANGE_TOKEN";

export class RangeParseError extends Error {
  readonly code: RangeParseErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: RangeParseErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "RangeParseError";
    this.code = code;
    this.details = details;
  }
}
