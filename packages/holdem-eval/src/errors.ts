export type HoldemEvalErrorCode =
  | "UNEXPECTED_RANK_CHAR"
  | "UNEXPECTED_SUIT_CHAR"
  | "UNEXPECTED_CARD_CHAR"
  | "INVALID_HAND_SIZE"
  | "HOLDEM_HAND_SIZE";

export class HoldemEvalError extends Error {
  readonly code: HoldemEvalErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: HoldemEvalErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "HoldemEvalError";
    this.code = code;
    this.details = details;
  }
}
