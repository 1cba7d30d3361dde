export enum LadderErrorCode {
  INVALID_CONFIGURATION = "INVALID_CONFIGURATION",
  INVALID_LAYOUT = "INVALID_LAYOUT",
  INVALID_NAMES = "INVALID_NAMES",
  RNG_OUT_OF_RANGE = "RNG_OUT_OF_RANGE",
}

export interface LadderErrorPayload {
  error: LadderErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class LadderError extends Error {
  constructor(public readonly code: LadderErrorCode, message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = "LadderError";
  }

  toPayload(): LadderErrorPayload {
    return ladderErrorPayload(this.code, this.message, this.details);
  }
}

export function ladderErrorPayload(code: LadderErrorCode, message: string, details?: Record<string, unknown>): LadderErrorPayload {
  return { error: code, message, details };
}

export function isLadderError(value: unknown): value is LadderError {
  return value instanceof LadderError;
}

export function invalidConfiguration(message: string, details?: Record<string, unknown>): LadderError {
  return new LadderError(LadderErrorCode.INVALID_CONFIGURATION, message, details);
}
