// ─── Chirp Errors ────────────────────────────────────────────────────────────
//
// Every failure raised by a pass is a ChirpError with a code the caller can
// branch on. None of them is fatal: the caller may retry with another config.
// ─────────────────────────────────────────────────────────────────────────────

export type ChirpErrorCode =
  | "InvalidGrid"
  | "NotQuantized"
  | "PolyphonicInput"
  | "DegenerateEvent"
  | "MalformedTimeSignatureMap"
  | "MalformedTempoMap"
  | "MalformedRepresentation"
  | "InvalidConfig";

export class ChirpError extends Error {
  public readonly code: ChirpErrorCode;

  constructor(code: ChirpErrorCode, message: string) {
    super(message);
    this.name = "ChirpError";
    this.code = code;
  }
}

/** Narrow an unknown thrown value to a ChirpError, optionally of one code. */
export function isChirpError(err: unknown, code?: ChirpErrorCode): err is ChirpError {
  if (!(err instanceof ChirpError)) return false;
  return code === undefined || err.code === code;
}
