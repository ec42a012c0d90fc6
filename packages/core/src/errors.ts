/**
 * Error raised by bridge components. Coordinate and alias failures are
 * expected during edit races; callers degrade instead of crashing.
 */
export class BridgeError extends Error {
  constructor(
    message: string,
    public readonly code: BridgeErrorCodeType,
    public readonly uri?: string,
    public readonly line?: number,
  ) {
    super(message);
    this.name = "BridgeError";
  }
}

/** Error codes */
export const BridgeErrorCode = {
  MALFORMED_REGION: "MALFORMED_REGION",
  POSITION_OUT_OF_RANGE: "POSITION_OUT_OF_RANGE",
  NO_SYNTHETIC_REGION: "NO_SYNTHETIC_REGION",
  NOT_AN_ALIAS: "NOT_AN_ALIAS",
  UNKNOWN_HOST: "UNKNOWN_HOST",
} as const;

export type BridgeErrorCodeType = (typeof BridgeErrorCode)[keyof typeof BridgeErrorCode];

export function isBridgeError(error: unknown, code?: BridgeErrorCodeType): error is BridgeError {
  if (!(error instanceof BridgeError)) return false;
  return code === undefined || error.code === code;
}

export function formatError(e: unknown): string {
  if (e instanceof Error) return e.stack ?? e.message;
  return String(e);
}
