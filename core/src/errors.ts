/**
 * Gateway error class (shared).
 *
 * Carries a machine-readable code plus retryable, status, details and cause,
 * so the HTTP layer can map any failure to a response without string matching.
 */

/**
 * Error codes used across the gateway.
 *
 * TIMEOUT, TRANSPORT_UNAVAILABLE, DUPLICATE_KEY and MALFORMED_ACK are the
 * correlation engine's own kinds. Only the first two ever reach a caller of
 * publishAndWait; the other two are handled inside the engine.
 */
export type GatewayErrorCode =
  | "TIMEOUT"
  | "TRANSPORT_UNAVAILABLE"
  | "DUPLICATE_KEY"
  | "MALFORMED_ACK"
  | "UNKNOWN_ACK_CLASS"
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "CONFLICT"
  | "INTERNAL_ERROR";

/** Error codes a publish-and-wait call can resolve with. */
export type AckErrorCode = Extract<GatewayErrorCode, "TIMEOUT" | "TRANSPORT_UNAVAILABLE">;

/**
 * Structured error for gateway operations.
 */
export class GatewayError extends Error {
  public readonly code: GatewayErrorCode;
  public readonly retryable: boolean;
  public readonly status?: number;
  public readonly details?: unknown;
  public readonly cause?: unknown;

  constructor(args: {
    code: GatewayErrorCode;
    message: string;
    retryable?: boolean;
    status?: number;
    details?: unknown;
    cause?: unknown;
  }) {
    super(args.message);
    this.name = "GatewayError";
    this.code = args.code;
    this.retryable = args.retryable ?? false;
    this.status = args.status;
    this.details = args.details;
    this.cause = args.cause;
  }
}

export function isGatewayError(err: unknown, code?: GatewayErrorCode): err is GatewayError {
  return err instanceof GatewayError && (code === undefined || err.code === code);
}

/** Extracts a printable message from anything thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
