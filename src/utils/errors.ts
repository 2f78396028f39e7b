/**
 * Screening error taxonomy
 *
 * API clients raise their own transport exceptions (PolygonClientError,
 * PolygonscanError, DataApiException, GammaApiException). The screening core
 * only ever sees the classes below.
 */

export type TransportErrorCode = "UNREACHABLE" | "RATE_LIMITED" | "MALFORMED";

/**
 * An external data source was unreachable, rate limited or returned data
 * that could not be interpreted. Recoverable per wallet or per page.
 */
export class TransportError extends Error {
  readonly code: TransportErrorCode;
  readonly source: string;

  constructor(
    message: string,
    code: TransportErrorCode,
    options: { source: string; cause?: unknown }
  ) {
    super(message, { cause: options.cause });
    this.name = "TransportError";
    this.code = code;
    this.source = options.source;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Raised by the balance/history oracle. The wallet being evaluated is
 * skipped; the run continues.
 */
export class OracleError extends TransportError {
  readonly wallet: string;
  readonly operation: "balance" | "priorActivityCount" | "resolveBlock" | "priorTrade";

  constructor(
    message: string,
    code: TransportErrorCode,
    options: {
      wallet: string;
      operation: OracleError["operation"];
      source: string;
      cause?: unknown;
    }
  ) {
    super(message, code, { source: options.source, cause: options.cause });
    this.name = "OracleError";
    this.wallet = options.wallet;
    this.operation = options.operation;
  }
}

/**
 * Missing or invalid credential, endpoint or threshold. Fatal at startup,
 * raised before any network activity.
 */
export class ConfigurationError extends Error {
  readonly problems: string[];

  constructor(message: string, problems: string[] = [message]) {
    super(message);
    this.name = "ConfigurationError";
    this.problems = problems;
  }
}

export type DataShapeReason =
  | "NOT_AN_OBJECT"
  | "UNKNOWN_SHAPE"
  | "MISSING_WALLET"
  | "INVALID_WALLET"
  | "MISSING_TX_ID"
  | "MISSING_TIMESTAMP"
  | "MISSING_AMOUNT"
  | "NEGATIVE_AMOUNT";

/**
 * A raw record could not be normalized. Never thrown out of the normalizer
 * batch: drops are counted by reason instead.
 */
export class DataShapeError extends Error {
  readonly reason: DataShapeReason;

  constructor(reason: DataShapeReason, message?: string) {
    super(message ?? `Unrecognized trade record: ${reason}`);
    this.name = "DataShapeError";
    this.reason = reason;
  }
}

/**
 * Best-effort message extraction for logging
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
