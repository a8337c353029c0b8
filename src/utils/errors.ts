import { FailureReason } from "../catalog/types";

export type SourceErrorKind = "transient" | "permanent";

/**
 * Raised by the source client and the media fetchers. `kind` decides whether the
 * call is retried; `status` carries the HTTP status when there was one.
 */
export class SourceError extends Error {
  readonly kind: SourceErrorKind;
  readonly status?: number;
  readonly url?: string;

  constructor(
    message: string,
    kind: SourceErrorKind,
    details: { status?: number; url?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: details.cause });
    this.name = "SourceError";
    this.kind = kind;
    this.status = details.status;
    this.url = details.url;
  }
}

export class UploadVerificationError extends Error {
  constructor(
    readonly key: string,
    readonly expectedBytes: number,
    readonly actualBytes: number | null
  ) {
    super(
      actualBytes === null
        ? `Remote object ${key} not found after upload`
        : `Remote object ${key} has ${actualBytes} bytes, expected ${expectedBytes}`
    );
    this.name = "UploadVerificationError";
  }
}

/** Aborts the whole run before any item is touched */
export class PipelineFatalError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineFatalError";
  }
}

const TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT"
]);

/**
 * Reads the HTTP status an AWS SDK error carries in `$metadata`.
 */
function awsStatusOf(err: Error): number | undefined {
  if (!("$metadata" in err)) return undefined;
  const meta = err.$metadata;
  if (
    typeof meta === "object" &&
    meta !== null &&
    "httpStatusCode" in meta &&
    typeof meta.httpStatusCode === "number"
  ) {
    return meta.httpStatusCode;
  }
  return undefined;
}

function codeOf(err: Error): string | undefined {
  if ("code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

/**
 * Decides whether an error is worth another attempt: timeouts, connection resets,
 * throttling and 5xx answers are; everything the source reported as permanent,
 * verification failures and 4xx answers are not.
 */
export function isTransientError(err: unknown): boolean {
  if (err instanceof SourceError) return err.kind === "transient";
  if (err instanceof UploadVerificationError) return false;
  if (err instanceof PipelineFatalError) return false;
  if (!(err instanceof Error)) return false;

  if (err.name === "TimeoutError" || err.name === "AbortError") return true;

  const code = codeOf(err);
  if (code && TRANSIENT_CODES.has(code)) return true;

  const status = awsStatusOf(err);
  if (status !== undefined) return status === 429 || status >= 500;

  // undici wraps network failures as TypeError("fetch failed") with the real error as cause
  if (err instanceof TypeError && err.message === "fetch failed") return true;
  if (err.cause !== undefined && err.cause !== err) {
    return isTransientError(err.cause);
  }

  return false;
}

/**
 * Maps an error that ended an item's attempt to the reason recorded on the entry.
 * Only errors explicitly marked permanent block automatic retries; anything
 * unrecognised is treated as a retry budget that ran out.
 */
export function failureReasonOf(err: unknown): FailureReason {
  if (err instanceof UploadVerificationError) {
    return FailureReason.UPLOAD_UNVERIFIED;
  }
  if (err instanceof SourceError && err.kind === "permanent") {
    return FailureReason.PERMANENT;
  }
  return FailureReason.TRANSIENT_EXHAUSTED;
}
