import { SourceError, type SourceErrorKind } from "./errors";

export type FetchLike = (
  input: string | URL,
  init?: RequestInit
) => Promise<Response>;

export interface FetchOnceOptions {
  timeoutMs: number;
  /** How a 410 Gone (endpoint removed upstream) is classified */
  removedEndpoint: SourceErrorKind;
  fetchImpl?: FetchLike;
}

/**
 * Classifies a non-2xx HTTP status into a typed source error.
 * Retry on 408/429/5xx, fail fast on the other 4xx; 410 follows the configured policy.
 */
export function classifyHttpStatus(
  status: number,
  url: string,
  removedEndpoint: SourceErrorKind
): SourceError {
  if (status === 410) {
    return new SourceError(
      `Endpoint removed (HTTP 410) for ${url}`,
      removedEndpoint,
      { status, url }
    );
  }

  if (status === 408 || status === 429 || (status >= 500 && status < 600)) {
    return new SourceError(`Server error ${status} for ${url}`, "transient", {
      status,
      url
    });
  }

  if (status === 401 || status === 403) {
    return new SourceError(`Access denied (HTTP ${status}) for ${url}`, "permanent", {
      status,
      url
    });
  }

  if (status === 404) {
    return new SourceError(`Not found: ${url}`, "permanent", { status, url });
  }

  return new SourceError(`Non-retryable HTTP error ${status} for ${url}`, "permanent", {
    status,
    url
  });
}

/**
 * Performs a single bounded fetch and converts failures into `SourceError`s.
 * Network-level exceptions and timeouts become transient errors; HTTP failures are
 * classified by status. Retrying is left to the caller.
 * @param url - The destination endpoint
 * @param init - Standard RequestInit options (headers, method, body, etc.)
 * @param options - Timeout, 410 policy and an optional fetch implementation
 * @returns The successful Response object
 */
export async function fetchOnce(
  url: string,
  init: RequestInit | undefined,
  options: FetchOnceOptions
): Promise<Response> {
  const { timeoutMs, removedEndpoint, fetchImpl = fetch } = options;

  let res: Response;
  try {
    res = await fetchImpl(url, {
      ...init,
      signal: init?.signal ?? AbortSignal.timeout(timeoutMs)
    });
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new SourceError(`Request to ${url} failed: ${message}`, "transient", {
      url,
      cause: err
    });
  }

  if (!res.ok) {
    // release the socket before surfacing the error
    await res.body?.cancel().catch(() => undefined);
    throw classifyHttpStatus(res.status, url, removedEndpoint);
  }

  return res;
}
