import { createWriteStream } from "fs";
import { mkdir, stat } from "fs/promises";
import path from "path";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import { JOB_LIMITS } from "../config/jobs";
import { isTransientError, SourceError, type SourceErrorKind } from "../utils/errors";
import { fetchOnce, type FetchLike } from "../utils/http";
import { retryWithBackoff, sleep } from "../utils/retry";

export interface SourceClientOptions {
  /** Minimum gap between the end of one call and the start of the next */
  minDelayMs: number;
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  timeoutMs?: number;
  downloadTimeoutMs?: number;
  removedEndpoint?: SourceErrorKind;
  headers?: Record<string, string>;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const DEFAULT_HEADERS = {
  "User-Agent":
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/143.0.0.0 Safari/537.36",
  Accept: "application/json, text/html;q=0.9, */*;q=0.8"
};

/**
 * The single gate every discovery and caption request goes through.
 * Calls are serialized across the whole instance, each one starts at least
 * `minDelayMs` after the previous one completed, and transient failures are retried
 * with exponential backoff (each retry queues up behind the limiter again).
 */
export class RateLimitedSourceClient {
  private queue: Promise<void> = Promise.resolve();
  private lastCompletedAt: number | null = null;
  private requestCount = 0;

  private readonly minDelayMs: number;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly timeoutMs: number;
  private readonly downloadTimeoutMs: number;
  private readonly removedEndpoint: SourceErrorKind;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(options: SourceClientOptions) {
    this.minDelayMs = options.minDelayMs;
    this.maxAttempts = options.maxAttempts ?? JOB_LIMITS.SOURCE_MAX_ATTEMPTS;
    this.baseDelayMs = options.baseDelayMs ?? JOB_LIMITS.SOURCE_BASE_DELAY_MS;
    this.maxDelayMs = options.maxDelayMs ?? JOB_LIMITS.SOURCE_MAX_DELAY_MS;
    this.timeoutMs = options.timeoutMs ?? JOB_LIMITS.SOURCE_TIMEOUT_MS;
    this.downloadTimeoutMs = options.downloadTimeoutMs ?? JOB_LIMITS.DOWNLOAD_TIMEOUT_MS;
    this.removedEndpoint = options.removedEndpoint ?? "permanent";
    this.headers = { ...DEFAULT_HEADERS, ...options.headers };
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
  }

  /** Units of rate budget consumed so far (one per call, retries included) */
  get requestsMade(): number {
    return this.requestCount;
  }

  /**
   * Runs `task` in the instance-wide queue once the minimum delay has passed.
   * No retries; use this for work that is not plain HTTP (e.g. a yt-dlp metadata call).
   * @param label - Short description used in log lines
   * @param task - The call to make
   */
  schedule<T>(label: string, task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(async () => {
      await this.waitForSlot(label);
      try {
        return await task();
      } finally {
        this.requestCount += 1;
        this.lastCompletedAt = this.now();
      }
    });

    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * `schedule` plus bounded retries for transient failures.
   * Permanent errors surface on the first attempt.
   */
  request<T>(label: string, task: () => Promise<T>): Promise<T> {
    return retryWithBackoff(() => this.schedule(label, task), {
      maxAttempts: this.maxAttempts,
      baseDelayMs: this.baseDelayMs,
      maxDelayMs: this.maxDelayMs,
      shouldRetry: isTransientError,
      label,
      sleep: this.sleep
    });
  }

  async fetchText(url: string, init?: RequestInit): Promise<string> {
    return this.request(url, async () => {
      const res = await this.fetchResponse(url, init);
      return res.text();
    });
  }

  async fetchJson(url: string, init?: RequestInit): Promise<unknown> {
    return this.request(url, async () => {
      const res = await this.fetchResponse(url, init);
      const body = await res.text();
      try {
        return JSON.parse(body);
      } catch (err: unknown) {
        throw new SourceError(`Invalid JSON from ${url}`, "permanent", {
          url,
          cause: err
        });
      }
    });
  }

  /**
   * Streams a remote file to disk through the limiter.
   * @returns Number of bytes written
   */
  async download(url: string, destination: string): Promise<number> {
    await mkdir(path.dirname(destination), { recursive: true });

    return this.request(url, async () => {
      const res = await this.fetchResponse(url, undefined, this.downloadTimeoutMs);
      if (!res.body) {
        throw new SourceError(`Empty body from ${url}`, "transient", { url });
      }

      try {
        await pipeline(Readable.fromWeb(res.body), createWriteStream(destination));
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        throw new SourceError(`Download of ${url} interrupted: ${message}`, "transient", {
          url,
          cause: err
        });
      }
      const info = await stat(destination);
      return info.size;
    });
  }

  private fetchResponse(
    url: string,
    init?: RequestInit,
    timeoutMs: number = this.timeoutMs
  ): Promise<Response> {
    const headers = new Headers(this.headers);
    new Headers(init?.headers).forEach((value, name) => headers.set(name, value));

    return fetchOnce(
      url,
      { ...init, headers },
      {
        timeoutMs,
        removedEndpoint: this.removedEndpoint,
        fetchImpl: this.fetchImpl
      }
    );
  }

  private async waitForSlot(label: string): Promise<void> {
    if (this.lastCompletedAt === null || this.minDelayMs <= 0) return;

    const elapsed = this.now() - this.lastCompletedAt;
    if (elapsed < this.minDelayMs) {
      const waitTime = this.minDelayMs - elapsed;
      if (waitTime >= 1000) {
        console.log(
          `⏳ Rate limiting: waiting ${(waitTime / 1000).toFixed(1)}s before ${label}`
        );
      }
      await this.sleep(waitTime);
    }
  }
}
