export const JOB_LIMITS = {
  /** Attempts per entry across runs before it is reported as permanently failed */
  MAX_ATTEMPTS: 3,
  CONCURRENCY: 3,
  DEFAULT_RATE_LIMIT_SECONDS: 0.5,

  // Source client
  SOURCE_MAX_ATTEMPTS: 4,
  SOURCE_BASE_DELAY_MS: 500,
  SOURCE_MAX_DELAY_MS: 8_000,
  SOURCE_TIMEOUT_MS: 30_000,
  /** Whole-transfer budget for file downloads through the source client */
  DOWNLOAD_TIMEOUT_MS: 30 * 60 * 1000,

  // Per-step retries inside the orchestrator
  STEP_MAX_ATTEMPTS: 3,
  STEP_BASE_DELAY_MS: 1_000,
  STEP_MAX_DELAY_MS: 10_000,

  YT_DLP_INFO_TIMEOUT_MS: 60_000,
  YT_DLP_TIMEOUT_MS: 30 * 60 * 1000,
  DEFAULT_CAPTION_LANGUAGE: "en"
} as const;
