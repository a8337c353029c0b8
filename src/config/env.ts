import "dotenv/config";
import type { SourceErrorKind } from "../utils/errors";
import { JOB_LIMITS } from "./jobs";

export interface AppConfig {
  awsRegion: string;
  s3Bucket: string;
  s3Endpoint: string | null;
  databaseUrl: string | null;
  kolibriUrl: string;
  rateLimitSeconds: number;
  /** How a 410 from a source is classified */
  removedEndpoint: SourceErrorKind;
  stagingDir: string;
  catalogPath: string;
  ytDlpPath: string;
}

export interface ConfigOverrides {
  s3Bucket?: string;
  rateLimitSeconds?: number;
  stagingDir?: string;
  catalogPath?: string;
  kolibriUrl?: string;
}

/**
 * Validates and loads application environment variables into a structured config object.
 * CLI flags win over the environment; the bucket may come from either, but one of them
 * must name it.
 * @param overrides - Values given on the command line
 * @param options.requireStorage - Set to false for commands that never reach the bucket
 * @throws Error if a required variable is missing or a numeric value does not parse
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  { requireStorage = true }: { requireStorage?: boolean } = {}
): AppConfig {
  const {
    AWS_REGION,
    S3_BUCKET,
    S3_ENDPOINT,
    DATABASE_URL,
    KOLIBRI_URL,
    RATE_LIMIT_SECONDS,
    REMOVED_ENDPOINT_POLICY,
    STAGING_DIR,
    CATALOG_PATH,
    YT_DLP_PATH
  } = env;

  const s3Bucket = overrides.s3Bucket ?? S3_BUCKET;

  if (requireStorage) {
    if (!AWS_REGION) throw new Error("AWS_REGION is required");
    if (!s3Bucket) throw new Error("S3_BUCKET (or --remote-bucket) is required");
  }

  const rateLimitSeconds =
    overrides.rateLimitSeconds ??
    (RATE_LIMIT_SECONDS !== undefined
      ? Number(RATE_LIMIT_SECONDS)
      : JOB_LIMITS.DEFAULT_RATE_LIMIT_SECONDS);

  if (!Number.isFinite(rateLimitSeconds) || rateLimitSeconds < 0) {
    throw new Error(`RATE_LIMIT_SECONDS must be a non-negative number`);
  }

  const removedEndpoint = REMOVED_ENDPOINT_POLICY || "permanent";
  if (removedEndpoint !== "permanent" && removedEndpoint !== "transient") {
    throw new Error(`REMOVED_ENDPOINT_POLICY must be 'permanent' or 'transient'`);
  }

  return {
    awsRegion: AWS_REGION ?? "",
    s3Bucket: s3Bucket ?? "",
    s3Endpoint: S3_ENDPOINT || null,
    databaseUrl: DATABASE_URL || null,
    kolibriUrl: overrides.kolibriUrl ?? KOLIBRI_URL ?? "http://localhost:8080",
    rateLimitSeconds,
    removedEndpoint,
    stagingDir: overrides.stagingDir ?? STAGING_DIR ?? ".staging",
    catalogPath: overrides.catalogPath ?? CATALOG_PATH ?? "data/catalog.json",
    ytDlpPath: YT_DLP_PATH || "yt-dlp"
  };
}
