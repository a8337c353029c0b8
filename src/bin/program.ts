import { Command, InvalidArgumentError } from "commander";
import { CatalogStore } from "../catalog/catalogStore";
import { createS3Client, S3BlobStore } from "../clients/s3Client";
import { RateLimitedSourceClient } from "../clients/sourceClient";
import { YtDlpClient } from "../clients/ytDlpClient";
import { loadConfig, type AppConfig, type ConfigOverrides } from "../config/env";
import { JOB_LIMITS } from "../config/jobs";
import { createDatabase, type Database } from "../db/client";
import { RunRepository } from "../db/runRepository";
import { runDiscovery, type DiscoverTarget } from "../jobs/discoverJob";
import { runPipeline } from "../jobs/pipeline";
import { printAbandonedReport, printRunHistory } from "../jobs/summaryReport";
import { HttpFetcher, YtDlpFetcher } from "../services/mediaFetchers";
import type { SourceKind } from "../sources/types";

interface SharedOptions {
  catalog?: string;
  remoteBucket?: string;
  rateLimitSeconds?: number;
  baseUrl?: string;
}

interface DiscoverOptions extends SharedOptions {
  source: SourceKind;
  root: string;
}

interface IngestOptions extends SharedOptions {
  max?: number;
  skipMedia: boolean;
  skipTranscript: boolean;
  keepLocal: boolean;
  concurrency: number;
  maxAttempts: number;
  stagingDir?: string;
  discover: boolean;
  source?: SourceKind;
  root?: string;
  language: string;
}

interface ReportOptions {
  catalog?: string;
  maxAttempts: number;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export function parseNonNegativeNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative number.");
  }
  return parsed;
}

export function parseSourceKind(value: string): SourceKind {
  if (value === "kolibri" || value === "web") return value;
  throw new InvalidArgumentError("Expected 'kolibri' or 'web'.");
}

/**
 * Resolves the `discover` part of the ingest options.
 * @throws InvalidArgumentError if discovery is requested without a source and root
 */
export function discoverTargetOf(options: IngestOptions): DiscoverTarget | null {
  if (!options.discover) return null;
  if (!options.source || !options.root) {
    throw new InvalidArgumentError("--discover needs --source and --root.");
  }
  return { kind: options.source, root: options.root, baseUrl: options.baseUrl };
}

function overridesOf(options: SharedOptions & { stagingDir?: string }): ConfigOverrides {
  return {
    catalogPath: options.catalog,
    s3Bucket: options.remoteBucket,
    rateLimitSeconds: options.rateLimitSeconds,
    stagingDir: options.stagingDir
  };
}

/**
 * Composition root: every client a run needs, built from one config object.
 * @param options.withDatabase - Set to false for commands that keep no run history
 */
export function createRuntime(
  config: AppConfig,
  { withDatabase = true }: { withDatabase?: boolean } = {}
) {
  const blobStore = new S3BlobStore(createS3Client(config), config.s3Bucket);
  const sourceClient = new RateLimitedSourceClient({
    minDelayMs: Math.round(config.rateLimitSeconds * 1000),
    removedEndpoint: config.removedEndpoint
  });
  const ytDlp = new YtDlpClient(config.ytDlpPath);
  const database =
    withDatabase && config.databaseUrl ? createDatabase(config.databaseUrl) : null;

  return {
    blobStore,
    sourceClient,
    ytDlp,
    database,
    fetchers: [new YtDlpFetcher(sourceClient, ytDlp), new HttpFetcher(sourceClient)]
  };
}

/**
 * Turns SIGINT/SIGTERM into a cooperative stop: no new items start, in-flight items
 * finish. A second signal exits at once.
 */
export function installStopHandler(): AbortController {
  const controller = new AbortController();

  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      console.warn(`\n💥 ${signal} received again, exiting now.`);
      process.exit(130);
    }
    console.warn(`\n⏹️  ${signal} received: finishing in-flight items, then stopping...`);
    controller.abort();
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
  return controller;
}

async function closeDatabase(database: Database | null): Promise<void> {
  if (!database) return;
  await database.close().catch((err: unknown) => {
    console.warn(
      `Could not close the database pool: ${err instanceof Error ? err.message : String(err)}`
    );
  });
}

function discoverCommand(): Command {
  return new Command("discover")
    .description("Walk a content source and merge its items into the catalog")
    .requiredOption("--source <kind>", "Source type: kolibri or web", parseSourceKind)
    .requiredOption("--root <ref>", "Kolibri channel id/name, or the root topic page URL")
    .option("--catalog <path>", "Catalog file (default: CATALOG_PATH)")
    .option("--base-url <url>", "Kolibri server URL (default: KOLIBRI_URL)")
    .option("--rate-limit-seconds <seconds>", "Minimum gap between source requests", parseNonNegativeNumber)
    .option("--remote-bucket <name>", "Bucket holding the published catalog (default: S3_BUCKET)")
    .action(async (options: DiscoverOptions) => {
      const config = loadConfig(overridesOf(options));
      // Discovery writes no run history
      const runtime = createRuntime(config, { withDatabase: false });

      console.log(
        "========================================\n",
        `🔎 Discovering ${options.source} source ${options.root}`,
        "\n========================================"
      );
      const { stats } = await runDiscovery(
        config,
        { kind: options.source, root: options.root, baseUrl: options.baseUrl },
        runtime
      );
      console.table([
        {
          Visited: stats.nodesVisited,
          Leaves: stats.leavesFound,
          "Branches Skipped": stats.branchesSkipped,
          Requests: runtime.sourceClient.requestsMade
        }
      ]);
    });
}

function ingestCommand(): Command {
  return new Command("ingest")
    .description("Fetch, process and upload eligible catalog entries")
    .option("--catalog <path>", "Catalog file (default: CATALOG_PATH)")
    .option("--max <n>", "Process at most N entries", parsePositiveInt)
    .option("--skip-media", "Do not download or upload media files", false)
    .option("--skip-transcript", "Do not process captions into transcripts", false)
    .option("--keep-local", "Keep staged files after a verified upload", false)
    .option("--remote-bucket <name>", "Destination bucket (default: S3_BUCKET)")
    .option("--rate-limit-seconds <seconds>", "Minimum gap between source requests", parseNonNegativeNumber)
    .option("--concurrency <n>", "Items processed in parallel", parsePositiveInt, JOB_LIMITS.CONCURRENCY)
    .option("--max-attempts <n>", "Attempts per entry before it is abandoned", parsePositiveInt, JOB_LIMITS.MAX_ATTEMPTS)
    .option("--staging-dir <path>", "Local staging directory (default: STAGING_DIR)")
    .option("--discover", "Run discovery before selecting entries", false)
    .option("--source <kind>", "Source type for --discover: kolibri or web", parseSourceKind)
    .option("--root <ref>", "Source root for --discover")
    .option("--base-url <url>", "Kolibri server URL for --discover")
    .option("--language <code>", "Preferred caption language", JOB_LIMITS.DEFAULT_CAPTION_LANGUAGE)
    .action(async (options: IngestOptions) => {
      const discover = discoverTargetOf(options);
      const config = loadConfig(overridesOf(options));
      const runtime = createRuntime(config);
      const controller = installStopHandler();

      console.log(
        "========================================\n",
        `🚀 Starting ingest run (catalog: ${config.catalogPath}, bucket: ${config.s3Bucket})`,
        "\n========================================"
      );

      try {
        await runPipeline(
          config,
          {
            maxItems: options.max ?? null,
            skipMedia: options.skipMedia,
            skipTranscript: options.skipTranscript,
            keepLocal: options.keepLocal,
            concurrency: options.concurrency,
            maxAttempts: options.maxAttempts,
            language: options.language,
            discover
          },
          { ...runtime, signal: controller.signal }
        );
      } finally {
        await closeDatabase(runtime.database);
      }
    });
}

function reportCommand(): Command {
  return new Command("report")
    .description("Show run history for the last N days, or 'abandoned' entries")
    .argument("[target]", "Number of days, or 'abandoned'", "7")
    .option("--catalog <path>", "Catalog file for 'abandoned' (default: CATALOG_PATH)")
    .option("--max-attempts <n>", "Attempt budget used to decide what is abandoned", parsePositiveInt, JOB_LIMITS.MAX_ATTEMPTS)
    .action(async (target: string, options: ReportOptions) => {
      const config = loadConfig({ catalogPath: options.catalog }, process.env, {
        requireStorage: false
      });

      if (target === "abandoned") {
        const store = await CatalogStore.load(config.catalogPath);
        printAbandonedReport(store, { maxAttempts: options.maxAttempts });
        return;
      }

      const days = parsePositiveInt(target);
      if (!config.databaseUrl) {
        throw new Error("DATABASE_URL is required for run history");
      }
      const database = createDatabase(config.databaseUrl);
      try {
        await printRunHistory(new RunRepository(database), days);
      } finally {
        await closeDatabase(database);
      }
    });
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("lecture-ingest")
    .description("Discover, fetch, transcribe and archive lecture videos")
    .version("0.1.0");

  program.addCommand(discoverCommand());
  program.addCommand(ingestCommand());
  program.addCommand(reportCommand());

  return program;
}
