import { hostname } from "os";
import path from "path";
import { loadCatalog, publishCatalog } from "../catalog/catalogSync";
import { isPermanentlyFailed, type RetryPolicy } from "../catalog/transitions";
import { FailureReason, keyOf, type CatalogEntry, type RunSummary } from "../catalog/types";
import {
  buildRunSummaryKey,
  timestampSlug,
  type BlobStore
} from "../clients/s3Client";
import type { RateLimitedSourceClient } from "../clients/sourceClient";
import type { YtDlpClient } from "../clients/ytDlpClient";
import type { AppConfig } from "../config/env";
import type { Database } from "../db/client";
import { RunRepository } from "../db/runRepository";
import {
  IngestService,
  type IngestServiceDeps,
  type ItemResult
} from "../services/ingestService";
import { JobReporter, LogLevel } from "../services/jobReporter";
import type { MediaFetcher } from "../services/mediaFetchers";
import { TranscriptProcessor } from "../services/transcriptProcessor";
import { failureReasonOf } from "../utils/errors";
import { writeFileAtomic } from "../utils/files";
import { runPool } from "../utils/pool";
import { retryWithBackoff } from "../utils/retry";
import { runSentinelCheck } from "../utils/sentinel";
import {
  discoverInto,
  sourceProbe,
  type DiscoverTarget,
  type SourceFactory
} from "./discoverJob";

export interface PipelineOptions {
  /** Hard cap on entries selected this run (null for no cap) */
  maxItems: number | null;
  skipMedia: boolean;
  skipTranscript: boolean;
  keepLocal: boolean;
  concurrency: number;
  maxAttempts: number;
  language: string;
  /** Run discovery first and merge its results */
  discover: DiscoverTarget | null;
}

export interface PipelineDeps {
  blobStore: BlobStore;
  sourceClient: RateLimitedSourceClient;
  fetchers: MediaFetcher[];
  database?: Database | null;
  /** Run history store; built from `database` when not given */
  runs?: RunRepository | null;
  ytDlp?: YtDlpClient | null;
  createSource?: SourceFactory;
  /** Aborting stops new items from starting; in-flight items finish */
  signal?: AbortSignal;
  now?: () => Date;
  stepRetry?: IngestServiceDeps["stepRetry"];
}

/**
 * Runs the ingestion pipeline once:
 * 1. Checks the object store (fatal) and the source (warning only).
 * 2. Loads the catalog, restoring it from the object store when missing locally.
 * 3. Optionally discovers new items and merges them.
 * 4. Selects eligible entries in catalog order, up to `maxItems`.
 * 5. Fetches, processes and uploads them with a fixed-size worker pool.
 * 6. Publishes the catalog and the run summary.
 * Item failures are recorded and reported; only infrastructure or catalog problems
 * before processing starts are thrown.
 * @returns The run summary that was written
 * @throws PipelineFatalError if the object store is unreachable or the catalog is corrupt
 */
export async function runPipeline(
  config: AppConfig,
  options: PipelineOptions,
  deps: PipelineDeps
): Promise<RunSummary> {
  await runSentinelCheck({
    blobStore: deps.blobStore,
    database: deps.database,
    sourceCheck: options.discover
      ? sourceProbe(options.discover, config, deps.sourceClient)
      : null,
    ytDlp: deps.ytDlp
  });

  const reporter = new JobReporter(
    config.catalogPath,
    deps.runs ?? (deps.database ? new RunRepository(deps.database) : null),
    deps.now
  );
  const policy: RetryPolicy = { maxAttempts: options.maxAttempts };

  await reporter.startRun(`${hostname()}-${process.pid}`);

  try {
    const store = await loadCatalog(config.catalogPath, deps.blobStore, deps.now);
    await reporter.log(LogLevel.INFO, `Catalog has ${store.size} entries`);

    if (options.discover) {
      await reporter.log(LogLevel.INFO, "Starting discovery...");
      const { stats, merge } = await discoverInto(store, options.discover, config, deps);
      await reporter.increment("discovered", merge.added);
      await reporter.log(
        stats.branchesSkipped > 0 ? LogLevel.WARN : LogLevel.INFO,
        `Discovery: ${merge.added} new, ${merge.updated} updated, ${stats.branchesSkipped} branches skipped`
      );
    }

    const selected = store.selectEligible(policy, options.maxItems);
    await reporter.increment("selected", selected.length);
    await reporter.log(LogLevel.INFO, `Selected ${selected.length} entries to process`);

    const ingest = new IngestService({
      store,
      blobStore: deps.blobStore,
      fetchers: deps.fetchers,
      processor: new TranscriptProcessor(options.language),
      stagingDir: config.stagingDir,
      policy,
      stepRetry: deps.stepRetry
    });

    const ingestOptions = {
      skipMedia: options.skipMedia,
      skipTranscript: options.skipTranscript,
      keepLocal: options.keepLocal,
      language: options.language
    };

    const pool = await runPool(
      selected,
      options.concurrency,
      async (entry: CatalogEntry) => {
        const key = keyOf(entry);
        let result: ItemResult;
        try {
          result = await ingest.processEntry(key, ingestOptions);
        } catch (err: unknown) {
          // Only a catalog write can fail here; the entry keeps its last saved status
          result = {
            key,
            outcome: "failed",
            fetched: false,
            processed: false,
            reason: failureReasonOf(err),
            message: err instanceof Error ? err.message : String(err)
          };
        }
        try {
          await recordResult(reporter, entry, result);
        } catch (err: unknown) {
          console.warn(
            `[${key}] Could not record the result: ${err instanceof Error ? err.message : String(err)}`
          );
        }
      },
      deps.signal
    );

    if (pool.stoppedEarly) {
      await reporter.log(
        LogLevel.WARN,
        `Stop requested: ${selected.length - pool.started} selected entries were not started`
      );
    }

    await persistCatalog(reporter, () => publishCatalog(store, deps.blobStore));

    const summary = reporter.buildSummary({
      stoppedEarly: pool.stoppedEarly,
      options: {
        max_items: options.maxItems,
        skip_media: options.skipMedia,
        skip_transcript: options.skipTranscript,
        keep_local: options.keepLocal,
        concurrency: options.concurrency,
        max_attempts: options.maxAttempts
      },
      permanentlyFailed: store
        .list()
        .filter((e) => isPermanentlyFailed(e, policy))
        .map(keyOf)
    });

    await writeRunSummary(reporter, config, deps.blobStore, summary);
    await reporter.finishRun(summary);
    return summary;
  } catch (criticalError: unknown) {
    const error =
      criticalError instanceof Error ? criticalError : new Error(String(criticalError));
    await reporter.finishRun(error);
    throw criticalError;
  }
}

async function recordResult(
  reporter: JobReporter,
  entry: CatalogEntry,
  result: ItemResult
): Promise<void> {
  if (result.fetched) await reporter.increment("fetched");
  if (result.processed) await reporter.increment("processed");

  switch (result.outcome) {
    case "uploaded":
      await reporter.increment("uploaded");
      break;
    case "no-transcript":
      await reporter.increment("no_transcript");
      break;
    case "failed":
      await reporter.recordFailure({
        source_id: entry.source_id,
        content_id: entry.content_id,
        reason: result.reason ?? FailureReason.TRANSIENT_EXHAUSTED,
        message: result.message ?? "unknown error"
      });
      await reporter.log(LogLevel.ERROR, `${result.key}: ${result.message ?? "unknown error"}`);
      break;
  }
}

/**
 * The catalog is already saved after every status change, so a failure to publish
 * it remotely is reported without failing the run.
 */
async function persistCatalog(
  reporter: JobReporter,
  publish: () => Promise<void>
): Promise<void> {
  try {
    await retryWithBackoff(publish, { maxAttempts: 3, label: "publish catalog" });
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    await reporter.log(LogLevel.ERROR, `Could not publish the catalog: ${message}`);
  }
}

async function writeRunSummary(
  reporter: JobReporter,
  config: AppConfig,
  blobStore: BlobStore,
  summary: RunSummary
): Promise<void> {
  const startedAt = new Date(summary.started_at);
  const body = JSON.stringify(summary, null, 2);
  const localPath = path.join(
    path.dirname(config.catalogPath),
    "runs",
    `run_summary_${timestampSlug(startedAt)}.json`
  );

  await writeFileAtomic(localPath, body);
  try {
    await retryWithBackoff(
      () => blobStore.putText(buildRunSummaryKey(startedAt), body, "application/json"),
      { maxAttempts: 3, label: "publish run summary" }
    );
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    await reporter.log(
      LogLevel.ERROR,
      `Run summary kept at ${localPath}; upload failed: ${message}`
    );
  }
}
