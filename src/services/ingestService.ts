import { readFile, rm } from "fs/promises";
import path from "path";
import { z } from "zod";
import type { CatalogStore } from "../catalog/catalogStore";
import type { PipelineEvent, RetryPolicy } from "../catalog/transitions";
import { EntryStatus, FailureReason, type CatalogEntry } from "../catalog/types";
import {
  buildMediaKey,
  buildRawCaptionKey,
  buildTranscriptKey,
  contentTypeFor,
  type BlobStore
} from "../clients/s3Client";
import { JOB_LIMITS } from "../config/jobs";
import {
  failureReasonOf,
  isTransientError,
  UploadVerificationError
} from "../utils/errors";
import { fileSize, isNotFound, writeFileAtomic } from "../utils/files";
import { retryWithBackoff, type RetryOptions } from "../utils/retry";
import {
  itemDirFor,
  readStagedManifest,
  selectFetcher,
  writeStagedManifest,
  type MediaFetcher,
  type StagedAssets
} from "./mediaFetchers";
import {
  toPlainText,
  toTranscriptDocument,
  type TranscriptProcessor
} from "./transcriptProcessor";

export interface IngestOptions {
  skipMedia: boolean;
  skipTranscript: boolean;
  keepLocal: boolean;
  language: string;
}

export type ItemOutcome = "uploaded" | "no-transcript" | "failed";

export interface ItemResult {
  key: string;
  outcome: ItemOutcome;
  /** Steps completed during this call */
  fetched: boolean;
  processed: boolean;
  reason?: FailureReason;
  message?: string;
}

export interface IngestServiceDeps {
  store: CatalogStore;
  blobStore: BlobStore;
  fetchers: MediaFetcher[];
  processor: TranscriptProcessor;
  stagingDir: string;
  policy: RetryPolicy;
  /** Backoff used for each fetch and upload step */
  stepRetry?: Pick<RetryOptions, "maxAttempts" | "baseDelayMs" | "maxDelayMs" | "sleep">;
}

/** One remote object to write for an item */
export interface PlannedArtifact {
  name: string;
  localPath: string;
  key: string;
  contentType: string;
}

const PLAN_FILE = "upload-plan.json";

// Statuses an attempt can fail from
const IN_FLIGHT: readonly EntryStatus[] = [
  EntryStatus.FETCHING,
  EntryStatus.FETCHED,
  EntryStatus.PROCESSING,
  EntryStatus.PROCESSED,
  EntryStatus.UPLOADING
];

const UploadPlanSchema = z.array(
  z.object({
    name: z.string(),
    localPath: z.string(),
    key: z.string(),
    contentType: z.string()
  })
);

type ProcessResult =
  | { kind: "planned"; plan: PlannedArtifact[] }
  | { kind: "no-transcript"; reason: string };

export class IngestService {
  private readonly stepRetry: IngestServiceDeps["stepRetry"];

  constructor(private deps: IngestServiceDeps) {
    this.stepRetry = deps.stepRetry ?? {
      maxAttempts: JOB_LIMITS.STEP_MAX_ATTEMPTS,
      baseDelayMs: JOB_LIMITS.STEP_BASE_DELAY_MS,
      maxDelayMs: JOB_LIMITS.STEP_MAX_DELAY_MS
    };
  }

  /**
   * Moves one catalog entry as far along the pipeline as it can go in this run:
   * fetch, process, upload and clean up, resuming from whatever status an earlier
   * run left it in. Every status change is saved before the next step starts.
   * Item errors end up on the entry and in the result; only a catalog that cannot be
   * saved is thrown.
   * @param key - Catalog key of the entry
   */
  async processEntry(key: string, options: IngestOptions): Promise<ItemResult> {
    const result: ItemResult = { key, outcome: "failed", fetched: false, processed: false };

    try {
      let entry = this.requireEntry(key);
      if (entry.status === EntryStatus.UPLOADED) return { ...result, outcome: "uploaded" };
      if (entry.status === EntryStatus.NO_TRANSCRIPT) {
        return { ...result, outcome: "no-transcript" };
      }
      const itemDir = itemDirFor(this.deps.stagingDir, entry);

      if (entry.status === EntryStatus.DISCOVERED || entry.status === EntryStatus.FAILED) {
        entry = await this.commit(key, { type: "begin" });
        console.log(`[${key}] Attempt ${entry.attempt_count}/${this.deps.policy.maxAttempts}`);
      }

      let plan: PlannedArtifact[] | null = null;
      if (entry.status === EntryStatus.PROCESSED || entry.status === EntryStatus.UPLOADING) {
        plan = await readUploadPlan(itemDir);
        if (!plan) console.log(`[${key}] Local artifacts are gone, staging again`);
      }

      if (!plan) {
        const staged = await this.fetchStep(key, itemDir, options);
        result.fetched = true;

        const processed = await this.processStep(key, itemDir, staged, options);
        if (processed.kind === "no-transcript") {
          await this.commit(key, { type: "no-transcript", message: processed.reason });
          console.log(`[${key}] No transcript: ${processed.reason}`);
          await this.cleanup(key, itemDir, options);
          return { ...result, outcome: "no-transcript" };
        }
        plan = processed.plan;
        result.processed = true;
      }

      await this.uploadStep(key, plan);
      await this.cleanup(key, itemDir, options);
      return { ...result, outcome: "uploaded" };
    } catch (err: unknown) {
      return { ...result, ...(await this.handleFailure(key, err)) };
    }
  }

  /**
   * Stages the item's files locally. Re-uses what an earlier attempt staged when
   * every file is still there.
   * Transitions: FETCHING -> FETCHED
   */
  private async fetchStep(
    key: string,
    itemDir: string,
    options: IngestOptions
  ): Promise<StagedAssets> {
    const entry = this.requireEntry(key);

    let staged: StagedAssets | null = null;
    if (entry.status !== EntryStatus.FETCHING) {
      staged = await readStagedManifest(itemDir);
    }

    if (!staged) {
      const fetcher = selectFetcher(this.deps.fetchers, entry);
      console.log(`[${key}] Fetching with ${fetcher.name}...`);

      const assets = await this.withRetry(`${key} fetch`, () =>
        fetcher.stage(entry, itemDir, {
          skipMedia: options.skipMedia,
          language: options.language
        })
      );
      await writeStagedManifest(itemDir, assets);
      staged = assets;
    }

    if (entry.status === EntryStatus.FETCHING) {
      await this.commit(key, { type: "staged" });
    }
    return staged;
  }

  /**
   * Turns staged files into the artifacts to upload.
   * Transitions: FETCHED -> PROCESSING -> PROCESSED, FETCHED -> PROCESSED when
   * transcripts are skipped, or -> NO_TRANSCRIPT when nothing is left to archive.
   */
  private async processStep(
    key: string,
    itemDir: string,
    staged: StagedAssets,
    options: IngestOptions
  ): Promise<ProcessResult> {
    const entry = this.requireEntry(key);
    const plan: PlannedArtifact[] = [];

    if (staged.mediaPath) {
      plan.push({
        name: "media",
        localPath: staged.mediaPath,
        key: buildMediaKey(entry.source_id, entry.content_id, path.extname(staged.mediaPath)),
        contentType: contentTypeFor(staged.mediaPath)
      });
    }

    if (options.skipTranscript) {
      const best = staged.captions[0];
      if (best) {
        plan.push(this.rawCaptionArtifact(entry, best.language, best.path));
      }
    } else {
      if (entry.status === EntryStatus.FETCHED) {
        await this.commit(key, { type: "processing" });
      }

      const tracks = await Promise.all(
        staged.captions.map(async (c) => ({
          language: c.language,
          kind: c.kind,
          content: await readFile(c.path, "utf-8")
        }))
      );
      const transcript = this.deps.processor.process(tracks);

      if (transcript.kind === "ok") {
        const source = staged.captions.find(
          (c) => c.language === transcript.track.language && c.kind === transcript.track.kind
        );
        if (source) {
          plan.push(this.rawCaptionArtifact(entry, source.language, source.path));
        }

        const jsonPath = path.join(itemDir, "transcript.json");
        const txtPath = path.join(itemDir, "transcript.txt");
        await writeFileAtomic(
          jsonPath,
          JSON.stringify(toTranscriptDocument(entry.source_id, entry.content_id, transcript), null, 2)
        );
        await writeFileAtomic(txtPath, toPlainText(transcript.segments));

        plan.push(
          {
            name: "transcript_json",
            localPath: jsonPath,
            key: buildTranscriptKey(entry.source_id, entry.content_id, "json"),
            contentType: contentTypeFor(jsonPath)
          },
          {
            name: "transcript_txt",
            localPath: txtPath,
            key: buildTranscriptKey(entry.source_id, entry.content_id, "txt"),
            contentType: contentTypeFor(txtPath)
          }
        );
        console.log(
          `[${key}] Transcript: ${transcript.segments.length} segments, ${transcript.wordCount} words (${transcript.track.language}, ${transcript.track.kind})`
        );
      } else if (plan.length === 0) {
        return { kind: "no-transcript", reason: transcript.reason };
      } else {
        console.log(`[${key}] ${transcript.reason}; archiving media only`);
      }
    }

    if (plan.length === 0) {
      return { kind: "no-transcript", reason: "Nothing to archive: no media and no captions" };
    }

    await writeFileAtomic(path.join(itemDir, PLAN_FILE), JSON.stringify(plan, null, 2));

    const current = this.requireEntry(key);
    if (current.status === EntryStatus.FETCHED || current.status === EntryStatus.PROCESSING) {
      await this.commit(key, { type: "processed" });
    }
    return { kind: "planned", plan };
  }

  /**
   * Writes each planned artifact once and checks it landed with the right size.
   * Artifacts recorded by an earlier attempt, or already present remotely with the
   * same size, are not written again.
   * Transitions: PROCESSED -> UPLOADING -> UPLOADED
   * @throws UploadVerificationError if an object is missing or short after the write
   */
  private async uploadStep(key: string, plan: PlannedArtifact[]): Promise<void> {
    if (this.requireEntry(key).status === EntryStatus.PROCESSED) {
      await this.commit(key, { type: "uploading" });
    }

    for (const artifact of plan) {
      const bytes = await fileSize(artifact.localPath);
      if (bytes === null) {
        throw new Error(`Staged file ${artifact.localPath} disappeared before upload`);
      }

      const recorded = this.requireEntry(key).artifacts[artifact.name];
      if (recorded && recorded.key === artifact.key && recorded.bytes === bytes) {
        continue;
      }

      const existing = await this.withRetry(`${key} head`, () =>
        this.deps.blobStore.head(artifact.key)
      );
      if (existing?.size === bytes) {
        console.log(`[${key}] Skip: ${artifact.key} already exists`);
      } else {
        await this.withRetry(`${key} upload`, () =>
          this.deps.blobStore.putFile(artifact.key, artifact.localPath, artifact.contentType)
        );

        const written = await this.withRetry(`${key} verify`, () =>
          this.deps.blobStore.head(artifact.key)
        );
        if (!written || written.size !== bytes) {
          throw new UploadVerificationError(artifact.key, bytes, written?.size ?? null);
        }
        console.log(`[${key}] Uploaded ${artifact.key} (${bytes} bytes)`);
      }

      await this.commit(key, {
        type: "artifact",
        name: artifact.name,
        artifact: { key: artifact.key, bytes }
      });
    }

    await this.commit(key, { type: "uploaded" });
  }

  /**
   * Deletes the item's staging directory. Runs only once the entry reached a final
   * status, so a failure here is reported but does not change the outcome.
   */
  private async cleanup(key: string, itemDir: string, options: IngestOptions): Promise<void> {
    if (options.keepLocal) return;
    try {
      await rm(itemDir, { recursive: true, force: true });
      console.log(`[${key}] Removed local staging files`);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      console.warn(`[${key}] ⚠️ Could not remove ${itemDir}: ${message}`);
    }
  }

  private rawCaptionArtifact(
    entry: CatalogEntry,
    language: string,
    localPath: string
  ): PlannedArtifact {
    return {
      name: "caption_raw",
      localPath,
      key: buildRawCaptionKey(entry.source_id, entry.content_id, language),
      contentType: contentTypeFor(localPath)
    };
  }

  private async commit(key: string, event: PipelineEvent): Promise<CatalogEntry> {
    const entry = this.deps.store.apply(key, event, this.deps.policy);
    await this.deps.store.save();
    return entry;
  }

  private requireEntry(key: string): CatalogEntry {
    const entry = this.deps.store.get(key);
    if (!entry) throw new Error(`Unknown catalog entry ${key}`);
    return entry;
  }

  private withRetry<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return retryWithBackoff(fn, {
      ...this.stepRetry,
      shouldRetry: isTransientError,
      label
    });
  }

  /**
   * Records the error that ended this attempt on the entry. Local files are left in
   * place so a later run can resume from them.
   */
  private async handleFailure(
    key: string,
    error: unknown
  ): Promise<{ outcome: "failed"; reason: FailureReason; message: string }> {
    const reason = failureReasonOf(error);
    const message = error instanceof Error ? error.message : String(error);

    const entry = this.deps.store.get(key);
    if (entry && IN_FLIGHT.includes(entry.status)) {
      await this.commit(key, { type: "fail", reason, message });
    }

    return { outcome: "failed", reason, message };
  }
}

async function readUploadPlan(itemDir: string): Promise<PlannedArtifact[] | null> {
  let raw: string;
  try {
    raw = await readFile(path.join(itemDir, PLAN_FILE), "utf-8");
  } catch (err: unknown) {
    if (isNotFound(err)) return null;
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = UploadPlanSchema.safeParse(parsed);
  if (!result.success) return null;

  for (const artifact of result.data) {
    if ((await fileSize(artifact.localPath)) === null) return null;
  }
  return result.data;
}
