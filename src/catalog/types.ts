export enum EntryStatus {
  DISCOVERED = "discovered", // Found by discovery, nothing fetched yet
  FETCHING = "fetching", // Media/captions being staged locally
  FETCHED = "fetched", // Assets staged in the local staging directory
  PROCESSING = "processing", // Transcript processor running
  PROCESSED = "processed", // Local artifacts ready for upload
  UPLOADING = "uploading", // Remote writes in progress
  UPLOADED = "uploaded", // Every artifact verified in the object store
  FAILED = "failed", // Attempt ended in error, may be retried
  NO_TRANSCRIPT = "no-transcript" // No caption track and nothing else to archive
}

export enum FailureReason {
  TRANSIENT_EXHAUSTED = "transient-exhausted",
  PERMANENT = "permanent",
  UPLOAD_UNVERIFIED = "upload-unverified"
}

export type CaptionKind = "manual" | "auto";

export interface CaptionSource {
  language: string;
  kind: CaptionKind;
  url: string;
}

export interface RemoteArtifact {
  key: string;
  bytes: number;
}

export interface CatalogEntry {
  source_id: string;
  content_id: string;
  title: string;
  topic_path: string[];
  duration_seconds: number | null;
  media_url: string | null;
  caption_urls: CaptionSource[];
  status: EntryStatus;
  attempt_count: number;
  last_error: string | null;
  failure_reason: FailureReason | null;
  /** Remote artifacts already written and verified, by artifact name */
  artifacts: Record<string, RemoteArtifact>;
  discovered_at: string;
  updated_at: string;
}

/** Fields discovery owns; everything else belongs to the pipeline */
export type DescriptiveFields = Pick<
  CatalogEntry,
  | "title"
  | "topic_path"
  | "duration_seconds"
  | "media_url"
  | "caption_urls"
>;

export interface CatalogDocument {
  version: number;
  last_updated: string;
  entries: Record<string, CatalogEntry>;
}

export const CATALOG_VERSION = 1;

export function entryKey(sourceId: string, contentId: string): string {
  return `${sourceId}:${contentId}`;
}

export function keyOf(entry: Pick<CatalogEntry, "source_id" | "content_id">): string {
  return entryKey(entry.source_id, entry.content_id);
}

export interface FailedItem {
  source_id: string;
  content_id: string;
  reason: FailureReason;
  message: string;
}

export interface RunCounts {
  selected: number;
  discovered: number;
  fetched: number;
  processed: number;
  uploaded: number;
  failed: number;
  no_transcript: number;
}

export interface RunSummary {
  run_id: string;
  started_at: string;
  finished_at: string;
  stopped_early: boolean;
  options: {
    max_items: number | null;
    skip_media: boolean;
    skip_transcript: boolean;
    keep_local: boolean;
    concurrency: number;
    max_attempts: number;
  };
  counts: RunCounts;
  failures: FailedItem[];
  /** Keys that will not be retried automatically */
  permanently_failed: string[];
}
