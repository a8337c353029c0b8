import {
  EntryStatus,
  FailureReason,
  type CatalogEntry,
  type RemoteArtifact
} from "./types";

export type PipelineEvent =
  | { type: "begin" }
  | { type: "staged" }
  | { type: "processing" }
  | { type: "processed" }
  | { type: "uploading" }
  | { type: "artifact"; name: string; artifact: RemoteArtifact }
  | { type: "uploaded" }
  | { type: "no-transcript"; message: string }
  | { type: "fail"; reason: FailureReason; message: string };

export type PipelineEventType = PipelineEvent["type"];

export interface RetryPolicy {
  maxAttempts: number;
}

export type TransitionResult =
  | { ok: true; entry: CatalogEntry }
  | { ok: false; error: string };

// Statuses each event may be applied to
const ALLOWED_FROM: Record<PipelineEventType, readonly EntryStatus[]> = {
  begin: [EntryStatus.DISCOVERED, EntryStatus.FAILED],
  staged: [EntryStatus.FETCHING],
  processing: [EntryStatus.FETCHED],
  // FETCHED -> PROCESSED is the skip-transcript path
  processed: [EntryStatus.FETCHED, EntryStatus.PROCESSING],
  uploading: [EntryStatus.PROCESSED],
  artifact: [EntryStatus.UPLOADING],
  uploaded: [EntryStatus.UPLOADING],
  // PROCESSED and UPLOADING: a resumed entry whose re-staged files hold nothing to archive
  "no-transcript": [
    EntryStatus.FETCHED,
    EntryStatus.PROCESSING,
    EntryStatus.PROCESSED,
    EntryStatus.UPLOADING
  ],
  fail: [
    EntryStatus.FETCHING,
    EntryStatus.FETCHED,
    EntryStatus.PROCESSING,
    EntryStatus.PROCESSED,
    EntryStatus.UPLOADING
  ]
};

/**
 * True when a failed entry may go back to FETCHING: the failure was not permanent
 * and the attempt budget is not used up.
 */
export function canRetry(entry: CatalogEntry, policy: RetryPolicy): boolean {
  return (
    entry.status === EntryStatus.FAILED &&
    entry.failure_reason !== FailureReason.PERMANENT &&
    entry.attempt_count < policy.maxAttempts
  );
}

export function isPermanentlyFailed(
  entry: CatalogEntry,
  policy: RetryPolicy
): boolean {
  return entry.status === EntryStatus.FAILED && !canRetry(entry, policy);
}

/**
 * Whether a run should pick this entry up. Uploaded and no-transcript entries are
 * finished; failed ones only while they can still be retried. Entries left in an
 * intermediate status by an interrupted run are resumed.
 */
export function isEligible(entry: CatalogEntry, policy: RetryPolicy): boolean {
  switch (entry.status) {
    case EntryStatus.UPLOADED:
    case EntryStatus.NO_TRANSCRIPT:
      return false;
    case EntryStatus.FAILED:
      return canRetry(entry, policy);
    default:
      return true;
  }
}

/**
 * Applies one pipeline event to an entry. Pure: the input is never mutated, and an
 * event that does not fit the current status is reported instead of applied.
 * @param entry - Current catalog entry
 * @param event - What just happened to the item
 * @param policy - Retry budget used to guard FAILED -> FETCHING
 * @param now - Timestamp recorded as `updated_at`
 */
export function advance(
  entry: CatalogEntry,
  event: PipelineEvent,
  policy: RetryPolicy,
  now: Date = new Date()
): TransitionResult {
  if (!ALLOWED_FROM[event.type].includes(entry.status)) {
    return {
      ok: false,
      error: `Cannot apply '${event.type}' to an entry in status '${entry.status}'`
    };
  }

  const updated_at = now.toISOString();

  switch (event.type) {
    case "begin":
      if (entry.status === EntryStatus.FAILED && !canRetry(entry, policy)) {
        return {
          ok: false,
          error: `Entry is not retryable (reason: ${entry.failure_reason}, attempts: ${entry.attempt_count}/${policy.maxAttempts})`
        };
      }
      return {
        ok: true,
        entry: {
          ...entry,
          status: EntryStatus.FETCHING,
          attempt_count: entry.attempt_count + 1,
          failure_reason: null,
          updated_at
        }
      };

    case "staged":
      return { ok: true, entry: { ...entry, status: EntryStatus.FETCHED, updated_at } };

    case "processing":
      return { ok: true, entry: { ...entry, status: EntryStatus.PROCESSING, updated_at } };

    case "processed":
      return { ok: true, entry: { ...entry, status: EntryStatus.PROCESSED, updated_at } };

    case "uploading":
      return { ok: true, entry: { ...entry, status: EntryStatus.UPLOADING, updated_at } };

    case "artifact":
      return {
        ok: true,
        entry: {
          ...entry,
          artifacts: { ...entry.artifacts, [event.name]: event.artifact },
          updated_at
        }
      };

    case "uploaded":
      return {
        ok: true,
        entry: {
          ...entry,
          status: EntryStatus.UPLOADED,
          last_error: null,
          failure_reason: null,
          updated_at
        }
      };

    case "no-transcript":
      return {
        ok: true,
        entry: {
          ...entry,
          status: EntryStatus.NO_TRANSCRIPT,
          last_error: event.message,
          updated_at
        }
      };

    case "fail":
      return {
        ok: true,
        entry: {
          ...entry,
          status: EntryStatus.FAILED,
          failure_reason: event.reason,
          last_error: event.message,
          updated_at
        }
      };
  }
}
