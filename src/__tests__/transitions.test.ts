import { describe, expect, it } from "vitest";
import { advance, canRetry, isEligible, isPermanentlyFailed } from "../catalog/transitions";
import { EntryStatus, FailureReason } from "../catalog/types";
import { makeEntry } from "./helpers";

const policy = { maxAttempts: 3 };
const now = new Date("2026-02-01T12:00:00.000Z");

describe("advance", () => {
  it("moves a discovered entry to fetching and counts the attempt", () => {
    const entry = makeEntry();
    const result = advance(entry, { type: "begin" }, policy, now);

    expect(result).toEqual({
      ok: true,
      entry: {
        ...entry,
        status: EntryStatus.FETCHING,
        attempt_count: 1,
        updated_at: "2026-02-01T12:00:00.000Z"
      }
    });
    expect(entry.status).toBe(EntryStatus.DISCOVERED);
  });

  it("walks the whole forward path", () => {
    const events = [
      { type: "begin" },
      { type: "staged" },
      { type: "processing" },
      { type: "processed" },
      { type: "uploading" },
      { type: "artifact", name: "media", artifact: { key: "media/src/vid1.mp4", bytes: 11 } },
      { type: "uploaded" }
    ] as const;

    let entry = makeEntry();
    const seen: EntryStatus[] = [];
    for (const event of events) {
      const result = advance(entry, event, policy, now);
      if (!result.ok) throw new Error(result.error);
      entry = result.entry;
      seen.push(entry.status);
    }

    expect(seen).toEqual([
      EntryStatus.FETCHING,
      EntryStatus.FETCHED,
      EntryStatus.PROCESSING,
      EntryStatus.PROCESSED,
      EntryStatus.UPLOADING,
      EntryStatus.UPLOADING,
      EntryStatus.UPLOADED
    ]);
    expect(entry.artifacts).toEqual({ media: { key: "media/src/vid1.mp4", bytes: 11 } });
  });

  it("allows skipping the processing status", () => {
    const result = advance(makeEntry({ status: EntryStatus.FETCHED }), { type: "processed" }, policy, now);
    expect(result.ok && result.entry.status).toBe(EntryStatus.PROCESSED);
  });

  it("marks an entry without a transcript from any status after fetching", () => {
    for (const status of [
      EntryStatus.FETCHED,
      EntryStatus.PROCESSING,
      EntryStatus.PROCESSED,
      EntryStatus.UPLOADING
    ]) {
      const result = advance(
        makeEntry({ status, attempt_count: 1 }),
        { type: "no-transcript", message: "No caption track available" },
        policy,
        now
      );
      expect(result.ok && result.entry).toMatchObject({
        status: EntryStatus.NO_TRANSCRIPT,
        last_error: "No caption track available",
        attempt_count: 1
      });
    }

    expect(
      advance(makeEntry(), { type: "no-transcript", message: "none" }, policy, now)
    ).toEqual({ ok: false, error: "Cannot apply 'no-transcript' to an entry in status 'discovered'" });
  });

  it("rejects an event that does not fit the status", () => {
    expect(advance(makeEntry(), { type: "uploaded" }, policy, now)).toEqual({
      ok: false,
      error: "Cannot apply 'uploaded' to an entry in status 'discovered'"
    });
    expect(
      advance(makeEntry({ status: EntryStatus.UPLOADED }), { type: "begin" }, policy, now).ok
    ).toBe(false);
  });

  it("records the failure reason and message", () => {
    const result = advance(
      makeEntry({ status: EntryStatus.FETCHING, attempt_count: 1 }),
      { type: "fail", reason: FailureReason.PERMANENT, message: "Not found" },
      policy,
      now
    );

    expect(result.ok && result.entry).toMatchObject({
      status: EntryStatus.FAILED,
      failure_reason: FailureReason.PERMANENT,
      last_error: "Not found",
      attempt_count: 1
    });
  });

  it("retries a transient failure and clears its reason", () => {
    const failed = makeEntry({
      status: EntryStatus.FAILED,
      attempt_count: 1,
      failure_reason: FailureReason.TRANSIENT_EXHAUSTED,
      last_error: "timeout"
    });

    const result = advance(failed, { type: "begin" }, policy, now);

    expect(result.ok && result.entry).toMatchObject({
      status: EntryStatus.FETCHING,
      attempt_count: 2,
      failure_reason: null,
      last_error: "timeout"
    });
  });

  it("refuses to retry a permanent failure or a used-up budget", () => {
    const permanent = makeEntry({
      status: EntryStatus.FAILED,
      attempt_count: 1,
      failure_reason: FailureReason.PERMANENT
    });
    const exhausted = makeEntry({
      status: EntryStatus.FAILED,
      attempt_count: 3,
      failure_reason: FailureReason.TRANSIENT_EXHAUSTED
    });

    expect(advance(permanent, { type: "begin" }, policy, now)).toEqual({
      ok: false,
      error: "Entry is not retryable (reason: permanent, attempts: 1/3)"
    });
    expect(advance(exhausted, { type: "begin" }, policy, now).ok).toBe(false);
  });

  it("clears the error once uploaded", () => {
    const result = advance(
      makeEntry({ status: EntryStatus.UPLOADING, last_error: "old", attempt_count: 2 }),
      { type: "uploaded" },
      policy,
      now
    );
    expect(result.ok && result.entry).toMatchObject({
      status: EntryStatus.UPLOADED,
      last_error: null,
      failure_reason: null
    });
  });
});

describe("eligibility", () => {
  it("skips finished entries and keeps interrupted ones", () => {
    expect(isEligible(makeEntry({ status: EntryStatus.UPLOADED }), policy)).toBe(false);
    expect(isEligible(makeEntry({ status: EntryStatus.NO_TRANSCRIPT }), policy)).toBe(false);
    expect(isEligible(makeEntry({ status: EntryStatus.DISCOVERED }), policy)).toBe(true);
    expect(isEligible(makeEntry({ status: EntryStatus.UPLOADING }), policy)).toBe(true);
  });

  it("treats upload-unverified failures as retryable", () => {
    const entry = makeEntry({
      status: EntryStatus.FAILED,
      attempt_count: 2,
      failure_reason: FailureReason.UPLOAD_UNVERIFIED
    });
    expect(canRetry(entry, policy)).toBe(true);
    expect(isPermanentlyFailed(entry, policy)).toBe(false);
    expect(isPermanentlyFailed(entry, { maxAttempts: 2 })).toBe(true);
  });
});
