import { randomUUID } from "crypto";
import type { FailedItem, RunCounts, RunSummary } from "../catalog/types";
import type { RunRepository } from "../db/runRepository";
import { LogLevel, type PostgresInterval, type RunMetrics, type RunStatus } from "../db/types";

export { LogLevel };

const ICONS: Record<LogLevel, string> = {
  [LogLevel.INFO]: "ℹ️",
  [LogLevel.WARN]: "⚠️",
  [LogLevel.ERROR]: "❌"
};

/**
 * Tracks one pipeline run: counters, failed items and log lines. Everything is
 * printed to the console; when a run repository is configured it is also stored
 * in Postgres.
 */
export class JobReporter {
  readonly runId: string;
  readonly startedAt: Date;
  private dbRunId: string | null = null;
  private counts: RunCounts = {
    selected: 0,
    discovered: 0,
    fetched: 0,
    processed: 0,
    uploaded: 0,
    failed: 0,
    no_transcript: 0
  };
  private failures: FailedItem[] = [];

  constructor(
    private runLabel: string,
    private repo: RunRepository | null = null,
    private now: () => Date = () => new Date()
  ) {
    this.runId = randomUUID();
    this.startedAt = this.now();
  }

  /**
   * Opens the run record (when run history is enabled) and logs the start.
   * @param executorName - The identifier of the environment or service running the task
   */
  async startRun(executorName: string): Promise<void> {
    const repo = this.repo;
    if (repo) {
      this.dbRunId = await this.mirror("open the run record", () =>
        repo.createRun(this.runLabel, executorName)
      );
    }
    await this.log(LogLevel.INFO, `Run ${this.runId} started for ${this.runLabel}`);
  }

  /**
   * Prints a timestamped line and stores it with the run when run history is enabled.
   */
  async log(level: LogLevel, message: string): Promise<void> {
    const timestamp = this.now().toLocaleTimeString();
    const line = `[${timestamp}] ${ICONS[level]} ${message}`;
    if (level === LogLevel.ERROR) console.error(line);
    else if (level === LogLevel.WARN) console.warn(line);
    else console.log(line);

    const { repo, dbRunId } = this;
    if (repo && dbRunId) {
      await this.mirror("store a log line", () => repo.insertLog(dbRunId, level, message));
    }
  }

  async increment(counter: keyof RunCounts, by: number = 1): Promise<void> {
    this.counts[counter] += by;
    await this.syncMetrics();
  }

  async recordFailure(item: FailedItem): Promise<void> {
    this.failures.push(item);
    await this.increment("failed");
  }

  get currentCounts(): RunCounts {
    return { ...this.counts };
  }

  /**
   * Assembles the write-once summary of this run.
   * @param permanentlyFailed - Keys of entries that will not be retried automatically
   */
  buildSummary(input: {
    stoppedEarly: boolean;
    options: RunSummary["options"];
    permanentlyFailed: string[];
  }): RunSummary {
    return {
      run_id: this.runId,
      started_at: this.startedAt.toISOString(),
      finished_at: this.now().toISOString(),
      stopped_early: input.stoppedEarly,
      options: input.options,
      counts: { ...this.counts },
      failures: [...this.failures],
      permanently_failed: [...input.permanentlyFailed]
    };
  }

  /**
   * Closes the run record and prints the final table.
   * @param outcome - The run summary, or the error that aborted the run
   */
  async finishRun(outcome: RunSummary | Error): Promise<void> {
    let status: RunStatus = "completed";
    let errorSummary: string | null = null;

    if (outcome instanceof Error) {
      status = "failed";
      errorSummary = outcome.message;
      await this.log(LogLevel.ERROR, `Fatal: ${outcome.message}`);
    } else if (this.counts.failed > 0) {
      status = "completed_with_errors";
      errorSummary = this.failures
        .slice(0, 5)
        .map((f) => `${f.source_id}:${f.content_id} ${f.reason}`)
        .join("; ");
    }

    let duration = formatDuration(this.now().getTime() - this.startedAt.getTime());
    const { repo, dbRunId } = this;
    if (repo && dbRunId) {
      const row = await this.mirror("finalize the run record", async () => {
        await repo.finalizeRun(dbRunId, { status, metrics: this.metrics(), errorSummary });
        return repo.getRunSummary(dbRunId);
      });
      // Prefer the duration Postgres recorded for the run
      if (row) duration = formatPostgresInterval(row.duration);
    }

    this.printFinalSummary(status, duration, outcome instanceof Error ? null : outcome);
  }

  private async syncMetrics(): Promise<void> {
    const { repo, dbRunId } = this;
    if (!repo || !dbRunId) return;
    await this.mirror("update run metrics", () => repo.updateMetrics(dbRunId, this.metrics()));
  }

  /**
   * Run history only mirrors the catalog and the run summary, so a failed write
   * is reported and the run carries on.
   * @returns The task's result, or null when it failed
   */
  private async mirror<T>(action: string, task: () => Promise<T>): Promise<T | null> {
    try {
      return await task();
    } catch (err: unknown) {
      console.warn(
        `⚠️ Run history: could not ${action}: ${err instanceof Error ? err.message : String(err)}`
      );
      return null;
    }
  }

  private metrics(): RunMetrics {
    return {
      selected: this.counts.selected,
      discovered: this.counts.discovered,
      uploaded: this.counts.uploaded,
      failed: this.counts.failed,
      no_transcript: this.counts.no_transcript
    };
  }

  private printFinalSummary(
    status: RunStatus,
    duration: string,
    summary: RunSummary | null
  ): void {
    console.log(`\n${"=".repeat(40)}`);
    console.log(`RUN FINISHED: ${this.runLabel}`);
    console.log(`${"=".repeat(40)}`);

    console.table([
      {
        Status: status,
        Discovered: this.counts.discovered,
        Selected: this.counts.selected,
        Fetched: this.counts.fetched,
        Processed: this.counts.processed,
        Uploaded: this.counts.uploaded,
        "No Transcript": this.counts.no_transcript,
        Failed: this.counts.failed,
        Duration: duration
      }
    ]);

    if (this.failures.length > 0) {
      console.log(`\n❌ Failed items:`);
      console.table(
        this.failures.map((f) => ({
          Item: `${f.source_id}:${f.content_id}`,
          Reason: f.reason,
          Error: f.message.slice(0, 80)
        }))
      );
    }
    if (summary && summary.permanently_failed.length > 0) {
      console.log(`\n${summary.permanently_failed.length} item(s) will not be retried automatically.`);
    }
    if (summary?.stopped_early) {
      console.log(`\n⏹️  Stopped early; remaining items will be picked up by the next run.`);
    }
    console.log(`${"=".repeat(40)}\n`);
  }
}

export function formatDuration(ms: number): string {
  const totalSeconds = Math.round(ms / 1000);
  const mins = Math.floor(totalSeconds / 60);
  const secs = totalSeconds % 60;
  return mins > 0 ? `${mins}m ${secs}s` : `${secs}s`;
}

/**
 * Converts a Postgres interval (or its text form) into a short human-readable string.
 */
export function formatPostgresInterval(
  duration: PostgresInterval | string | null | undefined
): string {
  if (!duration) return "0s";
  if (typeof duration === "string") return duration;

  const hours = duration.hours ?? 0;
  const mins = (duration.minutes ?? 0) + hours * 60;
  const secs = Math.round(duration.seconds ?? 0);
  return mins > 0 ? `${mins}m ${secs}s` : `${secs}s`;
}
