export enum LogLevel {
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR"
}

export type RunStatus = "running" | "completed" | "completed_with_errors" | "failed";

/** Counters mirrored into `ingest_runs` while a run is in progress */
export interface RunMetrics {
  selected: number;
  discovered: number;
  uploaded: number;
  failed: number;
  no_transcript: number;
}

export interface PostgresInterval {
  hours?: number;
  minutes?: number;
  seconds?: number;
}

export interface RunSummaryRow {
  run_label: string;
  status: RunStatus;
  selected: number;
  found: number;
  ok: number;
  fail: number;
  skipped: number;
  duration: string | PostgresInterval | null;
  error_summary: string | null;
}

export interface DailyStats {
  run_label: string;
  run_date: Date;
  runs_count: number;
  total_found: number;
  total_selected: number;
  total_success: number;
  total_failures: number;
  success_rate_pct: number | null;
}
