import type { Database } from "./client";
import type { DailyStats, LogLevel, RunMetrics, RunStatus, RunSummaryRow } from "./types";

export class RunRepository {
  constructor(private db: Database) {}

  /**
   * Opens a run record in 'running' state.
   * @param runLabel - What the run works on (e.g. the catalog path)
   * @param executor - Name of the worker or host running the job
   * @returns The id of the new run
   */
  async createRun(runLabel: string, executor: string): Promise<string> {
    const res = await this.db.query<{ id: string }>(
      `INSERT INTO ingest_runs (run_label, executor, status)
       VALUES ($1, $2, 'running') RETURNING id`,
      [runLabel, executor]
    );
    const row = res.rows[0];
    if (!row) throw new Error("INSERT INTO ingest_runs returned no id");
    return row.id;
  }

  async insertLog(runId: string, level: LogLevel, message: string): Promise<void> {
    await this.db.query(
      `INSERT INTO ingest_run_logs (run_id, level, message) VALUES ($1, $2, $3)`,
      [runId, level, message]
    );
  }

  /**
   * Updates the progress counters while the run is still going.
   */
  async updateMetrics(runId: string, metrics: RunMetrics): Promise<void> {
    await this.db.query(
      `UPDATE ingest_runs
       SET items_selected = $1,
           items_discovered = $2,
           items_uploaded = $3,
           items_failed = $4,
           items_no_transcript = $5
       WHERE id = $6`,
      [
        metrics.selected,
        metrics.discovered,
        metrics.uploaded,
        metrics.failed,
        metrics.no_transcript,
        runId
      ]
    );
  }

  async finalizeRun(
    runId: string,
    data: { status: RunStatus; metrics: RunMetrics; errorSummary: string | null }
  ): Promise<void> {
    await this.updateMetrics(runId, data.metrics);
    await this.db.query(
      `UPDATE ingest_runs
       SET end_time = NOW(),
           status = $1,
           error_summary = $2
       WHERE id = $3`,
      [data.status, data.errorSummary, runId]
    );
  }

  async getRunSummary(runId: string): Promise<RunSummaryRow | null> {
    const { rows } = await this.db.query<RunSummaryRow>(
      `SELECT
        run_label,
        status,
        items_selected as selected,
        items_discovered as found,
        items_uploaded as ok,
        items_failed as fail,
        items_no_transcript as skipped,
        end_time - start_time as duration,
        error_summary
       FROM ingest_runs WHERE id = $1`,
      [runId]
    );
    return rows[0] ?? null;
  }

  /**
   * Aggregates run statistics per catalog and day over a rolling window.
   * @param days - How many days to look back from now
   */
  async getLastDaysSummary(days: number): Promise<DailyStats[]> {
    // COUNT and SUM come back as strings unless cast
    const { rows } = await this.db.query<DailyStats>(
      `
      SELECT
        run_label,
        DATE(start_time) as run_date,
        COUNT(id)::int as runs_count,
        SUM(items_discovered)::int as total_found,
        SUM(items_selected)::int as total_selected,
        SUM(items_uploaded)::int as total_success,
        SUM(items_failed)::int as total_failures,
        ROUND(SUM(items_uploaded)::numeric / NULLIF(SUM(items_uploaded + items_failed), 0) * 100, 1)::float as success_rate_pct
      FROM ingest_runs
      WHERE start_time > NOW() - ($1 * INTERVAL '1 day')
      GROUP BY run_label, run_date
      ORDER BY run_date DESC, run_label;
      `,
      [days]
    );
    return rows;
  }
}
