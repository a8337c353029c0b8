import { mkdtemp, readFile, rm, writeFile, mkdir } from "fs/promises";
import os from "os";
import path from "path";
import type { DiscoveredItem } from "../catalog/catalogStore";
import { EntryStatus, type CatalogEntry } from "../catalog/types";
import type { BlobStore, ObjectHead } from "../clients/s3Client";
import type { AppConfig } from "../config/env";
import type { Database } from "../db/client";
import { RunRepository } from "../db/runRepository";
import type { DailyStats, LogLevel, RunMetrics, RunStatus, RunSummaryRow } from "../db/types";
import type { MediaFetcher, StagedAssets, StageOptions } from "../services/mediaFetchers";
import type { CaptionKind } from "../catalog/types";

export const SAMPLE_VTT = [
  "WEBVTT",
  "",
  "00:00:00.000 --> 00:00:02.000",
  "Hello world",
  "",
  "00:00:02.000 --> 00:00:04.000",
  "again",
  ""
].join("\n");

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), "lecture-ingest-"));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function makeEntry(overrides: Partial<CatalogEntry> = {}): CatalogEntry {
  return {
    source_id: "src",
    content_id: "vid1",
    title: "Video 1",
    topic_path: ["Root"],
    duration_seconds: null,
    media_url: "https://cdn.test/vid1.mp4",
    caption_urls: [],
    status: EntryStatus.DISCOVERED,
    attempt_count: 0,
    last_error: null,
    failure_reason: null,
    artifacts: {},
    discovered_at: "2026-01-01T00:00:00.000Z",
    updated_at: "2026-01-01T00:00:00.000Z",
    ...overrides
  };
}

export function makeItem(overrides: Partial<DiscoveredItem> = {}): DiscoveredItem {
  return {
    source_id: "src",
    content_id: "vid1",
    title: "Video 1",
    topic_path: ["Root"],
    duration_seconds: null,
    media_url: "https://cdn.test/vid1.mp4",
    caption_urls: [],
    ...overrides
  };
}

export function makeConfig(dir: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    awsRegion: "us-east-1",
    s3Bucket: "test-bucket",
    s3Endpoint: null,
    databaseUrl: null,
    kolibriUrl: "http://kolibri.test",
    rateLimitSeconds: 0,
    removedEndpoint: "permanent",
    stagingDir: path.join(dir, "staging"),
    catalogPath: path.join(dir, "data", "catalog.json"),
    ytDlpPath: "yt-dlp",
    ...overrides
  };
}

/**
 * In-process object store. Every write is recorded in `writes`; keys listed in
 * `truncateKeys` are stored one byte short to simulate a broken upload.
 */
export class MemoryBlobStore implements BlobStore {
  readonly bucket = "test-bucket";
  readonly objects = new Map<string, Buffer>();
  readonly contentTypes = new Map<string, string>();
  readonly writes: string[] = [];
  readonly truncateKeys = new Set<string>();
  accessible = true;

  async verifyAccess(): Promise<void> {
    if (!this.accessible) throw new Error("Access Denied");
  }

  async putFile(key: string, filePath: string, contentType: string): Promise<void> {
    const data = await readFile(filePath);
    this.store(key, data, contentType);
  }

  async putText(key: string, body: string, contentType: string): Promise<void> {
    this.store(key, Buffer.from(body, "utf-8"), contentType);
  }

  async head(key: string): Promise<ObjectHead | null> {
    const data = this.objects.get(key);
    return data ? { size: data.length } : null;
  }

  async getText(key: string): Promise<string | null> {
    return this.objects.get(key)?.toString("utf-8") ?? null;
  }

  writesOf(key: string): number {
    return this.writes.filter((k) => k === key).length;
  }

  private store(key: string, data: Buffer, contentType: string): void {
    this.writes.push(key);
    this.contentTypes.set(key, contentType);
    this.objects.set(
      key,
      this.truncateKeys.has(key) ? data.subarray(0, Math.max(0, data.length - 1)) : data
    );
  }
}

export interface FakeCaption {
  language: string;
  kind: CaptionKind;
  content: string;
}

/**
 * Stages fixed content without any network: `media.mp4` plus the configured caption
 * files.
 */
export class FakeFetcher implements MediaFetcher {
  readonly name = "fake";
  calls = 0;
  failWith: Error | null = null;

  constructor(
    public captions: FakeCaption[] = [{ language: "en", kind: "manual", content: SAMPLE_VTT }],
    public mediaContent: string = "media-bytes"
  ) {}

  supports(): boolean {
    return true;
  }

  async stage(entry: CatalogEntry, itemDir: string, options: StageOptions): Promise<StagedAssets> {
    this.calls += 1;
    if (this.failWith) throw this.failWith;

    await mkdir(path.join(itemDir, "captions"), { recursive: true });
    const captions = [];
    for (const caption of this.captions) {
      const target = path.join(itemDir, "captions", `${caption.language}.${caption.kind}.vtt`);
      await writeFile(target, caption.content);
      captions.push({ language: caption.language, kind: caption.kind, path: target });
    }

    let mediaPath: string | null = null;
    if (!options.skipMedia) {
      mediaPath = path.join(itemDir, "media.mp4");
      await writeFile(mediaPath, this.mediaContent);
    }
    return { mediaPath, captions };
  }
}

/** Builds a `fetch` stand-in that answers from a URL -> response table */
export function routeFetch(
  routes: Record<string, () => Response>
): (input: string | URL) => Promise<Response> {
  return async (input) => {
    const url = input.toString();
    const route = routes[url];
    if (!route) return new Response("not found", { status: 404 });
    return route();
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" }
  });
}

export function htmlResponse(body: string, status = 200): Response {
  return new Response(body, { status, headers: { "Content-Type": "text/html" } });
}

export const noSleep = async (): Promise<void> => undefined;

export interface QueryCall {
  text: string;
  params: unknown[];
}

/** Records every statement and answers with no rows */
export function recordingDatabase(calls: QueryCall[]): Database {
  return {
    query: async (text: string, params: unknown[] = []) => {
      calls.push({ text, params });
      return { rows: [] };
    },
    close: async () => undefined
  };
}

/** Run history kept in memory; `failMetricsOnCall` makes that metrics update throw */
export class FakeRunRepository extends RunRepository {
  logs: Array<[LogLevel, string]> = [];
  metrics: RunMetrics[] = [];
  finalized: Array<{ status: RunStatus; errorSummary: string | null }> = [];
  stats: DailyStats[] = [];
  failMetricsOnCall: number | null = null;
  private metricsCalls = 0;

  constructor() {
    super(recordingDatabase([]));
  }

  async createRun(): Promise<string> {
    return "run-1";
  }

  async insertLog(_runId: string, level: LogLevel, message: string): Promise<void> {
    this.logs.push([level, message]);
  }

  async updateMetrics(_runId: string, metrics: RunMetrics): Promise<void> {
    this.metricsCalls += 1;
    if (this.metricsCalls === this.failMetricsOnCall) {
      throw new Error("connection terminated unexpectedly");
    }
    this.metrics.push(metrics);
  }

  async finalizeRun(
    _runId: string,
    data: { status: RunStatus; metrics: RunMetrics; errorSummary: string | null }
  ): Promise<void> {
    this.finalized.push({ status: data.status, errorSummary: data.errorSummary });
  }

  async getRunSummary(): Promise<RunSummaryRow | null> {
    return {
      run_label: "data/catalog.json",
      status: "completed",
      selected: 1,
      found: 0,
      ok: 1,
      fail: 0,
      skipped: 0,
      duration: { minutes: 2, seconds: 5 },
      error_summary: null
    };
  }

  async getLastDaysSummary(): Promise<DailyStats[]> {
    return this.stats;
  }
}
