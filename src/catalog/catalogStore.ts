import { readFile } from "fs/promises";
import { PipelineFatalError } from "../utils/errors";
import { isNotFound, writeFileAtomic } from "../utils/files";
import { parseCatalogDocument } from "./schema";
import { advance, isEligible, type PipelineEvent, type RetryPolicy } from "./transitions";
import {
  CATALOG_VERSION,
  EntryStatus,
  keyOf,
  type CatalogDocument,
  type CatalogEntry,
  type DescriptiveFields
} from "./types";

export type UpsertOutcome = "added" | "updated" | "unchanged";

export interface DiscoveredItem extends DescriptiveFields {
  source_id: string;
  content_id: string;
}

/**
 * The persisted registry of every known item and its pipeline status.
 * Entries keep their insertion order, which is the order runs select them in.
 * Each entry is owned by one worker at a time; whole-document writes go through a
 * single queue so two saves never interleave.
 */
export class CatalogStore {
  private entries = new Map<string, CatalogEntry>();
  private lastUpdated: string;
  private writeChain: Promise<void> = Promise.resolve();
  private queuedWrite: Promise<void> | null = null;

  constructor(
    readonly filePath: string,
    document?: CatalogDocument,
    private now: () => Date = () => new Date()
  ) {
    this.lastUpdated = document?.last_updated ?? this.now().toISOString();
    for (const [key, entry] of Object.entries(document?.entries ?? {})) {
      this.entries.set(key, entry);
    }
  }

  /**
   * Loads the catalog from disk. A missing file yields an empty catalog; a file that
   * cannot be parsed or fails validation is fatal for the run.
   * @param filePath - Location of the catalog JSON document
   * @throws PipelineFatalError if the document is unreadable or invalid
   */
  static async load(
    filePath: string,
    now?: () => Date
  ): Promise<CatalogStore> {
    let raw: string;
    try {
      raw = await readFile(filePath, "utf-8");
    } catch (err: unknown) {
      if (isNotFound(err)) {
        return new CatalogStore(filePath, undefined, now);
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new PipelineFatalError(`Catalog ${filePath} is unreadable: ${message}`, {
        cause: err
      });
    }
    return CatalogStore.fromJson(filePath, raw, now);
  }

  /**
   * Builds a store from a serialized document (local file or remote copy).
   * @throws PipelineFatalError if the JSON or its shape is invalid
   */
  static fromJson(filePath: string, raw: string, now?: () => Date): CatalogStore {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      throw new PipelineFatalError(`Catalog ${filePath} is not valid JSON: ${message}`, {
        cause: err
      });
    }

    const result = parseCatalogDocument(parsed);
    if (!result.success) {
      throw new PipelineFatalError(
        `Catalog ${filePath} is corrupt:\n  ${result.issues.slice(0, 10).join("\n  ")}`
      );
    }
    return new CatalogStore(filePath, result.data, now);
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): CatalogEntry | undefined {
    return this.entries.get(key);
  }

  /** Entries in catalog order */
  list(): CatalogEntry[] {
    return [...this.entries.values()];
  }

  /**
   * Inserts a newly discovered item or refreshes the descriptive fields of a known one.
   * Pipeline progress (status, attempts, errors, uploaded artifacts) is never touched.
   */
  upsertDiscovered(item: DiscoveredItem): UpsertOutcome {
    const key = keyOf(item);
    const existing = this.entries.get(key);
    const timestamp = this.now().toISOString();

    if (!existing) {
      this.entries.set(key, {
        source_id: item.source_id,
        content_id: item.content_id,
        title: item.title,
        topic_path: [...item.topic_path],
        duration_seconds: item.duration_seconds,
        media_url: item.media_url,
        caption_urls: [...item.caption_urls],
        status: EntryStatus.DISCOVERED,
        attempt_count: 0,
        last_error: null,
        failure_reason: null,
        artifacts: {},
        discovered_at: timestamp,
        updated_at: timestamp
      });
      this.touch();
      return "added";
    }

    const refreshed: CatalogEntry = {
      ...existing,
      title: item.title,
      topic_path: [...item.topic_path],
      duration_seconds: item.duration_seconds,
      media_url: item.media_url,
      caption_urls: [...item.caption_urls]
    };

    if (sameDescriptiveFields(existing, refreshed)) {
      return "unchanged";
    }

    this.entries.set(key, { ...refreshed, updated_at: timestamp });
    this.touch();
    return "updated";
  }

  /**
   * Applies a pipeline event to one entry through the pure transition function.
   * @returns The updated entry
   * @throws Error if the key is unknown or the event does not fit the entry's status
   */
  apply(key: string, event: PipelineEvent, policy: RetryPolicy): CatalogEntry {
    const entry = this.entries.get(key);
    if (!entry) {
      throw new Error(`Unknown catalog entry ${key}`);
    }

    const result = advance(entry, event, policy, this.now());
    if (!result.ok) {
      throw new Error(`[${key}] ${result.error}`);
    }

    this.entries.set(key, result.entry);
    this.touch();
    return result.entry;
  }

  /**
   * Picks the entries a run should work on, in catalog order.
   * @param policy - Retry budget deciding which failed entries come back
   * @param maxItems - Hard cap on the selection (null for no cap)
   */
  selectEligible(policy: RetryPolicy, maxItems: number | null): CatalogEntry[] {
    const selected: CatalogEntry[] = [];
    for (const entry of this.entries.values()) {
      if (maxItems !== null && selected.length >= maxItems) break;
      if (isEligible(entry, policy)) selected.push(entry);
    }
    return selected;
  }

  toDocument(): CatalogDocument {
    return {
      version: CATALOG_VERSION,
      last_updated: this.lastUpdated,
      entries: Object.fromEntries(this.entries)
    };
  }

  serialize(): string {
    return JSON.stringify(this.toDocument(), null, 2);
  }

  /**
   * Persists the whole document atomically. Calls made while a write is waiting to
   * start share it: the snapshot is taken when the write begins, so it includes
   * every change made before the call.
   */
  save(): Promise<void> {
    if (this.queuedWrite) return this.queuedWrite;

    const write = this.writeChain.then(() => {
      this.queuedWrite = null;
      return writeFileAtomic(this.filePath, this.serialize());
    });

    this.queuedWrite = write;
    // a failed write is reported to its callers, not to the next one in line
    this.writeChain = write.catch(() => undefined);
    return write;
  }

  private touch(): void {
    this.lastUpdated = this.now().toISOString();
  }
}

function sameDescriptiveFields(a: CatalogEntry, b: CatalogEntry): boolean {
  return (
    a.title === b.title &&
    a.duration_seconds === b.duration_seconds &&
    a.media_url === b.media_url &&
    JSON.stringify(a.topic_path) === JSON.stringify(b.topic_path) &&
    JSON.stringify(a.caption_urls) === JSON.stringify(b.caption_urls)
  );
}
