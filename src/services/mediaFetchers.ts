import { readFile } from "fs/promises";
import path from "path";
import { z } from "zod";
import type { CaptionKind, CaptionSource, CatalogEntry } from "../catalog/types";
import type { RateLimitedSourceClient } from "../clients/sourceClient";
import type { VideoInfo, YtDlpClient } from "../clients/ytDlpClient";
import { fileSize, isNotFound, removeMatching, safeSegment, writeFileAtomic } from "../utils/files";
import { isYouTubeUrl } from "../sources/utils";
import { rankTracks } from "./transcriptProcessor";

export interface StagedCaption {
  language: string;
  kind: CaptionKind;
  path: string;
}

export interface StagedAssets {
  mediaPath: string | null;
  captions: StagedCaption[];
}

export interface StageOptions {
  skipMedia: boolean;
  language: string;
}

/**
 * Retrieves an entry's media and caption files into its staging directory.
 */
export interface MediaFetcher {
  readonly name: string;
  supports(entry: CatalogEntry): boolean;
  stage(entry: CatalogEntry, itemDir: string, options: StageOptions): Promise<StagedAssets>;
}

// How many caption tracks to stage per item: the best one plus a fallback
const CAPTIONS_TO_STAGE = 2;

const MANIFEST_FILE = "staged.json";

const StagedAssetsSchema = z.object({
  mediaPath: z.string().nullable(),
  captions: z.array(
    z.object({
      language: z.string(),
      kind: z.enum(["manual", "auto"]),
      path: z.string()
    })
  )
});

export function itemDirFor(stagingDir: string, entry: CatalogEntry): string {
  return path.join(stagingDir, safeSegment(entry.source_id), safeSegment(entry.content_id));
}

export async function writeStagedManifest(itemDir: string, assets: StagedAssets): Promise<void> {
  await writeFileAtomic(path.join(itemDir, MANIFEST_FILE), JSON.stringify(assets, null, 2));
}

/**
 * Reads what an earlier attempt staged for this item.
 * @returns The staged assets, or null if the manifest or any file it lists is gone
 */
export async function readStagedManifest(itemDir: string): Promise<StagedAssets | null> {
  let raw: string;
  try {
    raw = await readFile(path.join(itemDir, MANIFEST_FILE), "utf-8");
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
  const result = StagedAssetsSchema.safeParse(parsed);
  if (!result.success) return null;

  const assets = result.data;
  const paths = [assets.mediaPath, ...assets.captions.map((c) => c.path)];
  for (const p of paths) {
    if (p !== null && (await fileSize(p)) === null) return null;
  }
  return assets;
}

/**
 * Picks which of the known caption tracks to download, best first.
 */
export function selectCaptionSources(
  sources: CaptionSource[],
  language: string
): CaptionSource[] {
  return rankTracks(sources, language).slice(0, CAPTIONS_TO_STAGE);
}

async function stageCaptions(
  client: RateLimitedSourceClient,
  sources: CaptionSource[],
  itemDir: string,
  language: string
): Promise<StagedCaption[]> {
  const staged: StagedCaption[] = [];
  for (const source of selectCaptionSources(sources, language)) {
    const target = path.join(
      itemDir,
      "captions",
      `${safeSegment(source.language)}.${source.kind}.vtt`
    );
    await client.download(source.url, target);
    staged.push({ language: source.language, kind: source.kind, path: target });
  }
  return staged;
}

/**
 * YouTube videos: caption listings come from yt-dlp's metadata call (made through the
 * rate-limited client), caption files are downloaded directly, media through yt-dlp.
 */
export class YtDlpFetcher implements MediaFetcher {
  readonly name = "yt-dlp";

  constructor(
    private client: RateLimitedSourceClient,
    private ytDlp: YtDlpClient
  ) {}

  supports(entry: CatalogEntry): boolean {
    return entry.media_url !== null && isYouTubeUrl(entry.media_url);
  }

  async stage(
    entry: CatalogEntry,
    itemDir: string,
    options: StageOptions
  ): Promise<StagedAssets> {
    const url = entry.media_url;
    if (url === null) {
      return { mediaPath: null, captions: [] };
    }

    const info = await this.client.schedule(`yt-dlp info ${entry.content_id}`, () =>
      this.ytDlp.fetchInfo(url)
    );
    const sources = dedupeSources([...entry.caption_urls, ...captionSourcesOf(info)]);
    const captions = await stageCaptions(this.client, sources, itemDir, options.language);

    let mediaPath: string | null = null;
    if (!options.skipMedia) {
      // Whatever an interrupted attempt left behind is not trusted
      const stale = await removeMatching(itemDir, "media");
      if (stale.length > 0) {
        console.log(`[${entry.source_id}:${entry.content_id}] Removed stale ${stale.join(", ")}`);
      }
      mediaPath = await this.ytDlp.downloadMedia(url, itemDir, "media");
    }

    return { mediaPath, captions };
  }
}

/**
 * Direct file URLs (a Kolibri server, a CDN): everything goes through the
 * rate-limited client.
 */
export class HttpFetcher implements MediaFetcher {
  readonly name = "http";

  constructor(private client: RateLimitedSourceClient) {}

  supports(entry: CatalogEntry): boolean {
    return entry.media_url === null || !isYouTubeUrl(entry.media_url);
  }

  async stage(
    entry: CatalogEntry,
    itemDir: string,
    options: StageOptions
  ): Promise<StagedAssets> {
    const captions = await stageCaptions(
      this.client,
      entry.caption_urls,
      itemDir,
      options.language
    );

    let mediaPath: string | null = null;
    if (!options.skipMedia && entry.media_url !== null) {
      mediaPath = path.join(itemDir, `media${mediaExtension(entry.media_url)}`);
      await this.client.download(entry.media_url, mediaPath);
    }

    return { mediaPath, captions };
  }
}

export function captionSourcesOf(info: VideoInfo): CaptionSource[] {
  const sources: CaptionSource[] = [];
  const groups: Array<[CaptionKind, VideoInfo["subtitles"]]> = [
    ["manual", info.subtitles],
    ["auto", info.automatic_captions]
  ];

  for (const [kind, tracks] of groups) {
    for (const [language, formats] of Object.entries(tracks ?? {})) {
      const vtt = formats.find((f) => f.ext === "vtt");
      if (vtt) sources.push({ language, kind, url: vtt.url });
    }
  }
  return sources;
}

function dedupeSources(sources: CaptionSource[]): CaptionSource[] {
  const seen = new Set<string>();
  return sources.filter((s) => {
    const id = `${s.kind}:${s.language}`;
    if (seen.has(id)) return false;
    seen.add(id);
    return true;
  });
}

function mediaExtension(url: string): string {
  let ext = "";
  try {
    ext = path.extname(new URL(url).pathname).toLowerCase();
  } catch {
    ext = "";
  }
  return /^\.[a-z0-9]{2,4}$/.test(ext) ? ext : ".mp4";
}

/**
 * @throws Error if no fetcher handles the entry
 */
export function selectFetcher(fetchers: MediaFetcher[], entry: CatalogEntry): MediaFetcher {
  const fetcher = fetchers.find((f) => f.supports(entry));
  if (!fetcher) {
    throw new Error(`No fetcher supports ${entry.media_url ?? "an entry without media"}`);
  }
  return fetcher;
}
