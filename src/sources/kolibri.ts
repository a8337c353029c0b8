import { z } from "zod";
import type { DiscoveredItem } from "../catalog/catalogStore";
import type { CaptionSource } from "../catalog/types";
import type { RateLimitedSourceClient } from "../clients/sourceClient";
import { SourceError } from "../utils/errors";
import type { ContentSource } from "./types";

const ChannelSchema = z.object({
  id: z.string(),
  name: z.string(),
  root: z.string()
});

const ContentNodeSchema = z.object({
  id: z.string(),
  title: z.string(),
  kind: z.string(),
  duration: z.number().nullable().optional()
});

const LangSchema = z
  .object({ id: z.string().optional(), lang_code: z.string().optional() })
  .nullable()
  .optional();

const FileSchema = z.object({
  preset: z.string().default(""),
  extension: z.string().default(""),
  storage_url: z.string().nullable().optional(),
  lang: LangSchema,
  supplementary: z.boolean().optional()
});

/**
 * Kolibri answers list endpoints with a bare array or, when paginated, with
 * `{ results, next }` where `next` is the URL of the following page.
 */
function pageOf<T extends z.ZodTypeAny>(item: T) {
  return z.union([
    z.array(item).transform((results) => ({ results, next: null })),
    z.object({ results: z.array(item), next: z.string().nullable().optional() })
  ]);
}

/**
 * Reads every page of a list endpoint. Each page is a separate rate-limited request.
 */
async function fetchAllPages<T extends z.ZodTypeAny>(
  client: RateLimitedSourceClient,
  item: T,
  firstUrl: string
): Promise<z.output<T>[]> {
  const schema = pageOf(item);
  const items: z.output<T>[] = [];
  const seen = new Set<string>();

  let url: string | null = firstUrl;
  while (url !== null && !seen.has(url)) {
    seen.add(url);
    const page: z.output<typeof schema> = parse(schema, await client.fetchJson(url), url);
    items.push(...page.results);
    url = page.next ? new URL(page.next, url).toString() : null;
  }
  return items;
}

export type KolibriChannel = z.infer<typeof ChannelSchema>;

export interface KolibriNode {
  id: string;
  title: string;
  kind: "topic" | "video";
  duration: number | null;
}

// Kolibri's file presets, best quality first
const VIDEO_PRESETS = ["high_res_video", "low_res_video", "video_dependency"];
const SUBTITLE_PRESET = "video_subtitle";

/**
 * Walks a Kolibri channel through the content REST API. Topics are inner nodes,
 * videos are leaves; every other kind (exercises, documents, ...) is ignored.
 */
export class KolibriChannelSource implements ContentSource<KolibriNode> {
  readonly sourceId: string;
  private readonly apiUrl: string;

  constructor(
    private client: RateLimitedSourceClient,
    private baseUrl: string,
    private channelId: string
  ) {
    this.sourceId = channelId;
    this.apiUrl = `${baseUrl.replace(/\/+$/, "")}/api/content`;
  }

  /**
   * Finds a channel by id or by a case-insensitive fragment of its name.
   * @throws SourceError (permanent) if no channel matches
   */
  static async resolveChannel(
    client: RateLimitedSourceClient,
    baseUrl: string,
    idOrName: string
  ): Promise<KolibriChannel> {
    const url = `${baseUrl.replace(/\/+$/, "")}/api/content/channel/`;
    const channels = await fetchAllPages(client, ChannelSchema, url);

    const needle = idOrName.toLowerCase();
    const match =
      channels.find((c) => c.id === idOrName) ??
      channels.find((c) => c.name.toLowerCase().includes(needle));

    if (!match) {
      throw new SourceError(
        `No Kolibri channel matches '${idOrName}' (found: ${channels.map((c) => c.name).join(", ") || "none"})`,
        "permanent",
        { url }
      );
    }
    return match;
  }

  async root(): Promise<KolibriNode> {
    const url = `${this.apiUrl}/channel/${encodeURIComponent(this.channelId)}/`;
    const channel = parse(ChannelSchema, await this.client.fetchJson(url), url);
    return { id: channel.root, title: channel.name, kind: "topic", duration: null };
  }

  async listChildren(node: KolibriNode): Promise<KolibriNode[]> {
    const url = `${this.apiUrl}/contentnode/?parent=${encodeURIComponent(node.id)}`;
    const nodes = await fetchAllPages(this.client, ContentNodeSchema, url);

    const children: KolibriNode[] = [];
    for (const n of nodes) {
      if (n.kind !== "topic" && n.kind !== "video") continue;
      children.push({
        id: n.id,
        title: n.title,
        kind: n.kind,
        duration: n.duration ?? null
      });
    }
    return children;
  }

  isLeaf(node: KolibriNode): boolean {
    return node.kind === "video";
  }

  titleOf(node: KolibriNode): string {
    return node.title;
  }

  async toCatalogEntry(node: KolibriNode, topicPath: string[]): Promise<DiscoveredItem> {
    const url = `${this.apiUrl}/file/?contentnode_id=${encodeURIComponent(node.id)}`;
    const files = await fetchAllPages(this.client, FileSchema, url);

    let mediaUrl: string | null = null;
    let mediaRank = Number.POSITIVE_INFINITY;
    const captions: CaptionSource[] = [];

    for (const file of files) {
      if (!file.storage_url) continue;
      const fileUrl = new URL(file.storage_url, this.baseUrl).toString();

      if (file.preset === SUBTITLE_PRESET || file.extension === "vtt") {
        captions.push({
          language: file.lang?.lang_code ?? file.lang?.id ?? "und",
          kind: "manual",
          url: fileUrl
        });
        continue;
      }

      const rank = VIDEO_PRESETS.indexOf(file.preset);
      if (rank >= 0 && rank < mediaRank) {
        mediaRank = rank;
        mediaUrl = fileUrl;
      } else if (mediaUrl === null && file.extension === "mp4") {
        mediaUrl = fileUrl;
      }
    }

    return {
      source_id: this.sourceId,
      content_id: node.id,
      title: node.title,
      topic_path: topicPath,
      duration_seconds: node.duration,
      media_url: mediaUrl,
      caption_urls: captions
    };
  }
}

function parse<T extends z.ZodTypeAny>(schema: T, raw: unknown, url: string): z.output<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new SourceError(
      `Unexpected response shape from ${url}: ${issue.path.join(".") || "(root)"} ${issue.message}`,
      "permanent",
      { url }
    );
  }
  return result.data;
}
