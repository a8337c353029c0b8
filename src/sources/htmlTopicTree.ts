import * as cheerio from "cheerio";
import type { DiscoveredItem } from "../catalog/catalogStore";
import type { RateLimitedSourceClient } from "../clients/sourceClient";
import { SourceError } from "../utils/errors";
import type { ContentSource } from "./types";
import { cleanPageTitle, extractYouTubeId, slugify, youTubeWatchUrl } from "./utils";

export interface PageNode {
  url: string;
  title: string;
  kind: "topic" | "video";
}

const VIDEO_PATH = /\/(?:v|video)\//;

/**
 * Scrapes a website's topic pages. A topic page links to its sub-topics (same-site
 * paths below its own) and to video pages (paths containing `/v/` or `/video/`);
 * a video page embeds a YouTube player whose id becomes the content id.
 */
export class HtmlTopicTreeSource implements ContentSource<PageNode> {
  readonly sourceId: string;
  // Pages fetched to resolve a node's title, kept until their links are read
  private pages = new Map<string, string>();

  constructor(
    private client: RateLimitedSourceClient,
    private rootUrl: string,
    sourceId?: string
  ) {
    this.sourceId = sourceId ?? slugify(new URL(rootUrl).hostname);
  }

  async root(): Promise<PageNode> {
    const url = normalizeUrl(this.rootUrl);
    const html = await this.client.fetchText(url);
    this.pages.set(url, html);

    const $ = cheerio.load(html);
    const heading = $("h1").first().text().trim();
    const title = heading || cleanPageTitle($("title").first().text()) || url;
    return { url, title, kind: "topic" };
  }

  async listChildren(node: PageNode): Promise<PageNode[]> {
    const html = this.pages.get(node.url) ?? (await this.client.fetchText(node.url));
    this.pages.delete(node.url);

    const base = new URL(node.url);
    const basePath = base.pathname.replace(/\/+$/, "");
    const $ = cheerio.load(html);

    const seen = new Set<string>([node.url]);
    const children: PageNode[] = [];

    $("a[href]").each((_, el) => {
      const $link = $(el);
      const href = $link.attr("href");
      if (!href) return;

      let target: URL;
      try {
        target = new URL(href, base);
      } catch {
        return;
      }
      if (target.origin !== base.origin) return;

      const url = normalizeUrl(target.toString());
      if (seen.has(url)) return;

      const isVideo = VIDEO_PATH.test(target.pathname);
      const isSubTopic = !isVideo && target.pathname.startsWith(`${basePath}/`);
      if (!isVideo && !isSubTopic) return;

      seen.add(url);
      const text = $link.text().replace(/\s+/g, " ").trim();
      children.push({
        url,
        title: text || lastSegment(target.pathname),
        kind: isVideo ? "video" : "topic"
      });
    });

    return children;
  }

  isLeaf(node: PageNode): boolean {
    return node.kind === "video";
  }

  titleOf(node: PageNode): string {
    return node.title;
  }

  async toCatalogEntry(node: PageNode, topicPath: string[]): Promise<DiscoveredItem> {
    const html = await this.client.fetchText(node.url);
    const $ = cheerio.load(html);

    // The embedded player first, then ids mentioned by inline scripts
    const candidates = [
      ...$("iframe[src]")
        .toArray()
        .map((el) => $(el).attr("src") ?? ""),
      ...$("script")
        .toArray()
        .map((el) => $(el).html() ?? "")
    ];

    let videoId: string | null = null;
    for (const text of candidates) {
      videoId = extractYouTubeId(text);
      if (videoId) break;
    }

    if (!videoId) {
      throw new SourceError(`No YouTube video embedded in ${node.url}`, "permanent", {
        url: node.url
      });
    }

    const pageTitle = cleanPageTitle($("title").first().text());
    return {
      source_id: this.sourceId,
      content_id: videoId,
      title: pageTitle || node.title,
      topic_path: topicPath,
      duration_seconds: null,
      media_url: youTubeWatchUrl(videoId),
      caption_urls: []
    };
  }
}

function normalizeUrl(raw: string): string {
  const url = new URL(raw);
  url.hash = "";
  url.search = "";
  if (url.pathname.length > 1) url.pathname = url.pathname.replace(/\/+$/, "");
  return url.toString();
}

function lastSegment(pathname: string): string {
  const parts = pathname.split("/").filter(Boolean);
  return decodeURIComponent(parts[parts.length - 1] ?? pathname);
}
