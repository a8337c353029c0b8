import { loadCatalog, publishCatalog } from "../catalog/catalogSync";
import type { CatalogStore } from "../catalog/catalogStore";
import type { BlobStore } from "../clients/s3Client";
import type { RateLimitedSourceClient } from "../clients/sourceClient";
import type { AppConfig } from "../config/env";
import {
  DiscoveryService,
  mergeDiscovered,
  type DiscoveryStats,
  type MergeResult
} from "../services/discoveryService";
import { HtmlTopicTreeSource } from "../sources/htmlTopicTree";
import { KolibriChannelSource } from "../sources/kolibri";
import type { ContentSource, SourceKind } from "../sources/types";
import { runSentinelCheck } from "../utils/sentinel";

export interface DiscoverTarget {
  kind: SourceKind;
  /** Kolibri channel id or name, or the URL of the root topic page */
  root: string;
  /** Kolibri server; defaults to KOLIBRI_URL */
  baseUrl?: string;
}

export type SourceFactory = (target: DiscoverTarget) => Promise<ContentSource<unknown>>;

export interface DiscoverDeps {
  blobStore: BlobStore;
  sourceClient: RateLimitedSourceClient;
  createSource?: SourceFactory;
  now?: () => Date;
}

export interface DiscoveryOutcome {
  stats: DiscoveryStats;
  merge: MergeResult;
}

/**
 * Builds the content source a discover target names.
 */
export async function buildSource(
  target: DiscoverTarget,
  config: AppConfig,
  client: RateLimitedSourceClient
): Promise<ContentSource<unknown>> {
  switch (target.kind) {
    case "kolibri": {
      const baseUrl = target.baseUrl ?? config.kolibriUrl;
      const channel = await KolibriChannelSource.resolveChannel(client, baseUrl, target.root);
      console.log(`[Discovery] Kolibri channel '${channel.name}' (${channel.id})`);
      return new KolibriChannelSource(client, baseUrl, channel.id);
    }
    case "web":
      return new HtmlTopicTreeSource(client, target.root);
  }
}

/** A cheap request that shows whether the source answers at all */
export function sourceProbe(
  target: DiscoverTarget,
  config: AppConfig,
  client: RateLimitedSourceClient
): { label: string; run: () => Promise<unknown> } {
  if (target.kind === "kolibri") {
    const baseUrl = (target.baseUrl ?? config.kolibriUrl).replace(/\/+$/, "");
    return {
      label: `Kolibri (${baseUrl})`,
      run: () => client.fetchJson(`${baseUrl}/api/content/channel/`)
    };
  }
  return { label: `Website (${target.root})`, run: () => client.fetchText(target.root) };
}

/**
 * Walks the target's tree and upserts every leaf into the catalog. Saves the catalog
 * locally but does not publish it.
 */
export async function discoverInto(
  store: CatalogStore,
  target: DiscoverTarget,
  config: AppConfig,
  deps: Pick<DiscoverDeps, "sourceClient" | "createSource">
): Promise<DiscoveryOutcome> {
  const createSource =
    deps.createSource ?? ((t: DiscoverTarget) => buildSource(t, config, deps.sourceClient));
  const source = await createSource(target);

  const discovery = new DiscoveryService();
  const merge = await mergeDiscovered(store, discovery.discover(source));
  await store.save();

  const stats = discovery.stats;
  console.log(
    `[Discovery] ${merge.added} new, ${merge.updated} updated, ${store.size} entries in catalog`
  );
  return { stats, merge };
}

/**
 * The discover command: refresh the catalog from a source, with no item processing.
 */
export async function runDiscovery(
  config: AppConfig,
  target: DiscoverTarget,
  deps: DiscoverDeps
): Promise<DiscoveryOutcome> {
  await runSentinelCheck({
    blobStore: deps.blobStore,
    sourceCheck: sourceProbe(target, config, deps.sourceClient)
  });

  const store = await loadCatalog(config.catalogPath, deps.blobStore, deps.now);
  const outcome = await discoverInto(store, target, config, deps);
  await publishCatalog(store, deps.blobStore);

  if (outcome.stats.errors.length > 0) {
    console.warn(`[Discovery] ${outcome.stats.errors.length} branch(es) skipped:`);
    for (const error of outcome.stats.errors) console.warn(`   - ${error}`);
  }
  return outcome;
}
