import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { DiscoveredItem } from "../catalog/catalogStore";
import { CatalogStore } from "../catalog/catalogStore";
import { CATALOG_KEY } from "../clients/s3Client";
import { RateLimitedSourceClient } from "../clients/sourceClient";
import { runDiscovery } from "../jobs/discoverJob";
import { DiscoveryService, mergeDiscovered } from "../services/discoveryService";
import type { ContentSource } from "../sources/types";
import { makeConfig, makeTempDir, MemoryBlobStore, noSleep, removeDir } from "./helpers";

interface TreeNode {
  title: string;
  children?: TreeNode[];
  failList?: boolean;
  failResolve?: boolean;
}

class TreeSource implements ContentSource<TreeNode> {
  readonly sourceId = "tree";
  calls = 0;

  constructor(private tree: TreeNode) {}

  async root(): Promise<TreeNode> {
    this.calls += 1;
    return this.tree;
  }

  async listChildren(node: TreeNode): Promise<TreeNode[]> {
    this.calls += 1;
    if (node.failList) throw new Error("listing timed out");
    return node.children ?? [];
  }

  isLeaf(node: TreeNode): boolean {
    return node.children === undefined;
  }

  titleOf(node: TreeNode): string {
    return node.title;
  }

  async toCatalogEntry(node: TreeNode, topicPath: string[]): Promise<DiscoveredItem> {
    this.calls += 1;
    if (node.failResolve) throw new Error("no media");
    return {
      source_id: this.sourceId,
      content_id: node.title.toLowerCase(),
      title: node.title,
      topic_path: topicPath,
      duration_seconds: null,
      media_url: `https://cdn.test/${node.title}.mp4`,
      caption_urls: []
    };
  }
}

function mathTree(): TreeNode {
  return {
    title: "Math",
    children: [
      { title: "Algebra", children: [{ title: "A1" }, { title: "A2" }, { title: "A3" }] },
      { title: "Geometry", children: [{ title: "G1" }] }
    ]
  };
}

async function collect(iterable: AsyncIterable<DiscoveredItem>): Promise<DiscoveredItem[]> {
  const items: DiscoveredItem[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}

describe("DiscoveryService", () => {
  it("yields every leaf with its ancestors' titles, in source order", async () => {
    const discovery = new DiscoveryService();
    const items = await collect(discovery.discover(new TreeSource(mathTree())));

    expect(items.map((i) => [i.content_id, i.topic_path])).toEqual([
      ["a1", ["Math", "Algebra"]],
      ["a2", ["Math", "Algebra"]],
      ["a3", ["Math", "Algebra"]],
      ["g1", ["Math", "Geometry"]]
    ]);
    expect(discovery.stats).toEqual({
      nodesVisited: 7,
      leavesFound: 4,
      branchesSkipped: 0,
      errors: []
    });
  });

  it("skips a branch that cannot be listed and keeps walking", async () => {
    const tree = mathTree();
    tree.children = [
      { title: "Algebra", failList: true, children: [{ title: "A1" }] },
      { title: "Geometry", children: [{ title: "G1" }] }
    ];
    const discovery = new DiscoveryService();
    const items = await collect(discovery.discover(new TreeSource(tree)));

    expect(items.map((i) => i.content_id)).toEqual(["g1"]);
    expect(discovery.stats.branchesSkipped).toBe(1);
    expect(discovery.stats.errors).toEqual(["Algebra: listing timed out"]);
  });

  it("skips a leaf that cannot be resolved", async () => {
    const tree: TreeNode = {
      title: "Math",
      children: [{ title: "A1" }, { title: "A2", failResolve: true }, { title: "A3" }]
    };
    const discovery = new DiscoveryService();
    const items = await collect(discovery.discover(new TreeSource(tree)));

    expect(items.map((i) => [i.content_id, i.topic_path])).toEqual([
      ["a1", ["Math"]],
      ["a3", ["Math"]]
    ]);
    expect(discovery.stats.errors).toEqual(["A2: no media"]);
  });

  it("reports a root that cannot be read without throwing", async () => {
    const source = new TreeSource(mathTree());
    source.root = async () => {
      throw new Error("HTTP 503");
    };
    const discovery = new DiscoveryService();

    expect(await collect(discovery.discover(source))).toEqual([]);
    expect(discovery.stats.errors).toEqual(["root: HTTP 503"]);
  });
});

describe("mergeDiscovered", () => {
  it("adds items once and leaves a second identical pass unchanged", async () => {
    const store = new CatalogStore("unused.json");

    const first = await mergeDiscovered(
      store,
      new DiscoveryService().discover(new TreeSource(mathTree()))
    );
    const second = await mergeDiscovered(
      store,
      new DiscoveryService().discover(new TreeSource(mathTree()))
    );

    expect(first).toEqual({ added: 4, updated: 0 });
    expect(second).toEqual({ added: 0, updated: 0 });
    expect(store.size).toBe(4);
  });

  it("counts moved items as updated", async () => {
    const store = new CatalogStore("unused.json");
    await mergeDiscovered(store, new DiscoveryService().discover(new TreeSource(mathTree())));

    const moved = mathTree();
    moved.children = [{ title: "Algebra II", children: [{ title: "A1" }] }];
    const result = await mergeDiscovered(
      store,
      new DiscoveryService().discover(new TreeSource(moved))
    );

    expect(result).toEqual({ added: 0, updated: 1 });
    expect(store.get("tree:a1")?.topic_path).toEqual(["Math", "Algebra II"]);
  });
});

describe("runDiscovery", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("merges into the catalog and publishes it", async () => {
    const config = makeConfig(dir);
    const blobStore = new MemoryBlobStore();
    const sourceClient = new RateLimitedSourceClient({
      minDelayMs: 0,
      sleep: noSleep,
      fetchImpl: async () => new Response("<html></html>")
    });

    const outcome = await runDiscovery(
      config,
      { kind: "web", root: "https://lectures.test/math" },
      { blobStore, sourceClient, createSource: async () => new TreeSource(mathTree()) }
    );

    expect(outcome.merge).toEqual({ added: 4, updated: 0 });
    const reloaded = await CatalogStore.load(path.join(dir, "data", "catalog.json"));
    expect(reloaded.list().map((e) => e.content_id)).toEqual(["a1", "a2", "a3", "g1"]);
    expect(JSON.parse((await blobStore.getText(CATALOG_KEY)) ?? "null")).toEqual(
      reloaded.toDocument()
    );
  });
});
