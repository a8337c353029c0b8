import type { CatalogStore, DiscoveredItem } from "../catalog/catalogStore";
import type { ContentSource } from "../sources/types";

export interface DiscoveryStats {
  nodesVisited: number;
  leavesFound: number;
  branchesSkipped: number;
  errors: string[];
}

export interface MergeResult {
  added: number;
  updated: number;
}

/**
 * Walks a content tree depth-first and yields one item per leaf. A node that cannot
 * be listed or resolved is logged and skipped together with its subtree; the rest
 * of the tree is still visited.
 */
export class DiscoveryService {
  private currentStats: DiscoveryStats = emptyStats();

  get stats(): DiscoveryStats {
    return { ...this.currentStats, errors: [...this.currentStats.errors] };
  }

  async *discover<TNode>(source: ContentSource<TNode>): AsyncGenerator<DiscoveredItem> {
    this.currentStats = emptyStats();
    const stats = this.currentStats;

    let root: TNode;
    try {
      root = await source.root();
    } catch (err: unknown) {
      this.skip(source.sourceId, "root", err);
      return;
    }

    // Explicit stack so deep trees cannot overflow; children are pushed in reverse to
    // keep source order
    const stack: Array<{ node: TNode; path: string[] }> = [{ node: root, path: [] }];

    while (stack.length > 0) {
      const next = stack.pop();
      if (!next) break;
      const { node, path } = next;
      stats.nodesVisited += 1;

      if (source.isLeaf(node)) {
        let item: DiscoveredItem;
        try {
          item = await source.toCatalogEntry(node, path);
        } catch (err: unknown) {
          this.skip(source.sourceId, source.titleOf(node), err);
          continue;
        }
        stats.leavesFound += 1;
        yield item;
        continue;
      }

      let children: TNode[];
      try {
        children = await source.listChildren(node);
      } catch (err: unknown) {
        this.skip(source.sourceId, source.titleOf(node), err);
        continue;
      }

      const childPath = [...path, source.titleOf(node)];
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push({ node: children[i], path: childPath });
      }
    }

    console.log(
      `[Discovery] ${source.sourceId}: visited ${stats.nodesVisited} nodes, found ${stats.leavesFound} leaves, skipped ${stats.branchesSkipped} branches`
    );
  }

  private skip(sourceId: string, nodeLabel: string, err: unknown): void {
    const message = err instanceof Error ? err.message : String(err);
    this.currentStats.branchesSkipped += 1;
    this.currentStats.errors.push(`${nodeLabel}: ${message}`);
    console.warn(`[Discovery] ${sourceId}: skipping '${nodeLabel}': ${message}`);
  }
}

/**
 * Upserts discovered items into the catalog. Known entries keep their pipeline
 * progress; only descriptive fields are refreshed.
 */
export async function mergeDiscovered(
  store: CatalogStore,
  items: AsyncIterable<DiscoveredItem> | Iterable<DiscoveredItem>
): Promise<MergeResult> {
  const result: MergeResult = { added: 0, updated: 0 };
  for await (const item of items) {
    const outcome = store.upsertDiscovered(item);
    if (outcome === "added") result.added += 1;
    else if (outcome === "updated") result.updated += 1;
  }
  return result;
}

function emptyStats(): DiscoveryStats {
  return { nodesVisited: 0, leavesFound: 0, branchesSkipped: 0, errors: [] };
}
