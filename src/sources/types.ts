import type { DiscoveredItem } from "../catalog/catalogStore";

/**
 * A hierarchical content provider the discoverer can walk. `TNode` is whatever the
 * provider needs to describe one node of its tree (an API record, a page URL, ...).
 */
export interface ContentSource<TNode> {
  /** Written to every entry this source produces */
  readonly sourceId: string;

  root(): Promise<TNode>;
  listChildren(node: TNode): Promise<TNode[]>;
  isLeaf(node: TNode): boolean;
  titleOf(node: TNode): string;

  /**
   * Resolves a leaf into a catalog item.
   * @param topicPath - Titles of the leaf's ancestors, root first
   */
  toCatalogEntry(node: TNode, topicPath: string[]): Promise<DiscoveredItem>;
}

export type SourceKind = "kolibri" | "web";
