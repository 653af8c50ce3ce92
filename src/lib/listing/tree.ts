/**
 * Read-only view of a parsed listing page.
 *
 * The extractor only talks to these interfaces, so any HTML tree can back
 * them. Selectors are CSS selectors.
 */
export interface ListingTree {
  /** All elements matching `selector`, in document order. */
  selectAll(selector: string): ListingNode[];
}

export interface ListingNode {
  /** First descendant matching `selector`, or `null`. */
  findFirst(selector: string): ListingNode | null;

  /** Every descendant matching `selector`, in document order. */
  findAllWithin(selector: string): ListingNode[];

  /**
   * First element that starts after this node's start tag (descendants
   * included) and matches `selector` and `predicate`.
   */
  findFollowing(selector: string, predicate?: (node: ListingNode) => boolean): ListingNode | null;

  /** Visible text: each text run trimmed, empty runs dropped, joined with `separator`. */
  text(separator?: string): string;

  attr(name: string): string | undefined;
}
