import { readFileSync } from 'node:fs';
import * as cheerio from 'cheerio';
import { type AnyNode, type Element, hasChildren, isTag, isText } from 'domhandler';
import type { Result } from '../roomtable-types.js';
import type { ListingNode, ListingTree } from './tree.js';

// Elements whose text never renders
const INVISIBLE_TAGS = new Set(['script', 'style', 'noscript']);

function collectText(node: AnyNode, parts: string[]): void {
  if (isText(node)) {
    const trimmed = node.data.trim();
    if (trimmed) parts.push(trimmed);
    return;
  }
  if (isTag(node) && INVISIBLE_TAGS.has(node.name)) return;
  if (hasChildren(node)) {
    for (const child of node.children) {
      collectText(child, parts);
    }
  }
}

export class CheerioListingTree implements ListingTree {
  private readonly $: cheerio.CheerioAPI;
  private positions: Map<Element, number> | null = null;

  constructor(html: string) {
    // htmlparser2 keeps <template> contents as regular children
    this.$ = cheerio.load(html, { xml: { xmlMode: false } });
  }

  selectAll(selector: string): ListingNode[] {
    return this.$<Element, string>(selector)
      .toArray()
      .map((element) => new CheerioListingNode(this.$, element, () => this.documentPositions()));
  }

  // Pre-order index of every element, built on first use
  private documentPositions(): Map<Element, number> {
    if (!this.positions) {
      const positions = new Map<Element, number>();
      this.$<Element, string>('*').each((index, element) => {
        positions.set(element, index);
      });
      this.positions = positions;
    }
    return this.positions;
  }
}

class CheerioListingNode implements ListingNode {
  constructor(
    private readonly $: cheerio.CheerioAPI,
    private readonly element: Element,
    private readonly positions: () => Map<Element, number>,
  ) {}

  findFirst(selector: string): ListingNode | null {
    return this.findAllWithin(selector)[0] ?? null;
  }

  findAllWithin(selector: string): ListingNode[] {
    return this.wrap(this.$(this.element).find(selector).toArray());
  }

  findFollowing(selector: string, predicate?: (node: ListingNode) => boolean): ListingNode | null {
    const positions = this.positions();
    const start = positions.get(this.element) ?? -1;
    const candidates = this.wrap(
      this.$<Element, string>(selector)
        .toArray()
        .filter((candidate) => (positions.get(candidate) ?? -1) > start),
    );
    return (predicate ? candidates.find(predicate) : candidates[0]) ?? null;
  }

  text(separator = ''): string {
    const parts: string[] = [];
    collectText(this.element, parts);
    return parts.join(separator);
  }

  attr(name: string): string | undefined {
    return this.$(this.element).attr(name);
  }

  private wrap(elements: Element[]): ListingNode[] {
    return elements.map((element) => new CheerioListingNode(this.$, element, this.positions));
  }
}

/**
 * Parse listing HTML into a queryable tree
 */
export function parseListing(html: string): ListingTree {
  return new CheerioListingTree(html);
}

/**
 * Read and parse a saved listing page
 */
export function loadListingFile(path: string): Result<ListingTree> {
  let html: string;
  try {
    html = readFileSync(path, 'utf-8');
  } catch (error) {
    return {
      success: false,
      error: `Failed to read listing ${path}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
  return { success: true, data: parseListing(html) };
}
