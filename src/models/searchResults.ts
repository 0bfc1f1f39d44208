import type { SearchResult } from './types.js';

/**
 * Results of a search, iterable in relevance order.
 *
 * @example
 * const [err, results] = await client.search(query);
 * for (const hit of results ?? []) console.log(hit.fields.Name);
 */
export class SearchResults implements Iterable<SearchResult> {
  /** Schema the fields were read with. */
  readonly schema: string;
  /** Cursor for the next page, `null` on the last page. */
  readonly next: string | null;
  /** Hits of this page. */
  readonly results: readonly SearchResult[];

  constructor(schema: string, results: readonly SearchResult[], next: string | null = null) {
    this.schema = schema;
    this.results = results;
    this.next = next;
  }

  /** Number of hits on this page. */
  get length(): number {
    return this.results.length;
  }

  /** Whether the search matched nothing. */
  isEmpty(): boolean {
    return this.results.length === 0;
  }

  /** Hit at `index`; negative indexes count from the end. */
  at(index: number): SearchResult | undefined {
    return this.results.at(index);
  }

  [Symbol.iterator](): Iterator<SearchResult> {
    return this.results[Symbol.iterator]();
  }
}
