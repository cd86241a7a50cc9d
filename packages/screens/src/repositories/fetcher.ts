/**
 * Fetch collaborator contract and an in-memory implementation.
 */

import { BlocError, FetchError } from "@trending/bloc";
import { loadPagingConfig } from "./config.js";
import type { FetchPage, Item } from "./schemas.js";

/**
 * The one external dependency of RepositoryBloc. `after` is the cursor of
 * the previous page, undefined for the first page. Implementations reject
 * (preferably with FetchError) on network, decoding or server failure.
 */
export interface RepositoryFetcher {
  fetch(after?: string): Promise<FetchPage>;
}

const CURSOR_PATTERN = /^offset:(\d+)$/;

function encodeCursor(offset: number): string {
  return `offset:${offset}`;
}

/**
 * Serve a fixed list of items page by page. The last page reports
 * hasMore: false with a cursor at the end of the list; fetching after it
 * returns an empty page.
 */
export function createInMemoryFetcher(
  items: readonly Item[],
  options: { pageSize?: number } = {},
): RepositoryFetcher {
  const pageSize = options.pageSize ?? loadPagingConfig().pageSize;
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new BlocError(`pageSize must be a positive integer, got ${pageSize}`);
  }

  function decodeCursor(cursor: string): number {
    const match = CURSOR_PATTERN.exec(cursor);
    const offset = match?.[1] === undefined ? NaN : Number(match[1]);
    if (!Number.isSafeInteger(offset) || offset > items.length) {
      throw new FetchError(`Unknown cursor: ${cursor}`, { status: 400 });
    }
    return offset;
  }

  return {
    async fetch(after?: string): Promise<FetchPage> {
      const start = after === undefined ? 0 : decodeCursor(after);
      const end = Math.min(start + pageSize, items.length);
      return {
        items: items.slice(start, end),
        cursor: encodeCursor(end),
        hasMore: end < items.length,
      };
    },
  };
}
