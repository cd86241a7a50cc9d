/**
 * Repository list schemas: items, fetch pages and events.
 */

import { z } from "zod";

export const ItemSchema = z.object({
  name: z.string(),
  description: z.string(),
  category: z.string(),
});

export type Item = z.infer<typeof ItemSchema>;

export const FetchPageSchema = z.object({
  items: z.array(ItemSchema),
  /** Opaque continuation token for the next page */
  cursor: z.string(),
  hasMore: z.boolean(),
});

export type FetchPage = z.infer<typeof FetchPageSchema>;

export const RepositoryEventSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("fetchRequested") }),
  z.object({
    type: z.literal("filterByCategoryRequested"),
    /** Empty or absent clears the filter */
    category: z.string().nullable().optional(),
  }),
  z.object({ type: z.literal("loadMoreRequested") }),
]);

export type RepositoryEvent = z.infer<typeof RepositoryEventSchema>;

export function fetchRequested(): RepositoryEvent {
  return { type: "fetchRequested" };
}

export function filterByCategoryRequested(
  category: string | null,
): RepositoryEvent {
  return { type: "filterByCategoryRequested", category };
}

export function loadMoreRequested(): RepositoryEvent {
  return { type: "loadMoreRequested" };
}
