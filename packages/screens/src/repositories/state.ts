import type { Item } from "./schemas.js";

export type RepositoryState =
  | { status: "idle" }
  | { status: "loading" }
  | {
      status: "loaded";
      all: Item[];
      /** `all` after the active category filter */
      visible: Item[];
      cursor: string;
      hasMore: boolean;
      /** Active filter, null when none */
      category: string | null;
    }
  | { status: "failed"; error: string };

export type IdleState = Extract<RepositoryState, { status: "idle" }>;
export type LoadingState = Extract<RepositoryState, { status: "loading" }>;
export type LoadedState = Extract<RepositoryState, { status: "loaded" }>;
export type FailedState = Extract<RepositoryState, { status: "failed" }>;

/** States a bloc may start in. A bloc never starts mid-fetch. */
export type SeedState = Exclude<RepositoryState, { status: "loading" }>;

/** Empty or absent means no filter. Any other value is matched exactly. */
export function normalizeCategory(
  category: string | null | undefined,
): string | null {
  if (category === undefined || category === null || category === "") {
    return null;
  }
  return category;
}

export function filterItems(
  items: readonly Item[],
  category: string | null,
): Item[] {
  if (category === null) {
    return [...items];
  }
  return items.filter((item) => item.category === category);
}

export function idleState(): IdleState {
  return { status: "idle" };
}

export function loadingState(): LoadingState {
  return { status: "loading" };
}

export function failedState(error: string): FailedState {
  return { status: "failed", error };
}

/**
 * Build a loaded state. `visible` defaults to `all` filtered by `category`.
 */
export function loadedState(fields: {
  all: Item[];
  cursor: string;
  hasMore: boolean;
  category?: string | null;
  visible?: Item[];
}): LoadedState {
  const category = normalizeCategory(fields.category);
  return {
    status: "loaded",
    all: fields.all,
    visible: fields.visible ?? filterItems(fields.all, category),
    cursor: fields.cursor,
    hasMore: fields.hasMore,
    category,
  };
}
