/**
 * Repository list state machine.
 *
 * Uses XState's invoke + fromPromise for the fetch collaborator.
 * The default fetchPage stub resolves an empty page; RepositoryBloc
 * injects the real collaborator via .provide().
 *
 * Every transition that publishes a state bumps `revision`. The bloc
 * publishes exactly when the revision changes, so transitions that only
 * start work (loaded -> loadingMore) and ignored events publish nothing.
 *
 * State diagram:
 *
 *                    starting
 *          ┌────────────┼────────────┐
 *          ▼            ▼            ▼
 *        idle  ───►  loading  ◄───  failed
 *                       │  ▲          ▲
 *                       ▼  │ fetch    │ fetch error
 *                     loaded ──────────┤
 *                       │  ▲          │
 *                  more ▼  │ page     │
 *                    loadingMore ─────┘
 */

import { assertEvent, assign, fromPromise, setup } from "xstate";
import type { SnapshotFrom } from "xstate";
import { describeFailure } from "@trending/bloc";
import type { FetchPage, Item, RepositoryEvent } from "./schemas.js";
import { filterItems, normalizeCategory } from "./state.js";
import type { RepositoryState, SeedState } from "./state.js";

export interface RepositoryMachineContext {
  all: Item[];
  visible: Item[];
  cursor: string;
  hasMore: boolean;
  category: string | null;
  error: string | null;
  resetFilterOnFetch: boolean;
  /** Which state `starting` resolves to */
  startIn: SeedState["status"];
  revision: number;
}

export interface RepositoryMachineInput {
  seed: SeedState;
  resetFilterOnFetch: boolean;
}

export interface FetchPageInput {
  after: string | undefined;
}

function contextFromSeed(
  input: RepositoryMachineInput,
): RepositoryMachineContext {
  const base: RepositoryMachineContext = {
    all: [],
    visible: [],
    cursor: "",
    hasMore: false,
    category: null,
    error: null,
    resetFilterOnFetch: input.resetFilterOnFetch,
    startIn: input.seed.status,
    revision: 0,
  };
  switch (input.seed.status) {
    case "idle":
      return base;
    case "loaded":
      return {
        ...base,
        all: [...input.seed.all],
        visible: [...input.seed.visible],
        cursor: input.seed.cursor,
        hasMore: input.seed.hasMore,
        category: input.seed.category,
      };
    case "failed":
      return { ...base, error: input.seed.error };
  }
}

function replacePage(
  context: RepositoryMachineContext,
  page: FetchPage,
): Partial<RepositoryMachineContext> {
  const category = context.resetFilterOnFetch ? null : context.category;
  return {
    all: page.items,
    visible: filterItems(page.items, category),
    cursor: page.cursor,
    hasMore: page.hasMore,
    category,
    error: null,
    revision: context.revision + 1,
  };
}

function appendPage(
  context: RepositoryMachineContext,
  page: FetchPage,
): Partial<RepositoryMachineContext> {
  const all = [...context.all, ...page.items];
  return {
    all,
    visible: filterItems(all, context.category),
    cursor: page.cursor,
    hasMore: page.hasMore,
    error: null,
    revision: context.revision + 1,
  };
}

function failure(
  context: RepositoryMachineContext,
  error: unknown,
): Partial<RepositoryMachineContext> {
  return {
    error: describeFailure(error),
    revision: context.revision + 1,
  };
}

export const repositoryMachine = setup({
  types: {
    context: {} as RepositoryMachineContext,
    events: {} as RepositoryEvent,
    input: {} as RepositoryMachineInput,
    tags: {} as "fetching",
  },
  actors: {
    fetchPage: fromPromise<FetchPage, FetchPageInput>(async ({ input }) => ({
      items: [],
      cursor: input.after ?? "",
      hasMore: false,
    })),
  },
  guards: {
    startsLoaded: ({ context }) => context.startIn === "loaded",
    startsFailed: ({ context }) => context.startIn === "failed",
  },
  actions: {
    publish: assign({
      revision: ({ context }) => context.revision + 1,
    }),
    applyFilter: assign(({ context, event }) => {
      assertEvent(event, "filterByCategoryRequested");
      const category = normalizeCategory(event.category);
      return {
        category,
        visible: filterItems(context.all, category),
        revision: context.revision + 1,
      };
    }),
  },
}).createMachine({
  id: "repositories",
  context: ({ input }) => contextFromSeed(input),
  initial: "starting",
  states: {
    starting: {
      always: [
        { guard: "startsLoaded", target: "loaded" },
        { guard: "startsFailed", target: "failed" },
        { target: "idle" },
      ],
    },
    idle: {
      on: {
        fetchRequested: "loading",
      },
    },
    loading: {
      tags: ["fetching"],
      entry: "publish",
      invoke: {
        src: "fetchPage",
        input: () => ({ after: undefined }),
        onDone: {
          target: "loaded",
          actions: assign(({ context, event }) =>
            replacePage(context, event.output),
          ),
        },
        onError: {
          target: "failed",
          actions: assign(({ context, event }) =>
            failure(context, event.error),
          ),
        },
      },
    },
    loaded: {
      on: {
        fetchRequested: "loading",
        filterByCategoryRequested: { actions: "applyFilter" },
        loadMoreRequested: "loadingMore",
      },
    },
    loadingMore: {
      tags: ["fetching"],
      invoke: {
        src: "fetchPage",
        input: ({ context }) => ({ after: context.cursor }),
        onDone: {
          target: "loaded",
          actions: assign(({ context, event }) =>
            appendPage(context, event.output),
          ),
        },
        onError: {
          target: "failed",
          actions: assign(({ context, event }) =>
            failure(context, event.error),
          ),
        },
      },
    },
    failed: {
      on: {
        fetchRequested: "loading",
      },
    },
  },
});

export type RepositorySnapshot = SnapshotFrom<typeof repositoryMachine>;

/**
 * Project a machine snapshot onto the published state union. The lists are
 * copies, so callers cannot reach the machine's context through them.
 */
export function toRepositoryState(
  snapshot: RepositorySnapshot,
): RepositoryState {
  const { context } = snapshot;
  if (snapshot.matches("loading")) {
    return { status: "loading" };
  }
  if (snapshot.matches("failed")) {
    return { status: "failed", error: context.error ?? "Exception: Unknown error" };
  }
  if (snapshot.matches("loaded") || snapshot.matches("loadingMore")) {
    return {
      status: "loaded",
      all: [...context.all],
      visible: [...context.visible],
      cursor: context.cursor,
      hasMore: context.hasMore,
      category: context.category,
    };
  }
  return { status: "idle" };
}
