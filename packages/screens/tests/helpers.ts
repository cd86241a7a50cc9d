import type { Bloc, BlocEvent, Logger } from "@trending/bloc";
import { createFixtureFactory } from "@trending/fixtures";
import type { FetchPage, Item, RepositoryFetcher } from "../src/index.js";

// ============================================================================
// Fixtures
// ============================================================================

/** Even indexes are Dart repositories, odd ones TypeScript. */
export const mockItem = createFixtureFactory<Item>((index) => ({
  name: `repo-${index}`,
  description: `Repository number ${index}`,
  category: index % 2 === 0 ? "Dart" : "TypeScript",
}));

export const mockPage = createFixtureFactory<FetchPage>({
  items: [],
  cursor: "endCursor",
  hasMore: true,
});

// ============================================================================
// Collaborators
// ============================================================================

/**
 * Fetcher that answers from a script, one response per call, and records
 * the cursor of every call. An Error in the script is thrown.
 */
export function createScriptedFetcher(responses: Array<FetchPage | Error>): {
  fetcher: RepositoryFetcher;
  calls: Array<string | undefined>;
} {
  const remaining = [...responses];
  const calls: Array<string | undefined> = [];
  const fetcher: RepositoryFetcher = {
    async fetch(after) {
      calls.push(after);
      const next = remaining.shift();
      if (next === undefined) {
        throw new Error("scripted fetcher has no response left");
      }
      if (next instanceof Error) {
        throw next;
      }
      return next;
    },
  };
  return { fetcher, calls };
}

export function createGate(): { promise: Promise<void>; open: () => void } {
  let open: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { promise, open };
}

export function createRecordingLogger(): Logger & { messages: string[] } {
  const messages: string[] = [];
  return {
    messages,
    debug: (m) => messages.push(`debug ${m}`),
    info: (m) => messages.push(`info ${m}`),
    warning: (m) => messages.push(`warning ${m}`),
    error: (m) => messages.push(`error ${m}`),
  };
}

// ============================================================================
// Recording
// ============================================================================

/**
 * Subscribe, run `act`, wait for the queue to drain and return every
 * state published in between, in order.
 */
export async function recordStates<TEvent extends BlocEvent, TState>(
  bloc: Bloc<TEvent, TState>,
  act: (bloc: Bloc<TEvent, TState>) => void | Promise<void>,
): Promise<TState[]> {
  const states: TState[] = [];
  const unsubscribe = bloc.subscribe((state) => states.push(state));
  try {
    await act(bloc);
    await bloc.settled();
  } finally {
    unsubscribe();
  }
  return states;
}
