/**
 * RepositoryBloc: the trending-repositories list screen.
 *
 * Drives repositoryMachine one event at a time. The injected fetcher
 * becomes the machine's fetchPage actor; its pages are validated against
 * FetchPageSchema before they reach the machine, so a malformed page
 * surfaces as a failed state like any other fetch failure.
 */

import { createActor, fromPromise, waitFor } from "xstate";
import type { Actor } from "xstate";
import { Bloc, describeFailure } from "@trending/bloc";
import type { BlocOptions } from "@trending/bloc";
import { loadFilterConfig } from "./config.js";
import type { RepositoryFetcher } from "./fetcher.js";
import { repositoryMachine, toRepositoryState } from "./machine.js";
import type { FetchPageInput } from "./machine.js";
import { FetchPageSchema, RepositoryEventSchema } from "./schemas.js";
import type { FetchPage, RepositoryEvent } from "./schemas.js";
import { idleState } from "./state.js";
import type { RepositoryState, SeedState } from "./state.js";

export interface RepositoryBlocOptions
  extends Omit<BlocOptions<RepositoryEvent>, "eventSchema"> {
  fetcher: RepositoryFetcher;
  /** Start here instead of idle */
  seed?: SeedState;
  /** Defaults to REPOSITORY_RESET_FILTER_ON_FETCH (loadFilterConfig) */
  resetFilterOnFetch?: boolean;
}

export class RepositoryBloc extends Bloc<RepositoryEvent, RepositoryState> {
  private readonly actor: Actor<typeof repositoryMachine>;
  private revision = 0;

  constructor(options: RepositoryBlocOptions) {
    const seed = options.seed ?? idleState();
    super(seed, {
      name: options.name,
      logger: options.logger,
      eventSchema: RepositoryEventSchema,
    });

    const { fetcher } = options;
    const machine = repositoryMachine.provide({
      actors: {
        fetchPage: fromPromise<FetchPage, FetchPageInput>(async ({ input }) =>
          FetchPageSchema.parse(await fetcher.fetch(input.after)),
        ),
      },
    });

    this.actor = createActor(machine, {
      input: {
        seed,
        resetFilterOnFetch:
          options.resetFilterOnFetch ??
          loadFilterConfig().resetFilterOnFetch,
      },
    });

    this.actor.subscribe({
      next: (snapshot) => {
        if (snapshot.context.revision === this.revision) {
          return;
        }
        this.revision = snapshot.context.revision;
        this.emit(toRepositoryState(snapshot));
      },
      error: (error) => {
        this.logger.error(
          `${this.name}: machine stopped: ${describeFailure(error)}`,
        );
      },
    });
    this.actor.start();
  }

  protected async onEvent(event: RepositoryEvent): Promise<void> {
    this.actor.send(event);
    await waitFor(this.actor, (snapshot) => !snapshot.hasTag("fetching"));
  }

  protected onClose(): void {
    this.actor.stop();
  }
}
