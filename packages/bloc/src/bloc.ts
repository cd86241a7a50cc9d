/**
 * Bloc: generic base class for event-in, state-out components.
 *
 * Owns the current state, a FIFO event queue and the state listeners.
 * Subclasses implement onEvent() and call emit() for every state they
 * publish; the queue guarantees one event is fully handled (including any
 * awaited collaborator call) before the next one starts.
 *
 * Usage:
 *   class CounterBloc extends Bloc<CounterEvent, number> {
 *     protected async onEvent(event) { this.emit(this.state + 1); }
 *   }
 */

import type { z } from "zod";
import { loadBlocConfig } from "./config.js";
import { describeFailure, formatIssues } from "./errors.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";

export interface BlocEvent {
  type: string;
}

export type StateListener<TState> = (state: TState) => void;

/**
 * A published state change. `event` is null for emissions that happen
 * outside event handling.
 */
export interface Transition<TEvent extends BlocEvent, TState> {
  event: TEvent | null;
  currentState: TState;
  nextState: TState;
}

export interface BlocOptions<TEvent extends BlocEvent> {
  /** Name used in log messages. Defaults to the class name. */
  name?: string;
  logger?: Logger;
  /** Validates events passed to add(); invalid events are dropped. */
  eventSchema?: z.ZodType<TEvent>;
}

export abstract class Bloc<TEvent extends BlocEvent, TState> {
  readonly name: string;
  protected readonly logger: Logger;
  private readonly eventSchema: z.ZodType<TEvent> | null;
  private readonly listeners = new Set<StateListener<TState>>();
  private current: TState;
  private activeEvent: TEvent | null = null;
  private queue: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(initialState: TState, options: BlocOptions<TEvent> = {}) {
    this.current = initialState;
    this.name = options.name ?? new.target.name;
    this.logger =
      options.logger ?? createLogger(loadBlocConfig().logLevel);
    this.eventSchema = options.eventSchema ?? null;
  }

  /** Handle one event. Called strictly sequentially. */
  protected abstract onEvent(event: TEvent): Promise<void>;

  /** Release subclass resources. Runs once, after the queue drains. */
  protected onClose(): void {}

  /** Called for every published state. Override to observe transitions. */
  protected onTransition(transition: Transition<TEvent, TState>): void {
    const label = transition.event?.type ?? "(none)";
    this.logger.debug(
      `${this.name}: ${label} -> ${describeState(transition.nextState)}`,
    );
  }

  get state(): TState {
    return this.current;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Queue an event. Returns false (and logs a warning) when the bloc is
   * closed or the event fails validation.
   */
  add(event: TEvent): boolean {
    if (this.closed) {
      this.logger.warning(
        `${this.name}: dropped ${eventLabel(event)}, bloc is closed`,
      );
      return false;
    }

    let accepted = event;
    if (this.eventSchema) {
      const result = this.eventSchema.safeParse(event);
      if (!result.success) {
        this.logger.warning(
          `${this.name}: dropped invalid event: ${formatIssues(result.error.issues)}`,
        );
        return false;
      }
      accepted = result.data;
    }

    this.queue = this.queue.then(() => this.dispatch(accepted));
    return true;
  }

  /**
   * Register a listener for every state published from now on.
   * Returns the matching unsubscribe function.
   */
  subscribe(listener: StateListener<TState>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Resolves once every event queued so far has been handled. */
  settled(): Promise<void> {
    return this.queue;
  }

  /**
   * Stop accepting events, drop queued ones that have not started and
   * wait for the in-flight one. Its collaborator call is never cancelled.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return this.queue;
    }
    this.closed = true;
    this.listeners.clear();
    await this.queue;
    this.onClose();
    this.logger.debug(`${this.name}: closed`);
  }

  protected emit(state: TState): void {
    if (this.closed) {
      this.logger.debug(`${this.name}: state after close not published`);
      return;
    }

    const transition: Transition<TEvent, TState> = {
      event: this.activeEvent,
      currentState: this.current,
      nextState: state,
    };
    this.current = state;
    this.onTransition(transition);

    for (const listener of [...this.listeners]) {
      try {
        listener(state);
      } catch (error) {
        this.logger.error(
          `${this.name}: listener failed: ${describeFailure(error)}`,
        );
      }
    }
  }

  private async dispatch(event: TEvent): Promise<void> {
    if (this.closed) {
      this.logger.debug(`${this.name}: skipped ${event.type} after close`);
      return;
    }

    this.logger.debug(`${this.name}: handling ${event.type}`);
    this.activeEvent = event;
    try {
      await this.onEvent(event);
    } catch (error) {
      this.logger.error(
        `${this.name}: ${event.type} failed: ${describeFailure(error)}`,
      );
    } finally {
      this.activeEvent = null;
    }
  }
}

function eventLabel(event: unknown): string {
  if (typeof event === "object" && event !== null && "type" in event) {
    return String(event.type);
  }
  return "event";
}

function describeState(state: unknown): string {
  if (typeof state === "object" && state !== null && "status" in state) {
    return String(state.status);
  }
  return String(state);
}
