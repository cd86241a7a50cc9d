/**
 * CounterBloc: the counter screen. Each event emits the new count.
 */

import { z } from "zod";
import { Bloc } from "@trending/bloc";
import type { BlocOptions } from "@trending/bloc";

export const CounterEventSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("incremented") }),
  z.object({ type: z.literal("decremented") }),
]);

export type CounterEvent = z.infer<typeof CounterEventSchema>;

export interface CounterBlocOptions
  extends Omit<BlocOptions<CounterEvent>, "eventSchema"> {
  initial?: number;
}

export class CounterBloc extends Bloc<CounterEvent, number> {
  constructor({ initial = 0, ...options }: CounterBlocOptions = {}) {
    super(initial, { ...options, eventSchema: CounterEventSchema });
  }

  protected async onEvent(event: CounterEvent): Promise<void> {
    switch (event.type) {
      case "incremented":
        this.emit(this.state + 1);
        return;
      case "decremented":
        this.emit(this.state - 1);
        return;
      default: {
        const unhandled: never = event;
        throw new Error(`Unhandled counter event: ${String(unhandled)}`);
      }
    }
  }
}
