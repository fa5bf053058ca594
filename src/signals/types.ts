import { Context, Effect } from "effect";

export type Signal = NodeJS.Signals;

export interface SignalsFuncs {
  /** Completes with the first termination signal the process receives. */
  readonly received: Effect.Effect<Signal>;
}

export class Signals extends Context.Tag("Signals")<Signals, SignalsFuncs>() {}
