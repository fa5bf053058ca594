import { Deferred, Effect, Layer, pipe, Runtime } from "effect";
import { Signal, Signals } from "./types";

const Watched: readonly Signal[] = ["SIGINT", "SIGTERM", "SIGHUP"];

const install = (handler: (s: Signal) => void) =>
  Effect.acquireRelease(
    Effect.sync(() => Watched.forEach(s => process.on(s, handler))),
    () => Effect.sync(() => Watched.forEach(s => process.off(s, handler))),
  );

/**
 * Listens for termination signals while the layer is alive. Only the first
 * signal counts; later ones are logged so a repeated Ctrl-C cannot cut a
 * restore short.
 */
export const SignalsLive = Layer.scoped(
  Signals,
  Effect.Do.pipe(
    Effect.bind("deferred", () => Deferred.make<Signal>()),
    Effect.bind("runtime", () => Effect.runtime<never>()),
    Effect.tap(({ deferred, runtime }) =>
      install(s =>
        pipe(
          Deferred.succeed(deferred, s),
          Effect.andThen(first =>
            first ? Effect.logDebug(`caught ${s}`) : Effect.logWarning(`${s} ignored, still restoring`),
          ),
          Runtime.runSync(runtime),
        ),
      ),
    ),
    Effect.map(({ deferred }) => Signals.of({ received: Deferred.await(deferred) })),
  ),
);
