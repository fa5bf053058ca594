import { Clock, Duration, Effect, Exit, HashSet, Layer, pipe, Ref } from "effect";
import { toDuration } from "../duration";
import { HostsFile } from "../hosts";
import { Signals } from "../signals";
import { Privileges } from "../system";
import { BlockSession, EndReason, PermissionDenied, SessionNotIdle, SessionState } from "./types";

// longest delay a Node timer accepts; the live clock skips anything above it
const MaxTimerMillis = 2 ** 31 - 1;

const clockTime = (millis: number) => new Date(millis).toTimeString().slice(0, 8);

const formatEnd = (startedAt: number, endsAt: number) =>
  new Date(startedAt).toDateString() === new Date(endsAt).toDateString()
    ? clockTime(endsAt)
    : `${new Date(endsAt).toDateString()} ${clockTime(endsAt)}`;

/** Sleeps in timer-sized chunks until the clock reaches `endsAt`. */
const sleepUntil = (endsAt: number): Effect.Effect<void> =>
  pipe(
    Clock.currentTimeMillis,
    Effect.andThen(now =>
      now >= endsAt
        ? Effect.void
        : Effect.sleep(Duration.millis(Math.min(endsAt - now, MaxTimerMillis))).pipe(
            Effect.andThen(() => sleepUntil(endsAt)),
          ),
    ),
  );

export const BlockSessionLive = Layer.effect(
  BlockSession,
  Effect.Do.pipe(
    Effect.bind("hosts", () => HostsFile),
    Effect.bind("privileges", () => Privileges),
    Effect.bind("signals", () => Signals),
    Effect.bind("state", () => Ref.make<SessionState>("Idle")),
    Effect.andThen(({ hosts, privileges, signals, state }) => {
      const wait = (endsAt: number) =>
        Effect.raceFirst(
          sleepUntil(endsAt).pipe(Effect.as<EndReason>("elapsed")),
          signals.received.pipe(Effect.tap(s => Effect.logInfo(`Received ${s}, cleaning up...`))),
        );

      const unblock = (domains: HashSet.HashSet<string>) =>
        pipe(
          hosts.removeBlock(domains),
          Effect.tapError(e => Effect.logError("unblock failed: blocks may still be active", e.underlying)),
          Effect.andThen(Ref.set(state, "Restored")),
          Effect.andThen(Effect.logInfo("Websites unblocked")),
        );

      // whatever ends the wait, unblock runs before it is propagated
      const block = (domains: HashSet.HashSet<string>, endsAt: number) =>
        Effect.uninterruptibleMask(restore =>
          pipe(
            hosts.applyBlock(domains),
            Effect.andThen(Ref.set(state, "Blocking")),
            Effect.andThen(restore(wait(endsAt)).pipe(Effect.exit)),
            Effect.tap(exit =>
              Exit.isInterrupted(exit)
                ? Effect.logInfo("Blocking interrupted")
                : Exit.isFailure(exit)
                ? Effect.logError("Error during website blocking", exit.cause)
                : Effect.void,
            ),
            Effect.andThen(exit => unblock(domains).pipe(Effect.andThen(exit))),
          ),
        );

      return BlockSession.of({
        state: Ref.get(state),
        run: (domains, minutes) =>
          pipe(
            Ref.get(state),
            Effect.filterOrFail(
              s => s === "Idle",
              s => new SessionNotIdle(s),
            ),
            Effect.andThen(privileges.isElevated),
            Effect.filterOrFail(
              elevated => elevated,
              () => new PermissionDenied(),
            ),
            Effect.andThen(Clock.currentTimeMillis),
            Effect.map(startedAt => ({ startedAt, endsAt: startedAt + Duration.toMillis(toDuration(minutes)) })),
            Effect.tap(({ startedAt, endsAt }) =>
              Effect.logInfo(`Blocking ${HashSet.size(domains)} domains until ${formatEnd(startedAt, endsAt)}`),
            ),
            Effect.andThen(times =>
              block(domains, times.endsAt).pipe(Effect.map(reason => ({ domains, ...times, reason }))),
            ),
          ),
      });
    }),
  ),
);

export const forTesting = { sleepUntil, formatEnd, MaxTimerMillis };
