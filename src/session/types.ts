import { Context, Effect, HashSet } from "effect";
import { HostsFileError } from "../hosts";
import { Signal } from "../signals";

export type SessionState = "Idle" | "Blocking" | "Restored";
export type EndReason = "elapsed" | Signal;

export type BlockOutcome = Readonly<{
  domains: HashSet.HashSet<string>;
  startedAt: number;
  endsAt: number;
  reason: EndReason;
}>;

export class PermissionDenied {
  readonly _tag = "PermissionDenied";
}
export class SessionNotIdle {
  readonly _tag = "SessionNotIdle";
  constructor(readonly state: SessionState) {}
}

export interface BlockSessionFuncs {
  readonly state: Effect.Effect<SessionState>;
  /** Blocks `domains` for `minutes`, then unblocks them however the wait ends. */
  readonly run: (
    domains: HashSet.HashSet<string>,
    minutes: number,
  ) => Effect.Effect<BlockOutcome, PermissionDenied | HostsFileError | SessionNotIdle>;
}

export class BlockSession extends Context.Tag("BlockSession")<BlockSession, BlockSessionFuncs>() {}
