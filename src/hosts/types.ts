import { Context, Effect, HashSet } from "effect";

export type Operation = "apply" | "remove";

export class HostsFileError {
  readonly _tag = "HostsFileError";
  constructor(
    readonly operation: Operation,
    readonly path: string,
    readonly underlying: unknown,
  ) {}
}

export interface HostsFileFuncs {
  readonly applyBlock: (domains: HashSet.HashSet<string>) => Effect.Effect<void, HostsFileError>;
  readonly removeBlock: (domains: HashSet.HashSet<string>) => Effect.Effect<void, HostsFileError>;
}

export class HostsFile extends Context.Tag("HostsFile")<HostsFile, HostsFileFuncs>() {}
