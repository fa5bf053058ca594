import { Context, Effect } from "effect";

export class CommandFailed {
  readonly _tag = "CommandFailed";
  constructor(
    readonly command: string,
    readonly underlying: unknown,
  ) {}
}

export type Command = Readonly<{ command: string; args: readonly string[] }>;

/** Sequential steps; each step's commands are tried in order until one succeeds. */
export type FlushPlan = readonly (readonly Command[])[];

export interface PrivilegesFuncs {
  readonly isElevated: Effect.Effect<boolean>;
}

export interface DnsCacheFuncs {
  readonly flush: Effect.Effect<void, CommandFailed>;
}

export class Privileges extends Context.Tag("Privileges")<Privileges, PrivilegesFuncs>() {}
export class DnsCache extends Context.Tag("DnsCache")<DnsCache, DnsCacheFuncs>() {}
