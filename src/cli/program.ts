import { Effect, HashSet, Match, pipe } from "effect";
import { DomainListError, loadDomainList, normalize } from "../domains";
import { InvalidFormat, parseDuration } from "../duration";
import { HostsFileError } from "../hosts";
import { BlockSession, PermissionDenied, SessionNotIdle } from "../session";
import { CliOptions } from "./index";

export class NoDomains {
  readonly _tag = "NoDomains";
  constructor(readonly source: string) {}
}

export type AppError = DomainListError | NoDomains | InvalidFormat | PermissionDenied | HostsFileError | SessionNotIdle;

const domainSource = (opts: CliOptions): Effect.Effect<readonly string[], DomainListError> =>
  opts.domains.length ? Effect.succeed(opts.domains) : loadDomainList(opts.file);

export const program = (opts: CliOptions) =>
  pipe(
    parseDuration(opts.time),
    Effect.bindTo("minutes"),
    Effect.bind("domains", () =>
      pipe(
        domainSource(opts),
        Effect.andThen(normalize),
        Effect.filterOrFail(
          d => HashSet.size(d) > 0,
          () => new NoDomains(opts.domains.length ? "command line" : opts.file),
        ),
      ),
    ),
    Effect.tap(({ domains }) => Effect.logDebug(`domains: ${Array.from(domains).sort().join(", ")}`)),
    Effect.bind("session", () => BlockSession),
    Effect.andThen(({ session, domains, minutes }) => session.run(domains, minutes)),
  );

export const describeError = Match.type<AppError>().pipe(
  Match.tag("DomainListError", e => `could not read domain list ${e.path}`),
  Match.tag("NoDomains", e => `no valid domains to block in ${e.source}`),
  Match.tag(
    "InvalidFormat",
    e => `invalid time format '${e.input}'. Use a plain number for minutes (e.g. 30) or 45s, 30m, 2h, 1d`,
  ),
  Match.tag("PermissionDenied", () => "administrative privileges required; run with sudo or as Administrator"),
  Match.tag("HostsFileError", e =>
    e.operation === "apply"
      ? `could not block domains in ${e.path}`
      : `unblock failed: blocks may still be active in ${e.path}`,
  ),
  Match.tag("SessionNotIdle", e => `session is already ${e.state}`),
  Match.exhaustive,
);
