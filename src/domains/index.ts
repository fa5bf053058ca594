import { Effect, HashSet, pipe } from "effect";
import * as fs from "node:fs/promises";

export class InvalidDomain {
  readonly _tag = "InvalidDomain";
  constructor(readonly domain: string) {}
}
export class DomainListError {
  readonly _tag = "DomainListError";
  constructor(
    readonly path: string,
    readonly underlying: unknown,
  ) {}
}

const re = /^(?:[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z]{2,}$/i;

export const isValidDomain = (domain: string) => re.test(domain);

/** One domain per line; blank lines and `#` comments are skipped. */
export const parseDomainList = (text: string): readonly string[] =>
  text
    .split(/\r?\n/)
    .map(l => l.trim())
    .filter(l => l.length > 0 && !l.startsWith("#"));

export const loadDomainList = (path: string) =>
  pipe(
    Effect.tryPromise({
      try: () => fs.readFile(path, "utf-8"),
      catch: e => new DomainListError(path, e),
    }),
    Effect.map(parseDomainList),
  );

const expand = (domain: string): readonly string[] =>
  domain.startsWith("www.") ? [domain] : [domain, `www.${domain}`];

/**
 * Validates every entry and adds the `www.` variant of each bare domain.
 * Invalid entries are dropped with a warning; the result may be empty.
 */
export const normalize = (raw: Iterable<string>): Effect.Effect<HashSet.HashSet<string>> =>
  Effect.reduce(raw, HashSet.empty<string>(), (acc, entry) =>
    pipe(entry.trim().toLowerCase(), domain =>
      isValidDomain(domain)
        ? Effect.succeed(expand(domain).reduce((s, d) => HashSet.add(s, d), acc))
        : Effect.logWarning("Skipping invalid domain", new InvalidDomain(entry)).pipe(Effect.as(acc)),
    ),
  );
