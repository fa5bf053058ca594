import { Effect, HashSet, Layer, pipe } from "effect";
import * as fs from "node:fs/promises";
import { Config } from "../config";
import { DnsCache } from "../system";
import { HostsFile, HostsFileError, Operation } from "./types";

type BlockSettings = Readonly<{ marker: string; redirectAddress: string }>;

const toLines = (content: string): readonly string[] =>
  content.length === 0 ? [] : content.replace(/\r?\n$/, "").split(/\r?\n/);

const fromLines = (lines: readonly string[]) => (lines.length === 0 ? "" : `${lines.join("\n")}\n`);

const isMapping = (line: string, address: string) =>
  pipe(line.trim().split(/\s+/), ([addr, host, ...rest]) => addr === address && host !== undefined && !rest.length);

/** Drops marker lines and the mapping lines directly under them, including blocks left by earlier runs. */
const stripBlocks = (lines: readonly string[], { marker, redirectAddress }: BlockSettings) =>
  lines.reduce(
    (acc, line) =>
      line.trim() === marker
        ? { ...acc, inBlock: true }
        : acc.inBlock && isMapping(line, redirectAddress)
        ? acc
        : { kept: [...acc.kept, line], inBlock: false },
    { kept: [] as readonly string[], inBlock: false },
  ).kept;

/**
 * Removes every existing block and every line mentioning one of the domains,
 * then (when applying) appends a fresh marker and one mapping per domain.
 * Matching is by substring, so an unrelated entry that contains a blocked
 * domain is dropped too.
 */
const rewrite = (
  lines: readonly string[],
  domains: HashSet.HashSet<string>,
  operation: Operation,
  settings: BlockSettings,
): readonly string[] =>
  pipe(Array.from(domains).sort(), sorted =>
    pipe(
      stripBlocks(lines, settings).filter(l => !sorted.some(d => l.toLowerCase().includes(d))),
      kept =>
        operation === "apply"
          ? [...kept, settings.marker, ...sorted.map(d => `${settings.redirectAddress} ${d}`)]
          : kept,
    ),
  );

export const HostsFileLive = Layer.effect(
  HostsFile,
  Effect.Do.pipe(
    Effect.bind("c", () => Config),
    Effect.bind("config", ({ c }) => c.getConfig),
    Effect.bind("dns", () => DnsCache),
    Effect.map(({ config, dns }) => {
      const path = config.hostsFile;

      const flush = pipe(
        dns.flush,
        Effect.catchTag("CommandFailed", f =>
          pipe(
            Effect.logWarning(`Could not flush DNS cache: ${f.command}`, f.underlying),
            Effect.andThen(Effect.logInfo("You may need to restart your browser for changes to take effect")),
          ),
        ),
      );

      const modify = (domains: HashSet.HashSet<string>, operation: Operation) =>
        pipe(
          Effect.tryPromise({
            try: () => fs.readFile(path, "utf-8"),
            catch: e => new HostsFileError(operation, path, e),
          }),
          Effect.map(content =>
            pipe(toLines(content), before => ({ before, after: rewrite(before, domains, operation, config) })),
          ),
          Effect.tap(({ before, after }) =>
            Effect.logDebug(`${operation}: ${before.length} lines read, ${after.length} lines written to ${path}`),
          ),
          Effect.andThen(({ after }) =>
            Effect.tryPromise({
              try: () => fs.writeFile(path, fromLines(after), "utf-8"),
              catch: e => new HostsFileError(operation, path, e),
            }),
          ),
          Effect.tapError(e => Effect.logError(`Error modifying hosts file ${e.path}`, e.underlying)),
          Effect.andThen(flush),
        );

      return HostsFile.of({
        applyBlock: domains =>
          modify(domains, "apply").pipe(Effect.tap(Effect.logInfo(`Blocked ${HashSet.size(domains)} domains`))),
        removeBlock: domains =>
          modify(domains, "remove").pipe(
            Effect.tap(Effect.logInfo(`Removed ${HashSet.size(domains)} blocked domains`)),
          ),
      });
    }),
  ),
);

export const forTesting = { rewrite, toLines, fromLines };
