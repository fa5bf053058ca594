#!/usr/bin/env node
import { ConfigError, Effect, Layer, Logger, LogLevel, pipe } from "effect";
import { parseArgs } from "./cli";
import { describeError, program } from "./cli/program";
import { ConfigLive } from "./config";
import { HostsFileLive } from "./hosts";
import { BlockSessionLive } from "./session";
import { SignalsLive } from "./signals";
import { DnsCacheLive, PrivilegesLive } from "./system";

const options = parseArgs(process.argv.slice(2));

const HostsLive = HostsFileLive.pipe(Layer.provide(Layer.merge(ConfigLive, DnsCacheLive)));
const AppLive = BlockSessionLive.pipe(Layer.provide(Layer.mergeAll(HostsLive, PrivilegesLive, SignalsLive)));

const main = pipe(
  program(options),
  Effect.provide(AppLive),
  Effect.as(0),
  Effect.catchAll(e =>
    Effect.logError(ConfigError.isConfigError(e) ? `invalid configuration: ${String(e)}` : describeError(e)).pipe(
      Effect.as(1),
    ),
  ),
  Effect.catchAllDefect(d => Effect.logFatal("unexpected failure", d).pipe(Effect.as(1))),
  Effect.provide(Logger.minimumLogLevel(options.verbose ? LogLevel.Debug : LogLevel.Info)),
);

void Effect.runPromise(main).then(code => {
  process.exitCode = code;
});
