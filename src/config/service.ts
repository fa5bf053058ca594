import { Config as C, Context, Effect, Either, Layer, pipe } from "effect";
import { ConfigError, InvalidData } from "effect/ConfigError";
import * as fs from "node:fs/promises";
import { AppConfig } from "./types";

const Ipv4 = /^(25[0-5]|2[0-4]\d|1?\d?\d)(\.(25[0-5]|2[0-4]\d|1?\d?\d)){3}$/;

const defaultHostsFile = (platform: NodeJS.Platform) =>
  platform === "win32" ? "C:\\Windows\\System32\\drivers\\etc\\hosts" : "/etc/hosts";

const hostsFileConf = (platform: NodeJS.Platform) =>
  pipe(
    C.string("HOSTS_FILE"),
    C.withDefault(defaultHostsFile(platform)),
    C.mapOrFail(p =>
      p.trim().length > 0 ? Either.right(p.trim()) : Either.left(InvalidData([], "Expected a non-empty path")),
    ),
  );

const addressConf = pipe(
  C.string("REDIRECT_ADDRESS"),
  C.withDefault("127.0.0.1"),
  C.mapOrFail(a =>
    Ipv4.test(a) ? Either.right(a) : Either.left(InvalidData([], `Expected ${a} to be a dotted IPv4 address`)),
  ),
);

const markerConf = pipe(
  C.string("BLOCK_MARKER"),
  C.withDefault("# Website blocks added by focus-lock"),
  C.mapOrFail(m =>
    m.startsWith("#") ? Either.right(m) : Either.left(InvalidData([], `Expected ${m} to be a '#' comment`)),
  ),
);

const createConfig = (platform: NodeJS.Platform = process.platform): C.Config<AppConfig> =>
  pipe(
    C.all([hostsFileConf(platform), addressConf, markerConf]),
    C.map(([hostsFile, redirectAddress, marker]) => ({ hostsFile, redirectAddress, marker })),
  );

/** The hosts file has to exist and be a regular file before anything is blocked. */
const checkHostsFile = (config: AppConfig): Effect.Effect<AppConfig, ConfigError> =>
  pipe(
    Effect.tryPromise(() => fs.stat(config.hostsFile)),
    Effect.filterOrFail(
      s => s.isFile(),
      () => "not a regular file",
    ),
    Effect.mapError(() => InvalidData(["HOSTS_FILE"], `Expected ${config.hostsFile} to be an existing regular file`)),
    Effect.as(config),
  );

export class Config extends Context.Tag("Config")<Config, Readonly<{ getConfig: Effect.Effect<AppConfig> }>>() {}
export const ConfigLive = Layer.effect(
  Config,
  createConfig().pipe(
    Effect.andThen(checkHostsFile),
    Effect.map(c => Config.of({ getConfig: Effect.succeed(c) })),
  ),
);

export const forTesting = { createConfig, checkHostsFile };
