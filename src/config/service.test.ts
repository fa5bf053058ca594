import { ConfigProvider, Effect, Either, Layer, pipe } from "effect";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { forTesting } from "./service";

const { createConfig, checkHostsFile } = forTesting;

const HF = "HOSTS_FILE";
const RA = "REDIRECT_ADDRESS";
const BM = "BLOCK_MARKER";

const createConf = (conf: Map<string, string>, platform: NodeJS.Platform = "linux") =>
  pipe(createConfig(platform), Effect.provide(Layer.setConfigProvider(ConfigProvider.fromMap(conf))));

describe("config", () => {
  it("falls back to platform defaults", async () => {
    const linux = await createConf(new Map()).pipe(Effect.runPromise);
    expect(linux).toEqual({
      hostsFile: "/etc/hosts",
      redirectAddress: "127.0.0.1",
      marker: "# Website blocks added by focus-lock",
    });

    const windows = await createConf(new Map(), "win32").pipe(Effect.runPromise);
    expect(windows.hostsFile).toEqual("C:\\Windows\\System32\\drivers\\etc\\hosts");
  });

  it("succeeds with valid input", async () => {
    const r = await createConf(
      new Map([
        [HF, " /tmp/hosts "],
        [RA, "0.0.0.0"],
        [BM, "# mine"],
      ]),
    ).pipe(Effect.runPromise);

    expect(r).toEqual({ hostsFile: "/tmp/hosts", redirectAddress: "0.0.0.0", marker: "# mine" });
  });

  it.each(["localhost", "256.0.0.1", "1.2.3", "::1"])("rejects redirect address '%s'", async a => {
    const r = await createConf(new Map([[RA, a]])).pipe(Effect.either, Effect.runPromise);

    expect(r.pipe(Either.flip, Either.getOrNull)).toEqual(
      expect.objectContaining({
        _op: "InvalidData",
        message: expect.stringMatching(`xpected ${a} to be a dotted IPv4 address`),
      }),
    );
  });

  it("rejects a marker that is not a comment", async () => {
    const r = await createConf(new Map([[BM, "blocks"]])).pipe(Effect.either, Effect.runPromise);

    expect(Either.isLeft(r)).toBe(true);
  });

  it("rejects a blank hosts path", async () => {
    const r = await createConf(new Map([[HF, "   "]])).pipe(Effect.either, Effect.runPromise);

    expect(Either.isLeft(r)).toBe(true);
  });
});

describe("hosts file check", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "focus-lock-config-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const check = (hostsFile: string) =>
    checkHostsFile({ hostsFile, redirectAddress: "127.0.0.1", marker: "# m" }).pipe(Effect.either, Effect.runPromise);

  it("accepts an existing regular file", async () => {
    const hostsFile = path.join(dir, "hosts");
    await fs.writeFile(hostsFile, "127.0.0.1 localhost\n", "utf-8");

    expect(Either.getOrNull(await check(hostsFile))?.hostsFile).toEqual(hostsFile);
  });

  it.each([
    ["missing", (d: string) => path.join(d, "missing")],
    ["a directory", (d: string) => d],
  ])("rejects a hosts path that is %s", async (_, toPath) => {
    const hostsFile = toPath(dir);
    const r = await check(hostsFile);

    expect(r.pipe(Either.flip, Either.getOrNull)).toEqual(
      expect.objectContaining({
        _op: "InvalidData",
        path: [HF],
        message: `Expected ${hostsFile} to be an existing regular file`,
      }),
    );
  });
});
