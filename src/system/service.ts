import { Effect, Layer, pipe } from "effect";
import { execFile } from "node:child_process";
import { Command, CommandFailed, DnsCache, FlushPlan, Privileges } from "./types";

const describeCommand = ({ command, args }: Command) => [command, ...args].join(" ");

export const runCommand = (cmd: Command) =>
  Effect.async<void, CommandFailed>(resume => {
    const child = execFile(cmd.command, [...cmd.args], { windowsHide: true }, error =>
      resume(error === null ? Effect.void : Effect.fail(new CommandFailed(describeCommand(cmd), error))),
    );
    return Effect.sync(() => {
      child.kill();
    });
  });

const flushPlan = (platform: NodeJS.Platform): FlushPlan =>
  platform === "win32"
    ? [[{ command: "ipconfig", args: ["/flushdns"] }]]
    : platform === "darwin"
    ? [[{ command: "dscacheutil", args: ["-flushcache"] }], [{ command: "killall", args: ["-HUP", "mDNSResponder"] }]]
    : [
        [
          { command: "systemctl", args: ["restart", "systemd-resolved"] },
          { command: "service", args: ["network-manager", "restart"] },
        ],
      ];

const firstSuccess = (
  run: (c: Command) => Effect.Effect<void, CommandFailed>,
  [first, ...fallbacks]: readonly Command[],
): Effect.Effect<void, CommandFailed> =>
  first === undefined
    ? Effect.void
    : fallbacks.reduce(
        (acc, c) =>
          acc.pipe(
            Effect.catchTag("CommandFailed", f =>
              Effect.logDebug(`${f.command} failed, trying ${describeCommand(c)}`).pipe(Effect.andThen(run(c))),
            ),
          ),
        run(first),
      );

const executePlan = (plan: FlushPlan, run: (c: Command) => Effect.Effect<void, CommandFailed>) =>
  pipe(
    Effect.forEach(plan, step => firstSuccess(run, step), { discard: true }),
    Effect.tap(() => Effect.logInfo("DNS cache flushed")),
  );

const checkElevated = (platform: NodeJS.Platform, run: (c: Command) => Effect.Effect<void, CommandFailed>) =>
  platform === "win32"
    ? run({ command: "net", args: ["session"] }).pipe(
        Effect.as(true),
        Effect.catchTag("CommandFailed", f =>
          Effect.logDebug("privilege probe failed", f.underlying).pipe(Effect.as(false)),
        ),
      )
    : Effect.sync(() => process.geteuid?.() === 0);

export const PrivilegesLive = Layer.succeed(
  Privileges,
  Privileges.of({ isElevated: checkElevated(process.platform, runCommand) }),
);

export const DnsCacheLive = Layer.succeed(
  DnsCache,
  DnsCache.of({ flush: executePlan(flushPlan(process.platform), runCommand) }),
);

export const forTesting = { flushPlan, executePlan, checkElevated };
