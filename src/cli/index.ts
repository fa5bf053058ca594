import { Command } from "commander";

export type CliOptions = Readonly<{
  domains: readonly string[];
  file: string;
  time: string;
  verbose: boolean;
}>;

export const makeCommand = () =>
  new Command("focus-lock")
    .description("Block distracting websites for a specified duration.")
    .argument("[domains...]", "domains to block; when omitted they are read from --file")
    .option("-f, --file <path>", "text file listing websites to block, one per line", "distractions.txt")
    .option("-t, --time <duration>", "duration to block, e.g. 10s, 45m, 2h, 1d", "30s")
    .option("-v, --verbose", "enable verbose logging", false)
    .addHelpText("after", "\nA plain number is taken as minutes. Must be run as root or Administrator.");

export const parseArgs = (argv: readonly string[], command: Command = makeCommand()): CliOptions => {
  const parsed = command.parse([...argv], { from: "user" });
  const { file, time, verbose } = parsed.opts<{ file: string; time: string; verbose: boolean }>();

  return { domains: parsed.args, file, time, verbose };
};
