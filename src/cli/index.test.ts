import { CommanderError } from "commander";
import { makeCommand, parseArgs } from "./index";

const quiet = () =>
  makeCommand()
    .exitOverride()
    .configureOutput({ writeOut: () => undefined, writeErr: () => undefined });

describe("cli", () => {
  it("uses the defaults", () => {
    expect(parseArgs([], quiet())).toEqual({ domains: [], file: "distractions.txt", time: "30s", verbose: false });
  });

  it("reads every option", () => {
    expect(parseArgs(["-f", "list.txt", "--time", "2h", "-v"], quiet())).toEqual({
      domains: [],
      file: "list.txt",
      time: "2h",
      verbose: true,
    });
  });

  it("takes inline domains", () => {
    expect(parseArgs(["example.com", "news.site", "-t", "45s"], quiet())).toEqual({
      domains: ["example.com", "news.site"],
      file: "distractions.txt",
      time: "45s",
      verbose: false,
    });
  });

  it("rejects unknown options", () => {
    expect(() => parseArgs(["--forever"], quiet())).toThrow(CommanderError);
  });
});
