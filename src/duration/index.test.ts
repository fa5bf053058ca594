import { Duration, Either } from "effect";
import { parseDuration, toDuration } from "./index";

const run = (s: string) => parseDuration(s).pipe(Either.getOrUndefined);

describe("duration", () => {
  it.each([
    ["2h", 120],
    ["45s", 0.75],
    ["30", 30],
    ["30m", 30],
    ["1d", 1440],
    ["1D", 1440],
    ["90S", 1.5],
    [" 5m ", 5],
    ["0", 0],
  ])("'%s' is %d minutes", (input, minutes) => {
    expect(run(input)).toEqual(minutes);
  });

  it("different units denoting the same time are equal", () => {
    expect(run("60s")).toEqual(run("1m"));
    expect(run("60m")).toEqual(run("1h"));
    expect(run("24h")).toEqual(run("1d"));
    expect(run("3600s")).toEqual(run("1h"));
  });

  it.each(["abc", "", "-5m", "1.5h", "5w", "m", "10 m", "1h30m"])("'%s' is InvalidFormat", input => {
    const r = parseDuration(input);

    expect(Either.isLeft(r)).toBe(true);
    expect(r.pipe(Either.flip, Either.getOrNull)).toEqual({ _tag: "InvalidFormat", input });
  });

  it("converts minutes to milliseconds", () => {
    expect(toDuration(0.75).pipe(Duration.toMillis)).toEqual(45_000);
    expect(toDuration(120).pipe(Duration.toMillis)).toEqual(7_200_000);
  });
});
