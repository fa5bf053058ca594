import { Duration, Either, Option, pipe } from "effect";

export class InvalidFormat {
  readonly _tag = "InvalidFormat";
  constructor(readonly input: string) {}
}

export type Unit = "s" | "m" | "h" | "d";
const re = /^(\d+)([smhd])?$/i;

const SecondsPerUnit: Readonly<Record<Unit, number>> = { s: 1, m: 60, h: 3_600, d: 86_400 };

const isUnit = (u: string): u is Unit => u in SecondsPerUnit;

/**
 * Parses `<integer><unit?>` into minutes. The unit is one of s, m, h, d and
 * defaults to minutes; seconds give fractional minutes (`"45s"` is 0.75).
 */
export const parseDuration = (input: string): Either.Either<number, InvalidFormat> =>
  pipe(
    Option.fromNullable(re.exec(input.trim())),
    Option.flatMap(([, n, u]) =>
      pipe((u ?? "m").toLowerCase(), unit =>
        n !== undefined && isUnit(unit) ? Option.some({ n, unit }) : Option.none(),
      ),
    ),
    Option.map(({ n, unit }) => (parseInt(n, 10) * SecondsPerUnit[unit]) / 60),
    Either.fromOption(() => new InvalidFormat(input)),
  );

export const toDuration = (minutes: number) => Duration.millis(Math.round(minutes * 60_000));
