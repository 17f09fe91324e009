import { Data } from "effect";

export class InvalidHourError extends Data.TaggedError("InvalidHour")<{
  readonly hour: number;
  readonly message: string;
}> {}
