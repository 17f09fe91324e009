import { Data, Either, HashMap, Schema } from "effect";
import { InvalidHourError } from "../errors/invalid-hour.error.js";

export const Hour = Schema.Int.pipe(Schema.between(0, 23), Schema.brand("Hour"));

export type Hour = typeof Hour.Type;

export const decodeHour = (hour: number): Either.Either<Hour, InvalidHourError> =>
  Schema.decodeEither(Hour)(hour).pipe(
    Either.mapLeft(() => new InvalidHourError({
      hour,
      message: `Hour must be an integer between 0 and 23, received ${hour}`,
    })),
  );

export const DaySchema = Schema.Literal("today", "tomorrow");

export type Day = Schema.Schema.Type<typeof DaySchema>;

export interface Slot {
  readonly day: Day;
  readonly hour: Hour;
}

// Structural equality, so two slots with the same day and hour hit the same HashMap entry
export const Slot = Data.case<Slot>();

/**
 * Named hour bands a series can be walked over.
 *
 * - `day`: 06-17 today
 * - `night`: 18-23 today, then 00-05 tomorrow
 * - `today` / `tomorrow`: every hour of that day
 * - `full`: every hour of today, then every hour of tomorrow
 */
export type Period = "day" | "night" | "full" | "today" | "tomorrow";

export type PriceSeries = {
  readonly prices: HashMap.HashMap<Slot, number>;
};

export type PricedSlot = {
  readonly slot: Slot;
  readonly price: number;
};

export type PricedHour = {
  readonly price: number;
  readonly hour: Hour;
};
