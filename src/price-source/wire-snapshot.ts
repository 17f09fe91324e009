import { Effect, Either, Option, Schema } from "effect";
import { makePriceSeries, periodSlots, valueAt } from "../price-series/index.js";
import { decodeHour, Slot, type PriceSeries } from "../price-series/types.js";
import { InvalidSnapshotError } from "./types.js";

// ============================================================================
// Wire format: { "price_00": 0.31, ..., "price_23_tomorrow": 0.27 }
// ============================================================================

const WIRE_KEY_PATTERN = /^price_(\d{2})(_tomorrow)?$/;

const WireSnapshotSchema = Schema.Record({ key: Schema.String, value: Schema.Unknown });

// null is how the vendor marks an hour it has no price for yet
const WirePriceSchema = Schema.NullOr(
  Schema.Number.pipe(Schema.finite(), Schema.nonNegative())
);

export type WireSnapshot = Record<string, number>;

export type WireSnapshotOptions = {
  readonly keyPrefix: string; // e.g. "gpe_" for "gpe_price_07"
};

export const defaultWireSnapshotOptions: WireSnapshotOptions = {
  keyPrefix: "",
};

export const wireKey = (
  slot: Slot,
  options: WireSnapshotOptions = defaultWireSnapshotOptions
): string => {
  const hour = String(slot.hour).padStart(2, "0");
  const suffix = slot.day === "tomorrow" ? "_tomorrow" : "";
  return `${options.keyPrefix}price_${hour}${suffix}`;
};

export const parseWireKey = (
  key: string,
  options: WireSnapshotOptions = defaultWireSnapshotOptions
): Option.Option<Slot> => {
  if (!key.startsWith(options.keyPrefix)) {
    return Option.none();
  }

  const match = WIRE_KEY_PATTERN.exec(key.slice(options.keyPrefix.length));
  if (match === null || match[1] === undefined) {
    return Option.none();
  }

  const day = match[2] === undefined ? "today" : "tomorrow";

  return Either.getRight(decodeHour(parseInt(match[1], 10))).pipe(
    Option.map((hour) => Slot({ day, hour }))
  );
};

/**
 * Turns a string-keyed price map into a series.
 *
 * Keys that are not price keys are skipped. A price key carrying anything but
 * a non-negative number or null rejects the whole snapshot.
 */
export const decodeWireSnapshot = (
  input: unknown,
  options: WireSnapshotOptions = defaultWireSnapshotOptions
): Effect.Effect<PriceSeries, InvalidSnapshotError> =>
  Effect.gen(function* () {
    const record = yield* Schema.decodeUnknown(WireSnapshotSchema)(input).pipe(
      Effect.catchTag("ParseError", () =>
        Effect.fail(new InvalidSnapshotError({ message: "Price snapshot must be a JSON object" }))
      )
    );

    const entries: Array<readonly [Slot, number]> = [];

    for (const [key, value] of Object.entries(record)) {
      const slot = parseWireKey(key, options);
      if (Option.isNone(slot)) {
        yield* Effect.logDebug(`Ignoring unrecognized snapshot key: ${key}`);
        continue;
      }

      const price = yield* Schema.decodeUnknown(WirePriceSchema)(value).pipe(
        Effect.catchTag("ParseError", () =>
          Effect.fail(new InvalidSnapshotError({ message: `Invalid price for ${key}: ${JSON.stringify(value)}` }))
        )
      );

      if (price !== null) {
        entries.push([slot.value, price]);
      }
    }

    yield* Effect.logDebug(`Decoded ${entries.length} hourly prices from snapshot`);

    return makePriceSeries(entries);
  });

export const encodeWireSnapshot = (
  series: PriceSeries,
  options: WireSnapshotOptions = defaultWireSnapshotOptions
): WireSnapshot => {
  const snapshot: WireSnapshot = {};
  for (const slot of periodSlots("full")) {
    const price = valueAt(series, slot);
    if (Option.isSome(price)) {
      snapshot[wireKey(slot, options)] = price.value;
    }
  }
  return snapshot;
};
