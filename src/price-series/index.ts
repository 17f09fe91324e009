import { HashMap, Option } from "effect";
import { Hour, Slot, type Day, type Period, type PricedSlot, type PriceSeries } from "./types.js";

const slotsOf = (day: Day, fromHour: number, toHour: number): readonly Slot[] => {
  const slots: Slot[] = [];
  for (let hour = fromHour; hour <= toHour; hour++) {
    slots.push(Slot({ day, hour: Hour.make(hour) }));
  }
  return slots;
};

const PERIOD_SLOTS: Record<Period, readonly Slot[]> = {
  day: slotsOf("today", 6, 17),
  night: [...slotsOf("today", 18, 23), ...slotsOf("tomorrow", 0, 5)],
  today: slotsOf("today", 0, 23),
  tomorrow: slotsOf("tomorrow", 0, 23),
  full: [...slotsOf("today", 0, 23), ...slotsOf("tomorrow", 0, 23)],
};

export const makePriceSeries = (
  entries: Iterable<readonly [Slot, number]>
): PriceSeries => ({
  prices: HashMap.fromIterable(entries),
});

export const emptyPriceSeries: PriceSeries = makePriceSeries([]);

export const seriesSize = (series: PriceSeries): number => HashMap.size(series.prices);

export const valueAt = (series: PriceSeries, slot: Slot): Option.Option<number> =>
  HashMap.get(series.prices, slot);

/**
 * The fixed chronological slot sequence of a period, whether or not the
 * series has prices for it.
 */
export const periodSlots = (period: Period): readonly Slot[] => PERIOD_SLOTS[period];

/**
 * Walks a period in chronological order and keeps the slots that carry a price.
 *
 * With a `referenceHour`, today's slots before that hour are dropped as already
 * elapsed. Tomorrow's slots are always kept.
 */
export const materialize = (
  series: PriceSeries,
  period: Period,
  referenceHour?: Hour
): PricedSlot[] =>
  periodSlots(period).flatMap((slot): PricedSlot[] => {
    if (referenceHour !== undefined && slot.day === "today" && slot.hour < referenceHour) {
      return [];
    }

    return Option.match(valueAt(series, slot), {
      onNone: () => [],
      onSome: (price) => [{ slot, price }],
    });
  });
