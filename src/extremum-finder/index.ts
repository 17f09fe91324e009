import { Option } from "effect";
import { materialize, valueAt } from "../price-series/index.js";
import { Slot, type Hour, type Period, type PricedHour, type PriceSeries } from "../price-series/types.js";
import { findCheapestWindow } from "../window-search/index.js";

// Single-hour lookups. Ties resolve to the earliest hour in the period's scan order.

export const highestToday = (series: PriceSeries): Option.Option<PricedHour> =>
  materialize(series, "today").reduce<Option.Option<PricedHour>>(
    (highest, { slot, price }) =>
      Option.isSome(highest) && highest.value.price >= price
        ? highest
        : Option.some({ price, hour: slot.hour }),
    Option.none()
  );

export const lowestInPeriod = (
  series: PriceSeries,
  period: Period,
  referenceHour?: Hour
): Option.Option<PricedHour> =>
  findCheapestWindow(series, period, 1, referenceHour).pipe(
    Option.map((window) => ({ price: window.averagePrice, hour: window.startHour }))
  );

export const currentPrice = (series: PriceSeries, hour: Hour): Option.Option<number> =>
  valueAt(series, Slot({ day: "today", hour }));
