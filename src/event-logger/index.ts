import type { IEventLogger } from "./types.js";
import { Effect, Option } from "effect";
import type { Hour, Period, PricedHour } from "../price-series/types.js";
import type { PriceWindow } from "../window-search/types.js";

export const formatHour = (hour: Hour): string => `${String(hour).padStart(2, "0")}:00`;

export const formatPrice = (price: number): string => price.toFixed(4);

export class EventLogger implements IEventLogger {

  public onSnapshotLoaded(priceCount: number, referenceHour: Hour) {
    return Effect.log(`Loaded ${priceCount} hourly prices, searching from ${formatHour(referenceHour)}`);
  }

  public onCurrentPrice(hour: Hour, price: Option.Option<number>) {
    return Option.match(price, {
      onNone: () => Effect.log(`No price available for ${formatHour(hour)}`),
      onSome: (value) => Effect.log(`Current price at ${formatHour(hour)}: ${formatPrice(value)}`),
    });
  }

  public onHighestToday(result: Option.Option<PricedHour>) {
    return Option.match(result, {
      onNone: () => Effect.log('No prices available for today'),
      onSome: ({ price, hour }) => Effect.log(`Highest price today: ${formatPrice(price)} at ${formatHour(hour)}`),
    });
  }

  public onLowestInPeriod(period: Period, result: Option.Option<PricedHour>) {
    return Option.match(result, {
      onNone: () => Effect.log(`No prices available for the ${period} period`),
      onSome: ({ price, hour }) => Effect.log(`Lowest ${period} price: ${formatPrice(price)} at ${formatHour(hour)}`),
    });
  }

  public onCheapestWindow(period: Period, durationHours: number, result: Option.Option<PriceWindow>) {
    return Option.match(result, {
      onNone: () => Effect.log(`No ${durationHours}h window available in the ${period} period`),
      onSome: (window) => Effect.log(
        `Cheapest ${durationHours}h window (${period}): ${formatPrice(window.averagePrice)} starting ${window.start.day} at ${formatHour(window.startHour)}`
      ),
    });
  }
}
