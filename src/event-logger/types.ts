import type { Effect, Option } from "effect";
import type { Hour, Period, PricedHour } from "../price-series/types.js";
import type { PriceWindow } from "../window-search/types.js";

export type IEventLogger = {
  onSnapshotLoaded: (priceCount: number, referenceHour: Hour) => Effect.Effect<void>;
  onCurrentPrice: (hour: Hour, price: Option.Option<number>) => Effect.Effect<void>;
  onHighestToday: (result: Option.Option<PricedHour>) => Effect.Effect<void>;
  onLowestInPeriod: (period: Period, result: Option.Option<PricedHour>) => Effect.Effect<void>;
  onCheapestWindow: (period: Period, durationHours: number, result: Option.Option<PriceWindow>) => Effect.Effect<void>;
};
