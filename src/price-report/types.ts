import type { Option } from "effect";
import type { Hour, PricedHour } from "../price-series/types.js";
import type { PriceWindow } from "../window-search/types.js";

export type PriceReportConfig = {
  readonly windowDurationHours: number;
  readonly referenceHour: Hour; // "now": windows never start before it today
};

export type PriceReport = {
  readonly referenceHour: Hour;
  readonly windowDurationHours: number;
  readonly currentPrice: Option.Option<number>;
  readonly highestToday: Option.Option<PricedHour>;
  readonly lowestDay: Option.Option<PricedHour>;
  readonly lowestNight: Option.Option<PricedHour>;
  readonly cheapestDayWindow: Option.Option<PriceWindow>;
  readonly cheapestNightWindow: Option.Option<PriceWindow>;
  readonly cheapestFullWindow: Option.Option<PriceWindow>;
};
