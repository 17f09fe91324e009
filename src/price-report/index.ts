import { currentPrice, highestToday, lowestInPeriod } from "../extremum-finder/index.js";
import type { PriceSeries } from "../price-series/types.js";
import { cheapestDayWindow, cheapestFullWindow, cheapestNightWindow } from "../window-search/index.js";
import type { PriceReport, PriceReportConfig } from "./types.js";

// Single-hour extremes cover the whole band; windows only look forward from the reference hour

export const buildPriceReport = (
  series: PriceSeries,
  config: PriceReportConfig
): PriceReport => {
  const { windowDurationHours, referenceHour } = config;

  return {
    referenceHour,
    windowDurationHours,
    currentPrice: currentPrice(series, referenceHour),
    highestToday: highestToday(series),
    lowestDay: lowestInPeriod(series, "day"),
    lowestNight: lowestInPeriod(series, "night"),
    cheapestDayWindow: cheapestDayWindow(series, windowDurationHours, referenceHour),
    cheapestNightWindow: cheapestNightWindow(series, windowDurationHours, referenceHour),
    cheapestFullWindow: cheapestFullWindow(series, windowDurationHours, referenceHour),
  };
};
