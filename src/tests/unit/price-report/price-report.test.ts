import { describe, it, expect } from "@effect/vitest";
import { Option } from "effect";
import { buildPriceReport } from "../../../price-report/index.js";
import { Hour } from "../../../price-series/types.js";
import { emptyPriceSeries } from "../../../price-series/index.js";
import { DAY_PRICES, seriesOf, tomorrow } from "../../price-fixtures.js";

describe("price-report", () => {
  const series = seriesOf(
    { ...DAY_PRICES, 1: 0.5, 18: 0.28, 19: 0.26, 22: 0.19, 23: 0.17 },
    { 0: 0.14, 1: 0.13, 2: 0.16, 7: 0.09 }
  );

  it("should combine every query into one report", () => {
    const report = buildPriceReport(series, { windowDurationHours: 2, referenceHour: Hour.make(16) });

    expect(report.referenceHour).toBe(16);
    expect(report.windowDurationHours).toBe(2);
    expect(report.currentPrice).toEqual(Option.some(0.23));
    expect(report.highestToday).toEqual(Option.some({ price: 0.5, hour: 1 }));
    expect(report.lowestDay).toEqual(Option.some({ price: 0.21, hour: 17 }));
    expect(report.lowestNight).toEqual(Option.some({ price: 0.13, hour: 1 }));

    // 16-17: 0.22
    expect(Option.map(report.cheapestDayWindow, (window) => window.startHour)).toEqual(Option.some(16));
    // 00-01 tomorrow: 0.135
    expect(Option.map(report.cheapestNightWindow, (window) => window.start)).toEqual(Option.some(tomorrow(0)));
    // 02-07 tomorrow across the gap: 0.125
    expect(Option.map(report.cheapestFullWindow, (window) => window.start)).toEqual(Option.some(tomorrow(2)));
  });

  it("should search windows forward from the reference hour only", () => {
    const report = buildPriceReport(series, { windowDurationHours: 1, referenceHour: Hour.make(18) });

    expect(Option.isNone(report.cheapestDayWindow)).toBe(true);
    expect(report.lowestDay).toEqual(Option.some({ price: 0.21, hour: 17 }));
    expect(report.currentPrice).toEqual(Option.some(0.28));
  });

  it("should report everything as absent for an empty series", () => {
    const report = buildPriceReport(emptyPriceSeries, { windowDurationHours: 3, referenceHour: Hour.make(0) });

    expect(Option.isNone(report.currentPrice)).toBe(true);
    expect(Option.isNone(report.highestToday)).toBe(true);
    expect(Option.isNone(report.lowestDay)).toBe(true);
    expect(Option.isNone(report.lowestNight)).toBe(true);
    expect(Option.isNone(report.cheapestDayWindow)).toBe(true);
    expect(Option.isNone(report.cheapestNightWindow)).toBe(true);
    expect(Option.isNone(report.cheapestFullWindow)).toBe(true);
  });
});
