import { describe, it, vitest, beforeEach, expect } from '@effect/vitest';
import type { MockedObject } from '@effect/vitest';
import { Effect, Option, TestClock } from 'effect';
import { PriceAnalyzer } from '../../app.js';
import type { IEventLogger } from '../../event-logger/types.js';
import { PriceSourceNotAvailableError, type IPriceSource } from '../../price-source/types.js';
import { Hour } from '../../price-series/types.js';
import { DAY_PRICES, seriesOf, today } from '../price-fixtures.js';

describe('PriceAnalyzer', () => {
  const series = seriesOf({ ...DAY_PRICES, 20: 0.4 }, { 1: 0.1, 2: 0.12 });

  const priceSourceMock: MockedObject<IPriceSource> = {
    getSnapshot: vitest.fn(),
  };

  const eventLoggerMock: MockedObject<IEventLogger> = {
    onSnapshotLoaded: vitest.fn(),
    onCurrentPrice: vitest.fn(),
    onHighestToday: vitest.fn(),
    onLowestInPeriod: vitest.fn(),
    onCheapestWindow: vitest.fn(),
  };

  beforeEach(() => {
    vitest.clearAllMocks();
    priceSourceMock.getSnapshot.mockReturnValue(Effect.succeed(series));
    eventLoggerMock.onSnapshotLoaded.mockReturnValue(Effect.void);
    eventLoggerMock.onCurrentPrice.mockReturnValue(Effect.void);
    eventLoggerMock.onHighestToday.mockReturnValue(Effect.void);
    eventLoggerMock.onLowestInPeriod.mockReturnValue(Effect.void);
    eventLoggerMock.onCheapestWindow.mockReturnValue(Effect.void);
  });

  it.effect('should build the report from the configured reference hour', () =>
    Effect.gen(function* () {
      const analyzer = new PriceAnalyzer(
        priceSourceMock,
        { windowDurationHours: 2, referenceHour: Option.some(Hour.make(15)) },
        eventLoggerMock,
      );

      const report = yield* analyzer.run();

      expect(report.referenceHour).toBe(15);
      expect(report.currentPrice).toEqual(Option.some(0.25));
      expect(report.highestToday).toEqual(Option.some({ price: 0.4, hour: 20 }));
      expect(Option.map(report.cheapestDayWindow, (window) => window.start)).toEqual(Option.some(today(16)));

      expect(eventLoggerMock.onSnapshotLoaded).toHaveBeenCalledWith(15, 15);
      expect(eventLoggerMock.onCurrentPrice).toHaveBeenCalledWith(15, Option.some(0.25));
      expect(eventLoggerMock.onHighestToday).toHaveBeenCalledWith(report.highestToday);
      expect(eventLoggerMock.onLowestInPeriod).toHaveBeenCalledWith('day', report.lowestDay);
      expect(eventLoggerMock.onLowestInPeriod).toHaveBeenCalledWith('night', report.lowestNight);
      expect(eventLoggerMock.onCheapestWindow).toHaveBeenCalledTimes(3);
      expect(eventLoggerMock.onCheapestWindow).toHaveBeenCalledWith('full', 2, report.cheapestFullWindow);
    })
  );

  it.effect('should fall back to the current local hour', () =>
    Effect.gen(function* () {
      yield* TestClock.setTime(new Date(2025, 7, 4, 9, 30).getTime());

      const analyzer = new PriceAnalyzer(
        priceSourceMock,
        { windowDurationHours: 1, referenceHour: Option.none() },
        eventLoggerMock,
      );

      const report = yield* analyzer.run();

      expect(report.referenceHour).toBe(9);
      expect(report.currentPrice).toEqual(Option.some(0.28));
    })
  );

  it.effect('should fail when the price source is not available', () =>
    Effect.gen(function* () {
      priceSourceMock.getSnapshot.mockReturnValue(
        Effect.fail(new PriceSourceNotAvailableError({ message: 'Unable to read price snapshot from prices.json' }))
      );

      const analyzer = new PriceAnalyzer(
        priceSourceMock,
        { windowDurationHours: 1, referenceHour: Option.none() },
        eventLoggerMock,
      );

      const error = yield* Effect.flip(analyzer.run());

      expect(error._tag).toBe('PriceSourceNotAvailable');
      expect(eventLoggerMock.onSnapshotLoaded).not.toHaveBeenCalled();
    })
  );
});
