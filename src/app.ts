import { Clock, Effect, Option } from 'effect';
import type { InvalidSnapshotError, IPriceSource, PriceSourceNotAvailableError } from './price-source/types.js';
import type { IEventLogger } from './event-logger/types.js';
import { EventLogger } from './event-logger/index.js';
import { Hour } from './price-series/types.js';
import { seriesSize } from './price-series/index.js';
import { buildPriceReport } from './price-report/index.js';
import type { PriceReport } from './price-report/types.js';

export type AnalyzerConfig = {
  readonly windowDurationHours: number;
  readonly referenceHour: Option.Option<Hour>; // none: use the current local hour
};

export class PriceAnalyzer {
  public constructor(
    private readonly priceSource: IPriceSource,
    private readonly config: AnalyzerConfig,
    private readonly eventLogger: IEventLogger = new EventLogger(),
  ) { }

  public run(): Effect.Effect<PriceReport, PriceSourceNotAvailableError | InvalidSnapshotError> {
    const deps = this;

    return Effect.gen(function* () {
      const series = yield* deps.priceSource.getSnapshot();
      const referenceHour = yield* deps.resolveReferenceHour();

      yield* deps.eventLogger.onSnapshotLoaded(seriesSize(series), referenceHour);

      const report = buildPriceReport(series, {
        windowDurationHours: deps.config.windowDurationHours,
        referenceHour,
      });

      yield* deps.logReport(report);

      return report;
    }).pipe(
      Effect.withLogSpan('price-analyzer'),
    );
  }

  private resolveReferenceHour(): Effect.Effect<Hour> {
    return Option.match(this.config.referenceHour, {
      onSome: (hour) => Effect.succeed(hour),
      onNone: () => Clock.currentTimeMillis.pipe(
        Effect.map((now) => Hour.make(new Date(now).getHours())),
      ),
    });
  }

  private logReport(report: PriceReport): Effect.Effect<void> {
    const eventLogger = this.eventLogger;

    return Effect.gen(function* () {
      yield* eventLogger.onCurrentPrice(report.referenceHour, report.currentPrice);
      yield* eventLogger.onHighestToday(report.highestToday);
      yield* eventLogger.onLowestInPeriod('day', report.lowestDay);
      yield* eventLogger.onLowestInPeriod('night', report.lowestNight);
      yield* eventLogger.onCheapestWindow('day', report.windowDurationHours, report.cheapestDayWindow);
      yield* eventLogger.onCheapestWindow('night', report.windowDurationHours, report.cheapestNightWindow);
      yield* eventLogger.onCheapestWindow('full', report.windowDurationHours, report.cheapestFullWindow);
    });
  }
}
