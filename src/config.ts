import { Config as EffectConfig, ConfigError, Either } from "effect";
import { decodeHour } from "./price-series/types.js";


export const AppConfig = {
  snapshot: {
    path: EffectConfig.string("PRICE_SNAPSHOT_PATH").pipe(
      EffectConfig.withDefault("prices.json")
    ),
    keyPrefix: EffectConfig.string("PRICE_KEY_PREFIX").pipe(
      EffectConfig.withDefault("")
    ),
  },

  search: {
    windowDurationHours: EffectConfig.number("WINDOW_DURATION_HOURS").pipe(
      EffectConfig.withDefault(3),
      EffectConfig.validate({
        message: "WINDOW_DURATION_HOURS must be greater than 0",
        validation: (hours) => hours > 0,
      })
    ),
    // Falls back to the current local hour when unset
    referenceHour: EffectConfig.integer("REFERENCE_HOUR").pipe(
      EffectConfig.mapOrFail((hour) =>
        decodeHour(hour).pipe(
          Either.mapLeft((error) => ConfigError.InvalidData([], error.message))
        )
      ),
      EffectConfig.option
    ),
  },
};
