import { Effect, Layer } from "effect";
import { FileSystem } from "@effect/platform";
import { AppConfig } from "../config.js";
import type { PriceSeries } from "../price-series/types.js";
import {
  InvalidSnapshotError,
  PriceSource,
  PriceSourceNotAvailableError,
  type IPriceSource,
} from "./types.js";
import { decodeWireSnapshot } from "./wire-snapshot.js";

export type FilePriceSourceConfig = {
  readonly path: string;
  readonly keyPrefix: string;
};

export class FilePriceSource implements IPriceSource {
  constructor(
    private readonly config: FilePriceSourceConfig,
    private readonly fileSystem: FileSystem.FileSystem,
  ) { }

  public getSnapshot(): Effect.Effect<PriceSeries, PriceSourceNotAvailableError | InvalidSnapshotError> {
    const config = this.config;
    const fileSystem = this.fileSystem;

    return Effect.gen(function* () {
      const content = yield* fileSystem.readFileString(config.path).pipe(
        Effect.mapError((error) => new PriceSourceNotAvailableError({
          message: `Unable to read price snapshot from ${config.path}`,
          cause: error,
        }))
      );

      const json = yield* Effect.try({
        try: (): unknown => JSON.parse(content),
        catch: () => new InvalidSnapshotError({ message: `Price snapshot at ${config.path} is not valid JSON` }),
      });

      const series = yield* decodeWireSnapshot(json, { keyPrefix: config.keyPrefix });

      yield* Effect.logDebug(`Loaded price snapshot from ${config.path}`);

      return series;
    });
  }
}

export const FilePriceSourceLayer = Layer.effect(
  PriceSource,
  Effect.gen(function* () {
    const config = AppConfig.snapshot;

    return new FilePriceSource(
      {
        path: yield* config.path,
        keyPrefix: yield* config.keyPrefix,
      },
      yield* FileSystem.FileSystem
    );
  })
);
