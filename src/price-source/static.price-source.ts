import { Effect, Layer } from "effect";
import type { PriceSeries } from "../price-series/types.js";
import { PriceSource } from "./types.js";

// Serves a snapshot that is already in memory, e.g. one handed over by an embedding process
export const StaticPriceSourceLayer = (series: PriceSeries) =>
  Layer.succeed(PriceSource, PriceSource.of({
    getSnapshot: () => Effect.succeed(series),
  }));
