import { Context, Data, Effect } from "effect";
import type { PriceSeries } from "../price-series/types.js";

export class PriceSourceNotAvailableError extends Data.TaggedError("PriceSourceNotAvailable")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class InvalidSnapshotError extends Data.TaggedError("InvalidSnapshot")<{
  readonly message: string;
}> {}

export class PriceSource extends Context.Tag("PriceSource")<
  PriceSource,
  {
    readonly getSnapshot: () => Effect.Effect<PriceSeries, PriceSourceNotAvailableError | InvalidSnapshotError>;
  }
>() {}

export type IPriceSource = Context.Tag.Service<typeof PriceSource>;
