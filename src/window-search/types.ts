import type { Hour, PricedSlot, Slot } from "../price-series/types.js";

export type PriceWindow = {
  readonly averagePrice: number; // total cost divided by the requested duration
  readonly startHour: Hour;
  readonly start: Slot;
  readonly duration: number; // hours, may be fractional
  readonly slots: readonly PricedSlot[]; // last entry is the fractional tail when duration is not whole
};
