import { Option } from "effect";
import { materialize } from "../price-series/index.js";
import type { Hour, Period, PricedSlot, PriceSeries } from "../price-series/types.js";
import type { PriceWindow } from "./types.js";

// Floating point slack when comparing covered hours against the requested duration
const COVERAGE_TOLERANCE_HOURS = 0.01;

const placeWindow = (
  sequence: readonly PricedSlot[],
  startIndex: number,
  duration: number
): Option.Option<PriceWindow> => {
  const fullSlots = Math.floor(duration);
  const fraction = duration - fullSlots;

  const slots = sequence.slice(startIndex, startIndex + fullSlots);
  if (slots.length < fullSlots) {
    return Option.none();
  }

  let totalCost = slots.reduce((sum, entry) => sum + entry.price, 0);
  let coveredHours = slots.length;

  if (fraction > 0) {
    const tail = sequence[startIndex + fullSlots];
    if (tail === undefined) {
      return Option.none();
    }
    totalCost += tail.price * fraction;
    coveredHours += fraction;
    slots.push(tail);
  }

  const first = slots[0];
  if (first === undefined || coveredHours < duration - COVERAGE_TOLERANCE_HOURS) {
    return Option.none();
  }

  return Option.some({
    averagePrice: totalCost / duration,
    startHour: first.slot.hour,
    start: first.slot,
    duration,
    slots,
  });
};

/**
 * Finds the contiguous run of priced hours within `period` whose
 * duration-weighted average price is lowest.
 *
 * Hours without a price are left out before windows are placed, so a window
 * may span a gap in the data rather than stop at it. When `duration` is not a
 * whole number the hour after the whole slots counts with the fractional
 * weight. Ties keep the earliest window.
 *
 * @param duration - hours, may be fractional (e.g. 2.5)
 * @param referenceHour - today's hours before this one are not considered
 * @returns `Option.none()` when the period cannot hold a window of that length
 */
export const findCheapestWindow = (
  series: PriceSeries,
  period: Period,
  duration: number,
  referenceHour?: Hour
): Option.Option<PriceWindow> => {
  if (!Number.isFinite(duration) || duration <= 0) {
    return Option.none();
  }

  const sequence = materialize(series, period, referenceHour);
  if (sequence.length < Math.ceil(duration)) {
    return Option.none();
  }

  let best: Option.Option<PriceWindow> = Option.none();

  for (let startIndex = 0; startIndex < sequence.length; startIndex++) {
    const candidate = placeWindow(sequence, startIndex, duration);
    if (Option.isNone(candidate)) {
      continue;
    }

    if (Option.isNone(best) || candidate.value.averagePrice < best.value.averagePrice) {
      best = candidate;
    }
  }

  return best;
};

export const cheapestDayWindow = (
  series: PriceSeries,
  duration: number,
  referenceHour?: Hour
): Option.Option<PriceWindow> => findCheapestWindow(series, "day", duration, referenceHour);

export const cheapestNightWindow = (
  series: PriceSeries,
  duration: number,
  referenceHour?: Hour
): Option.Option<PriceWindow> => findCheapestWindow(series, "night", duration, referenceHour);

export const cheapestFullWindow = (
  series: PriceSeries,
  duration: number,
  referenceHour?: Hour
): Option.Option<PriceWindow> => findCheapestWindow(series, "full", duration, referenceHour);
