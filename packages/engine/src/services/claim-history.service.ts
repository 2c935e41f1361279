import { isWithinLookback, type ClaimHistoryEntry } from '@rxadjudicate/shared';

/**
 * Sum dispensed quantity for one exact drug code over the trailing
 * `periodDays` window ending at `asOf`. Both window bounds are inclusive;
 * fills dated after `asOf` are not counted.
 */
export function accumulateQuantity(
  history: readonly ClaimHistoryEntry[],
  ndc: string,
  periodDays: number,
  asOf: string
): number {
  let total = 0;
  for (const entry of history) {
    if (entry.ndc !== ndc) continue;
    if (!isWithinLookback(entry.serviceDate, periodDays, asOf)) continue;
    total += entry.quantityDispensed;
  }
  return total;
}

/** Most recent fill of `ndc` dated on or before `asOf`. Ties keep the later entry in the history. */
export function findLatestFill(
  history: readonly ClaimHistoryEntry[],
  ndc: string,
  asOf: string
): ClaimHistoryEntry | undefined {
  let latest: ClaimHistoryEntry | undefined;
  for (const entry of history) {
    if (entry.ndc !== ndc || entry.serviceDate > asOf) continue;
    if (!latest || entry.serviceDate >= latest.serviceDate) latest = entry;
  }
  return latest;
}

/** Fills matching `predicate` within the lookback window ending at `asOf`. */
export function fillsWithin(
  history: readonly ClaimHistoryEntry[],
  lookbackDays: number,
  asOf: string,
  predicate: (entry: ClaimHistoryEntry) => boolean
): ClaimHistoryEntry[] {
  return history.filter((entry) => predicate(entry) && isWithinLookback(entry.serviceDate, lookbackDays, asOf));
}
