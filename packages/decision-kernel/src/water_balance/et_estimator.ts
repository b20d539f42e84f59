// Decision Kernel - ET estimator boundary
//
// The tracker never computes evapotranspiration physics; it asks an injected
// estimator for a crop ET rate over the interval it is about to integrate.

import { ConfigError } from "../errors";

export type TimeRange = { startTs: number; endTs: number };

export const MS_PER_DAY = 86_400_000;

export interface EtEstimator {
  /**
   * Crop evapotranspiration rate for the zone over the range, in mm/day.
   */
  estimateET(zoneId: string, range: TimeRange): number;
}

/**
 * Fixed rate per zone; zones without an entry use `fallbackMmPerDay`.
 */
export class ConstantEtEstimator implements EtEstimator {
  constructor(
    private readonly rateMmPerDay: Readonly<Record<string, number>>,
    private readonly fallbackMmPerDay: number = 0
  ) {}

  estimateET(zoneId: string, _range: TimeRange): number {
    return this.rateMmPerDay[zoneId] ?? this.fallbackMmPerDay;
  }
}

/**
 * ETc = ET0 * Kc, with ET0 looked up by calendar month (UTC) at the midpoint
 * of the requested range.
 */
export class KcScaledEtEstimator implements EtEstimator {
  constructor(
    private readonly referenceEtByMonth: ReadonlyArray<number>,
    private readonly cropCoefficientByZone: Readonly<Record<string, number>>
  ) {
    if (referenceEtByMonth.length !== 12) {
      throw new ConfigError(
        "INVALID_REFERENCE_ET",
        `reference ET table must have 12 monthly entries (got ${referenceEtByMonth.length})`
      );
    }
  }

  estimateET(zoneId: string, range: TimeRange): number {
    const kc = this.cropCoefficientByZone[zoneId];
    if (kc === undefined) return Number.NaN; // surfaced by the tracker as a computation error
    const mid = range.startTs + (range.endTs - range.startTs) / 2;
    const eto = this.referenceEtByMonth[new Date(mid).getUTCMonth()] ?? Number.NaN;
    return eto * kc;
  }
}
