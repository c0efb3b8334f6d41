/**
 * Fixed-point hour arithmetic.
 *
 * Hours are summed and compared as integer hundredths of an hour so that
 * totals like 2.5 + 5.5 or 0.1 + 0.2 compare equal to their expected value.
 */

export const CENTIHOURS_PER_HOUR = 100;
export const EXPECTED_WORKING_DAY_HOURS = 8;

export function toCentihours(hours: number): number {
  return Math.round(hours * CENTIHOURS_PER_HOUR);
}

export function fromCentihours(centihours: number): number {
  return centihours / CENTIHOURS_PER_HOUR;
}

export function sumHours(values: number[]): number {
  return values.reduce((total, hours) => total + toCentihours(hours), 0);
}

/** True when the value needs no more than two decimals */
export function hasHourPrecision(hours: number): boolean {
  return Math.abs(hours * CENTIHOURS_PER_HOUR - toCentihours(hours)) < 1e-6;
}

/** 6 -> "6.0", 7.25 -> "7.25", -1 -> "-1.0" */
export function formatHours(hours: number): string {
  const centihours = toCentihours(hours);
  return centihours % 10 === 0
    ? fromCentihours(centihours).toFixed(1)
    : fromCentihours(centihours).toFixed(2);
}
