/**
 * Time-of-day arithmetic over (hours, minutes) pairs and raw minute counts
 *
 * None of these wrap at 24 hours except subtraction, which borrows one day
 * when the difference is negative. Multi-day deltas need other helpers.
 */

import type { TimeOfDay } from './types.js';

export const HOURS_IN_DAY = 24;
export const MINUTES_IN_HOUR = 60;
export const MINUTES_IN_DAY = MINUTES_IN_HOUR * HOURS_IN_DAY;
export const WORKWEEK_DURATION = 5;

function split(totalMinutes: number): TimeOfDay {
  return [Math.trunc(totalMinutes / MINUTES_IN_HOUR), totalMinutes % MINUTES_IN_HOUR];
}

export function convertToMinutes([hours, minutes]: TimeOfDay): number {
  return hours * MINUTES_IN_HOUR + minutes;
}

export function addMinutes(left: number, right: number): TimeOfDay {
  return split(left + right);
}

export function subtractMinutes(larger: number, smaller: number): TimeOfDay {
  let diff = larger - smaller;
  if (diff < 0) {
    diff += MINUTES_IN_DAY;
  }
  return split(diff);
}

export function addTime(left: TimeOfDay, right: TimeOfDay): TimeOfDay {
  return addMinutes(convertToMinutes(left), convertToMinutes(right));
}

export function subtractTime(larger: TimeOfDay, smaller: TimeOfDay): TimeOfDay {
  return subtractMinutes(convertToMinutes(larger), convertToMinutes(smaller));
}
