import {
  FIRST_TRIMESTER_LAST_WEEK,
  GESTATION_DAYS,
  SECOND_TRIMESTER_LAST_WEEK,
} from '../constants/care.constants.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface Gestation {
  gestationalWeeks: number;
  gestationalDays: number;
  trimester: 1 | 2 | 3;
}

function parseIsoDate(isoDate: string): number {
  const [year, month, day] = isoDate.split('-').map(Number);
  return Date.UTC(year, month - 1, day);
}

function formatIsoDate(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 10);
}

/** Calendar date `days` after `isoDate`, both as YYYY-MM-DD. */
export function addDays(isoDate: string, days: number): string {
  return formatIsoDate(parseIsoDate(isoDate) + days * DAY_MS);
}

export function computeDueDate(lmpDate: string): string {
  return addDays(lmpDate, GESTATION_DAYS);
}

export function trimesterForWeek(week: number): 1 | 2 | 3 {
  if (week <= FIRST_TRIMESTER_LAST_WEEK) return 1;
  if (week <= SECOND_TRIMESTER_LAST_WEEK) return 2;
  return 3;
}

/**
 * Gestational age on `today` counted from the last menstrual period. An LMP
 * after `today` counts as day zero.
 */
export function describeGestation(lmpDate: string, today: Date): Gestation {
  const todayUtc = Date.UTC(today.getUTCFullYear(), today.getUTCMonth(), today.getUTCDate());
  const elapsed = Math.max(0, Math.floor((todayUtc - parseIsoDate(lmpDate)) / DAY_MS));
  const gestationalWeeks = Math.floor(elapsed / 7);
  return {
    gestationalWeeks,
    gestationalDays: elapsed % 7,
    trimester: trimesterForWeek(gestationalWeeks),
  };
}
