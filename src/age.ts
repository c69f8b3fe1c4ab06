import type { AgeGroup, AgeGroupKey, CalendarDate, SpacesByAgeGroup } from './types.js';

// Licensing age ranges; month bounds are inclusive-lower, exclusive-upper.
export const AGE_GROUPS: readonly AgeGroup[] = [
  { key: 'infant', label: 'Infant (0-18 months)', minMonths: 0, maxMonths: 18 },
  { key: 'toddler', label: 'Toddler (18-30 months)', minMonths: 18, maxMonths: 30 },
  { key: 'preschool', label: 'Preschool (30 months - 4 years)', minMonths: 30, maxMonths: 48 },
  { key: 'kindergarten', label: 'Kindergarten (4-5 years)', minMonths: 48, maxMonths: 72 },
  { key: 'schoolAge', label: 'School Age (6+ years)', minMonths: 72, maxMonths: null }
];

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function compareDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

/**
 * Parses a `YYYY-MM-DD` string into a calendar date.
 * Returns `null` for anything else, including impossible days such as `2023-02-30`.
 */
export function parseIsoDate(value: string): CalendarDate | null {
  const match = ISO_DATE_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return null;
  }
  return { year, month, day };
}

export function toCalendarDate(date: Date): CalendarDate {
  return { year: date.getFullYear(), month: date.getMonth() + 1, day: date.getDate() };
}

export function formatIsoDate(date: CalendarDate): string {
  const pad = (value: number, width: number): string => String(value).padStart(width, '0');
  return `${pad(date.year, 4)}-${pad(date.month, 2)}-${pad(date.day, 2)}`;
}

export function isAfter(a: CalendarDate, b: CalendarDate): boolean {
  return compareDates(a, b) > 0;
}

function addMonths(date: CalendarDate, months: number): CalendarDate {
  const index = date.year * 12 + (date.month - 1) + months;
  const year = Math.floor(index / 12);
  const month = (index % 12) + 1;
  return { year, month, day: Math.min(date.day, daysInMonth(year, month)) };
}

/**
 * Whole calendar months elapsed from `birth` to `reference`.
 * Partial months are truncated: a child born on the 20th is not a month older
 * until the 20th of the following month (or that month's last day if shorter).
 */
export function ageInMonths(birth: CalendarDate, reference: CalendarDate): number {
  let months = (reference.year - birth.year) * 12 + (reference.month - birth.month);
  const landed = compareDates(addMonths(birth, months), reference);
  if (months > 0 && landed > 0) {
    months -= 1;
  } else if (months < 0 && landed < 0) {
    months += 1;
  }
  return months;
}

export function ageGroupForMonths(months: number): AgeGroup {
  const match = AGE_GROUPS.find(
    (group) => months >= group.minMonths && (group.maxMonths === null || months < group.maxMonths)
  );
  // Unreachable for months >= 0; kept so negative ages still resolve.
  return match ?? AGE_GROUPS[0];
}

export function ageBracket(birth: CalendarDate, reference: CalendarDate): AgeGroup {
  return ageGroupForMonths(ageInMonths(birth, reference));
}

export function formatAge(months: number): string {
  if (months >= 12) {
    return `${Math.floor(months / 12)} years, ${months % 12} months`;
  }
  return `${months} months`;
}

export function spacesFor(spaces: SpacesByAgeGroup, key: AgeGroupKey): number | null {
  switch (key) {
    case 'infant':
      return spaces.infant;
    case 'toddler':
      return spaces.toddler;
    case 'preschool':
      return spaces.preschool;
    case 'kindergarten':
      return spaces.kindergarten;
    case 'schoolAge':
      return spaces.schoolAge;
    default: {
      const unreachable: never = key;
      throw new Error(`Unknown age group: ${String(unreachable)}`);
    }
  }
}
