import { describe, expect, it } from 'vitest';
import {
  AGE_GROUPS,
  ageBracket,
  ageGroupForMonths,
  ageInMonths,
  formatAge,
  formatIsoDate,
  parseIsoDate,
  spacesFor
} from '../src/age.js';
import type { CalendarDate } from '../src/types.js';

function date(value: string): CalendarDate {
  const parsed = parseIsoDate(value);
  if (!parsed) {
    throw new Error(`Bad test date ${value}`);
  }
  return parsed;
}

describe('parseIsoDate', () => {
  it('parses calendar dates', () => {
    expect(parseIsoDate('2024-02-29')).toEqual({ year: 2024, month: 2, day: 29 });
    expect(parseIsoDate(' 2023-11-05 ')).toEqual({ year: 2023, month: 11, day: 5 });
  });

  it('rejects impossible or differently formatted dates', () => {
    expect(parseIsoDate('2023-02-29')).toBeNull();
    expect(parseIsoDate('2024-13-01')).toBeNull();
    expect(parseIsoDate('2024/01/01')).toBeNull();
    expect(parseIsoDate('')).toBeNull();
  });

  it('formats back to the same text', () => {
    expect(formatIsoDate(date('2024-03-07'))).toBe('2024-03-07');
  });
});

describe('ageInMonths', () => {
  it('is zero on the birth date', () => {
    expect(ageInMonths(date('2023-05-10'), date('2023-05-10'))).toBe(0);
  });

  it('truncates partial months', () => {
    expect(ageInMonths(date('2024-01-20'), date('2024-03-15'))).toBe(1);
    expect(ageInMonths(date('2024-01-20'), date('2024-03-20'))).toBe(2);
  });

  it('counts a month at the end of a shorter month', () => {
    expect(ageInMonths(date('2024-01-31'), date('2024-02-29'))).toBe(1);
    expect(ageInMonths(date('2023-01-31'), date('2023-02-27'))).toBe(0);
  });

  it('spans years', () => {
    expect(ageInMonths(date('2022-01-10'), date('2024-09-01'))).toBe(31);
    expect(ageInMonths(date('2020-06-15'), date('2026-06-15'))).toBe(72);
  });
});

describe('age groups', () => {
  it('cover every month count exactly once', () => {
    for (let months = 0; months <= 240; months += 1) {
      const containing = AGE_GROUPS.filter(
        (group) => months >= group.minMonths && (group.maxMonths === null || months < group.maxMonths)
      );
      expect(containing).toHaveLength(1);
    }
  });

  it('switch at the bracket boundaries', () => {
    const keys = [0, 17, 18, 29, 30, 47, 48, 71, 72, 200].map((months) => ageGroupForMonths(months).key);
    expect(keys).toEqual([
      'infant',
      'infant',
      'toddler',
      'toddler',
      'preschool',
      'preschool',
      'kindergarten',
      'kindergarten',
      'schoolAge',
      'schoolAge'
    ]);
  });

  it('classifies from dates', () => {
    expect(ageBracket(date('2024-06-15'), date('2024-06-15')).label).toBe('Infant (0-18 months)');
    expect(ageBracket(date('2022-01-10'), date('2024-09-01')).label).toBe('Preschool (30 months - 4 years)');
  });

  it('reads the matching capacity', () => {
    const spaces = { infant: 1, toddler: 2, preschool: null, kindergarten: 4, schoolAge: 5 };
    expect(spacesFor(spaces, 'toddler')).toBe(2);
    expect(spacesFor(spaces, 'preschool')).toBeNull();
    expect(spacesFor(spaces, 'schoolAge')).toBe(5);
  });
});

describe('formatAge', () => {
  it('uses months below a year', () => {
    expect(formatAge(0)).toBe('0 months');
    expect(formatAge(11)).toBe('11 months');
  });

  it('uses years and months from a year on', () => {
    expect(formatAge(12)).toBe('1 years, 0 months');
    expect(formatAge(31)).toBe('2 years, 7 months');
  });
});
