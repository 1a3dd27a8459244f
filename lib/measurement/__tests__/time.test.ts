import { describe, test, expect } from '@jest/globals';
import { CalendarDate, CalendarDateTime } from '@internationalized/date';
import { ParseError } from '../../errors';
import {
  durationBetween,
  formatDateISO,
  formatSiteDateTime,
  minutes,
  parseSiteDate,
  parseSiteDateTime,
  seconds,
} from '../time';

describe('durations', () => {
  test('seconds and minutes are expressed in milliseconds', () => {
    expect(seconds(10)).toBe(10_000);
    expect(minutes(15)).toBe(900_000);
  });

  test('durationBetween is signed', () => {
    const earlier = parseSiteDateTime('2023-11-09 10:28:56', 'Europe/Amsterdam', 'a');
    const later = earlier.add({ seconds: 90 });
    expect(durationBetween(earlier, later)).toBe(90_000);
    expect(durationBetween(later, earlier)).toBe(-90_000);
  });
});

describe('parseSiteDateTime', () => {
  test('places the wall-clock time in the given zone', () => {
    const result = parseSiteDateTime('2023-11-09 10:28:56', 'Europe/Amsterdam', 'lastUpdateTime');

    expect(result.timeZone).toBe('Europe/Amsterdam');
    expect(result.hour).toBe(10);
    expect(result.minute).toBe(28);
    expect(result.second).toBe(56);
    // CET is UTC+1 in November
    expect(result.toDate().toISOString()).toBe('2023-11-09T09:28:56.000Z');
  });

  test('uses summer time where the zone has it', () => {
    const result = parseSiteDateTime('2024-06-12 13:44:51', 'Europe/Amsterdam', 'lastUpdateTime');
    expect(result.toDate().toISOString()).toBe('2024-06-12T11:44:51.000Z');
  });

  test('rejects other layouts', () => {
    expect(() =>
      parseSiteDateTime('2023-11-09T10:28:56', 'Europe/Amsterdam', 'lastUpdateTime'),
    ).toThrow(
      'Cannot parse field "lastUpdateTime": expected YYYY-MM-DD HH:MM:SS, got "2023-11-09T10:28:56"',
    );
  });

  test('rejects dates and times that do not exist', () => {
    expect(() => parseSiteDateTime('2023-02-30 10:00:00', 'UTC', 'date')).toThrow(ParseError);
    expect(() => parseSiteDateTime('2023-11-09 24:00:00', 'UTC', 'date')).toThrow(ParseError);
  });

  test('rejects clock fields out of range instead of rolling them over', () => {
    expect(() => parseSiteDateTime('2023-11-09 24:00:00', 'UTC', 'date')).toThrow(
      'Cannot parse field "date": not a valid date and time: "2023-11-09 24:00:00"',
    );
    expect(() => parseSiteDateTime('2023-11-09 10:61:00', 'UTC', 'date')).toThrow(
      'Cannot parse field "date": not a valid date and time: "2023-11-09 10:61:00"',
    );
    expect(() => parseSiteDateTime('2023-11-09 10:00:75', 'UTC', 'date')).toThrow(
      'Cannot parse field "date": not a valid date and time: "2023-11-09 10:00:75"',
    );
  });

  test('accepts the last second of the day', () => {
    const result = parseSiteDateTime('2023-11-09 23:59:59', 'UTC', 'date');
    expect(formatSiteDateTime(result)).toBe('2023-11-09 23:59:59');
  });

  test('rejects missing and non-string values', () => {
    expect(() => parseSiteDateTime(undefined, 'UTC', 'date')).toThrow(
      'Cannot parse field "date": value is missing',
    );
    expect(() => parseSiteDateTime(20231109, 'UTC', 'date')).toThrow(
      'Cannot parse field "date": expected a string, got 20231109',
    );
  });
});

describe('parseSiteDate', () => {
  test('parses YYYY-MM-DD', () => {
    const date = parseSiteDate('2021-02-25', 'installationDate');
    expect(date.year).toBe(2021);
    expect(date.month).toBe(2);
    expect(date.day).toBe(25);
  });

  test('rejects dates that would be clamped', () => {
    expect(() => parseSiteDate('2023-02-30', 'installationDate')).toThrow(
      'Cannot parse field "installationDate": not a calendar date: "2023-02-30"',
    );
  });

  test('rejects null', () => {
    expect(() => parseSiteDate(null, 'ptoDate')).toThrow(ParseError);
  });
});

describe('formatting', () => {
  test('formatDateISO pads month and day', () => {
    expect(formatDateISO(new CalendarDate(2023, 11, 9))).toBe('2023-11-09');
    expect(formatDateISO(new CalendarDate(2024, 1, 1))).toBe('2024-01-01');
  });

  test('formatSiteDateTime writes the API layout', () => {
    expect(formatSiteDateTime(new CalendarDateTime(2023, 11, 9, 7, 5, 0))).toBe(
      '2023-11-09 07:05:00',
    );
  });

  test('formatSiteDateTime uses the wall clock of a zoned time', () => {
    const zoned = parseSiteDateTime('2024-06-12 13:44:51', 'Europe/Amsterdam', 'date');
    expect(formatSiteDateTime(zoned)).toBe('2024-06-12 13:44:51');
  });
});
