import { calendarDateOf, dateFromFilename, formatPostDate, parsePostDate } from '../dates';

const iso = (value: unknown): string | null => parsePostDate(value)?.toISOString() ?? null;

describe('parsePostDate', () => {
  it('reads a plain calendar date as UTC midnight', () => {
    expect(iso('2021-03-04')).toBe('2021-03-04T00:00:00.000Z');
  });

  it('reads the Jekyll form with a space separated offset', () => {
    expect(iso('2021-03-04 10:00:00 +0100')).toBe('2021-03-04T09:00:00.000Z');
  });

  it('reads ISO 8601 timestamps', () => {
    expect(iso('2021-03-04T10:00:00Z')).toBe('2021-03-04T10:00:00.000Z');
    expect(iso('2021-03-04T10:00:00.5-02:30')).toBe('2021-03-04T12:30:00.500Z');
    expect(iso('2021-03-04 10:15')).toBe('2021-03-04T10:15:00.000Z');
  });

  it('accepts leap days only in leap years', () => {
    expect(iso('2024-02-29')).toBe('2024-02-29T00:00:00.000Z');
    expect(iso('2023-02-29')).toBeNull();
    expect(iso('1900-02-29')).toBeNull();
    expect(iso('2000-02-29')).toBe('2000-02-29T00:00:00.000Z');
  });

  it('rejects impossible calendar dates and times', () => {
    expect(iso('2021-13-01')).toBeNull();
    expect(iso('2021-04-31')).toBeNull();
    expect(iso('2021-00-10')).toBeNull();
    expect(iso('2021-03-04 24:00')).toBeNull();
    expect(iso('2021-03-04 10:60')).toBeNull();
  });

  it('rejects values that are not dates', () => {
    expect(iso('not a date')).toBeNull();
    expect(iso('04/03/2021')).toBeNull();
    expect(iso(20210304)).toBeNull();
    expect(iso(null)).toBeNull();
    expect(iso(new Date('nope'))).toBeNull();
  });

  it('passes valid Date instances through', () => {
    const date = new Date('2022-07-01T12:00:00Z');
    expect(parsePostDate(date)).toBe(date);
  });
});

describe('formatPostDate', () => {
  it('writes UTC in the front matter form', () => {
    expect(formatPostDate(new Date('2024-05-01T09:03:07Z'))).toBe('2024-05-01 09:03:07 +0000');
  });
});

describe('calendarDateOf', () => {
  it('returns the UTC calendar date', () => {
    expect(calendarDateOf(new Date('2024-05-01T23:59:59Z'))).toBe('2024-05-01');
  });
});

describe('dateFromFilename', () => {
  it('reads the date prefix of a post file name', () => {
    expect(dateFromFilename('2019-02-11-living-with-optional.md')).toBe('2019-02-11');
  });

  it('returns null when there is no prefix', () => {
    expect(dateFromFilename('about.md')).toBeNull();
    expect(dateFromFilename('2019-02-11.md')).toBeNull();
  });
});
