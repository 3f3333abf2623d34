import { parseTimestamp } from '../../src/ingest/timestamps';

describe('parseTimestamp', () => {
  it('should read numbers as epoch seconds', () => {
    expect(parseTimestamp(1700000000)).toBe(1700000000000);
    expect(parseTimestamp(1700000000.5)).toBe(1700000000500);
  });

  it('should read numeric strings as epoch seconds', () => {
    expect(parseTimestamp('1700000000')).toBe(1700000000000);
  });

  it('should parse UTC ISO-8601 strings', () => {
    expect(parseTimestamp('2024-03-15T10:30:00Z')).toBe(Date.UTC(2024, 2, 15, 10, 30, 0));
  });

  it('should treat zone-less date-times as UTC', () => {
    expect(parseTimestamp('2024-03-15T10:30:00')).toBe(Date.UTC(2024, 2, 15, 10, 30, 0));
    expect(parseTimestamp('2024-03-15 10:30')).toBe(Date.UTC(2024, 2, 15, 10, 30, 0));
  });

  it('should apply offsets and truncate long fractions to milliseconds', () => {
    expect(parseTimestamp('2024-03-15T10:30:00.123456+02:00')).toBe(Date.UTC(2024, 2, 15, 8, 30, 0, 123));
    expect(parseTimestamp('2024-03-15T10:30:00+0530')).toBe(Date.UTC(2024, 2, 15, 5, 0, 0));
  });

  it('should read date-only strings as midnight UTC', () => {
    expect(parseTimestamp('2024-03-15')).toBe(Date.UTC(2024, 2, 15));
  });

  it('should return null for anything that is not a timestamp', () => {
    expect(parseTimestamp('yesterday')).toBeNull();
    expect(parseTimestamp('')).toBeNull();
    expect(parseTimestamp(null)).toBeNull();
    expect(parseTimestamp(Number.NaN)).toBeNull();
    expect(parseTimestamp({})).toBeNull();
  });

  it('should return null for epoch values a Date cannot represent', () => {
    expect(parseTimestamp(9e12)).toBeNull();
    expect(parseTimestamp('-9000000000000')).toBeNull();
    expect(parseTimestamp(8.64e12)).toBe(8.64e15);
  });
});
