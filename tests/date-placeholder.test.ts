import { describe, it, expect } from 'vitest';
import { formatDate, formatPlaceholders, isSupportedDateFormat } from '../src/core/date-placeholder.js';

describe('formatPlaceholders', () => {
  const christmas = new Date(2024, 11, 25, 9, 30, 0);

  it('should replace {date} with DD/MM/YYYY', () => {
    expect(formatPlaceholders('Today is {date}', christmas)).toBe('Today is 25/12/2024');
  });

  it('should replace {date:DD/MM} without the year', () => {
    expect(formatPlaceholders('Report for {date:DD/MM}', christmas)).toBe('Report for 25/12');
  });

  it('should replace {date:DD/MM/YYYY}', () => {
    expect(formatPlaceholders('{date:DD/MM/YYYY}', christmas)).toBe('25/12/2024');
  });

  it('should substitute several distinct placeholders in one message', () => {
    const template = 'Week of {date:DD/MM} ({date}), ISO {date:YYYY-MM-DD}, again {date:DD/MM}';
    expect(formatPlaceholders(template, christmas)).toBe(
      'Week of 25/12 (25/12/2024), ISO 2024-12-25, again 25/12'
    );
  });

  it('should accept fields in any order', () => {
    expect(formatPlaceholders('{date:MM/DD/YYYY}', christmas)).toBe('12/25/2024');
    expect(formatPlaceholders('{date:YYYY}', christmas)).toBe('2024');
  });

  it('should zero-pad day and month', () => {
    expect(formatPlaceholders('{date}', new Date(2024, 0, 5))).toBe('05/01/2024');
  });

  it('should zero-pad the year to four digits', () => {
    const date = new Date(2024, 6, 1);
    date.setFullYear(999);
    expect(formatPlaceholders('{date:YYYY}', date)).toBe('0999');
  });

  it('should return a message without placeholders unchanged', () => {
    const message = 'Standup in 5 minutes!\nBring your {notes}.';
    expect(formatPlaceholders(message, christmas)).toBe(message);
  });

  it('should leave unsupported formats unmodified', () => {
    expect(formatPlaceholders('At {date:HH:mm}', christmas)).toBe('At {date:HH:mm}');
    expect(formatPlaceholders('{date:}', christmas)).toBe('{date:}');
    expect(formatPlaceholders('{date:dd/mm}', christmas)).toBe('{date:dd/mm}');
    expect(formatPlaceholders('{date:DDD}', christmas)).toBe('{date:DDD}');
  });

  it('should leave malformed placeholders unmodified', () => {
    expect(formatPlaceholders('{date', christmas)).toBe('{date');
    expect(formatPlaceholders('{ date }', christmas)).toBe('{ date }');
    expect(formatPlaceholders('{time}', christmas)).toBe('{time}');
  });

  it('should substitute supported tokens next to unsupported ones', () => {
    expect(formatPlaceholders('{date:HH} / {date:DD/MM}', christmas)).toBe('{date:HH} / 25/12');
  });

  it('should be deterministic for a fixed date', () => {
    const template = 'Report {date} / {date:DD/MM}';
    const first = formatPlaceholders(template, christmas);
    const second = formatPlaceholders(template, christmas);
    expect(second).toBe(first);
  });
});

describe('isSupportedDateFormat', () => {
  it('should accept field and separator combinations', () => {
    expect(isSupportedDateFormat('DD/MM')).toBe(true);
    expect(isSupportedDateFormat('DD.MM.YYYY')).toBe(true);
    expect(isSupportedDateFormat('YYYY-MM-DD')).toBe(true);
    expect(isSupportedDateFormat('MM')).toBe(true);
  });

  it('should reject formats with unknown letters or no fields', () => {
    expect(isSupportedDateFormat('')).toBe(false);
    expect(isSupportedDateFormat('/')).toBe(false);
    expect(isSupportedDateFormat('HH:mm')).toBe(false);
    expect(isSupportedDateFormat('DD/MMM')).toBe(false);
    expect(isSupportedDateFormat('DD1MM')).toBe(false);
  });
});

describe('formatDate', () => {
  it('should default to DD/MM/YYYY', () => {
    expect(formatDate(new Date(2025, 2, 9))).toBe('09/03/2025');
  });
});
