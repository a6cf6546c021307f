import { describe, it, expect } from 'vitest';
import {
  SCHEDULE_PRESETS,
  buildNotifierCommand,
  describeCron,
  parseScheduleForm,
  toCron,
  validateCronExpression,
} from '../src/core/schedule-translator.js';
import { ScheduleError } from '../src/core/errors.js';

describe('toCron', () => {
  it('should map presets to their cron expression', () => {
    expect(toCron({ kind: 'preset', preset: 'daily_9am' })).toBe('0 9 * * *');
    expect(toCron({ kind: 'preset', preset: 'weekdays_9am' })).toBe('0 9 * * 1-5');
    expect(toCron({ kind: 'preset', preset: 'weekly_friday_5pm' })).toBe('0 17 * * 5');
  });

  it('should reject unknown presets', () => {
    expect(() => toCron({ kind: 'preset', preset: 'hourly' })).toThrow(ScheduleError);
    expect(() => toCron({ kind: 'preset', preset: 'hourly' })).toThrow('Unknown schedule preset: hourly');
  });

  it('should pass through valid cron expressions', () => {
    expect(toCron({ kind: 'cron', expression: '*/15 9-17 * * 1-5' })).toBe('*/15 9-17 * * 1-5');
    expect(toCron({ kind: 'cron', expression: '  30 7 * * *  ' })).toBe('30 7 * * *');
  });

  it('should reject invalid cron expressions', () => {
    expect(() => toCron({ kind: 'cron', expression: '61 9 * * *' })).toThrow(ScheduleError);
    expect(() => toCron({ kind: 'cron', expression: '' })).toThrow(ScheduleError);
  });

  it('every preset should be a valid cron expression', () => {
    for (const preset of Object.values(SCHEDULE_PRESETS)) {
      expect(validateCronExpression(preset.cron)).toBe(preset.cron);
    }
  });
});

describe('validateCronExpression', () => {
  it('should report the field count for the wrong number of fields', () => {
    expect(() => validateCronExpression('0 9 * *')).toThrow(
      'Invalid cron expression "0 9 * *": expected 5 fields (minute hour day-of-month month day-of-week), got 4'
    );
    expect(() => validateCronExpression('0 0 9 * * *')).toThrow('got 6');
  });

  it('should reject out of range values', () => {
    expect(() => validateCronExpression('0 25 * * *')).toThrow('Invalid cron expression "0 25 * * *"');
  });

  it('should keep the expression on the error', () => {
    try {
      validateCronExpression('every day');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ScheduleError);
      if (error instanceof ScheduleError) {
        expect(error.expression).toBe('every day');
        expect(error.kind).toBe('ScheduleError');
      }
    }
  });
});

describe('parseScheduleForm', () => {
  it('should default to daily_9am', () => {
    expect(parseScheduleForm({})).toEqual({ kind: 'preset', preset: 'daily_9am' });
    expect(parseScheduleForm({ schedule: '  ' })).toEqual({ kind: 'preset', preset: 'daily_9am' });
  });

  it('should recognise preset keys', () => {
    expect(parseScheduleForm({ schedule: 'weekly_monday_9am' })).toEqual({
      kind: 'preset',
      preset: 'weekly_monday_9am',
    });
  });

  it('should take custom_schedule when schedule is custom', () => {
    expect(parseScheduleForm({ schedule: 'custom', custom_schedule: '5 4 * * *' })).toEqual({
      kind: 'cron',
      expression: '5 4 * * *',
    });
    expect(parseScheduleForm({ schedule: 'custom' })).toEqual({ kind: 'cron', expression: '' });
  });

  it('should treat anything else as a cron expression', () => {
    expect(parseScheduleForm({ schedule: '0 6 * * *' })).toEqual({ kind: 'cron', expression: '0 6 * * *' });
  });
});

describe('describeCron', () => {
  it('should use preset labels', () => {
    expect(describeCron('0 9 * * *')).toBe('Daily at 9:00 AM');
    expect(describeCron('0 12 * * *')).toBe('Daily at 12:00 PM');
    expect(describeCron('0 17 * * 5')).toBe('Fridays at 5:00 PM');
  });

  it('should describe daily, weekday and weekend schedules', () => {
    expect(describeCron('30 7 * * *')).toBe('Daily at 7:30 AM');
    expect(describeCron('0 20 * * 1-5')).toBe('Weekdays at 8:00 PM');
    expect(describeCron('15 10 * * 0,6')).toBe('Weekends at 10:15 AM');
    expect(describeCron('0 0 * * *')).toBe('Daily at 12:00 AM');
  });

  it('should describe a single weekday', () => {
    expect(describeCron('0 14 * * 3')).toBe('Wednesdays at 2:00 PM');
    expect(describeCron('45 8 * * 7')).toBe('Sundays at 8:45 AM');
  });

  it('should fall back to the raw expression', () => {
    expect(describeCron('0 0 1 * *')).toBe('At 12:00 AM (0 0 1 * *)');
    expect(describeCron('*/5 9-17 * * 1-5')).toBe('Weekdays at 9-17:*/5');
    expect(describeCron('@daily')).toBe('@daily');
  });
});

describe('buildNotifierCommand', () => {
  it('should join plain paths with spaces', () => {
    expect(buildNotifierCommand('/usr/bin/node', '/opt/notifier/dist/notify.js', '/opt/notifier/configs/standup.yaml')).toBe(
      '/usr/bin/node /opt/notifier/dist/notify.js /opt/notifier/configs/standup.yaml'
    );
  });

  it('should quote paths with spaces', () => {
    expect(buildNotifierCommand('/usr/bin/node', '/opt/n/notify.js', '/home/me/My Notifier/a.yaml')).toBe(
      "/usr/bin/node /opt/n/notify.js '/home/me/My Notifier/a.yaml'"
    );
  });

  it('should escape single quotes and percent signs', () => {
    expect(buildNotifierCommand('/usr/bin/node', '/opt/n/notify.js', "/srv/it's/a.yaml")).toBe(
      "/usr/bin/node /opt/n/notify.js '/srv/it'\\''s/a.yaml'"
    );
    expect(buildNotifierCommand('/usr/bin/node', '/opt/n/notify.js', '/srv/100%/a.yaml')).toBe(
      "/usr/bin/node /opt/n/notify.js '/srv/100\\%/a.yaml'"
    );
  });
});
