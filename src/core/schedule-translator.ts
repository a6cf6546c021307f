import cron from 'node-cron';
import { ScheduleError } from './errors.js';

export interface SchedulePreset {
  cron: string;
  label: string;
}

/**
 * 常用排程
 */
export const SCHEDULE_PRESETS = {
  daily_9am: { cron: '0 9 * * *', label: 'Daily at 9:00 AM' },
  daily_8am: { cron: '0 8 * * *', label: 'Daily at 8:00 AM' },
  daily_10am: { cron: '0 10 * * *', label: 'Daily at 10:00 AM' },
  daily_noon: { cron: '0 12 * * *', label: 'Daily at 12:00 PM' },
  daily_6pm: { cron: '0 18 * * *', label: 'Daily at 6:00 PM' },
  weekdays_9am: { cron: '0 9 * * 1-5', label: 'Weekdays at 9:00 AM' },
  weekly_monday_9am: { cron: '0 9 * * 1', label: 'Mondays at 9:00 AM' },
  weekly_friday_5pm: { cron: '0 17 * * 5', label: 'Fridays at 5:00 PM' },
} as const satisfies Record<string, SchedulePreset>;

export type PresetKey = keyof typeof SCHEDULE_PRESETS;

export const DEFAULT_PRESET: PresetKey = 'daily_9am';

export type ScheduleRequest =
  | { kind: 'preset'; preset: string }
  | { kind: 'cron'; expression: string };

const DAY_NAMES: Record<string, string> = {
  '0': 'Sundays',
  '1': 'Mondays',
  '2': 'Tuesdays',
  '3': 'Wednesdays',
  '4': 'Thursdays',
  '5': 'Fridays',
  '6': 'Saturdays',
  '7': 'Sundays',
};

export function isPresetKey(value: string): value is PresetKey {
  return Object.prototype.hasOwnProperty.call(SCHEDULE_PRESETS, value);
}

/**
 * 驗證 5 欄位 cron 表達式，回傳去除前後空白的表達式
 */
export function validateCronExpression(expression: string): string {
  const trimmed = expression.trim();
  const fields = trimmed.split(/\s+/).filter(Boolean);

  if (fields.length !== 5) {
    throw new ScheduleError(
      expression,
      `Invalid cron expression "${trimmed}": expected 5 fields (minute hour day-of-month month day-of-week), got ${fields.length}`
    );
  }

  if (!cron.validate(trimmed)) {
    throw new ScheduleError(expression, `Invalid cron expression "${trimmed}"`);
  }

  return trimmed;
}

/**
 * 將排程（預設或 cron 表達式）轉成 cron 表達式
 */
export function toCron(schedule: ScheduleRequest): string {
  if (schedule.kind === 'preset') {
    if (!isPresetKey(schedule.preset)) {
      throw new ScheduleError(schedule.preset, `Unknown schedule preset: ${schedule.preset}`);
    }
    return SCHEDULE_PRESETS[schedule.preset].cron;
  }
  return validateCronExpression(schedule.expression);
}

/**
 * dashboard 表單值 → 排程請求
 *
 * schedule 可以是 preset key、"custom"（搭配 custom_schedule）或直接的 cron 表達式
 */
export function parseScheduleForm(form: { schedule?: unknown; custom_schedule?: unknown }): ScheduleRequest {
  const schedule = typeof form.schedule === 'string' ? form.schedule.trim() : '';

  if (!schedule) {
    return { kind: 'preset', preset: DEFAULT_PRESET };
  }

  if (schedule === 'custom') {
    const custom = typeof form.custom_schedule === 'string' ? form.custom_schedule : '';
    return { kind: 'cron', expression: custom };
  }

  if (isPresetKey(schedule)) {
    return { kind: 'preset', preset: schedule };
  }

  return { kind: 'cron', expression: schedule };
}

function formatTime(hour: string, minute: string): string {
  const h = Number(hour);
  const m = Number(minute);
  if (!/^\d+$/.test(hour) || !/^\d+$/.test(minute) || h > 23 || m > 59) {
    return `${hour}:${minute}`;
  }
  const suffix = h < 12 ? 'AM' : 'PM';
  const h12 = h % 12 === 0 ? 12 : h % 12;
  return `${h12}:${String(m).padStart(2, '0')} ${suffix}`;
}

/**
 * 人類可讀的 cron 表達式說明
 */
export function describeCron(expression: string): string {
  const trimmed = expression.trim();

  for (const preset of Object.values(SCHEDULE_PRESETS)) {
    if (preset.cron === trimmed) {
      return preset.label;
    }
  }

  const parts = trimmed.split(/\s+/);
  if (parts.length !== 5) {
    return trimmed;
  }

  const [minute, hour, dayOfMonth, month, dayOfWeek] = parts;
  const time = formatTime(hour, minute);

  if (dayOfMonth === '*' && month === '*') {
    if (dayOfWeek === '*') return `Daily at ${time}`;
    if (dayOfWeek === '1-5') return `Weekdays at ${time}`;
    if (dayOfWeek === '0,6' || dayOfWeek === '6,0') return `Weekends at ${time}`;
    const day = DAY_NAMES[dayOfWeek];
    if (day) return `${day} at ${time}`;
  }

  return `At ${time} (${trimmed})`;
}

function quoteShellArg(value: string): string {
  if (/^[A-Za-z0-9_@+=:,./-]+$/.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * cron 執行的指令：<node> <notify.js 絕對路徑> <設定檔絕對路徑>
 *
 * crontab 裡未跳脫的 % 會被當成換行，一律寫成 \%
 */
export function buildNotifierCommand(nodePath: string, scriptPath: string, configPath: string): string {
  return [nodePath, scriptPath, configPath]
    .map(quoteShellArg)
    .join(' ')
    .replace(/%/g, '\\%');
}
