/**
 * 日期佔位符替換
 *
 * 支援的佔位符：
 * - {date}            → DD/MM/YYYY
 * - {date:FMT}        → FMT 只能由 DD、MM、YYYY 與分隔符號組成，例如 {date:DD/MM}、{date:YYYY-MM-DD}
 *
 * 無法辨識的格式（{date:HH:mm}、{date:} 等）原樣保留。
 */

export const DEFAULT_DATE_FORMAT = 'DD/MM/YYYY';

const PLACEHOLDER_PATTERN = /\{date(?::([^{}]*))?\}/g;
const FIELD_PATTERN = /YYYY|DD|MM/g;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * 格式字串是否只包含 DD / MM / YYYY 與分隔符號
 */
export function isSupportedDateFormat(format: string): boolean {
  const separators = format.replace(FIELD_PATTERN, '');
  if (separators.length === format.length) {
    return false;
  }
  return !/[A-Za-z0-9]/.test(separators);
}

/**
 * 依格式輸出日期（使用 Date 的本地欄位，不依賴 locale）
 */
export function formatDate(date: Date, format: string = DEFAULT_DATE_FORMAT): string {
  return format.replace(FIELD_PATTERN, (field) => {
    switch (field) {
      case 'YYYY':
        return pad(date.getFullYear(), 4);
      case 'MM':
        return pad(date.getMonth() + 1, 2);
      default:
        return pad(date.getDate(), 2);
    }
  });
}

/**
 * 替換訊息中所有日期佔位符
 */
export function formatPlaceholders(template: string, now: Date): string {
  return template.replace(PLACEHOLDER_PATTERN, (token: string, format: string | undefined) => {
    if (format === undefined) {
      return formatDate(now, DEFAULT_DATE_FORMAT);
    }
    if (!isSupportedDateFormat(format)) {
      return token;
    }
    return formatDate(now, format);
  });
}
