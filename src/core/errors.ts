/**
 * 錯誤類型
 *
 * 每個錯誤帶有 kind，錯誤 webhook 的通知內容會直接使用它。
 */

export type ErrorKind = 'ConfigError' | 'SendError' | 'ScheduleError' | 'ErrorNotifyError';

export abstract class NotifierError extends Error {
  abstract readonly kind: ErrorKind;
}

/**
 * 設定檔不存在、YAML 格式錯誤，或缺少必要欄位
 */
export class ConfigError extends NotifierError {
  readonly kind = 'ConfigError' as const;

  constructor(
    readonly path: string,
    readonly reason: string
  ) {
    super(`Configuration file '${path}': ${reason}`);
    this.name = 'ConfigError';
  }
}

/**
 * Webhook 回傳非 2xx、網路錯誤或逾時
 */
export class SendError extends NotifierError {
  readonly kind = 'SendError' as const;
  readonly status: number | undefined;

  constructor(
    readonly path: string,
    detail: string,
    options?: { status?: number; cause?: unknown }
  ) {
    super(detail, { cause: options?.cause });
    this.name = 'SendError';
    this.status = options?.status;
  }
}

export class ScheduleError extends NotifierError {
  readonly kind = 'ScheduleError' as const;

  constructor(
    readonly expression: string,
    reason: string
  ) {
    super(reason);
    this.name = 'ScheduleError';
  }
}

/**
 * 錯誤 webhook 本身發送失敗（只記錄，不再往外拋）
 */
export class ErrorNotifyError extends NotifierError {
  readonly kind = 'ErrorNotifyError' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'ErrorNotifyError';
  }
}

export type DispatchError = ConfigError | SendError;

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
