/**
 * Logger
 *
 * 每行加上 [YYYY-MM-DD HH:mm:ss] 與模組前綴，例如：
 *
 *   [2024-12-25 09:00:01] [Dispatcher] Sent notification: /opt/notifier/configs/standup.yaml
 *
 * 時間依 TZ 環境變數，未設定時使用系統時區（和 crontab 的時間一致）。
 */

export interface LoggerOptions {
  /**
   * 全部輸出走 stderr
   * （cron 執行的 notify.js 使用，失敗訊息會隨 cron 郵件寄給使用者）
   */
  useStderr?: boolean;
}

type Level = 'info' | 'warn' | 'error' | 'debug';

function timestamp(): string {
  return new Date().toLocaleString('sv-SE', {
    timeZone: process.env.TZ || undefined,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  });
}

export class Logger {
  private prefix: string;
  private useStderr: boolean;

  constructor(prefix: string, options?: LoggerOptions) {
    this.prefix = prefix;
    this.useStderr = options?.useStderr ?? false;
  }

  private write(level: Level, message: string, args: unknown[]): void {
    const tag = level === 'debug' ? '[DEBUG] ' : '';
    const line = `[${timestamp()}] [${this.prefix}] ${tag}${message}`;

    if (this.useStderr || level === 'error') {
      console.error(line, ...args);
    } else if (level === 'warn') {
      console.warn(line, ...args);
    } else {
      console.log(line, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args);
  }

  /** 只在設定 DEBUG 時輸出 */
  debug(message: string, ...args: unknown[]): void {
    if (process.env.DEBUG) {
      this.write('debug', message, args);
    }
  }

  /**
   * 不加時間與前綴（usage、版本號、dashboard 啟動訊息）
   */
  raw(message: string): void {
    if (this.useStderr) {
      console.error(message);
    } else {
      console.log(message);
    }
  }
}

export function createLogger(prefix: string, options?: LoggerOptions): Logger {
  return new Logger(prefix, options);
}

export default Logger;
