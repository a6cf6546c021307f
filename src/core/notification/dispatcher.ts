import { createLogger } from '../../utils/logger.js';
import { formatPlaceholders } from '../date-placeholder.js';
import { readNotificationFile, validateNotificationConfig } from '../config-store.js';
import { ConfigError, SendError, type DispatchError } from '../errors.js';
import { DiscordWebhookClient } from './adapters/discord.js';
import { ErrorReporter } from './error-reporter.js';
import type { DispatchResult, NotificationConfig } from './types.js';

const logger = createLogger('Dispatcher', { useStderr: true });

export const TEST_MESSAGE_PREFIX = '🧪 **TEST NOTIFICATION**\n\n';

export interface SendOptions {
  now?: Date;
  /** dashboard 的測試發送：加上測試標記，失敗時不回報錯誤 webhook */
  test?: boolean;
}

export interface DispatcherConfig {
  client?: DiscordWebhookClient;
  /** 未提供時失敗只寫 log */
  errorReporter?: ErrorReporter;
}

function toDispatchError(error: unknown, configPath: string): DispatchError {
  if (error instanceof ConfigError || error instanceof SendError) {
    return error;
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new SendError(configPath, `Unexpected error: ${detail}`, { cause: error });
}

export class NotificationDispatcher {
  private client: DiscordWebhookClient;
  private errorReporter: ErrorReporter | null;

  constructor(config?: DispatcherConfig) {
    this.client = config?.client ?? new DiscordWebhookClient();
    this.errorReporter = config?.errorReporter ?? null;
  }

  /**
   * 驗證設定、替換日期佔位符並發送到 webhook
   *
   * @param config 尚未驗證的設定內容（來自 YAML）
   */
  async send(config: unknown, configPath: string, options?: SendOptions): Promise<DispatchResult> {
    const now = options?.now ?? new Date();

    try {
      const valid = validateNotificationConfig(config, configPath);
      const formatted = formatPlaceholders(valid.message, now);
      const content = options?.test ? `${TEST_MESSAGE_PREFIX}${formatted}` : formatted;

      await this.client.post(valid.webhook_url, { content }, configPath);
      logger.info(`Sent notification: ${configPath}`);
      return { configPath, success: true, content };
    } catch (error) {
      return this.fail(toDispatchError(error, configPath), now, options?.test ?? false);
    }
  }

  /**
   * 讀取設定檔後發送（cron 執行的入口）
   */
  async dispatchFile(configPath: string, options?: SendOptions): Promise<DispatchResult> {
    const now = options?.now ?? new Date();

    let config: NotificationConfig;
    try {
      config = await readNotificationFile(configPath);
    } catch (error) {
      return this.fail(toDispatchError(error, configPath), now, options?.test ?? false);
    }

    return this.send(config, configPath, { ...options, now });
  }

  private async fail(error: DispatchError, now: Date, isTest: boolean): Promise<DispatchResult> {
    logger.error(`${error.kind}: ${error.message}`);

    if (!isTest && this.errorReporter) {
      await this.errorReporter.report({
        configPath: error.path,
        kind: error.kind,
        message: error.message,
        timestamp: now,
      });
    }

    return { configPath: error.path, success: false, error };
  }
}

export default NotificationDispatcher;
