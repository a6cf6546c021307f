import { createLogger } from '../../utils/logger.js';
import { ErrorNotifyError, errorMessage } from '../errors.js';
import { DiscordWebhookClient } from './adapters/discord.js';
import type { DiscordWebhookPayload, FailureReport } from './types.js';

const logger = createLogger('ErrorReporter', { useStderr: true });

const ERROR_COLOR = 0xdc2626;

/** 取得錯誤 webhook URL（未設定時回傳 null） */
export type ErrorWebhookResolver = () => Promise<string | null>;

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * YYYY-MM-DD HH:mm:ss（本地時間）
 */
export function formatReportTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${day} ${time}`;
}

/**
 * 組成錯誤通知的 Discord payload
 */
export function buildFailurePayload(report: FailureReport): DiscordWebhookPayload {
  const time = formatReportTimestamp(report.timestamp);
  const content = [
    '❌ **Discord Notifier Error**',
    '',
    `Config file: \`${report.configPath}\``,
    `Time: ${time}`,
    `Error kind: ${report.kind}`,
    `Error: ${report.message}`,
  ].join('\n');

  return {
    content,
    embeds: [
      {
        title: report.kind,
        color: ERROR_COLOR,
        timestamp: report.timestamp.toISOString(),
        fields: [
          { name: 'Config file', value: report.configPath },
          { name: 'Time', value: time, inline: true },
          { name: 'Error kind', value: report.kind, inline: true },
          { name: 'Error', value: report.message.slice(0, 1024) },
        ],
      },
    ],
  };
}

/**
 * 將發送失敗回報到錯誤 webhook
 *
 * 只嘗試一次；錯誤 webhook 本身失敗時寫到 stderr，不再拋出。
 */
export class ErrorReporter {
  private resolveWebhook: ErrorWebhookResolver;
  private client: DiscordWebhookClient;

  constructor(resolveWebhook: ErrorWebhookResolver, client?: DiscordWebhookClient) {
    this.resolveWebhook = resolveWebhook;
    this.client = client ?? new DiscordWebhookClient();
  }

  /**
   * @returns 是否成功送出錯誤通知
   */
  async report(report: FailureReport): Promise<boolean> {
    let webhookUrl: string | null;
    try {
      webhookUrl = await this.resolveWebhook();
    } catch (error) {
      logger.warn(`Could not load error webhook config: ${errorMessage(error)}`);
      webhookUrl = null;
    }

    if (!webhookUrl) {
      logger.warn('No error webhook configured. Error notification not sent.');
      return false;
    }

    try {
      await this.client.post(webhookUrl, buildFailurePayload(report), report.configPath);
      logger.info(`Error notification sent for ${report.configPath}`);
      return true;
    } catch (error) {
      const failure = new ErrorNotifyError(
        `Failed to send error notification: ${errorMessage(error)}`,
        { cause: error }
      );
      logger.error(`CRITICAL: ${failure.message}`);
      return false;
    }
  }
}

export default ErrorReporter;
