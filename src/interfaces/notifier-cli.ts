/**
 * 通知發送 CLI（由 cron 執行）
 *
 * 讀取一個 YAML 設定檔、替換日期佔位符並發送到 Discord webhook。
 * 成功 exit 0，任何失敗 exit 1，讓 cron 的郵件/log 記錄結果。
 */

import { resolve } from 'path';
import { ErrorWebhookStore } from '../core/error-webhook-store.js';
import { detectEnvironment } from '../core/env-detect.js';
import {
  DiscordWebhookClient,
  ErrorReporter,
  NotificationDispatcher,
} from '../core/notification/index.js';
import { createLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';

const logger = createLogger('Notifier', { useStderr: true });

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const USAGE = `
Usage: discord-notify <config.yaml>

Sends the message of one notification config to its Discord webhook.
Failures are reported to the error webhook (error_webhook.yaml) when configured.

Options:
  -h, --help     顯示說明
  -v, --version  顯示版本
`;

/**
 * 依環境設定建立 dispatcher（含錯誤 webhook 回報）
 */
export function createDispatcher(): NotificationDispatcher {
  const env = detectEnvironment();
  const client = new DiscordWebhookClient({ timeoutMs: env.webhookTimeoutMs });
  const errorWebhooks = new ErrorWebhookStore(env.errorWebhookPath);
  const errorReporter = new ErrorReporter(() => errorWebhooks.load(), client);
  return new NotificationDispatcher({ client, errorReporter });
}

/**
 * @returns process exit code
 */
export async function runNotifier(
  args: string[],
  dispatcher: NotificationDispatcher = createDispatcher()
): Promise<number> {
  if (args.includes('-h') || args.includes('--help')) {
    logger.raw(USAGE);
    return EXIT_OK;
  }

  if (args.includes('-v') || args.includes('--version')) {
    logger.raw(`discord-cron-notifier v${VERSION}`);
    return EXIT_OK;
  }

  const positional = args.filter(arg => !arg.startsWith('-'));
  if (positional.length !== 1) {
    logger.error('Expected exactly one argument: the path to a notification config file');
    logger.raw(USAGE);
    return EXIT_USAGE;
  }

  const result = await dispatcher.dispatchFile(resolve(positional[0]));
  return result.success ? EXIT_OK : EXIT_FAILURE;
}
