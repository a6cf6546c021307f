import { createLogger } from '../../../utils/logger.js';
import { DEFAULT_WEBHOOK_TIMEOUT_MS } from '../../env-detect.js';
import { SendError, errorMessage } from '../../errors.js';
import type { DiscordWebhookPayload } from '../types.js';

const logger = createLogger('Discord');

export interface DiscordWebhookClientConfig {
  timeoutMs?: number;
}

/**
 * Discord incoming webhook 客戶端
 *
 * 每次呼叫只發送一次，不重試；逾時由 AbortController 控制。
 */
export class DiscordWebhookClient {
  private timeoutMs: number;

  constructor(config?: DiscordWebhookClientConfig) {
    this.timeoutMs = config?.timeoutMs ?? DEFAULT_WEBHOOK_TIMEOUT_MS;
  }

  getTimeout(): number {
    return this.timeoutMs;
  }

  /**
   * POST payload 到 webhook，失敗時拋出 SendError
   *
   * 逾時涵蓋整個請求，包含讀取錯誤回應的 body。
   *
   * @param configPath 觸發這次發送的設定檔，寫進 SendError 方便追查
   */
  async post(webhookUrl: string, payload: DiscordWebhookPayload, configPath: string): Promise<void> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      let response: Response;
      try {
        response = await fetch(webhookUrl, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
          },
          body: JSON.stringify(payload),
          signal: controller.signal,
        });
      } catch (error) {
        if (controller.signal.aborted) {
          throw this.timeoutError(configPath, error);
        }
        throw new SendError(configPath, `Network error: ${errorMessage(error)}`, { cause: error });
      }

      if (!response.ok) {
        let body = '';
        try {
          body = await response.text();
        } catch (error) {
          if (controller.signal.aborted) {
            throw this.timeoutError(configPath, error, response.status);
          }
          logger.debug(`Could not read error response body: ${errorMessage(error)}`);
        }
        const detail = body ? `: ${body.slice(0, 200)}` : '';
        throw new SendError(configPath, `Discord webhook returned HTTP ${response.status}${detail}`, {
          status: response.status,
        });
      }

      logger.debug(`Webhook accepted (HTTP ${response.status})`);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private timeoutError(configPath: string, cause: unknown, status?: number): SendError {
    return new SendError(configPath, `Request timed out after ${this.timeoutMs}ms`, { status, cause });
  }
}
