import { readFile, writeFile, mkdir } from 'fs/promises';
import { existsSync } from 'fs';
import { dirname } from 'path';
import * as yaml from 'js-yaml';
import { createLogger } from '../utils/logger.js';
import { errorMessage } from './errors.js';

const logger = createLogger('ErrorWebhook');

/**
 * 錯誤 webhook 設定（單一 YAML 檔，只使用 webhook_url）
 */
export class ErrorWebhookStore {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  /**
   * 讀取錯誤 webhook URL，未設定或檔案無法解析時回傳 null
   */
  async load(): Promise<string | null> {
    if (!existsSync(this.filePath)) {
      return null;
    }

    try {
      const doc = yaml.load(await readFile(this.filePath, 'utf-8'));
      if (typeof doc !== 'object' || doc === null || !('webhook_url' in doc)) {
        return null;
      }
      const url = doc.webhook_url;
      return typeof url === 'string' && url.trim() ? url.trim() : null;
    } catch (error) {
      logger.warn(`Could not load error webhook config: ${errorMessage(error)}`);
      return null;
    }
  }

  async save(webhookUrl: string): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const data = yaml.dump({ webhook_url: webhookUrl.trim() }, { lineWidth: -1 });
    await writeFile(this.filePath, data, 'utf-8');
  }
}

export default ErrorWebhookStore;
