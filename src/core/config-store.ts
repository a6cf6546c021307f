import { readFile, writeFile, mkdir, readdir, unlink } from 'fs/promises';
import { existsSync } from 'fs';
import { basename, join, resolve } from 'path';
import * as yaml from 'js-yaml';
import { ConfigError, errorMessage } from './errors.js';
import type { NotificationConfig } from './notification/types.js';

const NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;
const CONFIG_EXTENSION = '.yaml';

/**
 * 寬鬆讀取的設定（給 dashboard 顯示，欄位可能缺漏）
 */
export interface RawNotificationConfig {
  webhook_url: string;
  message: string;
}

export interface StoredNotification extends RawNotificationConfig {
  name: string;
  path: string;
}

/**
 * 通知名稱只允許英數字、底線與連字號
 */
export function isValidNotificationName(name: string): boolean {
  return NAME_PATTERN.test(name);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(doc: Record<string, unknown>, key: string): string {
  const value = doc[key];
  return typeof value === 'string' ? value : '';
}

/**
 * 驗證 YAML 文件，回傳合法的 NotificationConfig
 */
export function validateNotificationConfig(doc: unknown, path: string): NotificationConfig {
  if (!isRecord(doc)) {
    throw new ConfigError(path, 'expected a YAML mapping with webhook_url and message');
  }

  const webhookUrl = doc.webhook_url;
  if (typeof webhookUrl !== 'string' || !webhookUrl.trim()) {
    throw new ConfigError(path, 'missing required field: webhook_url');
  }

  const message = doc.message;
  if (typeof message !== 'string' || !message.trim()) {
    throw new ConfigError(path, 'missing required field: message');
  }

  return { webhook_url: webhookUrl.trim(), message };
}

/**
 * 解析 YAML 文字，語法錯誤轉成 ConfigError
 */
export function parseYamlDocument(text: string, path: string): unknown {
  try {
    return yaml.load(text);
  } catch (error) {
    throw new ConfigError(path, `invalid YAML: ${errorMessage(error)}`);
  }
}

/**
 * 嚴格讀取單一設定檔（cron 執行的 CLI 使用）
 */
export async function readNotificationFile(path: string): Promise<NotificationConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new ConfigError(path, 'file not found');
    }
    throw new ConfigError(path, `cannot read file: ${errorMessage(error)}`);
  }

  return validateNotificationConfig(parseYamlDocument(text, path), path);
}

export function dumpNotificationConfig(config: NotificationConfig): string {
  return yaml.dump(
    { webhook_url: config.webhook_url, message: config.message },
    { lineWidth: -1, noRefs: true }
  );
}

/**
 * 通知設定目錄（每個 YAML 檔案是一則通知）
 *
 * 不做快取，每次操作都直接讀寫檔案，CLI 與 dashboard 看到的內容一致。
 */
export class ConfigStore {
  readonly configsDir: string;

  constructor(configsDir: string) {
    this.configsDir = resolve(configsDir);
  }

  /**
   * 設定檔的絕對路徑
   */
  pathFor(name: string): string {
    return join(this.configsDir, `${name}${CONFIG_EXTENSION}`);
  }

  exists(name: string): boolean {
    return existsSync(this.pathFor(name));
  }

  /**
   * 列出所有通知（略過 *.example 檔案與無法解析的檔案）
   */
  async list(): Promise<StoredNotification[]> {
    if (!existsSync(this.configsDir)) {
      return [];
    }

    const entries = await readdir(this.configsDir);
    const names = entries
      .filter(file => file.endsWith(CONFIG_EXTENSION) && !file.includes('.example'))
      .map(file => basename(file, CONFIG_EXTENSION))
      .sort();

    const notifications: StoredNotification[] = [];
    for (const name of names) {
      const config = await this.load(name);
      if (config) {
        notifications.push({ name, path: this.pathFor(name), ...config });
      }
    }
    return notifications;
  }

  /**
   * 寬鬆讀取：檔案不存在或 YAML 錯誤時回傳 undefined
   */
  async load(name: string): Promise<RawNotificationConfig | undefined> {
    const path = this.pathFor(name);
    if (!existsSync(path)) {
      return undefined;
    }

    let doc: unknown;
    try {
      doc = yaml.load(await readFile(path, 'utf-8'));
    } catch {
      return undefined;
    }

    if (!isRecord(doc)) {
      return undefined;
    }

    return {
      webhook_url: stringField(doc, 'webhook_url'),
      message: stringField(doc, 'message'),
    };
  }

  /**
   * 嚴格讀取：不合法的設定拋出 ConfigError
   */
  async read(name: string): Promise<NotificationConfig> {
    return readNotificationFile(this.pathFor(name));
  }

  async write(name: string, config: NotificationConfig): Promise<string> {
    if (!isValidNotificationName(name)) {
      throw new ConfigError(this.pathFor(name), 'name can only contain letters, numbers, dashes, and underscores');
    }
    await mkdir(this.configsDir, { recursive: true });
    const path = this.pathFor(name);
    await writeFile(path, dumpNotificationConfig(config), 'utf-8');
    return path;
  }

  /**
   * 刪除設定檔，不存在時回傳 false
   */
  async delete(name: string): Promise<boolean> {
    const path = this.pathFor(name);
    if (!existsSync(path)) {
      return false;
    }
    await unlink(path);
    return true;
  }
}

export default ConfigStore;
