/**
 * 環境設定
 *
 * 從環境變數（.env 由 dotenv 載入）解析路徑與服務設定。
 * cron 執行時環境變數極少，所有路徑都轉成絕對路徑。
 */

import { existsSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { config } from 'dotenv';

const __dirname = dirname(fileURLToPath(import.meta.url));

/** 專案根目錄（src/core 與 dist/core 都在兩層之下） */
export const PROJECT_ROOT = resolve(__dirname, '../..');

export const DEFAULT_WEB_UI_HOST = '127.0.0.1';
export const DEFAULT_WEB_UI_PORT = 5000;
export const DEFAULT_WEBHOOK_TIMEOUT_MS = 10_000;

export interface EnvironmentInfo {
  baseDir: string;
  configsDir: string;
  errorWebhookPath: string;
  notifierScript: string;
  nodePath: string;
  crontabUser?: string;
  webUiHost: string;
  webUiPort: number;
  webhookTimeoutMs: number;
}

/**
 * 載入專案根目錄的 .env（cron 的工作目錄通常是 $HOME，不能依賴 cwd）
 */
export function loadEnv(): void {
  config({ path: join(PROJECT_ROOT, '.env') });
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * 錯誤 webhook 設定檔位置
 * 優先順序：ERROR_WEBHOOK_PATH → 專案根目錄 → 目前工作目錄
 */
export function resolveErrorWebhookPath(baseDir: string = PROJECT_ROOT): string {
  if (process.env.ERROR_WEBHOOK_PATH) {
    return resolve(process.env.ERROR_WEBHOOK_PATH);
  }

  const besideProject = join(baseDir, 'error_webhook.yaml');
  if (existsSync(besideProject)) {
    return besideProject;
  }

  const inCwd = resolve('error_webhook.yaml');
  if (existsSync(inCwd)) {
    return inCwd;
  }

  return besideProject;
}

/**
 * 偵測目前的執行環境
 */
export function detectEnvironment(): EnvironmentInfo {
  const baseDir = PROJECT_ROOT;

  return {
    baseDir,
    configsDir: resolve(process.env.CONFIGS_DIR || join(baseDir, 'configs')),
    errorWebhookPath: resolveErrorWebhookPath(baseDir),
    notifierScript: resolve(process.env.NOTIFIER_SCRIPT || join(baseDir, 'dist', 'notify.js')),
    nodePath: process.env.NODE_BIN || process.execPath,
    crontabUser: process.env.CRONTAB_USER || undefined,
    webUiHost: process.env.WEB_UI_HOST || DEFAULT_WEB_UI_HOST,
    webUiPort: parsePositiveInt(process.env.WEB_UI_PORT, DEFAULT_WEB_UI_PORT),
    webhookTimeoutMs: parsePositiveInt(process.env.WEBHOOK_TIMEOUT_MS, DEFAULT_WEBHOOK_TIMEOUT_MS),
  };
}

export default {
  loadEnv,
  detectEnvironment,
  resolveErrorWebhookPath,
};
