import type { DispatchError, ErrorKind } from '../errors.js';

/**
 * 通知設定（YAML 檔案內容）
 */
export interface NotificationConfig {
  webhook_url: string;
  message: string;
}

export interface DiscordEmbedField {
  name: string;
  value: string;
  inline?: boolean;
}

export interface DiscordEmbed {
  title?: string;
  description?: string;
  color?: number;
  timestamp?: string;
  fields?: DiscordEmbedField[];
}

/**
 * Discord incoming webhook 的 payload
 */
export interface DiscordWebhookPayload {
  content: string;
  embeds?: DiscordEmbed[];
}

export interface DispatchResult {
  configPath: string;
  success: boolean;
  content?: string;
  error?: DispatchError;
}

/**
 * 發送給錯誤 webhook 的失敗報告
 */
export interface FailureReport {
  configPath: string;
  kind: ErrorKind;
  message: string;
  timestamp: Date;
}
