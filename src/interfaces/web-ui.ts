/**
 * Web UI Server
 *
 * 本機 dashboard：管理通知設定檔、crontab 排程與錯誤 webhook。
 * 使用 Node.js 內建 http 模組，JSON API + 單一 HTML 頁面。
 * 沒有登入機制，預設只綁定 127.0.0.1；要在區網使用時改成 --host 0.0.0.0。
 */

import http from 'http';
import { createLogger } from '../utils/logger.js';
import { getHtmlTemplate } from './web-ui-html.js';
import { ConfigStore, isValidNotificationName } from '../core/config-store.js';
import { ErrorWebhookStore } from '../core/error-webhook-store.js';
import { CrontabManager, SystemCrontab, type CronJobInfo } from '../core/crontab.js';
import { formatPlaceholders } from '../core/date-placeholder.js';
import { detectEnvironment, type EnvironmentInfo } from '../core/env-detect.js';
import { ConfigError, ScheduleError, SendError, errorMessage } from '../core/errors.js';
import {
  SCHEDULE_PRESETS,
  buildNotifierCommand,
  describeCron,
  parseScheduleForm,
  toCron,
} from '../core/schedule-translator.js';
import { DiscordWebhookClient, NotificationDispatcher } from '../core/notification/index.js';

const logger = createLogger('WebUI');

const PREVIEW_LENGTH = 80;
const MAX_BODY_BYTES = 1024 * 1024;

export const TEST_ERROR_WEBHOOK_MESSAGE =
  '🧪 **TEST ERROR WEBHOOK**\n\nThis is a test of the error notification system.';

export interface WebUiDeps {
  store: ConfigStore;
  errorWebhooks: ErrorWebhookStore;
  crontab: CrontabManager;
  dispatcher: NotificationDispatcher;
  client: DiscordWebhookClient;
  /** cron 執行的完整指令 */
  commandFor: (name: string) => string;
  now?: () => Date;
}

export interface ServerOptions {
  host: string;
  port: number;
}

type RequestBody = Record<string, unknown>;

class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

/**
 * 解析 request body（支援 JSON 和 form-urlencoded 格式）
 */
function parseBody(req: http.IncomingMessage): Promise<RequestBody> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new HttpError(413, 'Request body too large'));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      if (chunks.length === 0) {
        resolve({});
        return;
      }
      const raw = Buffer.concat(chunks).toString('utf-8');
      const contentType = req.headers['content-type'] || '';

      if (contentType.includes('application/json') || raw.trimStart().startsWith('{')) {
        try {
          const parsed: unknown = JSON.parse(raw);
          if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
            resolve({ ...parsed });
          } else {
            reject(new HttpError(400, 'Request body must be a JSON object'));
          }
        } catch {
          reject(new HttpError(400, 'Invalid JSON body'));
        }
        return;
      }

      const result: RequestBody = {};
      for (const [key, value] of new URLSearchParams(raw)) {
        result[key] = value;
      }
      resolve(result);
    });
    req.on('error', reject);
  });
}

function sendJson(res: http.ServerResponse, data: unknown, status = 200): void {
  res.writeHead(status, { 'Content-Type': 'application/json; charset=utf-8' });
  res.end(JSON.stringify(data));
}

function stringField(body: RequestBody, key: string): string {
  const value = body[key];
  return typeof value === 'string' ? value.trim() : '';
}

function serializeJob(job: CronJobInfo | undefined) {
  return {
    enabled: job?.enabled ?? false,
    schedule: job?.schedule ?? null,
    schedule_human: job?.scheduleHuman ?? null,
    next_run: job?.nextRun ? job.nextRun.toISOString() : null,
    command: job?.command ?? null,
  };
}

function previewOf(message: string): string {
  return message.length > PREVIEW_LENGTH ? `${message.slice(0, PREVIEW_LENGTH)}...` : message;
}

/**
 * 路徑中的通知名稱，無法解碼或格式不符時一律 404
 */
function decodeNotificationName(segment: string): string {
  let name: string;
  try {
    name = decodeURIComponent(segment);
  } catch (error) {
    if (error instanceof URIError) {
      throw new HttpError(404, `Notification '${segment}' not found.`);
    }
    throw error;
  }
  if (!isValidNotificationName(name)) {
    throw new HttpError(404, `Notification '${name}' not found.`);
  }
  return name;
}

/**
 * 驗證新增/編輯表單，回傳 webhook_url 與 message
 */
function readConfigForm(body: RequestBody): { webhook_url: string; message: string } {
  const webhookUrl = stringField(body, 'webhook_url');
  const message = stringField(body, 'message');
  if (!webhookUrl) {
    throw new HttpError(400, 'Webhook URL is required.');
  }
  if (!message) {
    throw new HttpError(400, 'Message is required.');
  }
  return { webhook_url: webhookUrl, message };
}

/**
 * 建立 request handler（依賴由外部注入，方便測試）
 */
export function createRequestHandler(deps: WebUiDeps) {
  const now = deps.now ?? (() => new Date());

  async function requireConfig(name: string) {
    const config = await deps.store.load(name);
    if (!config) {
      throw new HttpError(404, `Notification '${name}' not found.`);
    }
    return config;
  }

  async function listNotifications(res: http.ServerResponse): Promise<void> {
    const [configs, jobs] = await Promise.all([deps.store.list(), deps.crontab.getAllJobs()]);
    const notifications = configs.map(cfg => ({
      name: cfg.name,
      webhook_url: cfg.webhook_url,
      message: cfg.message,
      message_preview: previewOf(cfg.message),
      ...serializeJob(jobs.get(cfg.name)),
    }));
    sendJson(res, { notifications });
  }

  async function createNotification(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const body = await parseBody(req);
    const name = stringField(body, 'name');

    if (!name) {
      throw new HttpError(400, 'Name is required.');
    }
    if (!isValidNotificationName(name)) {
      throw new HttpError(400, 'Name can only contain letters, numbers, dashes, and underscores.');
    }
    if (deps.store.exists(name)) {
      throw new HttpError(409, `A notification named '${name}' already exists.`);
    }

    const path = await deps.store.write(name, readConfigForm(body));
    logger.info(`Created notification: ${name}`);
    sendJson(res, { name, path }, 201);
  }

  async function showNotification(name: string, res: http.ServerResponse): Promise<void> {
    const config = await requireConfig(name);
    const job = await deps.crontab.getJobStatus(name);
    sendJson(res, {
      name,
      path: deps.store.pathFor(name),
      webhook_url: config.webhook_url,
      message: config.message,
      message_rendered: formatPlaceholders(config.message, now()),
      schedule: serializeJob(job),
    });
  }

  async function updateNotification(name: string, req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    await requireConfig(name);
    const body = await parseBody(req);
    await deps.store.write(name, readConfigForm(body));
    logger.info(`Saved notification: ${name}`);
    sendJson(res, { success: true });
  }

  async function deleteNotification(name: string, res: http.ServerResponse): Promise<void> {
    // 先移除排程再刪檔，避免 cron 執行不存在的設定
    await deps.crontab.disable(name);
    const deleted = await deps.store.delete(name);
    if (!deleted) {
      throw new HttpError(404, `Notification '${name}' not found.`);
    }
    logger.info(`Deleted notification: ${name}`);
    sendJson(res, { success: true });
  }

  async function enableSchedule(name: string, req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    await requireConfig(name);
    const body = await parseBody(req);
    const expression = toCron(parseScheduleForm(body));

    await deps.crontab.enable(name, deps.commandFor(name), expression);
    const job = await deps.crontab.getJobStatus(name);
    sendJson(res, {
      message: `Notification enabled with schedule: ${describeCron(expression)}`,
      schedule: serializeJob(job),
    });
  }

  async function updateSchedule(name: string, req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    await requireConfig(name);
    const body = await parseBody(req);
    const expression = toCron(parseScheduleForm(body));

    const updated = await deps.crontab.updateSchedule(name, expression);
    if (!updated) {
      throw new HttpError(404, `Notification '${name}' has no schedule to update.`);
    }
    const job = await deps.crontab.getJobStatus(name);
    sendJson(res, {
      message: `Schedule updated: ${describeCron(expression)}`,
      schedule: serializeJob(job),
    });
  }

  async function disableSchedule(name: string, res: http.ServerResponse): Promise<void> {
    const removed = await deps.crontab.disable(name);
    sendJson(res, { message: 'Notification disabled.', removed, schedule: serializeJob(undefined) });
  }

  async function testNotification(name: string, res: http.ServerResponse): Promise<void> {
    const config = await requireConfig(name);
    const result = await deps.dispatcher.send(config, deps.store.pathFor(name), { now: now(), test: true });

    if (result.success) {
      sendJson(res, { success: true, message: 'Test notification sent successfully!', content: result.content });
      return;
    }

    const status = result.error instanceof ConfigError ? 400 : 502;
    sendJson(res, { error: `Failed to send test notification: ${result.error?.message ?? 'unknown error'}` }, status);
  }

  async function preview(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const body = await parseBody(req);
    const message = typeof body.message === 'string' ? body.message : '';
    sendJson(res, { rendered: formatPlaceholders(message, now()) });
  }

  async function showErrorWebhook(res: http.ServerResponse): Promise<void> {
    const url = await deps.errorWebhooks.load();
    sendJson(res, { webhook_url: url ?? '', path: deps.errorWebhooks.filePath });
  }

  async function saveErrorWebhook(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const body = await parseBody(req);
    await deps.errorWebhooks.save(stringField(body, 'webhook_url'));
    logger.info('Saved error webhook');
    sendJson(res, { success: true, message: 'Error webhook saved!' });
  }

  async function testErrorWebhook(res: http.ServerResponse): Promise<void> {
    const url = await deps.errorWebhooks.load();
    if (!url) {
      throw new HttpError(400, 'No error webhook configured.');
    }
    await deps.client.post(url, { content: TEST_ERROR_WEBHOOK_MESSAGE }, deps.errorWebhooks.filePath);
    sendJson(res, { success: true, message: 'Test error notification sent!' });
  }

  async function route(req: http.IncomingMessage, res: http.ServerResponse, method: string, path: string): Promise<void> {
    if (path === '/' && method === 'GET') {
      res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8' });
      res.end(getHtmlTemplate());
      return;
    }

    if (path === '/api/notifications') {
      if (method === 'GET') return listNotifications(res);
      if (method === 'POST') return createNotification(req, res);
    }

    if (path === '/api/presets' && method === 'GET') {
      const presets = Object.entries(SCHEDULE_PRESETS).map(([key, preset]) => ({ key, ...preset }));
      sendJson(res, { presets });
      return;
    }

    if (path === '/api/preview' && method === 'POST') {
      return preview(req, res);
    }

    if (path === '/api/settings/error-webhook') {
      if (method === 'GET') return showErrorWebhook(res);
      if (method === 'PUT' || method === 'POST') return saveErrorWebhook(req, res);
    }

    if (path === '/api/settings/error-webhook/test' && method === 'POST') {
      return testErrorWebhook(res);
    }

    const match = /^\/api\/notifications\/([^/]+)(?:\/(schedule|test))?$/.exec(path);
    if (match) {
      const name = decodeNotificationName(match[1]);

      switch (`${method} ${match[2] ?? ''}`) {
        case 'GET ':
          return showNotification(name, res);
        case 'PUT ':
          return updateNotification(name, req, res);
        case 'DELETE ':
          return deleteNotification(name, res);
        case 'POST schedule':
          return enableSchedule(name, req, res);
        case 'PUT schedule':
          return updateSchedule(name, req, res);
        case 'DELETE schedule':
          return disableSchedule(name, res);
        case 'POST test':
          return testNotification(name, res);
      }
    }

    sendJson(res, { error: 'Not found' }, 404);
  }

  return async function handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const method = req.method || 'GET';
    const url = new URL(req.url || '/', `http://${req.headers.host || 'localhost'}`);

    logger.debug(`${method} ${url.pathname}`);

    try {
      await route(req, res, method, url.pathname);
    } catch (error) {
      if (error instanceof HttpError) {
        sendJson(res, { error: error.message }, error.status);
        return;
      }
      if (error instanceof ScheduleError || error instanceof ConfigError) {
        sendJson(res, { error: error.message }, 400);
        return;
      }
      if (error instanceof SendError) {
        sendJson(res, { error: `Failed to send: ${error.message}` }, 502);
        return;
      }
      const message = errorMessage(error);
      logger.error(`Request error: ${message}`);
      sendJson(res, { error: message }, 500);
    }
  };
}

/**
 * 依環境設定建立 dashboard 需要的元件
 */
export function createWebUiDeps(env: EnvironmentInfo = detectEnvironment()): WebUiDeps {
  const store = new ConfigStore(env.configsDir);
  const errorWebhooks = new ErrorWebhookStore(env.errorWebhookPath);
  const client = new DiscordWebhookClient({ timeoutMs: env.webhookTimeoutMs });

  // dashboard 只做測試發送，失敗直接回給使用者，不經過錯誤 webhook
  return {
    store,
    errorWebhooks,
    crontab: new CrontabManager(new SystemCrontab(env.crontabUser)),
    dispatcher: new NotificationDispatcher({ client }),
    client,
    commandFor: (name) => buildNotifierCommand(env.nodePath, env.notifierScript, store.pathFor(name)),
  };
}

/**
 * 啟動 Web UI Server
 */
export function startServer(options: ServerOptions, deps: WebUiDeps = createWebUiDeps()): http.Server {
  const handler = createRequestHandler(deps);
  const server = http.createServer((req, res) => {
    handler(req, res).catch((error: unknown) => {
      logger.error(`Unhandled request error: ${errorMessage(error)}`);
    });
  });

  server.listen(options.port, options.host, () => {
    logger.raw('\n  Discord Notifier Web UI');
    logger.raw('  ───────────────────────');
    if (options.host === '0.0.0.0') {
      logger.raw(`  Local:   http://127.0.0.1:${options.port}`);
      logger.raw(`  Network: http://<this machine's LAN address>:${options.port}`);
    } else {
      logger.raw(`  Running: http://${options.host}:${options.port}`);
    }
    logger.raw('');
    logger.info(`Web UI server started on ${options.host}:${options.port}`);
  });

  server.on('error', (error) => {
    logger.error(`Server error: ${error.message}`);
    process.exitCode = 1;
  });

  return server;
}

/**
 * 解析 --host / --port 參數
 */
export function parseServerArgs(args: string[], env: EnvironmentInfo = detectEnvironment()): ServerOptions {
  const options: ServerOptions = { host: env.webUiHost, port: env.webUiPort };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const [flag, inline] = arg.split('=', 2);
    const value = inline ?? args[i + 1];

    if (flag === '--host' && value) {
      options.host = value;
      if (inline === undefined) i++;
    } else if (flag === '--port' && value) {
      const port = parseInt(value, 10);
      if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw new Error(`Invalid port: ${value}`);
      }
      options.port = port;
      if (inline === undefined) i++;
    }
  }

  return options;
}
