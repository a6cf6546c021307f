import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { mkdtemp, rm, writeFile, readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { tmpdir } from 'os';
import * as yaml from 'js-yaml';
import {
  ConfigStore,
  isValidNotificationName,
  readNotificationFile,
  validateNotificationConfig,
} from '../src/core/config-store.js';
import { ErrorWebhookStore } from '../src/core/error-webhook-store.js';
import { ConfigError } from '../src/core/errors.js';

vi.mock('../src/utils/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    raw: vi.fn(),
  }),
}));

const WEBHOOK = 'https://discord.com/api/webhooks/123/test-secret';

async function expectConfigError(promise: Promise<unknown>, reason: string): Promise<void> {
  const error = await promise.then(
    () => undefined,
    (e: unknown) => e
  );
  expect(error).toBeInstanceOf(ConfigError);
  if (error instanceof ConfigError) {
    expect(error.reason).toBe(reason);
  }
}

describe('isValidNotificationName', () => {
  it('只允許英數字、底線與連字號', () => {
    expect(isValidNotificationName('daily-standup_2')).toBe(true);
    expect(isValidNotificationName('')).toBe(false);
    expect(isValidNotificationName('daily standup')).toBe(false);
    expect(isValidNotificationName('../etc/passwd')).toBe(false);
    expect(isValidNotificationName('report.example')).toBe(false);
  });
});

describe('validateNotificationConfig', () => {
  it('回傳去除空白的 webhook_url', () => {
    expect(validateNotificationConfig({ webhook_url: `  ${WEBHOOK}\n`, message: 'hi' }, 'a.yaml')).toEqual({
      webhook_url: WEBHOOK,
      message: 'hi',
    });
  });

  it('缺少欄位或型別錯誤時拋出 ConfigError', () => {
    expect(() => validateNotificationConfig({ message: 'hi' }, 'a.yaml')).toThrow(
      "Configuration file 'a.yaml': missing required field: webhook_url"
    );
    expect(() => validateNotificationConfig({ webhook_url: '   ', message: 'hi' }, 'a.yaml')).toThrow(
      'missing required field: webhook_url'
    );
    expect(() => validateNotificationConfig({ webhook_url: WEBHOOK, message: 42 }, 'a.yaml')).toThrow(
      'missing required field: message'
    );
    expect(() => validateNotificationConfig(['a', 'b'], 'a.yaml')).toThrow(
      'expected a YAML mapping with webhook_url and message'
    );
    expect(() => validateNotificationConfig(null, 'a.yaml')).toThrow(ConfigError);
  });
});

describe('readNotificationFile', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'config-file-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('讀取合法的設定檔', async () => {
    const path = join(tempDir, 'standup.yaml');
    await writeFile(path, `webhook_url: ${WEBHOOK}\nmessage: "Standup for {date:DD/MM}"\n`);

    expect(await readNotificationFile(path)).toEqual({
      webhook_url: WEBHOOK,
      message: 'Standup for {date:DD/MM}',
    });
  });

  it('檔案不存在', async () => {
    await expectConfigError(readNotificationFile(join(tempDir, 'missing.yaml')), 'file not found');
  });

  it('YAML 語法錯誤', async () => {
    const path = join(tempDir, 'broken.yaml');
    await writeFile(path, 'webhook_url: [unclosed\n');

    const error = await readNotificationFile(path).then(
      () => undefined,
      (e: unknown) => e
    );
    expect(error).toBeInstanceOf(ConfigError);
    if (error instanceof ConfigError) {
      expect(error.path).toBe(path);
      expect(error.reason.startsWith('invalid YAML: ')).toBe(true);
    }
  });

  it('空檔案視為缺少 mapping', async () => {
    const path = join(tempDir, 'empty.yaml');
    await writeFile(path, '');

    await expectConfigError(readNotificationFile(path), 'expected a YAML mapping with webhook_url and message');
  });

  it('webhook_url 為空字串', async () => {
    const path = join(tempDir, 'blank.yaml');
    await writeFile(path, 'webhook_url: ""\nmessage: hello\n');

    await expectConfigError(readNotificationFile(path), 'missing required field: webhook_url');
  });
});

describe('ConfigStore', () => {
  let tempDir: string;
  let store: ConfigStore;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'config-store-test-'));
    store = new ConfigStore(join(tempDir, 'configs'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('目錄不存在時 list 回傳空陣列', async () => {
    expect(await store.list()).toEqual([]);
  });

  it('write 建立目錄並回傳絕對路徑', async () => {
    const path = await store.write('standup', { webhook_url: WEBHOOK, message: 'Standup time' });

    expect(path).toBe(join(tempDir, 'configs', 'standup.yaml'));
    expect(yaml.load(await readFile(path, 'utf-8'))).toEqual({ webhook_url: WEBHOOK, message: 'Standup time' });
    expect(store.exists('standup')).toBe(true);
  });

  it('多行訊息寫入後讀回不變', async () => {
    const message = '**Weekly report** {date}\n\n- item one\n- item two: done\n';
    await store.write('weekly', { webhook_url: WEBHOOK, message });

    expect(await store.read('weekly')).toEqual({ webhook_url: WEBHOOK, message });
  });

  it('write 拒絕不合法的名稱', async () => {
    await expect(store.write('bad name', { webhook_url: WEBHOOK, message: 'x' })).rejects.toThrow(ConfigError);
    expect(existsSync(join(tempDir, 'configs', 'bad name.yaml'))).toBe(false);
  });

  it('list 依名稱排序並略過 example 與無法解析的檔案', async () => {
    await store.write('zeta', { webhook_url: WEBHOOK, message: 'last' });
    await store.write('alpha', { webhook_url: WEBHOOK, message: 'first' });
    await writeFile(join(store.configsDir, 'sample.yaml.example'), `webhook_url: ${WEBHOOK}\nmessage: example\n`);
    await writeFile(join(store.configsDir, 'sample.example.yaml'), `webhook_url: ${WEBHOOK}\nmessage: example\n`);
    await writeFile(join(store.configsDir, 'broken.yaml'), 'message: [unclosed\n');
    await writeFile(join(store.configsDir, 'notes.txt'), 'not a config');

    const notifications = await store.list();

    expect(notifications).toEqual([
      { name: 'alpha', path: store.pathFor('alpha'), webhook_url: WEBHOOK, message: 'first' },
      { name: 'zeta', path: store.pathFor('zeta'), webhook_url: WEBHOOK, message: 'last' },
    ]);
  });

  it('load 對缺漏欄位回傳空字串', async () => {
    await store.write('partial', { webhook_url: WEBHOOK, message: 'x' });
    await writeFile(store.pathFor('partial'), 'message: only a message\n');

    expect(await store.load('partial')).toEqual({ webhook_url: '', message: 'only a message' });
    expect(await store.load('missing')).toBeUndefined();
  });

  it('read 對缺漏欄位拋出 ConfigError', async () => {
    await store.write('partial', { webhook_url: WEBHOOK, message: 'x' });
    await writeFile(store.pathFor('partial'), 'message: only a message\n');

    await expectConfigError(store.read('partial'), 'missing required field: webhook_url');
  });

  it('delete 移除檔案，不存在時回傳 false', async () => {
    await store.write('standup', { webhook_url: WEBHOOK, message: 'x' });

    expect(await store.delete('standup')).toBe(true);
    expect(store.exists('standup')).toBe(false);
    expect(await store.delete('standup')).toBe(false);
  });
});

describe('ErrorWebhookStore', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'error-webhook-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('檔案不存在時回傳 null', async () => {
    const store = new ErrorWebhookStore(join(tempDir, 'error_webhook.yaml'));
    expect(await store.load()).toBeNull();
  });

  it('save 後 load 回傳 URL', async () => {
    const store = new ErrorWebhookStore(join(tempDir, 'nested', 'error_webhook.yaml'));

    await store.save(`  ${WEBHOOK}  `);

    expect(await store.load()).toBe(WEBHOOK);
    expect(yaml.load(await readFile(store.filePath, 'utf-8'))).toEqual({ webhook_url: WEBHOOK });
  });

  it('空值、非 mapping 或語法錯誤時回傳 null', async () => {
    const store = new ErrorWebhookStore(join(tempDir, 'error_webhook.yaml'));

    await writeFile(store.filePath, 'webhook_url: ""\n');
    expect(await store.load()).toBeNull();

    await writeFile(store.filePath, '- one\n- two\n');
    expect(await store.load()).toBeNull();

    await writeFile(store.filePath, 'webhook_url: [unclosed\n');
    expect(await store.load()).toBeNull();
  });
});
