/**
 * 使用者 crontab 管理
 *
 * 每則通知對應一行 crontab，行尾帶有 `# discord-notifier:<name>` 標記：
 *
 *   0 9 * * * /usr/bin/node /opt/notifier/dist/notify.js /opt/notifier/configs/standup.yaml # discord-notifier:standup
 *
 * 只有帶標記的行會被修改，其他排程保持原樣。
 */

import { spawn } from 'child_process';
import { CronExpressionParser } from 'cron-parser';
import { createLogger } from '../utils/logger.js';
import { describeCron } from './schedule-translator.js';

const logger = createLogger('Crontab');

export const CRON_MARKER_PREFIX = 'discord-notifier:';

const MARKER_PATTERN = new RegExp(`\\s#\\s*${CRON_MARKER_PREFIX}(\\S+)\\s*$`);

/** 5 個排程欄位 + 指令 */
const LINE_BODY_PATTERN = /^((?:\S+\s+){4}\S+)\s+(\S.*)$/;

export interface CronJobInfo {
  enabled: boolean;
  schedule?: string;
  scheduleHuman?: string;
  nextRun?: Date;
  command?: string;
}

/**
 * crontab 的讀寫來源
 */
export interface CrontabBackend {
  read(): Promise<string>;
  write(content: string): Promise<void>;
}

interface ManagedLine {
  name: string;
  enabled: boolean;
  schedule: string;
  command: string;
}

export function markerFor(name: string): string {
  return `# ${CRON_MARKER_PREFIX}${name}`;
}

export function formatCronLine(name: string, expression: string, command: string): string {
  return `${expression} ${command} ${markerFor(name)}`;
}

/**
 * 解析帶標記的 crontab 行，非本工具管理的行回傳 null
 */
export function parseManagedLine(line: string): ManagedLine | null {
  const match = MARKER_PATTERN.exec(line);
  if (!match) {
    return null;
  }

  let body = line.slice(0, match.index).trim();
  let enabled = true;
  if (body.startsWith('#')) {
    enabled = false;
    body = body.replace(/^#+\s*/, '');
  }

  // 指令保留原本的空白，引號內的路徑可能含有連續空白或 tab
  const parts = LINE_BODY_PATTERN.exec(body);
  if (!parts) {
    return null;
  }

  return {
    name: match[1],
    enabled,
    schedule: parts[1].split(/\s+/).join(' '),
    command: parts[2],
  };
}

function splitLines(content: string): string[] {
  const lines = content.split('\n');
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

function joinLines(lines: string[]): string {
  return lines.length === 0 ? '' : `${lines.join('\n')}\n`;
}

function computeNextRun(schedule: string, now: Date): Date | undefined {
  try {
    return CronExpressionParser.parse(schedule, { currentDate: now }).next().toDate();
  } catch (error) {
    logger.debug(`Cannot compute next run for "${schedule}": ${error}`);
    return undefined;
  }
}

function toJobInfo(line: ManagedLine, now: Date): CronJobInfo {
  return {
    enabled: line.enabled,
    schedule: line.schedule,
    scheduleHuman: describeCron(line.schedule),
    nextRun: line.enabled ? computeNextRun(line.schedule, now) : undefined,
    command: line.command,
  };
}

/**
 * 透過系統 `crontab` 指令讀寫
 */
export class SystemCrontab implements CrontabBackend {
  private user?: string;

  constructor(user?: string) {
    this.user = user;
  }

  private args(...rest: string[]): string[] {
    return this.user ? ['-u', this.user, ...rest] : rest;
  }

  private run(args: string[], input?: string): Promise<{ code: number | null; stdout: string; stderr: string }> {
    return new Promise((resolve, reject) => {
      const child = spawn('crontab', args, {
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('close', (code) => {
        resolve({ code, stdout, stderr });
      });

      child.on('error', (error) => {
        reject(new Error(`crontab 執行錯誤: ${error.message}`));
      });

      child.stdin.end(input ?? '');
    });
  }

  async read(): Promise<string> {
    const result = await this.run(this.args('-l'));
    if (result.code === 0) {
      return result.stdout;
    }
    // 使用者還沒有 crontab 時 `crontab -l` 會以非 0 結束
    if (/no crontab/i.test(result.stderr)) {
      return '';
    }
    throw new Error(`crontab -l failed (exit code: ${result.code}): ${result.stderr.trim()}`);
  }

  async write(content: string): Promise<void> {
    const result = await this.run(this.args('-'), content);
    if (result.code !== 0) {
      throw new Error(`crontab write failed (exit code: ${result.code}): ${result.stderr.trim()}`);
    }
  }
}

/**
 * 記憶體中的 crontab（測試與 dry run 用）
 */
export class InMemoryCrontab implements CrontabBackend {
  content: string;

  constructor(content = '') {
    this.content = content;
  }

  async read(): Promise<string> {
    return this.content;
  }

  async write(content: string): Promise<void> {
    this.content = content;
  }
}

export class CrontabManager {
  private backend: CrontabBackend;
  private now: () => Date;

  constructor(backend: CrontabBackend, options?: { now?: () => Date }) {
    this.backend = backend;
    this.now = options?.now ?? (() => new Date());
  }

  /**
   * 取得單一通知的排程狀態
   */
  async getJobStatus(name: string): Promise<CronJobInfo> {
    const jobs = await this.getAllJobs();
    return jobs.get(name) ?? { enabled: false };
  }

  /**
   * 取得所有本工具管理的排程（同名多行時以第一行為準）
   */
  async getAllJobs(): Promise<Map<string, CronJobInfo>> {
    const content = await this.backend.read();
    const now = this.now();
    const jobs = new Map<string, CronJobInfo>();

    for (const line of splitLines(content)) {
      const managed = parseManagedLine(line);
      if (managed && !jobs.has(managed.name)) {
        jobs.set(managed.name, toJobInfo(managed, now));
      }
    }
    return jobs;
  }

  /**
   * 啟用或更新排程：同名的舊排程全部被這一行取代
   *
   * @param expression 已驗證的 cron 表達式（見 toCron）
   */
  async enable(name: string, command: string, expression: string): Promise<void> {
    const lines = splitLines(await this.backend.read());
    const newLine = formatCronLine(name, expression, command);

    const result: string[] = [];
    let replaced = false;
    for (const line of lines) {
      if (parseManagedLine(line)?.name === name) {
        if (!replaced) {
          result.push(newLine);
          replaced = true;
        }
        continue;
      }
      result.push(line);
    }
    if (!replaced) {
      result.push(newLine);
    }

    await this.backend.write(joinLines(result));
    logger.info(`Enabled schedule for ${name}: ${expression}`);
  }

  /**
   * 移除該通知的所有排程
   *
   * @returns 被移除的行數
   */
  async disable(name: string): Promise<number> {
    const lines = splitLines(await this.backend.read());
    const kept = lines.filter(line => parseManagedLine(line)?.name !== name);
    const removed = lines.length - kept.length;

    if (removed > 0) {
      await this.backend.write(joinLines(kept));
      logger.info(`Disabled schedule for ${name}`);
    }
    return removed;
  }

  /**
   * 只更新既有排程的時間，沒有排程時回傳 false
   */
  async updateSchedule(name: string, expression: string): Promise<boolean> {
    const lines = splitLines(await this.backend.read());
    if (!lines.some(line => parseManagedLine(line)?.name === name)) {
      return false;
    }

    const updated = lines.map(line => {
      const managed = parseManagedLine(line);
      if (!managed || managed.name !== name) {
        return line;
      }
      const updatedLine = formatCronLine(name, expression, managed.command);
      return managed.enabled ? updatedLine : `# ${updatedLine}`;
    });

    await this.backend.write(joinLines(updated));
    logger.info(`Updated schedule for ${name}: ${expression}`);
    return true;
  }
}

export default CrontabManager;
