#!/usr/bin/env node
/**
 * cron 的執行入口：node dist/notify.js /abs/path/configs/<name>.yaml
 */

import { loadEnv } from './core/env-detect.js';
import { runNotifier } from './interfaces/notifier-cli.js';

loadEnv();

runNotifier(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  });
