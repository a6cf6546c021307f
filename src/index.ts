#!/usr/bin/env node
/**
 * Discord Cron Notifier - 主程式進入點
 *
 * 依模式啟動 dashboard 或發送單一通知。
 */

import { loadEnv } from './core/env-detect.js';

loadEnv();

const mode = process.argv[2] || 'help';

async function main(): Promise<void> {
  switch (mode) {
    case 'web': {
      const { startServer, parseServerArgs } = await import('./interfaces/web-ui.js');
      const server = startServer(parseServerArgs(process.argv.slice(3)));

      const shutdown = () => {
        console.log('Shutting down...');
        server.close(() => {
          process.exit(0);
        });
      };
      process.on('SIGTERM', shutdown);
      process.on('SIGINT', shutdown);
      break;
    }

    case 'notify': {
      const { runNotifier } = await import('./interfaces/notifier-cli.js');
      process.exitCode = await runNotifier(process.argv.slice(3));
      break;
    }

    case 'help':
    case '-h':
    case '--help':
      console.log(`
Discord Cron Notifier - 透過 cron 定時發送 Discord webhook 通知

Usage: npm start [mode]

Modes:
  web [--host HOST] [--port PORT]   啟動 dashboard（預設 127.0.0.1:5000）
  notify <config.yaml>              立即發送一則通知
  help                              顯示此說明

Other commands:
  npm run web     啟動 dashboard
  npm test        執行測試
`);
      break;

    default:
      console.error(`Unknown mode: ${mode}`);
      console.log('Use "npm start help" for usage information');
      process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
