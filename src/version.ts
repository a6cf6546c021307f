/**
 * 版本號（讀取 package.json）
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { PROJECT_ROOT } from './core/env-detect.js';

function readVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(join(PROJECT_ROOT, 'package.json'), 'utf-8'));
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
    return String(packageJson.version);
  }
  return '0.0.0';
}

export const VERSION: string = readVersion();
