// Console logging with component tags, silenced by KPI_PACK_LOG_LEVEL=silent

import { getLogLevel } from './config';

export function logInfo(tag: string, message: string): void {
  if (getLogLevel() === 'silent') return;
  console.log(`[${tag}] ${message}`);
}

export function logWarn(tag: string, message: string): void {
  if (getLogLevel() === 'silent') return;
  console.warn(`[${tag}] ${message}`);
}
