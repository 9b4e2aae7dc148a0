import { CONFIG } from '../config';

export function logDebug(scope: string, message: string, ...details: unknown[]): void {
  if (CONFIG.logLevel !== 'debug') return;
  console.log(`[DEBUG] [${scope}] ${message}`, ...details);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
