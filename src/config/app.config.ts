import { RowOrder } from '../ledger/classifier/event-classifier';

export const APP_CONFIG = Symbol('APP_CONFIG');

export interface AppConfig {
  port: number;
  quoteProviderUrl?: string;
  quoteRequestTimeoutMs: number;
  quoteSyncConcurrency: number;
  quoteSyncTimeoutMs: number;
  longTermHoldingDays: number;
  importRowOrder: RowOrder;
}

function positiveInteger(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new Error(`Environment variable ${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function rowOrder(env: NodeJS.ProcessEnv): RowOrder {
  const raw = env.IMPORT_ROW_ORDER?.trim() || 'oldest-first';
  if (raw !== 'oldest-first' && raw !== 'newest-first') {
    throw new Error(`Environment variable IMPORT_ROW_ORDER must be oldest-first or newest-first, got "${raw}"`);
  }
  return raw;
}

/**
 * Builds the typed configuration from environment variables.
 * Invalid values fail at startup rather than on first use.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const quoteProviderUrl = env.QUOTE_PROVIDER_URL?.trim();

  return {
    port: positiveInteger(env, 'PORT', 3000),
    quoteProviderUrl: quoteProviderUrl ? quoteProviderUrl.replace(/\/+$/, '') : undefined,
    quoteRequestTimeoutMs: positiveInteger(env, 'QUOTE_REQUEST_TIMEOUT_MS', 5000),
    quoteSyncConcurrency: positiveInteger(env, 'QUOTE_SYNC_CONCURRENCY', 5),
    quoteSyncTimeoutMs: positiveInteger(env, 'QUOTE_SYNC_TIMEOUT_MS', 30000),
    longTermHoldingDays: positiveInteger(env, 'LONG_TERM_HOLDING_DAYS', 365),
    importRowOrder: rowOrder(env),
  };
}
