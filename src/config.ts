import os from 'node:os';
import path from 'node:path';
import { ConfigError } from './errors.js';
import type { AppConfig, FailedDeliveryPolicy } from './types.js';

interface LoadConfigOptions {
  requireTelegramToken?: boolean;
  env?: NodeJS.ProcessEnv;
}

export const DEFAULT_RELAY_CONFIG_PATH = path.join(os.homedir(), '.tg-keyword-relay.yaml');

function asNumber(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number, max: number): number {
  const value = env[name];
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < min || parsed > max) {
    throw new ConfigError(`${name} must be a finite number in [${min}, ${max}], got: ${value}`);
  }
  return parsed;
}

function asPolicy(value?: string): FailedDeliveryPolicy {
  if (!value) {
    return 'skip';
  }
  if (value !== 'skip' && value !== 'retry') {
    throw new ConfigError(`FAILED_DELIVERY_POLICY must be skip or retry, got: ${value}`);
  }
  return value;
}

function asBoolean(name: string, value?: string): boolean {
  if (!value) {
    return false;
  }
  if (value !== 'true' && value !== 'false') {
    throw new ConfigError(`${name} must be true or false, got: ${value}`);
  }
  return value === 'true';
}

function expandHome(value: string): string {
  return value.startsWith('~/') ? path.join(os.homedir(), value.slice(2)) : value;
}

export function loadConfig(options?: LoadConfigOptions): AppConfig {
  const env = options?.env ?? process.env;
  const requireTelegramToken = options?.requireTelegramToken ?? true;
  const telegramBotToken = env.TELEGRAM_BOT_TOKEN ?? '';
  if (requireTelegramToken && !telegramBotToken) {
    throw new ConfigError('TELEGRAM_BOT_TOKEN is required');
  }

  return {
    telegramBotToken,
    telegramApiBase: env.TELEGRAM_API_BASE ?? 'https://api.telegram.org',
    httpProxy: env.HTTP_PROXY,
    httpsProxy: env.HTTPS_PROXY,
    relayConfigPath: expandHome(env.RELAY_CONFIG_PATH ?? DEFAULT_RELAY_CONFIG_PATH),
    dbPath: env.DB_PATH ?? './data/messages.sqlite',
    pollTimeoutSeconds: asNumber(env, 'POLL_TIMEOUT_SECONDS', 0, 0, 50),
    runIntervalMs: asNumber(env, 'RUN_INTERVAL_MS', 60_000, 1000, 86_400_000),
    firstRunLookbackHours: asNumber(env, 'FIRST_RUN_LOOKBACK_HOURS', 24, 1, 24 * 365),
    deliveryMaxAttempts: asNumber(env, 'DELIVERY_MAX_ATTEMPTS', 5, 1, 20),
    deliveryRetryBaseMs: asNumber(env, 'DELIVERY_RETRY_BASE_MS', 1000, 0, 60_000),
    deliveryRetryMaxMs: asNumber(env, 'DELIVERY_RETRY_MAX_MS', 30_000, 0, 600_000),
    sourceConcurrency: asNumber(env, 'SOURCE_CONCURRENCY', 1, 1, 32),
    failedDeliveryPolicy: asPolicy(env.FAILED_DELIVERY_POLICY),
    sourceHeaders: asBoolean('SOURCE_HEADERS', env.SOURCE_HEADERS)
  };
}

export function resolveRelayConfigPath(config: AppConfig, override?: string): string {
  return path.resolve(expandHome(override ?? config.relayConfigPath));
}
