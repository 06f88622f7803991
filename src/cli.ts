import { setTimeout as delay } from 'node:timers/promises';
import { Command } from 'commander';
import { listChats } from './chats.js';
import { loadConfig, resolveRelayConfigPath } from './config.js';
import { ConfigError, errorMessage } from './errors.js';
import { configureLogging, createLogger } from './logger.js';
import { MessageLog } from './messageLog.js';
import { syncAndRunRelay, syncBeforeRun } from './relay.js';
import { TelegramClient } from './telegram.js';
import { TelegramChatClient } from './telegramChatClient.js';
import type { AppConfig, RunSummary } from './types.js';

interface GlobalOptions {
  config?: string;
  logLevel?: string;
}

export function formatSummary(summary: RunSummary): string[] {
  const lines = summary.sources.map((result) =>
    [
      'source',
      `chat_id=${result.source.chatId}`,
      `topic_id=${result.source.topicId ?? '-'}`,
      `status=${result.status}`,
      `scanned=${result.stats.scanned}`,
      `matched=${result.stats.matched}`,
      `forwarded=${result.stats.forwarded}`,
      `copied=${result.stats.copied}`,
      `failed=${result.stats.failed}`,
      `skipped=${result.stats.skipped}`,
      `errors=${result.stats.errors.length}`
    ].join(' ')
  );

  const { totals } = summary;
  lines.push(
    [
      'total',
      `sources=${totals.sources}`,
      `failed_sources=${totals.failed}`,
      `scanned=${totals.scanned}`,
      `matched=${totals.matched}`,
      `forwarded=${totals.forwarded}`,
      `copied=${totals.copied}`,
      `failed=${totals.deliveryFailures}`
    ].join(' ')
  );
  return lines;
}

async function withTelegram<T>(config: AppConfig, work: (client: TelegramChatClient) => Promise<T>): Promise<T> {
  const log = new MessageLog(config.dbPath);
  try {
    return await work(new TelegramChatClient(new TelegramClient(config), log));
  } finally {
    log.close();
  }
}

function printLines(lines: string[]): void {
  for (const line of lines) {
    process.stdout.write(`${line}\n`);
  }
}

async function handleRun(options: GlobalOptions): Promise<number> {
  const config = loadConfig();
  const documentPath = resolveRelayConfigPath(config, options.config);
  const summary = await withTelegram(config, (client) => syncAndRunRelay({ config, client, documentPath }));
  printLines(formatSummary(summary));
  return summary.allFailed ? 1 : 0;
}

async function handleWatch(options: GlobalOptions): Promise<number> {
  const config = loadConfig();
  const documentPath = resolveRelayConfigPath(config, options.config);
  const logger = createLogger('watch');
  const controller = new AbortController();
  const stop = () => controller.abort();
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  logger.info({ intervalMs: config.runIntervalMs, documentPath }, 'watch_started');
  await withTelegram(config, async (client) => {
    while (!controller.signal.aborted) {
      try {
        const summary = await syncAndRunRelay({
          config,
          client,
          documentPath,
          signal: controller.signal,
          syncTimeoutSeconds: config.pollTimeoutSeconds
        });
        printLines(formatSummary(summary));
      } catch (error) {
        if (error instanceof ConfigError) {
          throw error;
        }
        logger.error({ err: error }, 'watch_cycle_failed');
      }

      try {
        await delay(config.runIntervalMs, undefined, { signal: controller.signal });
      } catch (error) {
        if (!controller.signal.aborted) {
          throw error;
        }
      }
    }
  });
  logger.info('watch_stopped');
  return 0;
}

async function handleSync(): Promise<number> {
  const config = loadConfig();
  const stored = await withTelegram(config, (client) => client.sync(config.pollTimeoutSeconds));
  process.stdout.write(`stored=${stored}\n`);
  return 0;
}

async function handleListChats(): Promise<number> {
  const config = loadConfig();
  const lines = await withTelegram(config, async (client) => {
    await syncBeforeRun(client);
    return listChats(client);
  });
  printLines(lines);
  return 0;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('tg-keyword-relay')
    .description('Relay keyword-matching Telegram messages into a destination chat')
    .option('-c, --config <path>', 'relay config YAML (defaults to RELAY_CONFIG_PATH or ~/.tg-keyword-relay.yaml)')
    .option('-l, --log-level <level>', 'log level: trace, debug, info, warn, error, silent')
    .hook('preAction', (command) => {
      const { logLevel } = command.opts<GlobalOptions>();
      configureLogging({ level: logLevel, format: process.env.LOG_FORMAT === 'pretty' ? 'pretty' : 'json' });
    });

  const exitWith = (code: number) => {
    process.exitCode = code;
  };

  program
    .command('run')
    .description('Sync updates and process every configured source once')
    .action(async () => exitWith(await handleRun(program.opts<GlobalOptions>())));

  program
    .command('watch')
    .description('Repeat run every RUN_INTERVAL_MS until interrupted')
    .action(async () => exitWith(await handleWatch(program.opts<GlobalOptions>())));

  program
    .command('sync')
    .description('Store pending Telegram updates in the message log')
    .action(async () => exitWith(await handleSync()));

  program
    .command('list-chats')
    .description('List known chats and forum topic ids')
    .action(async () => exitWith(await handleListChats()));

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await buildProgram().parseAsync(argv);
  } catch (error) {
    const message = error instanceof ConfigError ? `Configuration error: ${error.message}` : errorMessage(error);
    createLogger('cli').error({ err: error }, 'fatal_error');
    process.stderr.write(`${message}\n`);
    process.exitCode = 1;
  }
}
