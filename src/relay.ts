import type { ChatClient } from './chatClient.js';
import { DocumentCursorStore, type CursorStore } from './cursorStore.js';
import { DeliveryEngine } from './delivery.js';
import { createLogger, type Logger } from './logger.js';
import { BatchOrchestrator } from './orchestrator.js';
import { loadRelayDocument } from './relayDocument.js';
import { LogReporter, type RunReporter } from './reporter.js';
import { SourceRunner } from './sourceRunner.js';
import type { AppConfig, RunSummary } from './types.js';

export interface SyncingChatClient extends ChatClient {
  sync(timeoutSeconds?: number): Promise<number>;
}

export interface RunRelayParams {
  config: AppConfig;
  client: ChatClient;
  documentPath: string;
  cursorStore?: CursorStore;
  reporter?: RunReporter;
  signal?: AbortSignal;
  now?: Date;
  sleep?: (ms: number) => Promise<void>;
}

/** Loads the relay document and runs every source in it once. */
export async function runRelay(params: RunRelayParams): Promise<RunSummary> {
  const { config, client } = params;
  const document = await loadRelayDocument(params.documentPath, createLogger('config'));

  const delivery = new DeliveryEngine(client, {
    maxAttempts: config.deliveryMaxAttempts,
    baseDelayMs: config.deliveryRetryBaseMs,
    maxDelayMs: config.deliveryRetryMaxMs,
    sleep: params.sleep
  });

  const runner = new SourceRunner({
    client,
    cursorStore: params.cursorStore ?? new DocumentCursorStore(document.path),
    delivery,
    destinationChatId: document.destinationChatId,
    lookbackHours: config.firstRunLookbackHours,
    failedDeliveryPolicy: config.failedDeliveryPolicy,
    sourceHeaders: config.sourceHeaders
  });

  const orchestrator = new BatchOrchestrator({
    runner,
    concurrency: config.sourceConcurrency,
    reporter: params.reporter ?? new LogReporter()
  });

  return orchestrator.runAll(document.sources, { signal: params.signal, now: params.now });
}

/**
 * Pulls pending updates into the message log. A failure is logged and
 * swallowed: what the log already holds can still be scanned.
 */
export async function syncBeforeRun(
  client: Pick<SyncingChatClient, 'sync'>,
  timeoutSeconds = 0,
  logger: Logger = createLogger('sync')
): Promise<number | undefined> {
  try {
    return await client.sync(timeoutSeconds);
  } catch (error) {
    logger.warn({ err: error }, 'sync_failed');
    return undefined;
  }
}

export async function syncAndRunRelay(
  params: RunRelayParams & { client: SyncingChatClient; syncTimeoutSeconds?: number }
): Promise<RunSummary> {
  await syncBeforeRun(params.client, params.syncTimeoutSeconds);
  return runRelay(params);
}
