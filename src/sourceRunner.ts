import type { ChatClient } from './chatClient.js';
import { advanceCursor, sourceCursorKey } from './cursor.js';
import type { CursorStore } from './cursorStore.js';
import type { DeliveryEngine } from './delivery.js';
import { CursorConflictError, errorMessage } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { matchKeywords, messageText } from './matcher.js';
import type {
  ChatMessage,
  Cursor,
  DeliveryOutcome,
  FailedDeliveryPolicy,
  SourceConfig,
  SourceResult,
  SourceStats,
  SourceStatus
} from './types.js';
import { DEFAULT_LOOKBACK_HOURS, describeWindow, isInWindow, planWindow } from './window.js';

/** Where a run was when it failed; reported with `source_run_failed`. */
export type RunnerState = 'planning' | 'scanning' | 'matching' | 'delivering' | 'advancing';

export interface SourceRunnerOptions {
  client: ChatClient;
  cursorStore: CursorStore;
  delivery: DeliveryEngine;
  destinationChatId: number;
  lookbackHours?: number;
  failedDeliveryPolicy?: FailedDeliveryPolicy;
  sourceHeaders?: boolean;
  logger?: Logger;
}

export interface RunContext {
  now: Date;
  signal?: AbortSignal;
}

export function emptyStats(): SourceStats {
  return { scanned: 0, matched: 0, forwarded: 0, copied: 0, failed: 0, skipped: 0, errors: [] };
}

function recordOutcome(stats: SourceStats, message: ChatMessage, outcome: DeliveryOutcome): void {
  switch (outcome.kind) {
    case 'forwarded':
      stats.forwarded += 1;
      break;
    case 'copied':
      stats.copied += 1;
      break;
    case 'failed':
      stats.failed += 1;
      stats.errors.push(`message_id=${message.id} error=${outcome.reason}`);
      break;
    case 'skipped':
      stats.skipped += 1;
      break;
  }
}

/**
 * Scans one source's window, relays matches and advances its cursor once.
 * Never throws: every failure ends up in the returned result.
 */
export class SourceRunner {
  private readonly lookbackHours: number;

  private readonly failedDeliveryPolicy: FailedDeliveryPolicy;

  private readonly logger: Logger;

  constructor(private readonly options: SourceRunnerOptions) {
    this.lookbackHours = options.lookbackHours ?? DEFAULT_LOOKBACK_HOURS;
    this.failedDeliveryPolicy = options.failedDeliveryPolicy ?? 'skip';
    this.logger = options.logger ?? createLogger('source-runner');
  }

  async run(source: SourceConfig, context: RunContext): Promise<SourceResult> {
    const { client, cursorStore, delivery, destinationChatId } = this.options;
    const key = sourceCursorKey(source);
    const log = this.logger.child({ chatId: source.chatId, topicId: key.topicId });
    const stats = emptyStats();

    let state: RunnerState = 'planning';
    let cursorBefore: Cursor | undefined;

    try {
      cursorBefore = await cursorStore.read(key);
      const window = planWindow(cursorBefore, context.now, this.lookbackHours);
      log.debug({ window: describeWindow(window) }, 'source_window_planned');

      state = 'scanning';
      let lastCompleted: ChatMessage | undefined;
      let cancelled = false;
      let headerSent = false;

      for await (const message of client.fetchMessages({ chatId: source.chatId, topicId: source.topicId, window })) {
        if (context.signal?.aborted) {
          cancelled = true;
          break;
        }
        if (message.chatId !== source.chatId || !isInWindow(window, message)) {
          continue;
        }
        if (source.topicId !== undefined && message.topicId !== source.topicId) {
          continue;
        }

        stats.scanned += 1;
        state = 'matching';
        const match = matchKeywords(messageText(message), source.keywords);

        if (match.kind === 'matched') {
          stats.matched += 1;
          state = 'delivering';

          if (this.options.sourceHeaders && !headerSent) {
            headerSent = true;
            await this.sendHeader(source, stats, log);
          }

          const outcome = await delivery.deliver(message, destinationChatId);
          recordOutcome(stats, message, outcome);
          log.debug({ messageId: message.id, keyword: match.keyword, outcome: outcome.kind }, 'source_message_relayed');

          if (outcome.kind === 'failed') {
            log.error({ messageId: message.id, reason: outcome.reason }, 'delivery_failed');
            if (this.failedDeliveryPolicy === 'retry') {
              // leave this message and everything after it for the next run
              break;
            }
          }
        }

        lastCompleted = message;
        state = 'scanning';
      }

      state = 'advancing';
      const status: SourceStatus = cancelled ? 'cancelled' : 'completed';
      if (!lastCompleted) {
        log.info({ ...stats, errors: stats.errors.length, status }, 'source_run_done');
        return { source, status, stats, cursorBefore, cursorAfter: cursorBefore };
      }

      const cursorAfter = advanceCursor(cursorBefore, lastCompleted);
      const written = await cursorStore.compareAndWrite(key, cursorBefore, cursorAfter);
      if (written === 'conflict') {
        const conflict = new CursorConflictError(
          `Cursor for chat_id=${source.chatId} topic_id=${key.topicId ?? 'none'} changed during the run`
        );
        stats.errors.push(conflict.message);
        log.warn({ cursorBefore, cursorAfter }, 'source_cursor_conflict');
        return { source, status: 'conflict', stats, cursorBefore, cursorAfter: cursorBefore, error: conflict.message };
      }

      log.info({ ...stats, errors: stats.errors.length, status, cursor: cursorAfter }, 'source_run_done');
      return { source, status, stats, cursorBefore, cursorAfter };
    } catch (error) {
      const message = errorMessage(error);
      stats.errors.push(message);
      log.error({ state, err: error }, 'source_run_failed');
      return { source, status: 'failed', stats, cursorBefore, cursorAfter: cursorBefore, error: message };
    }
  }

  private async sendHeader(source: SourceConfig, stats: SourceStats, log: Logger): Promise<void> {
    try {
      const title = source.label ?? (await this.options.client.chatTitle(source.chatId)) ?? String(source.chatId);
      const suffix = source.topicId === undefined ? '' : ` (topic ${source.topicId})`;
      await this.options.client.sendText(this.options.destinationChatId, `Source chat: ${title}${suffix}`);
    } catch (error) {
      stats.errors.push(`source_header_error=${errorMessage(error)}`);
      log.warn({ err: error }, 'source_header_failed');
    }
  }
}
