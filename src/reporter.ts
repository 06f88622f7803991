import { createLogger, type Logger } from './logger.js';
import type { RunSummary, SourceResult } from './types.js';

export interface RunReporter {
  sourceFinished(result: SourceResult): void;
  runFinished(summary: RunSummary): void;
}

export class LogReporter implements RunReporter {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('reporter');
  }

  sourceFinished(result: SourceResult): void {
    const fields = {
      chatId: result.source.chatId,
      topicId: result.source.topicId ?? null,
      label: result.source.label,
      status: result.status,
      scanned: result.stats.scanned,
      matched: result.stats.matched,
      forwarded: result.stats.forwarded,
      copied: result.stats.copied,
      failed: result.stats.failed,
      skipped: result.stats.skipped,
      errors: result.stats.errors
    };
    if (result.status === 'failed' || result.stats.failed > 0) {
      this.logger.error(fields, 'source_summary');
      return;
    }
    if (result.status === 'conflict') {
      this.logger.warn(fields, 'source_summary');
      return;
    }
    this.logger.info(fields, 'source_summary');
  }

  runFinished(summary: RunSummary): void {
    const level = summary.allFailed ? 'error' : 'info';
    this.logger[level]({ ...summary.totals, startedAt: summary.startedAt, finishedAt: summary.finishedAt }, 'run_summary');
  }
}
