import { errorMessage } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { ensureUniqueSources } from './relayDocument.js';
import type { RunReporter } from './reporter.js';
import { emptyStats, type SourceRunner } from './sourceRunner.js';
import type { RunSummary, RunTotals, SourceConfig, SourceResult } from './types.js';

export interface RunAllOptions {
  now?: Date;
  signal?: AbortSignal;
}

export interface BatchOrchestratorOptions {
  runner: Pick<SourceRunner, 'run'>;
  concurrency?: number;
  reporter?: RunReporter;
  nowFn?: () => Date;
  logger?: Logger;
}

export function summarize(results: SourceResult[], startedAt: Date, finishedAt: Date): RunSummary {
  const totals: RunTotals = {
    sources: results.length,
    completed: 0,
    failed: 0,
    conflicts: 0,
    cancelled: 0,
    scanned: 0,
    matched: 0,
    forwarded: 0,
    copied: 0,
    deliveryFailures: 0,
    skipped: 0
  };

  for (const result of results) {
    if (result.status === 'completed') totals.completed += 1;
    if (result.status === 'failed') totals.failed += 1;
    if (result.status === 'conflict') totals.conflicts += 1;
    if (result.status === 'cancelled') totals.cancelled += 1;
    totals.scanned += result.stats.scanned;
    totals.matched += result.stats.matched;
    totals.forwarded += result.stats.forwarded;
    totals.copied += result.stats.copied;
    totals.deliveryFailures += result.stats.failed;
    totals.skipped += result.stats.skipped;
  }

  return {
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    totals,
    sources: results,
    allFailed: results.length > 0 && totals.failed === results.length
  };
}

export class BatchOrchestrator {
  private readonly runner: Pick<SourceRunner, 'run'>;

  private readonly concurrency: number;

  private readonly reporter?: RunReporter;

  private readonly nowFn: () => Date;

  private readonly logger: Logger;

  constructor(options: BatchOrchestratorOptions) {
    this.runner = options.runner;
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
    this.reporter = options.reporter;
    this.nowFn = options.nowFn ?? (() => new Date());
    this.logger = options.logger ?? createLogger('orchestrator');
  }

  /**
   * Runs every source and always resolves with a summary. Only a duplicated
   * source definition, a configuration problem, rejects.
   */
  async runAll(sources: readonly SourceConfig[], options: RunAllOptions = {}): Promise<RunSummary> {
    ensureUniqueSources(sources);

    const startedAt = this.nowFn();
    const now = options.now ?? startedAt;
    const results: SourceResult[] = new Array(sources.length);
    let next = 0;

    this.logger.info({ sources: sources.length, concurrency: this.concurrency }, 'run_start');

    const worker = async (): Promise<void> => {
      while (next < sources.length) {
        const index = next;
        next += 1;
        const source = sources[index];
        if (!source) {
          continue;
        }
        const result = await this.runOne(source, now, options.signal);
        results[index] = result;
        this.reporter?.sourceFinished(result);
      }
    };

    const workers = Array.from({ length: Math.min(this.concurrency, sources.length) }, () => worker());
    await Promise.all(workers);

    const summary = summarize(results, startedAt, this.nowFn());
    this.logger.info({ ...summary.totals, allFailed: summary.allFailed }, 'run_end');
    this.reporter?.runFinished(summary);
    return summary;
  }

  private async runOne(source: SourceConfig, now: Date, signal?: AbortSignal): Promise<SourceResult> {
    if (signal?.aborted) {
      return { source, status: 'cancelled', stats: emptyStats() };
    }
    try {
      return await this.runner.run(source, { now, signal });
    } catch (error) {
      // runners report their own failures; this only catches a broken runner
      const message = errorMessage(error);
      this.logger.error({ chatId: source.chatId, topicId: source.topicId ?? null, err: error }, 'source_run_crashed');
      return { source, status: 'failed', stats: { ...emptyStats(), errors: [message] }, error: message };
    }
  }
}
