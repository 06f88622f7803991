import type { ChatClient } from './chatClient.js';
import { DeliveryRestrictedError, DeliveryTransientError, errorMessage } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import type { ChatMessage, DeliveryOutcome } from './types.js';

export interface DeliveryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

type StepResult =
  | { status: 'ok' }
  | { status: 'transient'; reason: string; retryAfterMs?: number }
  | { status: 'restricted'; reason: string }
  | { status: 'error'; reason: string };

async function runStep(action: () => Promise<void>): Promise<StepResult> {
  try {
    await action();
    return { status: 'ok' };
  } catch (error) {
    if (error instanceof DeliveryTransientError) {
      return { status: 'transient', reason: error.message, retryAfterMs: error.retryAfterMs };
    }
    if (error instanceof DeliveryRestrictedError) {
      return { status: 'restricted', reason: error.message };
    }
    return { status: 'error', reason: errorMessage(error) };
  }
}

export function hasCopyableContent(message: ChatMessage): boolean {
  return Boolean(message.media || message.text?.trim() || message.caption?.trim());
}

/** The cap bounds only the exponential part; a server-requested wait is always honoured in full. */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number, retryAfterMs?: number): number {
  const exponential = Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
  return Math.max(exponential, retryAfterMs ?? 0);
}

/**
 * Forward first, copy when forwarding is refused. Transient failures retry the
 * whole delivery with capped exponential backoff. Nothing is sent twice: a step
 * is only repeated after it reported that no message went out.
 */
export class DeliveryEngine {
  private readonly maxAttempts: number;

  private readonly baseDelayMs: number;

  private readonly maxDelayMs: number;

  private readonly sleep: (ms: number) => Promise<void>;

  private readonly logger: Logger;

  constructor(
    private readonly client: ChatClient,
    options: DeliveryOptions
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts);
    this.baseDelayMs = options.baseDelayMs;
    this.maxDelayMs = options.maxDelayMs;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.logger = options.logger ?? createLogger('delivery');
  }

  async deliver(message: ChatMessage, destinationChatId: number): Promise<DeliveryOutcome> {
    let lastReason = 'no attempt made';

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      const forward = await runStep(() => this.client.forward(message, destinationChatId));
      if (forward.status === 'ok') {
        return { kind: 'forwarded' };
      }

      let retryAfterMs: number | undefined;
      if (forward.status === 'transient') {
        lastReason = forward.reason;
        retryAfterMs = forward.retryAfterMs;
      } else {
        if (!hasCopyableContent(message)) {
          return { kind: 'skipped', reason: `forward failed (${forward.reason}); no copyable content` };
        }

        this.logger.debug(
          { chatId: message.chatId, messageId: message.id, restricted: forward.status === 'restricted', reason: forward.reason },
          'delivery_copy_fallback'
        );

        const copy = await runStep(() => this.client.copy(message, destinationChatId));
        if (copy.status === 'ok') {
          return { kind: 'copied' };
        }
        if (copy.status !== 'transient') {
          return { kind: 'failed', reason: `forward: ${forward.reason}; copy: ${copy.reason}` };
        }
        lastReason = copy.reason;
        retryAfterMs = copy.retryAfterMs;
      }

      if (attempt >= this.maxAttempts) {
        break;
      }

      const delayMs = backoffDelay(attempt, this.baseDelayMs, this.maxDelayMs, retryAfterMs);
      this.logger.warn(
        { chatId: message.chatId, messageId: message.id, attempt, maxAttempts: this.maxAttempts, delayMs, reason: lastReason },
        'delivery_retry'
      );
      await this.sleep(delayMs);
    }

    return { kind: 'failed', reason: `gave up after ${this.maxAttempts} attempts: ${lastReason}` };
  }
}
