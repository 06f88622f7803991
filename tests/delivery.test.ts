import { describe, expect, it } from 'vitest';
import { DeliveryEngine, backoffDelay, hasCopyableContent } from '../src/delivery.js';
import { DeliveryTransientError } from '../src/errors.js';
import type { ChatMessage } from '../src/types.js';
import { FakeChatClient, message } from './support/fakeChatClient.js';

const DEST = -200;

function makeEngine(client: FakeChatClient, maxAttempts = 5) {
  const sleeps: number[] = [];
  const engine = new DeliveryEngine(client, {
    maxAttempts,
    baseDelayMs: 10,
    maxDelayMs: 100,
    sleep: async (ms) => {
      sleeps.push(ms);
    }
  });
  return { engine, sleeps };
}

const text = message(7, -100, '2026-03-10T10:00:00.000Z', { text: 'hiring now' });

/** Rejects forwards with a flood wait until its clock reaches `banUntil`. */
class FloodedChatClient extends FakeChatClient {
  clock = 0;

  forwardsDuringBan = 0;

  constructor(private readonly banUntil: number) {
    super();
  }

  override async forward(message: ChatMessage, destinationChatId: number): Promise<void> {
    if (this.clock < this.banUntil) {
      this.forwardsDuringBan += 1;
      throw new DeliveryTransientError('Too Many Requests', { retryAfterMs: this.banUntil - this.clock });
    }
    await super.forward(message, destinationChatId);
  }
}

describe('DeliveryEngine', () => {
  it('forwards when allowed', async () => {
    const client = new FakeChatClient();
    const { engine } = makeEngine(client);

    await expect(engine.deliver(text, DEST)).resolves.toEqual({ kind: 'forwarded' });
    expect(client.actions).toEqual([{ kind: 'forward', messageId: 7, destination: DEST }]);
  });

  it('copies when forwarding is restricted', async () => {
    const client = new FakeChatClient();
    client.forwardScript.set(7, ['restricted']);
    const { engine } = makeEngine(client);

    await expect(engine.deliver(text, DEST)).resolves.toEqual({ kind: 'copied' });
    expect(client.actions).toEqual([{ kind: 'copy', messageId: 7, destination: DEST }]);
  });

  it('retries transient failures with exponential backoff and sends once', async () => {
    const client = new FakeChatClient();
    client.forwardScript.set(7, ['transient', 'transient']);
    const { engine, sleeps } = makeEngine(client);

    await expect(engine.deliver(text, DEST)).resolves.toEqual({ kind: 'forwarded' });
    expect(sleeps).toEqual([10, 20]);
    expect(client.actions).toHaveLength(1);
  });

  it('waits out a flood wait longer than the delay cap', async () => {
    const client = new FloodedChatClient(200_000);
    const sleeps: number[] = [];
    const engine = new DeliveryEngine(client, {
      maxAttempts: 5,
      baseDelayMs: 1000,
      maxDelayMs: 30_000,
      sleep: async (ms) => {
        sleeps.push(ms);
        client.clock += ms;
      }
    });

    await expect(engine.deliver(text, DEST)).resolves.toEqual({ kind: 'forwarded' });
    expect(sleeps).toEqual([200_000]);
    expect(client.forwardsDuringBan).toBe(1);
    expect(client.actions).toEqual([{ kind: 'forward', messageId: 7, destination: DEST }]);
  });

  it('gives up after the configured attempts', async () => {
    const client = new FakeChatClient();
    client.forwardScript.set(7, ['transient', 'transient', 'transient']);
    const { engine, sleeps } = makeEngine(client, 3);

    await expect(engine.deliver(text, DEST)).resolves.toEqual({
      kind: 'failed',
      reason: 'gave up after 3 attempts: rate limited'
    });
    expect(sleeps).toEqual([10, 20]);
    expect(client.actions).toEqual([]);
  });

  it('retries a transient copy failure', async () => {
    const client = new FakeChatClient();
    client.forwardScript.set(7, ['restricted', 'restricted']);
    client.copyScript.set(7, ['transient']);
    const { engine, sleeps } = makeEngine(client);

    await expect(engine.deliver(text, DEST)).resolves.toEqual({ kind: 'copied' });
    expect(sleeps).toEqual([10]);
    expect(client.actions).toEqual([{ kind: 'copy', messageId: 7, destination: DEST }]);
  });

  it('reports both reasons when forward and copy fail permanently', async () => {
    const client = new FakeChatClient();
    client.forwardScript.set(7, ['fatal']);
    client.copyScript.set(7, ['fatal']);
    const { engine } = makeEngine(client);

    await expect(engine.deliver(text, DEST)).resolves.toEqual({
      kind: 'failed',
      reason: 'forward: chat not found; copy: chat not found'
    });
  });

  it('skips a message with nothing to copy', async () => {
    const client = new FakeChatClient();
    client.forwardScript.set(8, ['restricted']);
    const { engine } = makeEngine(client);
    const empty = message(8, -100, '2026-03-10T10:00:00.000Z');

    await expect(engine.deliver(empty, DEST)).resolves.toEqual({
      kind: 'skipped',
      reason: 'forward failed (protected content); no copyable content'
    });
    expect(client.actions).toEqual([]);
  });
});

describe('backoffDelay', () => {
  it('caps the exponential delay', () => {
    expect(backoffDelay(1, 10, 100)).toBe(10);
    expect(backoffDelay(4, 10, 100)).toBe(80);
    expect(backoffDelay(5, 10, 100)).toBe(100);
  });

  it('waits at least the server-provided retry-after, even past the cap', () => {
    expect(backoffDelay(1, 10, 100, 50)).toBe(50);
    expect(backoffDelay(1, 10, 100, 500)).toBe(500);
    expect(backoffDelay(3, 10, 100, 5)).toBe(40);
  });
});

describe('hasCopyableContent', () => {
  it('needs media or non-blank text', () => {
    expect(hasCopyableContent(message(1, 1, '2026-01-01T00:00:00Z', { text: '  ' }))).toBe(false);
    expect(hasCopyableContent(message(1, 1, '2026-01-01T00:00:00Z', { caption: 'c' }))).toBe(true);
    expect(hasCopyableContent(message(1, 1, '2026-01-01T00:00:00Z', { media: { kind: 'photo', fileId: 'f' } }))).toBe(true);
  });
});
