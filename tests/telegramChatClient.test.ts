import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { DeliveryFatalError, DeliveryRestrictedError, DeliveryTransientError, SourceFatalError } from '../src/errors.js';
import { MessageLog } from '../src/messageLog.js';
import { TelegramApiError, TelegramClient, type HttpTransport } from '../src/telegram.js';
import { TelegramChatClient, classifyTelegramError } from '../src/telegramChatClient.js';
import type { ChatMessage, FetchQuery } from '../src/types.js';
import { planWindow } from '../src/window.js';

type Reply = { status?: number; body: unknown } | Error;

interface Call {
  method: string;
  body: unknown;
}

const logs: MessageLog[] = [];
const directories: string[] = [];

function setup(replies: Record<string, Reply[]>) {
  const calls: Call[] = [];
  const transport: HttpTransport = async (url, init) => {
    const method = url.slice(url.lastIndexOf('/') + 1);
    calls.push({ method, body: JSON.parse(init.body) });
    const reply = replies[method]?.shift();
    if (!reply) {
      throw new Error(`unexpected ${method}`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    const status = reply.status ?? 200;
    return { ok: status < 400, status, json: async () => reply.body };
  };

  const directory = fs.mkdtempSync(path.join(os.tmpdir(), 'relay-telegram-test-'));
  directories.push(directory);
  const log = new MessageLog(path.join(directory, 'messages.sqlite'));
  logs.push(log);

  const telegram = new TelegramClient(
    { telegramBotToken: 'test-secret', telegramApiBase: 'https://api.telegram.test' },
    transport
  );
  return { client: new TelegramChatClient(telegram, log), log, calls };
}

afterEach(() => {
  for (const log of logs.splice(0, logs.length)) {
    log.close();
  }
  for (const directory of directories.splice(0, directories.length)) {
    fs.rmSync(directory, { recursive: true, force: true });
  }
});

async function collect(iterable: AsyncIterable<ChatMessage>): Promise<number[]> {
  const ids: number[] = [];
  for await (const message of iterable) {
    ids.push(message.id);
  }
  return ids;
}

const forum = { id: -100, type: 'supergroup', title: 'Dev', is_forum: true };
const at = 1773136800; // 2026-03-10T10:00:00Z
const now = new Date('2026-03-10T12:00:00.000Z');

const ok = (result: unknown): Reply => ({ body: { ok: true, result } });
const fail = (status: number, description: string, retryAfter?: number): Reply => ({
  status,
  body: {
    ok: false,
    error_code: status,
    description,
    ...(retryAfter === undefined ? {} : { parameters: { retry_after: retryAfter } })
  }
});

describe('TelegramChatClient.sync', () => {
  it('stores messages from updates and advances the offset', async () => {
    const { client, log, calls } = setup({
      getUpdates: [
        ok([
          {
            update_id: 10,
            message: {
              message_id: 5,
              date: at,
              chat: forum,
              message_thread_id: 7,
              is_topic_message: true,
              forum_topic_created: { name: 'Releases' }
            }
          },
          {
            update_id: 11,
            message: { message_id: 6, date: at + 60, chat: forum, message_thread_id: 7, is_topic_message: true, text: 'release v2' }
          },
          { update_id: 12, edited_message: { message_id: 6 } },
          { unexpected: true }
        ]),
        ok([])
      ]
    });

    await expect(client.sync()).resolves.toBe(2);
    expect(log.getOffset()).toBe(13);
    expect(calls[0]?.body).toEqual({ timeout: 0, limit: 100, allowed_updates: ['message', 'channel_post'] });

    await expect(client.sync()).resolves.toBe(0);
    expect(calls[1]?.body).toEqual({ timeout: 0, limit: 100, allowed_updates: ['message', 'channel_post'], offset: 13 });

    await expect(client.listDialogs()).resolves.toEqual([{ chatId: -100, title: 'Dev', type: 'supergroup', isForum: true }]);
    await expect(client.listTopics(-100)).resolves.toEqual([{ topicId: 7, title: 'Releases' }]);
    await expect(client.chatTitle(-100)).resolves.toBe('Dev');
  });
});

describe('TelegramChatClient.fetchMessages', () => {
  const query: FetchQuery = { chatId: -100, topicId: 7, window: planWindow(undefined, now) };

  it('pages through logged messages in id order', async () => {
    const { client, log } = setup({ getChat: [ok(forum)] });
    for (const id of [3, 1, 2]) {
      log.recordMessage({ id, chatId: -100, topicId: 7, date: new Date((at + id) * 1000), text: `m${id}` });
    }
    log.recordMessage({ id: 4, chatId: -100, topicId: 8, date: new Date(at * 1000), text: 'other topic' });

    const paged = new TelegramChatClient(
      new TelegramClient({ telegramBotToken: 'test-secret', telegramApiBase: 'https://api.telegram.test' }, async () => ({
        ok: true,
        status: 200,
        json: async () => ({ ok: true, result: forum })
      })),
      log,
      { pageSize: 2 }
    );

    await expect(collect(paged.fetchMessages(query))).resolves.toEqual([1, 2, 3]);
    await expect(collect(client.fetchMessages(query))).resolves.toEqual([1, 2, 3]);
  });

  it('raises a source error when the bot cannot read the chat', async () => {
    const { client } = setup({ getChat: [fail(403, 'Forbidden: bot was kicked from the supergroup chat')] });

    const run = collect(client.fetchMessages(query));
    await expect(run).rejects.toBeInstanceOf(SourceFatalError);
    await expect(run).rejects.toThrow('Chat -100 is not reachable: Forbidden: bot was kicked from the supergroup chat');
  });
});

describe('TelegramChatClient delivery', () => {
  const message: ChatMessage = { id: 5, chatId: -100, date: new Date(at * 1000), text: 'hiring' };

  it('maps forward failures to delivery errors', async () => {
    const { client } = setup({
      forwardMessage: [
        fail(400, "Bad Request: message can't be forwarded"),
        fail(429, 'Too Many Requests: retry after 3', 3),
        fail(400, 'Bad Request: chat not found'),
        new Error('socket hang up')
      ]
    });

    await expect(client.forward(message, -200)).rejects.toBeInstanceOf(DeliveryRestrictedError);

    const limited = await client.forward(message, -200).catch((error: unknown) => error);
    expect(limited).toBeInstanceOf(DeliveryTransientError);
    expect(limited instanceof DeliveryTransientError ? limited.retryAfterMs : undefined).toBe(3000);

    await expect(client.forward(message, -200)).rejects.toThrow(
      new DeliveryFatalError('Telegram forwardMessage failed (400): Bad Request: chat not found')
    );
    await expect(client.forward(message, -200)).rejects.toThrow('Telegram forwardMessage failed: socket hang up');
  });

  it('copies media with its caption and text as a message', async () => {
    const { client, calls } = setup({ sendPhoto: [ok({ message_id: 90 })], sendMessage: [ok({ message_id: 91 })] });

    await client.copy({ ...message, text: undefined, caption: 'hiring poster', media: { kind: 'photo', fileId: 'file-1' } }, -200);
    await client.copy(message, -200);

    expect(calls).toEqual([
      { method: 'sendPhoto', body: { chat_id: -200, photo: 'file-1', caption: 'hiring poster' } },
      { method: 'sendMessage', body: { chat_id: -200, text: 'hiring' } }
    ]);
  });

  it('refuses to copy a message without content', async () => {
    const { client, calls } = setup({});

    await expect(client.copy({ id: 9, chatId: -100, date: new Date() }, -200)).rejects.toThrow('Message 9 has no copyable content');
    expect(calls).toEqual([]);
  });
});

describe('classifyTelegramError', () => {
  it('classifies by status code', () => {
    expect(classifyTelegramError(new TelegramApiError('sendMessage', 502, 'Bad Gateway'))).toBe('transient');
    expect(classifyTelegramError(new TelegramApiError('sendMessage', undefined, 'timeout'))).toBe('transient');
    expect(classifyTelegramError(new TelegramApiError('forwardMessage', 400, 'Bad Request: message has protected content'))).toBe(
      'restricted'
    );
    expect(classifyTelegramError(new TelegramApiError('sendMessage', 403, 'Forbidden'))).toBe('fatal');
    expect(classifyTelegramError(new Error('other'))).toBe('fatal');
  });
});
