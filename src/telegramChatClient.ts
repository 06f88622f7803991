import type { ChatClient } from './chatClient.js';
import {
  DeliveryFatalError,
  DeliveryRestrictedError,
  DeliveryTransientError,
  SourceFatalError,
  errorMessage
} from './errors.js';
import { createLogger, type Logger } from './logger.js';
import type { MessageLog } from './messageLog.js';
import { TelegramApiError, UPDATE_BATCH_LIMIT, pickMedia, type TelegramChat, type TelegramClient, type TelegramMessage } from './telegram.js';
import type { ChatMessage, DialogInfo, FetchQuery, TopicInfo } from './types.js';

export type TelegramErrorClass = 'transient' | 'restricted' | 'fatal';

const RESTRICTED_RE = /can't be forwarded|cannot be forwarded|protected content|has_protected_content/i;

export function classifyTelegramError(error: unknown): TelegramErrorClass {
  if (!(error instanceof TelegramApiError)) {
    return 'fatal';
  }
  if (error.code === undefined || error.code === 429 || error.code >= 500) {
    return 'transient';
  }
  if (error.code === 400 && RESTRICTED_RE.test(error.description)) {
    return 'restricted';
  }
  return 'fatal';
}

function retryAfterMs(error: unknown): number | undefined {
  return error instanceof TelegramApiError && error.retryAfterSeconds !== undefined
    ? error.retryAfterSeconds * 1000
    : undefined;
}

export function toDialog(chat: TelegramChat): DialogInfo {
  const personal = [chat.first_name, chat.last_name].filter(Boolean).join(' ');
  const title = chat.title?.trim() || personal || chat.username || String(chat.id);
  return { chatId: chat.id, title, type: chat.type, isForum: chat.is_forum ?? false };
}

export function toChatMessage(raw: TelegramMessage): ChatMessage {
  const message: ChatMessage = { id: raw.message_id, chatId: raw.chat.id, date: new Date(raw.date * 1000) };
  // outside forums message_thread_id marks reply threads, not topics
  if (raw.is_topic_message && raw.message_thread_id !== undefined) {
    message.topicId = raw.message_thread_id;
  }
  if (raw.text !== undefined) {
    message.text = raw.text;
  }
  if (raw.caption !== undefined) {
    message.caption = raw.caption;
  }
  const media = pickMedia(raw);
  if (media) {
    message.media = media;
  }
  return message;
}

/** Bot API backed chat client. Messages are scanned from the local log filled by `sync`. */
export class TelegramChatClient implements ChatClient {
  private readonly pageSize: number;

  private readonly logger: Logger;

  constructor(
    private readonly telegram: TelegramClient,
    private readonly log: MessageLog,
    options: { pageSize?: number; logger?: Logger } = {}
  ) {
    this.pageSize = options.pageSize ?? 200;
    this.logger = options.logger ?? createLogger('telegram');
  }

  /** Pulls pending updates into the log. Returns the number of messages stored. */
  async sync(timeoutSeconds = 0): Promise<number> {
    let offset = this.log.getOffset();
    let stored = 0;

    for (;;) {
      const updates = await this.telegram.getUpdates(offset || undefined, timeoutSeconds);
      if (updates.length === 0) {
        break;
      }

      this.log.transaction(() => {
        for (const update of updates) {
          if (update.message) {
            this.ingest(update.message);
            stored += 1;
          }
          offset = Math.max(offset, update.updateId + 1);
        }
        this.log.setOffset(offset);
      });

      if (updates.length < UPDATE_BATCH_LIMIT) {
        break;
      }
    }

    this.logger.info({ stored, offset }, 'sync_done');
    return stored;
  }

  private ingest(raw: TelegramMessage): void {
    this.log.recordChat(toDialog(raw.chat));
    const message = toChatMessage(raw);
    if (raw.forum_topic_created && message.topicId !== undefined) {
      this.log.recordTopic(message.chatId, { topicId: message.topicId, title: raw.forum_topic_created.name });
    }
    this.log.recordMessage(message);
  }

  async listDialogs(): Promise<DialogInfo[]> {
    return this.log.listChats();
  }

  async listTopics(chatId: number): Promise<TopicInfo[] | null> {
    const chat = this.log.getChat(chatId);
    if (!chat?.isForum) {
      return null;
    }
    return this.log.listTopics(chatId);
  }

  /** Topic ids observed on messages that never had a named topic recorded. */
  async unnamedTopicIds(chatId: number): Promise<number[]> {
    const named = new Set(this.log.listTopics(chatId).map((topic) => topic.topicId));
    return this.log.listSeenTopicIds(chatId).filter((topicId) => !named.has(topicId));
  }

  async *fetchMessages(query: FetchQuery): AsyncGenerator<ChatMessage> {
    await this.ensureReachable(query.chatId);

    let afterId = 0;
    for (;;) {
      const page = this.log.page(query, afterId, this.pageSize);
      for (const message of page) {
        afterId = message.id;
        yield message;
      }
      if (page.length < this.pageSize) {
        return;
      }
    }
  }

  private async ensureReachable(chatId: number): Promise<void> {
    try {
      const chat = await this.telegram.getChat(chatId);
      this.log.recordChat(toDialog(chat));
    } catch (error) {
      if (error instanceof TelegramApiError && (error.code === 400 || error.code === 401 || error.code === 403)) {
        throw new SourceFatalError(`Chat ${chatId} is not reachable: ${error.description}`, { cause: error });
      }
      throw error;
    }
  }

  async forward(message: ChatMessage, destinationChatId: number): Promise<void> {
    try {
      await this.telegram.forwardMessage(destinationChatId, message.chatId, message.id);
    } catch (error) {
      const kind = classifyTelegramError(error);
      if (kind === 'transient') {
        throw new DeliveryTransientError(errorMessage(error), { cause: error, retryAfterMs: retryAfterMs(error) });
      }
      if (kind === 'restricted') {
        throw new DeliveryRestrictedError(errorMessage(error), { cause: error });
      }
      throw new DeliveryFatalError(errorMessage(error), { cause: error });
    }
  }

  async copy(message: ChatMessage, destinationChatId: number): Promise<void> {
    try {
      if (message.media) {
        await this.telegram.sendMedia(destinationChatId, message.media, message.caption ?? message.text);
        return;
      }
      const text = message.text ?? message.caption;
      if (!text) {
        throw new DeliveryFatalError(`Message ${message.id} has no copyable content`);
      }
      await this.telegram.sendMessage(destinationChatId, text);
    } catch (error) {
      if (classifyTelegramError(error) === 'transient') {
        throw new DeliveryTransientError(errorMessage(error), { cause: error, retryAfterMs: retryAfterMs(error) });
      }
      throw error;
    }
  }

  async sendText(chatId: number, text: string): Promise<void> {
    await this.telegram.sendMessage(chatId, text);
  }

  async chatTitle(chatId: number): Promise<string | undefined> {
    return this.log.getChat(chatId)?.title;
  }
}
