import { ProxyAgent, fetch as undiciFetch, type Dispatcher } from 'undici';
import { z } from 'zod';
import { errorMessage } from './errors.js';
import type { AppConfig, MediaKind, MessageMedia } from './types.js';

export const UPDATE_BATCH_LIMIT = 100;

export interface HttpResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}

export type HttpTransport = (
  url: string,
  init: { method: 'POST'; headers: Record<string, string>; body: string; dispatcher?: Dispatcher }
) => Promise<HttpResponse>;

const apiResponseSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional(),
  parameters: z
    .object({
      retry_after: z.number().optional()
    })
    .passthrough()
    .optional()
});

const chatSchema = z
  .object({
    id: z.number(),
    type: z.enum(['private', 'group', 'supergroup', 'channel']),
    title: z.string().optional(),
    username: z.string().optional(),
    first_name: z.string().optional(),
    last_name: z.string().optional(),
    is_forum: z.boolean().optional()
  })
  .passthrough();

const fileSchema = z.object({ file_id: z.string() }).passthrough();

const messageSchema = z
  .object({
    message_id: z.number(),
    date: z.number(),
    chat: chatSchema,
    message_thread_id: z.number().optional(),
    is_topic_message: z.boolean().optional(),
    text: z.string().optional(),
    caption: z.string().optional(),
    photo: z.array(fileSchema).optional(),
    video: fileSchema.optional(),
    document: fileSchema.optional(),
    audio: fileSchema.optional(),
    voice: fileSchema.optional(),
    animation: fileSchema.optional(),
    forum_topic_created: z.object({ name: z.string() }).passthrough().optional()
  })
  .passthrough();

const updateSchema = z
  .object({
    update_id: z.number(),
    message: messageSchema.optional(),
    channel_post: messageSchema.optional()
  })
  .passthrough();

const updateIdSchema = z.object({ update_id: z.number() }).passthrough();

const sentSchema = z.object({ message_id: z.number() }).passthrough();

export type TelegramChat = z.infer<typeof chatSchema>;
export type TelegramMessage = z.infer<typeof messageSchema>;

export interface TelegramUpdate {
  updateId: number;
  /** Absent for update kinds the relay does not read or payloads it cannot parse. */
  message?: TelegramMessage;
}

const MEDIA_METHODS: Record<MediaKind, { method: string; field: string }> = {
  photo: { method: 'sendPhoto', field: 'photo' },
  video: { method: 'sendVideo', field: 'video' },
  document: { method: 'sendDocument', field: 'document' },
  audio: { method: 'sendAudio', field: 'audio' },
  voice: { method: 'sendVoice', field: 'voice' },
  animation: { method: 'sendAnimation', field: 'animation' }
};

export class TelegramApiError extends Error {
  constructor(
    readonly method: string,
    /** `undefined` when the request never produced a Bot API response. */
    readonly code: number | undefined,
    readonly description: string,
    readonly retryAfterSeconds?: number,
    options?: { cause?: unknown }
  ) {
    super(`Telegram ${method} failed${code === undefined ? '' : ` (${code})`}: ${description}`, options);
    this.name = 'TelegramApiError';
  }
}

export function pickMedia(message: TelegramMessage): MessageMedia | undefined {
  // the last photo size is the largest
  const photo = message.photo?.[message.photo.length - 1];
  if (photo) {
    return { kind: 'photo', fileId: photo.file_id };
  }
  if (message.animation) {
    return { kind: 'animation', fileId: message.animation.file_id };
  }
  if (message.video) {
    return { kind: 'video', fileId: message.video.file_id };
  }
  if (message.audio) {
    return { kind: 'audio', fileId: message.audio.file_id };
  }
  if (message.voice) {
    return { kind: 'voice', fileId: message.voice.file_id };
  }
  if (message.document) {
    return { kind: 'document', fileId: message.document.file_id };
  }
  return undefined;
}

export class TelegramClient {
  private readonly dispatcher?: Dispatcher;

  constructor(
    private readonly config: Pick<AppConfig, 'telegramBotToken' | 'telegramApiBase' | 'httpProxy' | 'httpsProxy'>,
    private readonly transport: HttpTransport = undiciFetch
  ) {
    const proxy = config.httpsProxy ?? config.httpProxy;
    this.dispatcher = proxy ? new ProxyAgent(proxy) : undefined;
  }

  private endpoint(method: string): string {
    return `${this.config.telegramApiBase}/bot${this.config.telegramBotToken}/${method}`;
  }

  async getUpdates(offset: number | undefined, timeoutSeconds: number): Promise<TelegramUpdate[]> {
    const payload: Record<string, unknown> = {
      timeout: timeoutSeconds,
      limit: UPDATE_BATCH_LIMIT,
      allowed_updates: ['message', 'channel_post']
    };
    if (typeof offset === 'number') {
      payload.offset = offset;
    }

    const result = await this.call('getUpdates', payload, z.array(z.unknown()));
    const updates: TelegramUpdate[] = [];
    for (const item of result) {
      const parsed = updateSchema.safeParse(item);
      if (parsed.success) {
        updates.push({ updateId: parsed.data.update_id, message: parsed.data.message ?? parsed.data.channel_post });
        continue;
      }
      const id = updateIdSchema.safeParse(item);
      if (id.success) {
        updates.push({ updateId: id.data.update_id });
      }
    }
    return updates;
  }

  async getChat(chatId: number): Promise<TelegramChat> {
    return this.call('getChat', { chat_id: chatId }, chatSchema);
  }

  async forwardMessage(chatId: number, fromChatId: number, messageId: number): Promise<number> {
    const sent = await this.call(
      'forwardMessage',
      { chat_id: chatId, from_chat_id: fromChatId, message_id: messageId },
      sentSchema
    );
    return sent.message_id;
  }

  async sendMessage(chatId: number, text: string): Promise<number> {
    const sent = await this.call('sendMessage', { chat_id: chatId, text }, sentSchema);
    return sent.message_id;
  }

  async sendMedia(chatId: number, media: MessageMedia, caption?: string): Promise<number> {
    const { method, field } = MEDIA_METHODS[media.kind];
    const payload: Record<string, unknown> = { chat_id: chatId, [field]: media.fileId };
    if (caption) {
      payload.caption = caption;
    }
    const sent = await this.call(method, payload, sentSchema);
    return sent.message_id;
  }

  private async call<T>(method: string, payload: Record<string, unknown>, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    let response: HttpResponse;
    let json: unknown;
    try {
      response = await this.transport(this.endpoint(method), {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify(payload),
        dispatcher: this.dispatcher
      });
      json = await response.json();
    } catch (error) {
      throw new TelegramApiError(method, undefined, errorMessage(error), undefined, { cause: error });
    }

    const parsed = apiResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new TelegramApiError(method, response.status, 'unexpected response body');
    }

    const body = parsed.data;
    if (!body.ok) {
      throw new TelegramApiError(
        method,
        body.error_code ?? response.status,
        body.description ?? 'ok=false',
        body.parameters?.retry_after
      );
    }

    const result = schema.safeParse(body.result);
    if (!result.success) {
      throw new TelegramApiError(method, response.status, `unexpected result shape: ${result.error.issues[0]?.message ?? 'invalid'}`);
    }
    return result.data;
  }
}
