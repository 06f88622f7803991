import type { ChatMessage, Cursor, CursorKey, SourceConfig } from './types.js';

export function sourceCursorKey(source: Pick<SourceConfig, 'chatId' | 'topicId'>): CursorKey {
  return { chatId: source.chatId, topicId: source.topicId ?? null };
}

export function cursorKeyString(key: CursorKey): string {
  return `${key.chatId}:${key.topicId ?? '*'}`;
}

function timestampMs(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? undefined : ms;
}

export function sameCursor(a: Cursor | undefined, b: Cursor | undefined): boolean {
  return a?.lastMessageId === b?.lastMessageId && timestampMs(a?.lastTimestamp) === timestampMs(b?.lastTimestamp);
}

/** Folds a scanned position into a cursor. Each field only ever moves forward. */
export function advanceCursor(current: Cursor | undefined, position: Pick<ChatMessage, 'id' | 'date'>): Cursor {
  const lastMessageId =
    current?.lastMessageId === undefined ? position.id : Math.max(current.lastMessageId, position.id);

  const currentMs = timestampMs(current?.lastTimestamp);
  const positionMs = position.date.getTime();
  const lastTimestamp =
    currentMs !== undefined && currentMs >= positionMs ? new Date(currentMs).toISOString() : position.date.toISOString();

  return { lastMessageId, lastTimestamp };
}
