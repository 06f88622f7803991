import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import type { ChatMessage, ChatType, DialogInfo, FetchQuery, MediaKind, TopicInfo } from './types.js';

interface MessageRow {
  chatId: number;
  messageId: number;
  topicId: number | null;
  date: number;
  text: string | null;
  caption: string | null;
  mediaKind: string | null;
  mediaFileId: string | null;
}

interface ChatRow {
  chatId: number;
  title: string;
  type: ChatType;
  isForum: number;
}

const MEDIA_KINDS: ReadonlySet<string> = new Set<MediaKind>(['photo', 'video', 'document', 'audio', 'voice', 'animation']);

function isMediaKind(value: string): value is MediaKind {
  return MEDIA_KINDS.has(value);
}

function toChatMessage(row: MessageRow): ChatMessage {
  const message: ChatMessage = { id: row.messageId, chatId: row.chatId, date: new Date(row.date * 1000) };
  if (row.topicId !== null) {
    message.topicId = row.topicId;
  }
  if (row.text !== null) {
    message.text = row.text;
  }
  if (row.caption !== null) {
    message.caption = row.caption;
  }
  if (row.mediaKind !== null && row.mediaFileId !== null && isMediaKind(row.mediaKind)) {
    message.media = { kind: row.mediaKind, fileId: row.mediaFileId };
  }
  return message;
}

/**
 * Local record of what the bot has received. The Bot API has no history
 * endpoint, so scanning reads from here and `sync` keeps it filled.
 */
export class MessageLog {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    const directory = path.dirname(dbPath);
    if (!fs.existsSync(directory)) {
      fs.mkdirSync(directory, { recursive: true });
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.ensureSchema();
  }

  private ensureSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS messages (
        chat_id INTEGER NOT NULL,
        message_id INTEGER NOT NULL,
        topic_id INTEGER,
        date INTEGER NOT NULL,
        text TEXT,
        caption TEXT,
        media_kind TEXT,
        media_file_id TEXT,
        PRIMARY KEY (chat_id, message_id)
      );
      CREATE INDEX IF NOT EXISTS idx_messages_topic
        ON messages(chat_id, topic_id, message_id);
      CREATE TABLE IF NOT EXISTS chats (
        chat_id INTEGER PRIMARY KEY,
        title TEXT NOT NULL,
        type TEXT NOT NULL,
        is_forum INTEGER NOT NULL DEFAULT 0,
        updated_at INTEGER NOT NULL
      );
      CREATE TABLE IF NOT EXISTS topics (
        chat_id INTEGER NOT NULL,
        topic_id INTEGER NOT NULL,
        title TEXT NOT NULL,
        PRIMARY KEY (chat_id, topic_id)
      );
      CREATE TABLE IF NOT EXISTS relay_state (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at INTEGER NOT NULL
      );
    `);
  }

  /** Keeps the first copy of a message; re-delivered updates are ignored. */
  recordMessage(message: ChatMessage): void {
    this.db
      .prepare(`
        INSERT INTO messages (chat_id, message_id, topic_id, date, text, caption, media_kind, media_file_id)
        VALUES (@chatId, @messageId, @topicId, @date, @text, @caption, @mediaKind, @mediaFileId)
        ON CONFLICT(chat_id, message_id) DO NOTHING
      `)
      .run({
        chatId: message.chatId,
        messageId: message.id,
        topicId: message.topicId ?? null,
        date: Math.floor(message.date.getTime() / 1000),
        text: message.text ?? null,
        caption: message.caption ?? null,
        mediaKind: message.media?.kind ?? null,
        mediaFileId: message.media?.fileId ?? null
      });
  }

  recordChat(chat: DialogInfo): void {
    this.db
      .prepare(`
        INSERT INTO chats (chat_id, title, type, is_forum, updated_at)
        VALUES (?, ?, ?, ?, ?)
        ON CONFLICT(chat_id)
        DO UPDATE SET title = excluded.title, type = excluded.type,
          is_forum = MAX(chats.is_forum, excluded.is_forum), updated_at = excluded.updated_at
      `)
      .run(chat.chatId, chat.title, chat.type, chat.isForum ? 1 : 0, Date.now());
  }

  recordTopic(chatId: number, topic: TopicInfo): void {
    this.db
      .prepare(`
        INSERT INTO topics (chat_id, topic_id, title)
        VALUES (?, ?, ?)
        ON CONFLICT(chat_id, topic_id) DO UPDATE SET title = excluded.title
      `)
      .run(chatId, topic.topicId, topic.title);
  }

  /**
   * One page of messages inside the query window, ordered by id and starting
   * after `afterId`. Callers page by passing the last id they received.
   */
  page(query: FetchQuery, afterId: number, limit: number): ChatMessage[] {
    const { lower, upper } = query.window;
    const rows = this.db
      .prepare(`
        SELECT chat_id as chatId, message_id as messageId, topic_id as topicId, date, text, caption,
          media_kind as mediaKind, media_file_id as mediaFileId
        FROM messages
        WHERE chat_id = @chatId
          AND (@topicId IS NULL OR topic_id = @topicId)
          AND message_id > @afterId
          AND (@afterDate IS NULL OR date > @afterDate)
          AND date <= @upperDate
        ORDER BY message_id ASC
        LIMIT @limit
      `)
      .all({
        chatId: query.chatId,
        topicId: query.topicId ?? null,
        afterId: lower.kind === 'message' ? Math.max(afterId, lower.afterId) : afterId,
        afterDate: lower.kind === 'time' ? Math.floor(lower.after.getTime() / 1000) : null,
        upperDate: Math.floor(upper.getTime() / 1000),
        limit
      }) as MessageRow[];

    return rows.map(toChatMessage);
  }

  listChats(): DialogInfo[] {
    const rows = this.db
      .prepare(`
        SELECT chat_id as chatId, title, type, is_forum as isForum
        FROM chats
        ORDER BY title COLLATE NOCASE, chat_id
      `)
      .all() as ChatRow[];

    return rows.map((row) => ({ chatId: row.chatId, title: row.title, type: row.type, isForum: row.isForum === 1 }));
  }

  getChat(chatId: number): DialogInfo | undefined {
    const row = this.db
      .prepare('SELECT chat_id as chatId, title, type, is_forum as isForum FROM chats WHERE chat_id = ? LIMIT 1')
      .get(chatId) as ChatRow | undefined;

    return row ? { chatId: row.chatId, title: row.title, type: row.type, isForum: row.isForum === 1 } : undefined;
  }

  listTopics(chatId: number): TopicInfo[] {
    return this.db
      .prepare('SELECT topic_id as topicId, title FROM topics WHERE chat_id = ? ORDER BY topic_id')
      .all(chatId) as TopicInfo[];
  }

  /** Topic ids seen on messages, including topics whose creation the bot never saw. */
  listSeenTopicIds(chatId: number): number[] {
    const rows = this.db
      .prepare('SELECT DISTINCT topic_id as topicId FROM messages WHERE chat_id = ? AND topic_id IS NOT NULL ORDER BY topic_id')
      .all(chatId) as Array<{ topicId: number }>;

    return rows.map((row) => row.topicId);
  }

  transaction(work: () => void): void {
    this.db.transaction(work)();
  }

  getOffset(): number {
    const row = this.db
      .prepare('SELECT value FROM relay_state WHERE key = ? LIMIT 1')
      .get('telegram_offset') as { value: string } | undefined;

    return row ? Number(row.value) : 0;
  }

  setOffset(offset: number): number {
    const now = Date.now();
    this.db
      .prepare(`
        INSERT INTO relay_state (key, value, updated_at)
        VALUES (?, ?, ?)
        ON CONFLICT(key)
        DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
      `)
      .run('telegram_offset', String(offset), now);

    return offset;
  }

  close(): void {
    this.db.close();
  }
}
