export type FailedDeliveryPolicy = 'skip' | 'retry';

export type LogFormat = 'json' | 'pretty';

export interface AppConfig {
  telegramBotToken: string;
  telegramApiBase: string;
  httpProxy?: string;
  httpsProxy?: string;
  relayConfigPath: string;
  dbPath: string;
  pollTimeoutSeconds: number;
  runIntervalMs: number;
  firstRunLookbackHours: number;
  deliveryMaxAttempts: number;
  deliveryRetryBaseMs: number;
  deliveryRetryMaxMs: number;
  sourceConcurrency: number;
  failedDeliveryPolicy: FailedDeliveryPolicy;
  sourceHeaders: boolean;
}

export interface SourceConfig {
  chatId: number;
  topicId?: number;
  keywords: string[];
  label?: string;
}

export interface CursorKey {
  chatId: number;
  topicId: number | null;
}

export interface Cursor {
  lastMessageId?: number;
  /** ISO-8601, only consulted when `lastMessageId` is absent. */
  lastTimestamp?: string;
}

export type MediaKind = 'photo' | 'video' | 'document' | 'audio' | 'voice' | 'animation';

export interface MessageMedia {
  kind: MediaKind;
  fileId: string;
}

export interface ChatMessage {
  id: number;
  chatId: number;
  topicId?: number;
  date: Date;
  text?: string;
  caption?: string;
  media?: MessageMedia;
}

export type WindowBound = { kind: 'message'; afterId: number } | { kind: 'time'; after: Date };

export interface Window {
  lower: WindowBound;
  upper: Date;
}

export interface FetchQuery {
  chatId: number;
  topicId?: number;
  window: Window;
}

export type MatchResult = { kind: 'no_match' } | { kind: 'matched'; keyword: string };

export type DeliveryOutcome =
  | { kind: 'forwarded' }
  | { kind: 'copied' }
  | { kind: 'failed'; reason: string }
  | { kind: 'skipped'; reason: string };

export interface SourceStats {
  scanned: number;
  matched: number;
  forwarded: number;
  copied: number;
  failed: number;
  skipped: number;
  errors: string[];
}

export type SourceStatus = 'completed' | 'failed' | 'conflict' | 'cancelled';

export interface SourceResult {
  source: SourceConfig;
  status: SourceStatus;
  stats: SourceStats;
  cursorBefore?: Cursor;
  cursorAfter?: Cursor;
  error?: string;
}

export interface RunTotals {
  sources: number;
  completed: number;
  failed: number;
  conflicts: number;
  cancelled: number;
  scanned: number;
  matched: number;
  forwarded: number;
  copied: number;
  deliveryFailures: number;
  skipped: number;
}

export interface RunSummary {
  startedAt: string;
  finishedAt: string;
  totals: RunTotals;
  sources: SourceResult[];
  allFailed: boolean;
}

export type ChatType = 'private' | 'group' | 'supergroup' | 'channel';

export interface DialogInfo {
  chatId: number;
  title: string;
  type: ChatType;
  isForum: boolean;
}

export interface TopicInfo {
  topicId: number;
  title: string;
}

export interface RelayDocument {
  path: string;
  destinationChatId: number;
  sources: SourceConfig[];
}
