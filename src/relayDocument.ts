import fs from 'node:fs/promises';
import path from 'node:path';
import { Document, parseDocument } from 'yaml';
import { z } from 'zod';
import { cursorKeyString, sourceCursorKey } from './cursor.js';
import { ConfigError, errnoCode } from './errors.js';
import type { Logger } from './logger.js';
import { normalizeKeywords } from './matcher.js';
import type { Cursor, CursorKey, RelayDocument, SourceConfig } from './types.js';

const sourceSchema = z
  .object({
    chat_id: z.number().int(),
    topic_id: z.number().int().nullable().optional(),
    label: z.string().trim().min(1).optional(),
    keywords: z
      .array(z.string())
      .transform((values) => normalizeKeywords(values))
      .refine((values) => values.length > 0, 'must contain at least one non-empty keyword'),
    cursor: z.unknown().optional()
  })
  .passthrough();

const documentSchema = z
  .object({
    destination_chat_id: z.number().int(),
    sources: z.array(sourceSchema)
  })
  .passthrough();

type RawSource = z.infer<typeof sourceSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export async function readYamlDocument(documentPath: string): Promise<Document> {
  let content: string;
  try {
    content = await fs.readFile(documentPath, 'utf8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      throw new ConfigError(`Relay config not found at ${documentPath}`, { cause: error });
    }
    throw new ConfigError(`Unable to read relay config at ${documentPath}`, { cause: error });
  }

  if (!content.trim()) {
    throw new ConfigError(`Relay config at ${documentPath} is empty`);
  }

  const doc = parseDocument(content);
  if (doc.errors.length > 0) {
    throw new ConfigError(`Relay config at ${documentPath} is not valid YAML: ${doc.errors[0]?.message ?? 'parse error'}`);
  }
  return doc;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function toSourceConfig(raw: RawSource): SourceConfig {
  const source: SourceConfig = { chatId: raw.chat_id, keywords: raw.keywords };
  if (typeof raw.topic_id === 'number') {
    source.topicId = raw.topic_id;
  }
  if (raw.label) {
    source.label = raw.label;
  }
  return source;
}

/**
 * Lenient cursor parsing: invalid fields are dropped and reported through
 * `onInvalid` instead of failing the whole document.
 */
export function parseCursor(raw: unknown, onInvalid?: (field: string) => void): Cursor | undefined {
  if (raw === undefined || raw === null) {
    return undefined;
  }
  if (!isRecord(raw)) {
    onInvalid?.('cursor');
    return undefined;
  }

  const record = raw;
  const cursor: Cursor = {};

  const lastMessageId = record.last_message_id;
  if (typeof lastMessageId === 'number' && Number.isSafeInteger(lastMessageId) && lastMessageId >= 0) {
    cursor.lastMessageId = lastMessageId;
  } else if (lastMessageId !== undefined && lastMessageId !== null) {
    onInvalid?.('cursor.last_message_id');
  }

  const lastTimestamp = record.last_timestamp;
  if (typeof lastTimestamp === 'string' || lastTimestamp instanceof Date) {
    const parsed = new Date(lastTimestamp);
    if (Number.isNaN(parsed.getTime())) {
      onInvalid?.('cursor.last_timestamp');
    } else {
      cursor.lastTimestamp = parsed.toISOString();
    }
  } else if (lastTimestamp !== undefined && lastTimestamp !== null) {
    onInvalid?.('cursor.last_timestamp');
  }

  if (cursor.lastMessageId === undefined && cursor.lastTimestamp === undefined) {
    return undefined;
  }
  return cursor;
}

export function cursorToRaw(cursor: Cursor): Record<string, string | number> {
  const raw: Record<string, string | number> = {};
  if (cursor.lastMessageId !== undefined) {
    raw.last_message_id = cursor.lastMessageId;
  }
  if (cursor.lastTimestamp !== undefined) {
    raw.last_timestamp = cursor.lastTimestamp;
  }
  return raw;
}

export function ensureUniqueSources(sources: readonly SourceConfig[]): void {
  const seen = new Set<string>();
  for (const source of sources) {
    const key = cursorKeyString(sourceCursorKey(source));
    if (seen.has(key)) {
      throw new ConfigError(
        `Duplicate source configuration for chat_id=${source.chatId}, topic_id=${source.topicId ?? 'none'}`
      );
    }
    seen.add(key);
  }
}

/** Finds the `sources[]` entry for a key; the index addresses the same item in the YAML node tree. */
export function locateSource(doc: Document, key: CursorKey): { index: number; raw: Record<string, unknown> } | undefined {
  const js: unknown = doc.toJS();
  if (!isRecord(js) || !Array.isArray(js.sources)) {
    return undefined;
  }

  for (const [index, raw] of js.sources.entries()) {
    if (!isRecord(raw)) {
      continue;
    }
    const topicId = typeof raw.topic_id === 'number' ? raw.topic_id : null;
    if (raw.chat_id === key.chatId && topicId === key.topicId) {
      return { index, raw };
    }
  }
  return undefined;
}

async function warnOnPermissions(documentPath: string, logger?: Logger): Promise<void> {
  if (process.platform === 'win32' || !logger) {
    return;
  }
  const stat = await fs.stat(documentPath);
  if ((stat.mode & 0o077) !== 0) {
    logger.warn({ path: documentPath }, 'config_permissions_broad');
  }
}

export async function loadRelayDocument(documentPath: string, logger?: Logger): Promise<RelayDocument> {
  const absolute = path.resolve(documentPath);
  const doc = await readYamlDocument(absolute);
  const parsed = documentSchema.safeParse(doc.toJS());
  if (!parsed.success) {
    throw new ConfigError(`Invalid relay config at ${absolute}: ${formatIssues(parsed.error)}`);
  }

  const sources = parsed.data.sources.map(toSourceConfig);
  ensureUniqueSources(sources);

  // cursors are read through the cursor store; here they are only checked
  parsed.data.sources.forEach((raw, index) => {
    parseCursor(raw.cursor, (field) => {
      logger?.warn({ source: index, field }, 'config_cursor_invalid');
    });
  });

  await warnOnPermissions(absolute, logger);

  return {
    path: absolute,
    destinationChatId: parsed.data.destination_chat_id,
    sources
  };
}

/** Writes to a sibling temp file, fsyncs, then renames over the target, keeping its mode. */
export async function writeFileAtomic(targetPath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(targetPath), { recursive: true });
  const tmpPath = `${targetPath}.${process.pid}.${Date.now()}.tmp`;

  let mode: number | undefined;
  try {
    mode = (await fs.stat(targetPath)).mode & 0o777;
  } catch (error) {
    if (errnoCode(error) !== 'ENOENT') {
      throw error;
    }
  }

  const handle = await fs.open(tmpPath, 'w', mode ?? 0o600);
  try {
    await handle.writeFile(content, 'utf8');
    await handle.sync();
  } finally {
    await handle.close();
  }

  try {
    await fs.rename(tmpPath, targetPath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true });
    throw error;
  }
}
