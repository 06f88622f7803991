import path from 'node:path';
import { cursorKeyString, sameCursor } from './cursor.js';
import { cursorToRaw, locateSource, parseCursor, readYamlDocument, writeFileAtomic } from './relayDocument.js';
import type { Cursor, CursorKey } from './types.js';

export type CursorWriteResult = 'written' | 'conflict';

/**
 * Sole owner of cursor state. `compareAndWrite` only succeeds when the stored
 * cursor still equals `expected`, so two runners can never silently overwrite
 * each other's progress.
 */
export interface CursorStore {
  read(key: CursorKey): Promise<Cursor | undefined>;
  compareAndWrite(key: CursorKey, expected: Cursor | undefined, next: Cursor): Promise<CursorWriteResult>;
}

export class InMemoryCursorStore implements CursorStore {
  private readonly cursors = new Map<string, Cursor>();

  constructor(initial: Iterable<[CursorKey, Cursor]> = []) {
    for (const [key, cursor] of initial) {
      this.cursors.set(cursorKeyString(key), { ...cursor });
    }
  }

  async read(key: CursorKey): Promise<Cursor | undefined> {
    const cursor = this.cursors.get(cursorKeyString(key));
    return cursor ? { ...cursor } : undefined;
  }

  async compareAndWrite(key: CursorKey, expected: Cursor | undefined, next: Cursor): Promise<CursorWriteResult> {
    const id = cursorKeyString(key);
    if (!sameCursor(this.cursors.get(id), expected)) {
      return 'conflict';
    }
    this.cursors.set(id, { ...next });
    return 'written';
  }
}

/**
 * Keeps cursors inside the relay YAML document, next to the source they
 * belong to. Every write re-reads the document, compares, edits the node tree
 * (comments and unknown keys survive) and replaces the file atomically.
 */
export class DocumentCursorStore implements CursorStore {
  private readonly documentPath: string;

  private queue: Promise<unknown> = Promise.resolve();

  constructor(documentPath: string) {
    this.documentPath = path.resolve(documentPath);
  }

  async read(key: CursorKey): Promise<Cursor | undefined> {
    const doc = await readYamlDocument(this.documentPath);
    return parseCursor(locateSource(doc, key)?.raw.cursor);
  }

  compareAndWrite(key: CursorKey, expected: Cursor | undefined, next: Cursor): Promise<CursorWriteResult> {
    return this.exclusive(async () => {
      const doc = await readYamlDocument(this.documentPath);
      const located = locateSource(doc, key);
      if (!located) {
        return 'conflict';
      }
      if (!sameCursor(parseCursor(located.raw.cursor), expected)) {
        return 'conflict';
      }

      doc.setIn(['sources', located.index, 'cursor'], doc.createNode(cursorToRaw(next)));
      await writeFileAtomic(this.documentPath, doc.toString());
      return 'written';
    });
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    // the caller observes failures through `run`; the queue only needs ordering
    this.queue = run.catch(() => undefined);
    return run;
  }
}
