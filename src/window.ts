import type { ChatMessage, Cursor, Window } from './types.js';

export const DEFAULT_LOOKBACK_HOURS = 24;

const HOUR_MS = 60 * 60 * 1000;

export function planWindow(cursor: Cursor | undefined, now: Date, lookbackHours = DEFAULT_LOOKBACK_HOURS): Window {
  if (cursor?.lastMessageId !== undefined) {
    return { lower: { kind: 'message', afterId: cursor.lastMessageId }, upper: now };
  }

  if (cursor?.lastTimestamp !== undefined) {
    const after = new Date(cursor.lastTimestamp);
    if (!Number.isNaN(after.getTime())) {
      return { lower: { kind: 'time', after }, upper: now };
    }
  }

  return {
    lower: { kind: 'time', after: new Date(now.getTime() - lookbackHours * HOUR_MS) },
    upper: now
  };
}

export function isInWindow(window: Window, message: Pick<ChatMessage, 'id' | 'date'>): boolean {
  if (message.date.getTime() > window.upper.getTime()) {
    return false;
  }
  if (window.lower.kind === 'message') {
    return message.id > window.lower.afterId;
  }
  return message.date.getTime() > window.lower.after.getTime();
}

export function describeWindow(window: Window): Record<string, string | number> {
  return window.lower.kind === 'message'
    ? { afterMessageId: window.lower.afterId, upper: window.upper.toISOString() }
    : { after: window.lower.after.toISOString(), upper: window.upper.toISOString() };
}
