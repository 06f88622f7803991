import type { ChatMessage, DialogInfo, FetchQuery, TopicInfo } from './types.js';

/**
 * What the relay needs from a chat platform.
 *
 * `forward` signals failure with `DeliveryRestrictedError` (protected
 * content), `DeliveryTransientError` (network, rate limit) or
 * `DeliveryFatalError`. `copy` may throw anything; transient conditions use
 * `DeliveryTransientError` so they are retried. `fetchMessages` throws
 * `SourceFatalError` when the chat cannot be read at all.
 */
export interface ChatClient {
  listDialogs(): Promise<DialogInfo[]>;
  /** `null` when the chat has no forum topics. */
  listTopics(chatId: number): Promise<TopicInfo[] | null>;
  /** Finite, restartable, ordered by increasing message id. */
  fetchMessages(query: FetchQuery): AsyncIterable<ChatMessage>;
  forward(message: ChatMessage, destinationChatId: number): Promise<void>;
  copy(message: ChatMessage, destinationChatId: number): Promise<void>;
  sendText(chatId: number, text: string): Promise<void>;
  chatTitle(chatId: number): Promise<string | undefined>;
}
