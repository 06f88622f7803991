import type { ChatClient } from './chatClient.js';

export interface ChatListingClient extends Pick<ChatClient, 'listDialogs' | 'listTopics'> {
  unnamedTopicIds?(chatId: number): Promise<number[]>;
}

function clean(value: string): string {
  return value.replace(/[\t\r\n]+/g, ' ').trim();
}

export function formatChatLine(chatId: number, type: string, title: string): string {
  return `CHAT\t${chatId}\t${type}\t${clean(title)}`;
}

export function formatTopicLine(chatId: number, topicId: number, title: string): string {
  return `TOPIC\t${chatId}\t${topicId}\t${clean(title)}`;
}

export function formatTopicHint(chatId: number, topicId: number): string {
  return `TOPIC_HINT\t${chatId}\t${topicId}`;
}

/**
 * Tab-separated listing used to fill in `chat_id` and `topic_id` in the relay
 * config. Topics that were only seen on messages are printed as hints.
 */
export async function listChats(client: ChatListingClient): Promise<string[]> {
  const lines: string[] = [];
  for (const dialog of await client.listDialogs()) {
    lines.push(formatChatLine(dialog.chatId, dialog.type, dialog.title));
    if (!dialog.isForum) {
      continue;
    }

    const topics = (await client.listTopics(dialog.chatId)) ?? [];
    for (const topic of topics) {
      lines.push(formatTopicLine(dialog.chatId, topic.topicId, topic.title));
    }

    const hints = client.unnamedTopicIds ? await client.unnamedTopicIds(dialog.chatId) : [];
    for (const topicId of hints) {
      lines.push(formatTopicHint(dialog.chatId, topicId));
    }
  }
  return lines;
}
