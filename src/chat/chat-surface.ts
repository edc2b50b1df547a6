export const CHAT_SURFACE = Symbol('CHAT_SURFACE');

export interface EmbedField {
  name: string;
  value: string;
  inline?: boolean;
}

/** Platform-neutral rich message card */
export interface EmbedView {
  title: string;
  description?: string;
  color: number;
  fields: EmbedField[];
  footer?: string;
}

export interface ChatMessage {
  content?: string;
  embed?: EmbedView;
}

export interface PinnedMessage {
  id: string;
  authoredBySelf: boolean;
  embedTitle: string | null;
}

export interface StartedThread {
  threadId: string;
  starterMessageId: string;
}

/**
 * What the auction core needs from the chat platform. Every call may fail
 * with an ExternalServiceError; callers decide whether that is fatal.
 */
export interface ChatSurface {
  isReady(): boolean;
  sendMessage(channelId: string, message: ChatMessage): Promise<string>;
  /** Post `message` in a channel and open a thread named `name` on it */
  startThread(
    channelId: string,
    message: ChatMessage,
    name: string,
  ): Promise<StartedThread>;
  editMessage(
    channelId: string,
    messageId: string,
    message: ChatMessage,
  ): Promise<void>;
  /** Archive and lock so nobody can post (or bid) any more */
  closeThread(threadId: string): Promise<void>;
  addThreadMember(threadId: string, userId: string): Promise<void>;
  listPinnedMessages(channelId: string): Promise<PinnedMessage[]>;
  pinMessage(channelId: string, messageId: string): Promise<void>;
  /** Newest own message carrying an embed among the last `limit` in a thread */
  findLatestOwnEmbedMessage(
    threadId: string,
    limit: number,
  ): Promise<string | null>;
}

export const THREAD_NAME_MAX_LENGTH = 100;

export function mentionUser(userId: string): string {
  return `<@${userId}>`;
}

export function mentionChannel(channelId: string): string {
  return `<#${channelId}>`;
}
