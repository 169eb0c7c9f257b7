import type { ChatEvent } from './ChatEvent.js';

/** Scope used when an event carries no conversation id */
export const GLOBAL_CHAT_KEY = 'global';

/**
 * Partition key for per-conversation state: `qq:group:123`, `qq:private:456`.
 */
export function resolveChatKey(event: Pick<ChatEvent, 'platform' | 'groupId' | 'isPrivate'>): string {
  const id = event.groupId.trim();
  if (!id) return GLOBAL_CHAT_KEY;
  return `${event.platform}:${event.isPrivate ? 'private' : 'group'}:${id}`;
}
