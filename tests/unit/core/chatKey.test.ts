import { describe, expect, it } from 'vitest';
import { GLOBAL_CHAT_KEY, resolveChatKey } from '../../../src/core/events/chatKey.js';

describe('resolveChatKey', () => {
  it('scopes group and private chats separately', () => {
    expect(resolveChatKey({ platform: 'qq', groupId: '123' })).toBe('qq:group:123');
    expect(resolveChatKey({ platform: 'qq', groupId: '123', isPrivate: true })).toBe('qq:private:123');
  });

  it('falls back to the global scope without an id', () => {
    expect(resolveChatKey({ platform: 'qq', groupId: '' })).toBe(GLOBAL_CHAT_KEY);
    expect(GLOBAL_CHAT_KEY).toBe('global');
  });
});
