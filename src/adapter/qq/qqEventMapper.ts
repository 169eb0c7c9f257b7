import { z } from 'zod';
import type { ChatEvent } from '../../core/events/ChatEvent.js';

/**
 * OneBot11 message format:
 * https://onebot.dev/spec/
 * We focus on text messages in group/private chats.
 */
const OB11MessageSchema = z.object({
  post_type: z.literal('message'),
  message_type: z.enum(['group', 'private']),
  message: z.array(
    z.object({
      type: z.string(),
      data: z.record(z.unknown()),
    }),
  ),
  user_id: z.number(),
  group_id: z.number().optional(),
  message_id: z.number().optional(),
  time: z.number(),
  self_id: z.number().optional(),
  sender: z
    .object({
      user_id: z.number().optional(),
      nickname: z.string().optional(),
      card: z.string().optional(),
    })
    .optional(),
});

export type OneBot11Message = z.infer<typeof OB11MessageSchema>;

/**
 * Map a raw OneBot11 payload to ChatEvent.
 * Null for anything that is not a usable user message.
 */
export function mapToChatEvent(
  raw: unknown,
  logger?: { debug: (tag: string, msg: string) => void },
): ChatEvent | null {
  const parsed = OB11MessageSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  const msg = parsed.data;

  // Drop messages sent by the bot itself to avoid self-trigger loops
  if (msg.self_id && msg.user_id === msg.self_id) {
    logger?.debug('qq-mapper', `Filtered self message from bot ${msg.self_id}`);
    return null;
  }

  // Extract plain text; other segments (at, image, face) are skipped
  const rawText = msg.message
    .map((seg) => (seg.type === 'text' && typeof seg.data.text === 'string' ? seg.data.text : ''))
    .join('');

  const isPrivate = msg.message_type === 'private';

  return {
    platform: 'qq',
    groupId: isPrivate ? String(msg.user_id) : String(msg.group_id ?? ''),
    userId: String(msg.user_id),
    messageId: String(msg.message_id ?? 0),
    rawText,
    timestamp: msg.time * 1000,
    userName: msg.sender?.card || msg.sender?.nickname || `User${msg.user_id}`,
    isPrivate,
  };
}
