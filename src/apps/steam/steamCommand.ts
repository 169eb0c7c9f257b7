import type { CommandHandler } from '../../core/command/types.js';
import { resolveChatKey } from '../../core/events/chatKey.js';
import type { SteamCommandHandler } from './SteamCommandHandler.js';

/**
 * Exposes the Steam handler to the command router as `/steam <sub> [a] [b]`.
 */
export function createSteamCommand(handler: SteamCommandHandler): CommandHandler {
  return {
    name: 'steam',
    description: 'Steam 在线状态与别名绑定（子命令：help/link/unlink/list/status/whois）',
    usage: '/steam <help|link|unlink|list|status|whois> [参数]',

    async run({ event, args, sender }) {
      const [verb = 'help', ...rest] = args;
      const text = await handler.handle(verb, rest, resolveChatKey(event));
      await sender.sendText(event.groupId, text, { isPrivate: event.isPrivate });
    },
  };
}
