import type { CommandHandler } from '../types.js';

/**
 * Help command - lists whatever is registered at call time
 */
export function createHelpCommand(listCommands: () => CommandHandler[]): CommandHandler {
  return {
    name: 'help',
    aliases: ['h', '帮助'],
    description: '显示所有可用命令',
    usage: '/help',

    async run({ event, sender }) {
      const lines = listCommands().map((c) => {
        const names = [c.name, ...(c.aliases ?? [])].join(', ');
        return `  ${c.usage ?? `/${c.name}`} - ${c.description ?? ''} (${names})`;
      });
      const helpText = `可用命令：\n${lines.join('\n')}\n\n提示：命令可以用 / 或 ！ 开头`;
      await sender.sendText(event.groupId, helpText, { isPrivate: event.isPrivate });
    },
  };
}
