import type { ChatEvent } from '../events/ChatEvent.js';
import type { MessageSender } from '../messaging/MessageSender.js';
import type { CommandHandler } from './types.js';
import type { Logger } from '../../infra/logger/logger.js';

export interface ParsedCommand {
  name: string;
  args: string[];
  prefix: '/' | '!';
}

/**
 * Routes command messages to appropriate handlers
 */
export class CommandRouter {
  private commandMap: Map<string, CommandHandler> = new Map();

  constructor(
    private logger: Logger,
    commands: CommandHandler[],
  ) {
    // Register all commands and their aliases
    for (const cmd of commands) {
      this.commandMap.set(cmd.name.toLowerCase(), cmd);
      for (const alias of cmd.aliases ?? []) {
        this.commandMap.set(alias.toLowerCase(), cmd);
      }
    }

    this.logger.info('command-router', `Registered ${commands.length} commands`);
  }

  /**
   * "/steam link foo 123" → { name: "steam", args: ["link", "foo", "123"] }.
   * Null when the text has no command prefix.
   */
  tryParse(rawText: string): ParsedCommand | null {
    const text = rawText.trim();
    if (!text) return null;

    const first = text[0];
    if (first !== '/' && first !== '!' && first !== '！') return null;

    const prefix: '/' | '!' = first === '/' ? '/' : '!';

    const body = text.slice(1).trim();
    if (!body) return null;

    const [nameToken, ...args] = body.split(/\s+/);
    return { name: nameToken.toLowerCase(), args, prefix };
  }

  /**
   * Handle a chat event. Resolves false when the text is not a command.
   */
  async handle(event: ChatEvent, sender: MessageSender): Promise<boolean> {
    const parsed = this.tryParse(event.rawText);
    if (!parsed) return false;

    const { name, args } = parsed;
    const reply = (text: string) =>
      sender.sendText(event.groupId, text, { isPrivate: event.isPrivate });

    // Find handler
    const handler = this.commandMap.get(name);
    if (!handler) {
      this.logger.warn('command-router', `Unknown command: ${name}`);
      await reply(`未知指令：${name}\n使用 /help 查看可用命令`);
      return true;
    }

    // Execute command
    try {
      this.logger.info(
        'command-router',
        `Executing command: /${name} (args: ${args.length}, from ${event.userId})`,
      );
      await handler.run({ event, args, sender });
      this.logger.debug('command-router', `Command /${name} completed`);
    } catch (error) {
      this.logger.error(
        'command-router',
        `Command ${name} failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      await reply(`指令执行失败：${name}`);
    }
    return true;
  }

  /**
   * Get all registered commands, once each
   */
  getCommands(): CommandHandler[] {
    return Array.from(new Set(this.commandMap.values()));
  }

  /**
   * Get all registered command names
   */
  getCommandNames(): string[] {
    return this.getCommands().map((cmd) => cmd.name);
  }
}
