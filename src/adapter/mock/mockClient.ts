import * as readline from 'node:readline';
import type { CommandRouter } from '../../core/command/CommandRouter.js';
import type { ChatEvent } from '../../core/events/ChatEvent.js';
import type { MessageSender } from '../../core/messaging/MessageSender.js';
import type { Logger } from '../../infra/logger/logger.js';

/** Prints replies to stdout */
export class ConsoleSender implements MessageSender {
  async sendText(_targetId: string, text: string): Promise<void> {
    console.log(`Bot: ${text}`);
  }
}

export class MockClient {
  private rl: readline.Interface;
  private sender = new ConsoleSender();
  private messageCounter = 0;

  constructor(
    private router: CommandRouter,
    private logger: Logger,
  ) {
    this.rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: '> ',
    });
  }

  public start(): void {
    console.log('=== Mock CLI Bot Started ===');
    console.log('Type a command (e.g. /steam help) and press Enter. Ctrl+C to exit.\n');

    this.rl.prompt();

    this.rl.on('line', async (input: string) => {
      const text = input.trim();
      if (!text) {
        this.rl.prompt();
        return;
      }

      const event: ChatEvent = {
        platform: 'cli',
        groupId: 'cli-channel',
        userId: 'cli-user',
        messageId: `msg-${++this.messageCounter}`,
        rawText: text,
        timestamp: Date.now(),
        userName: 'CLI User',
      };

      try {
        const handled = await this.router.handle(event, this.sender);
        if (!handled) console.log('(not a command)');
      } catch (err) {
        this.logger.error('mock-client', err instanceof Error ? err.message : String(err));
      }

      this.rl.prompt();
    });

    this.rl.on('close', () => {
      console.log('\nMock client closed.');
      process.exit(0);
    });
  }
}
