import { describe, expect, it } from 'vitest';
import { CommandRouter } from '../../../src/core/command/CommandRouter.js';
import { PingCommand, createHelpCommand } from '../../../src/core/command/builtin/index.js';
import type { CommandHandler } from '../../../src/core/command/types.js';
import type { ChatEvent } from '../../../src/core/events/ChatEvent.js';
import { createSilentLogger } from '../../../src/infra/logger/logger.js';
import { RecordingSender } from '../../helpers/fakes.js';

const event = (rawText: string, extra: Partial<ChatEvent> = {}): ChatEvent => ({
  platform: 'qq',
  groupId: '100',
  userId: '42',
  messageId: '1',
  rawText,
  timestamp: Date.now(),
  ...extra,
});

const echo: CommandHandler = {
  name: 'echo',
  aliases: ['say'],
  description: 'repeat args',
  async run({ event, args, sender }) {
    await sender.sendText(event.groupId, args.join('|'), { isPrivate: event.isPrivate });
  },
};

const boom: CommandHandler = {
  name: 'boom',
  async run() {
    throw new Error('kaboom');
  },
};

describe('CommandRouter', () => {
  const router = new CommandRouter(createSilentLogger(), [echo, boom]);

  it('parses prefix, name and args', () => {
    expect(router.tryParse('  /Echo a  b ')).toEqual({ name: 'echo', args: ['a', 'b'], prefix: '/' });
    expect(router.tryParse('！echo x')).toEqual({ name: 'echo', args: ['x'], prefix: '!' });
    expect(router.tryParse('hello')).toBeNull();
    expect(router.tryParse('/')).toBeNull();
  });

  it('ignores plain chat text', async () => {
    const sender = new RecordingSender();
    expect(await router.handle(event('just chatting'), sender)).toBe(false);
    expect(sender.sent).toEqual([]);
  });

  it('runs a command by name or alias', async () => {
    const sender = new RecordingSender();
    await router.handle(event('/echo a b'), sender);
    await router.handle(event('!SAY c', { isPrivate: true, groupId: '42' }), sender);
    expect(sender.sent).toEqual([
      { targetId: '100', text: 'a|b', options: { isPrivate: undefined } },
      { targetId: '42', text: 'c', options: { isPrivate: true } },
    ]);
  });

  it('replies to unknown commands', async () => {
    const sender = new RecordingSender();
    expect(await router.handle(event('/nope'), sender)).toBe(true);
    expect(sender.sent[0].text).toBe('未知指令：nope\n使用 /help 查看可用命令');
  });

  it('turns a thrown error into a failure reply', async () => {
    const sender = new RecordingSender();
    await router.handle(event('/boom'), sender);
    expect(sender.sent[0].text).toBe('指令执行失败：boom');
  });

  it('lists each command once', () => {
    expect(router.getCommandNames()).toEqual(['echo', 'boom']);
  });
});

describe('builtin commands', () => {
  it('help lists registered commands', async () => {
    const commands: CommandHandler[] = [PingCommand];
    commands.push(createHelpCommand(() => commands));
    const router = new CommandRouter(createSilentLogger(), commands);
    const sender = new RecordingSender();

    await router.handle(event('/help'), sender);

    expect(sender.sent[0].text).toBe(
      [
        '可用命令：',
        '  /ping - 测试机器人是否在线 (ping, pong)',
        '  /help - 显示所有可用命令 (help, h, 帮助)',
        '',
        '提示：命令可以用 / 或 ！ 开头',
      ].join('\n'),
    );
  });

  it('ping replies with pong', async () => {
    const router = new CommandRouter(createSilentLogger(), [PingCommand]);
    const sender = new RecordingSender();
    await router.handle(event('/ping'), sender);
    expect(sender.sent[0].text).toMatch(/^🏓 pong! \(延迟: \d+ms\)$/);
  });
});
