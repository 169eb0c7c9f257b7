import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { JsonAliasStore } from '../../../src/apps/steam/AliasStore.js';
import { SteamClient } from '../../../src/apps/steam/SteamClient.js';
import { STEAM_HELP_TEXT, SteamCommandHandler } from '../../../src/apps/steam/SteamCommandHandler.js';
import { createSteamCommand } from '../../../src/apps/steam/steamCommand.js';
import { CommandRouter } from '../../../src/core/command/CommandRouter.js';
import type { ChatEvent } from '../../../src/core/events/ChatEvent.js';
import { createSilentLogger } from '../../../src/infra/logger/logger.js';
import { RecordingSender, createFakeSteamFetch } from '../../helpers/fakes.js';

const logger = createSilentLogger();
const ALICE_ID = '76561197960265729';

describe('/steam command', () => {
  let dir: string;
  let store: JsonAliasStore;
  let router: CommandRouter;

  const event = (rawText: string, groupId = '100', isPrivate = false): ChatEvent => ({
    platform: 'qq',
    groupId,
    userId: '42',
    messageId: '1',
    rawText,
    timestamp: Date.now(),
    isPrivate,
  });

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'steam-command-'));
    store = new JsonAliasStore(path.join(dir, 'aliases.json'), logger);
    const client = new SteamClient({
      apiKey: 'test-key',
      fetch: createFakeSteamFetch({
        players: { [ALICE_ID]: { steamid: ALICE_ID, personaname: 'Alice', personastate: 1 } },
      }),
      logger,
    });
    const handler = new SteamCommandHandler({ store, client, logger, now: () => 1_000_000 });
    router = new CommandRouter(logger, [createSteamCommand(handler)]);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('shows help when no subcommand is given', async () => {
    const sender = new RecordingSender();
    await router.handle(event('/steam'), sender);
    expect(sender.sent[0].text).toBe(STEAM_HELP_TEXT);
  });

  it('stores bindings under the chat the message came from', async () => {
    const sender = new RecordingSender();
    await router.handle(event('/steam link Foo 1'), sender);
    await router.handle(event('/steam link bar 1', '42', true), sender);

    expect(sender.sent.map((m) => m.text)).toEqual([
      `已绑定：foo -> Alice (${ALICE_ID})`,
      `已绑定：bar -> Alice (${ALICE_ID})`,
    ]);
    expect(sender.sent[1]).toMatchObject({ targetId: '42', options: { isPrivate: true } });
    expect(Array.from((await store.load()).keys())).toEqual(['qq:group:100', 'qq:private:42']);
  });
});
