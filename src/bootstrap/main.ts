import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { loadConfig } from '../infra/config/config.js';
import { createLogger } from '../infra/logger/logger.js';
import { CommandRouter } from '../core/command/CommandRouter.js';
import { PingCommand, createHelpCommand } from '../core/command/builtin/index.js';
import type { CommandHandler } from '../core/command/types.js';
import { JsonAliasStore } from '../apps/steam/AliasStore.js';
import { SteamClient } from '../apps/steam/SteamClient.js';
import { SteamCommandHandler } from '../apps/steam/SteamCommandHandler.js';
import { createSteamCommand } from '../apps/steam/steamCommand.js';
import { QQAdapter } from '../adapter/qq/QQAdapter.js';
import { startMockAdapter } from '../adapter/index.js';

export async function start(): Promise<void> {
  const cfg = loadConfig();
  const logger = createLogger(cfg);
  logger.info('bootstrap', `Starting ${cfg.app.name} in ${cfg.app.env}`);

  const commands: CommandHandler[] = [PingCommand];

  if (cfg.steam.enabled) {
    // One store per process: its lock is what serializes alias file access
    const store = new JsonAliasStore(resolve(process.cwd(), cfg.steam.dataFile), logger);
    const client = new SteamClient({
      apiKey: cfg.steam.apiKey,
      baseUrl: cfg.steam.baseUrl,
      timeoutMs: cfg.steam.timeoutMs,
      logger,
    });
    if (!client.hasApiKey) {
      logger.warn('bootstrap', 'steam.apiKey not set - link/status/whois will ask for configuration');
    }
    commands.push(createSteamCommand(new SteamCommandHandler({ store, client, logger })));
  } else {
    logger.warn('bootstrap', 'Steam command disabled (set steam.enabled = true to enable)');
  }

  commands.push(createHelpCommand(() => commands));
  const router = new CommandRouter(logger, commands);

  if (cfg.adapters.qq.enabled) {
    logger.info('bootstrap', 'Starting QQ adapter...');
    const qqAdapter = new QQAdapter(router, logger, cfg.adapters.qq.wsPort, cfg.adapters.qq.token);
    qqAdapter.start();
    process.once('SIGINT', () => {
      qqAdapter.stop();
      process.exit(0);
    });
  } else {
    logger.warn('bootstrap', 'QQ adapter disabled (missing token or config)');
  }

  if (cfg.adapters.mock.enabled) {
    startMockAdapter(router, logger);
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  start().catch((err: unknown) => {
    console.error('[bootstrap] Fatal:', err);
    process.exit(1);
  });
}
