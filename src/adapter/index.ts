import type { CommandRouter } from '../core/command/CommandRouter.js';
import type { Logger } from '../infra/logger/logger.js';
import { MockClient } from './mock/mockClient.js';

/**
 * Start the mock CLI adapter for local development and debugging.
 * Reads commands from the terminal and prints bot replies to the console.
 */
export function startMockAdapter(router: CommandRouter, logger: Logger): void {
  const mockClient = new MockClient(router, logger);
  mockClient.start();
}
