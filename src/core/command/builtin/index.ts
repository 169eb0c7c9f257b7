/**
 * Builtin commands available by default
 */
export { PingCommand } from './ping.js';
export { createHelpCommand } from './help.js';
