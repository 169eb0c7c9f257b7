import chalk from 'chalk';
import type { AppConfigRequired, LogLevelSetting } from '../config/config.js';

export type LogLevel = LogLevelSetting;

export interface Logger {
  info(context: string, message: string): void;
  debug(context: string, message: string): void;
  warn(context: string, message: string): void;
  error(context: string, message: string): void;
}

// Level colours
const LEVEL_COLORS = {
  debug: chalk.bgBlue.black,
  info: chalk.bgGreen.black,
  warn: chalk.bgYellow.black,
  error: chalk.bgRed.white,
};

// Module name colours (stable per name)
const MODULE_COLORS = [chalk.cyan, chalk.magenta, chalk.blue, chalk.green, chalk.yellow];

const moduleColorMap = new Map<string, (text: string) => string>();

function getModuleColor(context: string): (text: string) => string {
  const cached = moduleColorMap.get(context);
  if (cached) return cached;
  const hash = context.split('').reduce((acc, char) => acc + char.charCodeAt(0), 0);
  const color = MODULE_COLORS[hash % MODULE_COLORS.length];
  moduleColorMap.set(context, color);
  return color;
}

// check if a message at 'level' should be logged given the current log level
function shouldLog(level: LogLevel, current: LogLevel): boolean {
  const order: LogLevel[] = ['debug', 'info', 'warn', 'error'];
  return order.indexOf(level) >= order.indexOf(current);
}

function formatTimestamp(): string {
  const d = new Date();
  return d.toISOString().replace('T', ' ').replace('Z', '').slice(0, -1);
}

export function createLogger(cfg: Pick<AppConfigRequired, 'logging'>): Logger {
  const currentLevel = cfg.logging.level;
  const colorEnabled = cfg.logging.color;

  const base = (level: LogLevel) => (context: string, message: string) => {
    if (!shouldLog(level, currentLevel)) return;

    const ts = colorEnabled ? chalk.gray(formatTimestamp()) : formatTimestamp();
    const levelTag = colorEnabled
      ? LEVEL_COLORS[level](` ${level.toUpperCase()} `)
      : `[${level.toUpperCase()}]`;
    const moduleTag = colorEnabled ? getModuleColor(context)(`[${context}]`) : `[${context}]`;

    const line = `${ts} ${levelTag} ${moduleTag} ${message}`;
    switch (level) {
      case 'debug':
      case 'info':
        console.log(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        break;
    }
  };
  return {
    info: base('info'),
    debug: base('debug'),
    warn: base('warn'),
    error: base('error'),
  };
}

/**
 * Logger that drops everything. Used by tests and one-off scripts.
 */
export function createSilentLogger(): Logger {
  const noop = () => {};
  return { info: noop, debug: noop, warn: noop, error: noop };
}
