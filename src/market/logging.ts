import type { LogLevel } from '../config/tradingConfig.js';
import { TradingBotError } from '../core/errors.js';

export type LogWriter = (level: LogLevel, line: string) => void;

export interface BotLogger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  child(scope: string): BotLogger;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

// Domain errors carry their code and symbol; anything else gets its top stack frame
function formatError(err: Error): string {
  let head: string;
  if (err instanceof TradingBotError) {
    head = `${err.name}[${err.code}${err.symbol ? ` ${err.symbol}` : ''}]: ${err.message}`;
  } else {
    const frame = err.stack?.split('\n')[1]?.trim();
    head = `${err.name}: ${err.message}${frame ? ` (${frame})` : ''}`;
  }
  return err.cause instanceof Error ? `${head} <- ${formatError(err.cause)}` : head;
}

function formatLogArg(arg: unknown): string {
  switch (typeof arg) {
    case 'string':
      return arg;
    case 'object':
      if (arg === null) return 'null';
      if (arg instanceof Error) return formatError(arg);
      try {
        return JSON.stringify(arg);
      } catch {
        return '[unserializable]';
      }
    default:
      return String(arg);
  }
}

export const formatLogArgs = (args: unknown[]): string => args.map(formatLogArg).join(' ');

export const consoleWriter: LogWriter = (level, line) => {
  const stamp = new Date().toISOString();
  if (level === 'error') console.error(stamp, line);
  else if (level === 'warn') console.warn(stamp, line);
  else console.log(stamp, line);
};

export function createBotLogger(
  writer: LogWriter | undefined,
  scope?: string,
  minLevel: LogLevel = 'info'
): BotLogger {
  const emit =
    (level: LogLevel) =>
    (...args: unknown[]) => {
      if (!writer || LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
      const payload = formatLogArgs(args);
      writer(level, scope ? `[${scope}] ${payload}` : payload);
    };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
    child: (childScope: string) =>
      createBotLogger(writer, scope ? `${scope}:${childScope}` : childScope, minLevel),
  };
}

export const silentLogger: BotLogger = createBotLogger(undefined);
