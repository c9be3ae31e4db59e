import type { OrderStatus } from './types.js';

// Liquid large-cap tech names traded by default
export const DEFAULT_WATCHLIST = ['AAPL', 'MSFT', 'NVDA', 'AMD', 'GOOGL', 'META', 'AMZN', 'TSLA'] as const;

// Common intervals in milliseconds
export const INTERVALS = {
  ONE_SECOND: 1000,
  ONE_MIN: 60 * 1000,
} as const;

export const ORDER_STATUS_GROUPS: Readonly<Record<'working' | 'dead', ReadonlySet<OrderStatus>>> = {
  /** The order can still fill. */
  working: new Set<OrderStatus>(['new', 'accepted', 'pending', 'partially_filled']),
  /** The order will not fill any further. */
  dead: new Set<OrderStatus>(['canceled', 'expired', 'rejected']),
};

// A fill the broker confirmed this recently may not show up in its position list yet
export const FILL_GRACE_MS = 2 * 60 * 1000;

export const MAX_CLOSED_HISTORY = 200;
export const MAX_INCONSISTENCIES_KEPT = 20;

export const LOG_FILE_NAME = 'trading-bot.log';
export const STATE_FILE_VERSION = 1;
