import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import { DEFAULT_WATCHLIST } from '../market/constants.market.js';
import type { OrderType } from '../market/types.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface TradingConfig {
  /** Fraction of equity a single position may cost. */
  maxPositionSize: number;
  maxPositions: number;
  stopLossPct: number;
  takeProfitPct: number;
  minConfidence: number;
  /** Local exchange time, HH:mm. */
  tradingStart: string;
  tradingEnd: string;
  timezone: string;
  bufferMinutes: number;
  pollIntervalMinutes: number;
  paperTrading: boolean;
  watchlist: readonly string[];
  entryOrderType: OrderType;
  limitSlippagePct: number;
  analysisTimeoutMs: number;
  executionTimeoutMs: number;
  pendingOrderTimeoutMinutes: number;
  maxConsecutiveExecutionFailures: number;
  /** YYYY-MM-DD dates in the exchange timezone. */
  holidays: readonly string[];
  stateFile: string;
  logDir: string;
  logLevel: LogLevel;
}

export const DEFAULT_TRADING_CONFIG = {
  maxPositionSize: 0.25,
  maxPositions: 4,
  stopLossPct: 0.05,
  takeProfitPct: 0.15,
  minConfidence: 0.6,
  tradingStart: '09:30',
  tradingEnd: '16:00',
  timezone: 'America/New_York',
  bufferMinutes: 10,
  pollIntervalMinutes: 10,
  paperTrading: true,
  watchlist: DEFAULT_WATCHLIST,
  entryOrderType: 'market',
  limitSlippagePct: 0.002,
  analysisTimeoutMs: 30_000,
  executionTimeoutMs: 10_000,
  pendingOrderTimeoutMinutes: 30,
  maxConsecutiveExecutionFailures: 3,
  holidays: [],
  stateFile: path.join('data', 'state.json'),
  logDir: 'logs',
  logLevel: 'info',
} as const satisfies TradingConfig;

const D = DEFAULT_TRADING_CONFIG;
const HH_MM = /^([01]\d|2[0-3]):[0-5]\d$/;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

const csv = (value: string) =>
  value
    .split(',')
    .map(item => item.trim())
    .filter(Boolean);

const boolFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(v => v === 'true' || v === '1');

const envSchema = z.object({
  MAX_POSITION_SIZE: z.coerce.number().gt(0).lte(1).default(D.maxPositionSize),
  MAX_POSITIONS: z.coerce.number().int().positive().default(D.maxPositions),
  STOP_LOSS_PCT: z.coerce.number().gt(0).lt(1).default(D.stopLossPct),
  TAKE_PROFIT_PCT: z.coerce.number().gt(0).default(D.takeProfitPct),
  MIN_CONFIDENCE: z.coerce.number().min(0).max(1).default(D.minConfidence),
  TRADING_START: z.string().regex(HH_MM, 'expected HH:mm').default(D.tradingStart),
  TRADING_END: z.string().regex(HH_MM, 'expected HH:mm').default(D.tradingEnd),
  MARKET_TIMEZONE: z.string().min(1).default(D.timezone),
  BUFFER_MINUTES: z.coerce.number().int().min(0).default(D.bufferMinutes),
  POLL_INTERVAL_MINUTES: z.coerce.number().int().positive().default(D.pollIntervalMinutes),
  PAPER_TRADING: boolFlag.default('true'),
  WATCHLIST: z
    .string()
    .transform(v => csv(v).map(s => s.toUpperCase()))
    .optional(),
  ENTRY_ORDER_TYPE: z.enum(['market', 'limit']).default(D.entryOrderType),
  LIMIT_SLIPPAGE_PCT: z.coerce.number().min(0).lt(0.05).default(D.limitSlippagePct),
  ANALYSIS_TIMEOUT_MS: z.coerce.number().int().positive().default(D.analysisTimeoutMs),
  EXECUTION_TIMEOUT_MS: z.coerce.number().int().positive().default(D.executionTimeoutMs),
  PENDING_ORDER_TIMEOUT_MINUTES: z.coerce.number().int().positive().default(D.pendingOrderTimeoutMinutes),
  MAX_CONSECUTIVE_EXECUTION_FAILURES: z.coerce
    .number()
    .int()
    .positive()
    .default(D.maxConsecutiveExecutionFailures),
  MARKET_HOLIDAYS: z
    .string()
    .transform(csv)
    .pipe(z.array(z.string().regex(ISO_DATE, 'expected YYYY-MM-DD')))
    .optional(),
  HOLIDAYS_FILE: z.string().default(path.join('data', 'market-holidays.json')),
  STATE_FILE: z.string().default(D.stateFile),
  LOG_DIR: z.string().default(D.logDir),
  LOG_LEVEL: z
    .string()
    .transform(v => v.toLowerCase())
    .pipe(z.enum(['debug', 'info', 'warn', 'error']))
    .default(D.logLevel),
});

const holidaysFileSchema = z.object({
  holidays: z.array(z.object({ date: z.string().regex(ISO_DATE), name: z.string().optional() })),
});

type Env = Record<string, string | undefined>;

// Blank variables in .env mean "use the default".
const withoutBlanks = (env: Env): Env =>
  Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''));

function formatIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}

export function loadHolidays(file: string): string[] {
  if (!fs.existsSync(file)) {
    return [];
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (err) {
    throw new ConfigError(`Cannot read holidays file ${file}: ${String(err)}`);
  }
  const parsed = holidaysFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid holidays file ${file}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data.holidays.map(h => h.date);
}

export function loadTradingConfig(env: Env = process.env): TradingConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw new ConfigError(`Invalid trading configuration: ${formatIssues(parsed.error)}`);
  }
  const e = parsed.data;

  const holidays = new Set([...loadHolidays(e.HOLIDAYS_FILE), ...(e.MARKET_HOLIDAYS ?? [])]);
  const watchlist = e.WATCHLIST && e.WATCHLIST.length > 0 ? e.WATCHLIST : [...D.watchlist];

  const config: TradingConfig = {
    maxPositionSize: e.MAX_POSITION_SIZE,
    maxPositions: e.MAX_POSITIONS,
    stopLossPct: e.STOP_LOSS_PCT,
    takeProfitPct: e.TAKE_PROFIT_PCT,
    minConfidence: e.MIN_CONFIDENCE,
    tradingStart: e.TRADING_START,
    tradingEnd: e.TRADING_END,
    timezone: e.MARKET_TIMEZONE,
    bufferMinutes: e.BUFFER_MINUTES,
    pollIntervalMinutes: e.POLL_INTERVAL_MINUTES,
    paperTrading: e.PAPER_TRADING,
    watchlist: Object.freeze([...new Set(watchlist)]),
    entryOrderType: e.ENTRY_ORDER_TYPE,
    limitSlippagePct: e.LIMIT_SLIPPAGE_PCT,
    analysisTimeoutMs: e.ANALYSIS_TIMEOUT_MS,
    executionTimeoutMs: e.EXECUTION_TIMEOUT_MS,
    pendingOrderTimeoutMinutes: e.PENDING_ORDER_TIMEOUT_MINUTES,
    maxConsecutiveExecutionFailures: e.MAX_CONSECUTIVE_EXECUTION_FAILURES,
    holidays: Object.freeze([...holidays].sort()),
    stateFile: e.STATE_FILE,
    logDir: e.LOG_DIR,
    logLevel: e.LOG_LEVEL,
  };

  return Object.freeze(config);
}

export function missingEnvVars(names: readonly string[], env: Env = process.env): string[] {
  return names.filter(name => !env[name]?.trim());
}
