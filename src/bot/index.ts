import * as dotenv from 'dotenv';
import { Bot } from 'grammy';

import { loadTradingConfig, missingEnvVars, type TradingConfig } from '../config/tradingConfig.js';
import { describeError } from '../core/errors.js';
import { createEventLog, eventLogPath } from '../market/logger.js';
import { consoleWriter, createBotLogger } from '../market/logging.js';
import { LedgerStore } from '../market/ledgerStore.js';
import { Orchestrator } from '../market/orchestrator.js';
import { createAlpacaGateway } from '../services/alpaca.js';
import { createGrokCompletion, GrokAnalysisGateway } from '../services/grok.js';
import { ControlCommands, createBroadcaster, registerCommands } from './controlBot.js';

dotenv.config();

/* ===============================
   ENV & CONFIG
   =============================== */

const requiredEnvVars = ['BOT_TOKEN', 'GROK_API_KEY', 'ALPACA_API_KEY', 'ALPACA_SECRET_KEY', 'ALLOWED_CHAT_IDS'];
const missingVars = missingEnvVars(requiredEnvVars);

if (missingVars.length) {
  console.error('Missing env vars:', missingVars.join(', '));
  process.exit(1);
}

const env = (name: string): string => process.env[name]?.trim() ?? '';

function loadConfigOrExit(): TradingConfig {
  try {
    return loadTradingConfig();
  } catch (err) {
    console.error(describeError(err));
    process.exit(1);
  }
}

const config = loadConfigOrExit();

const log = createBotLogger(consoleWriter, 'bot', config.logLevel);
const allowedChatIds = new Set(
  env('ALLOWED_CHAT_IDS')
    .split(',')
    .map(id => Number(id.trim()))
    .filter(id => Number.isInteger(id))
);

/* ===============================
   WIRING
   =============================== */

const bot = new Bot(env('BOT_TOKEN'));

const analysis = new GrokAnalysisGateway(
  createGrokCompletion({
    apiKey: env('GROK_API_KEY'),
    timeoutMs: config.analysisTimeoutMs,
    ...(env('GROK_MODEL') ? { model: env('GROK_MODEL') } : {}),
  }),
  log.child('grok')
);

const execution = createAlpacaGateway({
  keyId: env('ALPACA_API_KEY'),
  secretKey: env('ALPACA_SECRET_KEY'),
  paperTrading: config.paperTrading,
  timeoutMs: config.executionTimeoutMs,
  ...(env('ALPACA_BASE_URL') ? { baseUrl: env('ALPACA_BASE_URL') } : {}),
  ...(env('ALPACA_DATA_FEED') === 'sip' ? { dataFeed: 'sip' as const } : {}),
});

// Alerts go to every subscribed chat once the commands exist
let broadcast: (msg: string) => void = () => {};

const orchestrator = new Orchestrator({
  config,
  analysis,
  execution,
  store: new LedgerStore(config.stateFile),
  logger: log.child('trading'),
  logEvent: createEventLog(config.logDir),
  onAlert: msg => broadcast(msg),
});

const commands = new ControlCommands(orchestrator, allowedChatIds, log.child('commands'));
broadcast = createBroadcaster(bot, commands, log);
registerCommands(bot, commands, eventLogPath(config.logDir), log);

/* ===============================
   GLOBAL GUARDS & SHUTDOWN
   =============================== */

let isShuttingDown = false;

async function shutdown(signal: string) {
  if (isShuttingDown) return;
  isShuttingDown = true;

  log.info(`🛑 Shutdown (${signal})`);

  try {
    // a restart carries on in whatever state the operator left
    await orchestrator.shutdown({ keepState: true });
  } catch (err) {
    log.error('Orchestrator shutdown error:', err);
  }

  try {
    await bot.stop();
  } catch (err) {
    log.error('Bot shutdown error:', err);
  }

  process.exit(0);
}

process.on('SIGINT', () => {
  shutdown('SIGINT').catch(err => log.error(err));
});
process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch(err => log.error(err));
});

process.on('uncaughtException', err => {
  log.error('UNCAUGHT EXCEPTION:', err);
});

process.on('unhandledRejection', reason => {
  log.error('UNHANDLED REJECTION:', reason);
});

/* ===============================
   START
   =============================== */

log.info(`🚀 Starting bot (${config.paperTrading ? 'paper' : 'LIVE'}), watchlist ${config.watchlist.join(', ')}`);

const restoredState = orchestrator.getStatus().state;
if (restoredState !== 'STOPPED') {
  try {
    log.info(`♻️ Restored ${restoredState}: ${orchestrator.start().message}`);
  } catch (err) {
    log.error('Cannot restore trading:', err);
  }
}
bot
  .start({
    onStart: info => {
      log.info(`🤖 Bot @${info.username} is running!`);
    },
  })
  .catch(err => {
    log.error('Bot polling stopped:', err);
    process.exit(1);
  });
