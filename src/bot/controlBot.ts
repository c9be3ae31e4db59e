import * as fs from 'node:fs';
import { InputFile, Keyboard, type Bot } from 'grammy';
import { describeError, NotInEmergencyState } from '../core/errors.js';
import { silentLogger, type BotLogger } from '../market/logging.js';
import type { Orchestrator } from '../market/orchestrator.js';
import { formatOrders, formatPositions, formatStatus } from './format.js';

export type ControlSurface = Pick<
  Orchestrator,
  'start' | 'triggerEmergencyStop' | 'resume' | 'shutdown' | 'getStatus' | 'getPositions' | 'getOpenOrders'
>;

export const mainKeyboard = new Keyboard()
  .text('/start')
  .text('/status')
  .row()
  .text('/positions')
  .text('/orders')
  .row()
  .text('/emergency_stop')
  .text('/resume')
  .row()
  .text('/stop')
  .text('/download_logs')
  .resized();

/** Chat commands against the orchestrator; replies are Markdown text. */
export class ControlCommands {
  private readonly subscribers = new Set<number>();

  constructor(
    private readonly surface: ControlSurface,
    private readonly allowedChatIds: ReadonlySet<number>,
    private readonly log: BotLogger = silentLogger
  ) {}

  isAllowed(chatId: number): boolean {
    return this.allowedChatIds.has(chatId);
  }

  get subscriberIds(): number[] {
    return [...this.subscribers];
  }

  /** Subscribed chats, or every allowed chat while nobody has subscribed (e.g. after a restart). */
  alertTargets(): number[] {
    return this.subscribers.size > 0 ? this.subscriberIds : [...this.allowedChatIds];
  }

  start(chatId: number): string {
    this.subscribers.add(chatId);
    this.log.info(`➕ Subscribed chat ${chatId}`);
    try {
      const ack = this.surface.start();
      return `🚀 *Swing bot*\n\n${ack.message}\n\n${formatStatus(this.surface.getStatus())}`;
    } catch (err) {
      this.log.error('Start failed:', err);
      return `❌ Cannot start trading: ${describeError(err)}`;
    }
  }

  status(): string {
    return formatStatus(this.surface.getStatus());
  }

  positions(): string {
    return formatPositions(this.surface.getPositions());
  }

  orders(): string {
    return formatOrders(this.surface.getOpenOrders());
  }

  emergencyStop(chatId: number): string {
    const ack = this.surface.triggerEmergencyStop(`operator request from chat ${chatId}`);
    return `🛑 ${ack.message}\nUse /resume to trade again.`;
  }

  resume(): string {
    try {
      return `✅ ${this.surface.resume().message}`;
    } catch (err) {
      if (err instanceof NotInEmergencyState) {
        return `ℹ️ ${err.message}`;
      }
      throw err;
    }
  }

  async stop(chatId: number): Promise<string> {
    this.subscribers.delete(chatId);
    this.log.info(`➖ Unsubscribed chat ${chatId}`);
    await this.surface.shutdown();
    const { state } = this.surface.getStatus();
    return (
      '🛑 Bot stopped\n\n' +
      '• scheduling loop ended\n' +
      '• no new orders are placed\n' +
      `• state: ${state}`
    );
  }
}

export function registerCommands(bot: Bot, commands: ControlCommands, logFile: string, log: BotLogger = silentLogger) {
  // Only configured chats may drive the bot
  bot.use(async (ctx, next) => {
    if (!ctx.chat || !commands.isAllowed(ctx.chat.id)) {
      log.warn(`Ignoring update from chat ${ctx.chat?.id ?? 'unknown'}`);
      return;
    }
    await next();
  });

  const markdown = { parse_mode: 'Markdown', reply_markup: mainKeyboard } as const;

  bot.command('start', async ctx => {
    await ctx.reply(commands.start(ctx.chat.id), markdown);
  });
  bot.command('status', async ctx => {
    await ctx.reply(commands.status(), markdown);
  });
  bot.command('positions', async ctx => {
    await ctx.reply(commands.positions(), markdown);
  });
  bot.command('orders', async ctx => {
    await ctx.reply(commands.orders(), markdown);
  });
  bot.command('emergency_stop', async ctx => {
    await ctx.reply(commands.emergencyStop(ctx.chat.id), markdown);
  });
  bot.command('resume', async ctx => {
    await ctx.reply(commands.resume(), markdown);
  });
  bot.command('stop', async ctx => {
    await ctx.reply(await commands.stop(ctx.chat.id), { reply_markup: mainKeyboard });
  });

  bot.command('download_logs', async ctx => {
    if (!fs.existsSync(logFile)) {
      await ctx.reply('📭 No log file yet');
      return;
    }
    try {
      await ctx.replyWithDocument(new InputFile(fs.createReadStream(logFile), 'trading-bot.log'));
    } catch (error) {
      log.error('Error sending log file:', error);
      await ctx.reply('❌ Error sending log file');
    }
  });

  bot.on('message:text', async ctx => {
    await ctx.reply('👇 Use buttons below', { reply_markup: mainKeyboard });
  });

  bot.catch(err => log.error('Bot error:', err.error));
}

/** Sends an alert to every chat the commands name as a target. */
export function createBroadcaster(bot: Bot, commands: ControlCommands, log: BotLogger = silentLogger) {
  return (msg: string): void => {
    for (const chatId of commands.alertTargets()) {
      bot.api.sendMessage(chatId, msg, { parse_mode: 'Markdown' }).catch((e: unknown) => {
        log.error('Send failed:', chatId, e);
      });
    }
  };
}
