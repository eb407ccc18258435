import { Telegraf } from 'telegraf';
import { logger } from '../../infra/logger';

// Wrapper around the Telegraf instance for lifecycle management and error logging
export class TelegramClient {
  private readonly bot: Telegraf;

  constructor(token: string) {
    this.bot = new Telegraf(token);

    // Log how long each update took
    this.bot.use(async (ctx, next) => {
      const started = Date.now();
      await next();
      logger.debug({ updateType: ctx.updateType, ms: Date.now() - started }, 'Update handled');
    });

    // Last resort for errors escaping a handler
    this.bot.catch((err, ctx) => {
      logger.error({ err, updateType: ctx.updateType }, 'Failed to handle update');
    });
  }

  // Start long polling; resolves once the bot is receiving updates
  start(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.bot
        .launch(() => {
          logger.info({ username: this.bot.botInfo?.username }, 'Telegram bot launched');
          resolve();
        })
        .catch((err: unknown) => {
          logger.error({ err }, 'Polling stopped with an error');
          reject(err);
        });
    });
  }

  shutdown(reason: string): void {
    this.bot.stop(reason);
  }

  // Expose raw Telegraf instance for event binding and API calls
  get sdk(): Telegraf {
    return this.bot;
  }
}
