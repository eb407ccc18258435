import type { PhotoSize } from 'telegraf/types';
import { logger } from '../../infra/logger';
import type { ApprovalOrchestrator } from '../../core/application/orchestrator/ApprovalOrchestrator';
import type { Notifier } from '../../core/application/Notifier';
import type { ReportService } from '../../core/application/ReportService';
import { parseAction, type BotAction } from '../../core/domain/actions';
import type { Config } from '../../core/ports';
import type { SerialQueue } from './SerialQueue';
import type { TelegramClient } from './TelegramClient';

const CHAT_ID_PATTERN = /^-?\d+$/;

// Telegram lists sizes of one photo; keep the one with the most pixels
export const largestPhoto = (sizes: PhotoSize[]): PhotoSize | undefined =>
  sizes.reduce<PhotoSize | undefined>(
    (best, size) => (!best || size.width * size.height > best.width * best.height ? size : best),
    undefined,
  );

// Buttons only the administrator may press
const isAdminAction = (action: BotAction): boolean =>
  action.type === 'allow' || action.type === 'deny' || action.type === 'request_photo' || action.type === 'pick_house';

// Binds Telegram updates to the approval workflow and the admin reports
export class ResidentBot {
  constructor(
    private readonly telegram: TelegramClient,
    private readonly queue: SerialQueue,
    private readonly orchestrator: ApprovalOrchestrator,
    private readonly reports: ReportService,
    private readonly notifier: Notifier,
    private readonly config: Config,
  ) {}

  bind(): void {
    const bot = this.telegram.sdk;

    // One update at a time
    bot.use(this.queue.middleware());

    // /start in a private chat opens the introduction
    bot.start(async (ctx) => {
      if (ctx.chat.type !== 'private') {
        return;
      }
      await this.guard('start', () => this.orchestrator.onStart(ctx.from.id, ctx.from.first_name));
    });

    // ==================== Admin Commands ====================

    bot.command('db', async (ctx) => {
      if (!(await this.requireAdmin(ctx.from.id, ctx.chat.id))) {
        return;
      }
      await this.guard('db', async () => this.deliver(ctx.chat.id, await this.reports.dumpDatabase()));
    });

    bot.command('check', async (ctx) => {
      if (!(await this.requireAdmin(ctx.from.id, ctx.chat.id))) {
        return;
      }

      const arg = ctx.payload.trim();
      if (!CHAT_ID_PATTERN.test(arg)) {
        await this.notifier.send(ctx.chat.id, this.notifier.adminText('check_usage'));
        return;
      }

      const chatId = Number(arg);
      await this.guard('check', async () => {
        const pages = await this.reports.checkHouse(chatId);
        if (!pages) {
          await this.notifier.send(ctx.chat.id, this.notifier.adminText('unknown_house', { chat_id: chatId }));
          return;
        }
        await this.deliver(ctx.chat.id, pages);
      });
    });

    bot.command('checkall', async (ctx) => {
      if (!(await this.requireAdmin(ctx.from.id, ctx.chat.id))) {
        return;
      }
      await this.guard('checkall', async () => this.deliver(ctx.chat.id, await this.reports.checkAll()));
    });

    // ==================== Membership ====================

    bot.on('new_chat_members', async (ctx) => {
      const title = 'title' in ctx.chat ? ctx.chat.title : undefined;
      const members = ctx.message.new_chat_members.map((user) => ({
        id: user.id,
        firstName: user.first_name,
        isBot: user.is_bot,
      }));
      await this.guard('new_chat_members', () => this.orchestrator.onMembersJoined(ctx.chat.id, title, members));
    });

    bot.on('left_chat_member', async (ctx) => {
      const user = ctx.message.left_chat_member;
      if (user.is_bot) {
        return;
      }
      await this.guard('left_chat_member', () => this.orchestrator.onMemberLeft(ctx.chat.id, user.id));
    });

    // ==================== Private Messages ====================

    bot.on('photo', async (ctx) => {
      if (ctx.chat.type !== 'private') {
        return;
      }
      const photo = largestPhoto(ctx.message.photo);
      if (!photo) {
        return;
      }
      await this.guard('photo', () => this.orchestrator.onPhoto(ctx.from.id, photo.file_id));
    });

    bot.on('text', async (ctx) => {
      // Commands are handled above; unknown ones are ignored
      if (ctx.chat.type !== 'private' || ctx.message.text.startsWith('/')) {
        return;
      }
      await this.guard('text', () => this.orchestrator.onPrivateText(ctx.from.id, ctx.message.text));
    });

    // ==================== Buttons ====================

    bot.on('callback_query', async (ctx) => {
      const query = ctx.callbackQuery;
      const action = 'data' in query ? parseAction(query.data) : null;

      if (!action) {
        await this.answer(() => ctx.answerCbQuery());
        return;
      }

      if (isAdminAction(action) && query.from.id !== this.config.adminId()) {
        await this.answer(() => ctx.answerCbQuery(this.notifier.adminText('no_access')));
        return;
      }

      // Stop the button spinner before the slower work
      await this.answer(() => ctx.answerCbQuery());
      await this.guard(action.type, () => this.dispatch(query.from.id, action));
    });
  }

  private async dispatch(fromId: number, action: BotAction): Promise<void> {
    switch (action.type) {
      case 'start_introduction':
        return this.orchestrator.onIntroduction(fromId);
      case 'confirm_residence':
        return this.orchestrator.onConfirmResidence(fromId);
      case 'not_residing':
        return this.orchestrator.onNotResiding(fromId);
      case 'allow':
        return this.orchestrator.approve(action.userId);
      case 'deny':
        return this.orchestrator.deny(action.userId);
      case 'request_photo':
        return this.orchestrator.requestNewPhoto(action.userId);
      case 'pick_house':
        return this.orchestrator.onHouseChosen(action.userId, action.chatId);
    }
  }

  private async requireAdmin(userId: number, chatId: number): Promise<boolean> {
    if (userId === this.config.adminId()) {
      return true;
    }
    await this.notifier.send(chatId, this.notifier.adminText('no_access'));
    return false;
  }

  private async deliver(chatId: number, pages: string[]): Promise<void> {
    for (const page of pages) {
      await this.notifier.send(chatId, page);
    }
  }

  private async answer(call: () => Promise<unknown>): Promise<void> {
    try {
      await call();
    } catch (err) {
      logger.warn({ err }, 'Failed to answer callback query');
    }
  }

  // Log handler failures with the event that caused them
  private async guard(event: string, handler: () => Promise<void>): Promise<void> {
    try {
      await handler();
    } catch (err) {
      logger.error({ err, event }, 'Failed to handle update');
    }
  }
}
