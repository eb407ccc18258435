import type {
  AdminTemplate,
  ChatTransport,
  Config,
  HouseTemplate,
  Keyboard,
  Logger,
  UserTemplate,
} from '../ports';
import { renderTemplate } from '../utils/template';

type TemplateData = Record<string, unknown>;

/**
 * Renders message templates and delivers them through the chat transport.
 *
 * Every send is best-effort: a platform failure is logged and reported as
 * `false`, never thrown, so a workflow decision is not undone by a failed
 * notification.
 */
export class Notifier {
  constructor(
    private readonly transport: ChatTransport,
    private readonly config: Config,
    private readonly logger: Logger,
  ) {}

  userText(key: UserTemplate, data?: TemplateData): string {
    return renderTemplate(this.config.messaging().user[key], data);
  }

  adminText(key: AdminTemplate, data?: TemplateData): string {
    return renderTemplate(this.config.messaging().admin[key], data);
  }

  // Private chat with a user has the same id as the user
  async user(userId: number, key: UserTemplate, data?: TemplateData, keyboard?: Keyboard): Promise<boolean> {
    return this.send(userId, this.userText(key, data), keyboard);
  }

  async house(chatId: number, key: HouseTemplate, data?: TemplateData): Promise<boolean> {
    return this.send(chatId, renderTemplate(this.config.messaging().house[key], data));
  }

  async admin(key: AdminTemplate, data?: TemplateData, keyboard?: Keyboard): Promise<boolean> {
    return this.send(this.config.adminId(), this.adminText(key, data), keyboard);
  }

  async adminPhoto(fileRef: string, key: AdminTemplate, data: TemplateData, keyboard: Keyboard): Promise<boolean> {
    const adminId = this.config.adminId();
    try {
      await this.transport.sendPhoto(adminId, fileRef, this.adminText(key, data), keyboard);
      return true;
    } catch (err) {
      this.logger.error({ err, chatId: adminId }, 'Failed to send photo');
      return false;
    }
  }

  async send(chatId: number, text: string, keyboard?: Keyboard): Promise<boolean> {
    try {
      await this.transport.sendMessage(chatId, text, keyboard);
      return true;
    } catch (err) {
      this.logger.error({ err, chatId }, 'Failed to send message');
      return false;
    }
  }

  /**
   * Human label for a user: first name plus @username when the member
   * lookup succeeds, the bare id otherwise.
   */
  async describeUser(userId: number, chatId?: number): Promise<string> {
    if (chatId === undefined) {
      return `id ${userId}`;
    }

    try {
      const member = await this.transport.getMember(chatId, userId);
      return member.username ? `${member.firstName} (@${member.username})` : member.firstName;
    } catch (err) {
      this.logger.warn({ err, chatId, userId }, 'Member lookup failed');
      return `id ${userId}`;
    }
  }
}
