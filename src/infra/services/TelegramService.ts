import { Markup, type Telegram } from 'telegraf';
import type { ChatPermissions, InlineKeyboardMarkup } from 'telegraf/types';
import type { ChatInfo, ChatTransport, Keyboard, MemberInfo } from '../../core/ports';

const MUTED: ChatPermissions = {
  can_send_messages: false,
  can_send_audios: false,
  can_send_documents: false,
  can_send_photos: false,
  can_send_videos: false,
  can_send_video_notes: false,
  can_send_voice_notes: false,
  can_send_polls: false,
  can_send_other_messages: false,
  can_add_web_page_previews: false,
};

const UNMUTED: ChatPermissions = {
  can_send_messages: true,
  can_send_audios: true,
  can_send_documents: true,
  can_send_photos: true,
  can_send_videos: true,
  can_send_video_notes: true,
  can_send_voice_notes: true,
  can_send_polls: true,
  can_send_other_messages: true,
  can_add_web_page_previews: true,
};

const toMarkup = (keyboard: Keyboard): InlineKeyboardMarkup =>
  Markup.inlineKeyboard(keyboard.map((row) => row.map((button) => Markup.button.callback(button.text, button.data))))
    .reply_markup;

/**
 * ChatTransport over the Telegram Bot API.
 * Errors from the API propagate; callers decide whether they are fatal.
 */
export class TelegramService implements ChatTransport {
  constructor(private readonly telegram: Telegram) {}

  // ==================== Messages ====================

  async sendMessage(chatId: number, text: string, keyboard?: Keyboard): Promise<void> {
    await this.telegram.sendMessage(chatId, text, keyboard ? { reply_markup: toMarkup(keyboard) } : undefined);
  }

  async sendPhoto(chatId: number, fileRef: string, caption?: string, keyboard?: Keyboard): Promise<void> {
    await this.telegram.sendPhoto(chatId, fileRef, {
      caption,
      reply_markup: keyboard ? toMarkup(keyboard) : undefined,
    });
  }

  // ==================== Membership ====================

  async restrictPosting(chatId: number, userId: number, allowed: boolean): Promise<void> {
    await this.telegram.restrictChatMember(chatId, userId, { permissions: allowed ? UNMUTED : MUTED });
  }

  async removeMember(chatId: number, userId: number): Promise<void> {
    await this.telegram.banChatMember(chatId, userId);
    // Unban right away so the user can join again later
    await this.telegram.unbanChatMember(chatId, userId);
  }

  async getMember(chatId: number, userId: number): Promise<MemberInfo> {
    const member = await this.telegram.getChatMember(chatId, userId);
    return {
      status: member.status,
      firstName: member.user.first_name,
      username: member.user.username,
    };
  }

  async getChatInfo(chatId: number): Promise<ChatInfo> {
    const chat = await this.telegram.getChat(chatId);
    return {
      title: 'title' in chat ? chat.title : undefined,
      username: 'username' in chat ? chat.username : undefined,
    };
  }
}
