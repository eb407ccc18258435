// Inline button payloads exchanged with the chat platform (max 64 bytes each)

export type BotAction =
  | { type: 'start_introduction' }
  | { type: 'confirm_residence' }
  | { type: 'not_residing' }
  | { type: 'allow'; userId: number }
  | { type: 'deny'; userId: number }
  | { type: 'request_photo'; userId: number }
  | { type: 'pick_house'; userId: number; chatId: number };

// Button payload builders, the inverse of parseAction
export const actionData = {
  startIntroduction: (): string => 'start_introduction',
  confirmResidence: (): string => 'confirm_residence',
  notResiding: (): string => 'not_residing',
  allow: (userId: number): string => `allow:${userId}`,
  deny: (userId: number): string => `deny:${userId}`,
  requestPhoto: (userId: number): string => `request_photo:${userId}`,
  pickHouse: (userId: number, chatId: number): string => `pick_house:${userId}:${chatId}`,
};

const ID_PATTERN = /^-?\d+$/;

const parseId = (value: string | undefined): number | null =>
  value !== undefined && ID_PATTERN.test(value) ? Number(value) : null;

// Decode a callback payload; null for anything this bot did not produce
export function parseAction(data: string): BotAction | null {
  const [type, ...args] = data.split(':');

  switch (type) {
    case 'start_introduction':
    case 'confirm_residence':
    case 'not_residing':
      return args.length === 0 ? { type } : null;
    case 'allow':
    case 'deny':
    case 'request_photo': {
      const userId = parseId(args[0]);
      return userId !== null && args.length === 1 ? { type, userId } : null;
    }
    case 'pick_house': {
      const userId = parseId(args[0]);
      const chatId = parseId(args[1]);
      return userId !== null && chatId !== null && args.length === 2 ? { type, userId, chatId } : null;
    }
    default:
      return null;
  }
}
