import type { House, Keyboard, Logger, PendingAction, ResidencyStore } from '../ports';
import { actionData } from '../domain/actions';
import type { CandidateSessionStore } from './sessions/CandidateSessionStore';
import type { Notifier } from './Notifier';

export type HouseResolution =
  | { kind: 'resolved'; chatId: number }
  | { kind: 'unresolved' }
  | { kind: 'ambiguous'; options: House[] };

export interface ResolveOptions {
  // Operation to resume once the administrator picks a house
  pendingAction?: PendingAction;
}

export const houseLabel = (house: House): string =>
  house.name ? `${house.name} (${house.chatId})` : String(house.chatId);

/**
 * Decides which house chat an operation on a user applies to.
 * Never guesses between several houses: the administrator picks one.
 */
export class HouseResolver {
  constructor(
    private readonly store: ResidencyStore,
    private readonly sessions: CandidateSessionStore,
    private readonly notifier: Notifier,
    private readonly logger: Logger,
  ) {}

  async resolve(userId: number, options: ResolveOptions = {}): Promise<HouseResolution> {
    const cached = this.sessions.get(userId)?.houseChatId;
    if (cached !== undefined) {
      return { kind: 'resolved', chatId: cached };
    }

    const houses = await this.store.listHousesForUser(userId);

    if (houses.length === 1) {
      this.sessions.cacheHouse(userId, houses[0].chatId);
      return { kind: 'resolved', chatId: houses[0].chatId };
    }

    // Suspend the operation until the administrator decides
    if (options.pendingAction) {
      this.sessions.setPendingAction(userId, options.pendingAction);
    }

    const userLabel = await this.notifier.describeUser(userId);

    if (houses.length === 0) {
      const known = await this.store.listHouses(true);
      this.logger.info({ userId, known: known.length }, 'No house on record for user');
      if (known.length === 0) {
        await this.notifier.admin('no_houses', { user_label: userLabel });
      } else {
        await this.notifier.admin('assign_house', { user_label: userLabel }, this.houseKeyboard(userId, known));
      }
      return { kind: 'unresolved' };
    }

    this.logger.info({ userId, houses: houses.map((house) => house.chatId) }, 'User belongs to several houses');
    await this.notifier.admin('choose_house', { user_label: userLabel }, this.houseKeyboard(userId, houses));
    return { kind: 'ambiguous', options: houses };
  }

  /**
   * Record the administrator's pick and hand back the operation that was
   * waiting for it, if any.
   */
  choose(userId: number, chatId: number): PendingAction | undefined {
    const pending = this.sessions.cacheHouse(userId, chatId).pendingAction;
    this.sessions.setPendingAction(userId, undefined);
    return pending;
  }

  private houseKeyboard(userId: number, houses: House[]): Keyboard {
    return houses.map((house) => [{ text: houseLabel(house), data: actionData.pickHouse(userId, house.chatId) }]);
  }
}
