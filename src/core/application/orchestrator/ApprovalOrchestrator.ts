import type { CandidateSession, ChatTransport, Config, House, Keyboard, Logger, ResidencyStore } from '../../ports';
import { actionData } from '../../domain/actions';
import { houseLabel, type HouseResolver } from '../HouseResolver';
import type { CandidateSessionStore } from '../sessions/CandidateSessionStore';
import type { Notifier } from '../Notifier';
import type { RegistrationFlow } from './RegistrationFlow';

export interface JoinedMember {
  id: number;
  firstName: string;
  isBot: boolean;
}

// Approved and denied sessions may be replaced when the user joins again
const isTerminal = (session: CandidateSession): boolean =>
  session.status === 'approved' || session.status === 'denied';

const PLACEHOLDER = '—';

/**
 * Candidate lifecycle from joining a house chat to the administrator's
 * decision, and the departure cleanup afterwards.
 *
 * Store failures inside one operation are logged and the operation carries
 * on with what it has; transport failures never abort a decision.
 */
export class ApprovalOrchestrator {
  constructor(
    private readonly store: ResidencyStore,
    private readonly sessions: CandidateSessionStore,
    private readonly resolver: HouseResolver,
    private readonly registration: RegistrationFlow,
    private readonly notifier: Notifier,
    private readonly transport: ChatTransport,
    private readonly config: Config,
    private readonly logger: Logger,
  ) {}

  // ==================== House Chat Events ====================

  async onMembersJoined(chatId: number, chatTitle: string | undefined, members: JoinedMember[]): Promise<void> {
    try {
      await this.store.createHouse(chatId, chatTitle ? { name: chatTitle } : undefined);
    } catch (err) {
      this.logger.error({ err, chatId }, 'Failed to register house');
    }

    for (const member of members) {
      if (member.isBot) {
        continue;
      }

      // Keep a candidate that is already mid-way through registration
      const existing = this.sessions.get(member.id);
      if (!existing || isTerminal(existing)) {
        this.sessions.start(member.id, { status: 'awaiting_photo' }, chatId);
      } else if (existing.houseChatId === undefined) {
        this.sessions.cacheHouse(member.id, chatId);
      }

      await this.attempt('restrict', { chatId, userId: member.id }, () =>
        this.transport.restrictPosting(chatId, member.id, false),
      );
      await this.notifier.house(chatId, 'welcome_member', {
        first_name: member.firstName,
        bot_name: this.config.botName(),
      });
      this.logger.info({ chatId, userId: member.id }, 'Candidate joined');
    }
  }

  async onMemberLeft(chatId: number, userId: number): Promise<void> {
    try {
      const house = await this.store.findHouse(chatId);
      if (house) {
        await this.store.deactivateResident(userId, house.id);
      }

      // Vehicles stay active while the user still lives in some house
      const remaining = await this.store.countActiveResidencies(userId);
      if (remaining === 0) {
        const removed = await this.store.deactivateAllVehicles(userId);
        this.logger.debug({ userId, removed }, 'Deactivated vehicles of departed user');
      }
    } catch (err) {
      this.logger.error({ err, chatId, userId }, 'Failed to record departure');
    }

    if (this.sessions.get(userId)?.houseChatId === chatId) {
      this.sessions.clear(userId);
    }
    this.logger.info({ chatId, userId }, 'Member left');
  }

  // ==================== Private Chat ====================

  async onStart(userId: number, firstName: string): Promise<void> {
    await this.notifier.user(userId, 'welcome_private', { first_name: firstName }, [
      [{ text: this.notifier.userText('intro_button'), data: actionData.startIntroduction() }],
    ]);
  }

  async onIntroduction(userId: number): Promise<void> {
    this.sessions.transition(userId, { status: 'awaiting_confirm' });
    await this.notifier.user(userId, 'confirm_prompt', undefined, [
      [{ text: this.notifier.userText('confirm_button'), data: actionData.confirmResidence() }],
      [{ text: this.notifier.userText('decline_button'), data: actionData.notResiding() }],
    ]);
  }

  async onConfirmResidence(userId: number): Promise<void> {
    const resolution = await this.resolver.resolve(userId, { pendingAction: 'register' });
    if (resolution.kind !== 'resolved') {
      await this.notifier.user(userId, 'awaiting_clarification');
      return;
    }
    await this.startRegistration(userId, resolution.chatId);
  }

  async onNotResiding(userId: number): Promise<void> {
    const resolution = await this.resolver.resolve(userId);

    if (resolution.kind === 'resolved') {
      const chatId = resolution.chatId;
      const userLabel = await this.notifier.describeUser(userId, chatId);

      try {
        const house = await this.store.findHouse(chatId);
        if (house) {
          await this.store.deactivateResident(userId, house.id);
        }
      } catch (err) {
        this.logger.error({ err, chatId, userId }, 'Failed to deactivate declining user');
      }

      await this.attempt('remove', { chatId, userId }, () => this.transport.removeMember(chatId, userId));
      await this.notifier.house(chatId, 'member_declined', { user_label: userLabel });
    }

    await this.notifier.user(userId, 'not_residing');
    this.sessions.clear(userId);
  }

  async onPhoto(userId: number, fileRef: string): Promise<void> {
    const session = this.sessions.get(userId);

    // Only a candidate who owes a photo gets an administrator card
    if (!session || (session.status !== 'awaiting_photo' && session.status !== 'awaiting_new_photo')) {
      await this.notifier.user(userId, 'photo_reminder');
      return;
    }

    const resolution = await this.resolver.resolve(userId);
    const chatId = resolution.kind === 'resolved' ? resolution.chatId : undefined;
    const card = await this.buildCard(userId, chatId);

    await this.notifier.adminPhoto(fileRef, 'photo_card', card, this.decisionKeyboard(userId));
    this.sessions.transition(userId, { status: 'photo_sent' });
    await this.notifier.user(userId, 'photo_received');
    this.logger.info({ userId, chatId }, 'Photo forwarded for review');
  }

  async onPrivateText(userId: number, text: string): Promise<void> {
    // The administrator's next message answers a pending new-photo request
    if (userId === this.config.adminId()) {
      const target = this.sessions.takeReasonTarget();
      if (target !== null) {
        await this.relayReason(target, text.trim());
        return;
      }
      if (!this.sessions.get(userId)) {
        await this.notifier.admin('no_pending_reason');
        return;
      }
    }

    const session = this.sessions.get(userId);
    if (!session) {
      await this.notifier.user(userId, 'unknown_input');
      return;
    }

    switch (session.status) {
      case 'awaiting_confirm':
        if (session.step) {
          await this.registration.handleAnswer(userId, text);
        } else {
          await this.notifier.user(userId, 'unknown_input');
        }
        return;
      case 'awaiting_photo':
      case 'awaiting_new_photo':
        await this.notifier.user(userId, 'photo_reminder');
        return;
      case 'photo_sent':
        await this.notifier.user(userId, 'photo_received');
        return;
      default:
        await this.notifier.user(userId, 'unknown_input');
    }
  }

  // ==================== Administrator Decisions ====================

  async approve(userId: number): Promise<void> {
    const resolution = await this.resolver.resolve(userId, { pendingAction: 'approve' });
    if (resolution.kind !== 'resolved') {
      await this.notifier.user(userId, 'awaiting_clarification');
      return;
    }
    await this.completeApproval(userId, resolution.chatId);
  }

  async deny(userId: number): Promise<void> {
    const resolution = await this.resolver.resolve(userId, { pendingAction: 'deny' });
    if (resolution.kind !== 'resolved') {
      await this.notifier.user(userId, 'awaiting_clarification');
      return;
    }
    await this.completeDenial(userId, resolution.chatId);
  }

  async requestNewPhoto(userId: number): Promise<void> {
    this.sessions.awaitReasonFor(userId);
    const userLabel = await this.notifier.describeUser(userId, this.sessions.get(userId)?.houseChatId);
    await this.notifier.admin('ask_reason', { user_label: userLabel });
  }

  async onHouseChosen(userId: number, chatId: number): Promise<void> {
    const pending = this.resolver.choose(userId, chatId);
    const house = await this.findHouseQuietly(chatId);
    const userLabel = await this.notifier.describeUser(userId, chatId);
    await this.notifier.admin('house_chosen_ack', {
      user_label: userLabel,
      house: house ? houseLabel(house) : chatId,
    });

    // Resume whatever was waiting for the choice
    switch (pending) {
      case 'register':
        await this.notifier.user(userId, 'house_assigned');
        await this.startRegistration(userId, chatId);
        return;
      case 'approve':
        await this.completeApproval(userId, chatId);
        return;
      case 'deny':
        await this.completeDenial(userId, chatId);
        return;
      default:
        return;
    }
  }

  // ==================== Internals ====================

  private async startRegistration(userId: number, chatId: number): Promise<void> {
    try {
      const house = await this.store.findHouse(chatId);
      const resident = house ? await this.store.findResident(userId, house.id) : null;

      if (house && resident && !resident.dateDel) {
        await this.notifier.user(userId, 'already_registered', {
          name: resident.name ?? '',
          house: houseLabel(house),
        });
        return;
      }
    } catch (err) {
      this.logger.error({ err, userId, chatId }, 'Failed to look up resident');
      await this.notifier.user(userId, 'save_error');
      return;
    }

    await this.registration.begin(userId);
  }

  private async completeApproval(userId: number, chatId: number): Promise<void> {
    const userLabel = await this.notifier.describeUser(userId, chatId);

    await this.attempt('unrestrict', { chatId, userId }, () => this.transport.restrictPosting(chatId, userId, true));

    try {
      await this.activateResident(userId, chatId);
    } catch (err) {
      this.logger.error({ err, chatId, userId }, 'Failed to activate resident');
    }

    this.sessions.transition(userId, { status: 'approved' });

    const chatLink = await this.publicChatLink(chatId);
    await this.notifier.user(userId, 'approved', { chat_link: chatLink });
    await this.notifier.house(chatId, 'member_approved', { user_label: userLabel });
    await this.notifier.admin('approved_ack', { user_label: userLabel });
    this.logger.info({ chatId, userId }, 'Candidate approved');
  }

  // A row the questionnaire refilled is already active and carries the new
  // plates; only a row still marked departed gets its old vehicles back
  private async activateResident(userId: number, chatId: number): Promise<void> {
    const house = await this.store.createHouse(chatId);
    const resident = await this.store.findResident(userId, house.id);

    if (!resident) {
      await this.store.upsertResident(userId, house.id, {});
      return;
    }
    if (!resident.dateDel) {
      return;
    }

    const restored = await this.store.reactivateResident(userId, house.id);
    if (restored) {
      const vehicles = await this.store.reactivateVehicles(restored.id);
      this.logger.debug({ userId, chatId, vehicles }, 'Restored resident vehicles');
    }
  }

  private async completeDenial(userId: number, chatId: number): Promise<void> {
    const userLabel = await this.notifier.describeUser(userId, chatId);

    let house: House | null = null;
    try {
      house = await this.store.findHouse(chatId);
      if (house) {
        await this.store.deactivateResident(userId, house.id);
      }
    } catch (err) {
      this.logger.error({ err, chatId, userId }, 'Failed to deactivate resident');
    }

    await this.attempt('remove', { chatId, userId }, () => this.transport.removeMember(chatId, userId));

    // Session stays so a later rejoin starts over cleanly
    this.sessions.transition(userId, { status: 'denied' });

    await this.notifier.user(userId, 'denied');
    await this.notifier.house(chatId, 'member_denied', { user_label: userLabel });
    await this.notifier.admin('denied_ack', {
      user_label: userLabel,
      house: house ? houseLabel(house) : chatId,
    });
    this.logger.info({ chatId, userId }, 'Candidate denied');
  }

  private async relayReason(userId: number, reason: string): Promise<void> {
    const session = this.sessions.transition(userId, { status: 'awaiting_new_photo', reason });

    await this.notifier.user(userId, 'new_photo_requested', { reason });
    if (session.houseChatId !== undefined) {
      const userLabel = await this.notifier.describeUser(userId, session.houseChatId);
      await this.notifier.house(session.houseChatId, 'member_needs_clarification', { user_label: userLabel });
    }
    await this.notifier.admin('reason_saved');
  }

  private async buildCard(userId: number, chatId: number | undefined): Promise<Record<string, unknown>> {
    const card: Record<string, unknown> = {
      user_label: await this.notifier.describeUser(userId, chatId),
      user_id: userId,
      house: chatId ?? PLACEHOLDER,
      name: PLACEHOLDER,
      surname: PLACEHOLDER,
      apartment: PLACEHOLDER,
      phone: PLACEHOLDER,
      vehicles: PLACEHOLDER,
    };

    if (chatId === undefined) {
      return card;
    }

    try {
      const house = await this.store.findHouse(chatId);
      if (!house) {
        return card;
      }
      card.house = houseLabel(house);

      const resident = await this.store.findResident(userId, house.id);
      if (!resident) {
        return card;
      }
      card.name = resident.name ?? PLACEHOLDER;
      card.surname = resident.surname ?? PLACEHOLDER;
      card.apartment = resident.apartment ?? PLACEHOLDER;
      card.phone = resident.phone ?? PLACEHOLDER;

      const vehicles = await this.store.listVehicles(resident.id, true);
      if (vehicles.length > 0) {
        card.vehicles = vehicles.map((vehicle) => vehicle.plate).join(', ');
      }
    } catch (err) {
      this.logger.error({ err, userId, chatId }, 'Failed to load resident for review');
    }
    return card;
  }

  private decisionKeyboard(userId: number): Keyboard {
    return [
      [{ text: this.notifier.adminText('approve_button'), data: actionData.allow(userId) }],
      [{ text: this.notifier.adminText('deny_button'), data: actionData.deny(userId) }],
      [{ text: this.notifier.adminText('request_photo_button'), data: actionData.requestPhoto(userId) }],
    ];
  }

  // " @username" for public chats, nothing for private ones
  private async publicChatLink(chatId: number): Promise<string> {
    try {
      const info = await this.transport.getChatInfo(chatId);
      return info.username ? ` @${info.username}` : '';
    } catch (err) {
      this.logger.warn({ err, chatId }, 'Chat lookup failed');
      return '';
    }
  }

  private async findHouseQuietly(chatId: number): Promise<House | null> {
    try {
      return await this.store.findHouse(chatId);
    } catch (err) {
      this.logger.error({ err, chatId }, 'Failed to look up house');
      return null;
    }
  }

  private async attempt(action: string, context: Record<string, unknown>, call: () => Promise<void>): Promise<boolean> {
    try {
      await call();
      return true;
    } catch (err) {
      this.logger.error({ err, ...context }, `Transport call failed: ${action}`);
      return false;
    }
  }
}
