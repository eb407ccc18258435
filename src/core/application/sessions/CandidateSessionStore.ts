import type { CandidateSession, PendingAction, SessionBase, SessionState } from '../../ports';

/**
 * In-memory candidate sessions keyed by Telegram user id, plus the
 * administrator's single "awaiting reason" input slot.
 *
 * Nothing here is persisted: a restart forgets every session and the
 * residency store stays the source of truth.
 */
export class CandidateSessionStore {
  private readonly sessions = new Map<number, CandidateSession>();
  // User whose new-photo reason the administrator is about to type
  private reasonTarget: number | null = null;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  get(userId: number): CandidateSession | undefined {
    return this.sessions.get(userId);
  }

  // Start a fresh session, dropping whatever the user had before
  start(userId: number, state: SessionState, houseChatId?: number): CandidateSession {
    const session = compose({ userId, joinedAt: this.clock(), houseChatId }, state);
    this.sessions.set(userId, session);
    return session;
  }

  // Existing session, or a new one waiting for the residence confirmation
  ensure(userId: number): CandidateSession {
    return this.sessions.get(userId) ?? this.start(userId, { status: 'awaiting_confirm' });
  }

  // Move to another state, keeping join time, house and pending action
  transition(userId: number, state: SessionState): CandidateSession {
    const session = compose(this.ensure(userId), state);
    this.sessions.set(userId, session);
    return session;
  }

  cacheHouse(userId: number, houseChatId: number): CandidateSession {
    const session = { ...this.ensure(userId), houseChatId };
    this.sessions.set(userId, session);
    return session;
  }

  setPendingAction(userId: number, pendingAction: PendingAction | undefined): CandidateSession {
    const session = { ...this.ensure(userId), pendingAction };
    this.sessions.set(userId, session);
    return session;
  }

  clear(userId: number): void {
    this.sessions.delete(userId);
  }

  // Last writer wins when two new-photo requests race
  awaitReasonFor(userId: number): void {
    this.reasonTarget = userId;
  }

  // Returns the user waiting for a reason and empties the slot
  takeReasonTarget(): number | null {
    const target = this.reasonTarget;
    this.reasonTarget = null;
    return target;
  }

  size(): number {
    return this.sessions.size;
  }
}

const compose = (base: SessionBase, state: SessionState): CandidateSession => ({
  userId: base.userId,
  joinedAt: base.joinedAt,
  houseChatId: base.houseChatId,
  pendingAction: base.pendingAction,
  ...state,
});
