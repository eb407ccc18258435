import { describe, it, expect, beforeEach } from 'vitest';
import { HouseResolver } from '../../core/application/HouseResolver';
import { Notifier } from '../../core/application/Notifier';
import { CandidateSessionStore } from '../../core/application/sessions/CandidateSessionStore';
import type { ChatTransport, House, Logger, ResidencyStore } from '../../core/ports';
import {
  ADMIN_ID,
  adminText,
  createMockLogger,
  createMockStore,
  createMockTransport,
  createTestConfig,
  type MockedStore,
  type MockedTransport,
} from '../helpers/mocks';

function createHouse(overrides: Partial<House> = {}): House {
  return {
    id: 1,
    chatId: -1001,
    name: 'Lenina 1',
    city: null,
    address: null,
    dateAdd: null,
    dateDel: null,
    ...overrides,
  };
}

describe('HouseResolver', () => {
  let store: MockedStore;
  let transport: MockedTransport;
  let sessions: CandidateSessionStore;
  let resolver: HouseResolver;

  beforeEach(() => {
    store = createMockStore();
    transport = createMockTransport();
    sessions = new CandidateSessionStore();
    const logger = createMockLogger() as unknown as Logger;
    const notifier = new Notifier(transport as unknown as ChatTransport, createTestConfig(), logger);
    resolver = new HouseResolver(store as unknown as ResidencyStore, sessions, notifier, logger);
  });

  it('uses the house already cached on the session', async () => {
    sessions.start(7, { status: 'awaiting_photo' }, -1001);

    await expect(resolver.resolve(7)).resolves.toEqual({ kind: 'resolved', chatId: -1001 });
    expect(store.listHousesForUser).not.toHaveBeenCalled();
  });

  it('resolves and caches the only house on record', async () => {
    store.listHousesForUser.mockResolvedValue([createHouse({ chatId: -2002 })]);

    await expect(resolver.resolve(7)).resolves.toEqual({ kind: 'resolved', chatId: -2002 });
    expect(sessions.get(7)?.houseChatId).toBe(-2002);
  });

  it('surfaces every house of a multi-house user and selects none', async () => {
    const first = createHouse({ id: 1, chatId: -1001, name: 'Lenina 1' });
    const second = createHouse({ id: 2, chatId: -1002, name: null });
    store.listHousesForUser.mockResolvedValue([first, second]);

    const result = await resolver.resolve(7, { pendingAction: 'approve' });

    expect(result).toEqual({ kind: 'ambiguous', options: [first, second] });
    expect(sessions.get(7)?.houseChatId).toBeUndefined();
    expect(sessions.get(7)?.pendingAction).toBe('approve');
    expect(transport.sendMessage).toHaveBeenCalledWith(ADMIN_ID, adminText('choose_house', { user_label: 'id 7' }), [
      [{ text: 'Lenina 1 (-1001)', data: 'pick_house:7:-1001' }],
      [{ text: '-1002', data: 'pick_house:7:-1002' }],
    ]);
  });

  it('offers every active house when the user has none', async () => {
    store.listHouses.mockResolvedValue([createHouse()]);

    const result = await resolver.resolve(7, { pendingAction: 'register' });

    expect(result).toEqual({ kind: 'unresolved' });
    expect(store.listHouses).toHaveBeenCalledWith(true);
    expect(transport.sendMessage).toHaveBeenCalledWith(ADMIN_ID, adminText('assign_house', { user_label: 'id 7' }), [
      [{ text: 'Lenina 1 (-1001)', data: 'pick_house:7:-1001' }],
    ]);
  });

  it('tells the administrator when no house is known at all', async () => {
    const result = await resolver.resolve(7);

    expect(result).toEqual({ kind: 'unresolved' });
    expect(transport.sendMessage).toHaveBeenCalledWith(
      ADMIN_ID,
      adminText('no_houses', { user_label: 'id 7' }),
      undefined,
    );
  });

  it('caches the chosen house and hands back the pending action once', async () => {
    sessions.setPendingAction(7, 'deny');

    expect(resolver.choose(7, -1002)).toBe('deny');
    expect(sessions.get(7)).toMatchObject({ houseChatId: -1002, pendingAction: undefined });
    await expect(resolver.resolve(7)).resolves.toEqual({ kind: 'resolved', chatId: -1002 });
  });
});
