import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Database as DatabaseType } from 'better-sqlite3';
import type { ApprovalOrchestrator } from '../../core/application/orchestrator/ApprovalOrchestrator';
import type { CandidateSessionStore } from '../../core/application/sessions/CandidateSessionStore';
import type { ChatTransport, Logger } from '../../core/ports';
import { buildWorkflows } from '../../infra/container';
import { openDatabase } from '../../infra/db/database';
import { SqliteResidencyStore } from '../../infra/services/sqliteResidencyStore';
import {
  ADMIN_ID,
  createMockLogger,
  createMockTransport,
  createTestConfig,
  houseText,
  sentTo,
  userText,
  type MockedTransport,
} from '../helpers/mocks';

const USER = 4242;
const HOUSE_CHAT = -1001;

describe('resident lifecycle', () => {
  let db: DatabaseType;
  let store: SqliteResidencyStore;
  let transport: MockedTransport;
  let sessions: CandidateSessionStore;
  let orchestrator: ApprovalOrchestrator;

  beforeEach(() => {
    db = openDatabase(':memory:');
    store = new SqliteResidencyStore(db);
    transport = createMockTransport();

    const workflows = buildWorkflows({
      store,
      transport: transport as unknown as ChatTransport,
      config: createTestConfig(),
      logger: createMockLogger() as unknown as Logger,
    });
    sessions = workflows.sessions;
    orchestrator = workflows.orchestrator;
  });

  afterEach(() => {
    db.close();
  });

  // Join the house chat and answer the whole questionnaire in private
  const joinAndRegister = async (): Promise<void> => {
    await orchestrator.onMembersJoined(HOUSE_CHAT, 'Lenina 1', [{ id: USER, firstName: 'Ivan', isBot: false }]);
    await orchestrator.onStart(USER, 'Ivan');
    await orchestrator.onIntroduction(USER);
    await orchestrator.onConfirmResidence(USER);
    for (const text of ['Ivan', 'Petrov', '42', '+79001234567', '1', 'м123мм77']) {
      await orchestrator.onPrivateText(USER, text);
    }
  };

  const residentRow = async () => {
    const house = await store.findHouse(HOUSE_CHAT);
    return house ? store.findResident(USER, house.id) : null;
  };

  it('registers a newcomer through the questionnaire', async () => {
    await orchestrator.onMembersJoined(HOUSE_CHAT, 'Lenina 1', [{ id: USER, firstName: 'Ivan', isBot: false }]);

    expect(sessions.get(USER)).toMatchObject({ status: 'awaiting_photo', houseChatId: HOUSE_CHAT });
    expect(transport.restrictPosting).toHaveBeenCalledWith(HOUSE_CHAT, USER, false);

    await joinAndRegister();

    const house = await store.findHouse(HOUSE_CHAT);
    expect(house).toMatchObject({ chatId: HOUSE_CHAT, name: 'Lenina 1' });

    const resident = await residentRow();
    expect(resident).toMatchObject({
      tgId: USER,
      houseId: house?.id,
      name: 'Ivan',
      surname: 'Petrov',
      apartment: '42',
      phone: '+79001234567',
      dateDel: null,
    });

    const vehicles = resident ? await store.listVehicles(resident.id, true) : [];
    expect(vehicles.map((vehicle) => vehicle.plate)).toEqual(['м123мм77']);
    expect(sessions.get(USER)?.status).toBe('awaiting_photo');
    expect(sentTo(transport, USER).at(-1)).toBe(userText('questionnaire_done'));
  });

  it('does not notify the administrator twice for a duplicate photo', async () => {
    await joinAndRegister();

    await orchestrator.onPhoto(USER, 'photo-1');
    await orchestrator.onPhoto(USER, 'photo-2');

    expect(transport.sendPhoto).toHaveBeenCalledTimes(1);
    expect(sessions.get(USER)?.status).toBe('photo_sent');
    expect(sentTo(transport, USER).slice(-2)).toEqual([userText('photo_received'), userText('photo_reminder')]);
  });

  it('removes a denied candidate but keeps the session for a later rejoin', async () => {
    await joinAndRegister();
    await orchestrator.onPhoto(USER, 'photo-1');

    await orchestrator.deny(USER);

    expect((await residentRow())?.dateDel).toBeInstanceOf(Date);
    expect(transport.removeMember).toHaveBeenCalledWith(HOUSE_CHAT, USER);
    expect(sentTo(transport, USER).at(-1)).toBe(userText('denied'));
    expect(sentTo(transport, HOUSE_CHAT).at(-1)).toBe(houseText('member_denied', { user_label: `User${USER}` }));
    expect(sessions.get(USER)?.status).toBe('denied');

    // Rejoining starts a fresh request
    await orchestrator.onMembersJoined(HOUSE_CHAT, 'Lenina 1', [{ id: USER, firstName: 'Ivan', isBot: false }]);
    expect(sessions.get(USER)?.status).toBe('awaiting_photo');
  });

  it('soft-deletes a departed resident and their vehicles once no house is left', async () => {
    await joinAndRegister();
    await orchestrator.onPhoto(USER, 'photo-1');
    await orchestrator.approve(USER);
    expect(transport.restrictPosting).toHaveBeenLastCalledWith(HOUSE_CHAT, USER, true);
    expect(sentTo(transport, ADMIN_ID).length).toBeGreaterThan(0);

    await orchestrator.onMemberLeft(HOUSE_CHAT, USER);

    const resident = await residentRow();
    expect(resident?.dateDel).toBeInstanceOf(Date);
    expect(await store.countActiveResidencies(USER)).toBe(0);
    const active = resident ? await store.listVehicles(resident.id, true) : [];
    expect(active).toEqual([]);
    expect(sessions.get(USER)).toBeUndefined();
  });

  it('keeps vehicles of other houses while the user still lives there', async () => {
    await joinAndRegister();
    const other = await store.createHouse(-2002, { name: 'Lenina 3' });
    const otherResident = await store.upsertResident(USER, other.id, { name: 'Ivan' });
    await store.addVehicle(otherResident.id, 'x777xx99');

    await orchestrator.onMemberLeft(HOUSE_CHAT, USER);

    const resident = await residentRow();
    expect(resident?.dateDel).toBeInstanceOf(Date);
    // The departed row loses its own vehicles only
    expect(resident ? await store.listVehicles(resident.id, true) : null).toEqual([]);
    const kept = await store.listVehicles(otherResident.id, true);
    expect(kept.map((vehicle) => vehicle.plate)).toEqual(['x777xx99']);
    expect(await store.countActiveResidencies(USER)).toBe(1);
  });

  it('restores vehicles when a resident is approved again', async () => {
    await joinAndRegister();
    await orchestrator.onMemberLeft(HOUSE_CHAT, USER);

    await orchestrator.onMembersJoined(HOUSE_CHAT, 'Lenina 1', [{ id: USER, firstName: 'Ivan', isBot: false }]);
    await orchestrator.onPhoto(USER, 'photo-1');
    await orchestrator.approve(USER);

    const resident = await residentRow();
    expect(resident?.dateDel).toBeNull();
    const active = resident ? await store.listVehicles(resident.id, true) : [];
    expect(active.map((vehicle) => vehicle.plate)).toEqual(['м123мм77']);
  });

  it('keeps only the newly declared plates after a denied resident registers again', async () => {
    await joinAndRegister();
    await orchestrator.onPhoto(USER, 'photo-1');
    await orchestrator.deny(USER);

    await joinAndRegister();
    await orchestrator.onPhoto(USER, 'photo-2');
    await orchestrator.approve(USER);

    const resident = await residentRow();
    expect(resident?.dateDel).toBeNull();
    const active = resident ? await store.listVehicles(resident.id, true) : [];
    expect(active.map((vehicle) => vehicle.plate)).toEqual(['м123мм77']);
    const all = resident ? await store.listVehicles(resident.id, false) : [];
    expect(all).toHaveLength(2);
  });
});
