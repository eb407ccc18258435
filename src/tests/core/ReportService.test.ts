import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Database as DatabaseType } from 'better-sqlite3';
import { ReportService } from '../../core/application/ReportService';
import { loadPolicyConfig } from '../../infra/config/loadPolicy';
import { openDatabase } from '../../infra/db/database';
import { ConfigImpl } from '../../infra/services/Config';
import { SqliteResidencyStore } from '../../infra/services/sqliteResidencyStore';
import { ADMIN_ID, BOT_NAME, adminText } from '../helpers/mocks';

describe('ReportService', () => {
  const now = new Date('2024-05-01T10:00:00.000Z');
  let db: DatabaseType;
  let store: SqliteResidencyStore;

  const reportsWithLimit = (messageLimit: number): ReportService =>
    new ReportService(
      store,
      new ConfigImpl({ ...loadPolicyConfig(), messageLimit }, { adminId: ADMIN_ID, botName: BOT_NAME }),
    );

  beforeEach(() => {
    db = openDatabase(':memory:');
    store = new SqliteResidencyStore(db, () => now);
  });

  afterEach(() => {
    db.close();
  });

  it('lists active residents of one house with their plates', async () => {
    const house = await store.createHouse(-1001, { name: 'Lenina 1' });
    const ivan = await store.upsertResident(7, house.id, {
      name: 'Ivan',
      surname: 'Petrov',
      apartment: '42',
      phone: '+79001234567',
    });
    await store.addVehicle(ivan.id, 'a111aa77');
    await store.upsertResident(8, house.id, { name: 'Anna' });
    await store.upsertResident(9, house.id, { name: 'Gone' });
    await store.deactivateResident(9, house.id);

    const pages = await reportsWithLimit(4096).checkHouse(-1001);

    expect(pages).toEqual([
      ['Lenina 1 (-1001)', '7 | Ivan Petrov | 42 | +79001234567 | a111aa77', '8 | Anna |  |  | '].join('\n'),
    ]);
  });

  it('returns null for an unknown house', async () => {
    expect(await reportsWithLimit(4096).checkHouse(-5)).toBeNull();
  });

  it('says so when there is nothing to report', async () => {
    expect(await reportsWithLimit(4096).checkAll()).toEqual([adminText('report_empty')]);

    await store.createHouse(-1001);
    expect(await reportsWithLimit(4096).checkAll()).toEqual([`-1001\n${adminText('report_empty')}`]);
  });

  it('reports every active house separated by a blank line', async () => {
    const first = await store.createHouse(-1001, { name: 'A' });
    const second = await store.createHouse(-1002, { name: 'B' });
    await store.upsertResident(7, first.id, { name: 'Ivan' });
    await store.upsertResident(8, second.id, { name: 'Anna' });

    expect(await reportsWithLimit(4096).checkAll()).toEqual([
      'A (-1001)\n7 | Ivan |  |  | \n\nB (-1002)\n8 | Anna |  |  | ',
    ]);
  });

  it('splits the database dump into messages within the limit', async () => {
    const house = await store.createHouse(-1001, { name: 'Lenina 1' });
    const resident = await store.upsertResident(7, house.id, { name: 'Ivan' });
    await store.addVehicle(resident.id, 'a111aa77');

    const pages = await reportsWithLimit(200).dumpDatabase();

    expect(pages.length).toBeGreaterThan(1);
    expect(pages.every((page) => page.length <= 200)).toBe(true);
    const lines = pages.join('\n').split('\n');
    expect(lines).toContain('1 | -1001 | Lenina 1 |  |  | 2024-05-01T10:00:00.000Z | ');
    expect(lines).toContain('1 | 7 | Ivan |  | 1 |  |  | 2024-05-01T10:00:00.000Z | ');
    expect(lines).toContain('1 | 1 | a111aa77 | 2024-05-01T10:00:00.000Z | ');
  });
});
