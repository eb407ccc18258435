import type { Database as DatabaseType } from 'better-sqlite3';
import type {
  House,
  HouseDetails,
  Resident,
  ResidentFields,
  ResidencyStore,
  StoreDump,
  Vehicle,
} from '../../core/ports';

interface HouseRow {
  id: number;
  house_name: string | null;
  chat_id: number;
  house_city: string | null;
  house_address: string | null;
  date_add: string | null;
  date_del: string | null;
}

interface ResidentRow {
  id: number;
  tg_id: number;
  name: string | null;
  surname: string | null;
  house: number | null;
  apartment: string | null;
  phone: string | null;
  date_add: string | null;
  date_del: string | null;
}

interface VehicleRow {
  id: number;
  user: number;
  autonum: string;
  date_add: string | null;
  date_del: string | null;
}

const RESIDENT_FIELDS = ['name', 'surname', 'apartment', 'phone'] as const;

// Questionnaire field => users column
const RESIDENT_COLUMNS: Record<keyof ResidentFields, string> = {
  name: 'name',
  surname: 'surname',
  apartment: 'apartment',
  phone: 'phone',
};

const toDate = (value: string | null): Date | null => (value ? new Date(value) : null);

const toHouse = (row: HouseRow): House => ({
  id: row.id,
  chatId: row.chat_id,
  name: row.house_name,
  city: row.house_city,
  address: row.house_address,
  dateAdd: toDate(row.date_add),
  dateDel: toDate(row.date_del),
});

const toResident = (row: ResidentRow): Resident => ({
  id: row.id,
  tgId: row.tg_id,
  name: row.name,
  surname: row.surname,
  houseId: row.house,
  apartment: row.apartment,
  phone: row.phone,
  dateAdd: toDate(row.date_add),
  dateDel: toDate(row.date_del),
});

const toVehicle = (row: VehicleRow): Vehicle => ({
  id: row.id,
  residentId: row.user,
  plate: row.autonum,
  dateAdd: toDate(row.date_add),
  dateDel: toDate(row.date_del),
});

/**
 * ResidencyStore over a single SQLite file.
 *
 * Every write touches rows of one natural key (chat id, or tg id + house),
 * so statements run without explicit locking; the multi-statement cascades
 * are wrapped in better-sqlite3 transactions.
 */
export class SqliteResidencyStore implements ResidencyStore {
  constructor(
    private readonly db: DatabaseType,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  // ==================== Houses ====================

  async findHouse(chatId: number): Promise<House | null> {
    const row = this.db.prepare<[number], HouseRow>('SELECT * FROM houses WHERE chat_id = ?').get(chatId);
    return row ? toHouse(row) : null;
  }

  async createHouse(chatId: number, details?: HouseDetails): Promise<House> {
    const name = details?.name ?? null;

    // Unique chat_id makes this idempotent: a duplicate means "already exists"
    this.db
      .prepare<[number, string | null, string]>(
        'INSERT INTO houses (chat_id, house_name, date_add) VALUES (?, ?, ?) ON CONFLICT(chat_id) DO NOTHING',
      )
      .run(chatId, name, this.now());

    // Houses first seen without a title pick it up later
    if (name) {
      this.db
        .prepare<[string, number]>('UPDATE houses SET house_name = ? WHERE chat_id = ? AND house_name IS NULL')
        .run(name, chatId);
    }

    const house = await this.findHouse(chatId);
    if (!house) {
      throw new Error(`House for chat ${chatId} missing after insert`);
    }
    return house;
  }

  async listHouses(activeOnly: boolean): Promise<House[]> {
    const sql = activeOnly
      ? 'SELECT * FROM houses WHERE date_del IS NULL ORDER BY id'
      : 'SELECT * FROM houses ORDER BY id';
    return this.db.prepare<[], HouseRow>(sql).all().map(toHouse);
  }

  // ==================== Residents ====================

  async findResident(tgId: number, houseId: number | null): Promise<Resident | null> {
    // IS compares NULL house ids as equal, = would not
    const row = this.db
      .prepare<[number, number | null], ResidentRow>('SELECT * FROM users WHERE tg_id = ? AND house IS ?')
      .get(tgId, houseId);
    return row ? toResident(row) : null;
  }

  async findResidents(tgId: number): Promise<Resident[]> {
    return this.db
      .prepare<[number], ResidentRow>('SELECT * FROM users WHERE tg_id = ? ORDER BY id')
      .all(tgId)
      .map(toResident);
  }

  async listHousesForUser(tgId: number): Promise<House[]> {
    return this.db
      .prepare<[number], HouseRow>(
        'SELECT DISTINCT h.* FROM houses h JOIN users u ON u.house = h.id WHERE u.tg_id = ? ORDER BY h.id',
      )
      .all(tgId)
      .map(toHouse);
  }

  async upsertResident(tgId: number, houseId: number | null, fields: ResidentFields): Promise<Resident> {
    const existing = await this.findResident(tgId, houseId);

    // Only the fields actually supplied are written
    const entries = RESIDENT_FIELDS
      .filter((key) => fields[key] !== undefined)
      .map((key) => [RESIDENT_COLUMNS[key], fields[key] ?? null] as const);

    if (existing) {
      const assignments = [...entries.map(([column]) => `${column} = ?`), 'date_del = NULL'];
      this.db
        .prepare<unknown[]>(`UPDATE users SET ${assignments.join(', ')} WHERE id = ?`)
        .run(...entries.map(([, value]) => value), existing.id);
    } else {
      const columns = ['tg_id', 'house', 'date_add', ...entries.map(([column]) => column)];
      const placeholders = columns.map(() => '?').join(', ');
      this.db
        .prepare<unknown[]>(`INSERT INTO users (${columns.join(', ')}) VALUES (${placeholders})`)
        .run(tgId, houseId, this.now(), ...entries.map(([, value]) => value));
    }

    const resident = await this.findResident(tgId, houseId);
    if (!resident) {
      throw new Error(`Resident ${tgId} missing after upsert`);
    }
    return resident;
  }

  async deactivateResident(tgId: number, houseId: number): Promise<Resident | null> {
    const now = this.now();
    const deactivate = this.db.transaction((): ResidentRow | undefined => {
      // Keep the original removal time if the row is already inactive
      this.db
        .prepare<[string, number, number]>(
          'UPDATE users SET date_del = ? WHERE tg_id = ? AND house = ? AND date_del IS NULL',
        )
        .run(now, tgId, houseId);

      const row = this.db
        .prepare<[number, number], ResidentRow>('SELECT * FROM users WHERE tg_id = ? AND house = ?')
        .get(tgId, houseId);

      if (row) {
        this.db
          .prepare<[string, number]>('UPDATE cars SET date_del = ? WHERE user = ? AND date_del IS NULL')
          .run(now, row.id);
      }
      return row;
    });

    const row = deactivate();
    return row ? toResident(row) : null;
  }

  async reactivateResident(tgId: number, houseId: number): Promise<Resident | null> {
    this.db
      .prepare<[string, number, number]>(
        'UPDATE users SET date_del = NULL, date_add = ? WHERE tg_id = ? AND house = ?',
      )
      .run(this.now(), tgId, houseId);
    return this.findResident(tgId, houseId);
  }

  async countActiveResidencies(tgId: number): Promise<number> {
    const row = this.db
      .prepare<[number], { count: number }>(
        'SELECT COUNT(*) AS count FROM users WHERE tg_id = ? AND date_del IS NULL',
      )
      .get(tgId);
    return row?.count ?? 0;
  }

  async listByHouse(houseId: number, activeOnly: boolean): Promise<Resident[]> {
    const sql = activeOnly
      ? 'SELECT * FROM users WHERE house = ? AND date_del IS NULL ORDER BY id'
      : 'SELECT * FROM users WHERE house = ? ORDER BY id';
    return this.db.prepare<[number], ResidentRow>(sql).all(houseId).map(toResident);
  }

  // ==================== Vehicles ====================

  async addVehicle(residentId: number, plate: string): Promise<Vehicle> {
    const result = this.db
      .prepare<[number, string, string]>('INSERT INTO cars (user, autonum, date_add) VALUES (?, ?, ?)')
      .run(residentId, plate, this.now());

    const row = this.db
      .prepare<[number], VehicleRow>('SELECT * FROM cars WHERE id = ?')
      .get(Number(result.lastInsertRowid));
    if (!row) {
      throw new Error(`Vehicle for resident ${residentId} missing after insert`);
    }
    return toVehicle(row);
  }

  async listVehicles(residentId: number, activeOnly: boolean): Promise<Vehicle[]> {
    const sql = activeOnly
      ? 'SELECT * FROM cars WHERE user = ? AND date_del IS NULL ORDER BY id'
      : 'SELECT * FROM cars WHERE user = ? ORDER BY id';
    return this.db.prepare<[number], VehicleRow>(sql).all(residentId).map(toVehicle);
  }

  async reactivateVehicles(residentId: number): Promise<number> {
    const result = this.db
      .prepare<[number]>('UPDATE cars SET date_del = NULL WHERE user = ? AND date_del IS NOT NULL')
      .run(residentId);
    return result.changes;
  }

  async deactivateAllVehicles(tgId: number): Promise<number> {
    const result = this.db
      .prepare<[string, number]>(
        'UPDATE cars SET date_del = ? WHERE date_del IS NULL AND user IN (SELECT id FROM users WHERE tg_id = ?)',
      )
      .run(this.now(), tgId);
    return result.changes;
  }

  // ==================== Reporting ====================

  async dump(): Promise<StoreDump> {
    return {
      houses: this.db.prepare<[], HouseRow>('SELECT * FROM houses ORDER BY id').all().map(toHouse),
      residents: this.db.prepare<[], ResidentRow>('SELECT * FROM users ORDER BY id').all().map(toResident),
      vehicles: this.db.prepare<[], VehicleRow>('SELECT * FROM cars ORDER BY id').all().map(toVehicle),
    };
  }

  private now(): string {
    return this.clock().toISOString();
  }
}
