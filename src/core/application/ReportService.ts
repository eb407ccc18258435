import type { Config, House, ResidencyStore, Resident, Vehicle } from '../ports';
import { chunkText } from '../utils/template';
import { houseLabel } from './HouseResolver';

type Cell = string | number | Date | null;

const formatCell = (value: Cell): string => {
  if (value === null) {
    return '';
  }
  return value instanceof Date ? value.toISOString() : String(value);
};

const formatRow = (values: Cell[]): string => values.map(formatCell).join(' | ');

const houseRow = (house: House): string =>
  formatRow([house.id, house.chatId, house.name, house.city, house.address, house.dateAdd, house.dateDel]);

const residentRow = (resident: Resident): string =>
  formatRow([
    resident.id,
    resident.tgId,
    resident.name,
    resident.surname,
    resident.houseId,
    resident.apartment,
    resident.phone,
    resident.dateAdd,
    resident.dateDel,
  ]);

const vehicleRow = (vehicle: Vehicle): string =>
  formatRow([vehicle.id, vehicle.residentId, vehicle.plate, vehicle.dateAdd, vehicle.dateDel]);

/**
 * Plain-text reports for the administrator's /db, /check and /checkall
 * commands, split into messages that fit the platform limit.
 */
export class ReportService {
  constructor(
    private readonly store: ResidencyStore,
    private readonly config: Config,
  ) {}

  async dumpDatabase(): Promise<string[]> {
    const { houses, residents, vehicles } = await this.store.dump();

    const lines = [
      'houses: id | chat_id | name | city | address | date_add | date_del',
      ...houses.map(houseRow),
      '',
      'users: id | tg_id | name | surname | house | apartment | phone | date_add | date_del',
      ...residents.map(residentRow),
      '',
      'cars: id | user | autonum | date_add | date_del',
      ...vehicles.map(vehicleRow),
    ];
    return this.paginate(lines);
  }

  // Null when no house is registered for the chat
  async checkHouse(chatId: number): Promise<string[] | null> {
    const house = await this.store.findHouse(chatId);
    if (!house) {
      return null;
    }
    return this.paginate(await this.describeHouse(house));
  }

  async checkAll(): Promise<string[]> {
    const houses = await this.store.listHouses(true);
    const lines: string[] = [];

    for (const house of houses) {
      if (lines.length > 0) {
        lines.push('');
      }
      lines.push(...(await this.describeHouse(house)));
    }

    return lines.length > 0 ? this.paginate(lines) : [this.emptyText()];
  }

  private async describeHouse(house: House): Promise<string[]> {
    const residents = await this.store.listByHouse(house.id, true);
    const lines = [houseLabel(house)];

    if (residents.length === 0) {
      lines.push(this.emptyText());
      return lines;
    }

    for (const resident of residents) {
      const vehicles = await this.store.listVehicles(resident.id, true);
      const fullName = [resident.name, resident.surname].filter(Boolean).join(' ');
      lines.push(
        formatRow([
          resident.tgId,
          fullName,
          resident.apartment,
          resident.phone,
          vehicles.map((vehicle) => vehicle.plate).join(', '),
        ]),
      );
    }
    return lines;
  }

  private emptyText(): string {
    return this.config.messaging().admin.report_empty;
  }

  private paginate(lines: string[]): string[] {
    return chunkText(lines.join('\n'), this.config.messageLimit());
  }
}
