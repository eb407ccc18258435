import { Command } from 'commander';
import { getCliContainer } from '../container';
import {
  errorMessage,
  formatActive,
  formatDate,
  orDash,
  printError,
  printInfo,
  printTable,
} from '../utils/output';

const parseId = (raw: string): number => {
  if (!/^-?\d+$/.test(raw)) {
    throw new Error(`"${raw}" is not a numeric id`);
  }
  return Number(raw);
};

// Register resident lookups (residents <chatId>, resident <tgId>)
export function registerResidentCommands(program: Command): void {
  // residents <chatId> lists the residents of one house with their plates
  program
    .command('residents <chatId>')
    .description('List residents of a house chat')
    .option('--all', 'Include soft-deleted residents')
    .action(async (chatIdRaw: string, options: { all?: boolean }) => {
      try {
        const { store, disconnect } = await getCliContainer();
        const house = await store.findHouse(parseId(chatIdRaw));

        if (!house) {
          printError(`House with chat id ${chatIdRaw} not found`);
          await disconnect();
          process.exit(1);
        }

        const residents = await store.listByHouse(house.id, !options.all);
        console.log(`\n=== ${house.name ?? house.chatId} ===\n`);

        if (residents.length === 0) {
          printInfo('No residents');
          await disconnect();
          return;
        }

        const rows: string[][] = [];
        for (const resident of residents) {
          const vehicles = await store.listVehicles(resident.id, !options.all);
          rows.push([
            resident.tgId.toString(),
            orDash([resident.name, resident.surname].filter(Boolean).join(' ')),
            orDash(resident.apartment),
            orDash(resident.phone),
            orDash(vehicles.map((vehicle) => vehicle.plate).join(', ')),
            formatActive(resident.dateDel),
          ]);
        }
        printTable(['Telegram ID', 'Name', 'Apartment', 'Phone', 'Plates', 'State'], rows);

        await disconnect();
      } catch (error) {
        printError(`Failed to list residents: ${errorMessage(error)}`);
        process.exit(1);
      }
    });

  // resident <tgId> shows every house row of one user, active or not
  program
    .command('resident <tgId>')
    .description('Show all residency records of a Telegram user')
    .action(async (tgIdRaw: string) => {
      try {
        const { store, disconnect } = await getCliContainer();
        const tgId = parseId(tgIdRaw);
        const residents = await store.findResidents(tgId);

        if (residents.length === 0) {
          printInfo(`No records for user ${tgId}`);
          await disconnect();
          return;
        }

        const houses = await store.listHouses(false);
        const houseName = new Map(houses.map((house) => [house.id, house.name ?? house.chatId.toString()]));

        for (const resident of residents) {
          console.log(`\n=== Record ${resident.id} ===\n`);
          printTable(
            ['Field', 'Value'],
            [
              ['House', resident.houseId === null ? '-' : (houseName.get(resident.houseId) ?? String(resident.houseId))],
              ['Name', orDash(resident.name)],
              ['Surname', orDash(resident.surname)],
              ['Apartment', orDash(resident.apartment)],
              ['Phone', orDash(resident.phone)],
              ['Added', formatDate(resident.dateAdd)],
              ['State', formatActive(resident.dateDel)],
            ],
          );

          const vehicles = await store.listVehicles(resident.id, false);
          if (vehicles.length > 0) {
            printTable(
              ['Plate', 'Added', 'State'],
              vehicles.map((vehicle) => [vehicle.plate, formatDate(vehicle.dateAdd), formatActive(vehicle.dateDel)]),
            );
          }
        }

        await disconnect();
      } catch (error) {
        printError(`Failed to show resident: ${errorMessage(error)}`);
        process.exit(1);
      }
    });
}
