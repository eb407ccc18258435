import { Command } from 'commander';
import { getCliContainer } from '../container';
import { errorMessage, formatDate, orDash, printError, printTable } from '../utils/output';

export function registerDumpCommands(program: Command): void {
  program
    .command('dump')
    .description('Print all houses, users and cars rows')
    .action(async () => {
      try {
        const { store, disconnect } = await getCliContainer();
        const { houses, residents, vehicles } = await store.dump();

        console.log('\n=== houses ===\n');
        printTable(
          ['id', 'chat_id', 'house_name', 'house_city', 'house_address', 'date_add', 'date_del'],
          houses.map((house) => [
            house.id.toString(),
            house.chatId.toString(),
            orDash(house.name),
            orDash(house.city),
            orDash(house.address),
            formatDate(house.dateAdd),
            formatDate(house.dateDel),
          ]),
        );

        console.log('\n=== users ===\n');
        printTable(
          ['id', 'tg_id', 'name', 'surname', 'house', 'apartment', 'phone', 'date_add', 'date_del'],
          residents.map((resident) => [
            resident.id.toString(),
            resident.tgId.toString(),
            orDash(resident.name),
            orDash(resident.surname),
            orDash(resident.houseId),
            orDash(resident.apartment),
            orDash(resident.phone),
            formatDate(resident.dateAdd),
            formatDate(resident.dateDel),
          ]),
        );

        console.log('\n=== cars ===\n');
        printTable(
          ['id', 'user', 'autonum', 'date_add', 'date_del'],
          vehicles.map((vehicle) => [
            vehicle.id.toString(),
            vehicle.residentId.toString(),
            vehicle.plate,
            formatDate(vehicle.dateAdd),
            formatDate(vehicle.dateDel),
          ]),
        );

        await disconnect();
      } catch (error) {
        printError(`Failed to dump database: ${errorMessage(error)}`);
        process.exit(1);
      }
    });
}
