import { Command } from 'commander';
import { getCliContainer } from '../container';
import { errorMessage, formatActive, formatDate, orDash, printError, printInfo, printTable } from '../utils/output';

export function registerHouseCommands(program: Command): void {
  program
    .command('houses')
    .description('List every registered house chat')
    .option('--active', 'Only houses that are not soft-deleted')
    .action(async (options: { active?: boolean }) => {
      try {
        const { store, disconnect } = await getCliContainer();
        const houses = await store.listHouses(options.active ?? false);

        if (houses.length === 0) {
          printInfo('No houses registered yet');
          await disconnect();
          return;
        }

        printTable(
          ['ID', 'Chat ID', 'Name', 'City', 'Address', 'Added', 'State'],
          houses.map((house) => [
            house.id.toString(),
            house.chatId.toString(),
            orDash(house.name),
            orDash(house.city),
            orDash(house.address),
            formatDate(house.dateAdd),
            formatActive(house.dateDel),
          ]),
        );

        await disconnect();
      } catch (error) {
        printError(`Failed to list houses: ${errorMessage(error)}`);
        process.exit(1);
      }
    });
}
