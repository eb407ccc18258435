import { Command } from 'commander';
import { getCliContainer } from '../container';
import { errorMessage, printError, printTable } from '../utils/output';

export function registerConfigCommands(program: Command): void {
  const configCmd = program
    .command('config')
    .description('Configuration viewing');

  configCmd
    .command('show')
    .description('Display questionnaire limits and message templates')
    .action(async () => {
      try {
        const { policy, databasePath, disconnect } = await getCliContainer();
        const rules = policy.questionnaire;

        console.log('\n=== Current Configuration ===\n');
        console.log(`Database: ${databasePath}\n`);

        console.log('Questionnaire:');
        printTable(
          ['Setting', 'Value'],
          [
            ['Name max length', rules.nameMaxLength.toString()],
            ['Banned words', rules.bannedWords.length.toString()],
            ['Apartment range', `${rules.apartment.min}..${rules.apartment.max}`],
            ['Max vehicles', rules.vehicles.max.toString()],
            ['Plate length', `${rules.plate.minLength}..${rules.plate.maxLength}`],
            ['Message limit', policy.messageLimit.toString()],
          ],
        );

        // Templates
        for (const [group, templates] of Object.entries(policy.templates)) {
          console.log(`\n=== ${group} templates ===\n`);
          for (const [name, template] of Object.entries(templates)) {
            console.log(`${name}:`);
            console.log(`  "${template}"\n`);
          }
        }

        await disconnect();
      } catch (error) {
        printError(`Failed to show config: ${errorMessage(error)}`);
        process.exit(1);
      }
    });
}
