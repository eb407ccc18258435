#!/usr/bin/env node
import { Command } from 'commander';
import { registerHouseCommands } from './commands/house';
import { registerResidentCommands } from './commands/resident';
import { registerDumpCommands } from './commands/dump';
import { registerConfigCommands } from './commands/config';

// Load environment variables
import 'dotenv/config';

const program = new Command();

program
  .name('house-gate')
  .description('Read-only admin tools over the residents database')
  .version('1.0.0');

// Register command modules
registerHouseCommands(program);
registerResidentCommands(program);
registerDumpCommands(program);
registerConfigCommands(program);

// Parse and execute
program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
