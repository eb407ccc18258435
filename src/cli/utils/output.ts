import Table from 'cli-table3';
import chalk from 'chalk';

// Print formatted table using cli-table3 with cyan headers
export function printTable(headers: string[], rows: string[][]): void {
  const table = new Table({
    head: headers.map((h) => chalk.cyan(h)),
    style: { head: [], border: [] },
  });

  rows.forEach((row) => table.push(row));
  console.log(table.toString());
}

// Print error message to stderr with red X
export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

// Print info message with blue info icon
export function printInfo(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Format date for display. Returns - if null
export function formatDate(date: Date | null): string {
  if (!date) return '-';
  return date.toLocaleString();
}

// Soft-deleted rows show in red, active ones in green
export function formatActive(dateDel: Date | null): string {
  return dateDel ? chalk.red(`removed ${formatDate(dateDel)}`) : chalk.green('active');
}

export function orDash(value: string | number | null): string {
  return value === null || value === '' ? '-' : String(value);
}
