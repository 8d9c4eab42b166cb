/**
 * Console output for commands
 *
 * Results, tables and progress go to stdout; verbose lines and errors go to
 * stderr so `--json` output stays a single document.
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat, ParameterChange } from '../types.js';

/**
 * Print a command's result: the whole object in JSON mode, otherwise a
 * marked message followed by its suggestions
 */
export function printResult<T>(result: CommandResult<T>, format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  const marker = result.notice ? chalk.blue('ℹ') : result.success ? chalk.green('✓') : chalk.red('✗');
  console.log(marker, result.message);

  for (const hint of result.errors ?? []) {
    console.log(chalk.gray(`  ${hint}`));
  }
}

/**
 * Print the parameters a dry run would change, one `NAME  old -> new` line
 * each
 */
export function printChanges(changes: ParameterChange[]): void {
  if (changes.length === 0) {
    console.log(chalk.gray('Parameters already match'));
    return;
  }

  const width = Math.max(...changes.map((change) => change.name.length));
  for (const change of changes) {
    const from = change.from === undefined ? chalk.gray('(unset)') : chalk.red(change.from);
    console.log(`${chalk.bold(change.name.padEnd(width))}  ${from} -> ${chalk.green(change.to)}`);
  }
}

/**
 * Print label/value pairs with aligned values; empty values are skipped
 */
export function printKeyValues(pairs: Array<[string, string | number | undefined]>): void {
  const shown = pairs.filter(
    (pair): pair is [string, string | number] => pair[1] !== undefined && pair[1] !== ''
  );
  const width = Math.max(0, ...shown.map(([label]) => label.length));

  for (const [label, value] of shown) {
    console.log(`${chalk.gray(label.padEnd(width))}  ${value}`);
  }
}

/**
 * Print rows under upper-case column headers
 */
export function printTable(headers: string[], rows: string[][]): void {
  const widths = headers.map((heading, column) =>
    Math.max(heading.length, ...rows.map((row) => (row[column] ?? '').length))
  );

  const line = (cells: string[]): string =>
    cells
      .map((cell, column) => (column === cells.length - 1 ? cell : cell.padEnd(widths[column])))
      .join('  ')
      .trimEnd();

  console.log(chalk.bold(line(headers.map((heading) => heading.toUpperCase()))));
  for (const row of rows) {
    console.log(line(row));
  }
}

/**
 * Start a progress line ("Updating to X... ")
 */
export function step(message: string): void {
  process.stdout.write(`${message}... `);
}

/**
 * Finish a progress line started with step()
 */
export function done(ok = true, label = ok ? 'OK' : 'FAILED'): void {
  console.log(ok ? chalk.green(label) : chalk.red(label));
}

/**
 * Progress line that prints only in human mode and knows whether it is open
 */
export class Progress {
  private open = false;

  constructor(private readonly enabled: boolean) {}

  start(message: string): void {
    if (this.enabled) step(message);
    this.open = true;
  }

  finish(label = 'OK'): void {
    if (this.open && this.enabled) done(true, label);
    this.open = false;
  }

  fail(label = 'FAILED'): void {
    if (this.open && this.enabled) done(false, label);
    this.open = false;
  }
}

const TIME_UNITS: Array<[string, number]> = [
  ['year', 365 * 24 * 3600 * 1000],
  ['month', 30 * 24 * 3600 * 1000],
  ['day', 24 * 3600 * 1000],
  ['hour', 3600 * 1000],
  ['minute', 60 * 1000],
  ['second', 1000],
];

/**
 * Relative time ("3 days ago"); empty for a missing or invalid timestamp
 */
export function humanizeTime(isoTimestamp: string | undefined, now: number = Date.now()): string {
  if (!isoTimestamp) return '';
  const then = Date.parse(isoTimestamp);
  if (Number.isNaN(then)) return '';

  const elapsed = Math.max(0, now - then);
  for (const [unit, size] of TIME_UNITS) {
    const count = Math.floor(elapsed / size);
    if (count >= 1) {
      return `${count} ${unit}${count === 1 ? '' : 's'} ago`;
    }
  }
  return 'just now';
}

/** Informational line */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/** Warning line */
export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

/** Error line, on stderr */
export function error(message: string): void {
  console.error(chalk.red('✗'), message);
}

/** Success line */
export function success(message: string): void {
  console.log(chalk.green('✓'), message);
}

/**
 * Diagnostic line for --verbose, on stderr
 */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) console.error(chalk.gray('[verbose]'), message);
}
