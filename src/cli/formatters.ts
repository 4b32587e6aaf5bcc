/**
 * Output Formatters
 *
 * Renders store values for the terminal as a table or as JSON.
 *
 * @module kv-function-runtime/cli/formatters
 */

import Table from 'cli-table3';
import chalk from 'chalk';

/**
 * Supported output formats
 */
export type OutputFormat = 'json' | 'table';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'table'];

export function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}

/**
 * Create a formatted table
 */
export function createTable(headers: string[], colWidths?: number[]): Table.Table {
  const tableOptions: Table.TableConstructorOptions = {
    head: headers.map(h => chalk.bold(h)),
    style: {
      head: [],
      border: [],
    },
    wordWrap: true,
  };

  if (colWidths) {
    tableOptions.colWidths = colWidths;
  }

  return new Table(tableOptions);
}

/**
 * Format data as JSON
 */
export function formatJson(data: unknown, compact: boolean = false): string {
  if (compact) {
    return JSON.stringify(data);
  }
  return JSON.stringify(data, null, 2);
}

/**
 * Render a single value for a table cell
 */
export function formatCell(value: unknown): string {
  if (value === null || value === undefined) {
    return chalk.dim('-');
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? String(value) : value.toFixed(2);
  }
  if (typeof value === 'string') {
    return value;
  }
  return JSON.stringify(value);
}

/**
 * Key / value table of a JSON object, keys sorted
 */
export function formatKeyValueTable(data: Record<string, unknown>): string {
  const table = createTable(['Key', 'Value']);
  for (const key of Object.keys(data).sort()) {
    table.push([key, formatCell(data[key])]);
  }
  return table.toString();
}

/**
 * Render a metric reading with two decimals, or a dim dash when absent
 */
export function formatMetric(value: number | null): string {
  return value === null ? chalk.dim('-') : value.toFixed(2);
}

/**
 * Format date/time
 */
export function formatDateTime(date: Date | string | number): string {
  const d = new Date(date);
  return d.toISOString().replace('T', ' ').replace(/\.\d{3}Z$/, ' UTC');
}

/**
 * Format an error message
 */
export function formatError(error: Error | string, verbose: boolean = false): string {
  if (typeof error === 'string') {
    return chalk.red('Error: ') + error;
  }

  let output = chalk.red('Error: ') + error.message;

  if (verbose && error.stack) {
    output += '\n' + chalk.dim(error.stack);
  }

  return output;
}
