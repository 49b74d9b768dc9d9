import chalk from 'chalk';
import type { InputReport } from './sitemaps/generateSitemaps';
import type { RowDiagnostic } from './sitemaps/lib/parseRecords';

/**
 * Formats the given datetime in our standard way, with coloring.
 *
 * @param now The datetime to format and color
 * @returns The formatted date
 */
export const colorNow = (now?: Date): string => {
  return chalk.green((now ?? new Date()).toLocaleString());
};

/**
 * Formats the outcome of an input in our standard way, with coloring
 */
export const colorInputOutcome = (type: InputReport['type']): string => {
  switch (type) {
    case 'success':
      return chalk.greenBright('OK');
    case 'failure':
      return chalk.redBright('FAILED');
  }
};

/**
 * Formats a row diagnostic in our standard way, with coloring, e.g.,
 * `row 12 InvalidURL: url must be http(s) with a host: ftp://example.com`
 */
export const colorDiagnostic = (diagnostic: RowDiagnostic): string => {
  const kind =
    diagnostic.kind === 'InvalidDate'
      ? chalk.yellow(diagnostic.kind)
      : chalk.yellowBright(diagnostic.kind);
  return `${chalk.gray(`row ${diagnostic.row}`)} ${kind}${chalk.gray(':')} ${chalk.white(
    diagnostic.message
  )}`;
};

/**
 * Formats a byte count with thousands separators, e.g., `12,345 bytes`
 */
export const formatByteCount = (bytes: number): string => {
  return `${bytes.toLocaleString('en-US')} bytes`;
};
