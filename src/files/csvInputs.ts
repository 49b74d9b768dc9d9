import fs from 'fs';
import path from 'path';
import { TextDecoder } from 'util';
import { parseCsvRows } from '../lib/csv';
import type { SitemapInput } from '../sitemaps/generateSitemaps';
import { InputError } from '../sitemaps/lib/errors';
import { LASTMOD_COLUMN, URL_COLUMN } from '../sitemaps/lib/parseRecords';

const CSV_EXTENSION = '.csv';
const INPUT_SUFFIX = '_input';
const UTF8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Lists the CSV files directly within the given directory, sorted by name.
 * Returns an empty list if the directory does not exist.
 */
export const discoverCsvFiles = (dir: string): string[] => {
  if (!fs.existsSync(dir)) {
    return [];
  }

  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(CSV_EXTENSION))
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(dir, name));
};

/**
 * The sitemap base name for a CSV file: the filename without its extension
 * and without the `_input` suffix, e.g., `products_input.csv` -> `products`
 */
export const sitemapNameForCsvFile = (csvPath: string): string => {
  let name = path.basename(csvPath);
  if (name.toLowerCase().endsWith(CSV_EXTENSION)) {
    name = name.slice(0, -CSV_EXTENSION.length);
  }
  if (name.endsWith(INPUT_SUFFIX) && name.length > INPUT_SUFFIX.length) {
    name = name.slice(0, -INPUT_SUFFIX.length);
  }
  return name;
};

/**
 * Keeps only the url column, the lastmod column and the given metadata
 * columns of each row, in their original order.
 *
 * @param rows the rows, header first
 * @param metadataFields the metadata columns to keep, matched exactly after
 *   trimming
 */
export function* restrictColumns(
  rows: Iterable<string[]>,
  metadataFields: readonly string[]
): Generator<string[], void, undefined> {
  let keep: number[] | null = null;
  for (const row of rows) {
    if (keep === null) {
      keep = [];
      for (let i = 0; i < row.length; i++) {
        const name = row[i].trim();
        const reserved = name.toLowerCase();
        if (reserved === URL_COLUMN || reserved === LASTMOD_COLUMN || metadataFields.includes(name)) {
          keep.push(i);
        }
      }
    }
    yield keep.map((i) => (i < row.length ? row[i] : ''));
  }
}

export type CsvInputOptions = {
  /**
   * If specified, only these metadata columns are kept; see restrictColumns
   */
  metadataFields?: readonly string[];
};

/**
 * Creates the input for the given CSV file. The file is only read once the
 * rows are iterated, so that files are read one at a time as they are
 * processed.
 *
 * @throws InputError with kind Unreadable, when iterated, if the file cannot be read
 *   or is not valid UTF-8
 */
export const createCsvInput = (csvPath: string, options?: CsvInputOptions): SitemapInput => {
  function* readRows(): Generator<string[], void, undefined> {
    let contents: Buffer;
    try {
      contents = fs.readFileSync(csvPath);
    } catch (e) {
      throw new InputError(
        'Unreadable',
        `could not read ${csvPath}: ${e instanceof Error ? e.message : String(e)}`
      );
    }

    let text: string;
    try {
      text = UTF8.decode(contents);
    } catch (e) {
      // the decoder only throws on malformed input
      throw new InputError('Unreadable', `${csvPath} is not valid UTF-8`);
    }
    yield* parseCsvRows(text);
  }

  const metadataFields = options?.metadataFields;
  return {
    name: sitemapNameForCsvFile(csvPath),
    rows: {
      [Symbol.iterator]: () =>
        metadataFields === undefined ? readRows() : restrictColumns(readRows(), metadataFields),
    },
  };
};
