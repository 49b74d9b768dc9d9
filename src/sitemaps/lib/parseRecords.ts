import { IsoDate, isIsoDate } from '../../lib/isoDates';
import { InputError, ValidationError, ValidationErrorKind } from './errors';
import { MetadataEntry, SitemapRecord } from './SitemapRecord';
import { hasControlOrNonXmlChars } from './xml';

/**
 * The header names which map onto record fields rather than metadata,
 * compared case-insensitively.
 */
export const URL_COLUMN = 'url';
export const LASTMOD_COLUMN = 'lastmod';

/**
 * A non-fatal problem with one data row
 */
export type RowDiagnostic = {
  /**
   * The 1-based row number, where the header is row 1
   */
  row: number;
  kind: ValidationErrorKind;
  message: string;
};

export type DiagnosticReporter = (diagnostic: RowDiagnostic) => void;

/**
 * Where each field of a record comes from within a row, resolved once from
 * the header.
 */
type ColumnPlan = {
  urlIndex: number;
  lastmodIndex: number | null;
  metadataColumns: { index: number; key: string }[];
};

const planColumns = (header: string[]): ColumnPlan => {
  const names = header.map((name) => name.trim());
  if (names.every((name) => name === '')) {
    throw new InputError('EmptyHeader', 'header row has no named columns');
  }

  const seen = new Set<string>();
  let urlIndex: number | null = null;
  let lastmodIndex: number | null = null;
  const metadataColumns: ColumnPlan['metadataColumns'] = [];

  for (let index = 0; index < names.length; index++) {
    const name = names[index];
    if (name === '') {
      continue;
    }

    const reserved = name.toLowerCase();
    const seenAs = reserved === URL_COLUMN || reserved === LASTMOD_COLUMN ? reserved : name;
    if (seen.has(seenAs)) {
      throw new InputError('DuplicateColumn', `duplicate column: ${name}`);
    }
    seen.add(seenAs);

    if (reserved === URL_COLUMN) {
      urlIndex = index;
    } else if (reserved === LASTMOD_COLUMN) {
      lastmodIndex = index;
    } else {
      metadataColumns.push({ index, key: name });
    }
  }

  if (urlIndex === null) {
    throw new InputError('MissingURLColumn', `missing required column: ${URL_COLUMN}`);
  }

  return { urlIndex, lastmodIndex, metadataColumns };
};

/**
 * Checks that the given string looks like an absolute http or https URL
 * with a host, e.g., https://example.com/a, and that it can be written to a
 * sitemap exactly as given: no tabs, line breaks or control characters.
 */
export const isValidLocation = (url: string): boolean => {
  if (!/^https?:\/\//i.test(url) || hasControlOrNonXmlChars(url)) {
    return false;
  }

  try {
    return new URL(url).hostname !== '';
  } catch (e) {
    return false;
  }
};

/**
 * Validates the raw url cell of a row, returning the trimmed location
 *
 * @throws ValidationError with kind MissingURL or InvalidURL
 */
export const validateLocation = (raw: string): string => {
  const url = raw.trim();
  if (url === '') {
    throw new ValidationError('MissingURL', 'url is blank');
  }
  if (!isValidLocation(url)) {
    throw new ValidationError(
      'InvalidURL',
      `url must be http(s) with a host: ${JSON.stringify(url).slice(1, -1)}`
    );
  }
  return url;
};

/**
 * Validates the raw lastmod cell of a row. Blank cells are not an error.
 *
 * @throws ValidationError with kind InvalidDate
 */
export const validateLastModified = (raw: string): IsoDate | null => {
  const value = raw.trim();
  if (value === '') {
    return null;
  }
  if (!isIsoDate(value)) {
    throw new ValidationError('InvalidDate', `lastmod must be a YYYY-MM-DD date: ${value}`);
  }
  return value;
};

const parseRow = (
  plan: ColumnPlan,
  fields: string[],
  rowNumber: number,
  report: DiagnosticReporter
): SitemapRecord => {
  const cell = (index: number): string => (index < fields.length ? fields[index] : '');

  const location = validateLocation(cell(plan.urlIndex));

  let lastModified: IsoDate | null = null;
  if (plan.lastmodIndex !== null) {
    try {
      lastModified = validateLastModified(cell(plan.lastmodIndex));
    } catch (e) {
      if (!(e instanceof ValidationError)) {
        throw e;
      }
      report({ row: rowNumber, kind: e.kind, message: e.message });
    }
  }

  const metadata: MetadataEntry[] = [];
  for (const { index, key } of plan.metadataColumns) {
    const value = cell(index).trim();
    if (value !== '') {
      metadata.push([key, value]);
    }
  }

  return { location, lastModified, metadata };
};

/**
 * Lazily converts rows of a table into sitemap records. The first row is the
 * header; `url` becomes the record location, `lastmod` its last-modified date,
 * and every other named column a metadata field.
 *
 * Rows with only blank fields are skipped. Rows with a missing or invalid
 * url are dropped and reported, and rows with an invalid lastmod are kept
 * without a date and reported; either way parsing continues.
 *
 * @param rows the rows, header first. Iterated at most once.
 * @param report receives a diagnostic for each problem row
 * @throws InputError if the header is unusable, on the first pull
 */
export function* parseRecords(
  rows: Iterable<string[]>,
  report: DiagnosticReporter
): Generator<SitemapRecord, void, undefined> {
  const iter = rows[Symbol.iterator]();
  const header = iter.next();
  if (header.done) {
    throw new InputError('EmptyHeader', 'input has no header row');
  }
  const plan = planColumns(header.value);

  let rowNumber = 1;
  for (let next = iter.next(); !next.done; next = iter.next()) {
    rowNumber++;
    const fields = next.value;
    if (fields.every((field) => field.trim() === '')) {
      continue;
    }

    try {
      yield parseRow(plan, fields, rowNumber, report);
    } catch (e) {
      if (!(e instanceof ValidationError)) {
        throw e;
      }
      report({ row: rowNumber, kind: e.kind, message: e.message });
    }
  }
}
