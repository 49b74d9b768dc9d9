import { CsvSyntaxError } from '../lib/csv';
import { IsoDate, formatIsoDate } from '../lib/isoDates';
import { SitemapDocument, buildSitemapDocuments } from './lib/buildSitemapDocuments';
import {
  IndexEntry,
  SITEMAP_INDEX_FILENAME,
  buildSitemapIndex,
  createIndexEntry,
} from './lib/buildSitemapIndex';
import { InputError, InputErrorKind } from './lib/errors';
import { RowDiagnostic, parseRecords } from './lib/parseRecords';
import { SitemapConfig, assertValidConfig } from './lib/SitemapConfig';

/**
 * One logical input, e.g., one CSV file
 */
export type SitemapInput = {
  /**
   * The base name for the documents generated from this input, e.g.,
   * `products` for products.xml, products-2.xml, ...
   */
  name: string;
  /**
   * The rows of the input, header first. Iterated at most once, and only
   * when this input's turn comes.
   */
  rows: Iterable<string[]>;
};

export type InputFailure = {
  kind: InputErrorKind;
  message: string;
};

/**
 * What happened to a single input during a run
 */
export type InputReport =
  | {
      type: 'success';
      name: string;
      /**
       * The names of the documents generated from this input, in order
       */
      documents: string[];
      /**
       * How many records made it into those documents
       */
      recordCount: number;
      diagnostics: RowDiagnostic[];
    }
  | {
      type: 'failure';
      name: string;
      error: InputFailure;
      /**
       * Row diagnostics collected before the input failed
       */
      diagnostics: RowDiagnostic[];
    };

export type GeneratedIndex = {
  filename: string;
  entries: IndexEntry[];
  xml: string;
};

/**
 * The result of a run: the single source of truth for what was generated,
 * what was skipped and why.
 */
export type SitemapManifest = {
  /**
   * The date of the run in the configured timezone
   */
  generatedOn: IsoDate;
  /**
   * One report per input, in input order
   */
  inputs: InputReport[];
  /**
   * Every generated sitemap document, in generation order
   */
  documents: SitemapDocument[];
  /**
   * The sitemap index over `documents`
   */
  index: GeneratedIndex;
};

export type GenerateSitemapsOptions = {
  /**
   * The instant of the run, used for the generation date. Defaults to now.
   */
  now?: Date;
};

const describeInputFailure = (e: unknown): InputFailure | null => {
  if (e instanceof InputError) {
    return { kind: e.kind, message: e.message };
  }
  if (e instanceof CsvSyntaxError) {
    return { kind: 'MalformedCSV', message: e.message };
  }
  return null;
};

const checkInputName = (name: string): void => {
  if (name.trim() === '' || /[\\/]/.test(name)) {
    throw new InputError('InvalidName', `not a usable sitemap name: ${JSON.stringify(name)}`);
  }
};

/**
 * Generates the sitemap documents for each of the given inputs, one input at
 * a time, followed by the sitemap index over every generated document.
 *
 * Failures are isolated per input: an input whose header is unusable, whose
 * CSV is malformed, which has no valid rows, or whose document names are
 * already taken is reported as failed in the manifest and produces no
 * documents, and the remaining inputs are processed as usual.
 *
 * @param config the settings for the run
 * @param inputs the inputs, in the order their documents should be indexed
 * @param options see GenerateSitemapsOptions
 * @throws ConfigurationError if the configuration is invalid, before any input is read
 */
export const generateSitemaps = (
  config: SitemapConfig,
  inputs: Iterable<SitemapInput>,
  options?: GenerateSitemapsOptions
): SitemapManifest => {
  assertValidConfig(config);
  const generatedOn = formatIsoDate(options?.now ?? new Date(), { tz: config.timeZone });

  const reports: InputReport[] = [];
  const documents: SitemapDocument[] = [];
  const usedFilenames = new Set<string>([SITEMAP_INDEX_FILENAME]);

  for (const input of inputs) {
    const diagnostics: RowDiagnostic[] = [];

    let produced: SitemapDocument[];
    try {
      checkInputName(input.name);
      produced = buildSitemapDocuments(
        parseRecords(input.rows, (diagnostic) => diagnostics.push(diagnostic)),
        input.name,
        config
      );

      const conflict = produced.find((document) => usedFilenames.has(document.filename));
      if (conflict !== undefined) {
        throw new InputError(
          'NameConflict',
          `${conflict.filename} is already used by another sitemap in this run`
        );
      }
    } catch (e) {
      const error = describeInputFailure(e);
      if (error === null) {
        throw e;
      }
      reports.push({ type: 'failure', name: input.name, error, diagnostics });
      continue;
    }

    for (const document of produced) {
      usedFilenames.add(document.filename);
      documents.push(document);
    }
    reports.push({
      type: 'success',
      name: input.name,
      documents: produced.map((document) => document.name),
      recordCount: produced.reduce((sum, document) => sum + document.records.length, 0),
      diagnostics,
    });
  }

  const entries = documents.map((document) =>
    createIndexEntry(document, config.baseUrl, generatedOn)
  );
  return {
    generatedOn,
    inputs: reports,
    documents,
    index: {
      filename: SITEMAP_INDEX_FILENAME,
      entries,
      xml: buildSitemapIndex(entries),
    },
  };
};
