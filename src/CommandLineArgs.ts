/**
 * The options accepted on the command line, before validation. Settings
 * which can also come from the environment are left as the raw strings
 * given, and are undefined when not specified.
 */
export type CommandLineArgs = {
  /**
   * The directory containing the CSV files to convert. Ignored if `single`
   * is set.
   */
  input: string;

  /**
   * The directory the sitemap documents and index are written to. Created
   * if it does not exist.
   */
  output: string;

  /**
   * If set, only this CSV file is converted, and no sitemap index is written.
   */
  single?: string;

  /**
   * Where the generated documents will be served from, e.g.,
   * https://example.com/sitemaps/
   */
  baseUrl?: string;

  /**
   * The maximum number of URLs per sitemap document
   */
  maxUrls?: string;

  /**
   * The maximum size of a sitemap document in MB
   */
  maxSizeMb?: string;

  /**
   * Comma-separated metadata column names
   */
  metadataFields?: string;

  /**
   * The IANA timezone used for the generation date
   */
  timeZone?: string;

  /**
   * If true, only the url, lastmod and configured metadata columns are
   * kept from each CSV file; all other columns are dropped before parsing.
   */
  restrictMetadata: boolean;

  /**
   * False to disable colors in the console output
   */
  color: boolean;
};
