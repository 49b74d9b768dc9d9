import type { IsoDate } from '../../lib/isoDates';

/**
 * A single metadata field on a record, as [field name, value]. The field name
 * is the header text of the column it came from.
 */
export type MetadataEntry = [key: string, value: string];

export type SitemapRecord = {
  /**
   * The absolute http or https URL of the page, trimmed
   */
  location: string;

  /**
   * When the page was last modified, or null if the input did not say or
   * the date it gave was invalid
   */
  lastModified: IsoDate | null;

  /**
   * The non-blank metadata values for the page, in header order. Rendered
   * within the vendor metadata block of the sitemap.
   */
  metadata: MetadataEntry[];
};
