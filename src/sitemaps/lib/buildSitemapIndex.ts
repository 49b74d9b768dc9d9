import { IsoDate, latestIsoDate } from '../../lib/isoDates';
import type { SitemapDocument } from './buildSitemapDocuments';
import { SITEMAP_NAMESPACE, XML_DECLARATION, escapeXml } from './xml';

/**
 * The filename of the sitemap index. No sitemap document may use it.
 */
export const SITEMAP_INDEX_FILENAME = 'sitemap.xml';

export type IndexEntry = {
  /**
   * The absolute URL the sitemap document will be served from
   */
  location: string;
  /**
   * When the sitemap document was last modified
   */
  lastModified: IsoDate;
};

/**
 * Creates the index entry for a generated sitemap document. The document is
 * considered modified as of its most recently modified record; if none of its
 * records has a date, as of the generation date.
 *
 * @param document the generated document
 * @param baseUrl where documents are served from, ending with a slash
 * @param generatedOn the date of the generation run
 */
export const createIndexEntry = (
  document: Pick<SitemapDocument, 'filename' | 'records'>,
  baseUrl: string,
  generatedOn: IsoDate
): IndexEntry => ({
  location: `${baseUrl}${document.filename}`,
  lastModified: latestIsoDate(document.records.map((r) => r.lastModified)) ?? generatedOn,
});

/**
 * Serializes the sitemap index listing the given entries in order.
 */
export const buildSitemapIndex = (entries: IndexEntry[]): string => {
  const parts: string[] = [
    `${XML_DECLARATION}\n`,
    `<sitemapindex xmlns="${SITEMAP_NAMESPACE}">\n`,
  ];
  for (const entry of entries) {
    parts.push(
      '  <sitemap>\n',
      `    <loc>${escapeXml(entry.location)}</loc>\n`,
      `    <lastmod>${entry.lastModified}</lastmod>\n`,
      '  </sitemap>\n'
    );
  }
  parts.push('</sitemapindex>\n');
  return parts.join('');
};
