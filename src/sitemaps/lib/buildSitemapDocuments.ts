import { EmptyDocumentError, InputError } from './errors';
import { SitemapLimits, maxSitemapBytes } from './SitemapConfig';
import { SitemapRecord } from './SitemapRecord';
import {
  METADATA_NAMESPACE,
  METADATA_PREFIX,
  SITEMAP_NAMESPACE,
  XML_DECLARATION,
  escapeXml,
  toElementName,
} from './xml';

export type SitemapDocument = {
  /**
   * The name of the document without extension. The first document for an
   * input uses the base name as-is, later parts append -2, -3, ...
   */
  name: string;
  /**
   * The filename the document should be written to, e.g., products-2.xml
   */
  filename: string;
  /**
   * The records within the document, in input order
   */
  records: SitemapRecord[];
  /**
   * The serialized document
   */
  xml: string;
  /**
   * The size of `xml` when encoded as UTF-8
   */
  byteLength: number;
};

const DOCUMENT_HEADER =
  `${XML_DECLARATION}\n` +
  `<urlset xmlns="${SITEMAP_NAMESPACE}" xmlns:${METADATA_PREFIX}="${METADATA_NAMESPACE}">\n`;
const DOCUMENT_FOOTER = '</urlset>\n';
const DOCUMENT_OVERHEAD_BYTES = Buffer.byteLength(DOCUMENT_HEADER + DOCUMENT_FOOTER, 'utf8');

/**
 * The filename for the sitemap document with the given name
 */
export const sitemapFilename = (name: string): string => `${name}.xml`;

/**
 * The name of the given 1-based part when an input is split across documents
 */
export const sitemapPartName = (baseName: string, part: number): string =>
  part === 1 ? baseName : `${baseName}-${part}`;

/**
 * Serializes a single record as a url element, including indentation and
 * the trailing line break.
 */
export const serializeRecord = (record: SitemapRecord): string => {
  let result = '  <url>\n';
  result += `    <loc>${escapeXml(record.location)}</loc>\n`;
  if (record.lastModified !== null) {
    result += `    <lastmod>${record.lastModified}</lastmod>\n`;
  }
  if (record.metadata.length > 0) {
    result += `    <${METADATA_PREFIX}:metadata>`;
    for (const [key, value] of record.metadata) {
      const element = toElementName(key);
      result += `<${element}>${escapeXml(value)}</${element}>`;
    }
    result += `</${METADATA_PREFIX}:metadata>\n`;
  }
  result += '  </url>\n';
  return result;
};

/**
 * Serializes the given records as a single urlset document, without
 * checking any limits.
 */
export const serializeSitemap = (records: SitemapRecord[]): string =>
  DOCUMENT_HEADER + records.map(serializeRecord).join('') + DOCUMENT_FOOTER;

/**
 * Packs the given records, in order, into as few sitemap documents as the
 * limits allow. Each record is serialized once and the size of each document
 * is tracked exactly, so every returned document is within both the url count
 * and the byte size limit.
 *
 * @param records the records for one input; iterated once
 * @param baseName the name of the first document
 * @param limits the per-document limits
 * @throws EmptyDocumentError if there are no records
 * @throws InputError with kind RecordTooLarge if a single record cannot fit
 *   within the size limit on its own
 */
export const buildSitemapDocuments = (
  records: Iterable<SitemapRecord>,
  baseName: string,
  limits: SitemapLimits
): SitemapDocument[] => {
  const maxBytes = maxSitemapBytes(limits);
  const documents: SitemapDocument[] = [];

  let currentRecords: SitemapRecord[] = [];
  let currentEntries: string[] = [];
  let currentBytes = DOCUMENT_OVERHEAD_BYTES;

  const closeCurrent = () => {
    const name = sitemapPartName(baseName, documents.length + 1);
    documents.push({
      name,
      filename: sitemapFilename(name),
      records: currentRecords,
      xml: DOCUMENT_HEADER + currentEntries.join('') + DOCUMENT_FOOTER,
      byteLength: currentBytes,
    });
    currentRecords = [];
    currentEntries = [];
    currentBytes = DOCUMENT_OVERHEAD_BYTES;
  };

  for (const record of records) {
    const entry = serializeRecord(record);
    const entryBytes = Buffer.byteLength(entry, 'utf8');
    if (DOCUMENT_OVERHEAD_BYTES + entryBytes > maxBytes) {
      throw new InputError(
        'RecordTooLarge',
        `entry for ${record.location} is ${entryBytes} bytes, which cannot fit within ` +
          `the ${maxBytes} byte sitemap limit`
      );
    }

    if (
      currentRecords.length > 0 &&
      (currentRecords.length + 1 > limits.maxUrlsPerSitemap || currentBytes + entryBytes > maxBytes)
    ) {
      closeCurrent();
    }

    currentRecords.push(record);
    currentEntries.push(entry);
    currentBytes += entryBytes;
  }

  if (currentRecords.length === 0) {
    throw new EmptyDocumentError(baseName);
  }
  closeCurrent();
  return documents;
};
