import { XMLParser } from 'fast-xml-parser';
import {
  buildSitemapDocuments,
  serializeRecord,
  serializeSitemap,
} from './buildSitemapDocuments';
import { EmptyDocumentError } from './errors';
import { SitemapLimits } from './SitemapConfig';
import { SitemapRecord } from './SitemapRecord';

const DEFAULT_LIMITS: SitemapLimits = { maxUrlsPerSitemap: 50_000, maxSitemapSizeMb: 50 };

const record = (location: string, overrides?: Partial<SitemapRecord>): SitemapRecord => ({
  location,
  lastModified: null,
  metadata: [],
  ...overrides,
});

const numberedRecords = (count: number): SitemapRecord[] => {
  const result: SitemapRecord[] = [];
  for (let i = 1; i <= count; i++) {
    result.push(record(`https://example.com/page/${i}`));
  }
  return result;
};

/**
 * The size limit, in MB, which allows exactly the given number of bytes
 */
const megabytesFor = (bytes: number): number => bytes / (1024 * 1024);

const xmlParser = new XMLParser({
  parseTagValue: false,
  isArray: (name) => name === 'url',
});

test('single record with metadata', () => {
  const documents = buildSitemapDocuments(
    [
      record('https://example.com/a', {
        metadata: [
          ['type', 'Article'],
          ['topic', 'News'],
        ],
      }),
    ],
    'docs',
    DEFAULT_LIMITS
  );

  const expectedXml =
    '<?xml version="1.0" encoding="UTF-8"?>\n' +
    '<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9" ' +
    'xmlns:coveo="https://www.coveo.com/en/company/about-us">\n' +
    '  <url>\n' +
    '    <loc>https://example.com/a</loc>\n' +
    '    <coveo:metadata><type>Article</type><topic>News</topic></coveo:metadata>\n' +
    '  </url>\n' +
    '</urlset>\n';
  expect(documents).toHaveLength(1);
  expect(documents[0].name).toBe('docs');
  expect(documents[0].filename).toBe('docs.xml');
  expect(documents[0].xml).toBe(expectedXml);
  expect(documents[0].byteLength).toBe(Buffer.byteLength(expectedXml, 'utf8'));
});

test('record with lastmod and no metadata', () => {
  expect(serializeRecord(record('https://example.com/a', { lastModified: '2025-01-02' }))).toBe(
    '  <url>\n    <loc>https://example.com/a</loc>\n    <lastmod>2025-01-02</lastmod>\n  </url>\n'
  );
});

test('record without lastmod or metadata', () => {
  expect(serializeRecord(record('https://example.com/a'))).toBe(
    '  <url>\n    <loc>https://example.com/a</loc>\n  </url>\n'
  );
});

test('element order is loc, lastmod, metadata', () => {
  expect(
    serializeRecord(
      record('https://example.com/a', { lastModified: '2025-01-02', metadata: [['title', 'A']] })
    )
  ).toBe(
    '  <url>\n' +
      '    <loc>https://example.com/a</loc>\n' +
      '    <lastmod>2025-01-02</lastmod>\n' +
      '    <coveo:metadata><title>A</title></coveo:metadata>\n' +
      '  </url>\n'
  );
});

test('special characters are escaped', () => {
  expect(
    serializeRecord(
      record('https://example.com/?a=1&b=<2>', { metadata: [['title', `Tom's "best" & <worst>`]] })
    )
  ).toBe(
    '  <url>\n' +
      '    <loc>https://example.com/?a=1&amp;b=&lt;2&gt;</loc>\n' +
      '    <coveo:metadata><title>Tom&apos;s &quot;best&quot; &amp; &lt;worst&gt;</title></coveo:metadata>\n' +
      '  </url>\n'
  );
});

test('invalid metadata names are sanitized', () => {
  expect(serializeRecord(record('https://example.com/a', { metadata: [['in stock', 'yes']] }))).toBe(
    '  <url>\n' +
      '    <loc>https://example.com/a</loc>\n' +
      '    <coveo:metadata><in_stock>yes</in_stock></coveo:metadata>\n' +
      '  </url>\n'
  );
});

test('location and metadata decode back to the original values', () => {
  const records = [
    record('https://example.com/search?q=a&b="c"', {
      metadata: [
        ['title', `It's <b>bold</b> & "quoted"`],
        ['category', 'Parts & Accessories'],
        ['modelNumber', '0042'],
      ],
    }),
    record('https://example.com/plain', { metadata: [['type', 'Article']] }),
  ];
  const [document] = buildSitemapDocuments(records, 'roundtrip', DEFAULT_LIMITS);

  const parsed = xmlParser.parse(document.xml);
  const urls: { loc: string; 'coveo:metadata': { [key: string]: string } }[] = parsed.urlset.url;
  expect(urls.map((url) => url.loc)).toEqual(records.map((r) => r.location));
  expect(urls.map((url) => Object.entries(url['coveo:metadata']))).toEqual(
    records.map((r) => r.metadata)
  );
});

test('splits when the url count would be exceeded', () => {
  const records = numberedRecords(5);
  const documents = buildSitemapDocuments(records, 'products', {
    maxUrlsPerSitemap: 2,
    maxSitemapSizeMb: 50,
  });

  expect(documents.map((d) => d.name)).toEqual(['products', 'products-2', 'products-3']);
  expect(documents.map((d) => d.filename)).toEqual([
    'products.xml',
    'products-2.xml',
    'products-3.xml',
  ]);
  expect(documents.map((d) => d.records.length)).toEqual([2, 2, 1]);
  expect(documents.flatMap((d) => d.records)).toEqual(records);
  for (const document of documents) {
    expect(document.xml).toBe(serializeSitemap(document.records));
  }
});

test('emits ceil(n / max) documents', () => {
  for (const [count, max, expected] of [
    [7, 3, 3],
    [6, 3, 2],
    [3, 3, 1],
    [1, 1, 1],
    [10, 1, 10],
  ]) {
    const records = numberedRecords(count);
    const documents = buildSitemapDocuments(records, 'n', {
      maxUrlsPerSitemap: max,
      maxSitemapSizeMb: 50,
    });
    expect(documents).toHaveLength(expected);
    expect(documents.flatMap((d) => d.records)).toEqual(records);
  }
});

test('splits when the byte size would be exceeded', () => {
  const records = numberedRecords(5);
  const overhead = Buffer.byteLength(serializeSitemap([]), 'utf8');
  const entryBytes = Buffer.byteLength(serializeRecord(records[0]), 'utf8');
  const maxBytes = overhead + 2 * entryBytes;

  const documents = buildSitemapDocuments(records, 'sized', {
    maxUrlsPerSitemap: 50_000,
    maxSitemapSizeMb: megabytesFor(maxBytes),
  });

  expect(documents.map((d) => d.records.length)).toEqual([2, 2, 1]);
  expect(documents.map((d) => d.byteLength)).toEqual([maxBytes, maxBytes, overhead + entryBytes]);
  for (const document of documents) {
    expect(document.byteLength).toBe(Buffer.byteLength(document.xml, 'utf8'));
  }
});

test('size is measured in utf-8 bytes', () => {
  const [document] = buildSitemapDocuments(
    [record('https://example.com/a', { metadata: [['title', 'caf\u00e9']] })],
    'bytes',
    DEFAULT_LIMITS
  );
  expect(document.byteLength).toBe(document.xml.length + 1);
});

test('no records', () => {
  expect(() => buildSitemapDocuments([], 'empty', DEFAULT_LIMITS)).toThrow(EmptyDocumentError);
  expect(() => buildSitemapDocuments([], 'empty', DEFAULT_LIMITS)).toThrow(
    'no valid URLs found for empty'
  );
});

test('record too large for any document', () => {
  const records = numberedRecords(1);
  const overhead = Buffer.byteLength(serializeSitemap([]), 'utf8');
  const entryBytes = Buffer.byteLength(serializeRecord(records[0]), 'utf8');

  let error: unknown = undefined;
  try {
    buildSitemapDocuments(records, 'tiny', {
      maxUrlsPerSitemap: 10,
      maxSitemapSizeMb: megabytesFor(overhead + entryBytes - 1),
    });
  } catch (e) {
    error = e;
  }
  expect(error).toMatchObject({ name: 'InputError', kind: 'RecordTooLarge' });
});
