import { ConfigurationError } from './errors';
import {
  SitemapConfig,
  assertValidConfig,
  createSitemapConfig,
  maxSitemapBytes,
} from './SitemapConfig';

test('defaults', () => {
  expect(createSitemapConfig({ baseUrl: 'https://example.com/sitemaps/' })).toEqual({
    baseUrl: 'https://example.com/sitemaps/',
    maxUrlsPerSitemap: 50000,
    maxSitemapSizeMb: 50,
    metadataFields: ['type', 'manufacturer', 'modelNumber', 'title', 'description', 'category'],
    timeZone: 'UTC',
  });
});

test('trailing slash is added', () => {
  expect(createSitemapConfig({ baseUrl: 'https://example.com/sitemaps' }).baseUrl).toBe(
    'https://example.com/sitemaps/'
  );
  expect(createSitemapConfig({ baseUrl: ' https://example.com ' }).baseUrl).toBe(
    'https://example.com/'
  );
});

test('config is immutable', () => {
  const config = createSitemapConfig({ baseUrl: 'https://example.com/' });
  expect(Object.isFrozen(config)).toBe(true);
  expect(Object.isFrozen(config.metadataFields)).toBe(true);
});

test('metadata fields are trimmed and deduplicated in order', () => {
  expect(
    createSitemapConfig({
      baseUrl: 'https://example.com/',
      metadataFields: [' title ', 'type', '', 'title'],
    }).metadataFields
  ).toEqual(['title', 'type']);
});

test('invalid base urls', () => {
  expect(() => createSitemapConfig({ baseUrl: '' })).toThrow(ConfigurationError);
  expect(() => createSitemapConfig({ baseUrl: 'not a url' })).toThrow(
    'base URL is not a valid URL: not a url/'
  );
  expect(() => createSitemapConfig({ baseUrl: 'ftp://example.com/' })).toThrow(
    'base URL must use http or https: ftp://example.com/'
  );
  expect(() => createSitemapConfig({ baseUrl: 'https://example.com/?v=1' })).toThrow(
    ConfigurationError
  );
});

test('non-positive limits', () => {
  const baseUrl = 'https://example.com/';
  expect(() => createSitemapConfig({ baseUrl, maxUrlsPerSitemap: 0 })).toThrow(
    'max URLs per sitemap must be a positive integer, got 0'
  );
  expect(() => createSitemapConfig({ baseUrl, maxUrlsPerSitemap: 1.5 })).toThrow(
    ConfigurationError
  );
  expect(() => createSitemapConfig({ baseUrl, maxSitemapSizeMb: 0 })).toThrow(
    'max sitemap size must be a positive number of MB, got 0'
  );
  expect(() => createSitemapConfig({ baseUrl, maxSitemapSizeMb: NaN })).toThrow(
    ConfigurationError
  );
});

test('fractional size limit', () => {
  const config = createSitemapConfig({ baseUrl: 'https://example.com/', maxSitemapSizeMb: 0.5 });
  expect(maxSitemapBytes(config)).toBe(524288);
});

test('unknown time zone', () => {
  expect(() =>
    createSitemapConfig({ baseUrl: 'https://example.com/', timeZone: 'Mars/Olympus_Mons' })
  ).toThrow('unknown time zone: Mars/Olympus_Mons');
});

test('hand-made config without trailing slash', () => {
  const config: SitemapConfig = {
    baseUrl: 'https://example.com/sitemaps',
    maxUrlsPerSitemap: 10,
    maxSitemapSizeMb: 1,
    metadataFields: [],
    timeZone: 'UTC',
  };
  expect(() => assertValidConfig(config)).toThrow(
    'base URL must end with a slash: https://example.com/sitemaps'
  );
});
