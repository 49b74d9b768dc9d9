import { isKnownTimeZone } from '../../lib/isoDates';
import { ConfigurationError } from './errors';

export const DEFAULT_MAX_URLS_PER_SITEMAP = 50_000;
export const DEFAULT_MAX_SITEMAP_SIZE_MB = 50;
export const DEFAULT_TIME_ZONE = 'UTC';
export const DEFAULT_METADATA_FIELDS: readonly string[] = [
  'type',
  'manufacturer',
  'modelNumber',
  'title',
  'description',
  'category',
];

/**
 * The per-document limits from the sitemaps.org protocol, which a
 * deployment may tighten.
 */
export type SitemapLimits = {
  /**
   * The maximum number of url entries in a single sitemap document
   */
  readonly maxUrlsPerSitemap: number;
  /**
   * The maximum size of a single serialized sitemap document, in MiB of UTF-8
   */
  readonly maxSitemapSizeMb: number;
};

/**
 * The settings for one generation run. Created once, via
 * `createSitemapConfig`, before any document is built and never
 * modified afterwards.
 */
export type SitemapConfig = SitemapLimits & {
  /**
   * The URL the generated documents will be served from, always ending
   * with a slash, e.g., https://example.com/sitemaps/
   */
  readonly baseUrl: string;
  /**
   * The metadata columns the deployment expects. The core maps every
   * non-reserved column regardless; callers may use this to filter
   * columns before parsing.
   */
  readonly metadataFields: readonly string[];
  /**
   * The IANA timezone used to determine the generation date
   */
  readonly timeZone: string;
};

export type SitemapConfigOptions = {
  baseUrl: string;
  maxUrlsPerSitemap?: number;
  maxSitemapSizeMb?: number;
  metadataFields?: readonly string[];
  timeZone?: string;
};

/**
 * Appends the trailing slash to the base URL if it is missing, so that
 * filenames can be concatenated directly.
 */
export const normalizeBaseUrl = (baseUrl: string): string => {
  const trimmed = baseUrl.trim();
  return trimmed.endsWith('/') ? trimmed : `${trimmed}/`;
};

/**
 * Verifies that the given configuration is usable.
 *
 * @throws ConfigurationError describing the first problem found
 */
export const assertValidConfig = (config: SitemapConfig): void => {
  let parsed: URL;
  try {
    parsed = new URL(config.baseUrl);
  } catch (e) {
    throw new ConfigurationError(`base URL is not a valid URL: ${config.baseUrl}`);
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigurationError(`base URL must use http or https: ${config.baseUrl}`);
  }
  if (parsed.hostname === '') {
    throw new ConfigurationError(`base URL must have a host: ${config.baseUrl}`);
  }
  if (parsed.search !== '' || parsed.hash !== '') {
    throw new ConfigurationError(
      `base URL cannot have a query or fragment: ${config.baseUrl}`
    );
  }
  if (!config.baseUrl.endsWith('/')) {
    throw new ConfigurationError(`base URL must end with a slash: ${config.baseUrl}`);
  }

  if (!Number.isSafeInteger(config.maxUrlsPerSitemap) || config.maxUrlsPerSitemap <= 0) {
    throw new ConfigurationError(
      `max URLs per sitemap must be a positive integer, got ${config.maxUrlsPerSitemap}`
    );
  }
  if (!Number.isFinite(config.maxSitemapSizeMb) || config.maxSitemapSizeMb <= 0) {
    throw new ConfigurationError(
      `max sitemap size must be a positive number of MB, got ${config.maxSitemapSizeMb}`
    );
  }
  if (!isKnownTimeZone(config.timeZone)) {
    throw new ConfigurationError(`unknown time zone: ${config.timeZone}`);
  }
};

/**
 * Creates the immutable configuration for a run, filling in defaults and
 * normalizing the base URL.
 *
 * @throws ConfigurationError if the result would not be usable
 */
export const createSitemapConfig = (options: SitemapConfigOptions): SitemapConfig => {
  const metadataFields: string[] = [];
  for (const field of options.metadataFields ?? DEFAULT_METADATA_FIELDS) {
    const trimmed = field.trim();
    if (trimmed !== '' && !metadataFields.includes(trimmed)) {
      metadataFields.push(trimmed);
    }
  }

  const config: SitemapConfig = Object.freeze({
    baseUrl: normalizeBaseUrl(options.baseUrl),
    maxUrlsPerSitemap: options.maxUrlsPerSitemap ?? DEFAULT_MAX_URLS_PER_SITEMAP,
    maxSitemapSizeMb: options.maxSitemapSizeMb ?? DEFAULT_MAX_SITEMAP_SIZE_MB,
    metadataFields: Object.freeze(metadataFields),
    timeZone: options.timeZone ?? DEFAULT_TIME_ZONE,
  });
  assertValidConfig(config);
  return config;
};

/**
 * The maximum size of a single sitemap document in bytes
 */
export const maxSitemapBytes = (limits: SitemapLimits): number =>
  Math.floor(limits.maxSitemapSizeMb * 1024 * 1024);
