import { CommandLineArgs } from './CommandLineArgs';
import { ConfigurationError } from './sitemaps/lib/errors';
import { SitemapConfig, createSitemapConfig } from './sitemaps/lib/SitemapConfig';

/**
 * The environment variables consulted for settings not given on the
 * command line.
 */
export const ENVIRONMENT_VARIABLES = {
  baseUrl: 'SITEMAP_BASE_URL',
  maxUrls: 'SITEMAP_MAX_URLS',
  maxSizeMb: 'SITEMAP_MAX_SIZE_MB',
  metadataFields: 'SITEMAP_METADATA_FIELDS',
  timeZone: 'SITEMAP_TIME_ZONE',
} as const;

type ConfigurableSetting = keyof typeof ENVIRONMENT_VARIABLES;

const resolveSetting = (
  setting: ConfigurableSetting,
  args: Pick<CommandLineArgs, ConfigurableSetting>,
  env: NodeJS.ProcessEnv
): string | undefined => {
  const fromArgs = args[setting];
  if (fromArgs !== undefined) {
    return fromArgs;
  }
  const fromEnv = env[ENVIRONMENT_VARIABLES[setting]];
  if (fromEnv === undefined || fromEnv.trim() === '') {
    return undefined;
  }
  return fromEnv;
};

/**
 * Parses a base-10 integer, rejecting anything but digits
 *
 * @throws ConfigurationError if the value is not an integer
 */
export const parseIntegerSetting = (name: string, value: string): number => {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigurationError(`${name} must be an integer, got ${JSON.stringify(value)}`);
  }
  return parseInt(trimmed, 10);
};

/**
 * Parses a non-negative decimal number like 50 or 0.5
 *
 * @throws ConfigurationError if the value is not a number
 */
export const parseNumberSetting = (name: string, value: string): number => {
  const trimmed = value.trim();
  if (!/^(\d+(\.\d*)?|\.\d+)$/.test(trimmed)) {
    throw new ConfigurationError(`${name} must be a number, got ${JSON.stringify(value)}`);
  }
  return parseFloat(trimmed);
};

/**
 * Splits a comma-separated list of field names
 */
export const parseFieldList = (value: string): string[] =>
  value
    .split(',')
    .map((field) => field.trim())
    .filter((field) => field !== '');

/**
 * Resolves the configuration for a run. Each setting comes from the command
 * line if given there, otherwise from its environment variable, otherwise
 * from the default. The base URL has no default.
 *
 * @param args the parsed command line
 * @param env usually process.env
 * @throws ConfigurationError if a setting is missing or invalid
 */
export const loadSitemapConfig = (
  args: Pick<CommandLineArgs, ConfigurableSetting>,
  env: NodeJS.ProcessEnv
): SitemapConfig => {
  const baseUrl = resolveSetting('baseUrl', args, env);
  if (baseUrl === undefined) {
    throw new ConfigurationError(
      `a base URL is required, via --base-url or ${ENVIRONMENT_VARIABLES.baseUrl}`
    );
  }

  const maxUrls = resolveSetting('maxUrls', args, env);
  const maxSizeMb = resolveSetting('maxSizeMb', args, env);
  const metadataFields = resolveSetting('metadataFields', args, env);

  return createSitemapConfig({
    baseUrl,
    maxUrlsPerSitemap:
      maxUrls === undefined ? undefined : parseIntegerSetting('max URLs per sitemap', maxUrls),
    maxSitemapSizeMb:
      maxSizeMb === undefined ? undefined : parseNumberSetting('max sitemap size', maxSizeMb),
    metadataFields: metadataFields === undefined ? undefined : parseFieldList(metadataFields),
    timeZone: resolveSetting('timeZone', args, env)?.trim(),
  });
};
