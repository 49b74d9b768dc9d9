#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import fs from 'fs';
import path from 'path';
import { inspect } from 'util';
import { CommandLineArgs } from './CommandLineArgs';
import { loadSitemapConfig } from './config';
import { createCsvInput, discoverCsvFiles } from './files/csvInputs';
import { writeSitemapOutputs } from './files/writeSitemapOutputs';
import { colorDiagnostic, colorInputOutcome, colorNow, formatByteCount } from './logging';
import { SitemapInput, SitemapManifest, generateSitemaps } from './sitemaps/generateSitemaps';
import { ConfigurationError } from './sitemaps/lib/errors';
import { SitemapConfig } from './sitemaps/lib/SitemapConfig';

async function main(): Promise<number> {
  const program = new Command();
  program
    .name('sitemap-generator')
    .version('0.0.1')
    .description(
      'Generates XML sitemaps, with vendor metadata, from CSV files of URLs, ' +
        'plus a sitemap index listing every generated sitemap'
    )
    .option('-i, --input <dir>', 'The directory containing the CSV files to convert', 'input')
    .option('-o, --output <dir>', 'The directory to write the XML files to', 'output')
    .option(
      '-s, --single <file>',
      'Convert only this CSV file rather than every CSV file in the input directory. ' +
        'The sitemap index is not written in this mode.'
    )
    .option(
      '-b, --base-url <url>',
      'The URL the XML files will be served from, e.g., https://example.com/sitemaps/. ' +
        'Defaults to SITEMAP_BASE_URL'
    )
    .option(
      '--max-urls <number>',
      'The maximum number of URLs per sitemap. Defaults to SITEMAP_MAX_URLS, or 50000'
    )
    .option(
      '--max-size-mb <number>',
      'The maximum size of a sitemap in MB. Defaults to SITEMAP_MAX_SIZE_MB, or 50'
    )
    .option(
      '--metadata-fields <fields>',
      'Comma-separated metadata columns. Defaults to SITEMAP_METADATA_FIELDS, or ' +
        'type,manufacturer,modelNumber,title,description,category'
    )
    .option(
      '--time-zone <tz>',
      'The IANA time zone for the generation date. Defaults to SITEMAP_TIME_ZONE, or UTC'
    )
    .option(
      '--restrict-metadata',
      'If specified, CSV columns other than url, lastmod and the metadata fields are ignored'
    )
    .option('--no-color', 'Disables colors in the console output')
    .parse();

  const optionsRaw = program.opts<{
    input: string;
    output: string;
    single?: string;
    baseUrl?: string;
    maxUrls?: string;
    maxSizeMb?: string;
    metadataFields?: string;
    timeZone?: string;
    restrictMetadata?: boolean;
    color: boolean;
  }>();
  const args: CommandLineArgs = {
    ...optionsRaw,
    restrictMetadata: optionsRaw.restrictMetadata ?? false,
  };
  if (!args.color) {
    chalk.level = 0;
  }

  console.log(
    `${colorNow()} ${chalk.whiteBright('starting...')}\n${chalk.gray(
      JSON.stringify(args, null, 2)
    )}`
  );

  let config: SitemapConfig;
  try {
    config = loadSitemapConfig(args, process.env);
  } catch (e) {
    if (e instanceof ConfigurationError) {
      console.error(`${colorNow()} ${chalk.redBright('configuration error:')} ${e.message}`);
      return 1;
    }
    throw e;
  }

  const inputOptions = args.restrictMetadata ? { metadataFields: config.metadataFields } : {};

  if (args.single !== undefined) {
    if (!fs.existsSync(args.single)) {
      console.error(`${colorNow()} ${chalk.redBright('file not found:')} ${args.single}`);
      return 1;
    }

    console.log(
      `${colorNow()} ${chalk.whiteBright('processing single file')} ${chalk.white(
        path.basename(args.single)
      )}`
    );
    const manifest = runGeneration(config, [createCsvInput(args.single, inputOptions)]);
    if (manifest.documents.length === 0) {
      return 1;
    }
    await writeOutputs(manifest, args.output, false);
    return 0;
  }

  const csvFiles = discoverCsvFiles(args.input);
  if (csvFiles.length === 0) {
    console.warn(
      `${colorNow()} ${chalk.yellowBright('no CSV files found in')} ${chalk.white(args.input)}`
    );
    return 1;
  }

  console.log(
    `${colorNow()} ${chalk.whiteBright('found')} ${chalk.green(
      csvFiles.length.toString()
    )} ${chalk.whiteBright('CSV file(s)')}`
  );
  const manifest = runGeneration(
    config,
    csvFiles.map((csvPath) => createCsvInput(csvPath, inputOptions))
  );
  if (manifest.documents.length === 0) {
    console.warn(`${colorNow()} ${chalk.yellowBright('no sitemaps generated')}`);
    return 1;
  }

  await writeOutputs(manifest, args.output, true);

  console.log(
    `${colorNow()} ${chalk.whiteBright('generation complete:')} ${chalk.green(
      manifest.documents.length.toString()
    )} ${chalk.white('sitemap(s) in')} ${chalk.white(args.output)}\n${chalk.gray(
      'next steps:\n' +
        `1. upload all XML files from ${args.output} to your web server\n` +
        `2. ensure they are accessible at ${config.baseUrl}\n` +
        `3. submit ${config.baseUrl}${manifest.index.filename} to search engines`
    )}`
  );
  return 0;
}

/**
 * Generates the sitemaps for the given inputs and logs what happened to
 * each input, including every row diagnostic.
 */
function runGeneration(config: SitemapConfig, inputs: SitemapInput[]): SitemapManifest {
  const manifest = generateSitemaps(config, inputs);

  for (const report of manifest.inputs) {
    const detail =
      report.type === 'success'
        ? chalk.gray(`${report.recordCount} URLs -> ${report.documents.join(', ')}`)
        : chalk.gray(`${report.error.kind}: ${report.error.message}`);
    console.log(
      `${colorNow()} ${colorInputOutcome(report.type)} ${chalk.white(report.name)} ${detail}`
    );
    for (const diagnostic of report.diagnostics) {
      console.warn(`${colorNow()}   ${colorDiagnostic(diagnostic)}`);
    }
  }

  return manifest;
}

async function writeOutputs(
  manifest: SitemapManifest,
  outputDir: string,
  includeIndex: boolean
): Promise<void> {
  const written = await writeSitemapOutputs(manifest, outputDir, { includeIndex });
  for (const file of written) {
    console.log(
      `${colorNow()} ${chalk.whiteBright(
        file.kind === 'index' ? 'generated sitemap index:' : 'generated sitemap:'
      )} ${chalk.white(path.basename(file.path))} ${chalk.gray(
        `(${file.entryCount} ${file.kind === 'index' ? 'sitemaps' : 'URLs'}, ${formatByteCount(
          file.byteLength
        )})`
      )}`
    );
  }
}

main().then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (e) => {
    console.error(`${colorNow()} ${chalk.redBright('unexpected error')}\n${chalk.gray(inspect(e))}`);
    process.exitCode = 1;
  }
);
