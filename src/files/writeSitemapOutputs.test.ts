import crypto from 'crypto';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { parseCsvRows } from '../lib/csv';
import { generateSitemaps } from '../sitemaps/generateSitemaps';
import { createSitemapConfig } from '../sitemaps/lib/SitemapConfig';
import { writeSitemapOutputs } from './writeSitemapOutputs';

const withDir = async (fn: (dir: string) => Promise<void> | void) => {
  const dir = path.join(os.tmpdir(), crypto.randomBytes(16).toString('hex'));

  try {
    await fn(dir);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
};

const config = createSitemapConfig({ baseUrl: 'https://example.com/', maxUrlsPerSitemap: 1 });
const NOW = new Date(Date.UTC(2025, 2, 1, 12, 0));

test('writes documents and index', async () => {
  await withDir(async (dir) => {
    const manifest = generateSitemaps(
      config,
      [{ name: 'pages', rows: parseCsvRows('url\nhttps://example.com/a\nhttps://example.com/b\n') }],
      { now: NOW }
    );
    const outputDir = path.join(dir, 'out');

    const written = await writeSitemapOutputs(manifest, outputDir, { includeIndex: true });

    expect(written.map((f) => [path.basename(f.path), f.kind, f.entryCount])).toEqual([
      ['pages.xml', 'sitemap', 1],
      ['pages-2.xml', 'sitemap', 1],
      ['sitemap.xml', 'index', 2],
    ]);
    expect(fs.readFileSync(path.join(outputDir, 'pages-2.xml'), 'utf8')).toBe(
      manifest.documents[1].xml
    );
    expect(fs.readFileSync(path.join(outputDir, 'sitemap.xml'), 'utf8')).toBe(manifest.index.xml);
    expect(written[0].byteLength).toBe(fs.statSync(path.join(outputDir, 'pages.xml')).size);
  });
});

test('index can be left out', async () => {
  await withDir(async (dir) => {
    const manifest = generateSitemaps(
      config,
      [{ name: 'pages', rows: parseCsvRows('url\nhttps://example.com/a\n') }],
      { now: NOW }
    );

    const written = await writeSitemapOutputs(manifest, dir, { includeIndex: false });

    expect(written.map((f) => f.kind)).toEqual(['sitemap']);
    expect(fs.existsSync(path.join(dir, 'sitemap.xml'))).toBe(false);
  });
});

test('no index without documents', async () => {
  await withDir(async (dir) => {
    const manifest = generateSitemaps(config, [{ name: 'empty', rows: parseCsvRows('url\n') }], {
      now: NOW,
    });

    const written = await writeSitemapOutputs(manifest, dir, { includeIndex: true });

    expect(written).toEqual([]);
    expect(fs.readdirSync(dir)).toEqual([]);
  });
});
