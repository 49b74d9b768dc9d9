import fs from 'fs';
import path from 'path';
import type { SitemapManifest } from '../sitemaps/generateSitemaps';

export type WrittenFile = {
  /**
   * Where the file was written
   */
  path: string;
  /**
   * How many url or sitemap entries the file contains
   */
  entryCount: number;
  /**
   * The size of the file in bytes
   */
  byteLength: number;
  kind: 'sitemap' | 'index';
};

export type WriteSitemapOutputsOptions = {
  /**
   * Whether to write the sitemap index as well as the documents. Even if
   * true, the index is only written when there is at least one document.
   */
  includeIndex: boolean;
};

/**
 * Writes every generated document in the manifest, and optionally the
 * index, to the given directory, creating it if necessary. Existing files
 * with the same names are replaced.
 */
export const writeSitemapOutputs = async (
  manifest: SitemapManifest,
  outputDir: string,
  options: WriteSitemapOutputsOptions
): Promise<WrittenFile[]> => {
  await fs.promises.mkdir(outputDir, { recursive: true });

  const written: WrittenFile[] = [];
  for (const document of manifest.documents) {
    const filePath = path.join(outputDir, document.filename);
    await fs.promises.writeFile(filePath, document.xml, 'utf8');
    written.push({
      path: filePath,
      entryCount: document.records.length,
      byteLength: document.byteLength,
      kind: 'sitemap',
    });
  }

  if (options.includeIndex && manifest.documents.length > 0) {
    const filePath = path.join(outputDir, manifest.index.filename);
    await fs.promises.writeFile(filePath, manifest.index.xml, 'utf8');
    written.push({
      path: filePath,
      entryCount: manifest.index.entries.length,
      byteLength: Buffer.byteLength(manifest.index.xml, 'utf8'),
      kind: 'index',
    });
  }

  return written;
};
