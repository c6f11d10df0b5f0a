// src/core/export/path.ts
import * as path from 'path';
import * as fs from 'fs/promises';
import type { CapturePaths, CrawlRecord } from '../types/index.js';

export async function generateOutputPaths(
  url: string,
  outputDir: string
): Promise<CapturePaths> {
  const parsed = new URL(url);
  const hostDir = path.join(outputDir, parsed.hostname.toLowerCase());
  const contentDir = path.join(hostDir, generateSlug(parsed));

  await fs.mkdir(contentDir, { recursive: true });

  return {
    recordPath: path.join(contentDir, 'record.json'),
    markdownPath: path.join(contentDir, 'content.md'),
    screenshotPath: path.join(contentDir, 'screenshot.png'),
  };
}

export function generateSlug(url: URL): string {
  const cleaned = `${url.pathname}${url.search}`
    .toLowerCase()
    .replace(/[^\w\s-]/g, ' ')
    .trim()
    .replace(/\s+/g, '-')
    .substring(0, 50);

  // Short hash keeps distinct URLs with the same cleaned path apart
  const hash = Buffer.from(url.toString()).toString('base64url').slice(-8);
  return `${cleaned || 'index'}-${hash}`;
}

export function buildFrontMatter(record: CrawlRecord): string {
  const { metadata } = record;
  const frontMatter: Record<string, string | number | null> = {
    title: metadata.title,
    source_url: record.url,
    canonical_url: metadata.canonicalUrl,
    loaded_at: record.loadedTime,
    depth: record.depth,
  };

  if (metadata.author) {
    frontMatter.author = metadata.author;
  }
  if (metadata.description) {
    frontMatter.description = metadata.description;
  }
  if (metadata.languageCode) {
    frontMatter.language = metadata.languageCode;
  }

  const yaml = Object.entries(frontMatter)
    .map(([key, value]) => {
      if (value === null) {
        return `${key}: null`;
      }
      if (typeof value === 'string') {
        return `${key}: "${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
      }
      return `${key}: ${value}`;
    })
    .join('\n');

  return `---\n${yaml}\n---\n`;
}
