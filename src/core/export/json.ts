// src/core/export/json.ts
import type { CapturePaths, CaptureResult, CrawlJson, CrawlRecord } from '../types/index.js';

export function toCrawlJson(record: CrawlRecord): CrawlJson {
  return {
    url: record.url,
    crawl: {
      loadedUrl: record.loadedUrl,
      loadedTime: record.loadedTime,
      referrerUrl: record.referrerUrl,
      depth: record.depth,
    },
    metadata: { ...record.metadata },
    screenshotUrl: record.screenshotRef,
    text: record.text,
    html: record.html,
    markdown: record.markdown,
  };
}

export function buildCaptureResult(
  record: CrawlRecord,
  paths?: CapturePaths,
  warnings: string[] = []
): CaptureResult {
  const result: CaptureResult = {
    status: 'success',
    url: record.url,
    record: toCrawlJson(record),
    diagnostics: { warnings },
  };

  if (paths) {
    result.paths = paths;
  }

  return result;
}

export function formatJsonOutput(value: CaptureResult | CrawlJson): string {
  return JSON.stringify(value, null, 2);
}
