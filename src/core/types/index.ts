// src/core/types/index.ts
import type { ErrorCode, PipelineStage } from '../errors.js';

export type BrowserChannel = 'chromium' | 'chrome' | 'msedge';

export type StabilizeOutcome = 'stabilized' | 'timed-out';

export interface PageMetadata {
  title: string | null;
  description: string | null;
  author: string | null;
  keywords: string | null;
  languageCode: string | null;
  canonicalUrl: string;
}

export interface CrawlRecord {
  url: string;
  loadedUrl: string;
  loadedTime: string;     // ISO 8601 timestamp
  referrerUrl: string | null;
  depth: 0;
  metadata: PageMetadata;
  screenshotRef: string | null;
  text: string;
  html: string;
  markdown: string;
}

// Field layout of the persisted record
export interface CrawlJson {
  url: string;
  crawl: {
    loadedUrl: string;
    loadedTime: string;
    referrerUrl: string | null;
    depth: number;
  };
  metadata: PageMetadata;
  screenshotUrl: string | null;
  text: string;
  html: string;
  markdown: string;
}

export interface CapturePaths {
  recordPath: string;
  markdownPath: string;
  screenshotPath: string;
}

export interface CaptureFailure {
  code: ErrorCode;
  stage: PipelineStage;
  message: string;
  retryable: boolean;
  suggestion?: string;
}

export interface CaptureResult {
  status: 'success' | 'failed';
  url: string;
  record?: CrawlJson;
  paths?: CapturePaths;
  diagnostics: {
    warnings: string[];
    error?: CaptureFailure;
  };
}
