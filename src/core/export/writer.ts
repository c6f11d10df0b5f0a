// src/core/export/writer.ts
import * as fs from 'fs/promises';
import * as path from 'path';
import type { CapturePaths, CrawlRecord } from '../types/index.js';
import type { ScreenshotSink } from '../render/types.js';
import { ErrorCode, PipelineError, describeError } from '../errors.js';
import { toCrawlJson, formatJsonOutput } from './json.js';
import { buildFrontMatter } from './path.js';

export async function writeCapture(record: CrawlRecord, paths: CapturePaths): Promise<void> {
  try {
    await fs.writeFile(paths.recordPath, formatJsonOutput(toCrawlJson(record)) + '\n', 'utf-8');
    await fs.writeFile(paths.markdownPath, buildFrontMatter(record) + '\n' + record.markdown + '\n', 'utf-8');
  } catch (error) {
    throw new PipelineError(
      ErrorCode.EXPORT_FAILED,
      'export',
      `Failed to write capture: ${describeError(error)}`,
      {
        suggestion: `Check permissions for directory: ${path.dirname(paths.recordPath)}`,
        cause: error,
      }
    );
  }
}

/** Writes every screenshot to one fixed file. */
export class FileScreenshotSink implements ScreenshotSink {
  constructor(private readonly targetPath: string) {}

  async save(image: Buffer, _url: string): Promise<string> {
    await fs.mkdir(path.dirname(this.targetPath), { recursive: true });
    await fs.writeFile(this.targetPath, image);
    return this.targetPath;
  }
}
