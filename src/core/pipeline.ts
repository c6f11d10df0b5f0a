// src/core/pipeline.ts
import type { PageHandleProvider, RenderedPageHandle, ScreenshotSink } from './render/types.js';
import type { CrawlRecord } from './types/index.js';
import { PageHandleError } from './render/errors.js';
import { isValidUrl } from './render/utils.js';
import { ErrorCode, PipelineError, describeError } from './errors.js';
import { ScrollStabilizer } from './extract/scroll-stabilizer.js';
import { MetadataExtractor } from './extract/metadata.js';
import { ContentIsolator } from './extract/content-isolator.js';
import { NoiseFilter, removeNoiseFromPage } from './extract/noise-filter.js';
import { serializeChildren, textOf } from './extract/dom.js';
import { MarkdownRenderer } from './export/markdown.js';
import { DEFAULT_CAPTURE_CONFIG, type CaptureConfig } from './config/capture-config.js';

export type PipelineConfig = Pick<
  CaptureConfig,
  'scrollTimeout' | 'settleDelay' | 'maxHeadingLevel' | 'screenshot' | 'cleanLiveDom' | 'verbose'
>;

export interface PipelineDependencies {
  screenshotSink?: ScreenshotSink;
  /** Test seams for the stabilizer loop and the record timestamp. */
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface CaptureRequest {
  referrerUrl?: string;
}

export function assertCapturableUrl(url: string): void {
  if (!isValidUrl(url)) {
    throw new PipelineError(ErrorCode.INVALID_URL, 'validate', `Invalid URL: ${url}`, {
      suggestion: 'Use an absolute http:// or https:// URL',
    });
  }
}

export class ContentPipeline {
  private readonly config: PipelineConfig;
  private readonly stabilizer: ScrollStabilizer;
  private readonly metadataExtractor: MetadataExtractor;
  private readonly isolator = new ContentIsolator();
  private readonly noiseFilter = new NoiseFilter();
  private readonly renderer: MarkdownRenderer;
  private readonly now: () => number;

  constructor(
    private readonly provider: PageHandleProvider,
    config: Partial<PipelineConfig> = {},
    private readonly dependencies: PipelineDependencies = {}
  ) {
    this.config = { ...DEFAULT_CAPTURE_CONFIG, ...config };
    this.now = dependencies.now ?? Date.now;
    this.stabilizer = new ScrollStabilizer({
      timeout: this.config.scrollTimeout,
      settleDelay: this.config.settleDelay,
      verbose: this.config.verbose,
      sleep: dependencies.sleep,
      now: this.now,
    });
    this.metadataExtractor = new MetadataExtractor(this.config.verbose);
    this.renderer = new MarkdownRenderer({ maxHeadingLevel: this.config.maxHeadingLevel });
  }

  /**
   * Captures one page. Rejects with a PipelineError when the page cannot be
   * loaded or has no content region; every other step degrades to an empty
   * or null field. The page handle is always closed before returning.
   */
  async capture(url: string, request: CaptureRequest = {}): Promise<CrawlRecord> {
    assertCapturableUrl(url);

    const handle = await this.openHandle();
    try {
      return await this.run(handle, url, request);
    } finally {
      await handle.close().catch(error => {
        console.error(`[WARN] Failed to release page handle: ${describeError(error)}`);
      });
    }
  }

  private async run(handle: RenderedPageHandle, url: string, request: CaptureRequest): Promise<CrawlRecord> {
    // 1. Load
    const loadedUrl = await this.load(handle, url);

    // 2. Wait for lazy content
    const outcome = await this.stabilizer.stabilize(handle);
    this.debug(`Scroll ${outcome} for ${loadedUrl}`);

    // 3. Metadata
    const metadata = await this.metadataExtractor.extract(handle);

    // 4. Isolate and clean a snapshot; live cleanup comes after so it only affects body text
    const source = await this.readSource(handle);
    if (this.config.cleanLiveDom) {
      await removeNoiseFromPage(handle, undefined, this.config.verbose);
    }
    const { content, strategy } = this.isolator.isolate(source);
    const cleaned = this.noiseFilter.filter(content);
    this.debug(`Content isolated with strategy "${strategy}"`);

    // 5. Markdown and HTML
    const markdown = this.renderer.render(cleaned);
    const html = serializeChildren(cleaned);

    // 6. Plain text
    const text = await this.readText(handle, () => textOf(cleaned));

    // 7. Screenshot
    const screenshotRef = await this.captureScreenshot(handle, url);

    // 8. Record
    const record: CrawlRecord = {
      url,
      loadedUrl,
      loadedTime: new Date(this.now()).toISOString(),
      referrerUrl: request.referrerUrl ?? null,
      depth: 0,
      metadata: Object.freeze(metadata),
      screenshotRef,
      text,
      html,
      markdown,
    };
    return Object.freeze(record);
  }

  private async openHandle(): Promise<RenderedPageHandle> {
    try {
      return await this.provider.open();
    } catch (error) {
      if (error instanceof PipelineError) {
        throw error;
      }
      throw new PipelineError(
        ErrorCode.BROWSER_LAUNCH_FAILED,
        'launch',
        `Could not open a page: ${describeError(error)}`,
        { retryable: true, cause: error }
      );
    }
  }

  private async load(handle: RenderedPageHandle, url: string): Promise<string> {
    try {
      return await handle.load(url);
    } catch (error) {
      const timedOut = error instanceof PageHandleError && error.code === 'TIMEOUT';
      throw new PipelineError(
        timedOut ? ErrorCode.TIMEOUT : ErrorCode.LOAD_FAILED,
        'load',
        describeError(error),
        {
          retryable: true,
          suggestion: timedOut ? 'Increase the navigation timeout with --timeout' : 'Check the URL and network access',
          context: { url },
          cause: error,
        }
      );
    }
  }

  private async readSource(handle: RenderedPageHandle): Promise<string> {
    try {
      return await handle.pageSource();
    } catch (error) {
      throw new PipelineError(
        ErrorCode.CONTENT_NOT_FOUND,
        'isolate',
        `Could not read page source: ${describeError(error)}`,
        { retryable: true, cause: error }
      );
    }
  }

  private async readText(handle: RenderedPageHandle, fallback: () => string): Promise<string> {
    try {
      const body = await handle.findElement('body');
      return (await handle.text(body)).trim();
    } catch (error) {
      console.error(`[INFO] Body text unavailable, using extracted content: ${describeError(error)}`);
      return fallback().trim();
    }
  }

  private async captureScreenshot(handle: RenderedPageHandle, url: string): Promise<string | null> {
    const sink = this.dependencies.screenshotSink;
    if (!this.config.screenshot || !sink) {
      return null;
    }
    try {
      return await sink.save(await handle.screenshot(), url);
    } catch (error) {
      console.error(`[INFO] Screenshot skipped: ${describeError(error)}`);
      return null;
    }
  }

  private debug(message: string): void {
    if (this.config.verbose) {
      console.error(`[DEBUG] ${message}`);
    }
  }
}
