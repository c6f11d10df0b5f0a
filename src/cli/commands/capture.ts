// src/cli/commands/capture.ts
import { Command } from 'commander';
import { BrowserManager } from '../../core/render/browser.js';
import { ContentPipeline, assertCapturableUrl } from '../../core/pipeline.js';
import {
  parseBrowserChannel,
  parseInteger,
  resolveCaptureConfig,
  type CaptureConfig,
} from '../../core/config/capture-config.js';
import { generateOutputPaths } from '../../core/export/path.js';
import { FileScreenshotSink, writeCapture } from '../../core/export/writer.js';
import { buildCaptureResult, formatJsonOutput } from '../../core/export/json.js';
import { PipelineError, createFailureResult, describeError } from '../../core/errors.js';

export interface CaptureCommandOptions {
  out: string;
  json: boolean;
  screenshot: boolean;
  cleanDom: boolean;
  timeout?: string;
  scrollTimeout?: string;
  settleDelay?: string;
  headingCap?: string;
  cdp?: string;
  browser?: string;
  headed: boolean;
  referrer?: string;
  verbose: boolean;
}

export function toCaptureConfig(options: CaptureCommandOptions, env: NodeJS.ProcessEnv = process.env): CaptureConfig {
  return resolveCaptureConfig(
    {
      navigationTimeout: options.timeout === undefined ? undefined : parseInteger('--timeout', options.timeout, 0),
      scrollTimeout: options.scrollTimeout === undefined ? undefined : parseInteger('--scroll-timeout', options.scrollTimeout, 0),
      settleDelay: options.settleDelay === undefined ? undefined : parseInteger('--settle-delay', options.settleDelay, 0),
      maxHeadingLevel: options.headingCap === undefined ? undefined : parseInteger('--heading-cap', options.headingCap, 1, 6),
      channel: options.browser === undefined ? undefined : parseBrowserChannel(options.browser),
      cdpEndpoint: options.cdp,
      headless: !options.headed,
      screenshot: options.screenshot,
      cleanLiveDom: options.cleanDom,
      verbose: options.verbose,
    },
    env
  );
}

export function registerCaptureCommand(program: Command): void {
  program
    .argument('<url>', 'URL to capture')
    .option('--out <dir>', 'Output directory', './captures')
    .option('--json', 'Output JSON to stdout', false)
    .option('--no-screenshot', 'Skip the screenshot')
    .option('--no-clean-dom', 'Leave the live DOM untouched before reading it')
    .option('--timeout <ms>', 'Navigation timeout')
    .option('--scroll-timeout <ms>', 'How long to keep scrolling for lazy content')
    .option('--settle-delay <ms>', 'Pause between scrolls')
    .option('--heading-cap <level>', 'Deepest Markdown heading level (1-6)')
    .option('--cdp <endpoint>', 'Connect to existing browser via CDP')
    .option('--browser <channel>', 'Browser channel (chromium|chrome|msedge)')
    .option('--headed', 'Show the browser window', false)
    .option('--referrer <url>', 'Referrer recorded with the capture')
    .option('--verbose', 'Verbose output', false)
    .action(async (url: string, options: CaptureCommandOptions) => {
      await handleCapture(url, options);
    });
}

async function handleCapture(url: string, options: CaptureCommandOptions): Promise<void> {
  let config: CaptureConfig;
  try {
    config = toCaptureConfig(options);
  } catch (error) {
    console.error('Error:', describeError(error));
    process.exit(1);
  }

  const browserManager = new BrowserManager({
    cdpEndpoint: config.cdpEndpoint,
    channel: config.channel,
    headless: config.headless,
    navigationTimeout: config.navigationTimeout,
    verbose: config.verbose,
  });

  try {
    console.error(`[INFO] Capturing: ${url}`);
    assertCapturableUrl(url);

    const paths = await generateOutputPaths(url, options.out);
    const pipeline = new ContentPipeline(browserManager, config, {
      screenshotSink: new FileScreenshotSink(paths.screenshotPath),
    });

    const record = await pipeline.capture(url, { referrerUrl: options.referrer });
    await writeCapture(record, paths);

    const warnings = record.screenshotRef === null && config.screenshot ? ['Screenshot not captured'] : [];
    if (options.json) {
      console.log(formatJsonOutput(buildCaptureResult(record, paths, warnings)));
    } else {
      console.log('Exported to:', paths.recordPath);
      console.log('Markdown:', paths.markdownPath);
    }
  } catch (error) {
    if (error instanceof PipelineError) {
      if (options.json) {
        console.log(formatJsonOutput(createFailureResult(url, error)));
      }
      console.error(`Failed (${error.stage}):`, error.message);
      if (error.suggestion) {
        console.error('Suggestion:', error.suggestion);
      }
    } else {
      console.error('Error:', describeError(error));
    }
    process.exitCode = 1;
  } finally {
    await browserManager.close().catch(error => {
      console.error(`[WARN] Failed to close browser: ${describeError(error)}`);
    });
  }
}
