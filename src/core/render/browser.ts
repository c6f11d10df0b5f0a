// src/core/render/browser.ts
import { chromium, type Browser, type BrowserContext, type Page } from 'playwright';
import { DEFAULT_TIMEOUT, DEFAULT_USER_AGENT, DEFAULT_VIEWPORT } from '../config/constants.js';
import { ErrorCode, PipelineError, describeError } from '../errors.js';
import type { BrowserChannel } from '../types/index.js';
import type { PageHandleProvider } from './types.js';
import { PlaywrightPageHandle } from './page.js';

export interface BrowserOptions {
  cdpEndpoint?: string;  // Chrome DevTools Protocol endpoint (e.g., 'http://localhost:9222')
  channel?: BrowserChannel;
  headless?: boolean;
  navigationTimeout?: number;
  verbose?: boolean;
}

export class BrowserManager implements PageHandleProvider {
  private browser?: Browser;
  private context?: BrowserContext;

  constructor(private readonly options: BrowserOptions = {}) {}

  async launch(): Promise<BrowserContext> {
    if (this.context) {
      return this.context;
    }

    const channel = this.options.channel ?? 'chromium';

    try {
      if (this.options.cdpEndpoint) {
        console.error(`[INFO] Connecting to browser over CDP: ${this.options.cdpEndpoint}`);
        this.browser = await chromium.connectOverCDP(this.options.cdpEndpoint);
      } else {
        if (this.options.verbose) {
          console.error(`[DEBUG] Launching ${channel} (headless: ${this.options.headless ?? true})`);
        }
        this.browser = await chromium.launch({
          channel: channel === 'chromium' ? undefined : channel,
          headless: this.options.headless ?? true,
          args: [
            '--disable-blink-features=AutomationControlled',
            '--no-first-run',
            '--no-default-browser-check',
          ],
        });
      }

      this.context = await this.browser.newContext({
        userAgent: DEFAULT_USER_AGENT,
        viewport: DEFAULT_VIEWPORT,
      });
    } catch (error) {
      await this.close().catch(closeError => {
        console.error(`[WARN] Failed to close browser after launch error: ${describeError(closeError)}`);
      });
      throw new PipelineError(
        ErrorCode.BROWSER_LAUNCH_FAILED,
        'launch',
        `Failed to launch browser: ${describeError(error)}`,
        {
          suggestion: this.options.cdpEndpoint
            ? `Check that a browser is listening on ${this.options.cdpEndpoint}`
            : 'Run "npx playwright install chromium" or pick an installed channel with --browser',
          cause: error,
        }
      );
    }

    return this.context;
  }

  async open(): Promise<PlaywrightPageHandle> {
    const context = await this.launch();
    let page: Page;
    try {
      page = await context.newPage();
    } catch (error) {
      throw new PipelineError(
        ErrorCode.BROWSER_LAUNCH_FAILED,
        'launch',
        `Failed to open a new page: ${describeError(error)}`,
        {
          retryable: true,
          suggestion: 'The browser may have closed; run the capture again',
          cause: error,
        }
      );
    }
    return new PlaywrightPageHandle(page, {
      timeout: this.options.navigationTimeout ?? DEFAULT_TIMEOUT,
    });
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.context = undefined;
    this.browser = undefined;
    if (browser) {
      await browser.close();
    }
  }
}
