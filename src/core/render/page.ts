// src/core/render/page.ts
import { errors, type ElementHandle, type Page } from 'playwright';
import type { RenderedPageHandle } from './types.js';
import { PageHandleError } from './errors.js';
import { toError } from './utils.js';
import { DEFAULT_TIMEOUT } from '../config/constants.js';

export type PlaywrightElement = ElementHandle<SVGElement | HTMLElement>;

export interface PlaywrightHandleOptions {
  timeout?: number;
  fullPageScreenshot?: boolean;
}

export class PlaywrightPageHandle implements RenderedPageHandle<PlaywrightElement> {
  private closed = false;

  constructor(
    private readonly page: Page,
    private readonly options: PlaywrightHandleOptions = {}
  ) {}

  async load(url: string): Promise<string> {
    const timeout = this.options.timeout ?? DEFAULT_TIMEOUT;
    try {
      const response = await this.page.goto(url, { waitUntil: 'load', timeout });
      if (response && response.status() >= 400) {
        console.error(`[WARN] ${url} answered with HTTP ${response.status()}`);
      }
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw new PageHandleError(`Timed out after ${timeout}ms loading ${url}`, 'TIMEOUT', error);
      }
      const cause = toError(error);
      throw new PageHandleError(`Failed to load ${url}: ${cause.message}`, 'LOAD_FAILED', cause);
    }
    return this.page.url();
  }

  currentUrl(): string {
    return this.page.url();
  }

  async executeScript(script: string): Promise<unknown> {
    return this.page.evaluate<unknown>(script);
  }

  async findElement(selector: string): Promise<PlaywrightElement> {
    const element = await this.page.$(selector);
    if (!element) {
      throw new PageHandleError(`No element matches ${selector}`, 'NOT_FOUND');
    }
    return element;
  }

  async findElements(selector: string): Promise<PlaywrightElement[]> {
    return this.page.$$(selector);
  }

  async attribute(element: PlaywrightElement, name: string): Promise<string | null> {
    return element.getAttribute(name);
  }

  async text(element: PlaywrightElement): Promise<string> {
    return element.innerText();
  }

  async pageSource(): Promise<string> {
    return this.page.content();
  }

  async screenshot(): Promise<Buffer> {
    try {
      return await this.page.screenshot({
        fullPage: this.options.fullPageScreenshot ?? true,
        type: 'png',
      });
    } catch (error) {
      const cause = toError(error);
      throw new PageHandleError(`Screenshot failed: ${cause.message}`, 'CAPTURE_FAILED', cause);
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.page.close();
  }
}
