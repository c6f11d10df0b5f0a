// src/core/extract/scroll-stabilizer.ts
import { setTimeout as delay } from 'node:timers/promises';
import type { RenderedPageHandle } from '../render/types.js';
import type { StabilizeOutcome } from '../types/index.js';
import {
  DEFAULT_SCROLL_TIMEOUT,
  DEFAULT_SETTLE_DELAY,
  DOCUMENT_HEIGHT_SCRIPT,
  SCROLL_TO_BOTTOM_SCRIPT,
} from '../config/constants.js';
import { describeError } from '../errors.js';

export interface StabilizerOptions {
  timeout?: number;
  settleDelay?: number;
  verbose?: boolean;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/**
 * Scrolls to the bottom until the document height stops growing, so that
 * lazily loaded content is in the DOM before extraction. Gives up silently
 * once the timeout has elapsed.
 */
export class ScrollStabilizer {
  private readonly timeout: number;
  private readonly settleDelay: number;
  private readonly verbose: boolean;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(options: StabilizerOptions = {}) {
    this.timeout = options.timeout ?? DEFAULT_SCROLL_TIMEOUT;
    this.settleDelay = options.settleDelay ?? DEFAULT_SETTLE_DELAY;
    this.verbose = options.verbose ?? false;
    this.sleep = options.sleep ?? (async (ms: number) => { await delay(ms); });
    this.now = options.now ?? Date.now;
  }

  async stabilize(handle: RenderedPageHandle): Promise<StabilizeOutcome> {
    const startedAt = this.now();
    // No poll outlives the timeout by more than one settle delay
    const deadline = startedAt + this.timeout + this.settleDelay;
    let lastHeight: number | undefined;
    let polls = 0;

    while (true) {
      let height: number;
      try {
        await this.withinDeadline(handle.executeScript(SCROLL_TO_BOTTOM_SCRIPT), deadline);
        await this.sleep(Math.max(0, Math.min(this.settleDelay, deadline - this.now())));
        height = this.toHeight(
          await this.withinDeadline(handle.executeScript(DOCUMENT_HEIGHT_SCRIPT), deadline)
        );
      } catch (error) {
        this.debug(`Scrolling unavailable, continuing with current content: ${describeError(error)}`);
        return 'timed-out';
      }
      polls++;

      if (height === lastHeight) {
        this.debug(`Height stable at ${height}px after ${polls} polls`);
        return 'stabilized';
      }
      lastHeight = height;

      if (this.now() - startedAt >= this.timeout) {
        this.debug(`Height still changing after ${this.timeout}ms (${polls} polls), giving up`);
        return 'timed-out';
      }
    }
  }

  private async withinDeadline<T>(work: Promise<T>, deadline: number): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const expiry = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(
        () => reject(new Error('Page script did not return before the scroll deadline')),
        Math.max(0, deadline - this.now())
      );
    });
    try {
      return await Promise.race([work, expiry]);
    } finally {
      clearTimeout(timer);
    }
  }

  private toHeight(value: unknown): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new Error(`Unexpected document height: ${String(value)}`);
    }
    return value;
  }

  private debug(message: string): void {
    if (this.verbose) {
      console.error(`[DEBUG] ${message}`);
    }
  }
}
