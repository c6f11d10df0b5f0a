// src/core/render/types.ts

/**
 * Live connection to one rendered page. The pipeline only talks to the
 * rendering engine through this interface.
 *
 * `TElement` is the engine's opaque element reference; it is only ever passed
 * back into `attribute` and `text`.
 */
export interface RenderedPageHandle<TElement = unknown> {
  /** Navigates to `url` and resolves with the URL the page ended up on. */
  load(url: string): Promise<string>;
  currentUrl(): string;
  executeScript(script: string): Promise<unknown>;
  /** Rejects with a `NOT_FOUND` PageHandleError when nothing matches. */
  findElement(selector: string): Promise<TElement>;
  findElements(selector: string): Promise<TElement[]>;
  attribute(element: TElement, name: string): Promise<string | null>;
  text(element: TElement): Promise<string>;
  pageSource(): Promise<string>;
  screenshot(): Promise<Buffer>;
  close(): Promise<void>;
}

export interface PageHandleProvider {
  open(): Promise<RenderedPageHandle>;
}

export interface ScreenshotSink {
  /** Persists the image and resolves with a reference to it. */
  save(image: Buffer, url: string): Promise<string>;
}
