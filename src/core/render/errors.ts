// Page handle errors

export type PageHandleErrorCode = 'LOAD_FAILED' | 'TIMEOUT' | 'NOT_FOUND' | 'CAPTURE_FAILED';

export class PageHandleError extends Error {
  constructor(
    message: string,
    public readonly code: PageHandleErrorCode,
    cause?: Error
  ) {
    super(message, { cause });
    this.name = 'PageHandleError';
    Object.setPrototypeOf(this, PageHandleError.prototype);
  }
}
