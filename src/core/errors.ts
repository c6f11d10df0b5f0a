// src/core/errors.ts
import type { CaptureResult } from './types/index.js';

export enum ErrorCode {
  INVALID_URL = 'invalid_url',
  LOAD_FAILED = 'load_failed',
  TIMEOUT = 'timeout',
  CONTENT_NOT_FOUND = 'content_not_found',
  BROWSER_LAUNCH_FAILED = 'browser_launch_failed',
  EXPORT_FAILED = 'export_failed',
}

export type PipelineStage = 'validate' | 'launch' | 'load' | 'isolate' | 'export';

export class PipelineError extends Error {
  code: ErrorCode;
  stage: PipelineStage;
  retryable: boolean;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    stage: PipelineStage,
    message: string,
    options: {
      retryable?: boolean;
      suggestion?: string;
      context?: Record<string, unknown>;
      cause?: unknown;
    } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'PipelineError';
    this.code = code;
    this.stage = stage;
    this.retryable = options.retryable ?? false;
    this.suggestion = options.suggestion;
    this.context = options.context;
    Object.setPrototypeOf(this, PipelineError.prototype);
  }
}

export function createFailureResult(url: string, error: PipelineError): CaptureResult {
  return {
    status: 'failed',
    url,
    diagnostics: {
      warnings: [],
      error: {
        code: error.code,
        stage: error.stage,
        message: error.message,
        retryable: error.retryable,
        suggestion: error.suggestion,
      },
    },
  };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
