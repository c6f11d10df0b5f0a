// src/core/__tests__/errors.test.ts
import { describe, it, expect } from '@jest/globals';
import { ErrorCode, PipelineError, createFailureResult, describeError } from '../errors.js';

describe('PipelineError', () => {
  it('should create error with all properties', () => {
    const cause = new Error('net::ERR_NAME_NOT_RESOLVED');
    const error = new PipelineError(ErrorCode.LOAD_FAILED, 'load', 'Failed to load page', {
      retryable: true,
      suggestion: 'Check the URL and network access',
      context: { url: 'https://example.com' },
      cause,
    });

    expect(error).toBeInstanceOf(PipelineError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('PipelineError');
    expect(error.code).toBe(ErrorCode.LOAD_FAILED);
    expect(error.stage).toBe('load');
    expect(error.message).toBe('Failed to load page');
    expect(error.retryable).toBe(true);
    expect(error.suggestion).toBe('Check the URL and network access');
    expect(error.context).toEqual({ url: 'https://example.com' });
    expect(error.cause).toBe(cause);
  });

  it('should create error with minimal properties', () => {
    const error = new PipelineError(ErrorCode.CONTENT_NOT_FOUND, 'isolate', 'No content');

    expect(error.code).toBe('content_not_found');
    expect(error.retryable).toBe(false);
    expect(error.suggestion).toBeUndefined();
    expect(error.context).toBeUndefined();
  });
});

describe('createFailureResult', () => {
  it('should describe the failing stage', () => {
    const error = new PipelineError(ErrorCode.TIMEOUT, 'load', 'Timed out', {
      retryable: true,
      suggestion: 'Increase the navigation timeout with --timeout',
    });

    expect(createFailureResult('https://example.com/slow', error)).toEqual({
      status: 'failed',
      url: 'https://example.com/slow',
      diagnostics: {
        warnings: [],
        error: {
          code: 'timeout',
          stage: 'load',
          message: 'Timed out',
          retryable: true,
          suggestion: 'Increase the navigation timeout with --timeout',
        },
      },
    });
  });
});

describe('describeError', () => {
  it('uses the message of errors and stringifies anything else', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
    expect(describeError(42)).toBe('42');
  });
});
