import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { Command } from 'commander';
import { buildProgram, runCli } from '../index.js';
import { BrowserManager } from '../../core/render/browser.js';
import { generateOutputPaths } from '../../core/export/path.js';
import { FileScreenshotSink, writeCapture } from '../../core/export/writer.js';
import { FakePageHandle } from '../../core/__tests__/fake-page-handle.js';
import type { CapturePaths } from '../../core/types/index.js';

jest.mock('../../core/render/browser.js');
jest.mock('../../core/export/path.js');
jest.mock('../../core/export/writer.js');

describe('CLI Integration Tests', () => {
  const openMock = BrowserManager.prototype.open as unknown as jest.Mock;
  const closeMock = BrowserManager.prototype.close as unknown as jest.Mock;
  const pathsMock = generateOutputPaths as jest.MockedFunction<typeof generateOutputPaths>;
  const writeMock = writeCapture as jest.MockedFunction<typeof writeCapture>;
  const saveMock = FileScreenshotSink.prototype.save as unknown as jest.Mock;

  const paths: CapturePaths = {
    recordPath: '/out/example.com/post/record.json',
    markdownPath: '/out/example.com/post/content.md',
    screenshotPath: '/out/example.com/post/screenshot.png',
  };

  let exitSpy: jest.SpiedFunction<typeof process.exit>;
  let errorSpy: jest.SpiedFunction<typeof console.error>;
  let logSpy: jest.SpiedFunction<typeof console.log>;

  const run = (...args: string[]) => buildProgram().parseAsync(['node', 'pagecap', ...args]);

  beforeEach(() => {
    jest.clearAllMocks();
    exitSpy = jest.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    const handle = new FakePageHandle({
      html: '<html><body><main><p>Hello</p></main></body></html>',
      title: 'Hello page',
      heights: [100, 100],
      bodyText: 'Hello',
    });
    openMock.mockImplementation(() => Promise.resolve(handle));
    closeMock.mockImplementation(() => Promise.resolve());
    pathsMock.mockResolvedValue(paths);
    writeMock.mockResolvedValue(undefined);
    saveMock.mockImplementation(() => Promise.resolve(paths.screenshotPath));
  });

  afterEach(() => {
    process.exitCode = undefined;
    jest.restoreAllMocks();
  });

  it('should show the capture options in help', () => {
    const help = buildProgram().helpInformation();
    expect(help).toContain('Usage: pagecap [options] <url>');
    expect(help).toContain('--heading-cap <level>');
  });

  it('runs parseAsync via runCli with provided argv', async () => {
    const parseSpy = jest.spyOn(Command.prototype, 'parseAsync').mockResolvedValue(new Command());

    await runCli(['node', 'pagecap', '--help']);

    expect(parseSpy).toHaveBeenCalledWith(['node', 'pagecap', '--help']);
  });

  it('captures a page and prints the JSON result', async () => {
    await run('https://example.com/post', '--json', '--out', '/out', '--settle-delay', '0');

    expect(pathsMock).toHaveBeenCalledWith('https://example.com/post', '/out');
    expect(writeMock).toHaveBeenCalledTimes(1);
    expect(closeMock).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledTimes(1);

    const output = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(output).toMatchObject({
      status: 'success',
      url: 'https://example.com/post',
      paths,
      diagnostics: { warnings: [] },
      record: {
        screenshotUrl: paths.screenshotPath,
        markdown: 'Hello',
        html: '<p>Hello</p>',
        text: 'Hello',
        metadata: { title: 'Hello page' },
      },
    });
    expect(process.exitCode).toBeUndefined();
  });

  it('prints output paths without --json', async () => {
    await run('https://example.com/post', '--settle-delay', '0', '--no-screenshot');

    expect(saveMock).not.toHaveBeenCalled();
    expect(logSpy).toHaveBeenCalledWith('Exported to:', paths.recordPath);
    expect(logSpy).toHaveBeenCalledWith('Markdown:', paths.markdownPath);
  });

  it('reports invalid URLs as a failed result', async () => {
    await run('ftp://example.com/file', '--json');

    expect(openMock).not.toHaveBeenCalled();
    expect(pathsMock).not.toHaveBeenCalled();
    const output = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(output).toMatchObject({
      status: 'failed',
      url: 'ftp://example.com/file',
      diagnostics: { error: { code: 'invalid_url', stage: 'validate' } },
    });
    expect(errorSpy).toHaveBeenCalledWith('Failed (validate):', 'Invalid URL: ftp://example.com/file');
    expect(process.exitCode).toBe(1);
  });

  it('exits on invalid configuration before launching a browser', async () => {
    await expect(run('https://example.com/post', '--heading-cap', '9')).rejects.toThrow('process.exit called');

    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(BrowserManager).not.toHaveBeenCalled();
  });
});
