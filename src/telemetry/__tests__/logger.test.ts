import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { logDebug, logError, logInfo, logWarning } from '../logger.js';

let originalVerbose: string | undefined;
let originalLevel: string | undefined;

beforeEach(() => {
  originalVerbose = process.env.ZOTERO_MCP_VERBOSE;
  originalLevel = process.env.ZOTERO_MCP_LOG_LEVEL;
  // Ensure logs are emitted for the "does log" assertions.
  process.env.ZOTERO_MCP_LOG_LEVEL = 'debug';
  delete process.env.ZOTERO_MCP_VERBOSE;
});

afterEach(() => {
  vi.restoreAllMocks();
  if (typeof originalVerbose === 'string') process.env.ZOTERO_MCP_VERBOSE = originalVerbose;
  else delete process.env.ZOTERO_MCP_VERBOSE;
  if (typeof originalLevel === 'string') process.env.ZOTERO_MCP_LOG_LEVEL = originalLevel;
  else delete process.env.ZOTERO_MCP_LOG_LEVEL;
});

describe('telemetry logger', () => {
  const cases = [
    { fn: logInfo, level: 'info' as const, method: 'error' as const },
    { fn: logWarning, level: 'warn' as const, method: 'warn' as const },
    { fn: logError, level: 'error' as const, method: 'error' as const },
    { fn: logDebug, level: 'debug' as const, method: 'error' as const },
  ];

  for (const { fn, level, method } of cases) {
    it(`logs message only for ${level} when context is undefined`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});

      fn('hello');

      expect(spy).toHaveBeenCalledWith('hello');
    });

    it(`logs message only for ${level} when context is empty`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});

      fn('hello', {});

      expect(spy).toHaveBeenCalledWith('hello');
    });

    it(`logs message and context for ${level} when context has keys`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});
      const context = { itemKey: 'ABCD2345' };

      fn('hello', context);

      expect(spy).toHaveBeenCalledWith('hello', context);
    });
  }

  it('never writes to stdout', () => {
    const stdoutSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    logDebug('debug');
    logInfo('info');
    logWarning('warn');
    logError('error');

    expect(stdoutSpy).not.toHaveBeenCalled();
  });

  it('suppresses info/debug logs by default when not verbose', () => {
    delete process.env.ZOTERO_MCP_LOG_LEVEL;
    delete process.env.ZOTERO_MCP_VERBOSE;

    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

    logInfo('hello');
    logDebug('hello');

    expect(spy).not.toHaveBeenCalled();
  });

  it('emits warnings by default', () => {
    delete process.env.ZOTERO_MCP_LOG_LEVEL;

    const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    logWarning('careful');
    expect(spy).toHaveBeenCalledWith('careful');
  });

  it('emits info logs when verbose flag is enabled', () => {
    delete process.env.ZOTERO_MCP_LOG_LEVEL;
    process.env.ZOTERO_MCP_VERBOSE = '1';

    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    logInfo('hello');
    expect(spy).toHaveBeenCalledWith('hello');
  });

  it('honors an explicit error threshold', () => {
    process.env.ZOTERO_MCP_LOG_LEVEL = 'error';
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    logWarning('warn');
    logError('boom');

    expect(warnSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith('boom');
  });

  it('suppresses everything when the level is silent', () => {
    process.env.ZOTERO_MCP_LOG_LEVEL = 'silent';
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    logWarning('warn');
    logError('error');

    expect(warnSpy).not.toHaveBeenCalled();
    expect(errorSpy).not.toHaveBeenCalled();
  });
});
