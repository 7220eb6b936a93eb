import { describe, expect, it } from 'vitest';
import { isLoggingSilenced, isTruthyFlag, isVerboseLogging } from '../runtime_controls.js';

describe('runtime_controls', () => {
  it('accepts the usual truthy spellings', () => {
    expect(['1', 'true', 'YES', ' on '].map(isTruthyFlag)).toEqual([true, true, true, true]);
    expect(['0', 'false', '', undefined].map(isTruthyFlag)).toEqual([false, false, false, false]);
  });

  it('reads ZOTERO_MCP_VERBOSE', () => {
    expect(isVerboseLogging({ ZOTERO_MCP_VERBOSE: 'true' })).toBe(true);
    expect(isVerboseLogging({})).toBe(false);
  });

  it('treats silent-like levels as silenced', () => {
    expect(isLoggingSilenced({ ZOTERO_MCP_LOG_LEVEL: 'Silent' })).toBe(true);
    expect(isLoggingSilenced({ ZOTERO_MCP_LOG_LEVEL: 'off' })).toBe(true);
    expect(isLoggingSilenced({ ZOTERO_MCP_LOG_LEVEL: 'debug' })).toBe(false);
  });
});
