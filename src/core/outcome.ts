/**
 * @fileoverview Outcomes returned by every call that crosses a source boundary
 *
 * "Nothing there" and "could not ask" are different answers: an empty
 * outcome is a valid result, a failed outcome carries the typed error.
 */

import type { ZoteroMcpError } from './errors.js';

export type SourceOutcome<T> =
  | { status: 'ok'; value: T }
  | { status: 'empty'; reason: string }
  | { status: 'failed'; error: ZoteroMcpError };

export type WriteOutcome<T> = Exclude<SourceOutcome<T>, { status: 'empty' }>;

export function ok<T>(value: T): { status: 'ok'; value: T } {
  return { status: 'ok', value };
}

export function empty(reason: string): { status: 'empty'; reason: string } {
  return { status: 'empty', reason };
}

export function failed(error: ZoteroMcpError): { status: 'failed'; error: ZoteroMcpError } {
  return { status: 'failed', error };
}

/** Lists come back `empty` rather than `ok([])`. */
export function fromList<T>(values: T[], reason: string): SourceOutcome<T[]> {
  return values.length > 0 ? ok(values) : empty(reason);
}

export function valueOrNull<T>(outcome: SourceOutcome<T>): T | null {
  return outcome.status === 'ok' ? outcome.value : null;
}
