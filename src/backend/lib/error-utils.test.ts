import { describe, expect, it } from 'vitest';
import { isAbortError, isRecord, toError, toErrorMessage } from './error-utils';

describe('toError', () => {
  it('returns the original Error instance', () => {
    const original = new TypeError('boom');

    expect(toError(original)).toBe(original);
  });

  it('wraps non-Error values in Error', () => {
    const actual = toError({ code: 42 });

    expect(actual).toBeInstanceOf(Error);
    expect(actual.message).toBe('[object Object]');
  });

  it('stringifies null and undefined values', () => {
    expect(toError(null).message).toBe('null');
    expect(toError(undefined).message).toBe('undefined');
  });
});

describe('toErrorMessage', () => {
  it('reads the message of errors and strings alike', () => {
    expect(toErrorMessage(new Error('disk full'))).toBe('disk full');
    expect(toErrorMessage('plain')).toBe('plain');
  });
});

describe('isRecord', () => {
  it('accepts plain objects only', () => {
    expect(isRecord({ a: 1 })).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord('x')).toBe(false);
  });
});

describe('isAbortError', () => {
  it('recognizes the reason of an aborted signal', () => {
    const controller = new AbortController();
    controller.abort();

    expect(isAbortError(controller.signal.reason)).toBe(true);
    expect(isAbortError(new Error('other'))).toBe(false);
  });
});
