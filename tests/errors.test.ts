import { describe, expect, it } from 'vitest';
import { ConnectionDroppedError, TimeoutError, isConnectionDropped } from '../src/research/errors';

const withCode = (code: string) => Object.assign(new Error('request failed'), { code });

describe('isConnectionDropped', () => {
  it('recognises socket error codes', () => {
    expect(isConnectionDropped(withCode('ECONNRESET'))).toBe(true);
    expect(isConnectionDropped(withCode('EPIPE'))).toBe(true);
    expect(isConnectionDropped(withCode('ENOTFOUND'))).toBe(false);
  });

  it('recognises dropped-session messages', () => {
    expect(isConnectionDropped(new Error('socket hang up'))).toBe(true);
    expect(isConnectionDropped(new Error('Session terminated by remote'))).toBe(true);
    expect(isConnectionDropped(new Error('ClosedResourceError'))).toBe(true);
  });

  it('recognises its own error class', () => {
    expect(isConnectionDropped(new ConnectionDroppedError('gone'))).toBe(true);
  });

  it('ignores other failures', () => {
    expect(isConnectionDropped(new TimeoutError('Search', 100))).toBe(false);
    expect(isConnectionDropped('socket hang up')).toBe(false);
  });
});

describe('TimeoutError', () => {
  it('names the operation and the limit', () => {
    expect(new TimeoutError('Image check', 250).message).toBe('Image check timed out after 250ms');
  });
});
