import { describe, it, expect } from 'vitest';
import { ChannelOperationError, replyCodeOf } from '../../../src/errors';

describe('ChannelOperationError', () => {
  it('should carry the original message, cause and reply code', () => {
    const original = Object.assign(new Error("NOT_FOUND - no queue 'jobs' in vhost '/'"), { code: 404 });

    const error = ChannelOperationError.from('QueuePurgeFailed', 'Failed to purge queue "jobs"', original);

    expect(error.kind).toBe('QueuePurgeFailed');
    expect(error.name).toBe('ChannelOperationError');
    expect(error.message).toBe(`Failed to purge queue "jobs": NOT_FOUND - no queue 'jobs' in vhost '/'`);
    expect(error.detail).toBe("NOT_FOUND - no queue 'jobs' in vhost '/'");
    expect(error.cause).toBe(original);
    expect(error.replyCode).toBe(404);
    expect(error).toBeInstanceOf(Error);
  });

  it('should use the bare message without a detail', () => {
    expect(new ChannelOperationError('PublishFailed', 'Failed to publish').message).toBe('Failed to publish');
  });

  it('should describe non-Error causes', () => {
    expect(ChannelOperationError.from('BindingFailed', 'Failed to bind', 'socket hang up').detail).toBe('socket hang up');
    expect(ChannelOperationError.from('BindingFailed', 'Failed to bind', 42).detail).toBe('42');
  });

  it('should classify reply codes', () => {
    const withCode = (code?: number) =>
      ChannelOperationError.from('PublishFailed', 'Failed to publish', Object.assign(new Error('x'), { code }));

    expect(withCode(406).recoverable).toBe(false);
    expect(withCode(403).recoverable).toBe(false);
    expect(withCode(320).recoverable).toBe(true);
    expect(withCode(506).recoverable).toBe(true);
    expect(withCode(undefined).recoverable).toBe(true);
  });
});

describe('replyCodeOf', () => {
  it('should read code or replyCode', () => {
    expect(replyCodeOf({ code: 406 })).toBe(406);
    expect(replyCodeOf({ replyCode: 320 })).toBe(320);
  });

  it('should ignore non-numeric codes', () => {
    expect(replyCodeOf({ code: 'ECONNREFUSED' })).toBeUndefined();
    expect(replyCodeOf(new Error('plain'))).toBeUndefined();
    expect(replyCodeOf(null)).toBeUndefined();
  });
});
