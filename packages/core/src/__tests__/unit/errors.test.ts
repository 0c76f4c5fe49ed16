import { describe, it, expect } from 'vitest';
import { ReelscopeError, Errors, isReelscopeError } from '../../errors.js';

describe('ReelscopeError', () => {
  it('creates error with code and message', () => {
    const error = new ReelscopeError('INVALID_INPUT', 'Bad input file');
    expect(error.code).toBe('INVALID_INPUT');
    expect(error.message).toBe('Bad input file');
    expect(error.name).toBe('ReelscopeError');
  });

  it('accepts optional properties', () => {
    const cause = new Error('Original error');
    const error = new ReelscopeError('AUTOMATION_FAILED', 'Something went wrong', {
      retryable: true,
      userMessage: 'Please try again',
      details: { key: 'value' },
      cause,
    });

    expect(error.retryable).toBe(true);
    expect(error.userMessage).toBe('Please try again');
    expect(error.details).toEqual({ key: 'value' });
    expect(error.cause).toBe(cause);
  });

  it('defaults retryable to false', () => {
    expect(new ReelscopeError('INVALID_INPUT', 'Invalid').retryable).toBe(false);
  });

  it('marks session and persistence errors as fatal', () => {
    expect(Errors.sessionInvalid('login redirect').fatal).toBe(true);
    expect(Errors.persistence('/tmp/out.csv').fatal).toBe(true);
    expect(Errors.automation('upload', 'no input').fatal).toBe(false);
  });

  it('serializes to JSON without the cause', () => {
    const error = Errors.timeout('poll', 5000);
    expect(error.toJSON()).toEqual({
      code: 'TIMEOUT',
      message: 'Operation timed out: poll',
      retryable: true,
      userMessage: undefined,
      details: { operation: 'poll', timeoutMs: 5000 },
    });
  });
});

describe('Errors factory', () => {
  it('creates inputNotFound error', () => {
    const error = Errors.inputNotFound('data.csv');
    expect(error.code).toBe('INPUT_NOT_FOUND');
    expect(error.message).toBe('Input file not found: data.csv');
    expect(error.details).toEqual({ filePath: 'data.csv' });
  });

  it('creates retryable automation error', () => {
    const error = Errors.automation('submitArtifact', 'no file input');
    expect(error.code).toBe('AUTOMATION_FAILED');
    expect(error.message).toBe('submitArtifact failed: no file input');
    expect(error.retryable).toBe(true);
  });

  it('creates downloadFailed error with attempts', () => {
    const error = Errors.downloadFailed('https://www.tiktok.com/@a/video/1', 3);
    expect(error.message).toBe('Failed to download after 3 attempts: https://www.tiktok.com/@a/video/1');
    expect(error.details).toEqual({ url: 'https://www.tiktok.com/@a/video/1', attempts: 3 });
  });

  it('points the operator at the login command', () => {
    expect(Errors.sessionMissing('.session-state.json').userMessage).toBe(
      'No saved session. Run `reelscope login` first.'
    );
  });
});

describe('isReelscopeError', () => {
  it('returns true for ReelscopeError', () => {
    expect(isReelscopeError(Errors.invalidInput('x'))).toBe(true);
  });

  it('returns false for other values', () => {
    expect(isReelscopeError(new Error('x'))).toBe(false);
    expect(isReelscopeError('x')).toBe(false);
  });
});
