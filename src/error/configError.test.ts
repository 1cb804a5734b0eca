import { describe, expect, it } from 'vitest';
import { ConfigError, isConfigError } from './configError.js';
import { ConstructURLError, isConstructURLError } from './constructUrlError.js';

describe('ConfigError', () => {
  it('lists issues with their path in the message', () => {
    const err = new ConfigError('invalid client options', [
      { message: 'must not be empty', path: ['apiKey'] },
      { message: 'Too small', path: [{ key: 'timeout' }] },
    ]);

    expect(err.message).toBe('invalid client options; apiKey: must not be empty; timeout: Too small');
    expect(err.issues).toHaveLength(2);
    expect(err.name).toBe('ConfigError');
  });

  it('keeps the bare message without issues', () => {
    const err = new ConfigError('error validating client options', []);

    expect(err.message).toBe('error validating client options');
  });

  it('omits the path when the issue has none', () => {
    const err = new ConfigError('invalid client options', [{ message: 'Expected object' }]);

    expect(err.message).toBe('invalid client options; Expected object');
  });

  it('isConfigError follows causes', () => {
    const err = new Error('wrapped', { cause: new ConfigError('invalid client options', []) });

    expect(isConfigError(err)).toBe(true);
    expect(isConfigError(new Error('boom'))).toBe(false);
  });
});

describe('ConstructURLError', () => {
  it('exposes the offending path', () => {
    const err = new ConstructURLError('error constructing URL', '/credentials/{doc_id}/');

    expect(err.url).toBe('/credentials/{doc_id}/');
    expect(isConstructURLError(err)).toBe(true);
    expect(isConstructURLError(new Error('error constructing URL'))).toBe(false);
  });
});
