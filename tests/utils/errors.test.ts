import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  ConfigurationError,
  FileSystemError,
  ResolutionError,
  ValidationError,
  errorCode,
  handleError
} from '../../src/utils/errors.js';
import { ErrorCodes, ResolverError } from '../../src/types/index.js';

describe('error classes', () => {
  it('explains how to set the SDK path by default', () => {
    const error = new ConfigurationError();
    assert.equal(error.code, ErrorCodes.CONFIGURATION_ERROR);
    assert.equal(
      error.message,
      'Android SDK path not set. Pass --sdk <path>, set "sdkPath" in m2resolve.jsonc, ' +
      'or set the ANDROID_HOME environment variable.'
    );
  });

  it('prefixes validation and file system messages', () => {
    assert.equal(new ValidationError('bad name').message, 'Validation error: bad name');
    assert.equal(new FileSystemError('disk full').message, 'File system error: disk full');
  });

  it('shares the ResolverError base', () => {
    const error = new ResolutionError('Cannot resolve com.example:widget:1.0', { dependency: 'com.example:widget:1.0' });
    assert.ok(error instanceof ResolverError);
    assert.equal(error.code, ErrorCodes.RESOLUTION_ERROR);
    assert.deepEqual(error.details, { dependency: 'com.example:widget:1.0' });
  });
});

describe('errorCode', () => {
  it('reads string codes only', () => {
    assert.equal(errorCode(Object.assign(new Error('missing'), { code: 'ENOENT' })), 'ENOENT');
    assert.equal(errorCode({ code: 42 }), undefined);
    assert.equal(errorCode('ENOENT'), undefined);
    assert.equal(errorCode(null), undefined);
  });
});

describe('handleError', () => {
  it('reports the message of known errors', () => {
    assert.deepEqual(handleError(new ResolutionError('Cannot resolve x')), { success: false, error: 'Cannot resolve x' });
  });

  it('reports plain errors and unknown values', () => {
    assert.deepEqual(handleError(new Error('boom')), { success: false, error: 'boom' });
    assert.deepEqual(handleError(17), { success: false, error: 'An unknown error occurred' });
  });
});
