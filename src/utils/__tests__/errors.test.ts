import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  EventSourceError,
  PipelineError,
  RecordReadError,
  StorageError,
  ValidationError,
  errorMessage,
  isPipelineError,
  systemErrorCode,
  wrapError,
} from '../errors';

describe('PipelineError hierarchy', () => {
  it('should keep instanceof working for subclasses', () => {
    const error = new ValidationError('bad anchor', 'anchor');
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toBeInstanceOf(PipelineError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.field).toBe('anchor');
  });

  it('should prefix messages with their subject', () => {
    expect(new RecordReadError('/data/a.json', 'invalid JSON').message).toBe('/data/a.json: invalid JSON');
    expect(new StorageError('/data', 'could not list directory').code).toBe('STORAGE_ERROR');
    expect(new EventSourceError('export:x', 'unreachable').message).toBe('export:x: unreachable');
    expect(new ConfigurationError('no session').code).toBe('CONFIGURATION_ERROR');
  });

  it('should serialize to JSON', () => {
    const json = new RecordReadError('/data/a.json', 'invalid JSON', new Error('Unexpected token')).toJSON();
    expect(json).toMatchObject({
      name: 'RecordReadError',
      code: 'RECORD_READ_ERROR',
      message: '/data/a.json: invalid JSON',
      details: { filePath: '/data/a.json', originalMessage: 'Unexpected token' },
    });
  });
});

describe('error utilities', () => {
  it('should detect pipeline errors', () => {
    expect(isPipelineError(new ConfigurationError('x'))).toBe(true);
    expect(isPipelineError(new Error('x'))).toBe(false);
  });

  it('should wrap unknown errors', () => {
    const existing = new ValidationError('x');
    expect(wrapError(existing)).toBe(existing);

    const wrapped = wrapError(new TypeError('boom'));
    expect(wrapped.code).toBe('INTERNAL_ERROR');
    expect(wrapped.message).toBe('boom');
    expect(wrapped.details?.originalName).toBe('TypeError');

    expect(wrapError('plain').message).toBe('plain');
  });

  it('should read messages and system codes', () => {
    expect(errorMessage(new Error('a'))).toBe('a');
    expect(errorMessage(42)).toBe('42');

    const systemError = Object.assign(new Error('missing'), { code: 'ENOENT' });
    expect(systemErrorCode(systemError)).toBe('ENOENT');
    expect(systemErrorCode(new Error('plain'))).toBeUndefined();
  });
});
