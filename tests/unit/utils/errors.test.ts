/**
 * Tests for error classes and codes.
 */
import { describe, it, expect } from 'vitest';
import {
  SpringInitError,
  ConfigError,
  ServiceError,
  ProjectError,
  TargetExistsError,
  ExtractionError,
  ErrorCodes,
  errorMessage,
} from '../../../src/utils/errors.js';

describe('SpringInitError', () => {
  it('should create error with code and message', () => {
    const error = new SpringInitError('C001', 'Test error message', { file: 'a.yaml' });

    expect(error.code).toBe('C001');
    expect(error.message).toBe('Test error message');
    expect(error.name).toBe('SpringInitError');
    expect(error.details).toEqual({ file: 'a.yaml' });
    expect(error).toBeInstanceOf(Error);
  });

  it('should serialize to JSON', () => {
    const error = new SpringInitError('C001', 'Test', { key: 'value' });

    expect(error.toJSON()).toEqual({
      name: 'SpringInitError',
      code: 'C001',
      message: 'Test',
      details: { key: 'value' },
    });
  });
});

describe('subclasses', () => {
  it('should carry their own names', () => {
    expect(new ConfigError(ErrorCodes.CONFIG_INVALID, 'x').name).toBe('ConfigError');
    expect(new ServiceError(ErrorCodes.SERVICE_STATUS, 'x').name).toBe('ServiceError');
    expect(new ProjectError(ErrorCodes.UNKNOWN_OPTION, 'x')).toBeInstanceOf(SpringInitError);
  });
});

describe('TargetExistsError', () => {
  it('should name what is in the way', () => {
    const error = new TargetExistsError('demo', 'file');

    expect(error.message).toBe("a file named 'demo' already exists");
    expect(error.code).toBe(ErrorCodes.TARGET_EXISTS);
    expect(error.details).toEqual({ target: 'demo', existing: 'file' });
  });
});

describe('ExtractionError', () => {
  it('should map each kind to a code', () => {
    expect(new ExtractionError('invalid-archive', 'x').code).toBe('X002');
    expect(new ExtractionError('target-exists', 'x').code).toBe('X001');
    expect(new ExtractionError('filesystem', 'x').code).toBe('X003');
  });

  it('should expose the path from its details', () => {
    expect(new ExtractionError('filesystem', 'x', { path: '/tmp/demo/pom.xml' }).path).toBe('/tmp/demo/pom.xml');
    expect(new ExtractionError('filesystem', 'x', { path: 42 }).path).toBeUndefined();
    expect(new ExtractionError('invalid-archive', 'x').path).toBeUndefined();
  });
});

describe('ErrorCodes', () => {
  it('should be unique', () => {
    const codes = Object.values(ErrorCodes);

    expect(new Set(codes).size).toBe(codes.length);
  });
});

describe('errorMessage', () => {
  it('should read messages of errors only', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('boom')).toBe('Unknown error');
  });
});
