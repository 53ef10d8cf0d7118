import { describe, expect, it } from 'vitest';
import {
  ConfigError,
  LogicExecutionError,
  NOT_FOUND_CODE,
  NotFoundError,
  TemplateParseError,
  TesselError,
  errorDetail,
  isNotFoundError,
  notFound,
} from './errors.js';

describe('TesselError', () => {
  it('prefixes the message and keeps the bare detail', () => {
    const err = new ConfigError('"cache" must be a boolean');
    expect(err.message).toBe('[tessel] "cache" must be a boolean');
    expect(err.detail).toBe('"cache" must be a boolean');
    expect(err.name).toBe('ConfigError');
    expect(err).toBeInstanceOf(TesselError);
  });

  it('names the file for parse errors', () => {
    const err = new TemplateParseError('routes/index.html', 'Parse error on line 1');
    expect(err.file).toBe('routes/index.html');
    expect(err.detail).toBe('routes/index.html: Parse error on line 1');
  });

  it('keeps captured stderr on execution errors', () => {
    expect(new LogicExecutionError('unit failed', 'Error: boom').stderr).toBe('Error: boom');
  });
});

describe('not found', () => {
  it('throws a NotFoundError with the not-found code', () => {
    expect(() => notFound('post 7')).toThrow(NotFoundError);
    expect(new NotFoundError().code).toBe(NOT_FOUND_CODE);
  });

  it('recognizes errors by class or by code', () => {
    expect(isNotFoundError(new NotFoundError())).toBe(true);
    expect(isNotFoundError(Object.assign(new Error('gone'), { code: NOT_FOUND_CODE }))).toBe(true);
    expect(isNotFoundError(new Error('gone'))).toBe(false);
    expect(isNotFoundError(null)).toBe(false);
  });
});

describe('errorDetail', () => {
  it('drops the prefix from our own errors only', () => {
    expect(errorDetail(new NotFoundError('post 7'))).toBe('post 7');
    expect(errorDetail(new Error('db down'))).toBe('db down');
    expect(errorDetail('plain')).toBe('plain');
  });
});
