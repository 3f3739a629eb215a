import { describe, it, expect } from 'vitest';
import { NetsynthError, ErrorCode, isNetsynthError, wrapError } from '../../core/errors';

describe('NetsynthError', () => {
  describe('constructor', () => {
    it('should create error with code and message', () => {
      const error = new NetsynthError(ErrorCode.INVALID_ARGUMENT, 'Test message');

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(NetsynthError);
      expect(error.name).toBe('NetsynthError');
      expect(error.code).toBe(ErrorCode.INVALID_ARGUMENT);
      expect(error.message).toBe('Test message');
      expect(error.context).toBeUndefined();
    });

    it('should create error with context', () => {
      const error = new NetsynthError(ErrorCode.INVALID_ARGUMENT, 'Bad count', { sampleCount: 0 });

      expect(error.context).toEqual({ sampleCount: 0 });
    });

    it('should preserve stack trace', () => {
      const error = new NetsynthError(ErrorCode.INTERNAL_ERROR, 'Test');
      expect(error.stack).toBeDefined();
      expect(error.stack).toContain('NetsynthError');
    });
  });

  describe('toString', () => {
    it('should format error without context', () => {
      const error = new NetsynthError(ErrorCode.INVALID_CONFIG, 'Bad config');
      expect(error.toString()).toBe('NetsynthError [INVALID_CONFIG]: Bad config');
    });

    it('should format error with context', () => {
      const error = new NetsynthError(ErrorCode.NUMERIC_DEGENERACY, 'Total cost must be positive', {
        totalCost: 0,
      });

      expect(error.toString()).toBe(
        'NetsynthError [NUMERIC_DEGENERACY]: Total cost must be positive Context: {"totalCost":0}'
      );
    });
  });

  describe('is / isOneOf', () => {
    it('should match its own code only', () => {
      const error = new NetsynthError(ErrorCode.DATA_QUALITY, 'Test');
      expect(error.is(ErrorCode.DATA_QUALITY)).toBe(true);
      expect(error.is(ErrorCode.INVALID_DATA)).toBe(false);
    });

    it('should check membership in a list of codes', () => {
      const error = new NetsynthError(ErrorCode.IO_ERROR, 'Test');
      expect(error.isOneOf([ErrorCode.IO_ERROR, ErrorCode.INTERNAL_ERROR])).toBe(true);
      expect(error.isOneOf([ErrorCode.INVALID_ARGUMENT])).toBe(false);
      expect(error.isOneOf([])).toBe(false);
    });
  });
});

describe('isNetsynthError', () => {
  it('should distinguish NetsynthError from other values', () => {
    expect(isNetsynthError(new NetsynthError(ErrorCode.INTERNAL_ERROR, 'Test'))).toBe(true);
    expect(isNetsynthError(new Error('Regular error'))).toBe(false);
    expect(isNetsynthError('string')).toBe(false);
    expect(isNetsynthError(null)).toBe(false);
    expect(isNetsynthError({})).toBe(false);
  });
});

describe('wrapError', () => {
  it('should return NetsynthError as-is', () => {
    const original = new NetsynthError(ErrorCode.INVALID_DATA, 'Original');
    expect(wrapError(original)).toBe(original);
  });

  it('should wrap regular Error with default code', () => {
    const original = new Error('Regular error');
    const wrapped = wrapError(original);

    expect(wrapped).toBeInstanceOf(NetsynthError);
    expect(wrapped.code).toBe(ErrorCode.INTERNAL_ERROR);
    expect(wrapped.message).toBe('Regular error');
    expect(wrapped.context).toEqual({ originalStack: original.stack });
  });

  it('should wrap regular Error with custom code', () => {
    const wrapped = wrapError(new Error('EACCES'), ErrorCode.IO_ERROR);

    expect(wrapped.code).toBe(ErrorCode.IO_ERROR);
    expect(wrapped.message).toBe('EACCES');
  });

  it('should wrap non-Error values', () => {
    const wrapped = wrapError(42);

    expect(wrapped.code).toBe(ErrorCode.INTERNAL_ERROR);
    expect(wrapped.message).toBe('42');
    expect(wrapped.context).toEqual({ originalError: 42 });
  });
});
