import { describe, it, expect } from 'vitest';
import {
  DocqaError,
  CapabilityError,
  StructuredOutputError,
  ConfigurationError,
  ValidationError,
  isDocqaError,
  wrapCapabilityError,
  toExitCode,
} from '../errors.js';

describe('errors', () => {
  describe('CapabilityError', () => {
    it('should carry the capability and code', () => {
      const err = new CapabilityError('retriever', 'index offline');

      expect(err).toBeInstanceOf(DocqaError);
      expect(err.name).toBe('CapabilityError');
      expect(err.code).toBe('CAPABILITY_ERROR');
      expect(err.capability).toBe('retriever');
      expect(err.context).toEqual({ capability: 'retriever' });
    });
  });

  describe('StructuredOutputError', () => {
    it('should default issues to an empty list', () => {
      const err = new StructuredOutputError('bad shape', { raw: '{}' });

      expect(err.issues).toEqual([]);
      expect(err.raw).toBe('{}');
      expect(err.code).toBe('STRUCTURED_OUTPUT_ERROR');
    });
  });

  describe('toJSON', () => {
    it('should serialize code, message and cause', () => {
      const cause = new Error('socket hang up');
      const json = new CapabilityError('generator', 'failed', { cause }).toJSON();

      expect(json.name).toBe('CapabilityError');
      expect(json.code).toBe('CAPABILITY_ERROR');
      expect(json.message).toBe('failed');
      expect(json.cause).toBe('socket hang up');
    });
  });

  describe('wrapCapabilityError', () => {
    it('should wrap plain errors', () => {
      const cause = new Error('timeout');
      const wrapped = wrapCapabilityError('web_search', cause);

      expect(wrapped).toBeInstanceOf(CapabilityError);
      expect(wrapped.message).toBe('web_search call failed: timeout');
      expect(wrapped.cause).toBe(cause);
    });

    it('should wrap non-Error values', () => {
      const wrapped = wrapCapabilityError('generator', 'quota exceeded');

      expect(wrapped.message).toBe('generator call failed: quota exceeded');
      expect(wrapped.cause).toBeUndefined();
    });

    it('should pass docqa errors through unchanged', () => {
      const original = new StructuredOutputError('not json');
      expect(wrapCapabilityError('generator', original)).toBe(original);
    });
  });

  describe('isDocqaError', () => {
    it('should recognize docqa errors only', () => {
      expect(isDocqaError(new ConfigurationError('x'))).toBe(true);
      expect(isDocqaError(new Error('x'))).toBe(false);
      expect(isDocqaError('x')).toBe(false);
    });
  });

  describe('toExitCode', () => {
    it('should map each error type to its exit code', () => {
      expect(toExitCode(new ValidationError('x'))).toBe(20);
      expect(toExitCode(new CapabilityError('retriever', 'x'))).toBe(40);
      expect(toExitCode(new ConfigurationError('x'))).toBe(41);
      expect(toExitCode(new StructuredOutputError('x'))).toBe(42);
      expect(toExitCode(new Error('x'))).toBe(1);
    });
  });
});
