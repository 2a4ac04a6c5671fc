/**
 * @file Error helpers tests.
 */

import { describe, it, expect } from 'vitest';
import {
  BfcpuError,
  CompileError,
  ConfigurationError,
  FileResolutionError,
  HexParseError,
  MissingConfigError,
  ParseError,
  ProgramTooLargeError,
  RuntimeError,
  getErrorMessage,
  isBfcpuError,
  isCompileError,
  isParseError,
  wrapError,
} from '../../src/debug/errors';

describe('errors', () => {
  it('preserves code and context for BfcpuError', () => {
    const err = new BfcpuError('oops', 'E1', { detail: 123 });
    expect(err.code).toBe('E1');
    expect(err.context).toEqual({ detail: 123 });
    expect(err.name).toBe('BfcpuError');
    expect(err).toBeInstanceOf(Error);
  });

  it('builds configuration errors with context', () => {
    const err = new ConfigurationError('bad config', { field: 'machine' });
    expect(err.code).toBe('CONFIG_ERROR');
    expect(err.context).toEqual({ field: 'machine' });
    expect(err).toBeInstanceOf(ConfigurationError);
  });

  it('builds missing config error', () => {
    const err = new MissingConfigError('missing', ['program']);
    expect(err.missingKeys).toEqual(['program']);
    expect(err.code).toBe('CONFIG_ERROR');
  });

  it('builds file resolution errors and helpers', () => {
    const err = new FileResolutionError('no file', 'a.hex', 'hex');
    expect(err.filePath).toBe('a.hex');
    expect(err.fileType).toBe('hex');
    expect(err.code).toBe('FILE_RESOLUTION_ERROR');
    expect(FileResolutionError.missingProgram().fileType).toBe('program');
    expect(FileResolutionError.unsupportedType('demo.txt').message).toBe(
      'Unsupported program type: demo.txt. Expected .bf, .b, .hex or .bin.'
    );
  });

  it('carries parse positions', () => {
    const err = new ParseError('Unmatched ]', 3, ']', 7);
    expect(err.line).toBe(3);
    expect(err.column).toBe(7);
    expect(err.code).toBe('PARSE_ERROR');
    const hex = new HexParseError(':zz', 2);
    expect(hex.message).toBe('Invalid HEX line: :zz');
    expect(hex.line).toBe(2);
    expect(isParseError(hex)).toBe(true);
  });

  it('describes compile and capacity failures', () => {
    const compile = new CompileError('too far', 4, 2);
    expect(compile.address).toBe(4);
    expect(compile.line).toBe(2);
    expect(isCompileError(compile)).toBe(true);

    const large = new ProgramTooLargeError(40, 32, 'boot image');
    expect(large.message).toBe('Program is 40 words but the program store holds 32 (boot image)');
    expect(large.size).toBe(40);
    expect(large.capacity).toBe(32);
    expect(new ProgramTooLargeError(40, 32).message).toBe(
      'Program is 40 words but the program store holds 32'
    );
  });

  it('records the program counter on runtime errors', () => {
    const err = new RuntimeError('stuck', 5);
    expect(err.pc).toBe(5);
    expect(err.code).toBe('RUNTIME_ERROR');
    expect(new RuntimeError('stuck').pc).toBeUndefined();
  });

  it('wraps unknown errors', () => {
    const original = new RuntimeError('kept');
    expect(wrapError(original)).toBe(original);

    const wrapped = wrapError(new TypeError('bad'));
    expect(isBfcpuError(wrapped)).toBe(true);
    expect(wrapped.message).toBe('bad');
    expect(wrapped.context).toEqual({ originalError: 'TypeError' });

    const fallback = wrapError(42, 'fallback');
    expect(fallback.message).toBe('fallback');
    expect(fallback.context).toEqual({ originalValue: '42' });
  });

  it('extracts messages', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('plain')).toBe('plain');
  });
});
