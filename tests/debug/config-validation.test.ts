/**
 * @file Launch and project configuration validation tests.
 */

import { describe, it, expect } from 'vitest';
import {
  assertHasProgram,
  assertValidLaunchArgs,
  mergeResults,
  validateLaunchArgs,
  validateMachineConfig,
  validateProjectConfig,
} from '../../src/debug/config-validation';
import { ConfigurationError, MissingConfigError } from '../../src/debug/errors';

describe('validateLaunchArgs', () => {
  it('accepts a complete launch configuration', () => {
    const result = validateLaunchArgs({
      program: 'hello.bf',
      load: 'upload',
      stopOnEntry: true,
      input: 'abc',
      stepLimit: 500,
      waitLimitSteps: 1000,
      machine: { programDepth: 64, tapeDepth: 32, baud: 9600, clockHz: 307200, txTiming: 'bit-tick' },
    });
    expect(result).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it('requires an object', () => {
    expect(validateLaunchArgs(null).errors).toEqual(['Launch arguments are required']);
    expect(validateLaunchArgs('x').errors).toEqual(['Launch arguments must be an object, got string']);
  });

  it('reports every bad field', () => {
    const result = validateLaunchArgs({
      program: 5,
      load: 'flash',
      stepLimit: -1,
      machine: { programDepth: 1, txTiming: 'fast' },
    });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'program must be a string, got number',
      'load must be "boot" or "upload", got "flash"',
      'stepLimit must be between 0 and 9007199254740991, got -1',
      'machine.programDepth must be between 2 and 4096, got 1',
      'machine.txTiming must be "frame-aligned" or "bit-tick", got "fast"',
    ]);
  });

  it('warns about very large limits', () => {
    const result = validateLaunchArgs({ stepLimit: 2_000_000_000 });
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      'stepLimit is very large (2000000000). This may cause performance issues.',
    ]);
  });
});

describe('validateMachineConfig', () => {
  it('warns when the baud rate cannot be matched closely', () => {
    const result = validateMachineConfig({ baud: 9600, clockHz: 1_000_000 });
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(['machine.baud 9600 is 7.5% off at 1000000 Hz (divisor 7)']);
  });

  it('rejects a clock too slow for the baud rate', () => {
    expect(validateMachineConfig({ baud: 9600, clockHz: 100 }).errors).toEqual([
      'machine.clockHz (100) is below 16x machine.baud (9600)',
    ]);
  });

  it('rejects non-positive rates', () => {
    expect(validateMachineConfig({ baud: 0 }).errors).toEqual(['machine.baud must be positive, got 0']);
    expect(validateMachineConfig([]).errors).toEqual(['machine must be an object, got object']);
  });
});

describe('validateProjectConfig', () => {
  it('validates targets with their prefix', () => {
    const result = validateProjectConfig({
      defaultTarget: 'demo',
      targets: { demo: { stopOnEntry: 'yes' }, other: 3 },
    });
    expect(result.errors).toEqual([
      'targets.demo.stopOnEntry must be a boolean, got string',
      'targets.other must be an object, got number',
    ]);
  });

  it('requires an object document', () => {
    expect(validateProjectConfig(7).errors).toEqual(['Project configuration must be an object, got number']);
  });
});

describe('assertions', () => {
  it('throws a configuration error listing the problems', () => {
    expect(() => assertValidLaunchArgs({ program: 5 })).toThrow(ConfigurationError);
    expect(() => assertValidLaunchArgs({ program: 5 })).toThrow(
      'Invalid launch configuration:\n- program must be a string, got number'
    );
  });

  it('requires a program path', () => {
    expect(() => assertHasProgram({})).toThrow(MissingConfigError);
    expect(() => assertHasProgram({ program: 'a.bf' })).not.toThrow();
  });

  it('merges results', () => {
    expect(
      mergeResults([
        { valid: true, errors: [], warnings: ['w'] },
        { valid: false, errors: ['e'], warnings: [] },
      ])
    ).toEqual({ valid: false, errors: ['e'], warnings: ['w'] });
  });
});
