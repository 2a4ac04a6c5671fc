/**
 * @file Configuration validation for bfcpu launch configurations.
 * @description Runtime validation of launch arguments and project configuration, with
 * one message per offending field.
 * @module debug/config-validation
 */

import { ConfigurationError, MissingConfigError } from './errors';
import { isLoadMode, isRecord, LaunchRequestArguments } from './types';
import {
  MAX_DEPTH,
  MAX_RESET_STAGES,
  MIN_DEPTH,
  MIN_RESET_STAGES,
  OVERSAMPLE,
} from '../platforms/types';

// ============================================================================
// Constants
// ============================================================================

const STEP_LIMIT_MAX = 1_000_000_000;

/** Relative baud error above which a warning is raised. */
const BAUD_ERROR_WARN = 0.03;

// ============================================================================
// Validation Result Types
// ============================================================================

/**
 * Validation result containing all issues found.
 */
export interface ValidationResult {
  /** Whether the configuration is valid */
  valid: boolean;
  /** List of error messages */
  errors: string[];
  /** List of warning messages */
  warnings: string[];
}

function ok(warnings: string[] = []): ValidationResult {
  return { valid: true, errors: [], warnings };
}

function fail(message: string): ValidationResult {
  return { valid: false, errors: [message], warnings: [] };
}

// ============================================================================
// Individual Validators
// ============================================================================

/**
 * Validates an integer within an inclusive range.
 * @param fieldName - Name of the field for error messages
 */
export function validateIntegerRange(
  value: unknown,
  fieldName: string,
  min: number,
  max: number
): ValidationResult {
  if (value === undefined || value === null) {
    return ok();
  }
  if (typeof value !== 'number') {
    return fail(`${fieldName} must be a number, got ${typeof value}`);
  }
  if (!Number.isInteger(value)) {
    return fail(`${fieldName} must be an integer, got ${value}`);
  }
  if (value < min || value > max) {
    return fail(`${fieldName} must be between ${min} and ${max}, got ${value}`);
  }
  return ok();
}

export function validatePositiveNumber(value: unknown, fieldName: string): ValidationResult {
  if (value === undefined || value === null) {
    return ok();
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return fail(`${fieldName} must be a finite number, got ${String(value)}`);
  }
  if (value <= 0) {
    return fail(`${fieldName} must be positive, got ${value}`);
  }
  return ok();
}

/**
 * Validates an instruction or step limit; 0 means unlimited.
 */
export function validateStepLimit(value: unknown, fieldName: string): ValidationResult {
  const base = validateIntegerRange(value, fieldName, 0, Number.MAX_SAFE_INTEGER);
  if (!base.valid || typeof value !== 'number') {
    return base;
  }
  if (value > STEP_LIMIT_MAX) {
    return ok([`${fieldName} is very large (${value}). This may cause performance issues.`]);
  }
  return base;
}

/**
 * Validates a file path string.
 * @param required - Whether the field is required
 */
export function validatePath(value: unknown, fieldName: string, required = false): ValidationResult {
  if (value === undefined || value === null || value === '') {
    return required ? fail(`${fieldName} is required`) : ok();
  }
  if (typeof value !== 'string') {
    return fail(`${fieldName} must be a string, got ${typeof value}`);
  }
  if (value.includes('\0')) {
    return fail(`${fieldName} contains invalid null character`);
  }
  return ok();
}

export function validateString(value: unknown, fieldName: string): ValidationResult {
  if (value === undefined || value === null || typeof value === 'string') {
    return ok();
  }
  return fail(`${fieldName} must be a string, got ${typeof value}`);
}

export function validateBoolean(value: unknown, fieldName: string): ValidationResult {
  if (value === undefined || value === null || typeof value === 'boolean') {
    return ok();
  }
  return fail(`${fieldName} must be a boolean, got ${typeof value}`);
}

export function validateLoadMode(value: unknown): ValidationResult {
  if (value === undefined || value === null || isLoadMode(value)) {
    return ok();
  }
  return fail(`load must be "boot" or "upload", got ${JSON.stringify(value)}`);
}

export function validateTxTiming(value: unknown): ValidationResult {
  if (value === undefined || value === null || value === 'frame-aligned' || value === 'bit-tick') {
    return ok();
  }
  return fail(`machine.txTiming must be "frame-aligned" or "bit-tick", got ${JSON.stringify(value)}`);
}

// ============================================================================
// Compound Validators
// ============================================================================

/**
 * Validates the `machine` section, including that clock and baud give a usable divisor.
 */
export function validateMachineConfig(config: unknown): ValidationResult {
  if (config === undefined || config === null) {
    return ok();
  }
  if (!isRecord(config)) {
    return fail(`machine must be an object, got ${typeof config}`);
  }

  const results = [
    validateIntegerRange(config.programDepth, 'machine.programDepth', MIN_DEPTH, MAX_DEPTH),
    validateIntegerRange(config.tapeDepth, 'machine.tapeDepth', MIN_DEPTH, MAX_DEPTH),
    validatePositiveNumber(config.clockHz, 'machine.clockHz'),
    validatePositiveNumber(config.baud, 'machine.baud'),
    validateIntegerRange(
      config.resetStages,
      'machine.resetStages',
      MIN_RESET_STAGES,
      MAX_RESET_STAGES
    ),
    validateTxTiming(config.txTiming),
    validatePath(config.bootImage, 'machine.bootImage'),
  ];

  const { clockHz, baud } = config;
  if (typeof clockHz === 'number' && typeof baud === 'number' && clockHz > 0 && baud > 0) {
    const exact = clockHz / (baud * OVERSAMPLE);
    const divisor = Math.round(exact);
    if (divisor < 1) {
      results.push(
        fail(`machine.clockHz (${clockHz}) is below ${OVERSAMPLE}x machine.baud (${baud})`)
      );
    } else {
      const error = Math.abs(divisor - exact) / exact;
      if (error > BAUD_ERROR_WARN) {
        results.push(
          ok([
            `machine.baud ${baud} is ${(error * 100).toFixed(1)}% off at ${clockHz} Hz (divisor ${divisor})`,
          ])
        );
      }
    }
  }

  return mergeResults(results);
}

/**
 * Validates the launch fields shared by launch arguments, project roots and targets.
 * @param prefix - Field name prefix for messages, e.g. `targets.demo.`
 */
export function validateLaunchFields(fields: Record<string, unknown>, prefix = ''): ValidationResult {
  return mergeResults([
    validatePath(fields.program, `${prefix}program`),
    validateLoadMode(fields.load),
    validateBoolean(fields.stopOnEntry, `${prefix}stopOnEntry`),
    validateString(fields.input, `${prefix}input`),
    validateStepLimit(fields.stepLimit, `${prefix}stepLimit`),
    validateStepLimit(fields.waitLimitSteps, `${prefix}waitLimitSteps`),
    validateMachineConfig(fields.machine),
  ]);
}

/**
 * Validates a parsed bfcpu.json document.
 */
export function validateProjectConfig(config: unknown): ValidationResult {
  if (!isRecord(config)) {
    return fail(`Project configuration must be an object, got ${typeof config}`);
  }
  const results = [
    validateLaunchFields(config),
    validateString(config.defaultTarget, 'defaultTarget'),
    validateString(config.target, 'target'),
  ];
  const { targets } = config;
  if (targets !== undefined) {
    if (!isRecord(targets)) {
      results.push(fail(`targets must be an object, got ${typeof targets}`));
    } else {
      for (const [name, target] of Object.entries(targets)) {
        results.push(
          isRecord(target)
            ? validateLaunchFields(target, `targets.${name}.`)
            : fail(`targets.${name} must be an object, got ${typeof target}`)
        );
      }
    }
  }
  return mergeResults(results);
}

// ============================================================================
// Main Validation Function
// ============================================================================

/**
 * Validates complete launch request arguments.
 */
export function validateLaunchArgs(args: unknown): ValidationResult {
  if (args === undefined || args === null) {
    return fail('Launch arguments are required');
  }
  if (!isRecord(args)) {
    return fail(`Launch arguments must be an object, got ${typeof args}`);
  }
  return mergeResults([
    validateLaunchFields(args),
    validatePath(args.projectConfig, 'projectConfig'),
    validateString(args.target, 'target'),
  ]);
}

/**
 * @throws {ConfigurationError} If validation fails
 */
export function assertValidLaunchArgs(args: unknown): asserts args is LaunchRequestArguments {
  const result = validateLaunchArgs(args);
  if (!result.valid) {
    throw new ConfigurationError(`Invalid launch configuration:\n- ${result.errors.join('\n- ')}`);
  }
}

/**
 * @throws {MissingConfigError} If no program path is provided
 */
export function assertHasProgram(args: LaunchRequestArguments): asserts args is LaunchRequestArguments & { program: string } {
  if (args.program === undefined || args.program === '') {
    throw new MissingConfigError(
      'No program specified. Provide "program" (.bf, .b, .hex or .bin) in the launch arguments or bfcpu.json.',
      ['program']
    );
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Merges multiple validation results into one.
 */
export function mergeResults(results: ValidationResult[]): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  let valid = true;

  for (const result of results) {
    if (!result.valid) {
      valid = false;
    }
    errors.push(...result.errors);
    warnings.push(...result.warnings);
  }

  return { valid, errors, warnings };
}
