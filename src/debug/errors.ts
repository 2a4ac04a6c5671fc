/**
 * @file Error types
 * @description Error classes for configuration, file resolution, parsing, compilation and
 * program loading. The simulated machine never throws while stepping; everything here is
 * raised while preparing a program or a session.
 * @module debug/errors
 */

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base error class for all bfcpu errors.
 * Provides a consistent error structure with error codes and context.
 */
export class BfcpuError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;
  /** Additional context about the error */
  readonly context?: Record<string, unknown>;

  /**
   * @param message - Human-readable error message
   * @param code - Error code for programmatic handling
   * @param context - Optional additional context
   */
  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'BfcpuError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ConfigurationError extends BfcpuError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when required configuration is missing.
 */
export class MissingConfigError extends ConfigurationError {
  /** The missing configuration key(s) */
  readonly missingKeys: string[];

  constructor(message: string, missingKeys: string[]) {
    super(message, { missingKeys });
    this.name = 'MissingConfigError';
    this.missingKeys = missingKeys;
  }
}

// ============================================================================
// File Resolution Errors
// ============================================================================

/**
 * Error thrown when a program or boot image cannot be found or has an unknown type.
 */
export class FileResolutionError extends BfcpuError {
  readonly filePath?: string;
  /** bf, hex, bin, config */
  readonly fileType?: string;

  constructor(message: string, filePath?: string, fileType?: string) {
    super(message, 'FILE_RESOLUTION_ERROR', { filePath, fileType });
    this.name = 'FileResolutionError';
    if (filePath !== undefined) {
      this.filePath = filePath;
    }
    if (fileType !== undefined) {
      this.fileType = fileType;
    }
  }

  static missingProgram(): FileResolutionError {
    return new FileResolutionError(
      'Launch requires a "program" path (.bf, .b, .hex or .bin).',
      undefined,
      'program'
    );
  }

  static unsupportedType(filePath: string): FileResolutionError {
    return new FileResolutionError(
      `Unsupported program type: ${filePath}. Expected .bf, .b, .hex or .bin.`,
      filePath,
      'program'
    );
  }
}

// ============================================================================
// Parse Errors
// ============================================================================

/**
 * Error thrown when parsing fails.
 */
export class ParseError extends BfcpuError {
  /** The line number where parsing failed (1-based) */
  readonly line?: number;
  /** The column where parsing failed (1-based) */
  readonly column?: number;
  /** The content that caused the parse failure */
  readonly content?: string;

  constructor(message: string, line?: number, content?: string, column?: number) {
    super(message, 'PARSE_ERROR', { line, column, content });
    this.name = 'ParseError';
    if (line !== undefined) {
      this.line = line;
    }
    if (column !== undefined) {
      this.column = column;
    }
    if (content !== undefined) {
      this.content = content;
    }
  }
}

/**
 * Error thrown when Intel HEX parsing fails.
 */
export class HexParseError extends ParseError {
  /**
   * @param line - The invalid HEX line content
   * @param lineNumber - Line number in the file
   */
  constructor(line: string, lineNumber?: number) {
    super(`Invalid HEX line: ${line}`, lineNumber, line);
    this.name = 'HexParseError';
  }
}

// ============================================================================
// Compilation Errors
// ============================================================================

/**
 * Error thrown when Brainfuck source parses but cannot be encoded,
 * e.g. a loop whose jump does not fit the signed 5-bit offset.
 */
export class CompileError extends BfcpuError {
  /** Program address of the offending instruction */
  readonly address?: number;
  /** Source line of the offending instruction (1-based) */
  readonly line?: number;

  constructor(message: string, address?: number, line?: number) {
    super(message, 'COMPILE_ERROR', { address, line });
    this.name = 'CompileError';
    if (address !== undefined) {
      this.address = address;
    }
    if (line !== undefined) {
      this.line = line;
    }
  }
}

/**
 * Error thrown when a program image does not fit the program store.
 */
export class ProgramTooLargeError extends BfcpuError {
  readonly size: number;
  readonly capacity: number;

  constructor(size: number, capacity: number, source?: string) {
    const from = source !== undefined ? ` (${source})` : '';
    super(
      `Program is ${size} words but the program store holds ${capacity}${from}`,
      'PROGRAM_TOO_LARGE',
      { size, capacity, source }
    );
    this.name = 'ProgramTooLargeError';
    this.size = size;
    this.capacity = capacity;
  }
}

// ============================================================================
// Runtime Errors
// ============================================================================

/**
 * Error thrown when a session request cannot be served by the current machine state.
 */
export class RuntimeError extends BfcpuError {
  /** Program counter at time of error */
  readonly pc?: number;

  constructor(message: string, pc?: number) {
    super(message, 'RUNTIME_ERROR', { pc });
    this.name = 'RuntimeError';
    if (pc !== undefined) {
      this.pc = pc;
    }
  }
}

// ============================================================================
// Type Guards
// ============================================================================

export function isBfcpuError(error: unknown): error is BfcpuError {
  return error instanceof BfcpuError;
}

export function isParseError(error: unknown): error is ParseError {
  return error instanceof ParseError;
}

export function isCompileError(error: unknown): error is CompileError {
  return error instanceof CompileError;
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Wraps an unknown error in a BfcpuError if it isn't already one.
 * @param error - The error to wrap
 * @param defaultMessage - Default message if error is not an Error
 */
export function wrapError(
  error: unknown,
  defaultMessage = 'An unknown error occurred'
): BfcpuError {
  if (isBfcpuError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new BfcpuError(error.message, 'UNKNOWN_ERROR', { originalError: error.name });
  }
  return new BfcpuError(defaultMessage, 'UNKNOWN_ERROR', { originalValue: String(error) });
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
