/**
 * @fileoverview Program image parsers: Intel HEX, raw binary and Brainfuck source.
 */

import { HexParseError, ProgramTooLargeError } from '../debug/errors';
import { compileBrainfuck } from './compiler';

/**
 * A program image ready for the program store.
 */
export interface ProgramImage {
  /** Words from address 0; shorter than the store is fine, the rest reads as HALT */
  words: Uint8Array;
}

/**
 * Source line information for debugging.
 */
export interface ListingInfo {
  /** Map from source line number to the first address it produced */
  lineToAddress: Map<number, number>;
  /** Map from address to source line number */
  addressToLine: Map<number, number>;
  /** Detailed entries with line, address, and word count */
  entries: Array<{ line: number; address: number; length: number }>;
}

export type ProgramKind = 'bf' | 'hex' | 'bin';

const HEX_LINE = /^:[0-9A-Fa-f]+$/;

/**
 * Parses Intel HEX content into a program image.
 *
 * Supports standard Intel HEX records:
 * - Type 00: Data records (loaded into the image)
 * - Type 01: End of file (terminates parsing)
 * - Other types: Silently ignored
 *
 * The image length is one past the highest address written.
 *
 * @throws HexParseError on malformed lines
 * @throws ProgramTooLargeError when a record addresses past the program store
 *
 * @example
 * ```typescript
 * const image = parseIntelHex(':0300000045800038\n:00000001FF\n', 32);
 * // image.words -> 45 80 00
 * ```
 */
export function parseIntelHex(content: string, depth: number): ProgramImage {
  const memory = new Uint8Array(depth);
  let size = 0;

  const lines = content.split(/\r?\n/);
  for (let idx = 0; idx < lines.length; idx++) {
    const line = (lines[idx] ?? '').trim();
    if (line.length === 0) {
      continue;
    }
    if (!HEX_LINE.test(line) || line.length < 11) {
      throw new HexParseError(line, idx + 1);
    }

    const byteCount = parseInt(line.slice(1, 3), 16);
    const address = parseInt(line.slice(3, 7), 16);
    const recordType = parseInt(line.slice(7, 9), 16);
    if (line.length < 11 + byteCount * 2) {
      throw new HexParseError(line, idx + 1);
    }
    const dataString = line.slice(9, 9 + byteCount * 2);

    if (recordType === 1) {
      break;
    }
    if (recordType !== 0) {
      continue;
    }

    const end = address + byteCount;
    if (end > depth) {
      throw new ProgramTooLargeError(end, depth, `HEX line ${idx + 1}`);
    }
    for (let i = 0; i < byteCount; i++) {
      memory[address + i] = parseInt(dataString.slice(i * 2, i * 2 + 2), 16);
    }
    size = Math.max(size, end);
  }

  return { words: memory.slice(0, size) };
}

/**
 * Treats every byte as one instruction word.
 */
export function parseBinary(data: Uint8Array, depth: number): ProgramImage {
  if (data.length > depth) {
    throw new ProgramTooLargeError(data.length, depth, 'binary image');
  }
  return { words: Uint8Array.from(data) };
}

export function programKindFromPath(filePath: string): ProgramKind | undefined {
  const lower = filePath.toLowerCase();
  if (lower.endsWith('.bf') || lower.endsWith('.b')) {
    return 'bf';
  }
  if (lower.endsWith('.hex') || lower.endsWith('.ihx')) {
    return 'hex';
  }
  if (lower.endsWith('.bin')) {
    return 'bin';
  }
  return undefined;
}

export interface ParsedProgram extends ProgramImage {
  kind: ProgramKind;
  /** Present for Brainfuck sources only */
  listing?: ListingInfo;
}

export function parseProgram(data: Uint8Array, kind: ProgramKind, depth: number): ParsedProgram {
  switch (kind) {
    case 'bf': {
      const compiled = compileBrainfuck(Buffer.from(data).toString('utf-8'), { programDepth: depth });
      return { kind, words: compiled.words, listing: compiled.listing };
    }
    case 'hex':
      return { kind, ...parseIntelHex(Buffer.from(data).toString('utf-8'), depth) };
    case 'bin':
      return { kind, ...parseBinary(data, depth) };
  }
}
