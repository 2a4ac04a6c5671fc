/**
 * @fileoverview Program loading utilities for the debug adapter.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ListingInfo, parseProgram, ProgramKind, programKindFromPath } from '../cpu/loaders';
import { FileResolutionError } from './errors';

export interface ProgramLoadResult {
  path: string;
  kind: ProgramKind;
  words: Uint8Array;
  /** Line map, for Brainfuck sources */
  listing?: ListingInfo;
}

/**
 * Resolves a path against the base directory and checks that it exists.
 *
 * @throws FileResolutionError when the file is missing
 */
export function resolveProgramPath(filePath: string, baseDir: string): string {
  const resolved = path.isAbsolute(filePath) ? filePath : path.resolve(baseDir, filePath);
  if (!fs.existsSync(resolved)) {
    throw new FileResolutionError(`Program file not found: ${resolved}`, resolved, 'program');
  }
  return resolved;
}

/**
 * Reads a program or boot image and turns it into program store words.
 *
 * @param filePath - .bf/.b source, Intel HEX or raw binary
 * @param depth - Program store depth
 */
export function loadProgramFile(filePath: string, baseDir: string, depth: number): ProgramLoadResult {
  const resolved = resolveProgramPath(filePath, baseDir);
  const kind = programKindFromPath(resolved);
  if (kind === undefined) {
    throw FileResolutionError.unsupportedType(resolved);
  }
  const parsed = parseProgram(fs.readFileSync(resolved), kind, depth);
  return {
    path: resolved,
    kind,
    words: parsed.words,
    ...(parsed.listing !== undefined ? { listing: parsed.listing } : {}),
  };
}
