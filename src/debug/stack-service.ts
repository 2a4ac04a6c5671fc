/**
 * @fileoverview Stack frame helpers for debug sessions.
 */

import * as path from 'path';
import { StackFrame, Source } from '@vscode/debugadapter';
import { ListingInfo } from '../cpu/loaders';

export interface SourceLookupOptions {
  /** Brainfuck source the program was compiled from */
  sourceFile?: string;
  listing?: ListingInfo;
  /** Disassembly served through `source` requests when there is no source file */
  disassembly?: { name: string; reference: number };
}

/**
 * A single frame: the machine has no call stack.
 */
export function buildStackFrames(
  pc: number,
  options: SourceLookupOptions
): { stackFrames: StackFrame[]; totalFrames: number } {
  const resolved = resolveSourceForAddress(pc, options);
  return {
    stackFrames: [new StackFrame(0, `pc ${pc}`, resolved.source, resolved.line)],
    totalFrames: 1,
  };
}

export function resolveSourceForAddress(
  address: number,
  options: SourceLookupOptions
): { source: Source; line: number } {
  if (options.sourceFile !== undefined && options.listing !== undefined) {
    const line = options.listing.addressToLine.get(address) ?? lastLine(options.listing);
    return { source: new Source(path.basename(options.sourceFile), options.sourceFile), line };
  }
  if (options.disassembly !== undefined) {
    return {
      source: new Source(options.disassembly.name, undefined, options.disassembly.reference),
      line: address + 1,
    };
  }
  return { source: new Source('program'), line: 1 };
}

/** The appended HALT has no source line; it shows on the last line that produced code. */
function lastLine(listing: ListingInfo): number {
  let line = 1;
  for (const entry of listing.entries) {
    line = Math.max(line, entry.line);
  }
  return line;
}
