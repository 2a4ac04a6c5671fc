/**
 * @fileoverview Brainfuck compiler targeting the packed 8-bit encoding.
 *
 * Runs of `+ - > <` on one line fold into a single instruction (`+`/`-` up to 31, `>`/`<`
 * up to 15). `[` becomes jump-if-zero to one past its `]`; `]` becomes jump-if-nonzero to
 * one past its `[`. A HALT word is appended.
 */

import { CompileError, ParseError, ProgramTooLargeError } from '../debug/errors';
import { DEFAULT_PROGRAM_DEPTH } from '../platforms/types';
import { encode, HALT_WORD, Opcode, relativeOffset, SIGNED_ARG_MAX, UNSIGNED_ARG_MAX } from './isa';
import type { ListingInfo } from './loaders';

export interface CompileOptions {
  /** Program store depth; jump offsets wrap modulo this value. */
  programDepth?: number;
}

/**
 * One emitted instruction and the source span it came from.
 */
export interface CompiledInstruction {
  address: number;
  word: number;
  line: number;
  column: number;
  /** Number of source characters folded into this instruction. */
  length: number;
}

export interface CompiledProgram {
  words: Uint8Array;
  instructions: CompiledInstruction[];
  listing: ListingInfo;
}

interface Token {
  char: string;
  line: number;
  column: number;
}

const COMMANDS = new Set(['+', '-', '>', '<', '.', ',', '[', ']']);

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let line = 1;
  let column = 1;
  for (const char of source) {
    if (char === '\n') {
      line += 1;
      column = 1;
      continue;
    }
    if (COMMANDS.has(char)) {
      tokens.push({ char, line, column });
    }
    column += 1;
  }
  return tokens;
}

function foldLimit(char: string): number {
  return char === '+' || char === '-' ? UNSIGNED_ARG_MAX : SIGNED_ARG_MAX;
}

function runOpcode(char: string): Opcode {
  switch (char) {
    case '+':
      return Opcode.CellIncrement;
    case '-':
      return Opcode.CellDecrement;
    case '>':
      return Opcode.PointerIncrement;
    default:
      return Opcode.PointerDecrement;
  }
}

/**
 * Compiles Brainfuck source into a program image.
 *
 * @throws ParseError on unmatched brackets
 * @throws CompileError when a loop is too long for a 5-bit relative jump
 * @throws ProgramTooLargeError when the image exceeds the program store
 *
 * @example
 * ```typescript
 * const { words } = compileBrainfuck('+++[-.]');
 * // 43 C4 61 80 FE 00
 * ```
 */
export function compileBrainfuck(source: string, options: CompileOptions = {}): CompiledProgram {
  const depth = options.programDepth ?? DEFAULT_PROGRAM_DEPTH;
  const tokens = tokenize(source);
  const instructions: CompiledInstruction[] = [];
  const open: Array<{ address: number; token: Token }> = [];

  const emit = (word: number, token: Token, length: number): CompiledInstruction => {
    const instr: CompiledInstruction = {
      address: instructions.length,
      word,
      line: token.line,
      column: token.column,
      length,
    };
    instructions.push(instr);
    return instr;
  };

  let i = 0;
  while (i < tokens.length) {
    const token = tokens[i];
    if (token === undefined) {
      break;
    }
    switch (token.char) {
      case '+':
      case '-':
      case '>':
      case '<': {
        const limit = foldLimit(token.char);
        let count = 1;
        let last = token;
        while (count < limit) {
          const peek = tokens[i + count];
          if (peek === undefined || peek.char !== token.char || peek.line !== token.line) {
            break;
          }
          last = peek;
          count += 1;
        }
        emit(encode(runOpcode(token.char), count), token, last.column - token.column + 1);
        i += count;
        continue;
      }
      case '.':
        emit(encode(Opcode.Output, 0), token, 1);
        break;
      case ',':
        emit(encode(Opcode.Input, 0), token, 1);
        break;
      case '[':
        open.push({ address: instructions.length, token });
        emit(encode(Opcode.JumpIfZero, 0), token, 1);
        break;
      case ']': {
        const start = open.pop();
        if (start === undefined) {
          throw new ParseError(
            `Unmatched ']' at line ${token.line}, column ${token.column}`,
            token.line,
            ']',
            token.column
          );
        }
        const close = emit(encode(Opcode.JumpIfNonZero, 0), token, 1);
        const back = relativeOffset(close.address, start.address + 1, depth);
        const forward = relativeOffset(start.address, close.address + 1, depth);
        if (back === undefined || forward === undefined) {
          throw new CompileError(
            `Loop at line ${start.token.line}, column ${start.token.column} is too long for a relative jump (${close.address - start.address + 1} instructions)`,
            start.address,
            start.token.line
          );
        }
        close.word = encode(Opcode.JumpIfNonZero, back);
        const opener = instructions[start.address];
        if (opener !== undefined) {
          opener.word = encode(Opcode.JumpIfZero, forward);
        }
        break;
      }
    }
    i += 1;
  }

  const unclosed = open.pop();
  if (unclosed !== undefined) {
    throw new ParseError(
      `Unmatched '[' at line ${unclosed.token.line}, column ${unclosed.token.column}`,
      unclosed.token.line,
      '[',
      unclosed.token.column
    );
  }

  const size = instructions.length + 1;
  if (size > depth) {
    throw new ProgramTooLargeError(size, depth, 'compiled source');
  }

  const words = new Uint8Array(size);
  instructions.forEach((instr) => {
    words[instr.address] = instr.word;
  });
  words[size - 1] = HALT_WORD;

  return { words, instructions, listing: buildListing(instructions) };
}

function buildListing(instructions: CompiledInstruction[]): ListingInfo {
  const lineToAddress = new Map<number, number>();
  const addressToLine = new Map<number, number>();
  const entries: ListingInfo['entries'] = [];
  for (const instr of instructions) {
    if (!lineToAddress.has(instr.line)) {
      lineToAddress.set(instr.line, instr.address);
    }
    addressToLine.set(instr.address, instr.line);
    entries.push({ line: instr.line, address: instr.address, length: 1 });
  }
  return { lineToAddress, addressToLine, entries };
}
