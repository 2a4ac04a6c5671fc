/**
 * @file Brainfuck compiler tests.
 */

import { describe, expect, it } from 'vitest';
import { compileBrainfuck } from '../../src/cpu/compiler';
import { CompileError, ParseError, ProgramTooLargeError } from '../../src/debug/errors';

const words = (source: string, programDepth?: number): number[] =>
  Array.from(compileBrainfuck(source, programDepth !== undefined ? { programDepth } : {}).words);

describe('compileBrainfuck', () => {
  it('compiles a counting loop', () => {
    expect(words('+++[-.]')).toEqual([0x43, 0xc4, 0x61, 0x80, 0xfe, 0x00]);
  });

  it('compiles an empty source to a lone halt', () => {
    const program = compileBrainfuck('');
    expect(Array.from(program.words)).toEqual([0x00]);
    expect(program.instructions).toEqual([]);
  });

  it('ignores comment characters', () => {
    const program = compileBrainfuck('a+b,');
    expect(Array.from(program.words)).toEqual([0x41, 0xa0, 0x00]);
    expect(program.instructions[0]).toEqual({ address: 0, word: 0x41, line: 1, column: 2, length: 1 });
  });

  it('splits runs at the argument limit', () => {
    expect(words('+'.repeat(40))).toEqual([0x5f, 0x49, 0x00]);
    expect(words('>'.repeat(20))).toEqual([0x0f, 0x05, 0x00]);
    expect(words('<<')).toEqual([0x22, 0x00]);
    expect(words('--')).toEqual([0x62, 0x00]);
  });

  it('does not fold runs across lines', () => {
    const program = compileBrainfuck('++\n  ++');
    expect(Array.from(program.words)).toEqual([0x42, 0x42, 0x00]);
    expect(program.instructions[1]).toEqual({ address: 1, word: 0x42, line: 2, column: 3, length: 2 });
    expect(program.listing.lineToAddress).toEqual(
      new Map([
        [1, 0],
        [2, 1],
      ])
    );
    expect(program.listing.addressToLine).toEqual(
      new Map([
        [0, 1],
        [1, 2],
      ])
    );
  });

  it('maps a line to the first address it produced', () => {
    const program = compileBrainfuck('+.\n>');
    expect(program.listing.lineToAddress.get(1)).toBe(0);
    expect(program.listing.lineToAddress.get(2)).toBe(2);
    expect(program.listing.addressToLine.get(1)).toBe(1);
  });

  it('reports unmatched brackets with position', () => {
    try {
      compileBrainfuck('+]');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ParseError);
      expect(err).toMatchObject({ line: 1, column: 2, message: "Unmatched ']' at line 1, column 2" });
    }
    expect(() => compileBrainfuck('[\n[]')).toThrow("Unmatched '[' at line 1, column 1");
  });

  it('rejects loops no relative jump can span', () => {
    const source = `[${'.'.repeat(20)}]`;
    try {
      compileBrainfuck(source, { programDepth: 64 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(CompileError);
      expect(err).toMatchObject({
        address: 0,
        line: 1,
        message: 'Loop at line 1, column 1 is too long for a relative jump (22 instructions)',
      });
    }
  });

  it('jumps around the ring when the store is small enough', () => {
    const compiled = words(`[${'.'.repeat(20)}]`, 32);
    expect(compiled[0]).toBe(0xd6);
    expect(compiled[21]).toBe(0xec);
    expect(compiled).toHaveLength(23);
  });

  it('rejects programs larger than the store', () => {
    expect(() => compileBrainfuck('....', { programDepth: 4 })).toThrow(ProgramTooLargeError);
    expect(() => compileBrainfuck('....', { programDepth: 4 })).toThrow(
      'Program is 5 words but the program store holds 4 (compiled source)'
    );
  });
});
