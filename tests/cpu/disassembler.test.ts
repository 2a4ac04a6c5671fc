/**
 * @file Disassembler tests.
 */

import { describe, expect, it } from 'vitest';
import { disassembleWord, formatListing, mnemonic } from '../../src/cpu/disassembler';
import { DEFAULT_PROGRAM } from '../../src/cpu/default-program';

describe('disassembler', () => {
  it('names every opcode', () => {
    expect(mnemonic(0x00)).toBe('HALT');
    expect(mnemonic(0x03)).toBe('FWD 3');
    expect(mnemonic(0x1f)).toBe('FWD -1');
    expect(mnemonic(0x23)).toBe('BACK 3');
    expect(mnemonic(0x43)).toBe('INC 3');
    expect(mnemonic(0x61)).toBe('DEC 1');
    expect(mnemonic(0x80)).toBe('OUT');
    expect(mnemonic(0x81)).toBe('OUT');
    expect(mnemonic(0xa0)).toBe('IN');
    expect(mnemonic(0xc7)).toBe('JZ +7');
    expect(mnemonic(0xfb)).toBe('JNZ -5');
  });

  it('resolves jump targets modulo the store depth', () => {
    expect(disassembleWord(0xfd, 1, 32)).toEqual({ address: 1, word: 0xfd, mnemonic: 'JNZ -3', target: 30 });
    expect(disassembleWord(0x80, 1, 32)).toEqual({ address: 1, word: 0x80, mnemonic: 'OUT' });
  });

  it('formats a listing', () => {
    expect(formatListing([0x43, 0xc4, 0x61, 0x80, 0xfe, 0x00], 32)).toBe(
      [
        '00 43  INC 3',
        '01 C4  JZ +4  -> 05',
        '02 61  DEC 1',
        '03 80  OUT',
        '04 FE  JNZ -2  -> 02',
        '05 00  HALT',
      ].join('\n')
    );
  });

  it('formats the built-in program', () => {
    const lines = formatListing(DEFAULT_PROGRAM, 32).split('\n');
    expect(lines[1]).toBe('01 C7  JZ +7  -> 08');
    expect(lines[7]).toBe('07 FB  JNZ -5  -> 02');
    expect(lines[10]).toBe('0A 00  HALT');
  });

  it('widens addresses for stores beyond 256 words', () => {
    expect(formatListing([0x80], 512)).toBe('000 80  OUT');
  });
});
