import { DEFAULT_PROGRAM_DEPTH } from '../platforms/types';
import { decode, isHalt, Opcode, signedArg, wrapIndex } from './isa';

export interface DisassembledLine {
  address: number;
  word: number;
  mnemonic: string;
  /** Resolved jump target. */
  target?: number;
}

function signed(value: number): string {
  return value >= 0 ? `+${value}` : `${value}`;
}

export function hex2(value: number): string {
  return (value & 0xff).toString(16).toUpperCase().padStart(2, '0');
}

export function mnemonic(word: number): string {
  if (isHalt(word)) {
    return 'HALT';
  }
  const { opcode, arg } = decode(word);
  switch (opcode) {
    case Opcode.PointerIncrement:
      return `FWD ${signedArg(arg)}`;
    case Opcode.PointerDecrement:
      return `BACK ${signedArg(arg)}`;
    case Opcode.CellIncrement:
      return `INC ${arg}`;
    case Opcode.CellDecrement:
      return `DEC ${arg}`;
    case Opcode.Output:
      return 'OUT';
    case Opcode.Input:
      return 'IN';
    case Opcode.JumpIfZero:
      return `JZ ${signed(signedArg(arg))}`;
    case Opcode.JumpIfNonZero:
      return `JNZ ${signed(signedArg(arg))}`;
  }
}

export function disassembleWord(word: number, address: number, depth = DEFAULT_PROGRAM_DEPTH): DisassembledLine {
  const line: DisassembledLine = { address, word: word & 0xff, mnemonic: mnemonic(word) };
  const { opcode, arg } = decode(word);
  if (opcode === Opcode.JumpIfZero || opcode === Opcode.JumpIfNonZero) {
    line.target = wrapIndex(address + signedArg(arg), depth);
  }
  return line;
}

export function disassemble(words: ArrayLike<number>, depth = DEFAULT_PROGRAM_DEPTH): DisassembledLine[] {
  const lines: DisassembledLine[] = [];
  for (let address = 0; address < words.length; address += 1) {
    lines.push(disassembleWord(words[address] ?? 0, address, depth));
  }
  return lines;
}

/**
 * Renders `AA WW  MNEMONIC[  -> TT]`, one line per word. Addresses widen past 256 words.
 */
export function formatListing(words: ArrayLike<number>, depth = DEFAULT_PROGRAM_DEPTH): string {
  const width = Math.max(2, (depth - 1).toString(16).length);
  const addr = (value: number): string => value.toString(16).toUpperCase().padStart(width, '0');
  return disassemble(words, depth)
    .map((line) => {
      const head = `${addr(line.address)} ${hex2(line.word)}  ${line.mnemonic}`;
      return line.target !== undefined ? `${head}  -> ${addr(line.target)}` : head;
    })
    .join('\n');
}
