/**
 * @fileoverview Instruction set of the Brainfuck CPU.
 * One byte per instruction: a 3-bit opcode in the high bits and a 5-bit argument.
 */

export const Opcode = {
  PointerIncrement: 0,
  PointerDecrement: 1,
  CellIncrement: 2,
  CellDecrement: 3,
  Output: 4,
  Input: 5,
  JumpIfZero: 6,
  JumpIfNonZero: 7,
} as const;

export type Opcode = (typeof Opcode)[keyof typeof Opcode];

/** The all-zero word (pointer-increment by 0) stops the engine. */
export const HALT_WORD = 0x00;

export const OPCODE_SHIFT = 5;
export const ARG_MASK = 0x1f;
export const WORD_MASK = 0xff;
export const CELL_MASK = 0xff;

export const SIGNED_ARG_MIN = -16;
export const SIGNED_ARG_MAX = 15;
export const UNSIGNED_ARG_MAX = 31;

export interface DecodedInstruction {
  word: number;
  opcode: Opcode;
  arg: number;
}

export function encode(opcode: Opcode, arg: number): number {
  return ((opcode << OPCODE_SHIFT) | (arg & ARG_MASK)) & WORD_MASK;
}

export function decode(word: number): DecodedInstruction {
  const masked = word & WORD_MASK;
  return {
    word: masked,
    opcode: opcodeOf(masked),
    arg: masked & ARG_MASK,
  };
}

export function opcodeOf(word: number): Opcode {
  switch ((word >> OPCODE_SHIFT) & 0x7) {
    case 0:
      return Opcode.PointerIncrement;
    case 1:
      return Opcode.PointerDecrement;
    case 2:
      return Opcode.CellIncrement;
    case 3:
      return Opcode.CellDecrement;
    case 4:
      return Opcode.Output;
    case 5:
      return Opcode.Input;
    case 6:
      return Opcode.JumpIfZero;
    default:
      return Opcode.JumpIfNonZero;
  }
}

/**
 * Interprets a 5-bit argument as two's complement (-16..15).
 */
export function signedArg(arg: number): number {
  const masked = arg & ARG_MASK;
  return masked >= 16 ? masked - 32 : masked;
}

export function isHalt(word: number): boolean {
  return (word & WORD_MASK) === HALT_WORD;
}

/**
 * Opcodes that read the current cell before EXECUTE.
 */
export function needsCell(opcode: Opcode): boolean {
  switch (opcode) {
    case Opcode.CellIncrement:
    case Opcode.CellDecrement:
    case Opcode.Output:
    case Opcode.JumpIfZero:
    case Opcode.JumpIfNonZero:
      return true;
    default:
      return false;
  }
}

export function wrapIndex(value: number, depth: number): number {
  const r = value % depth;
  return r < 0 ? r + depth : r;
}

export function wrapCell(value: number): number {
  return value & CELL_MASK;
}

/**
 * Finds the signed 5-bit offset that lands on `target` from `from` in a ring of `depth` words.
 * The offset closest to zero wins when the ring is small enough for several to match.
 * Returns undefined when no offset in -16..15 reaches it.
 */
export function relativeOffset(from: number, target: number, depth: number): number | undefined {
  const delta = wrapIndex(target - from, depth);
  for (let magnitude = 0; magnitude <= -SIGNED_ARG_MIN; magnitude += 1) {
    if (magnitude <= SIGNED_ARG_MAX && wrapIndex(magnitude, depth) === delta) {
      return magnitude;
    }
    if (magnitude > 0 && wrapIndex(-magnitude, depth) === delta) {
      return -magnitude;
    }
  }
  return undefined;
}
