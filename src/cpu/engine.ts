/**
 * @fileoverview Execution engine: the fetch/decode/execute sequencer.
 *
 * The engine is a pure transition function. It sees only registered signals from the
 * previous step (memory read ports, transmitter busy, receiver pulse) and returns its next
 * registers together with the requests the surrounding system applies on this clock edge.
 */

import { decode, isHalt, needsCell, Opcode, signedArg, wrapCell, wrapIndex } from './isa';

export type EngineState =
  | 'IDLE'
  | 'FETCH'
  | 'WAIT_FETCH'
  | 'DECODE'
  | 'READ_CELL'
  | 'WAIT_CELL'
  | 'EXECUTE'
  | 'WRITE_CELL'
  | 'WAIT_TX'
  | 'WAIT_RX'
  | 'HALT';

export interface EngineRegisters {
  state: EngineState;
  pc: number;
  dp: number;
  /** Instruction word latched in WAIT_FETCH. */
  instr: number;
  /** Cell value latched in WAIT_CELL, or the value last written by the engine. */
  cell: number;
}

export interface EngineGeometry {
  programDepth: number;
  tapeDepth: number;
}

export interface EngineInputs {
  runStart: boolean;
  /** Program store read port. */
  programData: number;
  /** Data tape read port. */
  tapeData: number;
  txBusy: boolean;
  /** Receiver valid pulse, already gated by the router. */
  rxValid: boolean;
  rxData: number;
}

export interface EngineRequests {
  programRead?: number;
  tapeRead?: number;
  tapeWrite?: { addr: number; value: number };
  txStart?: number;
}

export interface EngineTransition {
  next: EngineRegisters;
  requests: EngineRequests;
}

export function createEngineRegisters(): EngineRegisters {
  return { state: 'IDLE', pc: 0, dp: 0, instr: 0, cell: 0 };
}

export function isEngineBusy(state: EngineState): boolean {
  return state !== 'IDLE' && state !== 'HALT';
}

export function stepEngine(
  regs: EngineRegisters,
  inputs: EngineInputs,
  geometry: EngineGeometry
): EngineTransition {
  const next: EngineRegisters = { ...regs };
  const requests: EngineRequests = {};
  const advance = (): void => {
    next.pc = wrapIndex(regs.pc + 1, geometry.programDepth);
  };

  switch (regs.state) {
    case 'IDLE':
      if (inputs.runStart) {
        next.pc = 0;
        next.state = 'FETCH';
      }
      break;

    case 'FETCH':
      requests.programRead = regs.pc;
      next.state = 'WAIT_FETCH';
      break;

    case 'WAIT_FETCH':
      next.instr = inputs.programData & 0xff;
      next.state = 'DECODE';
      break;

    case 'DECODE': {
      if (isHalt(regs.instr)) {
        next.state = 'HALT';
        break;
      }
      next.state = needsCell(decode(regs.instr).opcode) ? 'READ_CELL' : 'EXECUTE';
      break;
    }

    case 'READ_CELL':
      requests.tapeRead = regs.dp;
      next.state = 'WAIT_CELL';
      break;

    case 'WAIT_CELL':
      next.cell = inputs.tapeData & 0xff;
      next.state = 'EXECUTE';
      break;

    case 'EXECUTE':
      execute(regs, inputs, geometry, next, requests, advance);
      break;

    case 'WRITE_CELL':
      next.state = 'FETCH';
      break;

    case 'WAIT_TX':
      if (!inputs.txBusy) {
        requests.txStart = regs.cell;
        advance();
        next.state = 'FETCH';
      }
      break;

    case 'WAIT_RX':
      if (inputs.rxValid) {
        acceptInput(regs, inputs, next, requests, advance);
      }
      break;

    case 'HALT':
      break;
  }

  return { next, requests };
}

function execute(
  regs: EngineRegisters,
  inputs: EngineInputs,
  geometry: EngineGeometry,
  next: EngineRegisters,
  requests: EngineRequests,
  advance: () => void
): void {
  const { opcode, arg } = decode(regs.instr);
  switch (opcode) {
    case Opcode.PointerIncrement:
      next.dp = wrapIndex(regs.dp + signedArg(arg), geometry.tapeDepth);
      advance();
      next.state = 'FETCH';
      return;
    case Opcode.PointerDecrement:
      next.dp = wrapIndex(regs.dp - signedArg(arg), geometry.tapeDepth);
      advance();
      next.state = 'FETCH';
      return;
    case Opcode.CellIncrement:
    case Opcode.CellDecrement: {
      const value = wrapCell(opcode === Opcode.CellIncrement ? regs.cell + arg : regs.cell - arg);
      requests.tapeWrite = { addr: regs.dp, value };
      next.cell = value;
      advance();
      next.state = 'WRITE_CELL';
      return;
    }
    case Opcode.Output:
      if (inputs.txBusy) {
        next.state = 'WAIT_TX';
        return;
      }
      requests.txStart = regs.cell;
      advance();
      next.state = 'FETCH';
      return;
    case Opcode.Input:
      if (inputs.rxValid) {
        acceptInput(regs, inputs, next, requests, advance);
        return;
      }
      next.state = 'WAIT_RX';
      return;
    case Opcode.JumpIfZero:
    case Opcode.JumpIfNonZero: {
      const zero = regs.cell === 0;
      const taken = opcode === Opcode.JumpIfZero ? zero : !zero;
      if (taken) {
        next.pc = wrapIndex(regs.pc + signedArg(arg), geometry.programDepth);
      } else {
        advance();
      }
      next.state = 'FETCH';
      return;
    }
  }
}

function acceptInput(
  regs: EngineRegisters,
  inputs: EngineInputs,
  next: EngineRegisters,
  requests: EngineRequests,
  advance: () => void
): void {
  const value = inputs.rxData & 0xff;
  requests.tapeWrite = { addr: regs.dp, value };
  next.cell = value;
  advance();
  next.state = 'WRITE_CELL';
}
