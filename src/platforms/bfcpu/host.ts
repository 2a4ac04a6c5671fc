/**
 * @file Debugger-facing host around the cycle-stepped machine.
 * @description Groups clock steps into instructions (an instruction ends when the engine
 * is back in FETCH), keeps a serial terminal on the link and reports waits for input.
 * @module platforms/bfcpu/host
 */

import { SerialTerminal } from '../serial/serial-terminal';
import { UartByteEvent } from '../serial/uart-decoder';
import { BfSystem, BfSystemOptions, createBfSystem } from './runtime';
import { stepWithTerminal, uploadProgram, UploadResult } from './upload';

export interface InstructionResult {
  halted: boolean;
  /** Engine sat in WAIT_RX with nothing on the line for `waitLimitSteps` steps. */
  waitingForInput: boolean;
  pc: number;
  steps: number;
}

export interface BfHostOptions extends BfSystemOptions {
  /** Clock steps in WAIT_RX with nothing on the line before reporting a wait (default 64 bit periods). */
  waitLimitSteps?: number;
  idleGapBits?: number;
  onTransmit?: (event: UartByteEvent) => void;
}

export interface BfHost {
  readonly system: BfSystem;
  readonly terminal: SerialTerminal;
  /** Pulses run-start; the engine leaves IDLE and the first fetch is next. */
  start: () => void;
  stepInstruction: () => InstructionResult;
  upload: (image: ArrayLike<number>) => UploadResult;
  /**
   * Drops pending host input and any frame in flight, holds raw reset for one step, then
   * clocks until the synchronizer releases.
   */
  reset: () => void;
  queueInput: (data: string | ArrayLike<number>) => void;
  getPC: () => number;
  isHalted: () => boolean;
  isAtBoundary: () => boolean;
}

const MAX_STEPS_PER_INSTRUCTION = 1_000_000;

export function createBfHost(options: BfHostOptions = {}): BfHost {
  const system = createBfSystem(options);
  const terminal = new SerialTerminal({
    divisor: system.config.divisor,
    ...(options.idleGapBits !== undefined ? { idleGapBits: options.idleGapBits } : {}),
    ...(options.onTransmit ? { onByte: options.onTransmit } : {}),
  });
  const waitLimitSteps = options.waitLimitSteps ?? terminal.stepsPerBit * 64;

  const lineQuiet = (): boolean => !terminal.isSending() && !system.getTaps().rxBusy;

  /** Clocks a halted machine until the last frame it sent has been decoded. */
  const drainTransmitter = (): number => {
    let steps = 0;
    while (
      (system.getTaps().txBusy || terminal.isReceiving()) &&
      steps < MAX_STEPS_PER_INSTRUCTION
    ) {
      stepWithTerminal(system, terminal);
      steps += 1;
    }
    return steps;
  };

  const stepInstruction = (): InstructionResult => {
    let steps = 0;
    let idleWait = 0;
    for (;;) {
      stepWithTerminal(system, terminal);
      steps += 1;
      const taps = system.getTaps();
      if (taps.engineState === 'HALT') {
        steps += drainTransmitter();
        return { halted: true, waitingForInput: false, pc: taps.pc, steps };
      }
      if (taps.engineState === 'FETCH' || taps.engineState === 'IDLE') {
        return { halted: false, waitingForInput: false, pc: taps.pc, steps };
      }
      if (taps.engineState === 'WAIT_RX' && lineQuiet()) {
        idleWait += 1;
        if (idleWait >= waitLimitSteps) {
          return { halted: false, waitingForInput: true, pc: taps.pc, steps };
        }
      } else {
        idleWait = 0;
      }
      if (steps >= MAX_STEPS_PER_INSTRUCTION) {
        return { halted: false, waitingForInput: false, pc: taps.pc, steps };
      }
    }
  };

  const reset = (): void => {
    terminal.reset();
    stepWithTerminal(system, terminal, { reset: true });
    while (system.getTaps().resetActive) {
      stepWithTerminal(system, terminal);
    }
  };

  return {
    system,
    terminal,
    start: (): void => {
      stepWithTerminal(system, terminal, { runStart: true });
    },
    stepInstruction,
    upload: (image) => uploadProgram(system, terminal, image),
    reset,
    queueInput: (data) => terminal.send(data),
    getPC: () => system.getTaps().pc,
    isHalted: () => system.getTaps().engineState === 'HALT',
    isAtBoundary: () => system.getTaps().engineState === 'FETCH',
  };
}
