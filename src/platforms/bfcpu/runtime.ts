/**
 * @file Top-level machine: wires tick source, reset synchronizer, transceivers, memories,
 * loader and engine into one clock step.
 * @module platforms/bfcpu/runtime
 */

import { defaultProgramImage } from '../../cpu/default-program';
import {
  createEngineRegisters,
  EngineRegisters,
  EngineState,
  isEngineBusy,
  stepEngine,
} from '../../cpu/engine';
import { LatchedMemory } from '../../cpu/latched-memory';
import { ProgramTooLargeError } from '../../debug/errors';
import { ResetSynchronizer } from '../reset-sync';
import { UartReceiver } from '../serial/uart-rx';
import { UartTransmitter } from '../serial/uart-tx';
import { TickSource } from '../tick-source';
import { MachineConfig, MachineConfigNormalized, normalizeMachineConfig } from '../types';
import { createLoaderRegisters, isLoaderBusy, LoaderRegisters, LoaderState, stepLoader } from './loader';
import { routeReceived } from './router';

export interface SystemPins {
  /** Receive line level (idle high). */
  rx: 0 | 1;
  uploadMode: boolean;
  runStart: boolean;
  /** Raw, unsynchronized reset. */
  reset: boolean;
}

/** Read-only debug taps. */
export interface SystemTaps {
  pc: number;
  dp: number;
  cell: number;
  instr: number;
  engineState: EngineState;
  engineBusy: boolean;
  loaderState: LoaderState;
  loaderBusy: boolean;
  loaderAddr: number;
  txLine: 0 | 1;
  txBusy: boolean;
  rxBusy: boolean;
  resetActive: boolean;
}

/** What happened on one clock edge. */
export interface StepEvents {
  resetActive: boolean;
  /** Byte handed to the transmitter. */
  txStarted?: number;
  /** Receiver byte consumed this step, with its consumer. */
  received?: { byte: number; consumer: 'loader' | 'engine' };
  framingError: boolean;
  programWrite?: { addr: number; value: number };
}

export interface BfSystemOptions {
  config?: MachineConfig;
  /** Image restored on every reset; defaults to the built-in program. */
  bootImage?: Uint8Array;
  log?: (message: string) => void;
}

export interface BfSystem {
  readonly config: MachineConfigNormalized;
  readonly program: LatchedMemory;
  readonly tape: LatchedMemory;
  step: (pins?: Partial<SystemPins>) => StepEvents;
  getTaps: () => SystemTaps;
  getEngine: () => Readonly<EngineRegisters>;
  getStepCount: () => number;
  setBootImage: (image: Uint8Array) => void;
  /** Immediate reset of every component, as at power-on. */
  reset: () => void;
}

const IDLE_PINS: SystemPins = { rx: 1, uploadMode: false, runStart: false, reset: false };

export function createBfSystem(options: BfSystemOptions = {}): BfSystem {
  const config = normalizeMachineConfig(options.config);
  const log = options.log ?? ((): void => undefined);
  const geometry = { programDepth: config.programDepth, tapeDepth: config.tapeDepth };

  const checkImage = (image: Uint8Array): Uint8Array => {
    if (image.length > config.programDepth) {
      throw new ProgramTooLargeError(image.length, config.programDepth, 'boot image');
    }
    return image;
  };

  const program = new LatchedMemory({
    depth: config.programDepth,
    init: checkImage(options.bootImage ?? defaultProgramImage(config.programDepth)),
  });
  const tape = new LatchedMemory({ depth: config.tapeDepth });
  const ticks = new TickSource(config.divisor);
  const resetSync = new ResetSynchronizer(config.resetStages);
  const rx = new UartReceiver();
  const tx = new UartTransmitter(config.txTiming);
  let engine = createEngineRegisters();
  let loader = createLoaderRegisters();
  let steps = 0;

  const resetAll = (): void => {
    program.reset();
    tape.reset();
    ticks.reset();
    rx.reset();
    tx.reset();
    engine = createEngineRegisters();
    loader = createLoaderRegisters();
  };

  const step = (partial?: Partial<SystemPins>): StepEvents => {
    const pins: SystemPins = { ...IDLE_PINS, ...partial };
    steps += 1;

    if (resetSync.step(pins.reset)) {
      resetAll();
      return { resetActive: true, framingError: false };
    }

    const pulses = ticks.next();
    const rxOut = rx.outputs;
    const routed = routeReceived(pins.uploadMode, rxOut);

    const engineStep = stepEngine(
      engine,
      {
        runStart: pins.runStart,
        programData: program.observe(),
        tapeData: tape.observe(),
        txBusy: tx.busy,
        rxValid: routed.engine.valid,
        rxData: routed.engine.data,
      },
      geometry
    );
    const loaderStep = stepLoader(
      loader,
      { uploadMode: pins.uploadMode, rxValid: routed.loader.valid, rxData: routed.loader.data },
      config.programDepth
    );

    const { requests } = engineStep;
    if (requests.programRead !== undefined) {
      program.requestRead(requests.programRead);
    }
    if (requests.tapeRead !== undefined) {
      tape.requestRead(requests.tapeRead);
    }
    if (requests.tapeWrite) {
      tape.commitWrite(requests.tapeWrite.addr, requests.tapeWrite.value);
    }
    if (loaderStep.programWrite) {
      program.commitWrite(loaderStep.programWrite.addr, loaderStep.programWrite.value);
    }

    tx.step({ start: requests.txStart, sampleTick: pulses.sample, bitTick: pulses.bit });
    rx.step(pins.rx, pulses.sample);
    program.clock();
    tape.clock();
    engine = engineStep.next;
    loader = loaderStep.next;

    const events: StepEvents = { resetActive: false, framingError: rxOut.framingError };
    if (requests.txStart !== undefined) {
      events.txStarted = requests.txStart;
    }
    if (rxOut.valid) {
      events.received = { byte: rxOut.data, consumer: pins.uploadMode ? 'loader' : 'engine' };
    }
    if (loaderStep.programWrite) {
      events.programWrite = loaderStep.programWrite;
      log(
        `loader: wrote 0x${hex2(loaderStep.programWrite.value)} at ${hex2(loaderStep.programWrite.addr)}`
      );
    }
    if (rxOut.framingError) {
      log('serial: framing error on receive line, byte discarded');
    }
    return events;
  };

  const getTaps = (): SystemTaps => ({
    pc: engine.pc,
    dp: engine.dp,
    cell: engine.cell,
    instr: engine.instr,
    engineState: engine.state,
    engineBusy: isEngineBusy(engine.state),
    loaderState: loader.state,
    loaderBusy: isLoaderBusy(loader.state),
    loaderAddr: loader.addr,
    txLine: tx.line,
    txBusy: tx.busy,
    rxBusy: rx.outputs.busy,
    resetActive: resetSync.asserted,
  });

  return {
    config,
    program,
    tape,
    step,
    getTaps,
    getEngine: () => engine,
    getStepCount: () => steps,
    setBootImage: (image: Uint8Array): void => {
      program.setInitImage(checkImage(image));
    },
    reset: resetAll,
  };
}

function hex2(value: number): string {
  return value.toString(16).toUpperCase().padStart(2, '0');
}
