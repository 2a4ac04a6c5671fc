/**
 * @file Whole-machine step tests.
 */

import { describe, expect, it } from 'vitest';
import { createBfSystem } from '../../../src/platforms/bfcpu/runtime';
import { ProgramTooLargeError } from '../../../src/debug/errors';
import { defaultProgramImage } from '../../../src/cpu/default-program';

const config = { baud: 9600, clockHz: 307_200 };

describe('createBfSystem', () => {
  it('boots the built-in program by default', () => {
    const system = createBfSystem({ config });
    expect(system.config.divisor).toBe(2);
    expect(Array.from(system.program.snapshot())).toEqual(Array.from(defaultProgramImage(32)));
    expect(system.getTaps()).toMatchObject({
      pc: 0,
      dp: 0,
      engineState: 'IDLE',
      engineBusy: false,
      loaderState: 'IDLE',
      txLine: 1,
      txBusy: false,
      rxBusy: false,
      resetActive: false,
    });
  });

  it('rejects a boot image larger than the store', () => {
    expect(() => createBfSystem({ config: { programDepth: 2 }, bootImage: new Uint8Array(3) })).toThrow(
      ProgramTooLargeError
    );
  });

  it('runs an instruction across its wait states', () => {
    const system = createBfSystem({ config, bootImage: Uint8Array.from([0x41, 0x00]) });
    system.step({ runStart: true });
    const states: string[] = [];
    for (let i = 0; i < 10; i += 1) {
      system.step();
      states.push(system.getTaps().engineState);
    }
    expect(states).toEqual([
      'WAIT_FETCH',
      'DECODE',
      'READ_CELL',
      'WAIT_CELL',
      'EXECUTE',
      'WRITE_CELL',
      'FETCH',
      'WAIT_FETCH',
      'DECODE',
      'HALT',
    ]);
    expect(system.tape.peek(0)).toBe(1);
    expect(system.getStepCount()).toBe(11);
  });

  it('reports the transmitter start', () => {
    const system = createBfSystem({ config, bootImage: Uint8Array.from([0x80, 0x00]) });
    system.step({ runStart: true });
    const started: number[] = [];
    for (let i = 0; i < 8; i += 1) {
      const events = system.step();
      if (events.txStarted !== undefined) {
        started.push(events.txStarted);
      }
    }
    expect(started).toEqual([0]);
    expect(system.getTaps().txBusy).toBe(true);
  });

  it('holds everything in reset while the synchronizer is asserted', () => {
    const system = createBfSystem({ config, bootImage: Uint8Array.from([0x41, 0x00]) });
    system.step({ runStart: true });
    for (let i = 0; i < 10; i += 1) {
      system.step();
    }
    expect(system.tape.peek(0)).toBe(1);

    expect(system.step({ reset: true }).resetActive).toBe(true);
    expect(system.getTaps()).toMatchObject({ engineState: 'IDLE', pc: 0, dp: 0, resetActive: true });
    expect(system.tape.peek(0)).toBe(0);
    expect(system.step({ runStart: true }).resetActive).toBe(true);
    expect(system.getTaps().engineState).toBe('IDLE');
    expect(system.step().resetActive).toBe(false);
    expect(system.getTaps().resetActive).toBe(false);
  });

  it('restores the boot image on reset', () => {
    const system = createBfSystem({ config });
    system.program.load(Uint8Array.from([0x45]));
    system.reset();
    expect(system.program.peek(0)).toBe(0xa0);
    system.setBootImage(Uint8Array.from([0x80]));
    system.reset();
    expect(system.program.peek(0)).toBe(0x80);
    expect(system.program.peek(1)).toBe(0x00);
  });

  it('logs and drops a frame with a low stop bit', () => {
    const logs: string[] = [];
    const system = createBfSystem({ config, log: (message) => logs.push(message) });
    let framingErrors = 0;
    let received = 0;
    for (let step = 0; step < 520; step += 1) {
      const events = system.step({ rx: step < 320 ? 0 : 1 });
      if (events.framingError) {
        framingErrors += 1;
      }
      if (events.received !== undefined) {
        received += 1;
      }
    }
    expect(framingErrors).toBe(1);
    expect(received).toBe(0);
    expect(logs).toEqual(['serial: framing error on receive line, byte discarded']);
  });
});
