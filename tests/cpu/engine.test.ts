/**
 * @file Execution engine transition tests.
 */

import { describe, expect, it } from 'vitest';
import {
  createEngineRegisters,
  EngineInputs,
  EngineRegisters,
  isEngineBusy,
  stepEngine,
} from '../../src/cpu/engine';

const geometry = { programDepth: 32, tapeDepth: 16 };

const inputs = (overrides: Partial<EngineInputs> = {}): EngineInputs => ({
  runStart: false,
  programData: 0,
  tapeData: 0,
  txBusy: false,
  rxValid: false,
  rxData: 0,
  ...overrides,
});

const regs = (overrides: Partial<EngineRegisters> = {}): EngineRegisters => ({
  ...createEngineRegisters(),
  ...overrides,
});

describe('stepEngine', () => {
  it('waits in IDLE for run-start', () => {
    expect(stepEngine(regs(), inputs(), geometry).next.state).toBe('IDLE');
    const started = stepEngine(regs({ pc: 7 }), inputs({ runStart: true }), geometry);
    expect(started.next).toMatchObject({ state: 'FETCH', pc: 0 });
  });

  it('requests the instruction in FETCH and latches it a step later', () => {
    const fetch = stepEngine(regs({ state: 'FETCH', pc: 5 }), inputs(), geometry);
    expect(fetch.requests).toEqual({ programRead: 5 });
    expect(fetch.next.state).toBe('WAIT_FETCH');

    const latched = stepEngine(fetch.next, inputs({ programData: 0x43 }), geometry);
    expect(latched.next).toMatchObject({ state: 'DECODE', instr: 0x43 });
  });

  it('decodes halt, cell readers and the rest', () => {
    expect(stepEngine(regs({ state: 'DECODE', instr: 0x00 }), inputs(), geometry).next.state).toBe('HALT');
    expect(stepEngine(regs({ state: 'DECODE', instr: 0x43 }), inputs(), geometry).next.state).toBe(
      'READ_CELL'
    );
    expect(stepEngine(regs({ state: 'DECODE', instr: 0x03 }), inputs(), geometry).next.state).toBe(
      'EXECUTE'
    );
    expect(stepEngine(regs({ state: 'DECODE', instr: 0xa0 }), inputs(), geometry).next.state).toBe(
      'EXECUTE'
    );
  });

  it('reads the cell at DP with one step of latency', () => {
    const read = stepEngine(regs({ state: 'READ_CELL', dp: 3 }), inputs(), geometry);
    expect(read.requests).toEqual({ tapeRead: 3 });
    const latched = stepEngine(read.next, inputs({ tapeData: 0x7f }), geometry);
    expect(latched.next).toMatchObject({ state: 'EXECUTE', cell: 0x7f });
  });

  it('moves the pointer with wraparound', () => {
    const forward = stepEngine(regs({ state: 'EXECUTE', instr: 0x03, dp: 14, pc: 4 }), inputs(), geometry);
    expect(forward.next).toMatchObject({ state: 'FETCH', dp: 1, pc: 5 });

    const back = stepEngine(regs({ state: 'EXECUTE', instr: 0x23, dp: 1 }), inputs(), geometry);
    expect(back.next.dp).toBe(14);

    const backNegative = stepEngine(regs({ state: 'EXECUTE', instr: 0x3f, dp: 0 }), inputs(), geometry);
    expect(backNegative.next.dp).toBe(1);
  });

  it('advances PC from the last word back to 0', () => {
    const move = stepEngine(regs({ state: 'EXECUTE', instr: 0x03, pc: 31 }), inputs(), geometry);
    expect(move.next).toMatchObject({ state: 'FETCH', pc: 0, dp: 3 });

    const notTaken = stepEngine(regs({ state: 'EXECUTE', instr: 0xc4, pc: 31, cell: 1 }), inputs(), geometry);
    expect(notTaken.next).toMatchObject({ state: 'FETCH', pc: 0 });
  });

  it('writes incremented and decremented cells modulo 256', () => {
    const inc = stepEngine(regs({ state: 'EXECUTE', instr: 0x43, dp: 2, cell: 254 }), inputs(), geometry);
    expect(inc.requests).toEqual({ tapeWrite: { addr: 2, value: 1 } });
    expect(inc.next).toMatchObject({ state: 'WRITE_CELL', cell: 1, pc: 1 });
    expect(stepEngine(inc.next, inputs(), geometry).next.state).toBe('FETCH');

    const dec = stepEngine(regs({ state: 'EXECUTE', instr: 0x62, cell: 1 }), inputs(), geometry);
    expect(dec.requests.tapeWrite).toEqual({ addr: 0, value: 255 });
  });

  it('holds output until the transmitter is free', () => {
    const blocked = stepEngine(
      regs({ state: 'EXECUTE', instr: 0x80, cell: 0x41, pc: 3 }),
      inputs({ txBusy: true }),
      geometry
    );
    expect(blocked.requests).toEqual({});
    expect(blocked.next).toMatchObject({ state: 'WAIT_TX', pc: 3 });

    const stillBlocked = stepEngine(blocked.next, inputs({ txBusy: true }), geometry);
    expect(stillBlocked.next.state).toBe('WAIT_TX');

    const sent = stepEngine(stillBlocked.next, inputs(), geometry);
    expect(sent.requests).toEqual({ txStart: 0x41 });
    expect(sent.next).toMatchObject({ state: 'FETCH', pc: 4 });
  });

  it('sends at once when the transmitter is idle', () => {
    const sent = stepEngine(regs({ state: 'EXECUTE', instr: 0x80, cell: 7 }), inputs(), geometry);
    expect(sent.requests).toEqual({ txStart: 7 });
    expect(sent.next.state).toBe('FETCH');
  });

  it('waits for a received byte and stores it at DP', () => {
    const waiting = stepEngine(regs({ state: 'EXECUTE', instr: 0xa0, dp: 5 }), inputs(), geometry);
    expect(waiting.next.state).toBe('WAIT_RX');
    expect(stepEngine(waiting.next, inputs(), geometry).next.state).toBe('WAIT_RX');

    const received = stepEngine(waiting.next, inputs({ rxValid: true, rxData: 0x61 }), geometry);
    expect(received.requests).toEqual({ tapeWrite: { addr: 5, value: 0x61 } });
    expect(received.next).toMatchObject({ state: 'WRITE_CELL', cell: 0x61, pc: 1 });
  });

  it('takes a byte that is already valid in EXECUTE', () => {
    const received = stepEngine(
      regs({ state: 'EXECUTE', instr: 0xa0 }),
      inputs({ rxValid: true, rxData: 9 }),
      geometry
    );
    expect(received.next).toMatchObject({ state: 'WRITE_CELL', cell: 9 });
  });

  it('jumps relative to the jump instruction', () => {
    const jz = (cell: number): number =>
      stepEngine(regs({ state: 'EXECUTE', instr: 0xc7, pc: 1, cell }), inputs(), geometry).next.pc;
    expect(jz(0)).toBe(8);
    expect(jz(5)).toBe(2);

    const jnz = (cell: number): number =>
      stepEngine(regs({ state: 'EXECUTE', instr: 0xfb, pc: 7, cell }), inputs(), geometry).next.pc;
    expect(jnz(1)).toBe(2);
    expect(jnz(0)).toBe(8);

    const wrapped = stepEngine(regs({ state: 'EXECUTE', instr: 0xfd, pc: 1, cell: 1 }), inputs(), geometry);
    expect(wrapped.next).toMatchObject({ state: 'FETCH', pc: 30 });
  });

  it('stays in HALT', () => {
    const halted = stepEngine(regs({ state: 'HALT', pc: 4 }), inputs({ runStart: true }), geometry);
    expect(halted.next).toMatchObject({ state: 'HALT', pc: 4 });
    expect(halted.requests).toEqual({});
  });

  it('reports busy outside IDLE and HALT', () => {
    expect(isEngineBusy('IDLE')).toBe(false);
    expect(isEngineBusy('HALT')).toBe(false);
    expect(isEngineBusy('WAIT_RX')).toBe(true);
    expect(isEngineBusy('FETCH')).toBe(true);
  });
});
