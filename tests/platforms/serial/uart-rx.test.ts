/**
 * @file UART receiver tests.
 */

import { describe, expect, it } from 'vitest';
import { UartReceiver, UartRxOutputs } from '../../../src/platforms/serial/uart-rx';

const BIT = 16;

/** Line levels: `idle` steps high, then a frame with 16 steps per bit, then idle. */
const frameLevels = (byte: number, options: { idle?: number; stop?: 0 | 1 } = {}): Array<0 | 1> => {
  const levels: Array<0 | 1> = new Array<0 | 1>(options.idle ?? 4).fill(1);
  const bits: Array<0 | 1> = [0];
  for (let i = 0; i < 8; i += 1) {
    bits.push(((byte >> i) & 1) === 1 ? 1 : 0);
  }
  bits.push(options.stop ?? 1);
  for (const bit of bits) {
    for (let i = 0; i < BIT; i += 1) {
      levels.push(bit);
    }
  }
  for (let i = 0; i < 3 * BIT; i += 1) {
    levels.push(1);
  }
  return levels;
};

/** Steps the receiver with a sample tick on every step and records its outputs. */
const run = (levels: Array<0 | 1>): UartRxOutputs[] => {
  const rx = new UartReceiver();
  return levels.map((level) => {
    rx.step(level, true);
    return rx.outputs;
  });
};

describe('UartReceiver', () => {
  it('decodes one frame with a single valid pulse', () => {
    const outputs = run(frameLevels(0x41));
    const pulses = outputs.flatMap((out, step) => (out.valid ? [step] : []));
    expect(pulses).toEqual([158]);
    expect(outputs[158]?.data).toBe(0x41);
    expect(outputs[159]).toEqual({ valid: false, data: 0x41, framingError: false, busy: true });
  });

  it('is busy from start detection until the end of the stop bit', () => {
    const outputs = run(frameLevels(0x00));
    expect(outputs[5]?.busy).toBe(false);
    expect(outputs[6]?.busy).toBe(true);
    expect(outputs[164]?.busy).toBe(true);
    expect(outputs[165]?.busy).toBe(false);
  });

  it('flags a zero stop bit as a framing error and drops the byte', () => {
    const outputs = run(frameLevels(0x55, { stop: 0 }));
    expect(outputs.some((out) => out.valid)).toBe(false);
    const errors = outputs.flatMap((out, step) => (out.framingError ? [step] : []));
    expect(errors).toEqual([158]);
  });

  it('returns to idle on a start glitch', () => {
    const levels: Array<0 | 1> = [1, 1, 1, 1, 0, 0, 0, ...new Array<0 | 1>(40).fill(1)];
    const rx = new UartReceiver();
    const states = levels.map((level) => {
      rx.step(level, true);
      return rx.currentState;
    });
    expect(states[6]).toBe('START_BIT');
    expect(states[14]).toBe('IDLE');
    expect(rx.outputs).toEqual({ valid: false, data: 0, framingError: false, busy: false });
  });

  it('holds its state between sample ticks', () => {
    const rx = new UartReceiver();
    for (let i = 0; i < 10; i += 1) {
      rx.step(0, false);
    }
    expect(rx.currentState).toBe('IDLE');
    rx.step(0, true);
    expect(rx.currentState).toBe('START_BIT');
    rx.reset();
    expect(rx.currentState).toBe('IDLE');
  });
});
