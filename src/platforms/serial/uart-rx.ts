/**
 * @file Oversampling UART receiver (8-N-1).
 * @description Two-stage input synchronizer clocked every step; the frame state machine
 * advances on oversampled ticks only. Start is confirmed at the middle of the start bit,
 * data and stop bits are sampled at their centres. Outputs are registered; `valid` and
 * `framingError` are one-step pulses.
 */

export type UartRxState = 'IDLE' | 'START_BIT' | 'DATA_BITS' | 'STOP_BIT';

export interface UartRxOutputs {
  valid: boolean;
  data: number;
  framingError: boolean;
  busy: boolean;
}

const START_CONFIRM_COUNT = 7;
const BIT_SAMPLE_COUNT = 15;
const STOP_TAIL_COUNT = 6;

export class UartReceiver {
  private state: UartRxState = 'IDLE';
  private count = 0;
  private bitIndex = 0;
  private shift = 0;
  private stopSampled = false;
  private sync1: 0 | 1 = 1;
  private sync2: 0 | 1 = 1;
  private out: UartRxOutputs = { valid: false, data: 0, framingError: false, busy: false };

  get outputs(): UartRxOutputs {
    return this.out;
  }

  get currentState(): UartRxState {
    return this.state;
  }

  /**
   * Advances one clock step.
   * @param level - Raw receive line level this step
   * @param sampleTick - Oversampled tick pulse this step
   */
  step(level: 0 | 1, sampleTick: boolean): void {
    const sampled = this.sync2;
    this.sync2 = this.sync1;
    this.sync1 = level;

    const next: UartRxOutputs = { ...this.out, valid: false, framingError: false };
    if (sampleTick) {
      this.advance(sampled, next);
    }
    this.out = next;
  }

  reset(): void {
    this.state = 'IDLE';
    this.count = 0;
    this.bitIndex = 0;
    this.shift = 0;
    this.stopSampled = false;
    this.sync1 = 1;
    this.sync2 = 1;
    this.out = { valid: false, data: 0, framingError: false, busy: false };
  }

  private advance(level: 0 | 1, next: UartRxOutputs): void {
    switch (this.state) {
      case 'IDLE':
        if (level === 0) {
          this.state = 'START_BIT';
          this.count = 0;
          next.busy = true;
        }
        return;

      case 'START_BIT':
        if (this.count < START_CONFIRM_COUNT) {
          this.count += 1;
          return;
        }
        if (level === 0) {
          this.state = 'DATA_BITS';
          this.count = 0;
          this.bitIndex = 0;
          this.shift = 0;
        } else {
          // glitch
          this.state = 'IDLE';
          next.busy = false;
        }
        return;

      case 'DATA_BITS':
        if (this.count < BIT_SAMPLE_COUNT) {
          this.count += 1;
          return;
        }
        this.count = 0;
        this.shift = ((this.shift >> 1) | (level << 7)) & 0xff;
        if (this.bitIndex === 7) {
          this.state = 'STOP_BIT';
          this.stopSampled = false;
        } else {
          this.bitIndex += 1;
        }
        return;

      case 'STOP_BIT':
        if (!this.stopSampled) {
          if (this.count < BIT_SAMPLE_COUNT) {
            this.count += 1;
            return;
          }
          this.count = 0;
          this.stopSampled = true;
          if (level === 1) {
            next.valid = true;
            next.data = this.shift;
          } else {
            next.framingError = true;
          }
          return;
        }
        if (this.count < STOP_TAIL_COUNT) {
          this.count += 1;
          return;
        }
        this.state = 'IDLE';
        this.count = 0;
        next.busy = false;
        return;
    }
  }
}
