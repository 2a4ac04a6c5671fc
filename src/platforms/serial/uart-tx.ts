/**
 * @file UART transmitter (8-N-1).
 */

import { OVERSAMPLE, TxTiming } from '../types';

export type UartTxState = 'IDLE' | 'START_BIT' | 'DATA_BITS' | 'STOP_BIT';

export interface UartTxInputs {
  /** Byte to send; present only in the step the start request is raised. */
  start?: number;
  sampleTick: boolean;
  bitTick: boolean;
}

export class UartTransmitter {
  private state: UartTxState = 'IDLE';
  private byte = 0;
  private bitIndex = 0;
  private phase = 0;
  private lineLevel: 0 | 1 = 1;
  private busyFlag = false;

  constructor(private readonly timing: TxTiming = 'frame-aligned') {}

  get line(): 0 | 1 {
    return this.lineLevel;
  }

  get busy(): boolean {
    return this.busyFlag;
  }

  get currentState(): UartTxState {
    return this.state;
  }

  step(inputs: UartTxInputs): void {
    if (this.state === 'IDLE') {
      if (inputs.start !== undefined) {
        this.byte = inputs.start & 0xff;
        this.bitIndex = 0;
        this.phase = 0;
        this.lineLevel = 0;
        this.busyFlag = true;
        this.state = 'START_BIT';
      }
      return;
    }

    if (!this.bitPulse(inputs)) {
      return;
    }

    switch (this.state) {
      case 'START_BIT':
        this.state = 'DATA_BITS';
        this.bitIndex = 0;
        this.lineLevel = this.dataBit(0);
        return;
      case 'DATA_BITS':
        if (this.bitIndex === 7) {
          this.state = 'STOP_BIT';
          this.lineLevel = 1;
          return;
        }
        this.bitIndex += 1;
        this.lineLevel = this.dataBit(this.bitIndex);
        return;
      case 'STOP_BIT':
        this.state = 'IDLE';
        this.busyFlag = false;
        return;
    }
  }

  reset(): void {
    this.state = 'IDLE';
    this.byte = 0;
    this.bitIndex = 0;
    this.phase = 0;
    this.lineLevel = 1;
    this.busyFlag = false;
  }

  private bitPulse(inputs: UartTxInputs): boolean {
    if (this.timing === 'bit-tick') {
      return inputs.bitTick;
    }
    if (!inputs.sampleTick) {
      return false;
    }
    if (this.phase === OVERSAMPLE - 1) {
      this.phase = 0;
      return true;
    }
    this.phase += 1;
    return false;
  }

  private dataBit(index: number): 0 | 1 {
    return ((this.byte >> index) & 1) === 1 ? 1 : 0;
  }
}
