/**
 * @file Host side of the serial link.
 * @description Drives the machine's receive line from a byte queue and decodes its
 * transmit line. One call to `nextRxLevel()` and one to `sampleTx()` per machine step.
 * @module platforms/serial/serial-terminal
 */

import { OVERSAMPLE } from '../types';
import { UartByteEvent, UartLineDecoder } from './uart-decoder';

export interface SerialTerminalOptions {
  /** Clock steps per oversampled tick of the machine's tick source. */
  divisor: number;
  /** Idle bit periods inserted after every frame sent. */
  idleGapBits?: number;
  onByte?: (event: UartByteEvent) => void;
}

export class SerialTerminal {
  readonly stepsPerBit: number;
  readonly received: number[] = [];
  framingErrors = 0;

  private readonly decoder: UartLineDecoder;
  private readonly idleGapBits: number;
  private readonly onByte: ((event: UartByteEvent) => void) | undefined;
  private queue: number[] = [];
  private frame: Array<0 | 1> = [];
  private frameStep = 0;

  constructor(options: SerialTerminalOptions) {
    this.stepsPerBit = Math.max(1, Math.trunc(options.divisor)) * OVERSAMPLE;
    this.idleGapBits = Math.max(0, Math.trunc(options.idleGapBits ?? 1));
    this.onByte = options.onByte;
    this.decoder = new UartLineDecoder({ stepsPerBit: this.stepsPerBit });
    this.decoder.setByteHandler((event) => {
      if (event.framingOk) {
        this.received.push(event.byte);
      } else {
        this.framingErrors += 1;
      }
      this.onByte?.(event);
    });
  }

  send(data: string | ArrayLike<number>): void {
    if (typeof data === 'string') {
      for (const byte of Buffer.from(data, 'latin1')) {
        this.queue.push(byte);
      }
      return;
    }
    for (let i = 0; i < data.length; i += 1) {
      this.queue.push((data[i] ?? 0) & 0xff);
    }
  }

  /** True while bytes are queued or a frame is still on the wire. */
  isSending(): boolean {
    return this.queue.length > 0 || this.frame.length > 0;
  }

  isReceiving(): boolean {
    return this.decoder.isReceiving();
  }

  pendingBytes(): number {
    return this.queue.length;
  }

  /** Level to drive on the machine's receive line for the coming step. */
  nextRxLevel(): 0 | 1 {
    if (this.frame.length === 0) {
      const byte = this.queue.shift();
      if (byte === undefined) {
        return 1;
      }
      this.frame = buildFrame(byte, this.idleGapBits);
      this.frameStep = 0;
    }
    const level = this.frame[Math.floor(this.frameStep / this.stepsPerBit)] ?? 1;
    this.frameStep += 1;
    if (this.frameStep >= this.frame.length * this.stepsPerBit) {
      this.frame = [];
      this.frameStep = 0;
    }
    return level;
  }

  /** Records the machine's transmit line after a step and advances host time. */
  sampleTx(level: 0 | 1): void {
    this.decoder.recordLevel(level);
    this.decoder.advance();
  }

  /** Drains decoded bytes collected so far. */
  takeReceived(): number[] {
    return this.received.splice(0, this.received.length);
  }

  /** Drops queued input and any frame half-sent or half-received. */
  reset(): void {
    this.queue = [];
    this.frame = [];
    this.frameStep = 0;
    this.decoder.reset();
  }
}

function buildFrame(byte: number, idleGapBits: number): Array<0 | 1> {
  const bits: Array<0 | 1> = [0];
  for (let i = 0; i < 8; i += 1) {
    bits.push(((byte >> i) & 1) === 1 ? 1 : 0);
  }
  bits.push(1);
  for (let i = 0; i < idleGapBits; i += 1) {
    bits.push(1);
  }
  return bits;
}
