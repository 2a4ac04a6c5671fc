export interface UartDecoderOptions {
  /** Clock steps per bit period. */
  stepsPerBit: number;
  dataBits?: number;
  stopBits?: number;
}

export interface UartByteEvent {
  byte: number;
  framingOk: boolean;
}

export type UartByteHandler = (event: UartByteEvent) => void;

/**
 * Decodes a serial line one clock step at a time. After a falling edge the first data
 * bit is sampled 1.5 bit periods later, then one sample per bit period.
 */
export class UartLineDecoder {
  private stepsPerBit: number;
  private dataBits: number;
  private stopBits: number;
  private lineLevel: 0 | 1 = 1;
  private receiving = false;
  /** Steps left until the next sample; fractional for odd bit periods. */
  private untilSample = 0;
  private bitIndex = 0;
  private currentByte = 0;
  private framingOk = true;
  private onByte: UartByteHandler | undefined;

  constructor(options: UartDecoderOptions) {
    this.stepsPerBit = Math.max(1, options.stepsPerBit);
    this.dataBits = options.dataBits ?? 8;
    this.stopBits = options.stopBits ?? 1;
  }

  setByteHandler(handler: UartByteHandler | undefined): void {
    this.onByte = handler;
  }

  isReceiving(): boolean {
    return this.receiving;
  }

  /** Records the line level seen at the current step. */
  recordLevel(level: 0 | 1): void {
    const prev = this.lineLevel;
    if (prev === level) {
      return;
    }
    this.lineLevel = level;
    if (!this.receiving && prev === 1 && level === 0) {
      this.receiving = true;
      this.bitIndex = 0;
      this.currentByte = 0;
      this.framingOk = true;
      this.untilSample = this.stepsPerBit * 1.5;
    }
  }

  /** Moves one step forward, sampling the line when a bit centre is reached. */
  advance(): void {
    if (!this.receiving) {
      return;
    }
    this.untilSample -= 1;
    if (this.untilSample > 0) {
      return;
    }
    this.sampleBit();
  }

  /** Abandons a frame in progress; the line is taken as idle. */
  reset(): void {
    this.lineLevel = 1;
    this.receiving = false;
    this.untilSample = 0;
    this.bitIndex = 0;
    this.currentByte = 0;
    this.framingOk = true;
  }

  private sampleBit(): void {
    const bit = this.lineLevel;
    if (this.bitIndex < this.dataBits) {
      if (bit === 1) {
        this.currentByte |= 1 << this.bitIndex;
      }
    } else if (bit !== 1) {
      this.framingOk = false;
    }
    this.bitIndex += 1;
    if (this.bitIndex < this.dataBits + this.stopBits) {
      this.untilSample = this.stepsPerBit;
      return;
    }
    this.receiving = false;
    this.onByte?.({ byte: this.currentByte & 0xff, framingOk: this.framingOk });
  }
}
