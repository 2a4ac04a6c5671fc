import { OVERSAMPLE } from './types';

export interface TickPulses {
  /** Oversampled tick, 16 per bit period. */
  sample: boolean;
  /** Bit-rate tick, every 16th oversampled tick. */
  bit: boolean;
}

/**
 * Baud-rate generator. Each call to `next()` is one clock step.
 */
export class TickSource {
  readonly divisor: number;
  private stepCount = 0;
  private sampleCount = 0;

  constructor(divisor: number) {
    this.divisor = Math.max(1, Math.trunc(divisor));
  }

  next(): TickPulses {
    if (this.stepCount < this.divisor - 1) {
      this.stepCount += 1;
      return { sample: false, bit: false };
    }
    this.stepCount = 0;
    const bit = this.sampleCount === OVERSAMPLE - 1;
    this.sampleCount = bit ? 0 : this.sampleCount + 1;
    return { sample: true, bit };
  }

  reset(): void {
    this.stepCount = 0;
    this.sampleCount = 0;
  }
}
