/**
 * Reset synchronizer: asserts in the step the raw input goes high and releases only after
 * the input has been low for `stages` consecutive steps.
 */
export class ResetSynchronizer {
  readonly stages: number;
  private chain: boolean[];

  constructor(stages: number, initiallyAsserted = false) {
    this.stages = Math.max(1, Math.trunc(stages));
    this.chain = new Array<boolean>(this.stages).fill(initiallyAsserted);
  }

  get asserted(): boolean {
    return this.chain[this.stages - 1] ?? false;
  }

  step(raw: boolean): boolean {
    if (raw) {
      this.chain.fill(true);
    } else {
      this.chain = [false, ...this.chain.slice(0, this.stages - 1)];
    }
    return this.asserted;
  }
}
