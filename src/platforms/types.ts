/**
 * @file Machine configuration types shared by the runtime and the debug adapter.
 */

/**
 * Transmitter bit timing.
 * - 'frame-aligned': bit period counted from the start request in oversampled ticks
 * - 'bit-tick': the free-running bit-rate tick, so the start bit may be short
 */
export type TxTiming = 'frame-aligned' | 'bit-tick';

export interface MachineConfig {
  programDepth?: number;
  tapeDepth?: number;
  clockHz?: number;
  baud?: number;
  resetStages?: number;
  txTiming?: TxTiming;
  /** Program image file restored on every reset instead of the built-in program. */
  bootImage?: string;
}

export interface MachineConfigNormalized {
  programDepth: number;
  tapeDepth: number;
  clockHz: number;
  baud: number;
  resetStages: number;
  txTiming: TxTiming;
  /** Clock steps per oversampled tick. */
  divisor: number;
  bootImage?: string;
}

export const DEFAULT_PROGRAM_DEPTH = 32;
export const DEFAULT_TAPE_DEPTH = 16;
export const DEFAULT_CLOCK_HZ = 50_000_000;
export const DEFAULT_BAUD = 115_200;
export const DEFAULT_RESET_STAGES = 2;
export const OVERSAMPLE = 16;

export const MIN_DEPTH = 2;
export const MAX_DEPTH = 4096;
export const MIN_RESET_STAGES = 1;
export const MAX_RESET_STAGES = 16;

export function computeDivisor(clockHz: number, baud: number): number {
  if (!(clockHz > 0) || !(baud > 0)) {
    return 1;
  }
  return Math.max(1, Math.round(clockHz / (baud * OVERSAMPLE)));
}

function clampInt(value: number | undefined, min: number, max: number, fallback: number): number {
  if (value === undefined || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.max(min, Math.min(max, Math.trunc(value)));
}

function positiveOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) && value > 0 ? value : fallback;
}

export function normalizeMachineConfig(cfg?: MachineConfig): MachineConfigNormalized {
  const config = cfg ?? {};
  const clockHz = positiveOr(config.clockHz, DEFAULT_CLOCK_HZ);
  const baud = positiveOr(config.baud, DEFAULT_BAUD);
  const bootImage =
    typeof config.bootImage === 'string' && config.bootImage.trim() !== ''
      ? config.bootImage.trim()
      : undefined;
  return {
    programDepth: clampInt(config.programDepth, MIN_DEPTH, MAX_DEPTH, DEFAULT_PROGRAM_DEPTH),
    tapeDepth: clampInt(config.tapeDepth, MIN_DEPTH, MAX_DEPTH, DEFAULT_TAPE_DEPTH),
    clockHz,
    baud,
    resetStages: clampInt(config.resetStages, MIN_RESET_STAGES, MAX_RESET_STAGES, DEFAULT_RESET_STAGES),
    txTiming: config.txTiming === 'bit-tick' ? 'bit-tick' : 'frame-aligned',
    divisor: computeDivisor(clockHz, baud),
    ...(bootImage !== undefined ? { bootImage } : {}),
  };
}
