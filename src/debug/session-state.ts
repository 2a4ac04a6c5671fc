/**
 * @fileoverview Session state defaults and reset helpers for the debug adapter.
 */

import type { ListingInfo, ProgramKind } from '../cpu/loaders';
import type { BfHost } from '../platforms/bfcpu/host';
import type { LoadMode } from './types';

/**
 * Reasons a debug session can stop.
 */
export type StopReason = 'breakpoint' | 'step' | 'halt' | 'entry' | 'pause';

/**
 * Fields of the debug session that are reset per launch.
 */
export interface SessionStateShape {
  haltNotified: boolean;
  host: BfHost | undefined;
  programPath: string | undefined;
  programKind: ProgramKind | undefined;
  programWords: Uint8Array | undefined;
  listing: ListingInfo | undefined;
  loadMode: LoadMode;
  baseDir: string;
  lastStopReason: StopReason | undefined;
  lastBreakpointAddress: number | null;
  skipBreakpointOnce: number | null;
  pauseRequested: boolean;
  running: boolean;
  stepLimit: number;
}

export function createSessionState(): SessionStateShape {
  return {
    haltNotified: false,
    host: undefined,
    programPath: undefined,
    programKind: undefined,
    programWords: undefined,
    listing: undefined,
    loadMode: 'boot',
    baseDir: process.cwd(),
    lastStopReason: undefined,
    lastBreakpointAddress: null,
    skipBreakpointOnce: null,
    pauseRequested: false,
    running: false,
    stepLimit: 0,
  };
}

/**
 * Applies default state values to an existing session object.
 */
export function resetSessionState(target: SessionStateShape): void {
  Object.assign(target, createSessionState());
}
