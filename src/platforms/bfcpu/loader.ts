/**
 * @file Program loader: writes each byte received in upload mode to the next program address.
 */

import { wrapIndex } from '../../cpu/isa';

export type LoaderState = 'IDLE' | 'WRITE' | 'WAIT';

export interface LoaderRegisters {
  state: LoaderState;
  addr: number;
  data: number;
}

export interface LoaderInputs {
  uploadMode: boolean;
  rxValid: boolean;
  rxData: number;
}

export interface LoaderTransition {
  next: LoaderRegisters;
  programWrite?: { addr: number; value: number };
}

export function createLoaderRegisters(): LoaderRegisters {
  return { state: 'IDLE', addr: 0, data: 0 };
}

export function isLoaderBusy(state: LoaderState): boolean {
  return state === 'WRITE' || state === 'WAIT';
}

export function stepLoader(
  regs: LoaderRegisters,
  inputs: LoaderInputs,
  programDepth: number
): LoaderTransition {
  if (!inputs.uploadMode) {
    return { next: { state: 'IDLE', addr: 0, data: regs.data } };
  }
  switch (regs.state) {
    case 'IDLE':
      if (inputs.rxValid) {
        return { next: { state: 'WRITE', addr: regs.addr, data: inputs.rxData & 0xff } };
      }
      return { next: regs };
    case 'WRITE':
      return {
        next: { ...regs, state: 'WAIT' },
        programWrite: { addr: regs.addr, value: regs.data },
      };
    case 'WAIT':
      return { next: { ...regs, state: 'IDLE', addr: wrapIndex(regs.addr + 1, programDepth) } };
  }
}
