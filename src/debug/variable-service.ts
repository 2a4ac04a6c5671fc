/**
 * @fileoverview Variable and scope builders for the debug adapter.
 */

import { Scope, Handles } from '@vscode/debugadapter';
import { DebugProtocol } from '@vscode/debugprotocol';
import { mnemonic } from '../cpu/disassembler';
import type { SystemTaps } from '../platforms/bfcpu/runtime';

type MachineView = {
  getTaps: () => SystemTaps;
  tapeSnapshot: () => Uint8Array;
};

/**
 * Builds the Machine and Tape scopes.
 */
export class VariableService {
  constructor(private readonly variableHandles: Handles<string>) {}

  createScopes(): DebugProtocol.Scope[] {
    const machineRef = this.variableHandles.create('machine');
    const tapeRef = this.variableHandles.create('tape');
    return [new Scope('Machine', machineRef, false), new Scope('Tape', tapeRef, false)];
  }

  resolveVariables(variablesReference: number, view?: MachineView): DebugProtocol.Variable[] {
    const scopeType = this.variableHandles.get(variablesReference);
    if (view === undefined) {
      return [];
    }
    if (scopeType === 'machine') {
      return this.machineVariables(view.getTaps());
    }
    if (scopeType === 'tape') {
      return this.tapeVariables(view.tapeSnapshot(), view.getTaps().dp);
    }
    return [];
  }

  private machineVariables(taps: SystemTaps): DebugProtocol.Variable[] {
    return [
      { name: 'PC', value: this.format8(taps.pc), variablesReference: 0 },
      { name: 'DP', value: this.format8(taps.dp), variablesReference: 0 },
      { name: 'State', value: taps.engineState, variablesReference: 0 },
      {
        name: 'Instruction',
        value: `${this.format8(taps.instr)} ${mnemonic(taps.instr)}`,
        variablesReference: 0,
      },
      { name: 'Cell', value: this.format8(taps.cell), variablesReference: 0 },
      { name: 'Engine busy', value: String(taps.engineBusy), variablesReference: 0 },
      { name: 'Loader busy', value: String(taps.loaderBusy), variablesReference: 0 },
      { name: 'TX busy', value: String(taps.txBusy), variablesReference: 0 },
      { name: 'RX busy', value: String(taps.rxBusy), variablesReference: 0 },
    ];
  }

  private tapeVariables(cells: Uint8Array, dp: number): DebugProtocol.Variable[] {
    return Array.from(cells, (value, index) => ({
      name: index === dp ? `[${index}] <DP` : `[${index}]`,
      value: this.format8(value),
      variablesReference: 0,
    }));
  }

  private format8(value: number): string {
    return `0x${value.toString(16).padStart(2, '0')}`;
  }
}
