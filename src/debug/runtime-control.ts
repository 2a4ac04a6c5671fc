/**
 * @fileoverview Runtime execution helpers for stepping and stopping.
 */

import { StoppedEvent } from '@vscode/debugadapter';
import { DebugProtocol } from '@vscode/debugprotocol';
import type { BfHost, InstructionResult } from '../platforms/bfcpu/host';
import { emitConsoleOutput } from './adapter-ui';
import type { StopReason } from './session-state';

export interface RuntimeControlContext {
  getHost: () => BfHost | undefined;
  getPauseRequested: () => boolean;
  setPauseRequested: (value: boolean) => void;
  getSkipBreakpointOnce: () => number | null;
  setSkipBreakpointOnce: (value: number | null) => void;
  setHaltNotified: (value: boolean) => void;
  setLastStopReason: (reason: StopReason) => void;
  setLastBreakpointAddress: (address: number | null) => void;
  isBreakpointAddress: (address: number) => boolean;
  handleHaltStop: () => void;
  setRunning: (value: boolean) => void;
  sendEvent: (event: DebugProtocol.Event) => void;
}

export interface RunOptions {
  /** Stop with reason 'step' once this returns true after an instruction. */
  stopWhen?: (pc: number) => boolean;
  /** Instruction cap, 0 or undefined for none. */
  maxInstructions?: number;
  limitLabel?: string;
}

const CHUNK = 1000;

function stop(context: RuntimeControlContext, reason: StopReason, address: number | null = null): void {
  context.setHaltNotified(false);
  context.setLastStopReason(reason);
  context.setLastBreakpointAddress(address);
  context.setRunning(false);
  context.sendEvent(new StoppedEvent(reason, 1));
}

/**
 * Handles the end of one instruction. Returns true when execution must stop.
 */
function settle(context: RuntimeControlContext, result: InstructionResult): boolean {
  if (result.halted) {
    context.setRunning(false);
    context.handleHaltStop();
    return true;
  }
  if (result.waitingForInput) {
    emitConsoleOutput(
      context.sendEvent,
      'bfcpu: program is waiting for serial input (send it with the bfcpu/serialInput request).'
    );
    stop(context, 'pause');
    return true;
  }
  return false;
}

/**
 * Executes exactly one instruction and stops with reason 'step'.
 */
export function stepInstruction(context: RuntimeControlContext): void {
  const host = context.getHost();
  if (host === undefined) {
    return;
  }
  context.setSkipBreakpointOnce(null);
  const result = host.stepInstruction();
  if (settle(context, result)) {
    return;
  }
  stop(context, 'step');
}

export async function runUntilStopAsync(
  context: RuntimeControlContext,
  options?: RunOptions
): Promise<void> {
  const maxInstructions = options?.maxInstructions ?? 0;
  const limitLabel = options?.limitLabel ?? 'step';
  let executed = 0;
  context.setRunning(true);
  // eslint-disable-next-line no-constant-condition
  while (true) {
    for (let i = 0; i < CHUNK; i += 1) {
      const host = context.getHost();
      if (host === undefined) {
        context.setRunning(false);
        return;
      }
      if (context.getPauseRequested()) {
        context.setPauseRequested(false);
        stop(context, 'pause');
        return;
      }
      const pc = host.getPC();
      const skip = context.getSkipBreakpointOnce();
      if (skip !== null && skip === pc) {
        context.setSkipBreakpointOnce(null);
      } else if (host.isAtBoundary() && context.isBreakpointAddress(pc)) {
        stop(context, 'breakpoint', pc);
        return;
      }

      const result = host.stepInstruction();
      executed += 1;
      if (settle(context, result)) {
        return;
      }
      if (options?.stopWhen !== undefined && options.stopWhen(result.pc)) {
        stop(context, 'step');
        return;
      }
      if (maxInstructions > 0 && executed >= maxInstructions) {
        emitConsoleOutput(
          context.sendEvent,
          `bfcpu: ${limitLabel} stopped after ${maxInstructions} instructions (target not reached).`
        );
        stop(context, 'step');
        return;
      }
    }
    await new Promise((resolve) => setImmediate(resolve));
  }
}
