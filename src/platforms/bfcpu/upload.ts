/**
 * @file Host link: steps the machine with a serial terminal attached, and drives the
 * program upload protocol over it.
 */

import { RuntimeError } from '../../debug/errors';
import { SerialTerminal } from '../serial/serial-terminal';
import { BfSystem, StepEvents, SystemPins } from './runtime';

export type HostPins = Partial<Omit<SystemPins, 'rx'>>;

/**
 * One machine step with the terminal driving rx and watching tx.
 */
export function stepWithTerminal(
  system: BfSystem,
  terminal: SerialTerminal,
  pins: HostPins = {}
): StepEvents {
  const rx = terminal.nextRxLevel();
  const events = system.step({ ...pins, rx });
  terminal.sampleTx(system.getTaps().txLine);
  return events;
}

export interface UploadOptions {
  /** Give up after this many steps. */
  maxSteps?: number;
}

export interface UploadResult {
  steps: number;
  written: number;
}

/**
 * Sends `image` through the serial loader: upload mode is held until the last byte has
 * been written, then released for one step so the loader address returns to zero.
 */
export function uploadProgram(
  system: BfSystem,
  terminal: SerialTerminal,
  image: ArrayLike<number>,
  options: UploadOptions = {}
): UploadResult {
  const maxSteps =
    options.maxSteps ?? (image.length + 2) * terminal.stepsPerBit * 12 + system.config.resetStages;
  terminal.send(image);
  let steps = 0;
  let written = 0;
  const settled = (): boolean => {
    const taps = system.getTaps();
    return !terminal.isSending() && !taps.rxBusy && !taps.loaderBusy;
  };
  while (!settled()) {
    if (steps >= maxSteps) {
      throw new RuntimeError(
        `Upload did not complete within ${maxSteps} steps (${written} of ${image.length} bytes written)`,
        system.getTaps().pc
      );
    }
    const events = stepWithTerminal(system, terminal, { uploadMode: true });
    if (events.programWrite) {
      written += 1;
    }
    steps += 1;
  }
  stepWithTerminal(system, terminal, { uploadMode: false });
  steps += 1;
  return { steps, written };
}
