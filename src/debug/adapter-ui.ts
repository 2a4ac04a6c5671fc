/**
 * @fileoverview Debug adapter UI helpers.
 */

import { OutputEvent } from '@vscode/debugadapter';
import { DebugProtocol } from '@vscode/debugprotocol';

export type EventSender = (event: DebugProtocol.Event) => void;

export function emitConsoleOutput(
  sendEvent: EventSender,
  message: string,
  options?: { newline?: boolean }
): void {
  const newline = options?.newline !== false;
  const text = newline ? `${message}\n` : message;
  sendEvent(new OutputEvent(text, 'console'));
}

/**
 * Forwards bytes sent by the machine's transmitter as program output.
 */
export function emitProgramOutput(sendEvent: EventSender, bytes: number[]): void {
  if (bytes.length === 0) {
    return;
  }
  sendEvent(new OutputEvent(Buffer.from(bytes).toString('latin1'), 'stdout'));
}
