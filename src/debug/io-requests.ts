/**
 * @fileoverview IO request helpers for serial input.
 */

import { extractSerialText } from './types';

export interface SerialTarget {
  queueInput: (bytes: number[]) => void;
}

/**
 * Queues the request's text on the receive line, one byte per character (latin1).
 * @returns Number of bytes queued
 */
export function applySerialInput(args: unknown, target: SerialTarget): number {
  const textValue = extractSerialText(args);
  const bytes = Array.from(textValue, (ch) => ch.charCodeAt(0) & 0xff);
  if (bytes.length > 0) {
    target.queueInput(bytes);
  }
  return bytes.length;
}
