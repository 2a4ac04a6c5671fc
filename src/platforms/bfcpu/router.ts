import type { UartRxOutputs } from '../serial/uart-rx';

export interface ReceivedByte {
  valid: boolean;
  data: number;
}

export interface RoutedReceive {
  loader: ReceivedByte;
  engine: ReceivedByte;
}

const NONE: ReceivedByte = { valid: false, data: 0 };

/**
 * Hands the receiver's byte to exactly one consumer: the loader in upload mode, the engine otherwise.
 */
export function routeReceived(uploadMode: boolean, rx: Pick<UartRxOutputs, 'valid' | 'data'>): RoutedReceive {
  const byte: ReceivedByte = { valid: rx.valid, data: rx.data };
  return uploadMode ? { loader: byte, engine: NONE } : { loader: NONE, engine: byte };
}
