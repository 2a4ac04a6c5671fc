/**
 * @fileoverview Type definitions for the debug adapter.
 */

import { DebugProtocol } from '@vscode/debugprotocol';
import { MachineConfig } from '../platforms/types';

/**
 * How the program reaches the program store.
 * - 'boot': becomes the boot image, restored on every reset
 * - 'upload': sent over the serial loader after reset, on top of the boot image
 */
export type LoadMode = 'boot' | 'upload';

/**
 * Launch request arguments for the bfcpu debug adapter.
 */
export interface LaunchRequestArguments extends DebugProtocol.LaunchRequestArguments {
  /** Program path: .bf/.b source, .hex, or .bin image */
  program?: string;
  /** Program delivery (default: boot) */
  load?: LoadMode;
  /** Whether to stop before the first instruction (default: false) */
  stopOnEntry?: boolean;
  /** Text queued on the receive line at start */
  input?: string;
  /** Maximum instructions to execute during one step (0 = unlimited) */
  stepLimit?: number;
  /** Clock steps spent in WAIT_RX with nothing queued before pausing */
  waitLimitSteps?: number;
  /** Path to project configuration file */
  projectConfig?: string;
  /** Target name from the configuration */
  target?: string;
  /** Machine parameters */
  machine?: MachineConfig;
}

/**
 * Configuration file structure for bfcpu.json.
 */
export interface ProjectConfig {
  /** Default target to use when none specified */
  defaultTarget?: string;
  /** Alternative name for defaultTarget */
  target?: string;
  /** Named target configurations */
  targets?: Record<string, TargetConfig>;
  program?: string;
  load?: LoadMode;
  stopOnEntry?: boolean;
  input?: string;
  stepLimit?: number;
  waitLimitSteps?: number;
  machine?: MachineConfig;
}

export type TargetConfig = Omit<ProjectConfig, 'targets' | 'defaultTarget' | 'target'>;

/**
 * Custom request types for the debug adapter.
 */
export type CustomRequestType = 'bfcpu/serialInput' | 'bfcpu/reset';

/**
 * Payload for serial input request.
 */
export interface SerialInputPayload {
  text: string;
}

// ============================================================================
// Type Guards
// ============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isLoadMode(value: unknown): value is LoadMode {
  return value === 'boot' || value === 'upload';
}

export function isSerialInputPayload(value: unknown): value is SerialInputPayload {
  return isRecord(value) && typeof value.text === 'string';
}

/**
 * Extracts text from a SerialInputPayload-like object.
 * Returns empty string if invalid.
 */
export function extractSerialText(value: unknown): string {
  return isSerialInputPayload(value) ? value.text : '';
}
