/**
 * @fileoverview Debug module exports.
 * Re-exports all debug adapter components for convenient importing.
 */

export * from './types';
export * from './errors';
export * from './config-loader';
export * from './config-validation';
export * from './breakpoint-manager';
export * from './program-loader';
export * from './adapter';
