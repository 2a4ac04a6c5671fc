/**
 * @fileoverview Public API: instruction set, compiler, machine model and debug adapter.
 */

export * from './cpu/isa';
export * from './cpu/engine';
export * from './cpu/latched-memory';
export * from './cpu/compiler';
export * from './cpu/disassembler';
export * from './cpu/loaders';
export * from './cpu/default-program';
export * from './platforms/types';
export * from './platforms/bfcpu/runtime';
export * from './platforms/bfcpu/host';
export * from './platforms/bfcpu/upload';
export * from './platforms/serial/serial-terminal';
export * from './debug';
