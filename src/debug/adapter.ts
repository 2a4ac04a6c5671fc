/**
 * @fileoverview bfcpu Debug Adapter implementation.
 * Provides DAP (Debug Adapter Protocol) support for programs running on the
 * cycle-stepped Brainfuck CPU.
 */

import {
  DebugSession,
  InitializedEvent,
  StoppedEvent,
  TerminatedEvent,
  Thread,
  Handles,
} from '@vscode/debugadapter';
import { DebugProtocol } from '@vscode/debugprotocol';
import * as path from 'path';
import { formatListing } from '../cpu/disassembler';
import { createBfHost } from '../platforms/bfcpu/host';
import { normalizeMachineConfig } from '../platforms/types';
import { emitConsoleOutput, emitProgramOutput } from './adapter-ui';
import { BreakpointManager } from './breakpoint-manager';
import { populateFromConfig } from './config-loader';
import { assertHasProgram, assertValidLaunchArgs, validateLaunchArgs } from './config-validation';
import { getErrorMessage, isCompileError, isParseError, wrapError } from './errors';
import { applySerialInput } from './io-requests';
import { loadProgramFile } from './program-loader';
import { runUntilStopAsync, RuntimeControlContext, stepInstruction } from './runtime-control';
import { createSessionState, resetSessionState, type SessionStateShape } from './session-state';
import { buildStackFrames, SourceLookupOptions } from './stack-service';
import { LaunchRequestArguments } from './types';
import { VariableService } from './variable-service';

/** DAP thread identifier (the machine has one control flow) */
const THREAD_ID = 1;

/** `sourceReference` of the generated disassembly */
const DISASSEMBLY_REFERENCE = 1;

export class BfDebugSession extends DebugSession {
  private breakpointManager = new BreakpointManager();
  private sessionState: SessionStateShape = createSessionState();
  private variableHandles = new Handles<string>();
  private variableService = new VariableService(this.variableHandles);
  private stopOnEntry = false;
  private configurationDone = false;
  private launched = false;

  public constructor() {
    super();
    this.setDebuggerLinesStartAt1(true);
    this.setDebuggerColumnsStartAt1(true);
  }

  protected initializeRequest(
    response: DebugProtocol.InitializeResponse,
    _args: DebugProtocol.InitializeRequestArguments
  ): void {
    response.body = response.body ?? {};
    response.body.supportsConfigurationDoneRequest = true;

    this.sendResponse(response);
    this.sendEvent(new InitializedEvent());
  }

  protected launchRequest(
    response: DebugProtocol.LaunchResponse,
    args: LaunchRequestArguments
  ): void {
    resetSessionState(this.sessionState);
    this.launched = false;
    this.breakpointManager.setListing(undefined, undefined);

    let programFile: string | undefined;
    try {
      assertValidLaunchArgs(args);
      const { args: merged, configPath } = populateFromConfig(args);
      if (configPath !== undefined) {
        this.log(`bfcpu: using ${configPath}`);
      }
      const validation = validateLaunchArgs(merged);
      for (const warning of validation.warnings) {
        this.log(`bfcpu: ${warning}`);
      }
      assertValidLaunchArgs(merged);
      assertHasProgram(merged);
      programFile = merged.program;

      const baseDir = process.cwd();
      const machine = normalizeMachineConfig(merged.machine);
      const program = loadProgramFile(merged.program, baseDir, machine.programDepth);
      const loadMode = merged.load ?? 'boot';

      let bootImage: Uint8Array | undefined;
      if (loadMode === 'boot') {
        bootImage = program.words;
        if (machine.bootImage !== undefined) {
          this.log('bfcpu: machine.bootImage is ignored when load is "boot"');
        }
      } else if (machine.bootImage !== undefined) {
        bootImage = loadProgramFile(machine.bootImage, baseDir, machine.programDepth).words;
      }

      const host = createBfHost({
        ...(merged.machine !== undefined ? { config: merged.machine } : {}),
        ...(bootImage !== undefined ? { bootImage } : {}),
        ...(merged.waitLimitSteps !== undefined ? { waitLimitSteps: merged.waitLimitSteps } : {}),
        log: (message) => this.log(message),
        onTransmit: (event) => {
          if (!event.framingOk) {
            const byte = event.byte.toString(16).padStart(2, '0');
            this.log(`serial: framing error on transmit line, byte 0x${byte} dropped`);
            return;
          }
          emitProgramOutput(this.sendEvent.bind(this), [event.byte]);
        },
      });

      this.sessionState.host = host;
      this.sessionState.programPath = program.path;
      this.sessionState.programKind = program.kind;
      this.sessionState.programWords = program.words;
      this.sessionState.listing = program.listing;
      this.sessionState.loadMode = loadMode;
      this.sessionState.baseDir = baseDir;
      this.sessionState.stepLimit = merged.stepLimit ?? 0;
      this.breakpointManager.setBaseDir(baseDir);
      this.breakpointManager.setListing(
        program.listing,
        program.kind === 'bf' ? program.path : undefined
      );

      this.bootMachine();
      if (merged.input !== undefined && merged.input !== '') {
        host.queueInput(merged.input);
      }

      this.stopOnEntry = merged.stopOnEntry === true;
      this.launched = true;
      this.sendResponse(response);

      if (this.stopOnEntry) {
        this.sessionState.lastStopReason = 'entry';
        this.sessionState.lastBreakpointAddress = null;
        this.sendEvent(new StoppedEvent('entry', THREAD_ID));
      } else if (this.configurationDone) {
        this.runUntilStop();
      }
    } catch (err) {
      const error = wrapError(err);
      const detail = `Failed to load program: ${error.message}`;
      this.log(detail);
      if ((isParseError(error) || isCompileError(error)) && error.line !== undefined) {
        this.log(`bfcpu: ${programFile ?? 'program'}:${error.line}`);
      }
      this.sendErrorResponse(response, 1, detail);
    }
  }

  protected setBreakPointsRequest(
    response: DebugProtocol.SetBreakpointsResponse,
    args: DebugProtocol.SetBreakpointsArguments
  ): void {
    const verified = this.breakpointManager.setBreakpoints(args.source.path, args.breakpoints ?? []);
    response.body = { breakpoints: verified };
    this.sendResponse(response);
  }

  protected configurationDoneRequest(
    response: DebugProtocol.ConfigurationDoneResponse,
    _args: DebugProtocol.ConfigurationDoneArguments
  ): void {
    this.configurationDone = true;
    this.sendResponse(response);

    if (this.launched && !this.stopOnEntry) {
      this.runUntilStop();
    }
  }

  protected threadsRequest(response: DebugProtocol.ThreadsResponse): void {
    response.body = {
      threads: [new Thread(THREAD_ID, 'Main Thread')],
    };
    this.sendResponse(response);
  }

  protected continueRequest(
    response: DebugProtocol.ContinueResponse,
    _args: DebugProtocol.ContinueArguments
  ): void {
    this.continueExecution(response);
  }

  protected nextRequest(
    response: DebugProtocol.NextResponse,
    _args: DebugProtocol.NextArguments
  ): void {
    const host = this.sessionState.host;
    if (host === undefined) {
      this.sendErrorResponse(response, 1, 'No program loaded');
      return;
    }
    this.sendResponse(response);
    if (this.sessionState.running) {
      return;
    }
    this.sessionState.pauseRequested = false;

    const listing = this.sessionState.listing;
    if (this.sessionState.programKind !== 'bf' || listing === undefined) {
      stepInstruction(this.getRuntimeControlContext());
      return;
    }
    const startLine = listing.addressToLine.get(host.getPC());
    this.sessionState.skipBreakpointOnce = null;
    this.runUntilStop({
      stopWhen: (pc) => listing.addressToLine.get(pc) !== startLine,
      maxInstructions: this.sessionState.stepLimit,
      limitLabel: 'step over',
    });
  }

  protected stepInRequest(
    response: DebugProtocol.StepInResponse,
    _args: DebugProtocol.StepInArguments
  ): void {
    if (this.sessionState.host === undefined) {
      this.sendErrorResponse(response, 1, 'No program loaded');
      return;
    }
    this.sendResponse(response);
    if (this.sessionState.running) {
      return;
    }
    this.sessionState.pauseRequested = false;
    stepInstruction(this.getRuntimeControlContext());
  }

  /** There are no calls to return from; runs like continue. */
  protected stepOutRequest(
    response: DebugProtocol.StepOutResponse,
    _args: DebugProtocol.StepOutArguments
  ): void {
    this.continueExecution(response);
  }

  protected pauseRequest(
    response: DebugProtocol.PauseResponse,
    _args: DebugProtocol.PauseArguments
  ): void {
    if (this.sessionState.running) {
      this.sessionState.pauseRequested = true;
    }
    this.sendResponse(response);
  }

  protected stackTraceRequest(
    response: DebugProtocol.StackTraceResponse,
    _args: DebugProtocol.StackTraceArguments
  ): void {
    const host = this.sessionState.host;
    if (host === undefined) {
      response.body = { stackFrames: [], totalFrames: 0 };
      this.sendResponse(response);
      return;
    }
    response.body = buildStackFrames(host.getPC(), this.getSourceLookup());
    this.sendResponse(response);
  }

  protected sourceRequest(
    response: DebugProtocol.SourceResponse,
    args: DebugProtocol.SourceArguments
  ): void {
    const host = this.sessionState.host;
    if (host === undefined || args.sourceReference !== DISASSEMBLY_REFERENCE) {
      this.sendErrorResponse(response, 1, 'Source not available');
      return;
    }
    const { program, config } = host.system;
    response.body = {
      content: formatListing(program.snapshot(), config.programDepth),
      mimeType: 'text/plain',
    };
    this.sendResponse(response);
  }

  protected scopesRequest(
    response: DebugProtocol.ScopesResponse,
    _args: DebugProtocol.ScopesArguments
  ): void {
    response.body = {
      scopes: this.variableService.createScopes(),
    };
    this.sendResponse(response);
  }

  protected variablesRequest(
    response: DebugProtocol.VariablesResponse,
    args: DebugProtocol.VariablesArguments
  ): void {
    const host = this.sessionState.host;
    response.body = {
      variables: this.variableService.resolveVariables(
        args.variablesReference,
        host !== undefined
          ? {
              getTaps: () => host.system.getTaps(),
              tapeSnapshot: () => host.system.tape.snapshot(),
            }
          : undefined
      ),
    };
    this.sendResponse(response);
  }

  protected disconnectRequest(
    response: DebugProtocol.DisconnectResponse,
    _args: DebugProtocol.DisconnectArguments
  ): void {
    this.sessionState.host = undefined;
    this.sessionState.haltNotified = false;
    this.launched = false;
    this.sendResponse(response);
  }

  protected customRequest(command: string, response: DebugProtocol.Response, args: unknown): void {
    if (command === 'bfcpu/serialInput') {
      const host = this.sessionState.host;
      if (host === undefined) {
        this.sendErrorResponse(response, 1, 'bfcpu: no program loaded.');
        return;
      }
      const queued = applySerialInput(args, host);
      response.body = { queued };
      this.sendResponse(response);
      return;
    }
    if (command === 'bfcpu/reset') {
      this.handleResetRequest(response);
      return;
    }
    super.customRequest(command, response, args);
  }

  private handleResetRequest(response: DebugProtocol.Response): void {
    const host = this.sessionState.host;
    if (host === undefined) {
      this.sendErrorResponse(response, 1, 'bfcpu: no program loaded.');
      return;
    }
    try {
      host.reset();
      this.bootMachine();
    } catch (err) {
      this.sendErrorResponse(response, 1, `bfcpu: reset failed: ${getErrorMessage(err)}`);
      return;
    }
    this.sessionState.haltNotified = false;
    this.sendResponse(response);
    if (!this.sessionState.running) {
      this.sessionState.lastStopReason = 'entry';
      this.sessionState.lastBreakpointAddress = null;
      this.sendEvent(new StoppedEvent('entry', THREAD_ID));
    }
  }

  /**
   * Brings a freshly reset machine to its first fetch: uploads the program when it is
   * delivered over the loader, then pulses run-start.
   */
  private bootMachine(): void {
    const host = this.sessionState.host;
    const words = this.sessionState.programWords;
    if (host === undefined || words === undefined) {
      return;
    }
    if (this.sessionState.loadMode === 'upload') {
      const result = host.upload(words);
      this.log(`bfcpu: uploaded ${result.written} bytes in ${result.steps} steps`);
    }
    host.start();
  }

  private getSourceLookup(): SourceLookupOptions {
    const { programKind, programPath, listing } = this.sessionState;
    if (programKind === 'bf' && programPath !== undefined && listing !== undefined) {
      return { sourceFile: programPath, listing };
    }
    const name =
      programPath !== undefined ? `${path.basename(programPath)} (disassembly)` : 'disassembly';
    return { disassembly: { name, reference: DISASSEMBLY_REFERENCE } };
  }

  private continueExecution(response: DebugProtocol.Response): void {
    const host = this.sessionState.host;
    if (host === undefined) {
      this.sendErrorResponse(response, 1, 'No program loaded');
      return;
    }

    this.sendResponse(response);
    if (this.sessionState.running) {
      return;
    }
    this.sessionState.pauseRequested = false;
    const lastAddress = this.sessionState.lastBreakpointAddress;
    if (
      this.sessionState.lastStopReason === 'breakpoint' &&
      lastAddress !== null &&
      host.getPC() === lastAddress &&
      this.breakpointManager.hasBreakpoint(lastAddress)
    ) {
      this.sessionState.skipBreakpointOnce = lastAddress;
    } else {
      this.sessionState.skipBreakpointOnce = null;
    }
    this.runUntilStop();
  }

  private runUntilStop(options?: {
    stopWhen?: (pc: number) => boolean;
    maxInstructions?: number;
    limitLabel?: string;
  }): void {
    runUntilStopAsync(this.getRuntimeControlContext(), options).catch((err: unknown) => {
      this.sessionState.running = false;
      this.log(`bfcpu: execution failed: ${getErrorMessage(err)}`);
      this.sendEvent(new TerminatedEvent());
    });
  }

  private handleHaltStop(): void {
    if (!this.sessionState.haltNotified) {
      this.sessionState.haltNotified = true;
      this.sessionState.lastStopReason = 'halt';
      this.sessionState.lastBreakpointAddress = null;
      this.sendEvent(new StoppedEvent('halt', THREAD_ID));
      return;
    }

    this.sendEvent(new TerminatedEvent());
  }

  private log(message: string): void {
    emitConsoleOutput(this.sendEvent.bind(this), message);
  }

  private getRuntimeControlContext(): RuntimeControlContext {
    return {
      getHost: () => this.sessionState.host,
      getPauseRequested: () => this.sessionState.pauseRequested,
      setPauseRequested: (value: boolean): void => {
        this.sessionState.pauseRequested = value;
      },
      getSkipBreakpointOnce: () => this.sessionState.skipBreakpointOnce,
      setSkipBreakpointOnce: (value: number | null): void => {
        this.sessionState.skipBreakpointOnce = value;
      },
      setHaltNotified: (value: boolean): void => {
        this.sessionState.haltNotified = value;
      },
      setLastStopReason: (reason): void => {
        this.sessionState.lastStopReason = reason;
      },
      setLastBreakpointAddress: (address: number | null): void => {
        this.sessionState.lastBreakpointAddress = address;
      },
      isBreakpointAddress: (address: number): boolean => this.breakpointManager.hasBreakpoint(address),
      handleHaltStop: (): void => this.handleHaltStop(),
      setRunning: (value: boolean): void => {
        this.sessionState.running = value;
      },
      sendEvent: (event): void => {
        this.sendEvent(event);
      },
    };
  }
}
