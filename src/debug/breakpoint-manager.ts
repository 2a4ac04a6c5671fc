/**
 * @fileoverview Breakpoint management for the debug adapter.
 * Breakpoints are set on Brainfuck source lines and resolve to the first
 * instruction address the line compiled to.
 */

import * as path from 'path';
import { DebugProtocol } from '@vscode/debugprotocol';
import { ListingInfo } from '../cpu/loaders';

/**
 * Manages breakpoints for the debug session.
 */
export class BreakpointManager {
  /** Set of active breakpoint addresses */
  private breakpoints: Set<number> = new Set();

  /** Pending breakpoints by normalized source path */
  private pendingBreakpointsBySource: Map<string, DebugProtocol.SourceBreakpoint[]> = new Map();

  /** Line map of the compiled program */
  private listing: ListingInfo | undefined;

  /** Source file the listing belongs to */
  private sourcePath: string | undefined;

  /** Base directory for path resolution */
  private baseDir: string = process.cwd();

  public getBreakpoints(): Set<number> {
    return this.breakpoints;
  }

  public clear(): void {
    this.breakpoints.clear();
    this.pendingBreakpointsBySource.clear();
  }

  /**
   * Updates the line map used for breakpoint resolution. Pending breakpoints are re-resolved.
   */
  public setListing(listing: ListingInfo | undefined, sourcePath: string | undefined): void {
    this.listing = listing;
    this.sourcePath = sourcePath !== undefined ? path.resolve(sourcePath) : undefined;
    this.rebuildBreakpoints();
  }

  public setBaseDir(baseDir: string): void {
    this.baseDir = baseDir;
  }

  public hasBreakpoint(address: number): boolean {
    return this.breakpoints.has(address);
  }

  /**
   * Sets breakpoints for a source file.
   *
   * @returns Array of verified breakpoint responses
   */
  public setBreakpoints(
    sourcePath: string | undefined,
    breakpoints: DebugProtocol.SourceBreakpoint[]
  ): DebugProtocol.Breakpoint[] {
    const normalized =
      sourcePath === undefined || sourcePath.length === 0
        ? undefined
        : this.normalizeSourcePath(sourcePath);

    if (normalized !== undefined) {
      this.pendingBreakpointsBySource.set(normalized, breakpoints);
    }

    const verified = breakpoints.map((bp) => {
      const address = normalized !== undefined ? this.resolveLine(normalized, bp.line) : undefined;
      return { line: bp.line, verified: address !== undefined };
    });

    this.rebuildBreakpoints();
    return verified;
  }

  /**
   * Resolves a source line to the first address it compiled to.
   */
  public resolveLine(sourcePath: string, line: number): number | undefined {
    if (this.listing === undefined || this.sourcePath === undefined) {
      return undefined;
    }
    if (this.normalizeSourcePath(sourcePath) !== this.sourcePath) {
      return undefined;
    }
    return this.listing.lineToAddress.get(line);
  }

  private rebuildBreakpoints(): void {
    this.breakpoints.clear();
    for (const [source, bps] of this.pendingBreakpointsBySource.entries()) {
      for (const bp of bps) {
        const address = this.resolveLine(source, bp.line);
        if (address !== undefined) {
          this.breakpoints.add(address);
        }
      }
    }
  }

  private normalizeSourcePath(sourcePath: string): string {
    if (path.isAbsolute(sourcePath)) {
      return path.resolve(sourcePath);
    }
    return path.resolve(this.baseDir, sourcePath);
  }
}
