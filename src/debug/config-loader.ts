/**
 * @fileoverview Configuration loading and merging for the debug adapter.
 * Handles reading bfcpu.json files and merging configuration layers.
 */

import * as fs from 'fs';
import * as path from 'path';
import { validateProjectConfig } from './config-validation';
import { ConfigurationError, getErrorMessage } from './errors';
import {
  isLoadMode,
  isRecord,
  LaunchRequestArguments,
  ProjectConfig,
  TargetConfig,
} from './types';
import { MachineConfig } from '../platforms/types';

const PACKAGE_SECTION = 'bfcpu';

function readPackageSection(pkgPath: string): unknown {
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
  return isRecord(pkg) ? pkg[PACKAGE_SECTION] : undefined;
}

/**
 * Searches for a configuration file starting from startDir and walking up
 * the directory tree.
 *
 * @param startDir - Directory to start searching from
 * @param configCandidates - List of config file names to look for
 * @returns The absolute path to the config file, or undefined if not found
 */
export function findConfigFile(startDir: string, configCandidates: string[]): string | undefined {
  const dirsToCheck: string[] = [];
  for (let dir = path.resolve(startDir); ; ) {
    dirsToCheck.push(dir);
    const parent = path.dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }

  for (const dir of dirsToCheck) {
    for (const candidate of configCandidates) {
      const full = path.isAbsolute(candidate) ? candidate : path.join(dir, candidate);
      if (fs.existsSync(full)) {
        return full;
      }
    }

    const pkgPath = path.join(dir, 'package.json');
    if (fs.existsSync(pkgPath)) {
      let section: unknown;
      try {
        section = readPackageSection(pkgPath);
      } catch {
        // an unrelated package.json that is not valid JSON has no bfcpu section
        continue;
      }
      if (section !== undefined) {
        return pkgPath;
      }
    }
  }

  return undefined;
}

function pickMachineConfig(raw: Record<string, unknown>): MachineConfig {
  const machine: MachineConfig = {};
  if (typeof raw.programDepth === 'number') {
    machine.programDepth = raw.programDepth;
  }
  if (typeof raw.tapeDepth === 'number') {
    machine.tapeDepth = raw.tapeDepth;
  }
  if (typeof raw.clockHz === 'number') {
    machine.clockHz = raw.clockHz;
  }
  if (typeof raw.baud === 'number') {
    machine.baud = raw.baud;
  }
  if (typeof raw.resetStages === 'number') {
    machine.resetStages = raw.resetStages;
  }
  if (raw.txTiming === 'frame-aligned' || raw.txTiming === 'bit-tick') {
    machine.txTiming = raw.txTiming;
  }
  if (typeof raw.bootImage === 'string') {
    machine.bootImage = raw.bootImage;
  }
  return machine;
}

function pickTargetConfig(raw: Record<string, unknown>): TargetConfig {
  const target: TargetConfig = {};
  if (typeof raw.program === 'string') {
    target.program = raw.program;
  }
  if (isLoadMode(raw.load)) {
    target.load = raw.load;
  }
  if (typeof raw.stopOnEntry === 'boolean') {
    target.stopOnEntry = raw.stopOnEntry;
  }
  if (typeof raw.input === 'string') {
    target.input = raw.input;
  }
  if (typeof raw.stepLimit === 'number') {
    target.stepLimit = raw.stepLimit;
  }
  if (typeof raw.waitLimitSteps === 'number') {
    target.waitLimitSteps = raw.waitLimitSteps;
  }
  if (isRecord(raw.machine)) {
    target.machine = pickMachineConfig(raw.machine);
  }
  return target;
}

/**
 * Converts a parsed JSON document into a ProjectConfig.
 *
 * @throws ConfigurationError when the document fails validation
 */
export function toProjectConfig(raw: unknown, source: string): ProjectConfig {
  const result = validateProjectConfig(raw);
  if (!result.valid || !isRecord(raw)) {
    throw new ConfigurationError(`Invalid configuration in ${source}:\n- ${result.errors.join('\n- ')}`, {
      source,
      errors: result.errors,
    });
  }
  const config: ProjectConfig = pickTargetConfig(raw);
  if (typeof raw.defaultTarget === 'string') {
    config.defaultTarget = raw.defaultTarget;
  }
  if (typeof raw.target === 'string') {
    config.target = raw.target;
  }
  if (isRecord(raw.targets)) {
    const targets: Record<string, TargetConfig> = {};
    for (const [name, target] of Object.entries(raw.targets)) {
      if (isRecord(target)) {
        targets[name] = pickTargetConfig(target);
      }
    }
    config.targets = targets;
  }
  return config;
}

/**
 * Loads configuration from a file path.
 *
 * @param configPath - Path to the configuration file
 * @returns The parsed configuration object
 * @throws ConfigurationError if the file cannot be read, parsed or validated
 */
export function loadConfigFile(configPath: string): ProjectConfig {
  let raw: unknown;
  try {
    raw = configPath.endsWith('package.json')
      ? (readPackageSection(configPath) ?? {})
      : JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Cannot read ${configPath}: ${getErrorMessage(err)}`, {
      configPath,
    });
  }
  return toProjectConfig(raw, configPath);
}

/**
 * Determines the starting directory for configuration search.
 */
export function getConfigSearchStartDir(args: LaunchRequestArguments, cwd = process.cwd()): string {
  if (args.program !== undefined && args.program !== '') {
    return path.dirname(path.resolve(cwd, args.program));
  }
  return cwd;
}

/**
 * Gets the list of default configuration file candidates.
 *
 * @param projectConfig - Optional explicit config path from args
 */
export function getConfigCandidates(projectConfig?: string): string[] {
  const candidates: string[] = [];

  if (projectConfig !== undefined && projectConfig !== '') {
    candidates.push(projectConfig);
  }

  candidates.push('bfcpu.json');
  candidates.push('.bfcpu.json');
  candidates.push(path.join('.vscode', 'bfcpu.json'));

  return candidates;
}

/**
 * Merges configuration from file with launch request arguments.
 * Priority: args > targetCfg > rootCfg. The `machine` section merges per field.
 */
export function mergeConfig(args: LaunchRequestArguments, cfg: ProjectConfig): LaunchRequestArguments {
  const targets = cfg.targets ?? {};
  const targetName = args.target ?? cfg.target ?? cfg.defaultTarget ?? Object.keys(targets)[0];
  const targetCfg = targetName !== undefined ? targets[targetName] : undefined;

  const { targets: _targets, defaultTarget: _defaultTarget, target: _target, ...rootCfg } = cfg;
  const merged: LaunchRequestArguments = {
    ...rootCfg,
    ...targetCfg,
    ...args,
  };

  const machine: MachineConfig = {
    ...cfg.machine,
    ...targetCfg?.machine,
    ...args.machine,
  };
  if (Object.keys(machine).length > 0) {
    merged.machine = machine;
  }

  if (targetName !== undefined) {
    merged.target = targetName;
  }

  return merged;
}

function resolveTargetPaths<T extends TargetConfig>(target: T, baseDir: string): T {
  const resolved: T = { ...target };
  if (target.program !== undefined && target.program !== '') {
    resolved.program = path.resolve(baseDir, target.program);
  }
  if (target.machine?.bootImage !== undefined) {
    resolved.machine = {
      ...target.machine,
      bootImage: path.resolve(baseDir, target.machine.bootImage),
    };
  }
  return resolved;
}

/**
 * Resolves `program` and `machine.bootImage` in the root and every target against `baseDir`.
 */
export function resolveConfigPaths(cfg: ProjectConfig, baseDir: string): ProjectConfig {
  const resolved = resolveTargetPaths(cfg, baseDir);
  if (cfg.targets !== undefined) {
    const targets: Record<string, TargetConfig> = {};
    for (const [name, target] of Object.entries(cfg.targets)) {
      targets[name] = resolveTargetPaths(target, baseDir);
    }
    resolved.targets = targets;
  }
  return resolved;
}

/**
 * Populates launch arguments from a configuration file.
 * Searches for config file and merges with provided arguments. Paths inside the
 * file are taken relative to the file's directory.
 *
 * @returns Merged arguments and the config path used, if any
 */
export function populateFromConfig(
  args: LaunchRequestArguments,
  cwd = process.cwd()
): { args: LaunchRequestArguments; configPath?: string } {
  const configCandidates = getConfigCandidates(args.projectConfig);
  const startDir = getConfigSearchStartDir(args, cwd);
  const configPath = findConfigFile(startDir, configCandidates);

  if (configPath === undefined) {
    return { args };
  }

  const configDir = path.dirname(configPath);
  const baseDir = path.basename(configDir) === '.vscode' ? path.dirname(configDir) : configDir;
  const cfg = resolveConfigPaths(loadConfigFile(configPath), baseDir);
  return { args: mergeConfig(args, cfg), configPath };
}
