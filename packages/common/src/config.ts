/**
 * Configuration Loader
 *
 * Builds the immutable DevtreeConfig every component receives through its
 * constructor. Sources, lowest precedence first: built-in defaults,
 * `<configDir>/config.json`, DEVTREE_* environment variables.
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { ValidationError } from './errors.js';
import { err, ok, type Result } from './types.js';
import { expandHome } from './utils.js';
import { configFileSchema, portSchema, validate, type ConfigFile } from './validation.js';

export interface DevtreeConfig {
  configDir: string;
  /** One absolute project path per line */
  projectsFile: string;
  /** `timestamp|project|branch` lines */
  recentFile: string;
  lockDir: string;
  worktreesDirName: string;
  envFileName: string;
  envTemplateNames: readonly string[];
  basePort: number;
  portStep: number;
  maxAllocationAttempts: number;
  staleLockMaxAgeMs: number;
  recentLimit: number;
  sessionKillGraceMs: number;
  multiplexerBinary: string;
  layoutFileName: string;
  defaultLayoutFile: string;
  setupDir: string;
  sharedResources: readonly string[];
}

export const CONFIG_FILE_NAME = 'config.json';

export function defaultConfigDir(): string {
  return join(homedir(), '.config', 'devtree');
}

/**
 * Build a config rooted at `configDir` from explicit values. Paths derived
 * from the config dir follow it unless given.
 */
export function createConfig(overrides: Partial<DevtreeConfig> = {}): DevtreeConfig {
  const configDir = resolve(expandHome(overrides.configDir ?? defaultConfigDir()));
  return Object.freeze({
    projectsFile: join(configDir, 'projects'),
    recentFile: join(configDir, 'recent'),
    lockDir: join(configDir, 'locks'),
    worktreesDirName: '.worktrees',
    envFileName: '.env',
    envTemplateNames: ['.env.example', '.env.sample'],
    basePort: 3000,
    portStep: 10,
    maxAllocationAttempts: 100,
    staleLockMaxAgeMs: 60 * 60 * 1000,
    recentLimit: 3,
    sessionKillGraceMs: 500,
    multiplexerBinary: 'zellij',
    layoutFileName: '.zellij-layout.kdl',
    defaultLayoutFile: join(configDir, 'layout.kdl'),
    setupDir: join(configDir, 'setup.d'),
    sharedResources: [],
    ...overrides,
    configDir,
  });
}

export interface LoadConfigOptions {
  configDir?: string;
  env?: NodeJS.ProcessEnv;
}

function parseIntEnv(name: string, value: string | undefined): Result<number | undefined, ValidationError> {
  if (value === undefined || value === '') return ok(undefined);
  if (!/^\d+$/.test(value)) {
    return err(new ValidationError(`${name} must be an integer, got '${value}'`));
  }
  return ok(parseInt(value, 10));
}

function readConfigFile(path: string): Result<ConfigFile, ValidationError> {
  if (!existsSync(path)) return ok({});

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    return err(new ValidationError(`Invalid config file ${path}: ${error instanceof Error ? error.message : String(error)}`));
  }

  const parsed = validate(configFileSchema, raw);
  if (!parsed.success) {
    return err(new ValidationError(`Invalid config file ${path}: ${parsed.error}`));
  }
  return ok(parsed.data);
}

/**
 * Load configuration from disk and environment
 */
export function loadConfig(options: LoadConfigOptions = {}): Result<DevtreeConfig, ValidationError> {
  const env = options.env ?? process.env;
  const configDir = resolve(expandHome(options.configDir ?? env.DEVTREE_CONFIG_DIR ?? defaultConfigDir()));

  const file = readConfigFile(join(configDir, CONFIG_FILE_NAME));
  if (!file.success) return file;

  const basePort = parseIntEnv('DEVTREE_BASE_PORT', env.DEVTREE_BASE_PORT);
  if (!basePort.success) return basePort;
  if (basePort.data !== undefined) {
    const checked = validate(portSchema, basePort.data);
    if (!checked.success) {
      return err(new ValidationError(`DEVTREE_BASE_PORT: ${checked.error}`));
    }
  }

  const portStep = parseIntEnv('DEVTREE_PORT_STEP', env.DEVTREE_PORT_STEP);
  if (!portStep.success) return portStep;
  if (portStep.data === 0) {
    return err(new ValidationError('DEVTREE_PORT_STEP must be at least 1'));
  }

  const { defaultLayoutFile, setupDir, ...rest } = file.data;

  return ok(createConfig({
    ...rest,
    configDir,
    ...(defaultLayoutFile && { defaultLayoutFile: resolve(configDir, expandHome(defaultLayoutFile)) }),
    ...(setupDir && { setupDir: resolve(configDir, expandHome(setupDir)) }),
    ...(basePort.data !== undefined && { basePort: basePort.data }),
    ...(portStep.data !== undefined && { portStep: portStep.data }),
    ...(env.DEVTREE_MULTIPLEXER && { multiplexerBinary: env.DEVTREE_MULTIPLEXER }),
  }));
}
