import type { Command } from 'commander';
import { ConfigLoader, createGuardSession, createLogger, type GuardSession } from '@shellgate/core';
import {
  PolicyPresetNameSchema,
  UsageError,
  type Config,
  type ConfigInput,
  type PolicyPresetName,
} from '@shellgate/shared';

export interface GlobalOptions {
  json?: boolean;
  config?: string;
  verbose?: boolean;
  yes?: boolean;
  nonInteractive?: boolean;
}

export interface SessionFlags {
  root?: string;
  preset?: string;
}

export function parsePreset(value: string): PolicyPresetName {
  const result = PolicyPresetNameSchema.safeParse(value);
  if (!result.success) {
    throw new UsageError(
      `Unknown preset "${value}"; expected one of: ${PolicyPresetNameSchema.options.join(', ')}`,
    );
  }
  return result.data;
}

/**
 * Loads the layered configuration with command-line flags on top.
 */
export function loadConfig(program: Command, flags: SessionFlags = {}): Config {
  const globalOpts = program.opts<GlobalOptions>();
  const configFlags: ConfigInput = {};

  if (flags.root) {
    configFlags.projectRoot = flags.root;
  }
  if (flags.preset) {
    configFlags.policy = { preset: parsePreset(flags.preset) };
  }
  if (globalOpts.verbose) {
    configFlags.logging = { level: 'debug' };
  }

  return ConfigLoader.load({
    configPath: globalOpts.config,
    flags: configFlags,
    cwd: process.cwd(),
  });
}

/**
 * Opens a guard session. Without a configured root the session is confined to `fallbackRoot`.
 */
export function openSession(config: Config, fallbackRoot: string = process.cwd()): GuardSession {
  return createGuardSession({
    config,
    projectRoot: config.projectRoot ?? fallbackRoot,
    logger: createLogger(config.logging),
  });
}
