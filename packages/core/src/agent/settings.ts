import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigError, type PolicyPresetName } from '@shellgate/shared';

/**
 * `restricted` pairs the restricted preset with the OS sandbox;
 * `permissive` runs unsandboxed with the permissive preset.
 */
export type Profile = PolicyPresetName;

export const SETTINGS_FILE_NAME = '.agent-settings.json';

export const DEFAULT_API_KEY_ENV = ['ANTHROPIC_API_KEY', 'CLAUDE_CODE_OAUTH_TOKEN'];
export const DEFAULT_CLI_PATH_ENV = 'CLAUDE_CLI_PATH';

/** File tools are scoped to the working directory through relative globs. */
export const FILE_PERMISSIONS = [
  'Read(./**)',
  'Write(./**)',
  'Edit(./**)',
  'Glob(./**)',
  'Grep(./**)',
  // Granted wholesale; individual commands go through the PreToolUse hook.
  'Bash(*)',
];

export interface SecuritySettings {
  sandbox: {
    enabled: boolean;
    autoAllowBashIfSandboxed: boolean;
  };
  permissions: {
    defaultMode: 'acceptEdits';
    allow: string[];
  };
}

export function resolveApiKey(
  env: NodeJS.ProcessEnv = process.env,
  names: readonly string[] = DEFAULT_API_KEY_ENV,
): string {
  for (const name of names) {
    const value = env[name];
    if (value) {
      return value;
    }
  }
  throw new ConfigError(`None of these environment variables is set: ${names.join(', ')}`, {
    details: { names },
  });
}

export interface CliPathOptions {
  env?: NodeJS.ProcessEnv;
  envName?: string;
  homeDir?: string;
  exists?: (filePath: string) => boolean;
  configured?: string;
}

/**
 * Locates the agent CLI. Returns `undefined` when the runtime should search PATH itself.
 */
export function resolveCliPath(options: CliPathOptions = {}): string | undefined {
  const env = options.env ?? process.env;
  const exists = options.exists ?? fs.existsSync;

  if (options.configured) {
    return options.configured;
  }
  const fromEnv = env[options.envName ?? DEFAULT_CLI_PATH_ENV];
  if (fromEnv) {
    return fromEnv;
  }

  const localInstall = path.join(options.homeDir ?? os.homedir(), '.claude', 'local', 'claude');
  return exists(localInstall) ? localInstall : undefined;
}

export function buildSecuritySettings(
  profile: Profile,
  extraTools: readonly string[] = [],
): SecuritySettings {
  const sandboxed = profile === 'restricted';
  return {
    sandbox: { enabled: sandboxed, autoAllowBashIfSandboxed: sandboxed },
    permissions: {
      defaultMode: 'acceptEdits',
      allow: [...FILE_PERMISSIONS, ...extraTools],
    },
  };
}

/**
 * Writes the settings document into `projectDir`, creating the directory if needed.
 * Returns the absolute path of the written file.
 */
export async function writeSecuritySettings(
  projectDir: string,
  settings: SecuritySettings,
): Promise<string> {
  const dir = path.resolve(projectDir);
  await fs.promises.mkdir(dir, { recursive: true });
  const filePath = path.join(dir, SETTINGS_FILE_NAME);
  await fs.promises.writeFile(filePath, JSON.stringify(settings, null, 2) + '\n', 'utf8');
  return filePath;
}
