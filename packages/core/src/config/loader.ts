import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigError, ConfigSchema, type Config, type ConfigInput } from '@shellgate/shared';

export const USER_CONFIG_DIR = '.shellgate';
export const REPO_CONFIG_FILE = '.shellgate.yaml';
export const PROJECT_ROOT_ENV = 'SHELLGATE_PROJECT_ROOT';

export interface ConfigOptions {
  configPath?: string; // CLI override
  flags?: ConfigInput; // CLI flags
  cwd?: string; // Current working directory (for repo config)
  env?: NodeJS.ProcessEnv; // Environment variables
}

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigRecord {
    let parsed: unknown;
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      const content = fs.readFileSync(filePath, 'utf8');
      parsed = yaml.load(content);
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }

    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  static mergeConfigs(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
    const output: ConfigRecord = { ...target };

    for (const key of Object.keys(source)) {
      const sourceValue = source[key];
      if (sourceValue === undefined) {
        continue;
      }

      const targetValue = output[key];
      if (isRecord(sourceValue) && isRecord(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        // Arrays and primitives replace
        output[key] = sourceValue;
      }
    }
    return output;
  }

  static load(options: ConfigOptions = {}): Config {
    const cwd = options.cwd || process.cwd();
    const env = options.env || process.env;

    // 1. User config: ~/.shellgate/config.yaml
    const userConfigPath = path.join(os.homedir(), USER_CONFIG_DIR, 'config.yaml');
    const userConfig = this.loadYaml(userConfigPath);

    // 2. Repo config: <cwd>/.shellgate.yaml
    const repoConfigPath = path.join(cwd, REPO_CONFIG_FILE);
    const repoConfig = this.loadYaml(repoConfigPath);

    // 3. Explicit --config file (if provided)
    let explicitConfig: ConfigRecord = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // 4. CLI flags
    const flagConfig: ConfigRecord = options.flags ?? {};

    // Precedence: flags > explicit > repo > user
    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, repoConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, flagConfig);

    if (merged.projectRoot === undefined && env[PROJECT_ROOT_ENV]) {
      merged.projectRoot = env[PROJECT_ROOT_ENV];
    }

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    const config = result.data;
    if (config.projectRoot !== undefined) {
      config.projectRoot = path.resolve(cwd, config.projectRoot);
    }
    return config;
  }
}
