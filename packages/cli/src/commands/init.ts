import { Command } from 'commander';
import { promises as fs } from 'fs';
import path from 'path';
import {
  REPO_CONFIG_FILE,
  SETTINGS_FILE_NAME,
  buildSecuritySettings,
  writeSecuritySettings,
} from '@shellgate/core';
import { UsageError, type PolicyPresetName } from '@shellgate/shared';
import { parsePreset, type GlobalOptions } from '../context';
import { OutputRenderer } from '../output/renderer';
import { ConsoleUI, type UserInterface } from '../ui/console';

export function defaultConfig(profile: PolicyPresetName): string {
  return `
# shellgate configuration

configVersion: 1

policy:
  # restricted: small allowlist, paired with the OS sandbox
  # permissive: wider toolchain and backgrounding, no sandbox
  preset: ${profile}
  # Programs added to or removed from the preset allowlist.
  allow: []
  deny: []
  # Extra denied patterns, checked after the built-in ones.
  # deniedPatterns:
  #   - id: no-force-push
  #     description: force push
  #     pattern: 'push\\s+(--force|-f)\\b'

logging:
  level: info
  # One JSON line per classified command.
  # auditLog: .shellgate/audit.jsonl

agent:
  apiKeyEnv: [ANTHROPIC_API_KEY, CLAUDE_CODE_OAUTH_TOKEN]
  cliPathEnv: CLAUDE_CLI_PATH
  maxTurns: 1000
`;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

interface InitOptions {
  profile: string;
  tool?: string[];
}

export function registerInitCommand(program: Command, ui: UserInterface = new ConsoleUI()) {
  program
    .command('init')
    .description(`Write ${REPO_CONFIG_FILE} and the agent security settings into a project`)
    .argument('[dir]', 'Project directory', '.')
    .option('--profile <name>', 'restricted (sandboxed) or permissive', 'restricted')
    .option('--tool <name...>', 'Extra tool permissions, e.g. MCP tools')
    .action(async (dir: string, options: InitOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(Boolean(globalOpts.json));
      const profile = parsePreset(options.profile);
      const projectDir = path.resolve(dir);
      const settingsPath = path.join(projectDir, SETTINGS_FILE_NAME);

      if (await exists(settingsPath)) {
        if (!globalOpts.yes) {
          if (globalOpts.nonInteractive) {
            throw new UsageError(`${settingsPath} already exists; pass --yes to overwrite it`);
          }
          const overwrite = await ui.confirm(
            `${SETTINGS_FILE_NAME} already exists. Overwrite it?`,
            `Existing settings: ${settingsPath}`,
            true,
          );
          if (!overwrite) {
            renderer.log('Aborted.');
            return;
          }
        }
      }

      const written = await writeSecuritySettings(
        projectDir,
        buildSecuritySettings(profile, options.tool ?? []),
      );
      renderer.log(`Created security settings at ${written}`);
      renderer.log(`  - Sandbox ${profile === 'restricted' ? 'enabled' : 'disabled'}`);
      renderer.log(`  - Filesystem restricted to: ${projectDir}`);

      const configPath = path.join(projectDir, REPO_CONFIG_FILE);
      if (await exists(configPath)) {
        renderer.log(`Kept existing ${configPath}`);
      } else {
        await fs.writeFile(configPath, defaultConfig(profile).trimStart(), 'utf8');
        renderer.log(`Created ${configPath}`);
      }

      if (globalOpts.json) {
        console.log(JSON.stringify({ settingsPath: written, configPath, profile }, null, 2));
      }
    });
}
