import { Command } from 'commander';
import { promises as fs } from 'fs';
import path from 'path';
import which from 'which';
import {
  SETTINGS_FILE_NAME,
  resolveApiKey,
  resolveCliPath,
  type GuardSession,
} from '@shellgate/core';
import type { Config } from '@shellgate/shared';
import { loadConfig, openSession, type GlobalOptions, type SessionFlags } from '../context';
import { OutputRenderer, type CheckResult } from '../output/renderer';

function checkApiKey(config: Config, env: NodeJS.ProcessEnv): CheckResult {
  try {
    resolveApiKey(env, config.agent.apiKeyEnv);
    const name = config.agent.apiKeyEnv.find((n) => env[n]);
    return { status: 'ok', message: `API key found in ${name}` };
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return { status: 'warn', message };
  }
}

async function checkAgentCli(config: Config, env: NodeJS.ProcessEnv): Promise<CheckResult> {
  const resolved = resolveCliPath({ env, envName: config.agent.cliPathEnv, configured: config.agent.cliPath });
  if (resolved) {
    return { status: 'ok', message: `Agent CLI at: ${resolved}` };
  }
  const onPath = await which('claude', { nothrow: true });
  if (onPath) {
    return { status: 'ok', message: `Agent CLI found in PATH: ${onPath}` };
  }
  return { status: 'warn', message: 'Agent CLI not found; the runtime will fail to start.' };
}

async function checkSettingsFile(session: GuardSession): Promise<CheckResult> {
  const settingsPath = path.join(session.policy.projectRoot, SETTINGS_FILE_NAME);
  try {
    await fs.access(settingsPath);
    return { status: 'ok', message: `Security settings at ${settingsPath}` };
  } catch {
    return { status: 'warn', message: `No ${SETTINGS_FILE_NAME}; run \`shellgate init\`.` };
  }
}

export function registerDoctorCommand(program: Command, env: NodeJS.ProcessEnv = process.env) {
  program
    .command('doctor')
    .description('Check configuration, policy and agent prerequisites')
    .option('--root <dir>', 'Project root to check')
    .option('--preset <name>', 'Policy preset: restricted or permissive')
    .action(async (options: SessionFlags) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(Boolean(globalOpts.json));
      const results: CheckResult[] = [];

      try {
        const config = loadConfig(program, options);
        results.push({ status: 'ok', message: 'Configuration loaded.' });

        const session = openSession(config);
        results.push({
          status: 'ok',
          message: `Policy ${session.policy.name}: ${session.policy.allowedPrograms.size} programs, ${session.policy.deniedPatterns.length} denied patterns, root ${session.policy.projectRoot}`,
        });

        results.push(checkApiKey(config, env));
        results.push(await checkAgentCli(config, env));
        results.push(await checkSettingsFile(session));
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        results.push({ status: 'fail', message });
      }

      renderer.renderChecks('shellgate environment checkup', results);
      if (results.some(({ status }) => status === 'fail')) {
        process.exitCode = 1;
      }
    });
}
