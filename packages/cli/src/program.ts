import { Command } from 'commander';
import { version } from '../package.json';
import { registerCheckCommand } from './commands/check';
import { registerDoctorCommand } from './commands/doctor';
import { registerHookCommand } from './commands/hook';
import { registerInitCommand } from './commands/init';
import { registerPolicyCommand } from './commands/policy';

export const name = '@shellgate/cli';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('shellgate')
    .description('Pre-execution allowlist checkpoint for agent shell commands')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .option('--yes', 'Automatically answer "yes" to all prompts')
    .option('--non-interactive', 'Disable interactive prompts (fail if prompt needed)');

  registerCheckCommand(program);
  registerHookCommand(program);
  registerPolicyCommand(program);
  registerInitCommand(program);
  registerDoctorCommand(program);

  return program;
}
