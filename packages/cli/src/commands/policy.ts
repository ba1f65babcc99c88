import { Command } from 'commander';
import { loadConfig, openSession, type GlobalOptions, type SessionFlags } from '../context';
import { OutputRenderer } from '../output/renderer';

export function registerPolicyCommand(program: Command) {
  program
    .command('policy')
    .description('Print the effective policy, one fact per line')
    .option('--root <dir>', 'Project root the policy is bound to')
    .option('--preset <name>', 'Policy preset: restricted or permissive')
    .action((options: SessionFlags) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(Boolean(globalOpts.json));
      const session = openSession(loadConfig(program, options));
      renderer.renderPolicy(session.policy);
    });
}
