import { Command } from 'commander';
import { loadConfig, openSession, type GlobalOptions, type SessionFlags } from '../context';
import { OutputRenderer } from '../output/renderer';

export function registerCheckCommand(program: Command) {
  program
    .command('check')
    .description('Classify a shell command; exits 0 when allowed and 1 when denied')
    .argument('<command...>', 'Command to classify (quote it to keep operators intact)')
    .option('--root <dir>', 'Project root the command is confined to')
    .option('--preset <name>', 'Policy preset: restricted or permissive')
    .action((parts: string[], options: SessionFlags) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(Boolean(globalOpts.json));

      const session = openSession(loadConfig(program, options));
      const command = parts.join(' ');
      const verdict = session.check(command);

      renderer.renderVerdict(command, verdict);
      process.exitCode = verdict.kind === 'allow' ? 0 : 1;
    });
}
