import { Command } from 'commander';
import { PROJECT_ROOT_ENV, createPreToolUseHook, parseHookInput } from '@shellgate/core';
import { UsageError } from '@shellgate/shared';
import { loadConfig, openSession, type SessionFlags } from '../context';

export async function readStdin(stream: NodeJS.ReadableStream = process.stdin): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}

/**
 * Reads one PreToolUse payload from stdin and writes the decision to stdout.
 * The project root comes from `--root` or configuration, never from the payload.
 * Errors exit with code 2, which the agent runtime treats as a blocking hook failure.
 */
export function registerHookCommand(program: Command, input: () => Promise<string> = readStdin) {
  program
    .command('hook')
    .description('Answer a PreToolUse hook call: JSON on stdin, decision JSON on stdout')
    .option('--root <dir>', `Project root (required unless set in configuration or ${PROJECT_ROOT_ENV})`)
    .option('--preset <name>', 'Policy preset: restricted or permissive')
    .action(async (options: SessionFlags) => {
      const payload = parseHookInput(await input());
      const config = loadConfig(program, options);
      if (config.projectRoot === undefined) {
        throw new UsageError(
          `hook needs a project root; pass --root, set projectRoot or set ${PROJECT_ROOT_ENV}`,
        );
      }
      const session = openSession(config, config.projectRoot);

      const output = await createPreToolUseHook(session)(payload);
      console.log(JSON.stringify(output));
    });
}
