import pc from 'picocolors';
import { describePolicy, formatVerdict, type Policy, type Verdict } from '@shellgate/exec';

export type CheckStatus = 'ok' | 'warn' | 'fail';

export interface CheckResult {
  status: CheckStatus;
  message: string;
}

const CHECKS: Record<CheckStatus, string> = {
  ok: pc.green('✔'),
  warn: pc.yellow('!'),
  fail: pc.red('✖'),
};

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  renderVerdict(command: string, verdict: Verdict): void {
    if (this.isJson) {
      console.log(JSON.stringify({ command, verdict }, null, 2));
      return;
    }
    if (verdict.kind === 'allow') {
      console.log(pc.green(formatVerdict(verdict)));
    } else {
      console.log(pc.red(formatVerdict(verdict)));
    }
  }

  renderPolicy(policy: Policy): void {
    if (this.isJson) {
      console.log(
        JSON.stringify(
          {
            name: policy.name,
            projectRoot: policy.projectRoot,
            maxCommandLength: policy.maxCommandLength,
            allowedPrograms: [...policy.allowedPrograms].sort(),
            trustedBinDirs: policy.trustedBinDirs,
            deniedPatterns: policy.deniedPatterns.map(({ id, description, pattern }) => ({
              id,
              description,
              pattern: pattern.source,
            })),
            argumentRules: policy.argumentRules,
          },
          null,
          2,
        ),
      );
      return;
    }
    console.log(describePolicy(policy));
  }

  renderChecks(title: string, results: CheckResult[]): void {
    if (this.isJson) {
      console.log(JSON.stringify({ checks: results }, null, 2));
      return;
    }
    console.log(pc.bold(title));
    console.log('---------------------------------');
    results.forEach(({ status, message }) => {
      console.log(`${CHECKS[status]} ${message}`);
    });
    console.log('---------------------------------');
    if (results.some(({ status }) => status === 'fail')) {
      console.log(`${pc.red(pc.bold('Checks failed.'))} Resolve the issues marked with ${CHECKS.fail}`);
    } else {
      console.log(pc.green(pc.bold('All checks passed.')));
    }
  }

  log(message: string): void {
    if (this.isJson) {
      // JSON mode should not have logs
    } else {
      console.log(pc.gray(message));
    }
  }

  error(message: string | Error): void {
    const msg = message instanceof Error ? message.message : message;
    if (this.isJson) {
      console.error(JSON.stringify({ error: msg }));
    } else {
      console.error(pc.red(msg));
    }
  }
}
