import { randomUUID } from 'crypto';
import {
  classify,
  createPolicy,
  extendPolicyDefinition,
  formatVerdict,
  getPolicyPreset,
  type Policy,
  type Verdict,
} from '@shellgate/exec';
import {
  PolicyConfigurationError,
  logger as defaultLogger,
  redactString,
  type CommandClassified,
  type Config,
  type Logger,
  type MaybePromise,
  type SessionStarted,
} from '@shellgate/shared';
import { PROJECT_ROOT_ENV } from './config/loader';

const EVENT_SCHEMA_VERSION = 1;

export interface GuardSessionOptions {
  config: Config;
  /** Overrides `config.projectRoot` */
  projectRoot?: string;
  logger?: Logger;
  sessionId?: string;
}

export interface GuardSession {
  readonly policy: Policy;
  readonly sessionId: string;
  check(command: unknown): Verdict;
}

/**
 * Resolves the configured preset and overrides into a policy bound to `projectRoot`.
 *
 * @throws PolicyConfigurationError
 */
export function resolvePolicy(config: Config, projectRoot: string): Policy {
  const definition = extendPolicyDefinition(getPolicyPreset(config.policy.preset), config.policy);
  return createPolicy(definition, projectRoot);
}

/**
 * One-time setup of the checkpoint. Any configuration problem throws here,
 * before a single command has been seen.
 */
export function createGuardSession(options: GuardSessionOptions): GuardSession {
  const projectRoot = options.projectRoot ?? options.config.projectRoot;
  if (!projectRoot) {
    throw new PolicyConfigurationError(
      `No project root configured; set projectRoot or ${PROJECT_ROOT_ENV}`,
    );
  }

  const policy = resolvePolicy(options.config, projectRoot);
  const sessionId = options.sessionId ?? randomUUID();
  const log = (options.logger ?? defaultLogger).child({ session: sessionId.slice(0, 8) });

  const started: SessionStarted = {
    schemaVersion: EVENT_SCHEMA_VERSION,
    timestamp: new Date().toISOString(),
    sessionId,
    type: 'SessionStarted',
    payload: {
      policy: policy.name,
      projectRoot: policy.projectRoot,
      allowedProgramCount: policy.allowedPrograms.size,
      deniedPatternCount: policy.deniedPatterns.length,
    },
  };
  record(() => log.log(started));
  record(() => log.debug(`Policy ${policy.name} active for ${policy.projectRoot}`));

  return Object.freeze({
    policy,
    sessionId,
    check(command: unknown): Verdict {
      const verdict = classify(command, policy);
      const shown = typeof command === 'string' ? redactString(command).redacted : `<${typeof command}>`;

      const event: CommandClassified = {
        schemaVersion: EVENT_SCHEMA_VERSION,
        timestamp: new Date().toISOString(),
        sessionId,
        type: 'CommandClassified',
        payload:
          verdict.kind === 'allow'
            ? { command: shown, decision: 'allow' }
            : {
                command: shown,
                decision: 'deny',
                rule: verdict.rule,
                reason: verdict.reason,
                detail: verdict.detail === undefined ? undefined : redactString(verdict.detail).redacted,
              },
      };

      record(() => log.log(event));
      if (verdict.kind === 'allow') {
        record(() => log.debug(`ALLOW ${shown}`));
      } else {
        record(() => log.warn(redactString(`${formatVerdict(verdict)}: ${shown}`).redacted));
      }

      return verdict;
    },
  });
}

/**
 * Runs a logging call; failures are reported on stderr and never reach the caller.
 */
function record(write: () => MaybePromise<void>): void {
  const report = (error: unknown) => {
    console.error('Failed to record command verdict', error);
  };
  try {
    const result = write();
    if (result instanceof Promise) {
      result.catch(report);
    }
  } catch (error) {
    report(error);
  }
}
