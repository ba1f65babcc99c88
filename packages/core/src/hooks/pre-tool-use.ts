import { z } from 'zod';
import { UsageError } from '@shellgate/shared';
import type { GuardSession } from '../session';

export const HookInputSchema = z
  .object({
    tool_name: z.string(),
    tool_input: z.record(z.string(), z.unknown()).default({}),
    hook_event_name: z.string().optional(),
    session_id: z.string().optional(),
    cwd: z.string().optional(),
  })
  .passthrough();

export type HookInput = z.input<typeof HookInputSchema>;

export type PermissionDecision = 'allow' | 'deny';

export interface HookOutput {
  hookSpecificOutput?: {
    hookEventName: 'PreToolUse';
    permissionDecision: PermissionDecision;
    permissionDecisionReason: string;
  };
}

export type PreToolUseHook = (input: HookInput) => Promise<HookOutput>;

/** Tool whose calls are classified; every other tool gets no opinion. */
export const GUARDED_TOOL = 'Bash';

/**
 * Adapts a guard session to the agent runtime's PreToolUse hook protocol.
 */
export function createPreToolUseHook(session: GuardSession): PreToolUseHook {
  return async (input) => {
    if (input.tool_name !== GUARDED_TOOL) {
      return {};
    }

    const verdict = session.check(input.tool_input?.command);
    return {
      hookSpecificOutput: {
        hookEventName: 'PreToolUse',
        permissionDecision: verdict.kind,
        permissionDecisionReason:
          verdict.kind === 'allow' ? `allowed by policy ${session.policy.name}` : verdict.reason,
      },
    };
  };
}

/**
 * Parses the JSON document the agent runtime writes to a hook's stdin.
 *
 * @throws UsageError when the text is not JSON or not a hook input.
 */
export function parseHookInput(raw: string): HookInput {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new UsageError('Hook input is not valid JSON', { cause: error });
  }

  const result = HookInputSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `- ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new UsageError(`Hook input is invalid:\n${issues}`);
  }
  return result.data;
}
