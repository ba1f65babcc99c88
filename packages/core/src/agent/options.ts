import path from 'path';
import { createPreToolUseHook, GUARDED_TOOL, type PreToolUseHook } from '../hooks/pre-tool-use';
import type { GuardSession } from '../session';
import type { Profile } from './settings';

export const BUILTIN_TOOLS = ['Read', 'Write', 'Edit', 'Glob', 'Grep', 'Bash'];

export const DEFAULT_SYSTEM_PROMPT =
  'You are an expert full-stack developer building a production-quality web application.';

export const DEFAULT_MAX_TURNS = 1000;

export interface McpServerConfig {
  command: string;
  args?: string[];
  env?: Record<string, string>;
}

export interface HookMatcher {
  matcher: string;
  hooks: PreToolUseHook[];
}

/**
 * Plain-data options for an agent client. Field names follow the agent runtime's options object.
 */
export interface AgentOptions {
  model: string;
  systemPrompt: string;
  allowedTools: string[];
  mcpServers: Record<string, McpServerConfig>;
  hooks: { PreToolUse: HookMatcher[] };
  maxTurns: number;
  cwd: string;
  settings: string;
  cliPath?: string;
  /** Informational; which preset and sandbox pairing produced these options */
  profile: Profile;
}

export interface AgentOptionsInput {
  projectDir: string;
  model: string;
  profile: Profile;
  session: GuardSession;
  settingsPath: string;
  cliPath?: string;
  systemPrompt?: string;
  maxTurns?: number;
  mcpServers?: Record<string, McpServerConfig>;
  /** Tool names granted on top of the built-ins, e.g. MCP tools */
  extraTools?: string[];
}

export function buildAgentOptions(input: AgentOptionsInput): AgentOptions {
  const options: AgentOptions = {
    model: input.model,
    systemPrompt: input.systemPrompt ?? DEFAULT_SYSTEM_PROMPT,
    allowedTools: [...BUILTIN_TOOLS, ...(input.extraTools ?? [])],
    mcpServers: { ...input.mcpServers },
    hooks: {
      PreToolUse: [{ matcher: GUARDED_TOOL, hooks: [createPreToolUseHook(input.session)] }],
    },
    maxTurns: input.maxTurns ?? DEFAULT_MAX_TURNS,
    cwd: path.resolve(input.projectDir),
    settings: path.resolve(input.settingsPath),
    profile: input.profile,
  };
  if (input.cliPath) {
    options.cliPath = input.cliPath;
  }
  return options;
}
