export const name = '@shellgate/core';

export { ConfigLoader, PROJECT_ROOT_ENV, REPO_CONFIG_FILE, USER_CONFIG_DIR } from './config/loader';
export type { ConfigOptions } from './config/loader';
export { createLogger } from './logging';
export { createGuardSession, resolvePolicy } from './session';
export type { GuardSession, GuardSessionOptions } from './session';
export {
  createPreToolUseHook,
  parseHookInput,
  HookInputSchema,
  GUARDED_TOOL,
} from './hooks/pre-tool-use';
export type { HookInput, HookOutput, PermissionDecision, PreToolUseHook } from './hooks/pre-tool-use';
export {
  resolveApiKey,
  resolveCliPath,
  buildSecuritySettings,
  writeSecuritySettings,
  SETTINGS_FILE_NAME,
  DEFAULT_API_KEY_ENV,
  DEFAULT_CLI_PATH_ENV,
  FILE_PERMISSIONS,
} from './agent/settings';
export type { CliPathOptions, Profile, SecuritySettings } from './agent/settings';
export { buildAgentOptions, BUILTIN_TOOLS, DEFAULT_MAX_TURNS, DEFAULT_SYSTEM_PROMPT } from './agent/options';
export type { AgentOptions, AgentOptionsInput, HookMatcher, McpServerConfig } from './agent/options';
