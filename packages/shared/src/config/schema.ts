import { z } from 'zod';

/**
 * Argument restrictions for programs that are only safe with a narrow set of arguments.
 */
export const ArgumentRuleSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('chmod-executable'),
  }),
  z.object({
    kind: z.literal('process-names'),
    allowed: z.array(z.string().min(1)).min(1),
  }),
  z.object({
    kind: z.literal('local-script'),
  }),
]);

export type ArgumentRule = z.infer<typeof ArgumentRuleSchema>;

export const DeniedPatternSchema = z.object({
  id: z.string().min(1),
  description: z.string().min(1).describe('Reported as the denial reason'),
  pattern: z.string().min(1).describe('Regular expression source'),
  flags: z
    .string()
    .regex(/^[imsu]*$/, 'only the i, m, s and u flags are supported')
    .optional(),
});

export type DeniedPatternDefinition = z.infer<typeof DeniedPatternSchema>;

/**
 * A static, versioned policy artifact. Kept as flat lists so that changes review as plain diffs.
 */
export const PolicyDefinitionSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  maxCommandLength: z.number().int().positive().default(8192),
  allowedPrograms: z.array(z.string().min(1)),
  trustedBinDirs: z.array(z.string().startsWith('/')).default(['/bin', '/usr/bin', '/usr/local/bin']),
  deniedPatterns: z.array(DeniedPatternSchema),
  argumentRules: z.record(z.string(), ArgumentRuleSchema).default({}),
});

export type PolicyDefinition = z.infer<typeof PolicyDefinitionSchema>;
export type PolicyDefinitionInput = z.input<typeof PolicyDefinitionSchema>;

export const PolicyPresetNameSchema = z.enum(['restricted', 'permissive']);
export type PolicyPresetName = z.infer<typeof PolicyPresetNameSchema>;

export const PolicyConfigSchema = z.object({
  preset: PolicyPresetNameSchema.default('restricted'),
  allow: z.array(z.string().min(1)).default([]).describe('Programs added to the preset allowlist'),
  deny: z.array(z.string().min(1)).default([]).describe('Programs removed from the preset allowlist'),
  deniedPatterns: z.array(DeniedPatternSchema).default([]),
  maxCommandLength: z.number().int().positive().optional(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  auditLog: z.string().optional().describe('JSONL file receiving one event per classified command'),
});

export const AgentConfigSchema = z.object({
  model: z.string().optional(),
  systemPrompt: z.string().optional(),
  apiKeyEnv: z.array(z.string().min(1)).default(['ANTHROPIC_API_KEY', 'CLAUDE_CODE_OAUTH_TOKEN']),
  cliPathEnv: z.string().default('CLAUDE_CLI_PATH'),
  cliPath: z.string().optional(),
  maxTurns: z.number().int().positive().default(1000),
});

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  projectRoot: z.string().optional(),
  policy: PolicyConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  agent: AgentConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type PolicyConfig = z.infer<typeof PolicyConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type AgentConfig = z.infer<typeof AgentConfigSchema>;
