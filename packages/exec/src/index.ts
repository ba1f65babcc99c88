export const name = '@shellgate/exec';

export * from './classify/types';
export { classify, formatVerdict, isAllowed, ALLOW, PATH_OUTSIDE_ROOT } from './classify/classifier';
export { parseCommand, parseInvocation, splitSegments, tokenize } from './classify/parser';
export type { ParseResult } from './classify/parser';
export { compileDeniedPattern, findDeniedPattern } from './classify/patterns';
export { checkArguments } from './classify/arguments';
export { findPathOutsideRoot, isPathLike } from './classify/paths';
export { createPolicy, extendPolicyDefinition, describePolicy } from './policy/policy';
export type { PolicyOverrides } from './policy/policy';
export { RestrictedPolicy, PermissivePolicy, getPolicyPreset } from './policy/presets';
