import {
  PolicyDefinitionSchema,
  type PolicyDefinition,
  type PolicyPresetName,
} from '@shellgate/shared';
import restricted from '../../policies/restricted.json';
import permissive from '../../policies/permissive.json';
import { deepFreeze } from './policy';

/** Default preset, paired with the OS sandbox. */
export const RestrictedPolicy: PolicyDefinition = deepFreeze(PolicyDefinitionSchema.parse(restricted));

/** Wider toolchain and backgrounding, for sessions that run without the sandbox. */
export const PermissivePolicy: PolicyDefinition = deepFreeze(PolicyDefinitionSchema.parse(permissive));

const PRESETS: Record<PolicyPresetName, PolicyDefinition> = {
  restricted: RestrictedPolicy,
  permissive: PermissivePolicy,
};

/**
 * Returns a private copy of the named preset; the shared definitions stay frozen.
 */
export function getPolicyPreset(name: PolicyPresetName): PolicyDefinition {
  return structuredClone(PRESETS[name]);
}
