export { accessReads, classifyAccess, mergeAccess, roleReads, roleWrites } from './AccessClassifier.js';
export { DeclarationRegistry, type InternResult } from './DeclarationRegistry.js';
export {
  UsageTracker,
  WholeProgramUsageTracker,
  SingleBodyUsageTracker,
  emptyTrackerStats,
  addTrackerStats,
  type ProducerHandle,
  type UsageTrackerStats,
} from './UsageTracker.js';
export {
  PolicyChain,
  createFieldPolicy,
  createParameterPolicy,
  createLocalPolicy,
  createPolicySet,
  DEFAULT_DISCARD_PATTERN,
  FIELD_EXEMPTIONS,
  type Exemption,
  type PolicyOptions,
  type PolicySet,
} from './ExemptionPolicy.js';
