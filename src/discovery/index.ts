/**
 * @fileoverview Discovery & matching barrel exports.
 * @module variety-engine/discovery
 */

export type { CandidateOrigin, CandidateServer, CuratedMapping, ICandidateSource } from './types.js';
export {
  assertValidCapabilityName,
  assertValidPackageName,
  assertValidVersionSpec,
  isValidPackageName,
} from './packageNames.js';
export { CandidateMatcher } from './CandidateMatcher.js';
export {
  PackageDiscoveryEngine,
  mergeCandidates,
  type PackageDiscoveryEngineOptions,
} from './PackageDiscoveryEngine.js';
export {
  CuratedCandidateSource,
  DEFAULT_CURATED_MAPPING_FILE,
  type CuratedCandidateSourceOptions,
} from './CuratedCandidateSource.js';
export { NpmRegistrySource, type NpmRegistrySourceOptions } from './NpmRegistrySource.js';
export { LlmResearchSource, extractPackageNames, type LlmResearchSourceOptions } from './LlmResearchSource.js';
