/**
 * @fileoverview Types for package discovery and candidate matching.
 * @module variety-engine/discovery/types
 */

/** Where a candidate came from. */
export type CandidateOrigin = 'registrySearch' | 'curatedMapping' | 'externalResearch';

/**
 * A plugin package proposed for one capability. Lives for a single
 * acquisition attempt.
 */
export interface CandidateServer {
  packageName: string;
  /** Version spec handed to the installer; `latest` when the source has none. */
  version: string;
  description: string;
  /** Lower-cased capability keywords, deduplicated. */
  capabilities: string[];
  /** Quality score in 0..100. */
  score: number;
  sourceOrigin: CandidateOrigin;
}

/**
 * A pluggable supplier of candidates. Sources may throw; the discovery
 * engine logs the failure and continues with the remaining sources.
 */
export interface ICandidateSource {
  readonly origin: CandidateOrigin;
  /** Short identifier used in logs. */
  readonly name: string;
  search(capability: string): Promise<CandidateServer[]>;
}

/** Shape of `data/curated-capabilities.json`. */
export interface CuratedMapping {
  /** Capability name → package names, best first. */
  capabilities: Record<string, string[]>;
  /** Optional metadata per package. */
  packages?: Record<string, { description?: string; keywords?: string[] }>;
}
