/**
 * @fileoverview Fans a capability out to every candidate source, merges the
 * answers and ranks them.
 * @module variety-engine/discovery/PackageDiscoveryEngine
 *
 * Pipeline:
 *   sources (parallel) → merge by package name → rank → cap at maxCandidates
 *
 * A failing source is logged and skipped. No results is an empty list, never
 * an error; the acquisition loop turns that into DISCOVERY_EMPTY.
 */

import { DEFAULT_RUNTIME_CONFIG } from '../config/RuntimeConfig.js';
import { createLogger } from '../logging/loggerFactory.js';
import type { ILogger } from '../logging/ILogger.js';
import { CandidateMatcher } from './CandidateMatcher.js';
import { assertValidCapabilityName } from './packageNames.js';
import type { CandidateServer, ICandidateSource } from './types.js';

export interface PackageDiscoveryEngineOptions {
  sources: ICandidateSource[];
  matcher?: CandidateMatcher;
  /** @default 10 */
  maxCandidates?: number;
  logger?: ILogger;
}

/**
 * Merges candidates naming the same package: capabilities are unioned, the
 * best score wins and brings its origin, version and description along.
 */
export function mergeCandidates(candidates: readonly CandidateServer[]): CandidateServer[] {
  const byName = new Map<string, CandidateServer>();
  for (const candidate of candidates) {
    const existing = byName.get(candidate.packageName);
    if (!existing) {
      byName.set(candidate.packageName, { ...candidate, capabilities: [...new Set(candidate.capabilities)] });
      continue;
    }
    const best = candidate.score > existing.score ? candidate : existing;
    byName.set(candidate.packageName, {
      packageName: candidate.packageName,
      version: best.version,
      description: best.description || existing.description || candidate.description,
      capabilities: [...new Set([...existing.capabilities, ...candidate.capabilities])],
      score: best.score,
      sourceOrigin: best.sourceOrigin,
    });
  }
  return [...byName.values()];
}

export class PackageDiscoveryEngine {
  private readonly sources: ICandidateSource[];
  private readonly matcher: CandidateMatcher;
  private readonly maxCandidates: number;
  private readonly logger: ILogger;

  constructor(options: PackageDiscoveryEngineOptions) {
    this.sources = [...options.sources];
    this.matcher = options.matcher ?? new CandidateMatcher();
    this.maxCandidates = options.maxCandidates ?? DEFAULT_RUNTIME_CONFIG.discovery.maxCandidates;
    this.logger = options.logger ?? createLogger('PackageDiscoveryEngine');
  }

  /**
   * Candidates for `capabilityName`, best first.
   *
   * @throws {VarietyError} `INVALID_ARGUMENT` for a malformed capability name.
   */
  async discover(capabilityName: string): Promise<CandidateServer[]> {
    const capability = assertValidCapabilityName(capabilityName);
    const settled = await Promise.allSettled(this.sources.map((source) => source.search(capability)));

    const collected: CandidateServer[] = [];
    settled.forEach((outcome, index) => {
      const source = this.sources[index];
      if (outcome.status === 'fulfilled') {
        collected.push(...outcome.value);
      } else {
        this.logger.warn('Candidate source failed; skipping', {
          capability,
          source: source?.name,
          error: outcome.reason,
        });
      }
    });

    const ranked = this.matcher.rank(capability, mergeCandidates(collected)).slice(0, this.maxCandidates);
    this.logger.info('Discovery complete', {
      capability,
      candidates: ranked.length,
      top: ranked[0]?.packageName,
    });
    return ranked;
  }

  select(candidates: readonly CandidateServer[]): CandidateServer | null {
    return this.matcher.select(candidates);
  }

  getSources(): readonly ICandidateSource[] {
    return this.sources;
  }
}
