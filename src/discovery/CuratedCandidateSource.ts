/**
 * @fileoverview Static capability → package table shipped with the engine.
 * @module variety-engine/discovery/CuratedCandidateSource
 *
 * Unknown capabilities map to nothing; there is no generic fallback list.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

import { createLogger } from '../logging/loggerFactory.js';
import type { ILogger } from '../logging/ILogger.js';
import { VarietyError, VarietyErrorCode } from '../utils/errors.js';
import { compileSchema, formatSchemaErrors } from '../utils/schema.js';
import { isValidPackageName } from './packageNames.js';
import type { CandidateServer, CuratedMapping, ICandidateSource } from './types.js';

export const DEFAULT_CURATED_MAPPING_FILE = fileURLToPath(
  new URL('../../data/curated-capabilities.json', import.meta.url),
);

/** Score of the first package listed for a capability; each later one gets 5 less. */
const CURATED_TOP_SCORE = 90;
const CURATED_RANK_STEP = 5;
const CURATED_MIN_SCORE = 50;

const curatedMappingSchema = {
  type: 'object',
  required: ['capabilities'],
  properties: {
    capabilities: {
      type: 'object',
      additionalProperties: { type: 'array', items: { type: 'string' } },
    },
    packages: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        properties: {
          description: { type: 'string' },
          keywords: { type: 'array', items: { type: 'string' } },
        },
      },
    },
  },
};

const isCuratedMapping = compileSchema<CuratedMapping>(curatedMappingSchema);

export interface CuratedCandidateSourceOptions {
  /** Path of the JSON table. Ignored when `mapping` is given. */
  mappingFile?: string;
  /** In-memory table, mostly for tests and embedding. */
  mapping?: CuratedMapping;
  logger?: ILogger;
}

export class CuratedCandidateSource implements ICandidateSource {
  readonly origin = 'curatedMapping' as const;
  readonly name = 'curated';

  private readonly logger: ILogger;
  private readonly mappingFile: string;
  private mapping: Promise<CuratedMapping> | undefined;

  constructor(options: CuratedCandidateSourceOptions = {}) {
    this.logger = options.logger ?? createLogger('CuratedCandidateSource');
    this.mappingFile = options.mappingFile ?? DEFAULT_CURATED_MAPPING_FILE;
    if (options.mapping) this.mapping = Promise.resolve(options.mapping);
  }

  async search(capability: string): Promise<CandidateServer[]> {
    const mapping = await this.loadMapping();
    const key = capability.trim().toLowerCase();
    const packages = mapping.capabilities[key] ?? [];

    const candidates: CandidateServer[] = [];
    for (const [rank, packageName] of packages.entries()) {
      if (!isValidPackageName(packageName)) {
        this.logger.warn('Dropping invalid curated package name', { capability: key, packageName });
        continue;
      }
      const info = mapping.packages?.[packageName];
      const keywords = (info?.keywords ?? []).map((k) => k.toLowerCase());
      candidates.push({
        packageName,
        version: 'latest',
        description: info?.description ?? `Curated plugin for '${key}'`,
        capabilities: [...new Set([key, ...keywords])],
        score: Math.max(CURATED_TOP_SCORE - rank * CURATED_RANK_STEP, CURATED_MIN_SCORE),
        sourceOrigin: this.origin,
      });
    }
    return candidates;
  }

  /** Capabilities the table knows about, sorted. */
  async knownCapabilities(): Promise<string[]> {
    const mapping = await this.loadMapping();
    return Object.keys(mapping.capabilities).sort();
  }

  private loadMapping(): Promise<CuratedMapping> {
    if (!this.mapping) {
      this.mapping = this.readMappingFile();
      // A failed read is retried on the next search.
      void this.mapping.catch(() => {
        this.mapping = undefined;
      });
    }
    return this.mapping;
  }

  private async readMappingFile(): Promise<CuratedMapping> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(this.mappingFile, 'utf8'));
    } catch (error) {
      throw new VarietyError(
        `Could not read curated mapping ${this.mappingFile}`,
        VarietyErrorCode.DISCOVERY_SOURCE_FAILED,
        { mappingFile: this.mappingFile },
        'CuratedCandidateSource',
        error,
      );
    }
    if (!isCuratedMapping(parsed)) {
      throw new VarietyError(
        `Malformed curated mapping ${this.mappingFile}: ${formatSchemaErrors(isCuratedMapping.errors)}`,
        VarietyErrorCode.DISCOVERY_SOURCE_FAILED,
        { mappingFile: this.mappingFile },
        'CuratedCandidateSource',
      );
    }
    this.logger.debug('Loaded curated mapping', {
      mappingFile: this.mappingFile,
      capabilities: Object.keys(parsed.capabilities).length,
    });
    return parsed;
  }
}
