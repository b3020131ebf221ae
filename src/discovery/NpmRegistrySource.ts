/**
 * @fileoverview Candidate source backed by the npm registry search endpoint.
 * @module variety-engine/discovery/NpmRegistrySource
 */

import axios, { type AxiosInstance } from 'axios';

import type { RegistrySourceConfig } from '../config/RuntimeConfig.js';
import { DEFAULT_RUNTIME_CONFIG } from '../config/RuntimeConfig.js';
import { createLogger } from '../logging/loggerFactory.js';
import type { ILogger } from '../logging/ILogger.js';
import { VarietyError, VarietyErrorCode } from '../utils/errors.js';
import { compileSchema, formatSchemaErrors } from '../utils/schema.js';
import { isValidPackageName } from './packageNames.js';
import type { CandidateServer, ICandidateSource } from './types.js';

interface RegistrySearchObject {
  package: {
    name: string;
    version: string;
    description?: string;
    keywords?: string[];
  };
  score: { final: number };
}

interface RegistrySearchResponse {
  objects: RegistrySearchObject[];
}

const searchResponseSchema = {
  type: 'object',
  required: ['objects'],
  properties: {
    objects: {
      type: 'array',
      items: {
        type: 'object',
        required: ['package', 'score'],
        properties: {
          package: {
            type: 'object',
            required: ['name', 'version'],
            properties: {
              name: { type: 'string' },
              version: { type: 'string' },
              description: { type: 'string' },
              keywords: { type: 'array', items: { type: 'string' } },
            },
          },
          score: {
            type: 'object',
            required: ['final'],
            properties: { final: { type: 'number' } },
          },
        },
      },
    },
  },
};

const isSearchResponse = compileSchema<RegistrySearchResponse>(searchResponseSchema);

export interface NpmRegistrySourceOptions extends Partial<Omit<RegistrySourceConfig, 'enabled'>> {
  /** Pre-built client; tests pass one with a custom adapter. */
  http?: AxiosInstance;
  logger?: ILogger;
}

/** Only packages that look like plugin servers are kept. */
function isPluginPackage(pkg: RegistrySearchObject['package']): boolean {
  return (
    pkg.name.includes('mcp') ||
    (pkg.description ?? '').toLowerCase().includes('model context protocol') ||
    (pkg.keywords ?? []).some((k) => k.toLowerCase() === 'mcp')
  );
}

export class NpmRegistrySource implements ICandidateSource {
  readonly origin = 'registrySearch' as const;
  readonly name = 'npm-registry';

  private readonly http: AxiosInstance;
  private readonly searchSize: number;
  private readonly logger: ILogger;

  constructor(options: NpmRegistrySourceOptions = {}) {
    const defaults = DEFAULT_RUNTIME_CONFIG.discovery.registry;
    this.searchSize = options.searchSize ?? defaults.searchSize;
    this.logger = options.logger ?? createLogger('NpmRegistrySource');
    this.http =
      options.http ??
      axios.create({
        baseURL: (options.baseURL ?? defaults.baseURL).replace(/\/+$/, ''),
        timeout: options.requestTimeoutMs ?? defaults.requestTimeoutMs,
        headers: { Accept: 'application/json' },
      });
  }

  /**
   * @throws {VarietyError} `DISCOVERY_SOURCE_FAILED` on transport errors or an
   *   unexpected response body.
   */
  async search(capability: string): Promise<CandidateServer[]> {
    const text = `${capability} mcp server`;
    let data: unknown;
    try {
      const response = await this.http.get<unknown>('/-/v1/search', {
        params: { text, size: this.searchSize },
      });
      data = response.data;
    } catch (error: unknown) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      throw new VarietyError(
        `npm registry search failed for '${capability}'`,
        VarietyErrorCode.DISCOVERY_SOURCE_FAILED,
        { capability, status },
        'NpmRegistrySource',
        error,
      );
    }

    if (!isSearchResponse(data)) {
      throw new VarietyError(
        `Unexpected npm registry response: ${formatSchemaErrors(isSearchResponse.errors)}`,
        VarietyErrorCode.DISCOVERY_SOURCE_FAILED,
        { capability },
        'NpmRegistrySource',
      );
    }

    const candidates: CandidateServer[] = [];
    for (const { package: pkg, score } of data.objects) {
      if (!isPluginPackage(pkg)) continue;
      if (!isValidPackageName(pkg.name)) {
        this.logger.warn('Dropping invalid package name from registry', { packageName: pkg.name });
        continue;
      }
      candidates.push({
        packageName: pkg.name,
        version: pkg.version,
        description: pkg.description ?? '',
        capabilities: [...new Set((pkg.keywords ?? []).map((k) => k.trim().toLowerCase()).filter(Boolean))],
        score: Math.round(Math.min(Math.max(score.final, 0), 1) * 100),
        sourceOrigin: this.origin,
      });
    }
    this.logger.debug('Registry search complete', { capability, total: data.objects.length, kept: candidates.length });
    return candidates;
  }
}
