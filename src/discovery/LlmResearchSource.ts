/**
 * @fileoverview Candidate source that asks an OpenAI-compatible chat endpoint
 * for plugin package names.
 * @module variety-engine/discovery/LlmResearchSource
 *
 * The model's answer is free text. Package names are pulled out with a regex
 * and every name is validated; nothing else from the reply is trusted.
 */

import axios, { type AxiosInstance } from 'axios';

import type { ResearchSourceConfig } from '../config/RuntimeConfig.js';
import { DEFAULT_RUNTIME_CONFIG } from '../config/RuntimeConfig.js';
import { createLogger } from '../logging/loggerFactory.js';
import type { ILogger } from '../logging/ILogger.js';
import { VarietyError, VarietyErrorCode } from '../utils/errors.js';
import { compileSchema } from '../utils/schema.js';
import { isValidPackageName } from './packageNames.js';
import type { CandidateServer, ICandidateSource } from './types.js';

const PACKAGE_MENTION = /(?:@[\w-]+\/)?mcp-server-[\w-]+|@modelcontextprotocol\/server-[\w-]+/g;

/** Research suggestions are unverified, so they rank below curated entries. */
const DEFAULT_RESEARCH_SCORE = 50;

interface ChatCompletionResponse {
  choices: Array<{ message: { content: string } }>;
}

const chatCompletionSchema = {
  type: 'object',
  required: ['choices'],
  properties: {
    choices: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        required: ['message'],
        properties: {
          message: {
            type: 'object',
            required: ['content'],
            properties: { content: { type: 'string' } },
          },
        },
      },
    },
  },
};

const isChatCompletion = compileSchema<ChatCompletionResponse>(chatCompletionSchema);

export interface LlmResearchSourceOptions extends Partial<Omit<ResearchSourceConfig, 'enabled'>> {
  http?: AxiosInstance;
  logger?: ILogger;
  /** Score given to every suggestion. @default 50 */
  score?: number;
}

/** Distinct package names mentioned in `text`, in order of appearance. */
export function extractPackageNames(text: string): string[] {
  return [...new Set(text.match(PACKAGE_MENTION) ?? [])];
}

export class LlmResearchSource implements ICandidateSource {
  readonly origin = 'externalResearch' as const;
  readonly name = 'llm-research';

  private readonly http: AxiosInstance;
  private readonly model: string;
  private readonly maxSuggestions: number;
  private readonly score: number;
  private readonly logger: ILogger;

  constructor(options: LlmResearchSourceOptions = {}) {
    const defaults = DEFAULT_RUNTIME_CONFIG.discovery.research;
    this.model = options.model ?? defaults.model;
    this.maxSuggestions = options.maxSuggestions ?? defaults.maxSuggestions;
    this.score = options.score ?? DEFAULT_RESEARCH_SCORE;
    this.logger = options.logger ?? createLogger('LlmResearchSource');

    if (options.http) {
      this.http = options.http;
    } else {
      if (!options.baseURL) {
        throw new VarietyError(
          'LlmResearchSource requires a baseURL',
          VarietyErrorCode.CONFIGURATION_ERROR,
          undefined,
          'LlmResearchSource',
        );
      }
      this.http = axios.create({
        baseURL: options.baseURL.replace(/\/+$/, ''),
        timeout: options.requestTimeoutMs ?? defaults.requestTimeoutMs,
        headers: {
          'Content-Type': 'application/json',
          ...(options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {}),
        },
      });
    }
  }

  /**
   * @throws {VarietyError} `DISCOVERY_SOURCE_FAILED` when the endpoint fails or
   *   answers with an unexpected body.
   */
  async search(capability: string): Promise<CandidateServer[]> {
    let data: unknown;
    try {
      const response = await this.http.post<unknown>('/chat/completions', {
        model: this.model,
        temperature: 0,
        messages: [
          {
            role: 'system',
            content:
              'You recommend npm packages that implement Model Context Protocol servers. ' +
              'Answer with one package name per line and nothing else.',
          },
          {
            role: 'user',
            content:
              `List up to ${this.maxSuggestions} npm packages providing an MCP server for the capability "${capability}". ` +
              "Prefer packages named 'mcp-server-*' or '@modelcontextprotocol/server-*'.",
          },
        ],
      });
      data = response.data;
    } catch (error: unknown) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      throw new VarietyError(
        `Research request failed for '${capability}'`,
        VarietyErrorCode.DISCOVERY_SOURCE_FAILED,
        { capability, status },
        'LlmResearchSource',
        error,
      );
    }

    if (!isChatCompletion(data)) {
      throw new VarietyError(
        'Unexpected chat completion response',
        VarietyErrorCode.DISCOVERY_SOURCE_FAILED,
        { capability },
        'LlmResearchSource',
      );
    }

    const text = data.choices.map((c) => c.message.content).join('\n');
    const names: string[] = [];
    for (const name of extractPackageNames(text)) {
      if (!isValidPackageName(name)) {
        this.logger.warn('Dropping invalid package name from research', { packageName: name });
        continue;
      }
      names.push(name);
      if (names.length >= this.maxSuggestions) break;
    }

    return names.map((packageName) => ({
      packageName,
      version: 'latest',
      description: `Suggested by research for '${capability}'`,
      capabilities: [capability],
      score: this.score,
      sourceOrigin: this.origin,
    }));
  }
}
