// consensus/semantic-bft/core/config/config-manager.ts
// Loads simulator configuration from YAML and validates it before any round runs

import * as yaml from 'js-yaml';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../errors';

const DEFAULT_CONFIG_PATH = path.join(__dirname, '../../config/semantic-bft.yaml');

const probability = z.number().min(0).max(1);
const nonNegative = z.number().min(0);
const positive = z.number().positive();
const positiveInt = z.number().int().positive();

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

const rangeSchema = z
  .object({ min: nonNegative, max: nonNegative })
  .strict()
  .refine(range => range.min <= range.max, { message: 'min must not exceed max' });

export const configSchema = z
  .object({
    concept: z
      .object({
        dimension: positiveInt,
        digestPrecision: z.number().int().min(0).max(15)
      })
      .strict(),
    network: z
      .object({
        nodeCount: positiveInt,
        estimatedNetworkSize: positiveInt,
        bftFraction: z.number().gt(0).max(1),
        roundDuration: positive,
        originationProbability: probability,
        hopLatency: z.object({ base: nonNegative, jitter: nonNegative }).strict()
      })
      .strict(),
    adversary: z
      .object({
        fraction: probability,
        corruptionProbability: probability,
        extremeValueProbability: probability,
        voteFlipProbability: probability,
        equivocationProbability: probability
      })
      .strict(),
    verifier: z
      .object({
        enabled: z.boolean(),
        varianceCeiling: nonNegative,
        extremeValueCeiling: positive,
        topKThreshold: nonNegative,
        similarityThreshold: z.number().min(-1).max(1),
        referenceValue: z.number()
      })
      .strict(),
    transaction: z.object({ maxAge: nonNegative }).strict(),
    domains: z
      .object({
        count: positiveInt,
        vehiclesPerDomain: positiveInt,
        validatorsPerDomain: positiveInt,
        roundDuration: positive,
        eventProbability: probability,
        crossDomainProbability: probability,
        syncInterval: positive,
        syncBatchSize: positiveInt,
        syncDelay: rangeSchema,
        phaseCount: positiveInt,
        avgMessageSizeBytes: positive,
        bytesPerValue: positiveInt,
        latentDimension: positiveInt,
        modelScale: positive,
        consensusJitter: nonNegative,
        baseDelay: z
          .object({ urban: nonNegative, interurban: nonNegative, rural: nonNegative })
          .strict()
      })
      .strict(),
    logging: z
      .object({
        level: z.enum(LOG_LEVELS),
        file: z.string().min(1).optional(),
        silent: z.boolean().default(false)
      })
      .strict()
  })
  .strict();

export type SemanticBftConfig = z.infer<typeof configSchema>;
export type NetworkConfig = SemanticBftConfig['network'];
export type AdversaryConfig = SemanticBftConfig['adversary'];
export type VerifierConfig = SemanticBftConfig['verifier'];
export type DomainsConfig = SemanticBftConfig['domains'];
export type LoggingConfig = SemanticBftConfig['logging'];

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export type ConfigOverrides = DeepPartial<SemanticBftConfig>;

export class ConfigManager {
  private readonly configPath: string;
  private document: unknown;

  constructor(configPath?: string) {
    this.configPath = configPath || process.env.SEMANTIC_BFT_CONFIG || DEFAULT_CONFIG_PATH;
    this.loadConfig();
  }

  private loadConfig(): void {
    if (!fs.existsSync(this.configPath)) {
      throw new ConfigurationError(`Simulator configuration not found: ${this.configPath}`);
    }

    const configContent = fs.readFileSync(this.configPath, 'utf8');
    try {
      this.document = yaml.load(configContent);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Unreadable YAML in ${this.configPath}: ${reason}`);
    }
  }

  /**
   * Merge overrides over the file defaults and validate the result
   */
  public resolve(overrides: ConfigOverrides = {}): SemanticBftConfig {
    return parseConfig(mergeDeep(this.document, overrides));
  }
}

export function parseConfig(document: unknown): SemanticBftConfig {
  const result = configSchema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues.map(
      issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid simulator configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

const managers = new Map<string, ConfigManager>();

function getManager(configPath?: string): ConfigManager {
  const key = configPath || process.env.SEMANTIC_BFT_CONFIG || DEFAULT_CONFIG_PATH;
  let manager = managers.get(key);
  if (!manager) {
    manager = new ConfigManager(key);
    managers.set(key, manager);
  }
  return manager;
}

export function loadConfig(configPath?: string): SemanticBftConfig {
  return getManager(configPath).resolve();
}

export function resolveConfig(overrides: ConfigOverrides = {}, configPath?: string): SemanticBftConfig {
  return getManager(configPath).resolve(overrides);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mergeDeep(base: unknown, override: unknown): unknown {
  if (override === undefined) return base;
  if (!isPlainObject(base) || !isPlainObject(override)) return override;

  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    merged[key] = mergeDeep(base[key], value);
  }
  return merged;
}
