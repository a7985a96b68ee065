/**
 * Configuration loader for the node lease suite.
 *
 * Loads YAML configuration from a local file or from AWS Systems Manager
 * (SSM) Parameter Store, validates the structure, and caches the result.
 */

import { readFile } from 'fs/promises';
import { SSMClient, GetParameterCommand } from '@aws-sdk/client-ssm';
import { LRUCache } from 'lru-cache';
import yaml from 'js-yaml';
import { z } from 'zod';
import type { SuiteConfig } from '@shared/types';
import { ConfigError, ConfigSourceNotFoundError, ConfigValidationError } from '@shared/errors';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('node-lease:config');

/**
 * Prefix marking a config source as an SSM parameter name.
 */
export const SSM_SOURCE_PREFIX = 'ssm:';

const seconds = (fallback: number) => z.number().nonnegative().default(fallback);

/**
 * Configuration schema validation using Zod.
 *
 * Timeouts are written in seconds and converted to milliseconds.
 */
const ConfigSchema = z.object({
  provider: z.string().min(1),
  numNodes: z.number().int().nonnegative(),
  nodeInstanceGroup: z.string().min(1),
  region: z.string().optional(),
  project: z.string().optional(),
  zone: z.string().optional(),
  kubeconfig: z.string().optional(),
  context: z.string().optional(),
  namespaces: z
    .object({
      lease: z.string().default('kube-node-lease'),
      system: z.string().default('kube-system'),
    })
    .default({}),
  timeouts: z
    .object({
      leasePoll: seconds(60),
      leasePollInterval: seconds(5),
      nodeReady: seconds(600),
      groupResize: seconds(1200),
      podReady: seconds(300),
      tunnelGrace: seconds(300),
    })
    .default({}),
});

const configCache = new LRUCache<string, SuiteConfig>({
  max: 32,
  ttl: 1000 * 60 * 5, // 5 minutes TTL
});

/**
 * Parse and validate raw YAML text into a suite configuration.
 *
 * @param text - YAML document
 * @param source - Where the text came from, for error messages
 * @throws {ConfigError} If the text is not valid YAML
 * @throws {ConfigValidationError} If required fields are missing or invalid
 */
export function parseConfig(text: string, source: string): SuiteConfig {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (error) {
    throw new ConfigError(`Failed to parse YAML configuration from ${source}: ${String(error)}`, {
      cause: error,
    });
  }

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const fields = result.error.errors.map((e) => e.path.join('.') || '(root)');
    throw new ConfigValidationError(
      `Configuration validation failed. Missing or invalid fields: ${fields.join(', ')}`,
      { cause: result.error }
    );
  }

  const { timeouts, ...rest } = result.data;
  return {
    ...rest,
    timeouts: {
      leasePoll: timeouts.leasePoll * 1000,
      leasePollInterval: timeouts.leasePollInterval * 1000,
      nodeReady: timeouts.nodeReady * 1000,
      groupResize: timeouts.groupResize * 1000,
      podReady: timeouts.podReady * 1000,
      tunnelGrace: timeouts.tunnelGrace * 1000,
    },
  };
}

function hasCode(error: unknown, key: 'code' | 'name', value: string): boolean {
  return typeof error === 'object' && error !== null && key in error && Reflect.get(error, key) === value;
}

/**
 * Loads configuration from a local YAML file.
 *
 * @throws {ConfigSourceNotFoundError} If the file does not exist
 */
export async function loadConfigFromFile(path: string): Promise<SuiteConfig> {
  const cached = configCache.get(path);
  if (cached) {
    logger.debug(`Using cached config for file: ${path}`);
    return cached;
  }

  logger.info(`Loading config from file: ${path}`);

  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    if (hasCode(error, 'code', 'ENOENT')) {
      throw new ConfigSourceNotFoundError(`Could not find config file: ${path}`, { cause: error });
    }
    throw new ConfigError(`Failed to read config file ${path}: ${String(error)}`, { cause: error });
  }

  const config = parseConfig(text, path);
  configCache.set(path, config);
  logger.info('Config loaded successfully');
  return config;
}

/**
 * Loads configuration from an AWS SSM parameter.
 *
 * @param parameterName - The name of the SSM parameter
 * @param client - Optional SSM client for testing
 * @throws {ConfigSourceNotFoundError} If the parameter is not found
 * @throws {ConfigError} If the parameter cannot be retrieved or parsed
 */
export async function loadConfigFromSsm(
  parameterName: string,
  client?: SSMClient
): Promise<SuiteConfig> {
  const cacheKey = `${SSM_SOURCE_PREFIX}${parameterName}`;
  const cached = configCache.get(cacheKey);
  if (cached) {
    logger.debug(`Using cached config for parameter: ${parameterName}`);
    return cached;
  }

  logger.info(`Loading config from SSM: ${parameterName}`);

  const ssmClient = client ?? new SSMClient({});

  let parameterValue: string;
  try {
    const response = await ssmClient.send(new GetParameterCommand({ Name: parameterName }));
    parameterValue = response.Parameter?.Value ?? '';
  } catch (error) {
    if (hasCode(error, 'name', 'ParameterNotFound')) {
      throw new ConfigSourceNotFoundError(`Could not find SSM parameter: ${parameterName}`, {
        cause: error,
      });
    }
    throw new ConfigError(`Failed to retrieve SSM parameter: ${String(error)}`, { cause: error });
  }

  if (!parameterValue) {
    throw new ConfigError(`SSM parameter ${parameterName} exists but has no value`);
  }

  const config = parseConfig(parameterValue, parameterName);
  configCache.set(cacheKey, config);
  logger.info('Config loaded successfully');
  return config;
}

/**
 * Load configuration from `ssm:<parameter>` or from a file path.
 */
export function loadConfig(source: string, client?: SSMClient): Promise<SuiteConfig> {
  if (source.startsWith(SSM_SOURCE_PREFIX)) {
    return loadConfigFromSsm(source.slice(SSM_SOURCE_PREFIX.length), client);
  }
  return loadConfigFromFile(source);
}

/**
 * Clears the configuration cache.
 * Useful for testing or forcing a fresh config reload.
 */
export function clearConfigCache(): void {
  configCache.clear();
  logger.debug('Config cache cleared');
}
