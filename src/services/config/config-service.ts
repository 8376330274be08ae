/**
 * Configuration Service
 *
 * Loads halkit.yaml from a base directory and turns it into serializer,
 * curie and web options. A missing file yields the defaults.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { ValidationError } from '../../core/errors.js';
import { logger, parseLogLevel } from '../../core/logger.js';
import { HalkitConfigSchema, type HalkitConfig } from '../../core/schemas.js';
import { DefaultCurieProvider } from '../curie/curie-provider.js';
import { RenderSingleLinks, type HalOptions } from '../serialization/hal-serializer.js';

const log = logger.child('config');

export const CONFIG_FILE = 'halkit.yaml';

/**
 * Web integration settings
 */
export interface WebConfig {
  trustForwardedHeaders: boolean;
  basePath: string;
}

const DEFAULT_WEB_CONFIG: WebConfig = {
  trustForwardedHeaders: true,
  basePath: ''
};

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Curie provider for the configured curies; undefined when none are configured
 */
export function toCurieProvider(config: HalkitConfig): DefaultCurieProvider | undefined {
  const curies = config.curies ?? {};
  if (Object.keys(curies).length === 0) {
    if (config.defaultCurie !== undefined) {
      throw new ValidationError(`Default curie "${config.defaultCurie}" is not configured`, 'defaultCurie');
    }
    return undefined;
  }
  return new DefaultCurieProvider(curies, config.defaultCurie);
}

/**
 * Serializer options from configuration
 */
export function toHalOptions(config: HalkitConfig): Partial<HalOptions> {
  return {
    renderSingleLinks: config.hal?.renderSingleLinks === 'AS_ARRAY'
      ? RenderSingleLinks.AS_ARRAY
      : RenderSingleLinks.AS_SINGLE,
    arrayRels: config.hal?.arrayRels ?? [],
    curieProvider: toCurieProvider(config)
  };
}

/**
 * Parses and validates configuration text
 *
 * @throws ValidationError if the text is not YAML or does not match the schema
 */
export function parseConfig(content: string, source: string = CONFIG_FILE): HalkitConfig {
  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (error) {
    throw new ValidationError(
      `Invalid YAML in ${source}: ${error instanceof Error ? error.message : String(error)}`,
      'config'
    );
  }

  const result = HalkitConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const first = result.error.issues[0];
    const location = first && first.path.length > 0 ? ` at ${first.path.join('.')}` : '';
    throw new ValidationError(
      `Invalid configuration in ${source}${location}: ${first?.message ?? 'unknown error'}`,
      'config',
      { issues: result.error.issues }
    );
  }
  return result.data;
}

/**
 * Configuration Service
 */
export class ConfigService {
  private baseDir: string;
  private configPath: string;
  private cachedConfig: HalkitConfig | null = null;

  constructor(options: { baseDir?: string } = {}) {
    this.baseDir = options.baseDir || '.';
    this.configPath = path.join(this.baseDir, CONFIG_FILE);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Loads configuration from file, with caching
   *
   * @throws ValidationError if the file is invalid
   */
  async getConfig(): Promise<HalkitConfig> {
    if (this.cachedConfig !== null) {
      return this.cachedConfig;
    }

    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
      log.debug('No configuration file, using defaults', { path: this.configPath });
      this.cachedConfig = {};
      return this.cachedConfig;
    }

    this.cachedConfig = parseConfig(content, this.configPath);
    return this.cachedConfig;
  }

  /**
   * Clear the cached configuration
   */
  clearCache(): void {
    this.cachedConfig = null;
  }

  async getHalOptions(): Promise<Partial<HalOptions>> {
    return toHalOptions(await this.getConfig());
  }

  async getCurieProvider(): Promise<DefaultCurieProvider | undefined> {
    return toCurieProvider(await this.getConfig());
  }

  async getWebConfig(): Promise<WebConfig> {
    const web = (await this.getConfig()).web ?? {};
    return {
      trustForwardedHeaders: web.trustForwardedHeaders ?? DEFAULT_WEB_CONFIG.trustForwardedHeaders,
      basePath: web.basePath ?? DEFAULT_WEB_CONFIG.basePath
    };
  }

  /**
   * Applies the configured log level to the shared logger
   */
  async applyLogging(): Promise<void> {
    const name = (await this.getConfig()).logging?.level;
    const level = name === undefined ? undefined : parseLogLevel(name);
    if (level !== undefined) {
      logger.setLevel(level);
    }
  }

  /**
   * Validates and writes configuration to file
   */
  async saveConfig(config: HalkitConfig): Promise<void> {
    const validated = HalkitConfigSchema.parse(config);
    await fs.mkdir(this.baseDir, { recursive: true });
    await fs.writeFile(this.configPath, yaml.stringify(validated), 'utf-8');
    this.cachedConfig = validated;
  }
}
