/**
 * Configuration Service
 *
 * Loads optional settings from .checktpl/config.yaml under the base directory:
 * where templates, the registry and generated checks live, and the log level.
 * Every setting falls back to a default when the file or the key is absent.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { ValidationError } from '../../core/errors.js';
import type { LogLevelName } from '../../core/logger.js';
import { describeSchemaIssue, safeValidateConfig, type ConfigFile } from '../../core/schemas.js';

export const CONFIG_DIR = '.checktpl';
export const CONFIG_FILE = 'config.yaml';

/**
 * Location settings, relative to the base directory
 */
export interface PathsConfig {
  templatesDir: string;
  /** Relative to templatesDir */
  registryFile: string;
  checksDir: string;
}

/**
 * Absolute locations derived from PathsConfig
 */
export interface ResolvedPaths {
  baseDir: string;
  templatesDir: string;
  registryPath: string;
  checksDir: string;
}

export interface LoggingConfig {
  level: LogLevelName;
}

const DEFAULT_PATHS: PathsConfig = {
  templatesDir: 'tests/templates',
  registryFile: 'registry.json',
  checksDir: 'tests/checks'
};

const DEFAULT_LOGGING: LoggingConfig = {
  level: 'warn'
};

/**
 * Configuration Service
 */
export class ConfigService {
  private baseDir: string;
  private configPath: string;
  private cachedConfig: ConfigFile | null = null;

  constructor(options: { baseDir?: string } = {}) {
    this.baseDir = path.resolve(options.baseDir || process.cwd());
    this.configPath = path.join(this.baseDir, CONFIG_DIR, CONFIG_FILE);
  }

  /**
   * Load configuration from file, with caching. A missing file yields an empty
   * configuration; unreadable YAML or unknown keys are rejected.
   */
  private async loadConfig(): Promise<ConfigFile> {
    if (this.cachedConfig !== null) {
      return this.cachedConfig;
    }

    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        this.cachedConfig = {};
        return this.cachedConfig;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = yaml.parse(content);
    } catch (error) {
      throw new ValidationError(`Invalid configuration ${this.configPath}: ${(error as Error).message}`, 'config');
    }

    const result = safeValidateConfig(parsed ?? {});
    if (!result.success) {
      throw new ValidationError(
        `Invalid configuration ${this.configPath}: ${describeSchemaIssue(result.error)}`,
        'config'
      );
    }

    this.cachedConfig = result.data;
    return result.data;
  }

  /**
   * Location settings merged over the defaults
   */
  async getPathsConfig(): Promise<PathsConfig> {
    const config = await this.loadConfig();
    return {
      templatesDir: config.paths?.templatesDir ?? DEFAULT_PATHS.templatesDir,
      registryFile: config.paths?.registryFile ?? DEFAULT_PATHS.registryFile,
      checksDir: config.paths?.checksDir ?? DEFAULT_PATHS.checksDir
    };
  }

  /**
   * Absolute paths resolved against the base directory
   */
  async getPaths(): Promise<ResolvedPaths> {
    const paths = await this.getPathsConfig();
    const templatesDir = path.resolve(this.baseDir, paths.templatesDir);

    return {
      baseDir: this.baseDir,
      templatesDir,
      registryPath: path.resolve(templatesDir, paths.registryFile),
      checksDir: path.resolve(this.baseDir, paths.checksDir)
    };
  }

  async getLoggingConfig(): Promise<LoggingConfig> {
    const config = await this.loadConfig();
    return {
      level: config.logging?.level ?? DEFAULT_LOGGING.level
    };
  }
}
