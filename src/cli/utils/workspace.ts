// Per-invocation wiring of configuration, logging and the registry

import { Logger, LogLevel, toLogLevel } from '../../core/logger.js';
import { ConfigService, type ResolvedPaths } from '../../services/config/config-service.js';
import { RegistryService } from '../../services/registry/registry-service.js';

export interface Workspace {
  config: ConfigService;
  paths: ResolvedPaths;
  registry: RegistryService;
}

export interface WorkspaceOptions {
  path?: string;
  verbose?: boolean;
}

/**
 * Loads configuration for the base path, applies the log level and opens the
 * registry it points at. `--verbose` overrides the configured level.
 */
export async function openWorkspace(options: WorkspaceOptions): Promise<Workspace> {
  const config = new ConfigService({ baseDir: options.path });
  const logging = await config.getLoggingConfig();
  Logger.configure({ level: options.verbose ? LogLevel.DEBUG : toLogLevel(logging.level) });

  const paths = await config.getPaths();
  const registry = new RegistryService({
    registryPath: paths.registryPath,
    templatesDir: paths.templatesDir
  });

  return { config, paths, registry };
}
