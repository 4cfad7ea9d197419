// Template registry loading, lookup and template file updates

import * as fs from 'fs/promises';
import * as path from 'path';
import { NotFoundError, RegistryError, ValidationError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import { describeSchemaIssue, safeValidateRegistry, type TemplateRecord } from '../../core/schemas.js';
import type { Registry, Template } from '../../models/template.js';
import { CheckFileStore } from '../storage/check-file-store.js';

/**
 * Configuration for the registry service
 */
export interface RegistryServiceConfig {
  /** Absolute path of registry.json */
  registryPath: string;
  /** Root that template paths are relative to (default: the registry's directory) */
  templatesDir?: string;
}

/**
 * Template selectors for generation; the id wins over the script type
 */
export interface TemplateSelector {
  templateId?: string;
  scriptType?: string;
}

/**
 * Converts a registry record into the in-memory template model
 */
export function toTemplate(templatesDir: string, record: TemplateRecord): Template {
  return {
    id: record.id,
    label: record.label ?? record.id,
    description: record.description ?? '',
    scriptType: record.script_type,
    extension: record.extension,
    path: path.resolve(templatesDir, record.path),
    categories: record.categories,
    placeholders: record.placeholders
  };
}

/**
 * Read-only view of the template registry for one invocation.
 * The registry is loaded on first use and cached; updates rewrite template
 * files, never the registry itself.
 */
export class RegistryService {
  private registryPath: string;
  private templatesDir: string;
  private cached: Registry | null = null;

  constructor(config: RegistryServiceConfig, private fileStore: CheckFileStore = new CheckFileStore()) {
    this.registryPath = config.registryPath;
    this.templatesDir = config.templatesDir ?? path.dirname(config.registryPath);
  }

  /**
   * Loads the registry. Any structural problem fails the whole load.
   */
  async load(): Promise<Registry> {
    if (this.cached) {
      return this.cached;
    }

    let content: string;
    try {
      content = await fs.readFile(this.registryPath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new RegistryError(`Template registry not found: ${this.registryPath}`);
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new RegistryError(`Template registry is not valid JSON: ${(error as Error).message}`, {
        path: this.registryPath
      });
    }

    const result = safeValidateRegistry(parsed);
    if (!result.success) {
      throw new RegistryError(describeSchemaIssue(result.error), { path: this.registryPath });
    }

    this.cached = {
      version: result.data.version,
      templates: result.data.templates.map(record => toTemplate(this.templatesDir, record))
    };

    logger.debug('Loaded template registry', {
      path: this.registryPath,
      version: this.cached.version,
      templates: this.cached.templates.length
    });

    return this.cached;
  }

  async listTemplates(): Promise<Template[]> {
    const registry = await this.load();
    return registry.templates;
  }

  /**
   * Exact id lookup
   */
  async findTemplate(templateId: string): Promise<Template | null> {
    const templates = await this.listTemplates();
    return templates.find(template => template.id === templateId) ?? null;
  }

  /**
   * Picks the template for a generation request
   */
  async selectTemplate(selector: TemplateSelector): Promise<Template> {
    const templates = await this.listTemplates();

    if (selector.templateId) {
      const template = templates.find(t => t.id === selector.templateId);
      if (!template) {
        throw new NotFoundError(
          `Unknown template id '${selector.templateId}'. Use the list command to inspect options.`,
          { templateId: selector.templateId }
        );
      }
      return template;
    }

    if (selector.scriptType) {
      const template = templates.find(t => t.scriptType === selector.scriptType);
      if (!template) {
        throw new NotFoundError(
          `No templates available for script type '${selector.scriptType}'. Use the list command to confirm options.`,
          { scriptType: selector.scriptType }
        );
      }
      return template;
    }

    throw new ValidationError('A template must be specified via --template-id or --script-type.', 'template');
  }

  /**
   * Overwrites a template's file with the content of another file
   * @returns The updated template
   */
  async updateTemplate(templateId: string, sourcePath: string): Promise<Template> {
    const template = await this.findTemplate(templateId);
    if (!template) {
      throw new NotFoundError(`Template '${templateId}' not found in registry.`, { templateId });
    }

    const source = path.resolve(sourcePath);
    if (!(await this.fileStore.exists(source))) {
      throw new NotFoundError(`Source file not found: ${source}`, { source });
    }

    await this.fileStore.replaceFile(source, template.path);
    logger.debug('Updated template file', { templateId, source, target: template.path });

    return template;
  }
}
