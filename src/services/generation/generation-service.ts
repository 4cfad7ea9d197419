// Generation of check scripts from free-text descriptions

import * as path from 'path';
import { ConflictError, NotFoundError, ValidationError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import type {
  CheckIdentity,
  CheckMetadata,
  GenerateRequest,
  GenerationContext,
  GenerationResult,
  TddSections
} from '../../models/generation.js';
import { VALID_GROUPS, isGroup, type Group, type TddSection } from '../../models/types.js';
import { inferGroup } from '../inference/group-inferencer.js';
import { inferServiceAndTest } from '../inference/service-test-inferencer.js';
import { slugify } from '../inference/slug.js';
import { missingSections, parseTddSections } from '../inference/tdd-sections.js';
import { PromptService } from '../prompt/prompt-service.js';
import type { RegistryService } from '../registry/registry-service.js';
import { buildGenerationContext, checkFileName, checkId, renderTemplateFile } from '../render/renderer.js';
import { CheckFileStore } from '../storage/check-file-store.js';

/**
 * Configuration for the generation service
 */
export interface GenerationServiceConfig {
  /** Default output directory for generated checks */
  checksDir: string;
  /** Directory metadata paths are reported relative to (default: process.cwd()) */
  cwd?: string;
}

/**
 * Path relative to `from` when it lies inside it, otherwise absolute
 */
export function displayPath(target: string, from: string): string {
  const relative = path.relative(from, target);
  if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
    return target;
  }
  return relative;
}

/**
 * Turns a description into a check script:
 * sections → group → service/test → template → target path → render → write.
 * Anything that cannot be inferred comes from an override or, in
 * interactive mode, from the operator.
 */
export class GenerationService {
  private prompts: PromptService;
  private fileStore: CheckFileStore;

  constructor(
    private registry: RegistryService,
    private config: GenerationServiceConfig,
    options: { prompts?: PromptService; fileStore?: CheckFileStore } = {}
  ) {
    this.prompts = options.prompts ?? new PromptService();
    this.fileStore = options.fileStore ?? new CheckFileStore();
  }

  async generate(request: GenerateRequest): Promise<GenerationResult> {
    const description = request.description.trim();
    if (!description) {
      throw new ValidationError('--description is required for generate command.', 'description');
    }
    const interactive = request.interactive ?? false;

    const sections = await this.resolveSections(description, interactive);
    const group = await this.resolveGroup(request.group || inferGroup(description), interactive);

    const inferred = inferServiceAndTest(description, group);
    logger.debug('Inferred check fields', { group, service: inferred.service, test: inferred.test });

    const identity: CheckIdentity = {
      group,
      service: await this.resolveName('service', request.service || inferred.service, interactive),
      test: await this.resolveName('test', request.test || inferred.test, interactive)
    };

    const registry = await this.registry.load();
    const template = await this.registry.selectTemplate({
      templateId: request.templateId,
      scriptType: request.scriptType
    });

    if (template.categories.length > 0 && !template.categories.includes(group)) {
      throw new ValidationError(
        `Template '${template.id}' does not support group '${group}'. Supported: ${template.categories.join(', ')}`,
        'group'
      );
    }

    const outputDir = path.resolve(request.outputDir ?? this.config.checksDir);
    const targetPath = path.join(outputDir, checkFileName(identity, template.extension));
    await this.ensureWritable(targetPath, request.force ?? false);

    const context = buildGenerationContext(identity, sections, template.scriptType);
    const content = await this.render(template.path, context);

    const metadata: CheckMetadata = {
      registry_version: registry.version,
      template_id: template.id,
      script_type: template.scriptType,
      group: identity.group,
      service: identity.service,
      test: identity.test,
      check_id: checkId(identity),
      file: displayPath(targetPath, this.config.cwd ?? process.cwd())
    };

    if (request.dryRun) {
      return { metadata, content, targetPath, written: false };
    }

    await this.fileStore.writeCheck(targetPath, content, { executable: template.extension === 'sh' });
    logger.debug('Wrote check', { path: targetPath, templateId: template.id });

    return { metadata, content, targetPath, written: true };
  }

  /**
   * GIVEN/WHEN/THEN from the description, prompting for gaps when interactive
   */
  private async resolveSections(description: string, interactive: boolean): Promise<Required<TddSections>> {
    const sections = parseTddSections(description);
    const missing = missingSections(sections);

    if (missing.length > 0 && !interactive) {
      throw new ValidationError(
        'Description must include GIVEN, WHEN, and THEN sections. ' +
        'Use --interactive to provide them manually if missing.',
        'description',
        { missing }
      );
    }

    const fill = async (section: TddSection): Promise<string> =>
      sections[section] ?? this.prompts.promptForSection(section);

    return {
      GIVEN: await fill('GIVEN'),
      WHEN: await fill('WHEN'),
      THEN: await fill('THEN')
    };
  }

  /**
   * Override or inferred group, checked against the vocabulary
   */
  private async resolveGroup(value: string | undefined, interactive: boolean): Promise<Group> {
    if (value) {
      const normalized = slugify(value);
      if (!isGroup(normalized)) {
        throw new ValidationError(
          `Unsupported group '${value}'. Allowed values: ${VALID_GROUPS.join(', ')}`,
          'group'
        );
      }
      return normalized;
    }

    if (!interactive) {
      throw new ValidationError(
        'Could not infer group from description. Provide --group or use --interactive mode.',
        'group'
      );
    }

    return this.prompts.promptForGroup();
  }

  /**
   * Override or inferred service/test name as a slug
   */
  private async resolveName(field: 'service' | 'test', value: string | undefined, interactive: boolean): Promise<string> {
    const slug = value ? slugify(value) : '';
    if (slug) {
      return slug;
    }

    if (!interactive) {
      throw new ValidationError(
        `Could not infer ${field} from description. Provide --${field} or use --interactive mode.`,
        field
      );
    }

    return this.prompts.promptForValue(field);
  }

  private async ensureWritable(targetPath: string, force: boolean): Promise<void> {
    if (!(await this.fileStore.exists(targetPath))) {
      return;
    }

    if (!force) {
      throw new ConflictError(
        `Target check '${targetPath}' already exists. Use --force to overwrite or choose a different name.`,
        { path: targetPath }
      );
    }

    logger.warn('Overwriting existing check', { path: targetPath });
  }

  private async render(templatePath: string, context: GenerationContext): Promise<string> {
    try {
      return await renderTemplateFile(templatePath, context);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new NotFoundError(`Template file missing: ${templatePath}`, { path: templatePath });
      }
      throw error;
    }
  }
}
