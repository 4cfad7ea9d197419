// Template registry commands: list, validate, update

import * as path from 'path';
import { Command } from 'commander';
import { TemplateValidator } from '../../services/validation/template-validator.js';
import { displayPath } from '../../services/generation/generation-service.js';
import { withErrorHandling } from '../utils/error-handler.js';
import { openWorkspace, type Workspace, type WorkspaceOptions } from '../utils/workspace.js';

interface BaseOptions {
  path: string;
}

/**
 * Prints every registered template
 */
export async function listTemplates(workspace: Workspace, cwd: string = process.cwd()): Promise<number> {
  const registry = await workspace.registry.load();

  console.log(`Template registry version: ${registry.version}`);
  for (const t of registry.templates) {
    const categories = t.categories.length > 0 ? t.categories.join(', ') : '(all)';
    console.log(`\nID: ${t.id}`);
    console.log(`  Label      : ${t.label}`);
    if (t.description) {
      console.log(`  Description: ${t.description}`);
    }
    console.log(`  Script Type: ${t.scriptType} (.${t.extension})`);
    console.log(`  Path       : ${displayPath(t.path, cwd)}`);
    console.log(`  Categories : ${categories}`);
    console.log(`  Placeholders: ${t.placeholders.join(', ')}`);
  }

  return 0;
}

/**
 * Validates every template and prints its defects
 * @returns 1 when any template has a defect
 */
export async function validateTemplates(workspace: Workspace, validator = new TemplateValidator()): Promise<number> {
  const templates = await workspace.registry.listTemplates();
  const reports = await validator.validateAll(templates);

  for (const report of reports) {
    if (report.valid) {
      console.log(`Template ${report.templateId}: OK`);
      continue;
    }
    console.log(`Template ${report.templateId} issues:`);
    for (const defect of report.defects) {
      console.log(`  - ${defect}`);
    }
  }

  if (reports.some(report => !report.valid)) {
    return 1;
  }

  console.log('All templates validated successfully.');
  return 0;
}

/**
 * Replaces a template's file with the content of a source file
 */
export async function updateTemplate(workspace: Workspace, templateId: string, source: string): Promise<number> {
  const sourcePath = path.resolve(source);
  await workspace.registry.updateTemplate(templateId, sourcePath);
  console.log(`Updated template ${templateId} from ${sourcePath}.`);
  return 0;
}

export function registerTemplateCommands(program: Command): void {
  program
    .command('list')
    .description('List available templates')
    .option('-p, --path <path>', 'Base path', process.cwd())
    .action(withErrorHandling(async (_options: BaseOptions, command: Command) => {
      const workspace = await openWorkspace(command.optsWithGlobals<WorkspaceOptions>());
      return listTemplates(workspace);
    }));

  program
    .command('validate')
    .description('Validate template integrity')
    .option('-p, --path <path>', 'Base path', process.cwd())
    .action(withErrorHandling(async (_options: BaseOptions, command: Command) => {
      const workspace = await openWorkspace(command.optsWithGlobals<WorkspaceOptions>());
      return validateTemplates(workspace);
    }));

  program
    .command('update')
    .description('Update template content from a source file')
    .argument('<template_id>', 'Template identifier to update')
    .argument('<source_path>', 'Source file with new template content')
    .option('-p, --path <path>', 'Base path', process.cwd())
    .action(withErrorHandling(async (templateId: string, source: string, _options: BaseOptions, command: Command) => {
      const workspace = await openWorkspace(command.optsWithGlobals<WorkspaceOptions>());
      return updateTemplate(workspace, templateId, source);
    }));
}
