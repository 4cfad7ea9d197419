// Generate command: create a check script from a description

import * as path from 'path';
import { Command, Option } from 'commander';
import { ScriptTypeSchema } from '../../core/schemas.js';
import type { GenerateRequest, GenerationResult } from '../../models/generation.js';
import { GenerationService } from '../../services/generation/generation-service.js';
import { PromptService } from '../../services/prompt/prompt-service.js';
import { CheckFileStore } from '../../services/storage/check-file-store.js';
import { withErrorHandling } from '../utils/error-handler.js';
import { openWorkspace, type Workspace, type WorkspaceOptions } from '../utils/workspace.js';

export interface GenerateCommandOptions {
  description?: string;
  group?: string;
  service?: string;
  test?: string;
  scriptType?: string;
  templateId?: string;
  outputDir?: string;
  interactive?: boolean;
  dryRun?: boolean;
  force?: boolean;
  json?: boolean;
  metadata?: string;
}

/**
 * Prints the outcome of a generation: the script for dry runs, otherwise the
 * metadata as JSON or as a summary
 */
export function printGenerationResult(result: GenerationResult, options: { json?: boolean }): void {
  if (!result.written) {
    console.log(result.content);
    return;
  }

  const { metadata } = result;
  if (options.json) {
    console.log(JSON.stringify(metadata, null, 2));
    return;
  }

  console.log(`Generated check: ${metadata.file}`);
  console.log(`  Template : ${metadata.template_id}`);
  console.log(`  Group    : ${metadata.group}`);
  console.log(`  Service  : ${metadata.service}`);
  console.log(`  Test     : ${metadata.test}`);
  console.log('  Reminder : Update the placeholder logic before running the orchestrator.');
}

/**
 * Runs a generation and reports it
 */
export async function generateCheck(
  workspace: Workspace,
  options: GenerateCommandOptions,
  deps: { prompts?: PromptService; fileStore?: CheckFileStore; cwd?: string } = {}
): Promise<number> {
  const fileStore = deps.fileStore ?? new CheckFileStore();
  const service = new GenerationService(
    workspace.registry,
    { checksDir: workspace.paths.checksDir, cwd: deps.cwd },
    { prompts: deps.prompts, fileStore }
  );

  const request: GenerateRequest = {
    description: options.description ?? '',
    group: options.group,
    service: options.service,
    test: options.test,
    scriptType: options.scriptType,
    templateId: options.templateId,
    outputDir: options.outputDir,
    interactive: options.interactive,
    dryRun: options.dryRun,
    force: options.force
  };

  const result = await service.generate(request);
  printGenerationResult(result, options);

  if (result.written && options.metadata) {
    await fileStore.writeJson(path.resolve(options.metadata), result.metadata);
  }

  return 0;
}

export function registerGenerateCommand(program: Command): void {
  program
    .command('generate')
    .description('Generate a new check from a description')
    .option('-d, --description <text>', 'Natural language description containing GIVEN/WHEN/THEN')
    .option('--group <group>', 'Override inferred group')
    .option('--service <service>', 'Override inferred service name')
    .option('--test <test>', 'Override inferred test name')
    .addOption(
      new Option('--script-type <type>', 'Preferred script type when template id is not specified')
        .choices(ScriptTypeSchema.options)
    )
    .option('--template-id <id>', 'Explicit template identifier to use')
    .option('--output-dir <dir>', 'Directory where the check should be created')
    .option('--interactive', 'Prompt for missing details', false)
    .option('--dry-run', 'Print generated script without writing', false)
    .option('--force', 'Overwrite existing check if present', false)
    .option('--json', 'Emit metadata as JSON to stdout', false)
    .option('--metadata <path>', 'Optional path to store metadata JSON')
    .option('-p, --path <path>', 'Base path', process.cwd())
    .action(withErrorHandling(async (options: GenerateCommandOptions, command: Command) => {
      const workspace = await openWorkspace(command.optsWithGlobals<WorkspaceOptions>());
      return generateCheck(workspace, options);
    }));
}
