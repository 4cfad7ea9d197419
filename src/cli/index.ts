#!/usr/bin/env node
// Check template kit CLI

import { Command } from 'commander';
import { registerTemplateCommands } from './commands/template.js';
import { registerGenerateCommand } from './commands/generate.js';

const program = new Command();

program
  .name('checktpl')
  .description('Manage check templates and generate GIVEN/WHEN/THEN check scripts')
  .version('0.1.0')
  .option('--verbose', 'Log inference and file operations to stderr', false);

registerTemplateCommands(program);
registerGenerateCommand(program);

await program.parseAsync();
