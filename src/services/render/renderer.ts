// Placeholder substitution for check templates

import * as fs from 'fs/promises';
import type { CheckIdentity, GenerationContext, TddSections } from '../../models/generation.js';
import { titleCase } from '../inference/slug.js';

const PLACEHOLDER = /\{\{([^{}]+)\}\}/g;

/**
 * Replaces every literal {{KEY}} with its value in a single pass. Values are
 * inserted as-is and never re-scanned; placeholders without a value are left
 * in the output.
 */
export function renderTemplate(text: string, context: Readonly<Record<string, string>>): string {
  return text.replace(PLACEHOLDER, (token: string, name: string) =>
    Object.hasOwn(context, name) ? context[name] : token
  );
}

/**
 * Reads a template file and renders it
 */
export async function renderTemplateFile(filePath: string, context: GenerationContext): Promise<string> {
  const text = await fs.readFile(filePath, 'utf-8');
  return renderTemplate(text, context);
}

/**
 * Placeholder command for the check body, in the naming style of the script type
 */
export function deriveCommandHint(scriptType: string): string {
  if (scriptType === 'bash') return 'replace_with_command';
  if (scriptType === 'powershell') return 'Replace-With-Command';
  return 'REPLACE_WITH_COMMAND';
}

/**
 * `{group}_{service}_{test}`
 */
export function checkId(identity: CheckIdentity): string {
  return `${identity.group}_${identity.service}_${identity.test}`;
}

/**
 * `{group}-{service}-{test}.{extension}`
 */
export function checkFileName(identity: CheckIdentity, extension: string): string {
  return `${identity.group}-${identity.service}-${identity.test}.${extension}`;
}

/**
 * Builds the substitution values for a check
 */
export function buildGenerationContext(
  identity: CheckIdentity,
  sections: Required<TddSections>,
  scriptType: string
): GenerationContext {
  return {
    TITLE: titleCase(identity.group, identity.service, identity.test),
    GIVEN: sections.GIVEN,
    WHEN: sections.WHEN,
    THEN: sections.THEN,
    CHECK_ID: checkId(identity),
    COMMAND_HINT: deriveCommandHint(scriptType)
  };
}
