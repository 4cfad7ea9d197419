// Structural validation of registered templates against their backing files

import * as fs from 'fs/promises';
import type { Template } from '../../models/template.js';
import type { TemplateReport } from '../../models/validation.js';
import {
  REQUIRED_PLACEHOLDERS,
  SCRIPT_TYPE_EXTENSIONS,
  TDD_SECTIONS,
  isGroup,
  isScriptType
} from '../../models/types.js';

type TemplateFile =
  | { status: 'ok'; content: string }
  | { status: 'missing' }
  | { status: 'unreadable'; code: string };

/**
 * Reads the template file. Read failures become a status so that one bad
 * path does not stop the remaining templates from being checked.
 */
async function readTemplateFile(filePath: string): Promise<TemplateFile> {
  try {
    return { status: 'ok', content: await fs.readFile(filePath, 'utf-8') };
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code ?? 'UNKNOWN';
    return code === 'ENOENT' ? { status: 'missing' } : { status: 'unreadable', code };
  }
}

/**
 * Checks declared and embedded placeholders plus GIVEN/WHEN/THEN guidance
 */
function checkContent(template: Template, content: string): string[] {
  const defects: string[] = [];

  const missingDeclared = REQUIRED_PLACEHOLDERS
    .filter(name => !template.placeholders.includes(name))
    .sort();
  if (missingDeclared.length > 0) {
    defects.push(
      `Template ${template.id} registry placeholders missing required entries: ${missingDeclared.join(', ')}`
    );
  }

  for (const name of REQUIRED_PLACEHOLDERS) {
    if (!template.placeholders.includes(name)) continue;
    if (!content.includes(`{{${name}}}`)) {
      defects.push(`Template ${template.id} missing placeholder '{{${name}}}' in file`);
    }
  }

  // Plain keywords, independent of the placeholder tokens
  if (!TDD_SECTIONS.every(keyword => content.includes(keyword))) {
    defects.push(`Template ${template.id} does not include GIVEN/WHEN/THEN guidance`);
  }

  return defects;
}

/**
 * Collects every defect of a template instead of stopping at the first one,
 * so a single run surfaces all problems across the registry.
 */
export class TemplateValidator {
  /**
   * Validates one template. Problems are returned, never thrown.
   */
  async validate(template: Template): Promise<string[]> {
    const defects: string[] = [];

    if (!isScriptType(template.scriptType)) {
      defects.push(`Template ${template.id} specifies unsupported script_type '${template.scriptType}'`);
    } else {
      const expected = SCRIPT_TYPE_EXTENSIONS[template.scriptType];
      if (expected !== template.extension) {
        defects.push(
          `Template ${template.id} extension mismatch: expected '${expected}', found '${template.extension}'`
        );
      }
    }

    const file = await readTemplateFile(template.path);
    if (file.status === 'missing') {
      defects.push(`Template file missing: ${template.path}`);
    } else if (file.status === 'unreadable') {
      defects.push(`Template file unreadable: ${template.path} (${file.code})`);
    } else {
      defects.push(...checkContent(template, file.content));
    }

    const unknownCategories = template.categories.filter(category => !isGroup(category));
    if (unknownCategories.length > 0) {
      defects.push(`Template ${template.id} lists unsupported categories: ${unknownCategories.join(', ')}`);
    }

    return defects;
  }

  /**
   * Validates every template in registry order
   */
  async validateAll(templates: Template[]): Promise<TemplateReport[]> {
    const reports: TemplateReport[] = [];

    for (const template of templates) {
      const defects = await this.validate(template);
      reports.push({ templateId: template.id, defects, valid: defects.length === 0 });
    }

    return reports;
  }
}
