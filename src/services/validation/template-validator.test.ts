// Tests for template validation

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { TemplateValidator } from './template-validator.js';
import { RegistryService } from '../registry/registry-service.js';
import type { Template } from '../../models/template.js';
import { REQUIRED_PLACEHOLDERS } from '../../models/types.js';

const VALID_CONTENT = [
  '# {{TITLE}}',
  '# GIVEN: {{GIVEN}}',
  '# WHEN: {{WHEN}}',
  '# THEN: {{THEN}}',
  'CHECK_ID="{{CHECK_ID}}"',
  'COMMAND="{{COMMAND_HINT}}"',
  ''
].join('\n');

describe('TemplateValidator', () => {
  let tmpDir: string;
  let validator: TemplateValidator;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'checktpl-validate-'));
    validator = new TemplateValidator();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function makeTemplate(overrides: Partial<Template> = {}, content: string | null = VALID_CONTENT): Promise<Template> {
    const filePath = path.join(tmpDir, 'check.sh');
    if (content !== null) {
      await fs.writeFile(filePath, content);
    }
    return {
      id: 'bash-basic',
      label: 'Bash',
      description: '',
      scriptType: 'bash',
      extension: 'sh',
      path: filePath,
      categories: [],
      placeholders: [...REQUIRED_PLACEHOLDERS],
      ...overrides
    };
  }

  it('should report no defects for a well-formed template', async () => {
    const template = await makeTemplate();
    expect(await validator.validate(template)).toEqual([]);
  });

  it('should report only the missing file when the template file is absent', async () => {
    const template = await makeTemplate({}, null);

    const defects = await validator.validate(template);

    expect(defects).toEqual([`Template file missing: ${template.path}`]);
  });

  it('should report a template path that cannot be read as a file', async () => {
    const template = await makeTemplate({ path: tmpDir });

    expect(await validator.validate(template)).toEqual([`Template file unreadable: ${tmpDir} (EISDIR)`]);
  });

  it('should report missing GIVEN/WHEN/THEN guidance', async () => {
    const tokensOnly = await makeTemplate({}, '{{TITLE}} {{GIVEN}} {{WHEN}} {{THEN}} {{CHECK_ID}} {{COMMAND_HINT}}');

    // Placeholder tokens alone carry the keywords
    expect(await validator.validate(tokensOnly)).toEqual([]);

    const bare = await makeTemplate({ placeholders: ['TITLE', 'CHECK_ID', 'COMMAND_HINT'] }, '{{TITLE}} {{CHECK_ID}} {{COMMAND_HINT}}');
    expect(await validator.validate(bare)).toEqual([
      'Template bash-basic registry placeholders missing required entries: GIVEN, THEN, WHEN',
      'Template bash-basic does not include GIVEN/WHEN/THEN guidance'
    ]);
  });

  it('should report a declared placeholder absent from the file', async () => {
    const template = await makeTemplate({}, VALID_CONTENT.replace('{{COMMAND_HINT}}', 'true'));

    expect(await validator.validate(template)).toEqual([
      "Template bash-basic missing placeholder '{{COMMAND_HINT}}' in file"
    ]);
  });

  it('should not check file tokens for placeholders the registry omits', async () => {
    const template = await makeTemplate(
      { placeholders: ['TITLE', 'GIVEN', 'WHEN', 'THEN', 'CHECK_ID'] },
      VALID_CONTENT.replace('{{COMMAND_HINT}}', 'true')
    );

    expect(await validator.validate(template)).toEqual([
      'Template bash-basic registry placeholders missing required entries: COMMAND_HINT'
    ]);
  });

  it('should report an unsupported script type', async () => {
    const template = await makeTemplate({ scriptType: 'zsh' });

    expect(await validator.validate(template)).toEqual([
      "Template bash-basic specifies unsupported script_type 'zsh'"
    ]);
  });

  it('should report an extension mismatch', async () => {
    const template = await makeTemplate({ scriptType: 'powershell' });

    expect(await validator.validate(template)).toEqual([
      "Template bash-basic extension mismatch: expected 'ps1', found 'sh'"
    ]);
  });

  it('should report unsupported categories', async () => {
    const template = await makeTemplate({ categories: ['security', 'network', 'gpu'] });

    expect(await validator.validate(template)).toEqual([
      'Template bash-basic lists unsupported categories: network, gpu'
    ]);
  });

  it('should collect several defects in one pass', async () => {
    const template = await makeTemplate({ scriptType: 'cmd', categories: ['network'] }, null);

    expect(await validator.validate(template)).toEqual([
      "Template bash-basic extension mismatch: expected 'cmd', found 'sh'",
      `Template file missing: ${template.path}`,
      'Template bash-basic lists unsupported categories: network'
    ]);
  });

  describe('validateAll', () => {
    it('should return a report per template in order', async () => {
      const good = await makeTemplate();
      const bad = { ...good, id: 'other', scriptType: 'zsh' };

      const reports = await validator.validateAll([good, bad]);

      expect(reports).toEqual([
        { templateId: 'bash-basic', defects: [], valid: true },
        { templateId: 'other', defects: ["Template other specifies unsupported script_type 'zsh'"], valid: false }
      ]);
    });

    it('should keep going after an unreadable template', async () => {
      const directory = await makeTemplate({ id: 'dir', path: tmpDir });
      const missing = { ...directory, id: 'gone', path: path.join(tmpDir, 'absent.sh') };

      const reports = await validator.validateAll([directory, missing]);

      expect(reports).toEqual([
        { templateId: 'dir', defects: [`Template file unreadable: ${tmpDir} (EISDIR)`], valid: false },
        { templateId: 'gone', defects: [`Template file missing: ${missing.path}`], valid: false }
      ]);
    });

    it('should find no defects in the shipped templates', async () => {
      const registryPath = fileURLToPath(new URL('../../../tests/templates/registry.json', import.meta.url));
      const registry = new RegistryService({ registryPath });

      const reports = await validator.validateAll(await registry.listTemplates());

      expect(reports.map(report => report.templateId)).toEqual(['bash-basic', 'powershell-basic', 'cmd-basic']);
      expect(reports.every(report => report.valid)).toBe(true);
    });
  });
});
