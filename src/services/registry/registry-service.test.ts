// Tests for the template registry service

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { RegistryService } from './registry-service.js';
import { NotFoundError, RegistryError, ValidationError } from '../../core/errors.js';

const PLACEHOLDERS = ['TITLE', 'GIVEN', 'WHEN', 'THEN', 'CHECK_ID', 'COMMAND_HINT'];

describe('RegistryService', () => {
  let tmpDir: string;
  let registryPath: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'checktpl-registry-'));
    registryPath = path.join(tmpDir, 'registry.json');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function writeRegistry(document: unknown): Promise<RegistryService> {
    await fs.writeFile(registryPath, JSON.stringify(document));
    return new RegistryService({ registryPath });
  }

  function twoTemplates() {
    return {
      version: 3,
      templates: [
        {
          id: 'bash-basic',
          label: 'Bash',
          script_type: 'bash',
          extension: 'sh',
          path: 'bash/basic-check.sh',
          placeholders: PLACEHOLDERS
        },
        {
          id: 'pwsh-wsl',
          script_type: 'powershell',
          extension: 'ps1',
          path: 'powershell/check.ps1',
          categories: ['wsl2'],
          placeholders: PLACEHOLDERS
        }
      ]
    };
  }

  describe('load', () => {
    it('should map records to templates with resolved paths and defaults', async () => {
      const service = await writeRegistry(twoTemplates());

      const registry = await service.load();

      expect(registry.version).toBe(3);
      expect(registry.templates).toEqual([
        {
          id: 'bash-basic',
          label: 'Bash',
          description: '',
          scriptType: 'bash',
          extension: 'sh',
          path: path.join(tmpDir, 'bash', 'basic-check.sh'),
          categories: [],
          placeholders: PLACEHOLDERS
        },
        {
          id: 'pwsh-wsl',
          label: 'pwsh-wsl',
          description: '',
          scriptType: 'powershell',
          extension: 'ps1',
          path: path.join(tmpDir, 'powershell', 'check.ps1'),
          categories: ['wsl2'],
          placeholders: PLACEHOLDERS
        }
      ]);
    });

    it('should resolve template paths against a configured templates directory', async () => {
      await fs.writeFile(registryPath, JSON.stringify(twoTemplates()));
      const service = new RegistryService({ registryPath, templatesDir: path.join(tmpDir, 'elsewhere') });

      const template = await service.findTemplate('bash-basic');

      expect(template?.path).toBe(path.join(tmpDir, 'elsewhere', 'bash', 'basic-check.sh'));
    });

    it('should default the version and accept numeric scalars', async () => {
      const service = await writeRegistry({
        templates: [{ id: 7, script_type: 'bash', extension: 'sh', path: 'a.sh' }]
      });

      const registry = await service.load();

      expect(registry.version).toBe(1);
      expect(registry.templates[0]?.id).toBe('7');
      expect(registry.templates[0]?.placeholders).toEqual([]);
    });

    it('should accept an empty template list', async () => {
      const service = await writeRegistry({ version: 1, templates: [] });
      expect(await service.listTemplates()).toEqual([]);
    });

    it('should fail when the registry file is missing', async () => {
      const service = new RegistryService({ registryPath });

      await expect(service.load()).rejects.toThrow(RegistryError);
      await expect(service.load()).rejects.toThrow(`Template registry not found: ${registryPath}`);
    });

    it('should fail on malformed JSON', async () => {
      await fs.writeFile(registryPath, '{ "templates": [');
      const service = new RegistryService({ registryPath });

      await expect(service.load()).rejects.toThrow(/^Template registry is not valid JSON: /);
    });

    it('should name the first missing required field', async () => {
      const service = await writeRegistry({
        version: 1,
        templates: [{ id: 'broken', script_type: 'bash', extension: 'sh' }]
      });

      await expect(service.load()).rejects.toThrow("Template registry entry missing required field: 'path'");
    });

    it('should cache the loaded registry', async () => {
      const service = await writeRegistry(twoTemplates());

      const first = await service.load();
      await fs.rm(registryPath);

      expect(await service.load()).toBe(first);
    });
  });

  describe('selectTemplate', () => {
    it('should select by id ahead of script type', async () => {
      const service = await writeRegistry(twoTemplates());

      const template = await service.selectTemplate({ templateId: 'pwsh-wsl', scriptType: 'bash' });

      expect(template.id).toBe('pwsh-wsl');
    });

    it('should select the first template of a script type', async () => {
      const service = await writeRegistry(twoTemplates());

      const template = await service.selectTemplate({ scriptType: 'powershell' });

      expect(template.id).toBe('pwsh-wsl');
    });

    it('should reject an unknown id', async () => {
      const service = await writeRegistry(twoTemplates());

      const selection = service.selectTemplate({ templateId: 'nope' });

      await expect(selection).rejects.toThrow(NotFoundError);
      await expect(service.selectTemplate({ templateId: 'nope' })).rejects.toThrow(
        "Unknown template id 'nope'. Use the list command to inspect options."
      );
    });

    it('should reject a script type without templates', async () => {
      const service = await writeRegistry(twoTemplates());

      await expect(service.selectTemplate({ scriptType: 'cmd' })).rejects.toThrow(
        "No templates available for script type 'cmd'. Use the list command to confirm options."
      );
    });

    it('should require a selector', async () => {
      const service = await writeRegistry(twoTemplates());

      await expect(service.selectTemplate({})).rejects.toThrow(ValidationError);
    });
  });

  describe('updateTemplate', () => {
    it('should replace the template file with the source content', async () => {
      const service = await writeRegistry(twoTemplates());
      const source = path.join(tmpDir, 'new.sh');
      await fs.writeFile(source, '# {{TITLE}} v2\n');

      const template = await service.updateTemplate('bash-basic', source);

      expect(template.id).toBe('bash-basic');
      expect(await fs.readFile(path.join(tmpDir, 'bash', 'basic-check.sh'), 'utf-8')).toBe('# {{TITLE}} v2\n');
      expect(await fs.readFile(source, 'utf-8')).toBe('# {{TITLE}} v2\n');
    });

    it('should leave the registry document untouched', async () => {
      const service = await writeRegistry(twoTemplates());
      const before = await fs.readFile(registryPath, 'utf-8');
      const source = path.join(tmpDir, 'new.sh');
      await fs.writeFile(source, 'x');

      await service.updateTemplate('bash-basic', source);

      expect(await fs.readFile(registryPath, 'utf-8')).toBe(before);
    });

    it('should reject an unknown template', async () => {
      const service = await writeRegistry(twoTemplates());

      await expect(service.updateTemplate('nope', registryPath)).rejects.toThrow(
        "Template 'nope' not found in registry."
      );
    });

    it('should reject a missing source file', async () => {
      const service = await writeRegistry(twoTemplates());
      const source = path.join(tmpDir, 'absent.sh');

      await expect(service.updateTemplate('bash-basic', source)).rejects.toThrow(`Source file not found: ${source}`);
    });
  });
});
