// Zod schemas for the registry document and the configuration file

import { z, ZodError } from 'zod';

/**
 * Script type enum
 */
export const ScriptTypeSchema = z.enum(['bash', 'powershell', 'cmd']);

/**
 * Scalars are accepted as strings or numbers and read as strings
 */
const ScalarSchema = z.preprocess(
  value => (typeof value === 'number' ? String(value) : value),
  z.string()
);

/**
 * A template record as written in registry.json.
 *
 * script_type, extension and categories are not checked against the
 * vocabularies here; the template validator reports those as defects.
 */
export const TemplateRecordSchema = z.object({
  id: ScalarSchema,
  label: ScalarSchema.optional(),
  description: ScalarSchema.optional(),
  script_type: ScalarSchema,
  extension: ScalarSchema,
  path: ScalarSchema,
  categories: z.array(ScalarSchema).default([]),
  placeholders: z.array(ScalarSchema).default([])
});

/**
 * The registry document
 */
export const RegistrySchema = z.object({
  version: z.coerce.number().int().default(1),
  templates: z.array(TemplateRecordSchema).default([])
});

/**
 * Log level names accepted in configuration
 */
export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/**
 * .checktpl/config.yaml
 */
export const ConfigSchema = z.object({
  paths: z.object({
    templatesDir: z.string().min(1).optional(),
    registryFile: z.string().min(1).optional(),
    checksDir: z.string().min(1).optional()
  }).strict().optional(),
  logging: z.object({
    level: LogLevelSchema.optional()
  }).strict().optional()
}).strict();

/**
 * Type exports
 */
export type TemplateRecord = z.infer<typeof TemplateRecordSchema>;
export type ConfigFile = z.infer<typeof ConfigSchema>;

/**
 * Safe validation (returns result instead of throwing)
 */
export function safeValidateRegistry(data: unknown) {
  return RegistrySchema.safeParse(data);
}

export function safeValidateConfig(data: unknown) {
  return ConfigSchema.safeParse(data);
}

/**
 * Turns the first schema issue into a one-line message. A missing template
 * field is reported the way operators know it from the registry format.
 */
export function describeSchemaIssue(error: ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return 'Invalid document';
  }

  const location = issue.path.join('.');
  const field = issue.path[issue.path.length - 1];
  const isMissing = issue.code === 'invalid_type' && issue.received === 'undefined';

  if (isMissing && issue.path[0] === 'templates' && typeof field === 'string') {
    return `Template registry entry missing required field: '${field}'`;
  }

  return location ? `${location}: ${issue.message}` : issue.message;
}
