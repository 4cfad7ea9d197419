// Core type definitions for the check template kit

// Behavioral groups, in inference priority order
export const VALID_GROUPS = [
  'security',
  'storage',
  'communication',
  'environment',
  'monitoring',
  'performance',
  'wsl2'
] as const;

export type Group = typeof VALID_GROUPS[number];

// Script types and their canonical file extensions
export const SCRIPT_TYPE_EXTENSIONS = {
  bash: 'sh',
  powershell: 'ps1',
  cmd: 'cmd'
} as const;

export type ScriptType = keyof typeof SCRIPT_TYPE_EXTENSIONS;

export const SCRIPT_TYPES: readonly ScriptType[] = ['bash', 'powershell', 'cmd'];

// Placeholders every template must declare and contain
export const REQUIRED_PLACEHOLDERS = [
  'TITLE',
  'GIVEN',
  'WHEN',
  'THEN',
  'CHECK_ID',
  'COMMAND_HINT'
] as const;

export type PlaceholderName = typeof REQUIRED_PLACEHOLDERS[number];

// TDD section keywords
export const TDD_SECTIONS = ['GIVEN', 'WHEN', 'THEN'] as const;

export type TddSection = typeof TDD_SECTIONS[number];

export function isGroup(value: string): value is Group {
  return (VALID_GROUPS as readonly string[]).includes(value);
}

export function isScriptType(value: string): value is ScriptType {
  return (SCRIPT_TYPES as readonly string[]).includes(value);
}
