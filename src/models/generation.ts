// Generation models: substitution context, requests and metadata

import type { Group, PlaceholderName, TddSection } from './types.js';

/**
 * Values substituted into a template, one per required placeholder
 */
export type GenerationContext = Record<PlaceholderName, string>;

/**
 * GIVEN/WHEN/THEN fragments extracted from a description
 */
export type TddSections = Partial<Record<TddSection, string>>;

/**
 * Group, service and test that identify a check
 */
export interface CheckIdentity {
  group: Group;
  service: string;
  test: string;
}

/**
 * Input of a generate request. Every field except the description is an
 * optional override; unset fields are inferred or prompted for.
 */
export interface GenerateRequest {
  description: string;
  group?: string;
  service?: string;
  test?: string;
  scriptType?: string;
  templateId?: string;
  outputDir?: string;
  interactive?: boolean;
  dryRun?: boolean;
  force?: boolean;
}

/**
 * Machine-readable record of a generated check
 */
export interface CheckMetadata {
  registry_version: number;
  template_id: string;
  script_type: string;
  group: Group;
  service: string;
  test: string;
  check_id: string;
  file: string;
}

/**
 * Outcome of a generate request
 */
export interface GenerationResult {
  metadata: CheckMetadata;
  /** Rendered script text */
  content: string;
  /** Absolute output path */
  targetPath: string;
  /** False for dry runs */
  written: boolean;
}
