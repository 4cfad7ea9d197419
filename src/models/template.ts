// Template model for check-script templates

/**
 * A reusable check-script skeleton registered in the template registry.
 *
 * `scriptType` and `categories` are kept as raw strings so a registry with
 * bad values still loads and the validator can report every problem.
 */
export interface Template {
  /** Unique identifier for the template */
  id: string;
  /** Display name (defaults to the id) */
  label: string;
  description: string;
  /** Script type tag, expected to be one of SCRIPT_TYPES */
  scriptType: string;
  /** File extension without the leading dot */
  extension: string;
  /** Absolute path to the template file */
  path: string;
  /** Groups this template applies to; empty means every group */
  categories: string[];
  /** Placeholder names the template declares */
  placeholders: string[];
}

/**
 * Versioned collection of templates
 */
export interface Registry {
  version: number;
  templates: Template[];
}
