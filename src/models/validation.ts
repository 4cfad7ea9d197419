// Template validation result types

/**
 * Defects found for one template. Defects are human-readable strings that
 * name the template; an empty list means the template is valid.
 */
export interface TemplateReport {
  templateId: string;
  defects: string[];
  valid: boolean;
}
