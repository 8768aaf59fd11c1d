import { normalizeText } from "./inspector";
import type { FieldDescriptor, PageResult } from "./types";

export const SAMPLE_EMAIL = "user@example.com";
export const SAMPLE_PASSWORD = "example-password";

/**
 * id, else name, else label; empty when the field has none of them.
 * Whitespace is collapsed so a statement never spans lines.
 */
export function fieldSelector(field: FieldDescriptor): string {
  return normalizeText(field.id) || normalizeText(field.name) || normalizeText(field.label);
}

function fieldKey(field: FieldDescriptor): string {
  return normalizeText(field.name) || normalizeText(field.id) || "value";
}

/**
 * Placeholder value for a field, derived from its type.
 * Returns null when there is nothing sensible to enter (a choice field without options).
 */
export function sampleValue(field: FieldDescriptor): string | null {
  switch (field.type) {
    case "email":
      return SAMPLE_EMAIL;
    case "password":
      return SAMPLE_PASSWORD;
    case "textarea":
      return `Sample text for ${fieldKey(field)}`;
    case "checkbox":
      return "checked";
    case "radio":
    case "select":
      return field.options[0] ?? null;
    case "text":
    case "other":
      return `example_${fieldKey(field)}`;
  }
}

/**
 * Turn an analysis result into a line-per-statement fill script:
 *
 *   set email to user@example.com
 *   set password to example-password
 *   click Log In
 *
 * Deterministic; failed results and pages without forms give an empty script.
 */
export function generateScript(result: PageResult): string {
  if (!result.success) return "";

  const lines: string[] = [];
  for (const form of result.forms) {
    for (const field of form.fields) {
      const selector = fieldSelector(field);
      const value = sampleValue(field);
      if (!selector || value === null) continue;
      lines.push(`set ${selector} to ${value}`);
    }
    lines.push(`click ${normalizeText(form.submit_button)}`);
  }

  return lines.join("\n");
}
