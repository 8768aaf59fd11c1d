import type { DomElement } from "./dom";
import { ElementReadError } from "./errors";
import { silentLogger, type Logger } from "./logger";
import type { FieldDescriptor, FieldType } from "./types";

export const FIELD_SELECTOR = "input, select, textarea";

// Inputs that carry no user data
const NON_FIELD_INPUTS = new Set(["hidden", "submit", "button", "reset", "image"]);

const NAMED_INPUT_TYPES: readonly FieldType[] = ["text", "email", "password", "checkbox", "radio"];

// Same-name members of these types collapse into one field
const GROUPED_TYPES = new Set<FieldType>(["checkbox", "radio"]);

/**
 * Map an element to a field type.
 * Returns null for elements that are not input-bearing (hidden inputs, buttons).
 */
export function classifyField(tag: string, inputType: string | null): FieldType | null {
  switch (tag.toLowerCase()) {
    case "select":
      return "select";
    case "textarea":
      return "textarea";
    case "input": {
      const kind = (inputType ?? "").trim().toLowerCase() || "text";
      if (NON_FIELD_INPUTS.has(kind)) return null;
      return NAMED_INPUT_TYPES.find((named) => named === kind) ?? "other";
    }
    default:
      return "other";
  }
}

export function normalizeText(value: string | null | undefined): string {
  return (value ?? "").replace(/\s+/g, " ").trim();
}

function attributeSelector(attr: string, value: string): string {
  return `[${attr}="${value.replace(/["\\]/g, "\\$&")}"]`;
}

/**
 * Resolve the visible label of a field.
 * Order: label[for=id] in the form, enclosing <label>, aria-label,
 * nearest preceding sibling text, placeholder.
 */
export async function resolveLabel(
  form: DomElement,
  element: DomElement,
  id: string,
  placeholder: string
): Promise<string> {
  if (id) {
    const labels = await form.querySelectorAll(`label${attributeSelector("for", id)}`);
    for (const label of labels) {
      const text = normalizeText(await label.labelText());
      if (text) return text;
    }
  }

  const wrapping = await element.closest("label");
  if (wrapping) {
    const text = normalizeText(await wrapping.labelText());
    if (text) return text;
  }

  const ariaLabel = normalizeText(await element.getAttribute("aria-label"));
  if (ariaLabel) return ariaLabel;

  const preceding = normalizeText(await element.precedingText());
  if (preceding) return preceding;

  return normalizeText(placeholder);
}

async function readSelectOptions(select: DomElement): Promise<string[]> {
  const options: string[] = [];
  for (const option of await select.querySelectorAll("option")) {
    const text = normalizeText(await option.textContent()) || normalizeText(await option.getAttribute("value"));
    if (text) options.push(text);
  }
  return options;
}

async function readField(form: DomElement, element: DomElement): Promise<FieldDescriptor | null> {
  const tag = await element.tagName();
  const type = classifyField(tag, await element.getAttribute("type"));
  if (!type) return null;

  const id = (await element.getAttribute("id")) ?? "";
  const name = (await element.getAttribute("name")) ?? "";
  const placeholder = (await element.getAttribute("placeholder")) ?? "";
  const required =
    (await element.getAttribute("required")) !== null ||
    (await element.getAttribute("aria-required")) === "true";
  const label = await resolveLabel(form, element, id, placeholder);

  const field: FieldDescriptor = { name, id, type, label, required, options: [], placeholder };

  if (type === "select") {
    field.options = await readSelectOptions(element);
    // A select with nothing to choose is not a choice field
    if (field.options.length === 0) field.type = "other";
  } else if (GROUPED_TYPES.has(type)) {
    const value = normalizeText(await element.getAttribute("value"));
    field.options = [value || label || "on"];
  }

  return field;
}

/**
 * Extract field descriptors from one form-like container, in document order.
 * Unreadable elements are logged and skipped.
 */
export async function inspectFields(
  form: DomElement,
  logger: Logger = silentLogger
): Promise<FieldDescriptor[]> {
  const elements = await form.querySelectorAll(FIELD_SELECTOR);
  const fields: FieldDescriptor[] = [];
  const groups = new Map<string, FieldDescriptor>();

  for (const [index, element] of elements.entries()) {
    let field: FieldDescriptor | null;
    try {
      field = await readField(form, element);
    } catch (err) {
      const readError = new ElementReadError(`field ${index + 1}`, err);
      logger.warn(`Skipping field: ${readError.message}`);
      continue;
    }
    if (!field) continue;

    if (GROUPED_TYPES.has(field.type) && field.name) {
      const key = `${field.type}:${field.name}`;
      const group = groups.get(key);
      if (group) {
        group.options.push(...field.options);
        group.required = group.required || field.required;
        continue;
      }
      groups.set(key, field);
    }

    fields.push(field);
  }

  return fields;
}
