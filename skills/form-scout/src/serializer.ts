import { mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import { z } from "zod";
import { WriteError } from "./errors";
import type { PageResult } from "./types";

export const FieldDescriptorSchema = z.object({
  name: z.string(),
  id: z.string(),
  type: z.enum(["text", "email", "password", "checkbox", "radio", "select", "textarea", "other"]),
  label: z.string(),
  required: z.boolean(),
  options: z.array(z.string()),
  placeholder: z.string(),
});

export const FormDescriptorSchema = z.object({
  name: z.string(),
  id: z.string(),
  fields: z.array(FieldDescriptorSchema),
  submit_button: z.string(),
});

export const PageResultSchema = z.object({
  success: z.boolean(),
  url: z.string(),
  forms: z.array(FormDescriptorSchema),
  screenshots: z.array(z.string()),
  error: z.string().nullable(),
});

/**
 * Canonical JSON for a result. Keys are written in a fixed order,
 * whatever order the in-memory objects carry them in.
 */
export function toJson(result: PageResult, indent = 2): string {
  const canonical: PageResult = {
    success: result.success,
    url: result.url,
    forms: result.forms.map((form) => ({
      name: form.name,
      id: form.id,
      fields: form.fields.map((field) => ({
        name: field.name,
        id: field.id,
        type: field.type,
        label: field.label,
        required: field.required,
        options: [...field.options],
        placeholder: field.placeholder,
      })),
      submit_button: form.submit_button,
    })),
    screenshots: [...result.screenshots],
    error: result.error,
  };
  return JSON.stringify(canonical, null, indent);
}

/**
 * Parse and validate a serialized result.
 * Throws a ZodError when the document does not have the result shape.
 */
export function parsePageResult(json: string): PageResult {
  return PageResultSchema.parse(JSON.parse(json));
}

/**
 * Write a result as UTF-8 JSON, creating parent directories.
 * Any failure surfaces as a WriteError; there is no retry.
 */
export function saveResult(result: PageResult, outputFile: string): void {
  try {
    mkdirSync(dirname(outputFile), { recursive: true });
    writeFileSync(outputFile, toJson(result) + "\n", "utf-8");
  } catch (err) {
    throw new WriteError(outputFile, err);
  }
}
