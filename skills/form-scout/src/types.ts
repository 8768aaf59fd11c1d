// Result and option types - shared between the analyzer, tools and server

export type FieldType =
  | "text"
  | "email"
  | "password"
  | "checkbox"
  | "radio"
  | "select"
  | "textarea"
  | "other";

/** Field types whose values come from a fixed set of options */
export const CHOICE_TYPES: ReadonlySet<FieldType> = new Set(["select", "radio", "checkbox"]);

export interface FieldDescriptor {
  name: string;
  id: string;
  type: FieldType;
  label: string;
  required: boolean;
  /** Non-empty only for choice types (select, radio, checkbox) */
  options: string[];
  placeholder: string;
}

export interface FormDescriptor {
  name: string;
  id: string;
  fields: FieldDescriptor[];
  submit_button: string;
}

export interface PageResult {
  success: boolean;
  url: string;
  forms: FormDescriptor[];
  screenshots: string[];
  /** Set only when success is false */
  error: string | null;
}

export interface AnalyzerOptions {
  headless?: boolean;
  /** Directory for full-page and per-form screenshots */
  screenshotDir?: string;
  /** Navigation timeout in ms (default: 30000) */
  navigationTimeout?: number;
  /** Selector for form-like containers (default: "form") */
  formSelector?: string;
  /** Set to false to skip screenshot capture entirely */
  screenshots?: boolean;
}

export interface ServeOptions {
  port?: number;
  headless?: boolean;
  screenshotDir?: string;
  navigationTimeout?: number;
  formSelector?: string;
}

export interface ToolInfo {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface ToolCatalogResponse {
  tools: ToolInfo[];
}

export interface ToolErrorResponse {
  error: string;
  issues?: string[];
}
