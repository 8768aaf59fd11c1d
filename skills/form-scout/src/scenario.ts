import { readFileSync } from "fs";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { z } from "zod";
import { sampleValue } from "./script-generator";
import type { FieldDescriptor, PageResult } from "./types";

/**
 * Scenario schema - a replayable list of browser steps
 */
const OnErrorSchema = z.enum(["stop", "continue"]);

const base = { onError: OnErrorSchema.optional() };

const GotoStepSchema = z.object({
  ...base,
  goto: z.union([
    z.string(),
    z.object({ url: z.string(), waitUntil: z.enum(["load", "networkidle"]).optional() }),
  ]),
});

const ClickStepSchema = z.object({
  ...base,
  click: z.union([
    z.string(),
    z.object({
      selector: z.string().optional(),
      text: z.string().optional(),
      timeout: z.number().int().positive().optional(),
    }),
  ]),
});

const FillStepSchema = z.object({
  ...base,
  fill: z.union([z.object({ selector: z.string(), value: z.string() }), z.record(z.string())]),
});

const SelectStepSchema = z.object({
  ...base,
  select: z.object({ selector: z.string(), option: z.string() }),
});

const CheckStepSchema = z.object({ ...base, check: z.string() });

const WaitStepSchema = z.object({
  ...base,
  wait: z.union([
    z.enum(["load", "networkidle"]),
    z.object({
      element: z.string().optional(),
      ms: z.number().nonnegative().optional(),
      timeout: z.number().int().positive().optional(),
    }),
  ]),
});

const ScreenshotStepSchema = z.object({
  ...base,
  screenshot: z.union([z.string(), z.object({ path: z.string(), fullPage: z.boolean().optional() })]),
});

export const StepSchema = z.union([
  GotoStepSchema,
  ClickStepSchema,
  FillStepSchema,
  SelectStepSchema,
  CheckStepSchema,
  WaitStepSchema,
  ScreenshotStepSchema,
]);

export const ScenarioSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  variables: z.record(z.string()).optional(),
  onError: OnErrorSchema.optional(),
  steps: z.array(StepSchema),
});

export type GotoStep = z.infer<typeof GotoStepSchema>;
export type ClickStep = z.infer<typeof ClickStepSchema>;
export type FillStep = z.infer<typeof FillStepSchema>;
export type SelectStep = z.infer<typeof SelectStepSchema>;
export type CheckStep = z.infer<typeof CheckStepSchema>;
export type WaitStep = z.infer<typeof WaitStepSchema>;
export type ScreenshotStep = z.infer<typeof ScreenshotStepSchema>;
export type Step = z.infer<typeof StepSchema>;
export type Scenario = z.infer<typeof ScenarioSchema>;

const SIMPLE_IDENT = /^[A-Za-z_][\w-]*$/;

function quoteAttribute(value: string): string {
  return `"${value.replace(/["\\]/g, "\\$&")}"`;
}

/** CSS selector for a field: #id, else [name="..."]; null when it has neither */
export function cssSelector(field: Pick<FieldDescriptor, "id" | "name">): string | null {
  if (field.id) {
    return SIMPLE_IDENT.test(field.id) ? `#${field.id}` : `[id=${quoteAttribute(field.id)}]`;
  }
  if (field.name) return `[name=${quoteAttribute(field.name)}]`;
  return null;
}

function fieldStep(field: FieldDescriptor): Step | null {
  const selector = cssSelector(field);
  const value = sampleValue(field);
  if (!selector || value === null) return null;

  switch (field.type) {
    case "checkbox":
    case "radio":
      // The descriptor's id/name points at the first group member, whose option is options[0]
      return { check: selector };
    case "select":
      return { select: { selector, option: value } };
    default:
      return { fill: { selector, value } };
  }
}

/**
 * Build a fill-and-submit scenario for every form in an analysis result.
 */
export function generateScenario(result: PageResult): Scenario {
  const name = `Fill forms on ${result.url}`;
  if (!result.success) {
    return { name, description: `Analysis failed: ${result.error ?? "unknown error"}`, steps: [] };
  }

  const steps: Step[] = [{ goto: result.url }];
  for (const form of result.forms) {
    for (const field of form.fields) {
      const step = fieldStep(field);
      if (step) steps.push(step);
    }
    steps.push({ click: { text: form.submit_button } });
  }

  return { name, onError: "stop", steps };
}

export function renderScenario(scenario: Scenario): string {
  return stringifyYaml(scenario);
}

export function parseScenario(yamlContent: string): Scenario {
  return ScenarioSchema.parse(parseYaml(yamlContent));
}

export function loadScenario(path: string): Scenario {
  return parseScenario(readFileSync(path, "utf-8"));
}
