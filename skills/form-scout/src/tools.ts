import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { ToolInputError } from "./errors";
import { generateScenario, renderScenario } from "./scenario";
import { generateScript } from "./script-generator";
import { PageResultSchema } from "./serializer";
import type { PageResult, ToolInfo } from "./types";

/**
 * A tool as an agent runtime registers it: metadata for the model plus a
 * runner that validates its own input.
 */
export interface AgentTool extends ToolInfo {
  run(input: unknown): Promise<unknown>;
}

export type Analyzer = (url: string) => Promise<PageResult>;

interface ToolDefinition<S extends z.ZodTypeAny> extends Omit<ToolInfo, "parameters"> {
  schema: S;
  handler: (input: z.infer<S>) => Promise<unknown>;
}

/** JSON Schema of a tool's input, as shown to the model */
export function toParameters(schema: z.ZodTypeAny): Record<string, unknown> {
  const { $schema: _dialect, ...parameters } = zodToJsonSchema(schema, { $refStrategy: "none" });
  return parameters;
}

function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): AgentTool {
  return {
    name: definition.name,
    description: definition.description,
    parameters: toParameters(definition.schema),
    async run(input: unknown) {
      const parsed = definition.schema.safeParse(input);
      if (!parsed.success) {
        const issues = parsed.error.issues.map(
          (issue) => `${issue.path.join(".") || "input"}: ${issue.message}`
        );
        throw new ToolInputError(definition.name, issues);
      }
      return definition.handler(parsed.data);
    },
  };
}

const AnalyzeInputSchema = z.object({
  url: z.string().url().describe("Absolute URL of the page to analyze"),
});
const ResultInputSchema = z.object({
  result: PageResultSchema.describe("A result previously returned by analyze_page"),
});

/**
 * Tools exposed to an agent: analyze_page, generate_script, generate_scenario.
 */
export function createTools(analyze: Analyzer): AgentTool[] {
  return [
    defineTool({
      name: "analyze_page",
      description:
        "Open a URL in a browser, detect its HTML forms and return every field " +
        "(name, id, type, label, required, options, placeholder) with the submit button label.",
      schema: AnalyzeInputSchema,
      handler: ({ url }) => analyze(url),
    }),
    defineTool({
      name: "generate_script",
      description:
        "Turn an analyze_page result into a fill script: one 'set <field> to <value>' line " +
        "per field and a 'click <submit button>' line per form.",
      schema: ResultInputSchema,
      handler: async ({ result }) => ({ script: generateScript(result) }),
    }),
    defineTool({
      name: "generate_scenario",
      description:
        "Turn an analyze_page result into a YAML browser scenario that fills and submits each form.",
      schema: ResultInputSchema,
      handler: async ({ result }) => ({ scenario: renderScenario(generateScenario(result)) }),
    }),
  ];
}

export function findTool(tools: AgentTool[], name: string): AgentTool | undefined {
  return tools.find((tool) => tool.name === name);
}
