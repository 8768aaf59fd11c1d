import { z } from "zod";
import type { LogFormat } from "./logger";
import type { AnalyzerOptions } from "./types";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  FORM_SCOUT_HEADLESS: booleanFlag.default("true"),
  FORM_SCOUT_SCREENSHOTS_DIR: z.string().min(1).default("form-screenshots"),
  FORM_SCOUT_NAV_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  FORM_SCOUT_FORM_SELECTOR: z.string().min(1).default("form"),
  FORM_SCOUT_PORT: z.coerce.number().int().min(1).max(65535).default(9333),
  FORM_SCOUT_LOG_FORMAT: z.enum(["pretty", "json"]).default("pretty"),
});

export interface Config {
  headless: boolean;
  screenshotDir: string;
  navigationTimeout: number;
  formSelector: string;
  port: number;
  logFormat: LogFormat;
}

/**
 * Read configuration from the environment.
 * Empty variables count as unset; invalid values throw a ZodError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  const parsed = envSchema.parse(present);

  return {
    headless: parsed.FORM_SCOUT_HEADLESS,
    screenshotDir: parsed.FORM_SCOUT_SCREENSHOTS_DIR,
    navigationTimeout: parsed.FORM_SCOUT_NAV_TIMEOUT_MS,
    formSelector: parsed.FORM_SCOUT_FORM_SELECTOR,
    port: parsed.FORM_SCOUT_PORT,
    logFormat: parsed.FORM_SCOUT_LOG_FORMAT,
  };
}

/** Analyzer settings carried by a config; shared by the CLI and the tool server */
export function toAnalyzerOptions(config: Config): AnalyzerOptions {
  return {
    headless: config.headless,
    screenshotDir: config.screenshotDir,
    navigationTimeout: config.navigationTimeout,
    formSelector: config.formSelector,
  };
}
