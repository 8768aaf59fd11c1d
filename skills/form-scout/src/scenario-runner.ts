#!/usr/bin/env -S npx tsx

import { withBrowserSession } from "./collector";
import { loadConfig } from "./config";
import { errorMessage } from "./errors";
import { createLogger, silentLogger, type Logger } from "./logger";
import {
  loadScenario,
  type ClickStep,
  type FillStep,
  type GotoStep,
  type Scenario,
  type ScreenshotStep,
  type Step,
  type WaitStep,
} from "./scenario";

/**
 * Page operations a scenario uses. Playwright's Page satisfies it.
 */
export interface ScenarioPage {
  goto(url: string, options?: { waitUntil?: "load" | "networkidle" }): Promise<unknown>;
  click(selector: string, options?: { timeout?: number }): Promise<void>;
  fill(selector: string, value: string): Promise<void>;
  check(selector: string): Promise<void>;
  /** Matches the option by value or by label */
  selectOption(selector: string, value: string): Promise<string[]>;
  screenshot(options: { path: string; fullPage?: boolean }): Promise<unknown>;
  waitForTimeout(ms: number): Promise<void>;
  waitForLoadState(state: "load" | "networkidle"): Promise<void>;
  waitForSelector(selector: string, options?: { timeout?: number }): Promise<unknown>;
}

/**
 * Execution result
 */
export interface ExecutionReport {
  scenario: string;
  success: boolean;
  steps: StepResult[];
  duration: number;
  error?: string;
}

export interface StepResult {
  index: number;
  type: string;
  status: "passed" | "failed";
  duration: number;
  error?: string;
}

/**
 * Scenario execution context
 */
export class ScenarioExecutor {
  private variables = new Map<string, string>();
  private results: StepResult[] = [];
  private shouldStop = false;

  constructor(
    private readonly scenario: Scenario,
    private readonly page: ScenarioPage,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Execute the scenario
   */
  async execute(): Promise<ExecutionReport> {
    const startTime = Date.now();

    try {
      this.resolveVariables();

      for (const [i, step] of this.scenario.steps.entries()) {
        if (this.shouldStop) break;

        const stepStartTime = Date.now();

        try {
          await this.executeStep(step);

          this.results.push({
            index: i,
            type: this.getStepType(step),
            status: "passed",
            duration: Date.now() - stepStartTime,
          });
        } catch (error) {
          const errorMsg = errorMessage(error);

          this.results.push({
            index: i,
            type: this.getStepType(step),
            status: "failed",
            duration: Date.now() - stepStartTime,
            error: errorMsg,
          });

          const onError = step.onError ?? this.scenario.onError ?? "stop";

          if (onError === "stop") {
            this.shouldStop = true;
            throw error;
          } else {
            this.logger.warn(`Step ${i} failed (continuing): ${errorMsg}`);
          }
        }
      }

      return {
        scenario: this.scenario.name,
        success: this.results.every((r) => r.status === "passed"),
        steps: this.results,
        duration: Date.now() - startTime,
      };
    } catch (error) {
      return {
        scenario: this.scenario.name,
        success: false,
        steps: this.results,
        duration: Date.now() - startTime,
        error: errorMessage(error),
      };
    }
  }

  /**
   * Resolve variables with environment fallback: ${ENV:-default}
   */
  private resolveVariables(): void {
    if (!this.scenario.variables) return;

    for (const [key, value] of Object.entries(this.scenario.variables)) {
      const match = value.match(/^\$\{([^:]+):-(.*)\}$/);
      if (match) {
        const [, envVar, defaultValue] = match;
        this.variables.set(key, process.env[envVar] || defaultValue);
      } else {
        this.variables.set(key, value);
      }
    }
  }

  /**
   * Interpolate {{variables}} in strings
   */
  private interpolate(value: string): string {
    return value.replace(/\{\{(\w+)\}\}/g, (_, key: string) => this.variables.get(key) ?? "");
  }

  private async executeStep(step: Step): Promise<void> {
    if ("goto" in step) {
      await this.executeGoto(step);
    } else if ("click" in step) {
      await this.executeClick(step);
    } else if ("fill" in step) {
      await this.executeFill(step);
    } else if ("select" in step) {
      await this.page.selectOption(
        this.interpolate(step.select.selector),
        this.interpolate(step.select.option)
      );
    } else if ("check" in step) {
      await this.page.check(this.interpolate(step.check));
    } else if ("wait" in step) {
      await this.executeWait(step);
    } else {
      await this.executeScreenshot(step);
    }
  }

  private async executeGoto(step: GotoStep): Promise<void> {
    const goto = step.goto;

    if (typeof goto === "string") {
      await this.page.goto(this.interpolate(goto));
      await this.page.waitForLoadState("load");
    } else {
      await this.page.goto(this.interpolate(goto.url));
      await this.page.waitForLoadState(goto.waitUntil ?? "load");
    }
  }

  private async executeClick(step: ClickStep): Promise<void> {
    const click = step.click;

    if (typeof click === "string") {
      await this.page.click(this.interpolate(click));
    } else if (click.text) {
      await this.page.click(`text=${JSON.stringify(this.interpolate(click.text))}`, {
        timeout: click.timeout ?? 5000,
      });
    } else if (click.selector) {
      await this.page.click(this.interpolate(click.selector), { timeout: click.timeout ?? 5000 });
    } else {
      throw new Error("click step needs a selector or text");
    }
  }

  private async executeFill(step: FillStep): Promise<void> {
    const fill = step.fill;

    if ("selector" in fill && "value" in fill) {
      await this.page.fill(this.interpolate(fill.selector), this.interpolate(fill.value));
      return;
    }
    // Fill multiple fields
    for (const [selector, value] of Object.entries(fill)) {
      await this.page.fill(this.interpolate(selector), this.interpolate(value));
    }
  }

  private async executeWait(step: WaitStep): Promise<void> {
    const wait = step.wait;

    if (wait === "load" || wait === "networkidle") {
      await this.page.waitForLoadState(wait);
    } else if (wait.element) {
      await this.page.waitForSelector(this.interpolate(wait.element), {
        timeout: wait.timeout ?? 10000,
      });
    } else if (wait.ms !== undefined) {
      await this.page.waitForTimeout(wait.ms);
    }
  }

  private async executeScreenshot(step: ScreenshotStep): Promise<void> {
    const screenshot = step.screenshot;

    if (typeof screenshot === "string") {
      await this.page.screenshot({ path: this.interpolate(screenshot) });
    } else {
      await this.page.screenshot({
        path: this.interpolate(screenshot.path),
        fullPage: screenshot.fullPage,
      });
    }
  }

  private getStepType(step: Step): string {
    const keys = Object.keys(step).filter((k) => k !== "onError");
    return keys[0] ?? "unknown";
  }
}

export function runScenario(
  page: ScenarioPage,
  scenario: Scenario,
  logger: Logger = silentLogger
): Promise<ExecutionReport> {
  return new ScenarioExecutor(scenario, page, logger).execute();
}

/**
 * Print a report in a compact, readable format
 */
export function formatReport(report: ExecutionReport): string {
  const lines = [
    "=".repeat(60),
    `Scenario: ${report.scenario}`,
    `Status: ${report.success ? "PASSED" : "FAILED"}`,
    `Duration: ${report.duration}ms`,
    "=".repeat(60),
  ];

  for (const step of report.steps) {
    const icon = step.status === "passed" ? "✓" : "✗";
    const status = step.status.toUpperCase().padEnd(7);
    lines.push(`${icon} Step ${step.index} [${status}] ${step.type} (${step.duration}ms)`);
    if (step.error) {
      lines.push(`  Error: ${step.error}`);
    }
  }

  if (report.error) {
    lines.push(`Fatal error: ${report.error}`);
  }

  return lines.join("\n");
}

/**
 * Main CLI entry point
 */
async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    console.error("Usage: scenario-runner.ts <scenario.yaml>");
    return 1;
  }

  try {
    const config = loadConfig();
    const logger = createLogger({ format: config.logFormat });
    const scenario = loadScenario(args[0]);

    logger.info(`Running scenario: ${scenario.name}`);
    if (scenario.description) {
      logger.info(`Description: ${scenario.description}`);
    }

    const report = await withBrowserSession({ headless: config.headless }, (page) =>
      runScenario(page, scenario, logger)
    );

    console.log(formatReport(report));
    return report.success ? 0 : 1;
  } catch (error) {
    console.error("Fatal error:", errorMessage(error));
    return 1;
  }
}

// Run if called directly
if (import.meta.url === `file://${process.argv[1]}`) {
  main().then((code) => {
    process.exitCode = code;
  });
}
