import { chromium, type Browser, type Page } from "playwright";
import { mkdirSync, mkdtempSync } from "fs";
import { join } from "path";
import { LocatorElement, type DomElement } from "./dom";
import { ElementReadError, NavigationError, errorMessage } from "./errors";
import { inspectFields, normalizeText } from "./inspector";
import { silentLogger, type Logger } from "./logger";
import type { AnalyzerOptions, FormDescriptor, PageResult } from "./types";

export const DEFAULT_SUBMIT_LABEL = "Submit";

/**
 * What the collector needs from a browser page.
 */
export interface PageDriver {
  goto(url: string, timeout: number): Promise<void>;
  /** Form-like containers in document order */
  forms(selector: string): Promise<DomElement[]>;
  screenshot(path: string): Promise<void>;
}

export class PlaywrightDriver implements PageDriver {
  constructor(private readonly page: Page) {}

  async goto(url: string, timeout: number): Promise<void> {
    await this.page.goto(url, { waitUntil: "load", timeout });
  }

  async forms(selector: string): Promise<DomElement[]> {
    const matches = await this.page.locator(selector).all();
    return matches.map((match) => new LocatorElement(match));
  }

  async screenshot(path: string): Promise<void> {
    await this.page.screenshot({ path, fullPage: true });
  }
}

/**
 * Launch Chromium, open one page, and run `fn` against it.
 * The browser is closed on every exit path.
 */
export async function withBrowserSession<T>(
  options: Pick<AnalyzerOptions, "headless">,
  fn: (page: Page) => Promise<T>
): Promise<T> {
  const browser: Browser = await chromium.launch({
    headless: options.headless ?? true,
    args: ["--window-size=1920,1080"],
  });
  try {
    const context = await browser.newContext({ viewport: { width: 1920, height: 1080 } });
    const page = await context.newPage();
    return await fn(page);
  } finally {
    await browser.close();
  }
}

function failedResult(url: string, error: string): PageResult {
  return { success: false, url, forms: [], screenshots: [], error };
}

/**
 * Label of the form's submit control: button text, input value, aria-label,
 * or "Submit" when the form has none.
 */
export async function resolveSubmitLabel(form: DomElement): Promise<string> {
  const controls = await form.querySelectorAll('button, input[type="submit"]');

  for (const control of controls) {
    const tag = await control.tagName();
    const type = ((await control.getAttribute("type")) ?? "submit").toLowerCase();
    if (type !== "submit") continue;

    const text = tag === "button" ? normalizeText(await control.textContent()) : "";
    const label =
      text ||
      normalizeText(await control.getAttribute("value")) ||
      normalizeText(await control.getAttribute("aria-label"));
    return label || DEFAULT_SUBMIT_LABEL;
  }

  return DEFAULT_SUBMIT_LABEL;
}

async function describeForm(form: DomElement, logger: Logger): Promise<FormDescriptor> {
  const name =
    normalizeText(await form.getAttribute("name")) ||
    normalizeText(await form.getAttribute("aria-label"));
  const id = (await form.getAttribute("id")) ?? "";
  const fields = await inspectFields(form, logger);
  const submit_button = await resolveSubmitLabel(form);
  return { name, id, fields, submit_button };
}

/**
 * Analyze every form on the page behind `driver`.
 *
 * Never throws: navigation and enumeration failures produce a failed result,
 * unreadable forms are skipped, and failed screenshots are left out.
 */
export async function analyzePage(
  driver: PageDriver,
  url: string,
  options: AnalyzerOptions = {},
  logger: Logger = silentLogger
): Promise<PageResult> {
  const screenshotDir = options.screenshotDir ?? "form-screenshots";
  const takeScreenshots = options.screenshots ?? true;
  const formSelector = options.formSelector ?? "form";
  const timeout = options.navigationTimeout ?? 30000;

  const screenshots: string[] = [];
  // Created on first capture; every analysis writes into its own subdirectory
  let analysisDir: string | null = null;
  const capture = async (fileName: string, shoot: (path: string) => Promise<void>) => {
    if (!takeScreenshots) return;
    let path = fileName;
    try {
      if (!analysisDir) {
        mkdirSync(screenshotDir, { recursive: true });
        analysisDir = mkdtempSync(join(screenshotDir, "analysis-"));
      }
      path = join(analysisDir, fileName);
      await shoot(path);
      screenshots.push(path);
      logger.info(`Screenshot saved to ${path}`);
    } catch (err) {
      logger.warn(`Screenshot failed: ${path}`, { error: errorMessage(err) });
    }
  };

  try {
    logger.info(`Navigating to ${url}`);
    try {
      await driver.goto(url, timeout);
    } catch (err) {
      throw new NavigationError(url, err);
    }

    await capture("full-page.png", (path) => driver.screenshot(path));

    const containers = await driver.forms(formSelector);
    logger.info(`Found ${containers.length} form(s)`, { selector: formSelector });

    const forms: FormDescriptor[] = [];
    for (const [index, container] of containers.entries()) {
      const ordinal = index + 1;
      let form: FormDescriptor;
      try {
        form = await describeForm(container, logger);
      } catch (err) {
        const readError = new ElementReadError(`form ${ordinal}`, err);
        logger.warn(`Skipping form: ${readError.message}`);
        continue;
      }

      await capture(`form-${ordinal}.png`, (path) => container.screenshot(path));
      logger.info(`Form ${ordinal}: ${form.fields.length} field(s)`, {
        id: form.id,
        submit: form.submit_button,
      });
      forms.push(form);
    }

    return { success: true, url, forms, screenshots, error: null };
  } catch (err) {
    logger.error(`Error analyzing page: ${errorMessage(err)}`, { url });
    return failedResult(url, errorMessage(err));
  }
}

/**
 * Analyze a URL in a browser session of its own.
 */
export async function analyzeUrl(
  url: string,
  options: AnalyzerOptions = {},
  logger: Logger = silentLogger
): Promise<PageResult> {
  try {
    return await withBrowserSession(options, (page) =>
      analyzePage(new PlaywrightDriver(page), url, options, logger)
    );
  } catch (err) {
    logger.error(`Browser session failed: ${errorMessage(err)}`);
    return failedResult(url, errorMessage(err));
  }
}
