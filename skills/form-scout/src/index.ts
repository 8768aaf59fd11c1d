import express, { type Express, type Request, type Response } from "express";
import { chromium, type Browser } from "playwright";
import type { Server } from "http";
import type { Socket } from "net";
import { analyzePage, PlaywrightDriver } from "./collector";
import { ToolInputError, errorMessage } from "./errors";
import { createLogger, type Logger } from "./logger";
import { createTools, findTool, type AgentTool, type Analyzer } from "./tools";
import type {
  AnalyzerOptions,
  ServeOptions,
  ToolCatalogResponse,
  ToolErrorResponse,
} from "./types";

export * from "./types";
export * from "./errors";
export { analyzePage, analyzeUrl, withBrowserSession, PlaywrightDriver, type PageDriver } from "./collector";
export { inspectFields, classifyField, resolveLabel } from "./inspector";
export { generateScript, sampleValue } from "./script-generator";
export { generateScenario, renderScenario, loadScenario, type Scenario } from "./scenario";
export { runScenario, type ExecutionReport, type ScenarioPage } from "./scenario-runner";
export { toJson, saveResult, parsePageResult } from "./serializer";
export { createTools, findTool, type AgentTool } from "./tools";
export { createLogger, silentLogger, type Logger } from "./logger";
export { loadConfig, toAnalyzerOptions, type Config } from "./config";
export type { DomElement } from "./dom";

export interface FormScoutServer {
  port: number;
  stop: () => Promise<void>;
}

/**
 * HTTP surface for agent runtimes:
 *   GET  /              tool catalog
 *   GET  /health        liveness
 *   POST /tools/:name   run a tool with the JSON body as its input
 */
export function createApp(tools: AgentTool[], logger: Logger): Express {
  const app: Express = express();
  app.use(express.json({ limit: "5mb" }));

  // GET / - tool catalog
  app.get("/", (_req: Request, res: Response) => {
    const response: ToolCatalogResponse = {
      tools: tools.map(({ name, description, parameters }) => ({ name, description, parameters })),
    };
    res.json(response);
  });

  // GET /health - quick health check (no JSON parsing needed)
  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).send("ok");
  });

  // POST /tools/:name - run a tool
  app.post("/tools/:name", async (req: Request<{ name: string }>, res: Response) => {
    const tool = findTool(tools, req.params.name);
    if (!tool) {
      const response: ToolErrorResponse = { error: `unknown tool: ${req.params.name}` };
      res.status(404).json(response);
      return;
    }

    try {
      const output = await tool.run(req.body);
      res.json(output);
    } catch (err) {
      if (err instanceof ToolInputError) {
        const response: ToolErrorResponse = { error: err.message, issues: err.issues };
        res.status(400).json(response);
        return;
      }
      logger.error(`Tool ${tool.name} failed: ${errorMessage(err)}`);
      const response: ToolErrorResponse = { error: errorMessage(err) };
      res.status(500).json(response);
    }
  });

  return app;
}

async function closeBrowser(browser: Browser, logger: Logger): Promise<void> {
  try {
    await browser.close();
  } catch (err) {
    logger.warn(`Browser close failed: ${errorMessage(err)}`);
  }
}

export async function serve(options: ServeOptions = {}, logger: Logger = createLogger()): Promise<FormScoutServer> {
  const port = options.port ?? 9333;
  const headless = options.headless ?? true;

  if (port < 1 || port > 65535) {
    throw new Error(`Invalid port: ${port}. Must be between 1 and 65535`);
  }

  logger.info("Launching browser...");
  const browser: Browser = await chromium.launch({ headless });
  logger.info("Browser launched");

  const analyzerOptions: AnalyzerOptions = {
    headless,
    screenshotDir: options.screenshotDir,
    navigationTimeout: options.navigationTimeout,
    formSelector: options.formSelector,
  };

  // Each analysis gets a fresh context so cookies and pages never leak between calls
  const analyze: Analyzer = async (url) => {
    const context = await browser.newContext({ viewport: { width: 1920, height: 1080 } });
    try {
      const page = await context.newPage();
      return await analyzePage(new PlaywrightDriver(page), url, analyzerOptions, logger);
    } finally {
      await context.close();
    }
  };

  let server: Server;
  try {
    const app = createApp(createTools(analyze), logger);
    server = await new Promise<Server>((resolve, reject) => {
      const listening = app.listen(port, () => resolve(listening));
      listening.on("error", reject);
    });
  } catch (err) {
    logger.error(`Tool server failed to start: ${errorMessage(err)}`);
    await closeBrowser(browser, logger);
    throw err;
  }
  logger.info(`Tool server running on port ${port}`);

  // Track active connections for clean shutdown
  const connections = new Set<Socket>();
  server.on("connection", (socket: Socket) => {
    connections.add(socket);
    socket.on("close", () => connections.delete(socket));
  });

  // Track if cleanup has been called to avoid double cleanup
  let cleaningUp = false;

  const cleanup = async () => {
    if (cleaningUp) return;
    cleaningUp = true;

    logger.info("Shutting down...");

    for (const socket of connections) {
      socket.destroy();
    }
    connections.clear();

    await closeBrowser(browser, logger);

    await new Promise<void>((resolve) => server.close(() => resolve()));
    logger.info("Server stopped.");
  };

  const signals = ["SIGINT", "SIGTERM", "SIGHUP"] as const;

  const signalHandler = () => {
    cleanup().finally(() => process.exit(0));
  };

  signals.forEach((sig) => process.on(sig, signalHandler));

  const removeHandlers = () => {
    signals.forEach((sig) => process.off(sig, signalHandler));
  };

  return {
    port,
    async stop() {
      removeHandlers();
      await cleanup();
    },
  };
}
