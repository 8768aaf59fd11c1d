import { serve } from "@/index.js";
import { loadConfig, toAnalyzerOptions } from "@/config.js";
import { createLogger } from "@/logger.js";
import { existsSync, readdirSync } from "fs";
import { join } from "path";

const config = loadConfig();
const logger = createLogger({ format: config.logFormat });

function isChromiumInstalled(): boolean {
  const homeDir = process.env.HOME || process.env.USERPROFILE || "";
  const playwrightCacheDir = process.env.PLAYWRIGHT_BROWSERS_PATH || join(homeDir, ".cache", "ms-playwright");

  if (!existsSync(playwrightCacheDir)) {
    return false;
  }

  // Check for chromium directories (e.g., chromium-1148, chromium_headless_shell-1148)
  try {
    const entries = readdirSync(playwrightCacheDir);
    return entries.some((entry) => entry.startsWith("chromium"));
  } catch {
    return false;
  }
}

if (!isChromiumInstalled()) {
  logger.warn("Playwright Chromium not found. You may need to run: npx playwright install chromium");
}

// Check if a server is already running on the port
try {
  const res = await fetch(`http://localhost:${config.port}/health`, {
    signal: AbortSignal.timeout(1000),
  });
  if (res.ok) {
    logger.info(`Tool server already running on port ${config.port}`);
    process.exit(0);
  }
} catch {
  // Nothing listening, start a new server
}

const server = await serve(
  { port: config.port, ...toAnalyzerOptions(config) },
  logger
);

logger.info(`Tools: GET http://localhost:${server.port}/ | POST http://localhost:${server.port}/tools/<name>`);
logger.info("Press Ctrl+C to stop");
