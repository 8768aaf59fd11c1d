// Analyze forms on a page and write the JSON result, fill script and scenario
// Usage: analyze <url> [outDir]
import { analyzeUrl } from "@/collector.js";
import { loadConfig, toAnalyzerOptions } from "@/config.js";
import { createLogger } from "@/logger.js";
import { generateScenario, renderScenario } from "@/scenario.js";
import { generateScript } from "@/script-generator.js";
import { saveResult } from "@/serializer.js";
import { writeFileSync } from "fs";
import { join } from "path";

const [url = process.env.SCRIPT_ARGS || "", outDir = "form-analysis"] = process.argv.slice(2);
if (!url) {
    console.error("Usage: analyze <url> [outDir]");
    console.error("Example: analyze http://localhost:5174 ./out");
    process.exit(1);
}

const config = loadConfig();
const logger = createLogger({ format: config.logFormat });

// Screenshots go to FORM_SCOUT_SCREENSHOTS_DIR, one subdirectory per run
const result = await analyzeUrl(url, toAnalyzerOptions(config), logger);

const resultPath = join(outDir, "form-analysis.json");
const scriptPath = join(outDir, "form-script.txt");
const scenarioPath = join(outDir, "form-scenario.yaml");

saveResult(result, resultPath);
writeFileSync(scriptPath, generateScript(result) + "\n");
writeFileSync(scenarioPath, renderScenario(generateScenario(result)));

if (!result.success) {
    console.error(`Analysis failed: ${result.error}`);
    process.exit(1);
}

console.log(`\nAnalysis complete. Found ${result.forms.length} form(s).`);
for (const form of result.forms) {
    console.log(`- ${form.name || form.id || "(unnamed)"}: ${form.fields.length} field(s), submit "${form.submit_button}"`);
}
console.log(`\nResult: ${resultPath}`);
console.log(`Script: ${scriptPath}`);
console.log(`Scenario: ${scenarioPath}`);
console.log(`Screenshots: ${result.screenshots.length} in ${config.screenshotDir}`);
