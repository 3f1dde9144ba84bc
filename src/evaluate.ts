/**
 * Evaluation script: runs a suite of questions against the live model
 * over the demo catalog and prints a pass-rate summary.
 *
 * Usage: tsx src/evaluate.ts [cases.json] [results.json]
 */

import "dotenv/config";
import { writeFile } from "node:fs/promises";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import {
  Evaluator,
  FixtureDataSource,
  OpenAIProvider,
  createProcedureSessionFactory,
  describeError,
  formatSummary,
  loadConfig,
  loadEvaluationSuite,
  loadProcedureCatalog,
  makeLogger,
} from "./index.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const projectRoot = resolve(__dirname, "..");

async function main() {
  const config = loadConfig();
  const logger = makeLogger({ mode: "evaluate" }, config.logLevel);
  const casesPath = resolve(process.argv[2] ?? resolve(projectRoot, "config/evaluation-cases.json"));
  const outputPath = resolve(process.argv[3] ?? "evaluation-results.json");
  const routingKey = process.env.ROUTING_KEY ?? "1001";

  const llm = new OpenAIProvider({
    apiKey: config.llm.apiKey,
    baseURL: config.llm.baseURL,
    azureEndpoint: config.llm.azureEndpoint,
    azureApiVersion: config.llm.azureApiVersion,
    model: config.llm.model,
    maxTokens: config.llm.maxTokens,
  });

  const catalog = await loadProcedureCatalog(resolve(projectRoot, config.procedureCatalogPath));
  const fixturePath = resolve(projectRoot, config.fixtureDataPath);
  const factory = createProcedureSessionFactory({
    catalog,
    openDataSource: () => FixtureDataSource.fromFile(fixturePath),
    export: {
      outputDir: resolve(projectRoot, config.export.outputDir),
      baseUrl: config.export.baseUrl,
    },
    logger,
  });

  const cases = await loadEvaluationSuite(casesPath);
  console.log(`Running ${cases.length} cases...`);

  const evaluator = new Evaluator({ factory, llm, logger, routingKey });
  const summary = await evaluator.run(cases, (result, index, total) => {
    const status = result.passed ? "PASS" : "FAIL";
    console.log(`[${index + 1}/${total}] ${status} ${result.id} (${(result.durationMs / 1000).toFixed(2)}s)`);
    if (!result.passed) {
      console.log(`  Reason: ${result.notes}`);
    }
  });

  console.log(`\n${formatSummary(summary)}`);
  await writeFile(outputPath, JSON.stringify(summary, null, 2), "utf-8");
  console.log(`\nResults written to ${outputPath}`);

  if (summary.failed > 0) {
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  console.error(describeError(err));
  process.exitCode = 1;
});
