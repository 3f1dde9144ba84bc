/**
 * Demo Script — interactive multi-turn chat over the demo procedure catalog
 */

import "dotenv/config";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import readline from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import {
  ChatService,
  FixtureDataSource,
  OpenAIProvider,
  SessionTable,
  createProcedureSessionFactory,
  describeError,
  loadConfig,
  loadProcedureCatalog,
  makeLogger,
} from "./index.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const projectRoot = resolve(__dirname, "..");

async function main() {
  const config = loadConfig();
  const logger = makeLogger({ mode: "demo" }, config.logLevel);
  const routingKey = process.argv[2] ?? process.env.ROUTING_KEY ?? "1001";

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
  const table = new SessionTable({ factory, llm, logger });
  const service = new ChatService({ table, factory, logger });

  console.log(`Using LLM: ${config.llm.model} @ ${config.llm.azureEndpoint ?? config.llm.baseURL ?? "OpenAI"}`);
  console.log(`Routing key: ${routingKey}`);
  console.log(`Tools: ${(await service.listTools(routingKey)).join(", ")}`);
  console.log("\nInteractive mode ready.");
  console.log("Commands: /exit, /reset, /new, /sessions\n");

  let sessionKey: string | undefined;
  const rl = readline.createInterface({ input, output });
  try {
    while (true) {
      const query = (await rl.question("You> ")).trim();
      if (!query) continue;

      if (query === "/exit") break;

      if (query === "/reset") {
        if (sessionKey) await service.reset(sessionKey);
        console.log("Conversation reset (export cache kept).\n");
        continue;
      }

      if (query === "/new") {
        if (sessionKey) await service.delete(sessionKey);
        sessionKey = undefined;
        console.log("Session closed; the next message starts a new one.\n");
        continue;
      }

      if (query === "/sessions") {
        console.log(service.listSessions().join("\n") || "(none)");
        console.log();
        continue;
      }

      try {
        const reply = await service.chat({ message: query, routingKey, sessionKey });
        sessionKey = reply.sessionKey;
        console.log(`\nAssistant> ${reply.response}\n`);
        if (reply.state !== "done") {
          console.log(`(stopped: ${reply.state})\n`);
        }
      } catch (error) {
        console.error(`Error: ${describeError(error)}\n`);
      }
    }
  } finally {
    rl.close();
    await table.closeAll();
  }
}

main().catch((err: unknown) => {
  console.error(describeError(err));
  process.exitCode = 1;
});
