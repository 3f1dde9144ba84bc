export {
  Agent,
  computeIterationBudget,
  NO_PROGRESS_MESSAGE,
  ITERATION_LIMIT_MESSAGE,
  CANCELLED_TOOL_RESULT,
  type AgentRunResult,
  type AgentOptions,
  type RunOptions,
  type OnStepCallback,
  type AgentStep,
} from "./agent.js";
export { ConversationState } from "./conversation.js";
export { ResultCache } from "./results/cache.js";
export { normalizeResult, NO_RESULTS, type NormalizedResult } from "./results/normalizer.js";
export {
  ToolRegistry,
  defineTool,
  toFunctionTool,
  parseToolArguments,
} from "./tools/registry.js";
export {
  createProcedureTool,
  type ProcedureDefinition,
  type ProcedureParameter,
} from "./tools/procedure.js";
export {
  createExportTool,
  EXPORT_TOOL_NAME,
  EXPORT_DATA_PARAMETER,
  type ExportResult,
  type ExportToolOptions,
} from "./tools/export.js";
export {
  loadProcedureCatalog,
  parseProcedureCatalog,
  createCatalogTools,
} from "./tools/catalog.js";
export { FixtureDataSource } from "./data/fixture-source.js";
export { Session, type SessionParts, type SessionResource } from "./session/session.js";
export { SessionTable, type SessionFactory, type ResolvedSession } from "./session/session-table.js";
export { createProcedureSessionFactory } from "./session/factory.js";
export { ChatService, type ChatRequest, type ChatReply } from "./service.js";
export { buildSystemPrompt, type PromptSection } from "./prompt/system-prompt.js";
export { OpenAIProvider } from "./llm/openai-provider.js";
export { MockLLMProvider } from "./llm/mock-provider.js";
export {
  Evaluator,
  formatSummary,
  summarize,
  parseEvaluationSuite,
  loadEvaluationSuite,
  type EvaluationCase,
  type CaseResult,
  type EvaluationSummary,
} from "./evaluation.js";
export { loadConfig, type AppConfig } from "./config.js";
export { makeLogger, makeNoopLogger, type Logger } from "./logger.js";
export * from "./errors.js";
export type * from "./types.js";
