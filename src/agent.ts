import type { Logger } from "pino";
import type {
  FunctionTool,
  LLMProvider,
  LLMResponse,
  LoopState,
  Message,
  TerminalState,
  ToolArguments,
  ToolCall,
} from "./types.js";
import { ConversationState } from "./conversation.js";
import { ResultCache } from "./results/cache.js";
import { normalizeResult } from "./results/normalizer.js";
import { ToolRegistry, parseToolArguments } from "./tools/registry.js";
import { EXPORT_DATA_PARAMETER, EXPORT_TOOL_NAME } from "./tools/export.js";
import { ChatAbortedError, ModelCallError, describeError } from "./errors.js";
import { makeLogger } from "./logger.js";

/**
 * Agent — the bounded tool-calling loop.
 *
 * Each round:
 *   1. Ask the model with the full history and every tool schema
 *   2. Text only: that is the answer
 *   3. Tool calls: dispatch them one by one, in order, appending each result
 *   4. Stop early after NO_PROGRESS_LIMIT rounds where every call failed
 *   5. Stop after the iteration budget no matter what
 */

export const MIN_ITERATIONS = 5;
export const MAX_ITERATIONS = 10;
export const TOOLS_PER_ITERATION = 4;
export const NO_PROGRESS_LIMIT = 3;

export const NO_PROGRESS_MESSAGE =
  "I encountered errors while processing your request. Please try rephrasing your question.";
export const ITERATION_LIMIT_MESSAGE =
  "I've completed multiple steps but reached the iteration limit. Please ask a follow-up question if you need more information.";
export const CANCELLED_TOOL_RESULT = "Cancelled before execution.";

/** Rounds allowed for one user message: one per four tools, kept within [5, 10] */
export function computeIterationBudget(toolCount: number): number {
  return Math.min(
    MAX_ITERATIONS,
    Math.max(MIN_ITERATIONS, Math.floor(toolCount / TOOLS_PER_ITERATION)),
  );
}

export interface AgentRunResult {
  /** Final text response for the user */
  response: string;
  state: TerminalState;
  /** Model queries made for this message */
  iterations: number;
  budget: number;
  /** Full conversation history after the run */
  messages: Message[];
}

export interface ToolCallOutcome {
  name: string;
  ok: boolean;
  result: string;
}

/** One round that dispatched tools */
export interface AgentStep {
  iteration: number;
  toolCalls: ToolCall[];
  toolResults: ToolCallOutcome[];
  thinking: string | null;
}

/** Callback fired after each round that dispatched tools */
export type OnStepCallback = (step: AgentStep) => void;

export interface AgentOptions {
  llm: LLMProvider;
  registry: ToolRegistry;
  conversation?: ConversationState;
  cache?: ResultCache;
  /** Tool whose data argument falls back to the result cache */
  exportToolName?: string;
  logger?: Logger;
  onStep?: OnStepCallback;
  /** Observes every loop state transition */
  onStateChange?: (state: LoopState) => void;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export class Agent {
  private llm: LLMProvider;
  private registry: ToolRegistry;
  private conversation: ConversationState;
  private cache: ResultCache;
  private exportToolName: string;
  private logger: Logger;
  private onStep?: OnStepCallback;
  private onStateChange?: (state: LoopState) => void;
  private state: LoopState = "done";

  constructor(options: AgentOptions) {
    this.llm = options.llm;
    this.registry = options.registry;
    this.conversation = options.conversation ?? new ConversationState();
    this.cache = options.cache ?? new ResultCache();
    this.exportToolName = options.exportToolName ?? EXPORT_TOOL_NAME;
    this.logger = (options.logger ?? makeLogger()).child({ component: "agent" });
    this.onStep = options.onStep;
    this.onStateChange = options.onStateChange;
  }

  /** Run the loop for one user message, returning the final response */
  async run(userMessage: string, options: RunOptions = {}): Promise<AgentRunResult> {
    const { signal } = options;
    throwIfAborted(signal);

    this.conversation.appendUser(userMessage);

    const tools = this.registry.describeAll();
    const budget = computeIterationBudget(tools.length);
    let iterations = 0;
    let noProgress = 0;

    this.logger.info({ budget, tools: tools.length }, "chat started");

    while (iterations < budget) {
      iterations++;
      this.transition("await_model");
      throwIfAborted(signal);

      const response = await this.queryModel(tools, signal);

      if (response.toolCalls.length === 0) {
        this.transition("model_final");
        const finalContent = response.content ?? "";
        this.conversation.appendAssistant(finalContent);
        this.transition("done");
        this.logger.info({ iterations }, "chat completed");
        return this.result(finalContent, "done", iterations, budget);
      }

      this.transition("model_requests_tools");
      this.conversation.appendAssistant(response.content, response.toolCalls);

      this.transition("executing");
      const toolResults: ToolCallOutcome[] = [];
      for (const [index, call] of response.toolCalls.entries()) {
        if (signal?.aborted) {
          this.cancelRemaining(response.toolCalls.slice(index));
          throw new ChatAbortedError();
        }
        const outcome = await this.dispatch(call, iterations, budget);
        toolResults.push(outcome);
        this.conversation.appendToolResult(call.id, call.name, outcome.result);
      }

      this.onStep?.({
        iteration: iterations,
        toolCalls: response.toolCalls,
        toolResults,
        thinking: response.content,
      });

      if (toolResults.some((r) => r.ok)) {
        noProgress = 0;
      } else {
        noProgress++;
        if (noProgress >= NO_PROGRESS_LIMIT) {
          this.transition("abort_no_progress");
          this.logger.warn({ iterations, noProgress }, "stopping: no tool succeeded");
          return this.result(NO_PROGRESS_MESSAGE, "abort_no_progress", iterations, budget);
        }
      }
    }

    this.transition("abort_iteration_limit");
    this.logger.warn({ budget }, "reached iteration limit");
    return this.result(ITERATION_LIMIT_MESSAGE, "abort_iteration_limit", iterations, budget);
  }

  /** Reset conversation history; the result cache is kept */
  reset(): void {
    this.conversation.clear();
  }

  /** Get current conversation history (read-only copy) */
  getHistory(): Message[] {
    return this.conversation.getMessages();
  }

  /** Last state the loop entered */
  getState(): LoopState {
    return this.state;
  }

  // -------------------------------------------------------------------------

  private async queryModel(
    tools: FunctionTool[],
    signal: AbortSignal | undefined,
  ): Promise<LLMResponse> {
    let response: LLMResponse;
    try {
      response = await this.llm.chat(this.conversation.getMessages(), tools, { signal });
    } catch (err) {
      if (signal?.aborted) {
        throw new ChatAbortedError();
      }
      this.logger.error({ err }, "model call failed");
      throw new ModelCallError(err);
    }

    const problem = findToolCallIdProblem(response.toolCalls);
    if (problem) {
      this.logger.error({ toolCalls: response.toolCalls.length }, problem);
      throw new ModelCallError(new Error(problem));
    }
    return response;
  }

  private async dispatch(
    call: ToolCall,
    iteration: number,
    budget: number,
  ): Promise<ToolCallOutcome> {
    const isExport = call.name === this.exportToolName;
    const log = this.logger.child({ iteration: `${iteration}/${budget}`, tool: call.name });

    try {
      let args = parseToolArguments(call.arguments);
      if (isExport) {
        args = this.withCachedExportData(args, log);
      } else {
        log.debug({ args }, "calling tool");
      }

      const raw = await this.registry.execute(call.name, args);
      const normalized = normalizeResult(raw, { isExport });

      if (normalized.records && this.cache.update(normalized.records, call.name)) {
        log.debug({ records: normalized.records.length }, "cached query results");
      }

      log.debug({ response: normalized.content.slice(0, 200) }, "tool returned");
      return { name: call.name, ok: true, result: normalized.content };
    } catch (err) {
      const result = `Error executing ${call.name}: ${describeError(err)}`;
      log.warn({ err }, "tool call failed");
      return { name: call.name, ok: false, result };
    }
  }

  /**
   * The model tends to drop or truncate bulk rows when re-emitting them as an
   * argument. When the export gets fewer rows than the cache holds, export
   * the cached rows instead.
   */
  private withCachedExportData(args: ToolArguments, log: Logger): ToolArguments {
    const data = args[EXPORT_DATA_PARAMETER];
    const supplied = Array.isArray(data) ? data.length : 0;
    const cached = this.cache.size;

    if (cached > 0 && supplied < cached) {
      log.info({ supplied, cached }, "export data incomplete, using cached records");
      return { ...args, [EXPORT_DATA_PARAMETER]: this.cache.get() };
    }

    log.debug({ supplied }, "calling export tool");
    return args;
  }

  private cancelRemaining(calls: ToolCall[]): void {
    for (const call of calls) {
      this.conversation.appendToolResult(call.id, call.name, CANCELLED_TOOL_RESULT);
    }
    this.logger.info({ skipped: calls.length }, "chat cancelled");
  }

  private transition(state: LoopState): void {
    this.state = state;
    this.onStateChange?.(state);
  }

  private result(
    response: string,
    state: TerminalState,
    iterations: number,
    budget: number,
  ): AgentRunResult {
    return {
      response,
      state,
      iterations,
      budget,
      messages: this.conversation.getMessages(),
    };
  }
}

/** Results are matched to calls by id, so every id must be present and distinct */
function findToolCallIdProblem(calls: ToolCall[]): string | undefined {
  const seen = new Set<string>();
  for (const call of calls) {
    if (call.id === "") {
      return "Model response has a tool call without an id";
    }
    if (seen.has(call.id)) {
      return `Model response repeats tool call id "${call.id}"`;
    }
    seen.add(call.id);
  }
  return undefined;
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new ChatAbortedError();
  }
}
