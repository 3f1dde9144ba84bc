import { Mutex } from "async-mutex";
import type { Logger } from "pino";
import { Agent, type AgentRunResult, type OnStepCallback, type RunOptions } from "../agent.js";
import { ConversationState } from "../conversation.js";
import { ResultCache } from "../results/cache.js";
import { SessionNotFoundError } from "../errors.js";
import type { ToolRegistry } from "../tools/registry.js";
import type { LLMProvider } from "../types.js";

/** Something a session owns and must release on teardown */
export interface SessionResource {
  close(): Promise<void>;
}

/** What a session factory hands over for one new session */
export interface SessionParts {
  registry: ToolRegistry;
  systemPrompt: string;
  resources: SessionResource[];
  /** Name the export tool is registered under, when there is one */
  exportToolName?: string;
}

export interface SessionOptions {
  key: string;
  routingKey: string;
  parts: SessionParts;
  llm: LLMProvider;
  logger: Logger;
  onStep?: OnStepCallback;
}

/**
 * One isolated conversation: history, result cache, tool bindings and the
 * resources behind them. Calls that touch history or cache run one at a time.
 */
export class Session {
  readonly key: string;
  readonly routingKey: string;
  readonly createdAt = new Date();
  readonly conversation: ConversationState;
  readonly cache = new ResultCache();
  readonly registry: ToolRegistry;

  private agent: Agent;
  private systemPrompt: string;
  private resources: SessionResource[];
  private mutex = new Mutex();
  private logger: Logger;
  private closed = false;

  constructor(options: SessionOptions) {
    this.key = options.key;
    this.routingKey = options.routingKey;
    this.registry = options.parts.registry;
    this.systemPrompt = options.parts.systemPrompt;
    this.resources = options.parts.resources;
    this.logger = options.logger.child({ sessionKey: options.key });
    this.conversation = new ConversationState(this.systemPrompt);
    this.agent = new Agent({
      llm: options.llm,
      registry: this.registry,
      conversation: this.conversation,
      cache: this.cache,
      exportToolName: options.parts.exportToolName,
      logger: this.logger,
      onStep: options.onStep,
    });
  }

  /** Run one user message through the agent; waits for any call in progress */
  chat(message: string, options: RunOptions = {}): Promise<AgentRunResult> {
    return this.mutex.runExclusive(() => {
      this.assertOpen();
      return this.agent.run(message, options);
    });
  }

  /** Clear the conversation and re-prime it; the result cache is kept */
  reset(): Promise<void> {
    return this.mutex.runExclusive(() => {
      this.assertOpen();
      this.conversation.clear();
      this.conversation.addSystemMessage(this.systemPrompt);
      this.logger.info("conversation reset");
    });
  }

  /** Release owned resources; later calls fail with SessionNotFoundError */
  close(): Promise<void> {
    return this.mutex.runExclusive(async () => {
      if (this.closed) return;
      this.closed = true;
      this.conversation.clear();
      this.cache.clear();

      const outcomes = await Promise.allSettled(this.resources.map((r) => r.close()));
      const failures = outcomes.filter(
        (o): o is PromiseRejectedResult => o.status === "rejected",
      );
      for (const failure of failures) {
        this.logger.error({ err: failure.reason }, "failed to release session resource");
      }
      this.logger.info("session closed");
      if (failures.length > 0) {
        throw new AggregateError(
          failures.map((f) => f.reason),
          `Session ${this.key}: ${failures.length} resource(s) failed to close`,
        );
      }
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new SessionNotFoundError(this.key);
    }
  }
}
