import type { Logger } from "pino";
import type { RunOptions } from "./agent.js";
import { InvalidRequestError } from "./errors.js";
import type { SessionFactory, SessionTable } from "./session/session-table.js";
import type { TerminalState } from "./types.js";

export interface ChatRequest {
  message: string;
  /** Tenant the session's tools are bound to */
  routingKey: string;
  /** Omit to start a new session */
  sessionKey?: string;
}

export interface ChatReply {
  response: string;
  sessionKey: string;
  state: TerminalState;
  timestamp: string;
}

export interface ChatServiceOptions {
  table: SessionTable;
  factory: SessionFactory;
  logger: Logger;
  now?: () => Date;
}

/**
 * Session-keyed chat surface. Transport-agnostic: an HTTP or CLI front end
 * maps its requests onto these calls.
 */
export class ChatService {
  private table: SessionTable;
  private factory: SessionFactory;
  private logger: Logger;
  private now: () => Date;

  constructor(options: ChatServiceOptions) {
    this.table = options.table;
    this.factory = options.factory;
    this.logger = options.logger.child({ component: "chat-service" });
    this.now = options.now ?? (() => new Date());
  }

  async chat(request: ChatRequest, options: RunOptions = {}): Promise<ChatReply> {
    if (request.message.trim() === "") {
      throw new InvalidRequestError("message must not be empty");
    }
    if (request.routingKey.trim() === "") {
      throw new InvalidRequestError("routingKey must not be empty");
    }

    const { session, key } = await this.table.getOrCreate(request.routingKey, request.sessionKey);
    const result = await session.chat(request.message, options);

    this.logger.debug(
      { sessionKey: key, state: result.state, iterations: result.iterations },
      "chat finished",
    );
    return {
      response: result.response,
      sessionKey: key,
      state: result.state,
      timestamp: this.now().toISOString(),
    };
  }

  reset(sessionKey: string): Promise<void> {
    return this.table.reset(sessionKey);
  }

  delete(sessionKey: string): Promise<void> {
    return this.table.delete(sessionKey);
  }

  listSessions(): string[] {
    return this.table.list();
  }

  /** Tool names a session for this routing key would get; builds nothing lasting */
  async listTools(routingKey: string): Promise<string[]> {
    const parts = await this.factory.create(routingKey);
    try {
      return parts.registry.list();
    } finally {
      await Promise.all(parts.resources.map((r) => r.close()));
    }
  }
}
