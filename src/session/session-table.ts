import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import { Session, type SessionParts } from "./session.js";
import { InvalidRequestError, SessionNotFoundError } from "../errors.js";
import { formatTimestamp } from "../tools/export.js";
import type { LLMProvider } from "../types.js";
import type { AgentStep } from "../agent.js";

/** Builds the registry, prompt and resources for a new session */
export interface SessionFactory {
  create(routingKey: string): Promise<SessionParts>;
}

export interface SessionTableOptions {
  factory: SessionFactory;
  llm: LLMProvider;
  logger: Logger;
  /** Observes every tool round of every session */
  onStep?: (sessionKey: string, step: AgentStep) => void;
  now?: () => Date;
}

export interface ResolvedSession {
  session: Session;
  key: string;
  created: boolean;
}

/**
 * Session key → session. Sessions are created on first contact and live
 * until deleted. Concurrent first contacts for one key share one session.
 * A key only resolves for the routing key its session was created with.
 */
export class SessionTable {
  private sessions = new Map<string, Session>();
  private pending = new Map<string, Promise<Session>>();
  private factory: SessionFactory;
  private llm: LLMProvider;
  private logger: Logger;
  private onStep?: (sessionKey: string, step: AgentStep) => void;
  private now: () => Date;

  constructor(options: SessionTableOptions) {
    this.factory = options.factory;
    this.llm = options.llm;
    this.logger = options.logger.child({ component: "session-table" });
    this.onStep = options.onStep;
    this.now = options.now ?? (() => new Date());
  }

  async getOrCreate(routingKey: string, key?: string): Promise<ResolvedSession> {
    if (key !== undefined) {
      const existing = this.sessions.get(key);
      if (existing) {
        return { session: assertRoutingKey(existing, routingKey), key, created: false };
      }
    }

    const sessionKey = key ?? this.mintKey(routingKey);
    const inflight = this.pending.get(sessionKey);
    if (inflight) {
      const session = assertRoutingKey(await inflight, routingKey);
      return { session, key: sessionKey, created: false };
    }

    const creation = this.build(sessionKey, routingKey);
    this.pending.set(sessionKey, creation);
    try {
      const session = await creation;
      this.sessions.set(sessionKey, session);
      this.logger.info({ sessionKey, routingKey }, "session created");
      return { session, key: sessionKey, created: true };
    } finally {
      this.pending.delete(sessionKey);
    }
  }

  get(key: string): Session | undefined {
    return this.sessions.get(key);
  }

  /** Clear a session's conversation; its result cache survives */
  async reset(key: string): Promise<void> {
    await this.require(key).reset();
  }

  /** Tear down a session's resources and forget it */
  async delete(key: string): Promise<void> {
    const session = this.require(key);
    this.sessions.delete(key);
    await session.close();
    this.logger.info({ sessionKey: key }, "session deleted");
  }

  list(): string[] {
    return [...this.sessions.keys()];
  }

  get size(): number {
    return this.sessions.size;
  }

  async closeAll(): Promise<void> {
    const keys = this.list();
    const outcomes = await Promise.allSettled(keys.map((k) => this.delete(k)));
    const failures = outcomes.filter(
      (o): o is PromiseRejectedResult => o.status === "rejected",
    );
    if (failures.length > 0) {
      throw new AggregateError(
        failures.map((f) => f.reason),
        `${failures.length} session(s) failed to close`,
      );
    }
  }

  private async build(key: string, routingKey: string): Promise<Session> {
    const parts = await this.factory.create(routingKey);
    const onStep = this.onStep;
    return new Session({
      key,
      routingKey,
      parts,
      llm: this.llm,
      logger: this.logger,
      onStep: onStep ? (step) => onStep(key, step) : undefined,
    });
  }

  private require(key: string): Session {
    const session = this.sessions.get(key);
    if (!session) {
      throw new SessionNotFoundError(key);
    }
    return session;
  }

  private mintKey(routingKey: string): string {
    return `${routingKey}_${formatTimestamp(this.now())}_${randomUUID().slice(0, 8)}`;
  }
}

function assertRoutingKey(session: Session, routingKey: string): Session {
  if (session.routingKey !== routingKey) {
    throw new InvalidRequestError(
      `Session ${session.key} belongs to a different routing key`,
    );
  }
  return session;
}
