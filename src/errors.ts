/**
 * Error taxonomy.
 *
 * Tool-level errors are absorbed by the agent loop and shown to the model as
 * tool results. Model, session and cancellation errors reach the caller.
 */

export type QueryAgentErrorCode =
  | "TOOL_NOT_FOUND"
  | "MISSING_PARAMETER"
  | "INVALID_ARGUMENTS"
  | "TOOL_EXECUTION_FAILED"
  | "MODEL_CALL_FAILED"
  | "SESSION_NOT_FOUND"
  | "CHAT_ABORTED"
  | "INVALID_REQUEST"
  | "INVALID_CONFIG";

export class QueryAgentError extends Error {
  readonly code: QueryAgentErrorCode;

  constructor(code: QueryAgentErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "QueryAgentError";
    this.code = code;
  }
}

export class ToolNotFoundError extends QueryAgentError {
  readonly toolName: string;

  constructor(toolName: string) {
    super("TOOL_NOT_FOUND", `Tool not found: ${toolName}`);
    this.name = "ToolNotFoundError";
    this.toolName = toolName;
  }
}

export class MissingParameterError extends QueryAgentError {
  readonly toolName: string;
  readonly parameter: string;

  constructor(toolName: string, parameter: string) {
    super("MISSING_PARAMETER", `Missing required parameter: ${parameter}`);
    this.name = "MissingParameterError";
    this.toolName = toolName;
    this.parameter = parameter;
  }
}

export class InvalidArgumentsError extends QueryAgentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INVALID_ARGUMENTS", message, options);
    this.name = "InvalidArgumentsError";
  }
}

export class ToolExecutionError extends QueryAgentError {
  readonly toolName: string;

  constructor(toolName: string, cause: unknown) {
    super("TOOL_EXECUTION_FAILED", describeError(cause), { cause });
    this.name = "ToolExecutionError";
    this.toolName = toolName;
  }
}

export class ModelCallError extends QueryAgentError {
  constructor(cause: unknown) {
    super("MODEL_CALL_FAILED", `Model call failed: ${describeError(cause)}`, { cause });
    this.name = "ModelCallError";
  }
}

export class SessionNotFoundError extends QueryAgentError {
  readonly sessionKey: string;

  constructor(sessionKey: string) {
    super("SESSION_NOT_FOUND", `Session not found: ${sessionKey}`);
    this.name = "SessionNotFoundError";
    this.sessionKey = sessionKey;
  }
}

export class ChatAbortedError extends QueryAgentError {
  constructor() {
    super("CHAT_ABORTED", "Chat was cancelled");
    this.name = "ChatAbortedError";
  }
}

export class InvalidRequestError extends QueryAgentError {
  constructor(message: string) {
    super("INVALID_REQUEST", message);
    this.name = "InvalidRequestError";
  }
}

export class ConfigError extends QueryAgentError {
  constructor(message: string) {
    super("INVALID_CONFIG", message);
    this.name = "ConfigError";
  }
}

/** Render any thrown value as a single line of text */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
