/**
 * Core type definitions for the query agent.
 *
 * Layered the same way as the runtime: Message → Tool → Session → Service.
 */

// ---------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------

export type Role = "system" | "user" | "assistant" | "tool";

export interface ToolCall {
  id: string;
  name: string;
  arguments: string; // JSON-encoded arguments
}

export interface Message {
  role: Role;
  content: string | null;
  tool_calls?: ToolCall[];
  /** Present when role === "tool"; links back to the originating tool_call id */
  tool_call_id?: string;
  name?: string;
}

// ---------------------------------------------------------------------------
// Tools
// ---------------------------------------------------------------------------

export type ParameterType =
  | "string"
  | "integer"
  | "number"
  | "boolean"
  | "array"
  | "object";

/** JSON-schema fragment used for nested array items and object properties */
export interface ToolParameterSchema {
  type: string;
  description?: string;
  enum?: Array<string | number>;
  items?: ToolParameterSchema;
  properties?: Record<string, ToolParameterSchema>;
  required?: string[];
}

export interface ToolParameterSpec {
  name: string;
  type: ParameterType;
  description: string;
  enum?: Array<string | number>;
  items?: ToolParameterSchema;
  properties?: Record<string, ToolParameterSchema>;
  required?: boolean;
}

export interface ToolDescriptor {
  name: string;
  /** Read by the model to decide when the tool applies */
  description: string;
  parameters: ToolParameterSpec[];
}

export type ToolSchema = {
  type: "object";
  properties: Record<string, ToolParameterSchema>;
  required: string[];
};

/** A descriptor in the model's function-calling format */
export interface FunctionTool {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: ToolSchema;
  };
}

export type ToolArguments = Record<string, unknown>;

/** The runtime capability that actually executes a tool call */
export type ToolExecutor = (args: ToolArguments) => Promise<unknown>;

export interface Tool {
  descriptor: ToolDescriptor;
  execute: ToolExecutor;
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

/** Rows as a data source returns them, with column metadata when known */
export interface TabularResult {
  columns: string[];
  rows: unknown[][];
}

/** One normalized row: keyed by column name, or positional without column names */
export type ResultRecord = Record<string, unknown> | unknown[];

// ---------------------------------------------------------------------------
// Data source (backing resource owned by a session)
// ---------------------------------------------------------------------------

export type ProcedureParams = Array<{ name: string; value: unknown }>;

export interface DataSource {
  callProcedure(procedure: string, params: ProcedureParams): Promise<TabularResult>;
  close(): Promise<void>;
}

// ---------------------------------------------------------------------------
// LLM abstraction (thin wrapper so we can swap providers or mock in tests)
// ---------------------------------------------------------------------------

export interface LLMResponse {
  content: string | null;
  toolCalls: ToolCall[];
  finishReason: "stop" | "tool_calls" | "length" | "content_filter";
}

export interface LLMCallOptions {
  signal?: AbortSignal;
}

export interface LLMProvider {
  chat(
    messages: Message[],
    tools: FunctionTool[],
    options?: LLMCallOptions,
  ): Promise<LLMResponse>;
}

// ---------------------------------------------------------------------------
// Orchestration
// ---------------------------------------------------------------------------

export type LoopState =
  | "await_model"
  | "model_final"
  | "model_requests_tools"
  | "executing"
  | "done"
  | "abort_no_progress"
  | "abort_iteration_limit";

export type TerminalState = Extract<
  LoopState,
  "done" | "abort_no_progress" | "abort_iteration_limit"
>;
