import type {
  FunctionTool,
  LLMCallOptions,
  LLMProvider,
  LLMResponse,
  Message,
} from "../types.js";

/** A scripted reply, or an error the provider should throw on that call */
export type MockStep = LLMResponse | Error;

/**
 * Mock LLM provider for testing.
 * Returns pre-configured responses in sequence.
 */
export class MockLLMProvider implements LLMProvider {
  private responses: MockStep[];
  private callIndex = 0;
  /** Records all calls for assertion */
  public calls: Array<{ messages: Message[]; tools: FunctionTool[] }> = [];
  /** Runs before each reply is returned, so a test can act mid-run */
  public beforeReply?: (callNumber: number) => void | Promise<void>;

  constructor(responses: MockStep[]) {
    this.responses = responses;
  }

  async chat(
    messages: Message[],
    tools: FunctionTool[],
    _options?: LLMCallOptions,
  ): Promise<LLMResponse> {
    this.calls.push({ messages: [...messages], tools: [...tools] });
    await this.beforeReply?.(this.calls.length);
    if (this.callIndex >= this.responses.length) {
      return {
        content: "No more mock responses configured.",
        toolCalls: [],
        finishReason: "stop",
      };
    }
    const step = this.responses[this.callIndex++];
    if (step instanceof Error) {
      throw step;
    }
    return step;
  }

  /** Reset call counter (reuse same responses) */
  reset(): void {
    this.callIndex = 0;
    this.calls = [];
  }
}

/** Shorthand for a text-only reply */
export function textReply(content: string): LLMResponse {
  return { content, toolCalls: [], finishReason: "stop" };
}

/** Shorthand for a reply requesting tools */
export function toolReply(
  calls: Array<{ id: string; name: string; args?: Record<string, unknown> | string }>,
  content: string | null = null,
): LLMResponse {
  return {
    content,
    toolCalls: calls.map((c) => ({
      id: c.id,
      name: c.name,
      arguments: typeof c.args === "string" ? c.args : JSON.stringify(c.args ?? {}),
    })),
    finishReason: "tool_calls",
  };
}
